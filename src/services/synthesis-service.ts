/**
 * Synthesis Service
 * Voice resolution, sample-rate normalization and output container selection
 * around the TTS provider.
 */

import {
  LanguageCode,
  Logger,
  OutputAudioFormat,
  UpstreamError,
  ValidationError,
  VoiceResolution,
  errorMessage
} from '../types';
import { TTSProvider } from '../providers/base/tts-provider';
import { downmixToMono, encodeWav, parseWav, resample } from '../audio/audio-converter';
import { AudioDecoder, AudioTranscoder } from '../audio/ffmpeg-codec';

export interface SynthesisRequest {
  text: string;
  voice?: string;
  language?: LanguageCode;
  format?: OutputAudioFormat;
}

export interface SynthesizedAudio {
  audio: Buffer;
  format: OutputAudioFormat;
  contentType: string;
  voice: string | null;
}

export interface SynthesisServiceConfig {
  sampleRate: number;
  outputFormat: OutputAudioFormat;
}

const CONTENT_TYPES: Record<OutputAudioFormat, string> = {
  wav: 'audio/wav',
  mp3: 'audio/mpeg'
};

/**
 * Keep the requested voice when the engine reports it; otherwise take the
 * first reported voice. An engine that reports none takes no speaker at all.
 */
export function resolveVoice(requested: string, available: readonly string[]): VoiceResolution {
  if (available.length === 0) {
    return { voice: null, substituted: false };
  }
  if (available.includes(requested)) {
    return { voice: requested, substituted: false };
  }
  return { voice: available[0], substituted: true };
}

export class SynthesisService {
  private logger: Logger;

  constructor(
    private tts: TTSProvider,
    private decoder: AudioDecoder,
    private transcoder: AudioTranscoder,
    private config: SynthesisServiceConfig,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'synthesis-service' });
  }

  async listVoices(): Promise<{ speakers: string[]; default: string }> {
    const speakers = await this.tts.listVoices();
    return { speakers, default: this.tts.getDefaultVoice() };
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesizedAudio> {
    const text = request.text.trim();
    if (!text) {
      throw new ValidationError('Text is required');
    }

    const requestedVoice = request.voice || this.tts.getDefaultVoice();
    const available = await this.tts.listVoices();
    const resolution = resolveVoice(requestedVoice, available);

    if (resolution.substituted) {
      this.logger.warn('Requested voice not available, substituting', {
        requested: requestedVoice,
        substitute: resolution.voice,
        available
      });
    }

    const language = request.language || this.tts.getDefaultLanguage();
    const engineAudio = await this.tts.synthesize(text, resolution.voice, language);
    const wav = await this.toInternalWav(engineAudio);

    const format = request.format ?? this.config.outputFormat;
    const audio = format === 'mp3' ? await this.transcoder.wavToMp3(wav, this.config.sampleRate) : wav;

    return { audio, format, contentType: CONTENT_TYPES[format], voice: resolution.voice };
  }

  /**
   * Re-encode the engine output as mono PCM WAV at the fixed internal rate
   */
  private async toInternalWav(engineAudio: Buffer): Promise<Buffer> {
    const parsed = parseWav(engineAudio);
    if (parsed) {
      const mono = downmixToMono(parsed.pcm, parsed.channels);
      return encodeWav(resample(mono, parsed.sampleRate, this.config.sampleRate), this.config.sampleRate);
    }

    try {
      const pcm = await this.decoder.decode(engineAudio, null, this.config.sampleRate);
      return encodeWav(pcm, this.config.sampleRate);
    } catch (error) {
      throw new UpstreamError('synthesis', 200, `undecodable engine audio: ${errorMessage(error)}`);
    }
  }
}
