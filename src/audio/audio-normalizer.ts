/**
 * Audio Normalizer
 * Turns an uploaded recording into the canonical waveform the recognizer expects,
 * enforcing the size and duration caps around the decode step.
 */

import {
  AudioFormatTag,
  AudioTooLongError,
  CanonicalAudio,
  DecodeError,
  errorMessage,
  Logger,
  PayloadTooLargeError,
  ValidationError
} from '../types';
import { downmixToMono, getAudioDurationSeconds, parseWav, resample } from './audio-converter';
import { AudioDecoder } from './ffmpeg-codec';

// Order matters: 'mpeg' must win over 'mp4' for audio/mpeg
const CONTENT_TYPE_FORMATS: ReadonlyArray<[string, AudioFormatTag]> = [
  ['wav', 'wav'],
  ['mpeg', 'mp3'],
  ['mp3', 'mp3'],
  ['ogg', 'ogg'],
  ['webm', 'webm'],
  ['aac', 'm4a'],
  ['mp4', 'm4a'],
  ['m4a', 'm4a']
];

/**
 * Guess the codec tag from a transport content type.
 * Returns null when the type is missing or unknown so the decoder probes instead.
 */
export function guessAudioFormat(contentType: string | undefined | null): AudioFormatTag | null {
  if (!contentType) return null;
  const normalized = contentType.toLowerCase();

  for (const [needle, format] of CONTENT_TYPE_FORMATS) {
    if (normalized.includes(needle)) {
      return format;
    }
  }
  return null;
}

export interface AudioNormalizerConfig {
  sampleRate: number;
  maxAudioBytes: number;
  maxAudioSeconds: number;
}

export class AudioNormalizer {
  private logger: Logger;

  constructor(
    private config: AudioNormalizerConfig,
    private decoder: AudioDecoder,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'audio-normalizer' });
  }

  async normalize(bytes: Buffer, contentType?: string): Promise<CanonicalAudio> {
    if (bytes.length === 0) {
      throw new ValidationError('Empty audio upload');
    }

    if (bytes.length > this.config.maxAudioBytes) {
      throw new PayloadTooLargeError(this.config.maxAudioBytes, bytes.length);
    }

    const format = guessAudioFormat(contentType);
    const pcm = await this.decode(bytes, format, contentType);
    const durationSeconds = getAudioDurationSeconds(pcm, this.config.sampleRate);

    if (durationSeconds > this.config.maxAudioSeconds) {
      throw new AudioTooLongError(durationSeconds, this.config.maxAudioSeconds);
    }

    this.logger.debug('Audio normalized', {
      contentType,
      format,
      inputBytes: bytes.length,
      durationSeconds
    });

    return { pcm, sampleRate: this.config.sampleRate, durationSeconds };
  }

  private async decode(bytes: Buffer, format: AudioFormatTag | null, contentType?: string): Promise<Buffer> {
    const wav = format === 'wav' || format === null ? parseWav(bytes) : null;
    if (wav) {
      const mono = downmixToMono(wav.pcm, wav.channels);
      return resample(mono, wav.sampleRate, this.config.sampleRate);
    }

    try {
      return await this.decoder.decode(bytes, format, this.config.sampleRate);
    } catch (error) {
      throw new DecodeError(contentType, errorMessage(error));
    }
  }
}
