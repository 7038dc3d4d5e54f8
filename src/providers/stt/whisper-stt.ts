/**
 * Whisper Speech-to-Text Provider
 * Talks to a Whisper inference server through its OpenAI-compatible
 * transcription endpoint and maps the verbose JSON into recognition events.
 */

import axios from 'axios';
import { z } from 'zod';
import {
  STTConfig,
  CanonicalAudio,
  RecognitionEvent,
  RecognitionOutput,
  Logger,
  LanguageCode,
  UpstreamError
} from '../../types';
import { encodeWav } from '../../audio/audio-converter';
import { STTProvider, STTProviderFactory } from '../base/stt-provider';
import { clampUnit, toUpstreamError } from '../upstream-errors';

const TRANSCRIPTION_PATH = '/v1/audio/transcriptions';

const verboseTranscriptionSchema = z.object({
  text: z.string().default(''),
  words: z
    .array(
      z.object({
        word: z.string(),
        probability: z.number().optional()
      })
    )
    .optional(),
  segments: z
    .array(
      z.object({
        text: z.string(),
        avg_logprob: z.number().optional()
      })
    )
    .optional()
});

export type VerboseTranscription = z.infer<typeof verboseTranscriptionSchema>;

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Map the engine's scoring fields onto uniform events, preferring the finest
 * granularity the server reported.
 */
export function toRecognitionEvents(response: VerboseTranscription): RecognitionEvent[] {
  const words = response.words ?? [];
  if (words.length > 0 && words.some((word) => word.probability !== undefined)) {
    return words
      .filter((word) => word.word.trim().length > 0)
      .map((word) => ({
        text: word.word.trim(),
        confidence: word.probability === undefined ? undefined : clampUnit(word.probability)
      }));
  }

  const segments = response.segments ?? [];
  if (segments.some((segment) => segment.avg_logprob !== undefined)) {
    return segments.flatMap((segment) => {
      const confidence =
        segment.avg_logprob === undefined ? undefined : clampUnit(Math.exp(segment.avg_logprob));
      return tokenize(segment.text).map((text) => ({ text, confidence }));
    });
  }

  return tokenize(response.text).map((text) => ({ text }));
}

export class WhisperSTTProvider extends STTProvider {
  constructor(config: STTConfig, logger: Logger) {
    super(config, logger);
  }

  getName(): string {
    return 'whisper-http';
  }

  protected async initialize(): Promise<void> {
    if (!this.config.baseUrl) {
      throw new Error('Whisper base URL is required');
    }
    this.logger.info('Whisper STT provider initialized', {
      baseUrl: this.config.baseUrl,
      model: this.config.model
    });
  }

  protected async recognize(audio: CanonicalAudio, language: LanguageCode): Promise<RecognitionOutput> {
    const startTime = Date.now();
    const wav = encodeWav(audio.pcm, audio.sampleRate);

    const form = new FormData();
    form.append('file', new Blob([wav], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', this.config.model);
    form.append('language', language);
    form.append('response_format', 'verbose_json');
    form.append('timestamp_granularities[]', 'word');

    const headers: Record<string, string> = {};
    if (this.config.credentials?.apiKey) {
      headers.Authorization = `Bearer ${this.config.credentials.apiKey}`;
    }

    let status: number;
    let data: unknown;
    try {
      const response = await axios.post(`${this.config.baseUrl}${TRANSCRIPTION_PATH}`, form, {
        headers,
        timeout: this.config.timeout ?? 0
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw await toUpstreamError('transcription', error);
    }

    const parsed = verboseTranscriptionSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError('transcription', status, `unexpected response: ${JSON.stringify(data)}`);
    }

    const events = toRecognitionEvents(parsed.data);

    this.logger.debug('Transcription received', {
      language,
      events: events.length,
      latencyMs: Date.now() - startTime
    });

    return { text: parsed.data.text.trim(), events };
  }
}

// Register with factory
STTProviderFactory.register('whisper-http', WhisperSTTProvider);
