/**
 * XTTS Text-to-Speech Provider
 * REST client for an XTTS inference server; returns WAV at the engine's native rate
 */

import axios from 'axios';
import { z } from 'zod';
import {
  TTSConfig,
  Logger,
  LanguageCode,
  UpstreamError
} from '../../types';
import { TTSProvider, TTSProviderFactory } from '../base/tts-provider';
import { toUpstreamError } from '../upstream-errors';

const speakersSchema = z.array(z.string());

export class XTTSProvider extends TTSProvider {
  constructor(config: TTSConfig, logger: Logger) {
    super(config, logger);
  }

  getName(): string {
    return 'xtts-http';
  }

  protected async initialize(): Promise<void> {
    if (!this.config.baseUrl) {
      throw new Error('XTTS base URL is required');
    }
    this.logger.info('XTTS provider initialized', {
      baseUrl: this.config.baseUrl,
      defaultVoice: this.config.defaultVoice
    });
  }

  protected async fetchVoices(): Promise<string[]> {
    let status: number;
    let data: unknown;
    try {
      const response = await axios.get(`${this.config.baseUrl}/speakers_list`, {
        timeout: this.config.timeout ?? 10_000
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw await toUpstreamError('synthesis', error);
    }

    const parsed = speakersSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError('synthesis', status, `unexpected speakers list: ${JSON.stringify(data)}`);
    }
    return parsed.data;
  }

  protected async render(text: string, voice: string | null, language: LanguageCode): Promise<Buffer> {
    const startTime = Date.now();
    const body: Record<string, string> = { text, language };
    if (voice) {
      body.speaker_wav = voice;
    }

    try {
      const response = await axios.post<ArrayBuffer>(`${this.config.baseUrl}/tts_to_audio/`, body, {
        responseType: 'arraybuffer',
        timeout: this.config.timeout ?? 0,
        headers: { 'Content-Type': 'application/json' }
      });

      const audio = Buffer.from(response.data);
      this.logger.debug('Synthesis completed', {
        voice,
        language,
        bytes: audio.length,
        latencyMs: Date.now() - startTime
      });
      return audio;
    } catch (error) {
      throw await toUpstreamError('synthesis', error);
    }
  }
}

// Register with factory
TTSProviderFactory.register('xtts-http', XTTSProvider);
