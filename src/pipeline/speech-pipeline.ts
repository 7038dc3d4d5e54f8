/**
 * Speech Pipeline
 * Upload bytes -> canonical waveform -> recognition events -> speech metrics
 */

import { LanguageCode, Logger, TranscriptionResult } from '../types';
import { AudioNormalizer } from '../audio/audio-normalizer';
import { STTProvider } from '../providers/base/stt-provider';
import { computeSpeechMetrics } from './speech-metrics';

export class SpeechPipeline {
  private logger: Logger;

  constructor(
    private normalizer: AudioNormalizer,
    private stt: STTProvider,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'speech-pipeline' });
  }

  async transcribe(bytes: Buffer, contentType: string | undefined, language: LanguageCode): Promise<TranscriptionResult> {
    const startTime = Date.now();

    // Size and duration caps are enforced here, before the engine is called
    const audio = await this.normalizer.normalize(bytes, contentType);
    const recognition = await this.stt.transcribe(audio, language);
    const metrics = computeSpeechMetrics(recognition.events, audio.durationSeconds);

    this.logger.info('Transcription completed', {
      language,
      durationSeconds: audio.durationSeconds,
      wordCount: metrics.wordCount,
      clarityLevel: metrics.clarityLevel,
      latencyMs: Date.now() - startTime
    });

    return {
      text: recognition.text,
      durationSeconds: audio.durationSeconds,
      language,
      metrics
    };
  }
}
