/**
 * Dependency Container
 * Builds every engine handle and service once, at process start
 */

import '../providers';

import { AppConfig, isStorageConfigured } from '../config/app-config';
import { Logger, errorMessage } from '../types';
import { STTProvider, STTProviderFactory } from '../providers/base/stt-provider';
import { TTSProvider, TTSProviderFactory } from '../providers/base/tts-provider';
import { LLMProviderFactory } from '../providers/base/llm-provider';
import { AudioNormalizer } from '../audio/audio-normalizer';
import { FfmpegAudioDecoder, FfmpegAudioTranscoder } from '../audio/ffmpeg-codec';
import { SpeechPipeline } from '../pipeline/speech-pipeline';
import { ConversationRelay } from '../pipeline/conversation-relay';
import { SynthesisService } from '../services/synthesis-service';
import { SpriteStorage } from '../services/sprite-storage';
import { AccountService } from '../services/account-service';
import { SupabaseObjectStorage, SupabaseUserDirectory, createSupabaseAdmin } from '../services/supabase';
import { APIServerDependencies } from './api-server';

export interface Container extends APIServerDependencies {
  stt: STTProvider;
  tts: TTSProvider;
}

export function createContainer(config: AppConfig, logger: Logger): Container {
  const decoder = new FfmpegAudioDecoder();
  const transcoder = new FfmpegAudioTranscoder();

  const stt = STTProviderFactory.create(
    {
      type: 'whisper-http',
      baseUrl: config.transcription.baseUrl,
      model: config.transcription.model,
      language: config.transcription.defaultLanguage,
      credentials: config.transcription.apiKey ? { apiKey: config.transcription.apiKey } : undefined
    },
    logger
  );

  const tts = TTSProviderFactory.create(
    {
      type: 'xtts-http',
      baseUrl: config.synthesis.baseUrl,
      defaultVoice: config.synthesis.defaultVoice,
      language: config.synthesis.defaultLanguage
    },
    logger
  );

  const llm = LLMProviderFactory.create(
    {
      type: 'ollama',
      baseUrl: config.completion.baseUrl,
      model: config.completion.defaultModel,
      timeout: config.completion.timeoutMs
    },
    logger
  );

  const normalizer = new AudioNormalizer(
    {
      sampleRate: config.transcription.sampleRate,
      maxAudioBytes: config.limits.maxAudioBytes,
      maxAudioSeconds: config.limits.maxAudioSeconds
    },
    decoder,
    logger
  );

  const supabase = createSupabaseAdmin(config.storage);

  return {
    stt,
    tts,
    speechPipeline: new SpeechPipeline(normalizer, stt, logger),
    relay: new ConversationRelay(llm, { promptLanguage: config.completion.promptLanguage }, logger),
    synthesis: new SynthesisService(
      tts,
      decoder,
      transcoder,
      { sampleRate: config.synthesis.sampleRate, outputFormat: config.synthesis.outputFormat },
      logger
    ),
    sprites: supabase
      ? new SpriteStorage(new SupabaseObjectStorage(supabase), config.storage, logger)
      : null,
    accounts: supabase ? new AccountService(new SupabaseUserDirectory(supabase), logger) : null
  };
}

/**
 * Background start-up checks. Failures are logged; the server keeps running
 * and the affected routes report the upstream error per request.
 */
export async function warmup(container: Container, config: AppConfig, logger: Logger): Promise<void> {
  if (isStorageConfigured(config.storage)) {
    logger.info('Supabase configured');
  } else {
    logger.warn('Supabase not configured, sprite and account routes disabled');
  }

  const engines = ['transcription', 'synthesis'];
  const results = await Promise.allSettled([container.stt.ensureReady(), container.tts.ensureReady()]);
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      logger.warn('Engine warmup failed', { engine: engines[index], error: errorMessage(result.reason) });
    }
  });

  await container.relay.checkConnection();
}
