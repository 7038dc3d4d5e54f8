/**
 * Application Configuration
 * Environment-driven settings, read once at process start
 */

import { LanguageCode, OutputAudioFormat } from '../types';
import { LogLevel, parseLogLevel } from '../utils/logger';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  apiKeyHeader: string;
  /** When set, admin routes require this value in the API key header */
  adminApiKey?: string;
}

export interface CompletionConfig {
  baseUrl: string;
  defaultModel: string;
  timeoutMs: number;
  promptLanguage: LanguageCode;
}

export interface TranscriptionConfig {
  baseUrl: string;
  model: string;
  /** Sent as a Bearer token when the transcription server requires one */
  apiKey?: string;
  defaultLanguage: LanguageCode;
  sampleRate: number;
}

export interface SynthesisConfig {
  baseUrl: string;
  defaultLanguage: LanguageCode;
  defaultVoice: string;
  outputFormat: OutputAudioFormat;
  sampleRate: number;
}

export interface StorageConfig {
  supabaseUrl?: string;
  secretKey?: string;
  pendingBucket: string;
  approvedBucket: string;
  maxSpriteBytes: number;
  signedUrlTtlSeconds: number;
}

export interface LimitsConfig {
  maxAudioBytes: number;
  maxAudioSeconds: number;
}

export interface AppConfig {
  server: ServerConfig;
  completion: CompletionConfig;
  transcription: TranscriptionConfig;
  synthesis: SynthesisConfig;
  storage: StorageConfig;
  limits: LimitsConfig;
  logLevel: LogLevel;
}

export const DEFAULT_MAX_AUDIO_BYTES = 15 * 1024 * 1024;
export const DEFAULT_MAX_AUDIO_SECONDS = 25;
export const DEFAULT_MAX_SPRITE_BYTES = 5 * 1024 * 1024;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseOutputFormat = (value: string | undefined): OutputAudioFormat =>
  value?.toLowerCase() === 'wav' ? 'wav' : 'mp3';

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: {
      port: parseIntOrDefault(env.PORT, 8000),
      host: env.HOST || '0.0.0.0',
      corsOrigins: (env.CORS_ORIGINS || '*').split(',').map((origin) => origin.trim()),
      apiKeyHeader: env.API_KEY_HEADER || 'X-API-Key',
      adminApiKey: optional(env.ADMIN_API_KEY)
    },
    completion: {
      baseUrl: env.OLLAMA_URL || 'http://localhost:11434',
      defaultModel: env.LLM_MODEL || 'qwen2.5:1b',
      timeoutMs: parseIntOrDefault(env.LLM_TIMEOUT_MS, 120_000),
      promptLanguage: env.PROMPT_LANGUAGE || 'ru'
    },
    transcription: {
      baseUrl: env.WHISPER_URL || 'http://localhost:9000',
      model: env.WHISPER_MODEL || 'qymyz/whisper-tiny-russian-dysarthria',
      apiKey: optional(env.WHISPER_API_KEY),
      defaultLanguage: env.STT_LANGUAGE || 'ru',
      sampleRate: 16000
    },
    synthesis: {
      baseUrl: env.XTTS_URL || 'http://localhost:8020',
      defaultLanguage: env.XTTS_LANG || 'ru',
      defaultVoice: env.XTTS_VOICE || 'Gracie Wise',
      outputFormat: parseOutputFormat(env.TTS_FORMAT),
      sampleRate: 24000
    },
    storage: {
      supabaseUrl: optional(env.SUPABASE_URL),
      secretKey: optional(env.SUPABASE_SECRET_KEY),
      pendingBucket: 'sprites-pending',
      approvedBucket: 'sprites-approved',
      maxSpriteBytes: parseIntOrDefault(env.MAX_SPRITE_BYTES, DEFAULT_MAX_SPRITE_BYTES),
      signedUrlTtlSeconds: 3600
    },
    limits: {
      maxAudioBytes: parseIntOrDefault(env.MAX_AUDIO_BYTES, DEFAULT_MAX_AUDIO_BYTES),
      maxAudioSeconds: parseIntOrDefault(env.MAX_AUDIO_SECONDS, DEFAULT_MAX_AUDIO_SECONDS)
    },
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}

export function isStorageConfigured(config: StorageConfig): boolean {
  return Boolean(config.supabaseUrl && config.secretKey);
}
