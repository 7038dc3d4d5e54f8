import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_AUDIO_BYTES,
  DEFAULT_MAX_SPRITE_BYTES,
  isStorageConfigured,
  loadConfig
} from '../config/app-config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 8000,
      host: '0.0.0.0',
      corsOrigins: ['*'],
      apiKeyHeader: 'X-API-Key',
      adminApiKey: undefined
    });
    expect(config.completion).toEqual({
      baseUrl: 'http://localhost:11434',
      defaultModel: 'qwen2.5:1b',
      timeoutMs: 120000,
      promptLanguage: 'ru'
    });
    expect(config.transcription.sampleRate).toBe(16000);
    expect(config.transcription.apiKey).toBeUndefined();
    expect(config.synthesis.sampleRate).toBe(24000);
    expect(config.synthesis.outputFormat).toBe('mp3');
    expect(config.limits).toEqual({ maxAudioBytes: DEFAULT_MAX_AUDIO_BYTES, maxAudioSeconds: 25 });
    expect(config.storage.maxSpriteBytes).toBe(DEFAULT_MAX_SPRITE_BYTES);
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      ADMIN_API_KEY: ' test-secret ',
      OLLAMA_URL: 'http://llm:11434',
      LLM_MODEL: 'tiny',
      PROMPT_LANGUAGE: 'en',
      XTTS_VOICE: 'Bear',
      TTS_FORMAT: 'WAV',
      MAX_AUDIO_SECONDS: '10',
      LOG_LEVEL: 'debug',
      WHISPER_API_KEY: 'test-secret'
    });

    expect(config.server.port).toBe(9100);
    expect(config.server.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.server.adminApiKey).toBe('test-secret');
    expect(config.completion.baseUrl).toBe('http://llm:11434');
    expect(config.completion.defaultModel).toBe('tiny');
    expect(config.completion.promptLanguage).toBe('en');
    expect(config.synthesis.defaultVoice).toBe('Bear');
    expect(config.synthesis.outputFormat).toBe('wav');
    expect(config.limits.maxAudioSeconds).toBe(10);
    expect(config.logLevel).toBe('debug');
    expect(config.transcription.apiKey).toBe('test-secret');
  });

  it('ignores numbers that do not parse', () => {
    const config = loadConfig({ PORT: 'eighty', MAX_AUDIO_BYTES: '' });

    expect(config.server.port).toBe(8000);
    expect(config.limits.maxAudioBytes).toBe(DEFAULT_MAX_AUDIO_BYTES);
  });
});

describe('isStorageConfigured', () => {
  it('requires both the project URL and the secret key', () => {
    expect(isStorageConfigured(loadConfig({}).storage)).toBe(false);
    expect(isStorageConfigured(loadConfig({ SUPABASE_URL: 'http://storage.test' }).storage)).toBe(false);
    expect(
      isStorageConfigured(loadConfig({ SUPABASE_URL: 'http://storage.test', SUPABASE_SECRET_KEY: 'test-secret' }).storage)
    ).toBe(true);
  });
});
