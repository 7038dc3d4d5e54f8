import { describe, it, expect, vi } from 'vitest';
import '../providers';
import { STTProvider, STTProviderFactory } from '../providers/base/stt-provider';
import { TTSProviderFactory } from '../providers/base/tts-provider';
import { LLMProviderFactory } from '../providers/base/llm-provider';
import { WhisperSTTProvider } from '../providers/stt/whisper-stt';
import { CanonicalAudio, LanguageCode, RecognitionOutput } from '../types';
import { silentLogger } from './helpers';

class ScriptedSTTProvider extends STTProvider {
  readonly init = vi.fn<() => Promise<void>>(async () => undefined);
  readonly languages: LanguageCode[] = [];

  getName(): string {
    return 'scripted';
  }

  protected initialize(): Promise<void> {
    return this.init();
  }

  protected async recognize(_audio: CanonicalAudio, language: LanguageCode): Promise<RecognitionOutput> {
    this.languages.push(language);
    return { text: 'ok', events: [{ text: 'ok' }] };
  }
}

const createProvider = () =>
  new ScriptedSTTProvider(
    { type: 'whisper-http', baseUrl: 'http://127.0.0.1:1', model: 'test-model', language: 'ru' },
    silentLogger()
  );

const audio: CanonicalAudio = { pcm: Buffer.alloc(320), sampleRate: 16000, durationSeconds: 0.01 };

describe('provider initialization', () => {
  it('shares one initialization between concurrent callers', async () => {
    const provider = createProvider();
    let release: () => void = () => undefined;
    provider.init.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    const first = provider.ensureReady();
    const second = provider.ensureReady();
    release();
    await Promise.all([first, second, provider.transcribe(audio)]);

    expect(provider.init).toHaveBeenCalledTimes(1);
  });

  it('retries after a failed initialization', async () => {
    const provider = createProvider();
    provider.init.mockRejectedValueOnce(new Error('engine warming up'));

    await expect(provider.ensureReady()).rejects.toThrow('engine warming up');
    await expect(provider.ensureReady()).resolves.toBeUndefined();
    expect(provider.init).toHaveBeenCalledTimes(2);
  });

  it('initializes again after shutdown', async () => {
    const provider = createProvider();
    await provider.ensureReady();
    await provider.shutdown();
    await provider.ensureReady();

    expect(provider.init).toHaveBeenCalledTimes(2);
  });

  it('falls back to the configured language', async () => {
    const provider = createProvider();
    await provider.transcribe(audio);
    await provider.transcribe(audio, 'en');

    expect(provider.languages).toEqual(['ru', 'en']);
  });
});

describe('provider factories', () => {
  it('registers the bundled engines', () => {
    expect(STTProviderFactory.getRegisteredProviders()).toContain('whisper-http');
    expect(TTSProviderFactory.getRegisteredProviders()).toContain('xtts-http');
    expect(LLMProviderFactory.getRegisteredProviders()).toContain('ollama');
  });

  it('creates providers by type', () => {
    const provider = STTProviderFactory.create(
      { type: 'whisper-http', baseUrl: 'http://127.0.0.1:1', model: 'test-model', language: 'ru' },
      silentLogger()
    );
    expect(provider).toBeInstanceOf(WhisperSTTProvider);
  });
});
