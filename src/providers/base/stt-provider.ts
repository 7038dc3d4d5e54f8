/**
 * STT Provider Abstract Base Class
 * All STT providers must implement this interface
 */

import {
  STTConfig,
  CanonicalAudio,
  RecognitionOutput,
  Logger,
  LanguageCode,
  CompanionError
} from '../../types';

export abstract class STTProvider {
  protected config: STTConfig;
  protected logger: Logger;
  private initPromise: Promise<void> | null = null;

  constructor(config: STTConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ provider: this.getName(), type: 'stt' });
  }

  /**
   * Get the provider name
   */
  abstract getName(): string;

  /**
   * Initialize the provider (probe the engine, load models, etc.)
   */
  protected abstract initialize(): Promise<void>;

  /**
   * Transcribe a complete canonical waveform into ordered recognition events
   */
  protected abstract recognize(audio: CanonicalAudio, language: LanguageCode): Promise<RecognitionOutput>;

  /**
   * Run initialize() at most once; concurrent callers share the same attempt.
   * A failed attempt is forgotten so the next call retries it.
   */
  ensureReady(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.initialize().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  async transcribe(audio: CanonicalAudio, language?: LanguageCode): Promise<RecognitionOutput> {
    await this.ensureReady();
    return this.recognize(audio, this.getEffectiveLanguage(language));
  }

  protected getEffectiveLanguage(language?: LanguageCode): LanguageCode {
    return language || this.config.language;
  }

  /**
   * Cleanup resources
   */
  async shutdown(): Promise<void> {
    this.initPromise = null;
    this.logger.info('Provider shutdown complete');
  }
}

type STTProviderClass = new (config: STTConfig, logger: Logger) => STTProvider;

/**
 * Factory for creating STT providers
 */
export class STTProviderFactory {
  private static providers: Map<string, STTProviderClass> = new Map();

  /**
   * Register a provider implementation
   */
  static register(type: string, providerClass: STTProviderClass): void {
    this.providers.set(type, providerClass);
  }

  /**
   * Create a provider instance
   */
  static create(config: STTConfig, logger: Logger): STTProvider {
    const ProviderClass = this.providers.get(config.type);
    if (!ProviderClass) {
      throw new CompanionError(`Unknown STT provider: ${config.type}`, 'CONFIGURATION_MISSING', 503);
    }
    return new ProviderClass(config, logger);
  }

  /**
   * Get list of registered providers
   */
  static getRegisteredProviders(): string[] {
    return Array.from(this.providers.keys());
  }
}
