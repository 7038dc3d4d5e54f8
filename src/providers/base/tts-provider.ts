/**
 * TTS Provider Abstract Base Class
 * All TTS providers must implement this interface
 */

import {
  TTSConfig,
  Logger,
  LanguageCode,
  CompanionError
} from '../../types';

export abstract class TTSProvider {
  protected config: TTSConfig;
  protected logger: Logger;
  private initPromise: Promise<void> | null = null;

  constructor(config: TTSConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ provider: this.getName(), type: 'tts' });
  }

  /**
   * Get the provider name
   */
  abstract getName(): string;

  /**
   * Initialize the provider
   */
  protected abstract initialize(): Promise<void>;

  /**
   * Voice identifiers the engine currently reports. An empty list means the
   * engine has a single built-in voice and takes no speaker argument.
   */
  protected abstract fetchVoices(): Promise<string[]>;

  /**
   * Render text to a WAV container at the engine's native rate
   */
  protected abstract render(text: string, voice: string | null, language: LanguageCode): Promise<Buffer>;

  ensureReady(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.initialize().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }
    return this.initPromise;
  }

  async listVoices(): Promise<string[]> {
    await this.ensureReady();
    return this.fetchVoices();
  }

  async synthesize(text: string, voice: string | null, language?: LanguageCode): Promise<Buffer> {
    await this.ensureReady();
    return this.render(text, voice, language || this.config.language);
  }

  getDefaultVoice(): string {
    return this.config.defaultVoice;
  }

  getDefaultLanguage(): LanguageCode {
    return this.config.language;
  }

  /**
   * Cleanup resources
   */
  async shutdown(): Promise<void> {
    this.initPromise = null;
    this.logger.info('Provider shutdown complete');
  }
}

type TTSProviderClass = new (config: TTSConfig, logger: Logger) => TTSProvider;

/**
 * Factory for creating TTS providers
 */
export class TTSProviderFactory {
  private static providers: Map<string, TTSProviderClass> = new Map();

  static register(type: string, providerClass: TTSProviderClass): void {
    this.providers.set(type, providerClass);
  }

  static create(config: TTSConfig, logger: Logger): TTSProvider {
    const ProviderClass = this.providers.get(config.type);
    if (!ProviderClass) {
      throw new CompanionError(`Unknown TTS provider: ${config.type}`, 'CONFIGURATION_MISSING', 503);
    }
    return new ProviderClass(config, logger);
  }

  static getRegisteredProviders(): string[] {
    return Array.from(this.providers.keys());
  }
}
