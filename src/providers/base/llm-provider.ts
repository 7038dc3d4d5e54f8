/**
 * LLM Provider Abstract Base Class
 * All completion backends must implement this interface
 */

import {
  LLMConfig,
  ConversationRequest,
  Logger,
  CompanionError
} from '../../types';

export abstract class LLMProvider {
  protected config: LLMConfig;
  protected logger: Logger;

  constructor(config: LLMConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ provider: this.getName(), type: 'llm' });
  }

  /**
   * Get the provider name
   */
  abstract getName(): string;

  /**
   * Probe the backend. Resolves false instead of throwing when unreachable.
   */
  abstract checkConnection(): Promise<boolean>;

  /**
   * Generate a complete reply (non-streaming) and return the assistant text
   */
  abstract generate(request: ConversationRequest): Promise<string>;

  /**
   * Open a streaming generation. The returned iterable yields the backend's
   * raw bytes in arrival order; aborting the signal closes the connection.
   */
  abstract openStream(request: ConversationRequest, signal: AbortSignal): Promise<AsyncIterable<Buffer>>;

  getModel(request: ConversationRequest): string {
    return request.model || this.config.model;
  }
}

type LLMProviderClass = new (config: LLMConfig, logger: Logger) => LLMProvider;

/**
 * Factory for creating LLM providers
 */
export class LLMProviderFactory {
  private static providers: Map<string, LLMProviderClass> = new Map();

  static register(type: string, providerClass: LLMProviderClass): void {
    this.providers.set(type, providerClass);
  }

  static create(config: LLMConfig, logger: Logger): LLMProvider {
    const ProviderClass = this.providers.get(config.type);
    if (!ProviderClass) {
      throw new CompanionError(`Unknown LLM provider: ${config.type}`, 'CONFIGURATION_MISSING', 503);
    }
    return new ProviderClass(config, logger);
  }

  static getRegisteredProviders(): string[] {
    return Array.from(this.providers.keys());
  }
}
