/**
 * Conversation Relay
 * Adds the adaptive system turn and forwards the conversation to the
 * completion backend, either as a transparent byte stream or buffered.
 * Nothing is retried: a partial reply may already have reached the child.
 */

import { ConversationRequest, LanguageCode, Logger, SpeechMetrics } from '../types';
import { LLMProvider } from '../providers/base/llm-provider';
import { ContextOptions, prepareConversation } from './context-composer';

export interface RelayOptions {
  promptLanguage: LanguageCode;
}

export class ConversationRelay {
  private logger: Logger;

  constructor(
    private llm: LLMProvider,
    private options: RelayOptions,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'conversation-relay' });
  }

  /**
   * Open a streaming completion. Chunks are yielded exactly as the backend
   * emits them; aborting the signal tears down the upstream connection.
   */
  async stream(
    request: ConversationRequest,
    metrics: SpeechMetrics | undefined,
    signal: AbortSignal,
    context: Omit<ContextOptions, 'language'> = {}
  ): Promise<AsyncIterable<Buffer>> {
    const prepared = this.prepare(request, metrics, context);
    this.logger.debug('Relaying streaming completion', {
      model: this.llm.getModel(prepared),
      adaptive: metrics !== undefined
    });
    return this.llm.openStream(prepared, signal);
  }

  /**
   * Buffered completion; resolves with the assistant text only.
   */
  async complete(
    request: ConversationRequest,
    metrics?: SpeechMetrics,
    context: Omit<ContextOptions, 'language'> = {}
  ): Promise<string> {
    const prepared = this.prepare(request, metrics, context);
    this.logger.debug('Relaying buffered completion', {
      model: this.llm.getModel(prepared),
      adaptive: metrics !== undefined
    });
    return this.llm.generate(prepared);
  }

  async checkConnection(): Promise<boolean> {
    const connected = await this.llm.checkConnection();
    if (connected) {
      this.logger.info('Completion backend reachable');
    }
    return connected;
  }

  private prepare(
    request: ConversationRequest,
    metrics: SpeechMetrics | undefined,
    context: Omit<ContextOptions, 'language'>
  ): ConversationRequest {
    return {
      model: request.model,
      messages: prepareConversation(request.messages, metrics, {
        ...context,
        language: this.options.promptLanguage
      })
    };
  }
}
