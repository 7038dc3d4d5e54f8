/**
 * Ollama LLM Provider
 * Chat completions against a local Ollama server, buffered or as a raw byte stream
 *
 * API Reference: https://github.com/ollama/ollama/blob/main/docs/api.md#generate-a-chat-completion
 */

import axios from 'axios';
import { Readable } from 'stream';
import { z } from 'zod';
import {
  LLMConfig,
  ConversationRequest,
  Logger,
  UpstreamError,
  errorMessage
} from '../../types';
import { LLMProvider, LLMProviderFactory } from '../base/llm-provider';
import { readResponseBody, toUpstreamError } from '../upstream-errors';

const DEFAULT_TIMEOUT_MS = 120_000;
const PROBE_TIMEOUT_MS = 5_000;

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional()
    })
    .optional()
});

export class OllamaLLMProvider extends LLMProvider {
  constructor(config: LLMConfig, logger: Logger) {
    super(config, logger);
  }

  getName(): string {
    return 'ollama';
  }

  async checkConnection(): Promise<boolean> {
    try {
      await axios.get(`${this.config.baseUrl}/api/tags`, { timeout: PROBE_TIMEOUT_MS });
      return true;
    } catch (error) {
      this.logger.warn('Ollama connection failed', {
        baseUrl: this.config.baseUrl,
        error: errorMessage(error)
      });
      return false;
    }
  }

  async generate(request: ConversationRequest): Promise<string> {
    const startTime = Date.now();
    const model = this.getModel(request);

    let data: unknown;
    try {
      const response = await axios.post(
        `${this.config.baseUrl}/api/chat`,
        { model, stream: false, messages: request.messages },
        { timeout: this.config.timeout ?? DEFAULT_TIMEOUT_MS }
      );
      data = response.data;
    } catch (error) {
      throw await toUpstreamError('completion', error);
    }

    const parsed = chatResponseSchema.safeParse(data);
    const content = parsed.success ? parsed.data.message?.content ?? '' : '';

    this.logger.debug('Completion received', {
      model,
      turns: request.messages.length,
      characters: content.length,
      latencyMs: Date.now() - startTime
    });

    return content;
  }

  async openStream(request: ConversationRequest, signal: AbortSignal): Promise<AsyncIterable<Buffer>> {
    const model = this.getModel(request);

    let status: number;
    let stream: Readable;
    try {
      // No timeout: generation time depends on the model and the caller cancels through the signal
      const response = await axios.post<Readable>(
        `${this.config.baseUrl}/api/chat`,
        { model, stream: true, messages: request.messages },
        {
          responseType: 'stream',
          timeout: 0,
          signal,
          validateStatus: () => true
        }
      );
      status = response.status;
      stream = response.data;
    } catch (error) {
      throw await toUpstreamError('completion', error);
    }

    if (status < 200 || status >= 300) {
      throw new UpstreamError('completion', status, await readResponseBody(stream));
    }

    this.logger.debug('Completion stream opened', { model, turns: request.messages.length });
    return stream;
  }
}

// Register with factory
LLMProviderFactory.register('ollama', OllamaLLMProvider);
