/**
 * LLM Provider interface.
 *
 * Abstracts the model backend so the response generator and the judge
 * evaluator can run against any OpenAI-compatible server.
 */

import type { Logger } from '../types/logger.js';

/**
 * Message in a conversation.
 */
export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Completion request.
 */
export interface CompletionRequest {
  messages: Message[];
  /** Overrides the provider's default model */
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Completion response.
 */
export interface CompletionResponse {
  /** Generated text; null when the model returned none */
  content: string | null;
  model: string;
  finishReason?: 'stop' | 'length' | 'content_filter' | 'error';
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * LLM Provider interface.
 */
export interface LLMProvider {
  /** Provider name (for logging) */
  readonly name: string;

  /** Check if provider is available/configured */
  isAvailable(): boolean;

  /** Generate a completion */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Error from LLM provider.
 */
export class LLMError extends Error {
  readonly provider: string;
  readonly statusCode?: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    provider: string,
    options?: { statusCode?: number; retryable?: boolean }
  ) {
    super(message);
    this.name = 'LLMError';
    this.provider = provider;
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Base LLM provider with request logging.
 *
 * Subclasses implement doComplete() for the actual API call.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  protected readonly logger?: Logger | undefined;
  private requestCounter = 0;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ component: 'llm' });
  }

  abstract isAvailable(): boolean;

  /**
   * Generate a completion, logging request and outcome.
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const requestId = `req_${String(++this.requestCounter)}`;
    const startTime = Date.now();

    this.logger?.debug(
      {
        requestId,
        provider: this.name,
        messageCount: request.messages.length,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
      },
      'LLM request started'
    );
    this.logger?.trace({ requestId, messages: request.messages }, 'LLM request messages');

    try {
      const response = await this.doComplete(request);

      this.logger?.debug(
        {
          requestId,
          provider: this.name,
          model: response.model,
          durationMs: Date.now() - startTime,
          finishReason: response.finishReason,
          totalTokens: response.usage?.totalTokens,
          responseLength: response.content?.length ?? 0,
        },
        'LLM response received'
      );

      return response;
    } catch (error) {
      this.logger?.error(
        {
          requestId,
          provider: this.name,
          durationMs: Date.now() - startTime,
          error: error instanceof Error ? error.message : String(error),
          retryable: error instanceof LLMError ? error.retryable : false,
        },
        'LLM request failed'
      );
      throw error;
    }
  }

  /**
   * Perform the actual completion request.
   */
  protected abstract doComplete(request: CompletionRequest): Promise<CompletionResponse>;
}
