import { z } from 'zod';
import type { Logger } from '../../types/logger.js';
import type { CompletionRequest, CompletionResponse } from '../../llm/provider.js';
import { BaseLLMProvider, LLMError } from '../../llm/provider.js';

/**
 * The part of an OpenAI chat completions reply the provider reads.
 */
const openAIResponseSchema = z.object({
  model: z.string(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
        /** For "thinking" models that separate reasoning from final answer */
        reasoning_content: z.string().optional(),
      }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

type OpenAIResponse = z.infer<typeof openAIResponseSchema>;

/**
 * OpenAI-compatible provider configuration.
 *
 * Works with any server that implements the OpenAI chat completions API
 * (LM Studio, Ollama, vLLM, LocalAI).
 */
export interface OpenAICompatibleConfig {
  /** Base URL of the server (e.g., http://localhost:1234) */
  baseUrl: string;

  /** Model used for every request unless the request names one */
  model: string;

  /** Optional API key */
  apiKey?: string | undefined;

  /** Provider name for logging (default: 'openai-compatible') */
  name?: string;

  /** Request timeout in ms (default: 60000) */
  timeout?: number;

  /** Max retries for retryable errors (default: 2) */
  maxRetries?: number;

  /** Retry delay in ms (default: 1000) */
  retryDelay?: number;
}

const DEFAULT_CONFIG = {
  name: 'openai-compatible',
  timeout: 60_000,
  maxRetries: 2,
  retryDelay: 1000,
};

/**
 * OpenAI-compatible LLM provider.
 *
 * Handles:
 * - Request timeout through an AbortController
 * - Retries with linear backoff, exponential for 429 rate limits
 * - Reply validation
 */
export class OpenAICompatibleProvider extends BaseLLMProvider {
  readonly name: string;

  protected readonly config: typeof DEFAULT_CONFIG & OpenAICompatibleConfig;
  protected readonly providerLogger?: Logger | undefined;

  constructor(config: OpenAICompatibleConfig, logger?: Logger) {
    super(logger);
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.name = this.config.name;
    this.providerLogger = logger?.child({ component: this.name });

    this.providerLogger?.info(
      { baseUrl: this.config.baseUrl, model: this.config.model },
      `${this.name} provider initialized`
    );
  }

  /**
   * Check if provider is configured.
   */
  isAvailable(): boolean {
    return Boolean(this.config.baseUrl && this.config.model);
  }

  /**
   * Generate a completion (called by BaseLLMProvider.complete with logging).
   */
  protected async doComplete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.isAvailable()) {
      throw new LLMError(`${this.name} not configured (missing baseUrl or model)`, this.name);
    }

    const model = request.model ?? this.config.model;
    return this.executeWithRetry(() => this.executeRequest(request, model));
  }

  /**
   * Backoff before the next attempt. Rate limits back off exponentially,
   * everything else linearly.
   */
  protected calculateBackoff(attempt: number, isRateLimit: boolean): number {
    if (isRateLimit) {
      return 2 * this.config.retryDelay * Math.pow(2, attempt);
    }
    return this.config.retryDelay * (attempt + 1);
  }

  /**
   * Execute with retry logic.
   */
  protected async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (error instanceof LLMError && !error.retryable) {
          this.providerLogger?.error(
            { message: error.message, statusCode: error.statusCode },
            'Non-retryable LLM error'
          );
          throw error;
        }

        if (attempt < this.config.maxRetries) {
          const isRateLimit = error instanceof LLMError && error.statusCode === 429;
          const backoffMs = this.calculateBackoff(attempt, isRateLimit);
          this.providerLogger?.warn(
            {
              attempt: attempt + 1,
              maxRetries: this.config.maxRetries,
              backoffMs,
              message: lastError.message,
            },
            'Retrying after transient error'
          );
          await this.sleep(backoffMs);
        } else {
          this.providerLogger?.error(
            { attempts: this.config.maxRetries + 1, message: lastError.message },
            'All retry attempts exhausted'
          );
        }
      }
    }

    throw lastError ?? new Error('Unknown error');
  }

  /**
   * Build the API endpoint URL.
   */
  protected getApiUrl(): string {
    const baseUrl = this.config.baseUrl.replace(/\/$/, '');
    return `${baseUrl}/v1/chat/completions`;
  }

  /**
   * Build request headers.
   */
  protected buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    return headers;
  }

  protected buildRequestBody(request: CompletionRequest, model: string): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model,
      messages: request.messages,
    };
    if (request.temperature !== undefined) body['temperature'] = request.temperature;
    if (request.maxTokens !== undefined) body['max_tokens'] = request.maxTokens;
    return body;
  }

  /**
   * Single HTTP attempt.
   */
  private async executeRequest(
    request: CompletionRequest,
    model: string
  ): Promise<CompletionResponse> {
    const url = this.getApiUrl();
    const body = this.buildRequestBody(request, model);

    this.providerLogger?.trace(
      { url, model, messageCount: request.messages.length },
      'OpenAI request'
    );

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.config.timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        const retryable = response.status >= 500 || response.status === 429;

        throw new LLMError(
          `${this.name} API error: ${String(response.status)} - ${errorText}`,
          this.name,
          {
            statusCode: response.status,
            retryable,
          }
        );
      }

      const data: unknown = await response.json();
      const parsed = openAIResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new LLMError(`Invalid response from ${this.name}`, this.name);
      }
      return this.parseResponse(parsed.data);
    } catch (error) {
      if (error instanceof LLMError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new LLMError('Request timed out', this.name, { retryable: true });
      }

      // Connection refused: the server is down, retrying right away will not help
      const errorMessage = error instanceof Error ? error.message : String(error);
      const isConnectionError =
        errorMessage.includes('ECONNREFUSED') || errorMessage.includes('fetch failed');

      throw new LLMError(`Network error: ${errorMessage}`, this.name, {
        retryable: !isConnectionError,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Parse the API response into our format.
   */
  protected parseResponse(data: OpenAIResponse): CompletionResponse {
    const firstChoice = data.choices[0];
    if (!firstChoice) {
      throw new LLMError(`Invalid response from ${this.name}`, this.name);
    }

    let content = firstChoice.message.content;
    if (!content && firstChoice.message.reasoning_content) {
      this.providerLogger?.warn(
        { finishReason: firstChoice.finish_reason },
        'Using reasoning_content as fallback (content was empty)'
      );
      content = firstChoice.message.reasoning_content;
    }

    const result: CompletionResponse = {
      content,
      model: data.model,
    };

    const finishReason = this.mapFinishReason(firstChoice.finish_reason);
    if (finishReason) {
      result.finishReason = finishReason;
    }

    if (data.usage) {
      result.usage = {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      };
    }

    return result;
  }

  /**
   * Map finish reason to our format.
   */
  protected mapFinishReason(reason: string | null): CompletionResponse['finishReason'] {
    switch (reason) {
      case 'stop':
      case 'eos': // Some local models use this
        return 'stop';
      case 'length':
      case 'max_tokens':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return undefined;
    }
  }

  /**
   * Sleep for the specified duration.
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Factory function.
 */
export function createOpenAICompatibleProvider(
  config: OpenAICompatibleConfig,
  logger?: Logger
): OpenAICompatibleProvider {
  return new OpenAICompatibleProvider(config, logger);
}
