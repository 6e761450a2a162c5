/**
 * OpenAI-compatible chat client with retry and circuit breaker
 *
 * Used for both the hosted API and a local Ollama daemon, which speaks
 * the same protocol under a different base URL.
 */

import OpenAI, { APIConnectionTimeoutError, APIError as OpenAIAPIError, APIUserAbortError } from 'openai';

import type { CircuitBreakerConfig, RetryConfig } from '../config/llm-config.js';
import {
  AbortedError,
  APIError,
  AuthenticationError,
  LLMError,
  LLMErrorCode,
  QuotaExhaustedError,
  RateLimitError,
  TimeoutError,
} from '../errors.js';

import { CircuitBreaker } from './circuit-breaker.js';
import type { ChatRequest, ChatResponse, CircuitState, HealthStatus, TokenUsage } from './types.js';

/**
 * Chat client configuration
 */
export interface ChatClientConfig {
  apiKey: string;
  /** Alternative API base URL */
  baseUrl?: string;
  model: string;
  temperature: number;
  /** Per-request timeout handed to the SDK */
  timeoutMs: number;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
  /** Retry and circuit notices (default: console.warn) */
  onWarning?: (message: string) => void;
}

/**
 * Sleep that ends early, rejecting, when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError('retry'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError('retry'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Add jitter to a delay (±25%)
 */
function addJitter(delayMs: number): number {
  const jitter = delayMs * 0.25 * (Math.random() * 2 - 1);
  return Math.round(delayMs + jitter);
}

/**
 * Chat client with retry logic, circuit breaker, and token accounting
 */
export class ChatClient {
  private readonly client: OpenAI;
  private readonly config: ChatClientConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  private lastError: string | undefined;

  constructor(config: ChatClientConfig) {
    this.config = config;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      // Retries are ours, so they can honour the caller's signal
      maxRetries: 0,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
    this.circuitBreaker = new CircuitBreaker(config.circuitBreaker, (state, previous) => {
      this.warn(`Circuit for ${config.model} moved from ${previous} to ${state}`);
    });
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Send a chat completion request with retry logic
   */
  async chat(request: ChatRequest): Promise<ChatResponse> {
    return this.circuitBreaker.execute(() => this.withRetry(() => this.doChat(request), request.signal));
  }

  /**
   * Ids of the models the endpoint serves
   */
  async listModels(signal?: AbortSignal): Promise<string[]> {
    try {
      const ids: string[] = [];
      for await (const model of this.client.models.list(signal ? { signal } : undefined)) {
        ids.push(model.id);
      }
      return ids;
    } catch (error) {
      throw this.mapError(error);
    }
  }

  getHealthStatus(): HealthStatus {
    return {
      healthy: this.circuitBreaker.getState() !== 'open',
      circuitState: this.circuitBreaker.getState(),
      tokensUsed: this.usage.totalTokens,
      consecutiveFailures: this.circuitBreaker.getFailureCount(),
      lastError: this.lastError,
    };
  }

  /**
   * Tokens used by this client so far
   */
  getTokenUsage(): TokenUsage {
    return { ...this.usage };
  }

  /**
   * Clear token usage, the last error and the circuit before a new run
   */
  resetForNewRun(): void {
    this.usage.promptTokens = 0;
    this.usage.completionTokens = 0;
    this.usage.totalTokens = 0;
    this.lastError = undefined;
    this.circuitBreaker.reset();
  }

  getCircuitState(): CircuitState {
    return this.circuitBreaker.getState();
  }

  private async doChat(request: ChatRequest): Promise<ChatResponse> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: request.messages,
          temperature: request.temperature ?? this.config.temperature,
          ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
        },
        request.signal ? { signal: request.signal } : undefined,
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new LLMError('No response from model', LLMErrorCode.INVALID_RESPONSE, false);
      }

      const usage: TokenUsage = {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      };
      this.usage.promptTokens += usage.promptTokens;
      this.usage.completionTokens += usage.completionTokens;
      this.usage.totalTokens += usage.totalTokens;

      return {
        content: choice.message.content ?? '',
        finishReason: this.mapFinishReason(choice.finish_reason),
        usage,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private async withRetry<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const config = this.config.retry;
    let delay = config.initialDelayMs;

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const failure = error instanceof LLMError ? error : this.mapError(error);
        this.lastError = failure.message;

        if (!failure.retryable || signal?.aborted || attempt >= config.maxRetries) {
          throw failure;
        }

        // Honour retry-after, but never wait less than the normal backoff
        const wait = failure instanceof RateLimitError ? Math.max(delay, failure.retryAfterMs) : delay;
        const waitWithJitter = addJitter(wait);
        this.warn(
          `${failure.message} (attempt ${attempt + 1}/${config.maxRetries + 1}), retrying in ${waitWithJitter}ms`,
        );
        await sleep(waitWithJitter, signal);
        delay = Math.min(delay * config.backoffMultiplier, config.maxDelayMs);
      }
    }
  }

  private mapError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    // Both are APIError subclasses in the SDK, so check them first
    if (error instanceof APIUserAbortError) {
      return new AbortedError('chat');
    }
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError('chat', this.config.timeoutMs, error);
    }

    if (error instanceof OpenAIAPIError) {
      if (error.status === 401 || error.status === 403) {
        return new AuthenticationError(error.status, error.message, error);
      }

      if (error.status === 429) {
        if (error.code === 'insufficient_quota') {
          return new QuotaExhaustedError(error.message, error);
        }
        return new RateLimitError(this.parseRetryAfter(error.headers), error);
      }

      if (error.status === 408) {
        return new TimeoutError('chat', this.config.timeoutMs, error);
      }

      return new APIError(error.message, error.status, error);
    }

    return new LLMError(
      error instanceof Error ? error.message : String(error),
      LLMErrorCode.API_ERROR,
      true,
      error instanceof Error ? error : undefined,
    );
  }

  private parseRetryAfter(headers: Record<string, string | null | undefined> | undefined): number {
    const retryAfter = headers?.['retry-after'];
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    return this.config.retry.initialDelayMs;
  }

  private mapFinishReason(reason: string | null): ChatResponse['finishReason'] {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }

  private warn(message: string): void {
    (this.config.onWarning ?? console.warn)(message);
  }
}
