/**
 * Types for chat client operations
 */

/**
 * Chat message
 */
export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

/**
 * Request to the model
 */
export interface ChatRequest {
  /** Messages in the conversation */
  messages: ChatMessage[];
  /** Override temperature for this request */
  temperature?: number;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Aborts the request and any pending retry */
  signal?: AbortSignal;
}

/**
 * Response from the model
 */
export interface ChatResponse {
  /** Generated content */
  content: string;
  finishReason: 'stop' | 'length' | 'content_filter';
  usage: TokenUsage;
}

/**
 * Token usage statistics
 */
export interface TokenUsage {
  /** Tokens in the prompt */
  promptTokens: number;
  /** Tokens in the completion */
  completionTokens: number;
  /** Total tokens used */
  totalTokens: number;
}

/**
 * Circuit breaker state
 */
export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Health status of a chat client
 */
export interface HealthStatus {
  /** Is the service healthy? */
  healthy: boolean;
  /** Circuit breaker state */
  circuitState: CircuitState;
  /** Tokens used by this client so far */
  tokensUsed: number;
  /** Number of consecutive failures */
  consecutiveFailures: number;
  /** Last error message if any */
  lastError: string | undefined;
}
