/**
 * Error classes for model client operations
 *
 * These stay inside the llm package. Backends translate them into the
 * core taxonomy (BackendUnavailableError, BackendQuotaExceededError)
 * before they reach the narrator.
 */

/**
 * Error codes for model client operations
 */
export enum LLMErrorCode {
  /** API rate limit exceeded */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Account has no quota left */
  QUOTA_EXHAUSTED = 'QUOTA_EXHAUSTED',
  /** Missing, wrong or unauthorized API key */
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  /** Response had no usable content */
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  /** General API error */
  API_ERROR = 'API_ERROR',
  /** Request timed out */
  TIMEOUT = 'TIMEOUT',
  /** Caller aborted the request */
  ABORTED = 'ABORTED',
  /** Circuit breaker is open */
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  /** Backend name not present in the registry */
  UNKNOWN_BACKEND = 'UNKNOWN_BACKEND',
}

/**
 * Base error class for model client operations
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly code: LLMErrorCode,
    public readonly retryable: boolean,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LLMError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }
}

/**
 * Error thrown when API rate limit is exceeded
 */
export class RateLimitError extends LLMError {
  constructor(
    public readonly retryAfterMs: number,
    cause?: Error,
  ) {
    super(`Rate limited, retry after ${retryAfterMs}ms`, LLMErrorCode.RATE_LIMITED, true, cause);
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when the provider reports the account out of quota
 */
export class QuotaExhaustedError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, LLMErrorCode.QUOTA_EXHAUSTED, false, cause);
    this.name = 'QuotaExhaustedError';
  }
}

/**
 * Error thrown on 401/403
 */
export class AuthenticationError extends LLMError {
  constructor(
    public readonly statusCode: number,
    message: string,
    cause?: Error,
  ) {
    super(message, LLMErrorCode.AUTHENTICATION_FAILED, false, cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when API request times out
 */
export class TimeoutError extends LLMError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, LLMErrorCode.TIMEOUT, true, cause);
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when the caller's signal aborted the request
 */
export class AbortedError extends LLMError {
  constructor(public readonly operation: string) {
    super(`Operation '${operation}' was aborted`, LLMErrorCode.ABORTED, false);
    this.name = 'AbortedError';
  }
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitOpenError extends LLMError {
  constructor(
    public readonly openedAt: Date,
    public readonly resetAfterMs: number,
  ) {
    super(
      `Circuit breaker is open since ${openedAt.toISOString()}, reset in ${resetAfterMs}ms`,
      LLMErrorCode.CIRCUIT_OPEN,
      false,
    );
    this.name = 'CircuitOpenError';
  }
}

/**
 * Error thrown for general API errors
 */
export class APIError extends LLMError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, LLMErrorCode.API_ERROR, statusCode === undefined || statusCode >= 500, cause);
    this.name = 'APIError';
  }
}

/**
 * Error thrown when a configured backend name is not registered
 */
export class UnknownBackendError extends LLMError {
  constructor(
    public readonly backendName: string,
    public readonly available: readonly string[],
  ) {
    super(
      `Unknown backend '${backendName}' (available: ${available.join(', ') || 'none'})`,
      LLMErrorCode.UNKNOWN_BACKEND,
      false,
    );
    this.name = 'UnknownBackendError';
  }
}
