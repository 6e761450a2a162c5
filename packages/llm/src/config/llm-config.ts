/**
 * Configuration types and defaults for generation backends
 */

/**
 * Retry configuration for API calls
 */
export interface RetryConfig {
  /** Maximum number of retries (default: 2) */
  maxRetries: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier: number;
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  /** Number of failures before opening circuit (default: 5) */
  failureThreshold: number;
  /** Number of successes in half-open state before closing (default: 2) */
  successThreshold: number;
  /** Time in open state before transitioning to half-open (default: 30000ms) */
  resetTimeoutMs: number;
}

/**
 * Settings shared by every backend
 */
export interface BackendLimits {
  /** Name used in preference lists, failover events and the quota ledger */
  name: string;
  /** Largest segment (estimated tokens) the backend accepts */
  maxTokensPerSegment: number;
  /** Per-call timeout enforced by the narrator */
  timeoutMs: number;
}

/**
 * Hosted model behind an OpenAI-compatible API
 */
export interface RemoteBackendConfig extends BackendLimits {
  /** API key; without one every call fails with reason 'auth' */
  apiKey?: string;
  /** Alternative API base URL */
  baseUrl?: string;
  /** Model to use (default: 'gpt-4o-mini') */
  model: string;
  /** Temperature for generation (default: 0.7) */
  temperature: number;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
}

/**
 * Model served by a local Ollama daemon
 */
export interface LocalBackendConfig extends BackendLimits {
  /** OpenAI-compatible endpoint of the daemon (default: http://localhost:11434/v1) */
  baseUrl: string;
  /** Model tag (default: 'llama3.1') */
  model: string;
  temperature: number;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
}

/**
 * Template narration, no model
 */
export type OfflineBackendConfig = BackendLimits;

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
};

/**
 * Default circuit breaker configuration
 */
export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeoutMs: 30000,
};

export const DEFAULT_REMOTE_CONFIG: RemoteBackendConfig = {
  name: 'remote',
  model: 'gpt-4o-mini',
  temperature: 0.7,
  timeoutMs: 60000,
  maxTokensPerSegment: 3000,
  retry: DEFAULT_RETRY_CONFIG,
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
};

export const DEFAULT_LOCAL_CONFIG: LocalBackendConfig = {
  name: 'local',
  baseUrl: 'http://localhost:11434/v1',
  model: 'llama3.1',
  temperature: 0.7,
  timeoutMs: 180000,
  maxTokensPerSegment: 2500,
  // A local daemon that fails once is usually down
  retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: 1 },
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
};

export const DEFAULT_OFFLINE_CONFIG: OfflineBackendConfig = {
  name: 'offline',
  timeoutMs: 5000,
  maxTokensPerSegment: 2000,
};

/**
 * Full remote config with defaults for unspecified values
 */
export function createRemoteConfig(partial: Partial<RemoteBackendConfig> = {}): RemoteBackendConfig {
  return {
    ...DEFAULT_REMOTE_CONFIG,
    ...partial,
    retry: { ...DEFAULT_REMOTE_CONFIG.retry, ...partial.retry },
    circuitBreaker: { ...DEFAULT_REMOTE_CONFIG.circuitBreaker, ...partial.circuitBreaker },
  };
}

/**
 * Full local config with defaults for unspecified values
 */
export function createLocalConfig(partial: Partial<LocalBackendConfig> = {}): LocalBackendConfig {
  return {
    ...DEFAULT_LOCAL_CONFIG,
    ...partial,
    retry: { ...DEFAULT_LOCAL_CONFIG.retry, ...partial.retry },
    circuitBreaker: { ...DEFAULT_LOCAL_CONFIG.circuitBreaker, ...partial.circuitBreaker },
  };
}

export function createOfflineConfig(partial: Partial<OfflineBackendConfig> = {}): OfflineBackendConfig {
  return { ...DEFAULT_OFFLINE_CONFIG, ...partial };
}
