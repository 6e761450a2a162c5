/**
 * @chronicler/llm - Generation backends for story synthesis
 *
 * This package provides the backends the narrator calls for each segment:
 * - Remote: hosted model over the OpenAI chat completions API (metered)
 * - Local: model served by an Ollama daemon
 * - Offline: deterministic template narration
 *
 * It also holds the OpenAI-compatible client with retry logic and circuit
 * breaker, the narration prompts, the backend registry and an in-process
 * token quota authority with model pricing.
 */

// Errors
export {
  LLMError,
  LLMErrorCode,
  RateLimitError,
  QuotaExhaustedError,
  AuthenticationError,
  TimeoutError,
  AbortedError,
  CircuitOpenError,
  APIError,
  UnknownBackendError,
} from './errors.js';

// Configuration
export {
  DEFAULT_RETRY_CONFIG,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_REMOTE_CONFIG,
  DEFAULT_LOCAL_CONFIG,
  DEFAULT_OFFLINE_CONFIG,
  createRemoteConfig,
  createLocalConfig,
  createOfflineConfig,
  type RetryConfig,
  type CircuitBreakerConfig,
  type BackendLimits,
  type RemoteBackendConfig,
  type LocalBackendConfig,
  type OfflineBackendConfig,
} from './config/llm-config.js';

// Client
export { ChatClient, type ChatClientConfig } from './client/openai-client.js';
export { CircuitBreaker, type CircuitListener } from './client/circuit-breaker.js';
export type {
  ChatMessage,
  ChatRequest,
  ChatResponse,
  TokenUsage,
  CircuitState,
  HealthStatus,
} from './client/types.js';

// Prompts
export { SESSION_NARRATOR_SYSTEM, STYLE_GUIDANCE } from './prompts/system-prompts.js';
export { buildNarrationPrompt, buildNarrationMessages, formatCampaign } from './prompts/templates.js';

// Backends
export { ChatBackend, type ChatBackendSettings } from './backends/chat-backend.js';
export { RemoteBackend } from './backends/remote-backend.js';
export { LocalBackend, matchesModelTag } from './backends/local-backend.js';
export { OfflineBackend } from './backends/offline-backend.js';
export { toBackendError } from './backends/translate-error.js';
export type { BackendHealth, BackendOptions, CheckableBackend } from './backends/types.js';

// Registry
export {
  BackendRegistry,
  createBackendRegistry,
  type BackendRegistryConfig,
} from './registry/backend-registry.js';

// Quota and pricing
export {
  TokenQuotaAuthority,
  createTokenQuota,
  OUTPUT_SHARE,
  type TokenQuotaConfig,
  type QuotaLedgerEntry,
} from './quota/token-quota.js';
export {
  MODEL_PRICING,
  DEFAULT_PRICING,
  getModelPricing,
  calculateCost,
  formatCost,
  type ModelPricing,
} from './cost/pricing.js';
