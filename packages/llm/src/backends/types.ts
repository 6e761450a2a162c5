/**
 * Types shared by the generation backends
 */

import type { BackendKind, GenerationBackend } from '@chronicler/core';

/**
 * Result of a backend health check
 */
export interface BackendHealth {
  name: string;
  kind: BackendKind;
  healthy: boolean;
  /** Human-readable reason, e.g. the missing model or the connection error */
  detail: string;
}

/**
 * Backend that can report whether it is ready to take calls
 */
export interface CheckableBackend extends GenerationBackend {
  healthCheck(signal?: AbortSignal): Promise<BackendHealth>;
  /** Drop per-run client state (circuit, usage) so a reused backend starts clean */
  resetForNewRun(): void;
}

/**
 * Options every backend constructor accepts
 */
export interface BackendOptions {
  /** Retry and circuit notices from the underlying client (default: console.warn) */
  onWarning?: (message: string) => void;
}
