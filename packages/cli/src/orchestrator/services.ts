/**
 * Backend construction and health checking
 */

import {
  type BackendHealth,
  type BackendRegistry,
  type TokenQuotaAuthority,
  createBackendRegistry,
  createTokenQuota,
} from '@chronicler/llm';

import type { ChroniclerConfig } from '../config/schema.js';
import { createBackendError } from '../errors/index.js';

/**
 * Initialized services container
 */
export interface Services {
  registry: BackendRegistry;
  quota: TokenQuotaAuthority;
}

export interface ServiceCallbacks {
  /** Retry and circuit notices from model clients */
  onBackendNotice?: (message: string) => void;
  /** Quota refusals */
  onWarning?: (message: string) => void;
}

/**
 * Build the backend registry and quota authority from config
 */
export function initializeServices(config: ChroniclerConfig, callbacks: ServiceCallbacks = {}): Services {
  const { remote, local, offline } = config;

  const registry = createBackendRegistry({
    remote: {
      model: remote.model,
      temperature: remote.temperature,
      timeoutMs: remote.timeoutMs,
      maxTokensPerSegment: remote.maxTokensPerSegment,
      ...(remote.apiKey !== undefined ? { apiKey: remote.apiKey } : {}),
      ...(remote.baseUrl !== undefined ? { baseUrl: remote.baseUrl } : {}),
    },
    local: {
      baseUrl: local.baseUrl,
      model: local.model,
      temperature: local.temperature,
      timeoutMs: local.timeoutMs,
      maxTokensPerSegment: local.maxTokensPerSegment,
    },
    offline: {
      timeoutMs: offline.timeoutMs,
      maxTokensPerSegment: offline.maxTokensPerSegment,
    },
    ...(callbacks.onBackendNotice ? { onWarning: callbacks.onBackendNotice } : {}),
  });

  const quota = createTokenQuota({
    limits: remote.tokenQuota !== undefined ? { remote: remote.tokenQuota } : {},
    models: { remote: remote.model },
    ...(remote.maxCostUsd !== undefined ? { maxCostUsd: remote.maxCostUsd } : {}),
    ...(callbacks.onWarning ? { onWarning: callbacks.onWarning } : {}),
  });

  return { registry, quota };
}

/**
 * Check every backend on the preference list
 */
export async function performHealthChecks(
  config: ChroniclerConfig,
  services: Services,
  signal?: AbortSignal,
): Promise<BackendHealth[]> {
  return services.registry.healthCheck(config.pipeline.backends, signal);
}

/**
 * Fail before reading input when no listed backend can serve a call
 *
 * @throws BackendError naming the first backend on the list
 */
export function requireUsableBackend(health: readonly BackendHealth[]): void {
  if (health.some((backend) => backend.healthy)) {
    return;
  }
  const first = health[0];
  if (first) {
    throw createBackendError(first);
  }
}
