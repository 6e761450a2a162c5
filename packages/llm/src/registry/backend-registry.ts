/**
 * Backend registry
 *
 * Built once from configuration and handed to the pipeline. Holds every
 * configured backend by name; a run asks for its preference list with
 * resolve(). Backends keep client state (circuit, usage) between runs
 * until resetForNewRun() is called.
 */

import type { GenerationBackend } from '@chronicler/core';

import { LocalBackend } from '../backends/local-backend.js';
import { OfflineBackend } from '../backends/offline-backend.js';
import { RemoteBackend } from '../backends/remote-backend.js';
import type { BackendHealth, CheckableBackend } from '../backends/types.js';
import type { LocalBackendConfig, OfflineBackendConfig, RemoteBackendConfig } from '../config/llm-config.js';
import { UnknownBackendError } from '../errors.js';

/**
 * Per-backend overrides; every backend is registered, with defaults where nothing is given
 */
export interface BackendRegistryConfig {
  remote?: Partial<RemoteBackendConfig>;
  local?: Partial<LocalBackendConfig>;
  offline?: Partial<OfflineBackendConfig>;
  /** Retry and circuit notices from model clients (default: console.warn) */
  onWarning?: (message: string) => void;
}

export class BackendRegistry {
  private readonly backends = new Map<string, CheckableBackend>();

  constructor(backends: readonly CheckableBackend[] = []) {
    for (const backend of backends) {
      this.register(backend);
    }
  }

  /**
   * Add a backend under its name, replacing any previous one
   */
  register(backend: CheckableBackend): void {
    this.backends.set(backend.name, backend);
  }

  get names(): string[] {
    return [...this.backends.keys()];
  }

  has(name: string): boolean {
    return this.backends.has(name);
  }

  /**
   * @throws UnknownBackendError
   */
  get(name: string): CheckableBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new UnknownBackendError(name, this.names);
    }
    return backend;
  }

  /**
   * Backends in preference order, duplicates dropped
   *
   * @throws UnknownBackendError on the first unknown name
   */
  resolve(names: readonly string[]): GenerationBackend[] {
    const seen = new Set<string>();
    const resolved: GenerationBackend[] = [];
    for (const name of names) {
      if (seen.has(name)) continue;
      seen.add(name);
      resolved.push(this.get(name));
    }
    return resolved;
  }

  /**
   * Start every backend from a closed circuit and zero usage
   */
  resetForNewRun(): void {
    for (const backend of this.backends.values()) {
      backend.resetForNewRun();
    }
  }

  /**
   * Health of the named backends (all of them by default), checked concurrently
   */
  async healthCheck(names: readonly string[] = this.names, signal?: AbortSignal): Promise<BackendHealth[]> {
    const backends = names.map((name) => this.get(name));
    return Promise.all(backends.map((backend) => backend.healthCheck(signal)));
  }
}

/**
 * Registry holding the remote, local and offline backends
 */
export function createBackendRegistry(config: BackendRegistryConfig = {}): BackendRegistry {
  const options = config.onWarning ? { onWarning: config.onWarning } : {};
  return new BackendRegistry([
    new RemoteBackend(config.remote, options),
    new LocalBackend(config.local, options),
    new OfflineBackend(config.offline),
  ]);
}
