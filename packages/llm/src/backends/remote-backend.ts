/**
 * Remote backend: hosted model through the OpenAI chat completions API
 */

import { BackendUnavailableError } from '@chronicler/core';

import { ChatClient } from '../client/openai-client.js';
import { createRemoteConfig } from '../config/llm-config.js';
import type { RemoteBackendConfig } from '../config/llm-config.js';

import { ChatBackend } from './chat-backend.js';
import type { BackendHealth, BackendOptions } from './types.js';

/**
 * Metered hosted model. Without an API key every call fails with reason 'auth'.
 */
export class RemoteBackend extends ChatBackend {
  readonly kind = 'remote' as const;
  readonly metered = true;
  readonly config: RemoteBackendConfig;
  private readonly client: ChatClient | undefined;

  constructor(config: Partial<RemoteBackendConfig> = {}, options: BackendOptions = {}) {
    const resolved = createRemoteConfig(config);
    super(resolved);
    this.config = resolved;

    if (resolved.apiKey) {
      this.client = new ChatClient({
        apiKey: resolved.apiKey,
        model: resolved.model,
        temperature: resolved.temperature,
        timeoutMs: resolved.timeoutMs,
        retry: resolved.retry,
        circuitBreaker: resolved.circuitBreaker,
        ...(resolved.baseUrl ? { baseUrl: resolved.baseUrl } : {}),
        ...(options.onWarning ? { onWarning: options.onWarning } : {}),
      });
    }
  }

  protected getClient(): ChatClient {
    if (!this.client) {
      throw new BackendUnavailableError(this.name, 'auth', 'no API key configured');
    }
    return this.client;
  }

  resetForNewRun(): void {
    this.client?.resetForNewRun();
  }

  async healthCheck(signal?: AbortSignal): Promise<BackendHealth> {
    if (!this.client) {
      return { name: this.name, kind: this.kind, healthy: false, detail: 'no API key configured' };
    }

    const status = this.client.getHealthStatus();
    if (!status.healthy) {
      return {
        name: this.name,
        kind: this.kind,
        healthy: false,
        detail: `circuit ${status.circuitState}: ${status.lastError ?? 'repeated failures'}`,
      };
    }

    try {
      const models = await this.client.listModels(signal);
      const available = models.includes(this.config.model);
      return {
        name: this.name,
        kind: this.kind,
        healthy: available,
        detail: available ? `model ${this.config.model} available` : `model ${this.config.model} not offered`,
      };
    } catch (error) {
      return {
        name: this.name,
        kind: this.kind,
        healthy: false,
        detail: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
