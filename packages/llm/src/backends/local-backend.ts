/**
 * Local backend: model served by an Ollama daemon
 */

import { ChatClient } from '../client/openai-client.js';
import { createLocalConfig } from '../config/llm-config.js';
import type { LocalBackendConfig } from '../config/llm-config.js';

import { ChatBackend } from './chat-backend.js';
import type { BackendHealth, BackendOptions } from './types.js';

/**
 * Ollama ignores the key, but the SDK requires one
 */
const PLACEHOLDER_API_KEY = 'ollama';

/**
 * Whether a served model tag satisfies the configured one
 * (`llama3.1` is served as `llama3.1:latest`)
 */
export function matchesModelTag(served: string, wanted: string): boolean {
  return served === wanted || (!wanted.includes(':') && served === `${wanted}:latest`);
}

export class LocalBackend extends ChatBackend {
  readonly kind = 'local' as const;
  readonly metered = false;
  readonly config: LocalBackendConfig;
  private readonly client: ChatClient;

  constructor(config: Partial<LocalBackendConfig> = {}, options: BackendOptions = {}) {
    const resolved = createLocalConfig(config);
    super(resolved);
    this.config = resolved;
    this.client = new ChatClient({
      apiKey: PLACEHOLDER_API_KEY,
      baseUrl: resolved.baseUrl,
      model: resolved.model,
      temperature: resolved.temperature,
      timeoutMs: resolved.timeoutMs,
      retry: resolved.retry,
      circuitBreaker: resolved.circuitBreaker,
      ...(options.onWarning ? { onWarning: options.onWarning } : {}),
    });
  }

  protected getClient(): ChatClient {
    return this.client;
  }

  resetForNewRun(): void {
    this.client.resetForNewRun();
  }

  /**
   * Healthy when the daemon answers and serves the configured model
   */
  async healthCheck(signal?: AbortSignal): Promise<BackendHealth> {
    try {
      const models = await this.client.listModels(signal);
      const found = models.some((id) => matchesModelTag(id, this.config.model));
      return {
        name: this.name,
        kind: this.kind,
        healthy: found,
        detail: found
          ? `${this.config.baseUrl} serves ${this.config.model}`
          : `${this.config.baseUrl} does not serve ${this.config.model} (pull it with: ollama pull ${this.config.model})`,
      };
    } catch (error) {
      return {
        name: this.name,
        kind: this.kind,
        healthy: false,
        detail: `${this.config.baseUrl} unreachable: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}
