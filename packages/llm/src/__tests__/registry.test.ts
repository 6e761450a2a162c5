/**
 * Tests for the backend registry, alone and driving a synthesis run
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { synthesize } from '@chronicler/core';

import { UnknownBackendError } from '../errors.js';
import { BackendRegistry, createBackendRegistry } from '../registry/backend-registry.js';
import { OfflineBackend } from '../backends/offline-backend.js';

import { completion, MockAPIError, openaiMock, resetOpenAIMock } from './mocks/mock-openai.js';

vi.mock('openai', async () => (await import('./mocks/mock-openai.js')).createMockOpenAIModule());

describe('BackendRegistry', () => {
  beforeEach(() => {
    resetOpenAIMock();
  });

  it('should register the remote, local and offline backends', () => {
    const registry = createBackendRegistry({ remote: { apiKey: 'test-api-key' } });

    expect(registry.names).toEqual(['remote', 'local', 'offline']);
    expect(
      registry.names.map((name) => {
        const backend = registry.get(name);
        return [backend.maxTokensPerSegment, backend.timeoutMs, backend.metered];
      }),
    ).toEqual([
      [3000, 60_000, true],
      [2500, 180_000, false],
      [2000, 5000, false],
    ]);
  });

  it('should resolve a preference list in order without duplicates', () => {
    const registry = createBackendRegistry();

    const resolved = registry.resolve(['local', 'offline', 'local']);

    expect(resolved.map((backend) => backend.name)).toEqual(['local', 'offline']);
  });

  it('should name the available backends when one is unknown', () => {
    const registry = createBackendRegistry();

    expect(() => registry.resolve(['remote', 'cloud'])).toThrow(UnknownBackendError);
    expect(() => registry.get('cloud')).toThrow("Unknown backend 'cloud' (available: remote, local, offline)");
  });

  it('should honour a renamed backend', () => {
    const registry = createBackendRegistry({ offline: { name: 'templates' } });

    expect(registry.has('templates')).toBe(true);
    expect(registry.has('offline')).toBe(false);
  });

  it('should replace a backend registered under the same name', () => {
    const registry = new BackendRegistry([new OfflineBackend({ maxTokensPerSegment: 100 })]);
    registry.register(new OfflineBackend({ maxTokensPerSegment: 900 }));

    expect(registry.get('offline').maxTokensPerSegment).toBe(900);
  });

  it('should check only the named backends', async () => {
    const registry = createBackendRegistry();

    await expect(registry.healthCheck(['offline'])).resolves.toEqual([
      { name: 'offline', kind: 'offline', healthy: true, detail: 'template narration' },
    ]);
  });

  it('should fail over from a keyless remote backend to offline narration', async () => {
    const registry = createBackendRegistry();
    const onWarning = vi.fn();

    const result = await synthesize('Kael found a key.', registry.resolve(['remote', 'offline']), { onWarning });

    expect(result.success).toBe(true);
    expect(result.failoverEvents).toHaveLength(1);
    expect(result.failoverEvents[0]).toMatchObject({ segmentIndex: 0, from: 'remote', to: 'offline', reason: 'auth' });
    expect(result.narrations.map((narration) => narration.backend)).toEqual(['offline']);
    expect(result.storyText).toContain('Kael found a key.');
  });

  it('should give a reused registry a closed circuit after resetForNewRun', async () => {
    const registry = createBackendRegistry({
      remote: {
        apiKey: 'test-api-key',
        retry: { maxRetries: 0, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 1 },
        circuitBreaker: { failureThreshold: 1, successThreshold: 1, resetTimeoutMs: 60_000 },
      },
      onWarning: vi.fn(),
    });
    const onWarning = vi.fn();

    openaiMock.create.mockRejectedValueOnce(new MockAPIError(502, 'bad gateway'));
    const first = await synthesize('Kael found a key.', registry.resolve(['remote', 'offline']), { onWarning });
    expect(first.failoverEvents[0]).toMatchObject({ from: 'remote', to: 'offline' });
    await expect(registry.get('remote').healthCheck()).resolves.toMatchObject({ healthy: false });

    registry.resetForNewRun();
    openaiMock.create.mockResolvedValue(completion('Kael lifted the key from the altar.'));
    const second = await synthesize('Kael found a key.', registry.resolve(['remote', 'offline']), { onWarning });

    expect(second.failoverEvents).toEqual([]);
    expect(second.narrations.map((narration) => narration.backend)).toEqual(['remote']);
  });
});
