/**
 * Mock generation backends for testing
 */

import {
  BackendQuotaExceededError,
  BackendUnavailableError,
} from '@chronicler/core';
import type {
  BackendFailureReason,
  BackendKind,
  ContextDigest,
  GenerationBackend,
  NarrateOptions,
  StyleHint,
} from '@chronicler/core';
import { vi } from 'vitest';

/**
 * One recorded narrate() call
 */
export interface RecordedCall {
  /** 1-based call number on this backend */
  call: number;
  segmentText: string;
  context: ContextDigest;
  style: StyleHint;
}

export interface MockBackendConfig {
  name?: string;
  kind?: BackendKind;
  maxTokensPerSegment?: number;
  timeoutMs?: number;
  metered?: boolean;
  /** 1-based call numbers that fail */
  failOnCalls?: number[];
  /** Fail every call */
  shouldFail?: boolean;
  /** How failing calls fail */
  failureReason?: BackendFailureReason | 'quota';
  /** Simulate latency in milliseconds (aborted by the call's signal) */
  latencyMs?: number;
  /** Narration text; defaults to echoing the segment */
  respond?: (segmentText: string, context: ContextDigest, style: StyleHint, call: number) => string;
}

/**
 * Create a scriptable mock backend
 *
 * `calls` lists every narrate() call in order, failed ones included.
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockBackend(config: MockBackendConfig = {}) {
  const {
    name = 'mock',
    kind = 'offline',
    maxTokensPerSegment = 3000,
    timeoutMs = 5000,
    metered = false,
    failOnCalls = [],
    shouldFail = false,
    failureReason = 'unavailable',
    latencyMs = 0,
    respond = (segmentText: string): string => segmentText,
  } = config;

  const calls: RecordedCall[] = [];

  const narrate = vi.fn(
    async (
      segmentText: string,
      context: ContextDigest,
      style: StyleHint,
      options?: NarrateOptions,
    ): Promise<string> => {
      const call = calls.length + 1;
      calls.push({ call, segmentText, context, style });

      if (latencyMs > 0) {
        await sleep(latencyMs, options?.signal);
      }

      if (shouldFail || failOnCalls.includes(call)) {
        if (failureReason === 'quota') {
          throw new BackendQuotaExceededError(name, 0);
        }
        throw new BackendUnavailableError(name, failureReason, `scripted failure on call ${call}`);
      }

      return respond(segmentText, context, style, call);
    },
  );

  const backend = { name, kind, maxTokensPerSegment, timeoutMs, metered, narrate, calls };
  return backend satisfies GenerationBackend;
}

export type MockBackend = ReturnType<typeof createMockBackend>;

/**
 * Backend that returns each segment verbatim
 */
export function createEchoBackend(
  name = 'echo',
  overrides: Omit<MockBackendConfig, 'name' | 'respond'> = {},
): MockBackend {
  return createMockBackend({ ...overrides, name });
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true },
    );
  });
}
