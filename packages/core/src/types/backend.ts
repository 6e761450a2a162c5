/**
 * Generation backend contract
 *
 * Implemented by the remote, local and offline backends in @chronicler/llm.
 * Backends are selected by configuration and passed in preference order;
 * the pipeline never inspects their concrete type.
 */

import type { ContextDigest, StyleHint } from './narration.js';

/**
 * Where a backend runs
 */
export type BackendKind = 'remote' | 'local' | 'offline';

/**
 * Per-call options
 */
export interface NarrateOptions {
  /** Aborted when the call times out */
  signal?: AbortSignal;
}

/**
 * Turns a segment plus context into narration text
 */
export interface GenerationBackend {
  readonly name: string;
  readonly kind: BackendKind;
  /** Largest segment (in estimated tokens) this backend accepts */
  readonly maxTokensPerSegment: number;
  /** Per-call timeout enforced by the narrator */
  readonly timeoutMs: number;
  /** Metered backends are cleared with the quota authority before each call */
  readonly metered: boolean;

  /**
   * Narrate one segment.
   * Failures must surface as BackendUnavailableError or BackendQuotaExceededError;
   * anything else is treated as unavailable.
   */
  narrate(
    segmentText: string,
    context: ContextDigest,
    style: StyleHint,
    options?: NarrateOptions,
  ): Promise<string>;
}

/**
 * External cost/quota authority consulted before metered calls
 */
export interface QuotaAuthority {
  estimateAndReserve(backendName: string, estimatedTokens: number): boolean | Promise<boolean>;
}
