/**
 * Segment Narrator
 *
 * Drives segments through extraction, memory and the active backend,
 * strictly in index order. On a backend failure the run moves to the next
 * backend in the preference list for the rest of the run and retries the
 * same segment.
 */

import {
  AllBackendsExhaustedError,
  BackendQuotaExceededError,
  BackendUnavailableError,
} from '../errors.js';
import { extractElements } from '../extraction/element-extractor.js';
import type { SessionMemory } from '../memory/session-memory.js';
import { DEFAULT_CHARS_PER_TOKEN, estimateTokens } from '../segmentation/token-estimator.js';
import type { GenerationBackend, QuotaAuthority } from '../types/backend.js';
import type {
  CampaignContext,
  FailoverEvent,
  FailoverReason,
  SegmentNarration,
  StyleHint,
} from '../types/narration.js';
import type { Segment, TokenEstimator } from '../types/transcript.js';

import type { RunState, RunStateMachine } from './run-state.js';
import { callWithTimeout } from './timeout.js';

/**
 * Default share of a backend's budget given to the context digest
 */
export const DEFAULT_CONTEXT_SHARE = 0.15;

/**
 * Progress notification
 */
export interface RunProgress {
  state: RunState;
  /** Segment being worked on (0-based), or the count done when finished */
  segmentIndex: number;
  totalSegments: number;
  /** Active backend, when narrating */
  backend?: string;
}

export type ProgressCallback = (progress: RunProgress) => void;

export type WarningCallback = (message: string) => void;

/**
 * Narrator options
 */
export interface NarratorOptions {
  stateMachine: RunStateMachine;
  quota?: QuotaAuthority;
  signal?: AbortSignal;
  campaign?: CampaignContext;
  /** Share of the active backend's budget used for the digest (default: 0.15) */
  contextShare?: number;
  estimator?: TokenEstimator;
  onProgress?: ProgressCallback;
  onWarning?: WarningCallback;
}

/**
 * How the narration loop ended
 */
export type NarrationOutcome = 'complete' | 'exhausted' | 'cancelled';

/**
 * Output of the narration loop
 */
export interface NarrationRun {
  outcome: NarrationOutcome;
  /** Successful narrations, gap-free from segment 0 */
  narrations: SegmentNarration[];
  /** Failed record for the segment every backend gave up on */
  failedNarration?: SegmentNarration;
  failoverEvents: FailoverEvent[];
  failureMessage?: string;
}

/**
 * Style hint for a segment position
 */
export function styleForPosition(index: number, total: number): StyleHint {
  if (index === 0) return 'opening';
  if (index === total - 1) return 'closing';
  return 'middle';
}

/**
 * Sequential narrator for one run
 */
export class SegmentNarrator {
  private readonly backends: readonly GenerationBackend[];
  private readonly memory: SessionMemory;
  private readonly options: NarratorOptions;
  private readonly estimate: TokenEstimator;
  private active = 0;

  constructor(backends: readonly GenerationBackend[], memory: SessionMemory, options: NarratorOptions) {
    this.backends = backends;
    this.memory = memory;
    this.options = options;
    this.estimate = options.estimator ?? estimateTokens;
  }

  /**
   * Name of the backend currently in use
   */
  get activeBackend(): string | undefined {
    return this.backends[this.active]?.name;
  }

  /**
   * Narrate every segment in order
   */
  async narrateAll(segments: readonly Segment[]): Promise<NarrationRun> {
    const { stateMachine, signal } = this.options;
    const total = segments.length;
    const narrations: SegmentNarration[] = [];
    const failoverEvents: FailoverEvent[] = [];

    if (this.backends.length === 0) {
      stateMachine.transition('failed');
      return {
        outcome: 'exhausted',
        narrations,
        failoverEvents,
        failureMessage: new AllBackendsExhaustedError(0, []).message,
      };
    }

    // Extraction reads only the segment itself, so it can run ahead of narration
    const extractions = segments.map((segment) => extractElements(segment.content, segment.index));

    for (const segment of segments) {
      if (signal?.aborted) {
        stateMachine.transition('cancelled');
        return { outcome: 'cancelled', narrations, failoverEvents };
      }

      const elements = extractions[segment.index];
      if (elements) {
        for (const warning of elements.warnings) this.warn(warning);
        this.memory.register(elements);
      }

      const style = styleForPosition(segment.index, total);
      const segmentStarted = Date.now();
      const attempted: string[] = [];

      for (;;) {
        const backend = this.backends[this.active];
        if (!backend) {
          const error = new AllBackendsExhaustedError(segment.index, attempted);
          stateMachine.transition('failed');
          return {
            outcome: 'exhausted',
            narrations,
            failedNarration: Object.freeze({
              segmentIndex: segment.index,
              text: '',
              backend: attempted[attempted.length - 1] ?? '',
              success: false,
              elapsedMs: Date.now() - segmentStarted,
              error: error.message,
            }),
            failoverEvents,
            failureMessage: error.message,
          };
        }

        attempted.push(backend.name);
        this.report(segment.index, total, backend.name);

        try {
          const text = await this.callBackend(backend, segment, style, total);
          const narration: SegmentNarration = Object.freeze({
            segmentIndex: segment.index,
            text,
            backend: backend.name,
            success: true,
            elapsedMs: Date.now() - segmentStarted,
          });
          narrations.push(narration);
          this.memory.recordNarration(segment.index, text);
          break;
        } catch (error) {
          const { reason, message } = describeFailure(error);
          const next = this.backends[this.active + 1];

          stateMachine.transition('failover');
          const event: FailoverEvent = {
            segmentIndex: segment.index,
            from: backend.name,
            reason,
            message,
            at: new Date().toISOString(),
            ...(next ? { to: next.name } : {}),
          };
          failoverEvents.push(Object.freeze(event));

          this.warn(
            `Backend '${backend.name}' failed on segment ${segment.index} (${reason}): ${message}` +
              (next ? `; switching to '${next.name}'` : ''),
          );

          this.active++;
          if (next) {
            stateMachine.transition('narrating');
          }
        }
      }
    }

    this.report(total, total, this.activeBackend);
    return { outcome: 'complete', narrations, failoverEvents };
  }

  /** Character density of the active estimator, measured on the segment text */
  private charsPerToken(segment: Segment): number {
    const tokens = this.estimate(segment.content);
    return tokens > 0 ? segment.content.length / tokens : DEFAULT_CHARS_PER_TOKEN;
  }

  private async callBackend(
    backend: GenerationBackend,
    segment: Segment,
    style: StyleHint,
    total: number,
  ): Promise<string> {
    const contextShare = this.options.contextShare ?? DEFAULT_CONTEXT_SHARE;
    const digestChars = Math.floor(backend.maxTokensPerSegment * contextShare * this.charsPerToken(segment));
    const digest = this.memory.snapshotContext(digestChars, {
      segmentIndex: segment.index,
      totalSegments: total,
      ...(this.options.campaign ? { campaign: this.options.campaign } : {}),
    });

    const { quota } = this.options;
    if (backend.metered && quota) {
      // Input plus an expected output about as long as the segment
      const estimated = segment.estimatedTokens + this.estimate(digest.text) + segment.estimatedTokens;
      let allowed: boolean;
      try {
        allowed = await quota.estimateAndReserve(backend.name, estimated);
      } catch (error) {
        throw new BackendQuotaExceededError(backend.name, estimated, error instanceof Error ? error : undefined);
      }
      if (!allowed) {
        throw new BackendQuotaExceededError(backend.name, estimated);
      }
    }

    const text = await callWithTimeout(
      (signal) => backend.narrate(segment.content, digest, style, { signal }),
      backend.timeoutMs,
      () => new BackendUnavailableError(backend.name, 'timeout', `no response within ${backend.timeoutMs}ms`),
    );

    if (!text.trim()) {
      throw new BackendUnavailableError(backend.name, 'invalid_response', 'empty narration');
    }
    return text.trim();
  }

  private report(segmentIndex: number, totalSegments: number, backend: string | undefined): void {
    if (this.options.onProgress) {
      this.options.onProgress({
        state: this.options.stateMachine.state,
        segmentIndex,
        totalSegments,
        ...(backend !== undefined ? { backend } : {}),
      });
    }
  }

  private warn(message: string): void {
    (this.options.onWarning ?? console.warn)(message);
  }
}

/**
 * Failover reason and message for any thrown value. Unknown errors count as unavailable.
 */
export function describeFailure(error: unknown): { reason: FailoverReason; message: string } {
  if (error instanceof BackendQuotaExceededError) {
    return { reason: 'quota', message: error.message };
  }
  if (error instanceof BackendUnavailableError) {
    return { reason: error.reason, message: error.message };
  }
  return { reason: 'unavailable', message: error instanceof Error ? error.message : String(error) };
}
