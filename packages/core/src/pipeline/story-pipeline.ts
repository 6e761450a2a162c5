/**
 * Story Pipeline
 *
 * Coordinates one synthesis run:
 * 1. Detect boundaries and segment the transcript
 * 2. Narrate segments in order with failover
 * 3. Synthesize the story and score its completeness
 * 4. Return a frozen SynthesisResult
 *
 * Segmentation failure, exhausted backends and cancellation all come back
 * as unsuccessful results, never as exceptions.
 */

import { RunCancelledError, SegmentationError } from '../errors.js';
import { SessionMemory } from '../memory/session-memory.js';
import type { SessionMemoryConfig } from '../memory/session-memory.js';
import { detectBoundaries, DEFAULT_MIN_BOUNDARY_DISTANCE } from '../segmentation/boundary-detector.js';
import { segmentTranscript } from '../segmentation/segmenter.js';
import { charsForBudget, createTranscript, estimateTokens } from '../segmentation/token-estimator.js';
import { synthesizeStory } from '../synthesis/synthesizer.js';
import type { SynthesizerConfig } from '../synthesis/synthesizer.js';
import type { GenerationBackend, QuotaAuthority } from '../types/backend.js';
import type {
  CampaignContext,
  FailoverEvent,
  FailureReason,
  SegmentNarration,
  SynthesisResult,
} from '../types/narration.js';
import type { BoundaryKind, Segment, TokenEstimator, Transcript } from '../types/transcript.js';

import { RunStateMachine } from './run-state.js';
import { SegmentNarrator } from './segment-narrator.js';
import type { NarrationRun, ProgressCallback, WarningCallback } from './segment-narrator.js';

/**
 * Budget used when no backend is configured and no override is given
 */
export const FALLBACK_SEGMENT_TOKEN_BUDGET = 2000;

/**
 * Options for a synthesis run
 */
export interface SynthesizeOptions {
  /** Overrides the smallest backend budget */
  segmentTokenBudget?: number;
  /** Consulted before every call to a metered backend */
  quota?: QuotaAuthority;
  /** Checked between segments */
  signal?: AbortSignal;
  campaign?: CampaignContext;
  onProgress?: ProgressCallback;
  /** Non-fatal conditions (default: console.warn) */
  onWarning?: WarningCallback;
  estimator?: TokenEstimator;
  /** Share of the active backend's budget given to the context digest (default: 0.15) */
  contextShare?: number;
  minBoundaryDistance?: number;
  /** Boundary kinds that always start a segment (default: ['part']) */
  hardBoundaryKinds?: readonly BoundaryKind[];
  memory?: Partial<SessionMemoryConfig>;
  synthesizer?: Partial<SynthesizerConfig>;
}

/**
 * Segment budget for a backend preference list: the override, or the
 * smallest backend budget so that any backend can take any segment
 */
export function resolveSegmentBudget(
  backends: readonly GenerationBackend[],
  override?: number,
): number {
  if (override !== undefined) {
    return override;
  }
  if (backends.length === 0) {
    return FALLBACK_SEGMENT_TOKEN_BUDGET;
  }
  return Math.min(...backends.map((backend) => backend.maxTokensPerSegment));
}

/**
 * One configured pipeline; every run gets its own memory and state machine
 */
export class StoryPipeline {
  private readonly backends: readonly GenerationBackend[];
  private readonly options: SynthesizeOptions;

  constructor(backends: readonly GenerationBackend[], options: SynthesizeOptions = {}) {
    this.backends = [...backends];
    this.options = options;
  }

  /**
   * Split a transcript into segments for this pipeline's budget
   *
   * @throws SegmentationError
   */
  segment(transcript: Transcript): Segment[] {
    const budget = resolveSegmentBudget(this.backends, this.options.segmentTokenBudget);
    const boundaries = detectBoundaries(transcript.text, {
      minBoundaryDistance: this.options.minBoundaryDistance ?? DEFAULT_MIN_BOUNDARY_DISTANCE,
      fallbackSpanChars: charsForBudget(transcript, budget),
    });
    return segmentTranscript(transcript.text, boundaries, {
      budgetTokens: budget,
      estimator: this.options.estimator ?? estimateTokens,
      ...(this.options.hardBoundaryKinds ? { hardBoundaryKinds: this.options.hardBoundaryKinds } : {}),
    });
  }

  /**
   * Run the whole pipeline
   */
  async run(input: Transcript | string): Promise<SynthesisResult> {
    const started = Date.now();
    const estimator = this.options.estimator ?? estimateTokens;
    const transcript = typeof input === 'string' ? createTranscript(input, estimator) : input;
    const warnings: string[] = [];
    const onWarning: WarningCallback = (message) => {
      warnings.push(message);
      (this.options.onWarning ?? console.warn)(message);
    };

    let segmentCount = 0;
    const stateMachine = new RunStateMachine((state) => {
      // The narrator reports per-segment progress itself
      if (state === 'narrating' || state === 'failover') return;
      this.options.onProgress?.({
        state,
        segmentIndex: state === 'complete' ? segmentCount : 0,
        totalSegments: segmentCount,
      });
    });
    const memory = new SessionMemory(this.options.memory);

    stateMachine.transition('segmenting');
    let segments: Segment[];
    try {
      segments = this.segment(transcript);
    } catch (error) {
      if (error instanceof SegmentationError) {
        stateMachine.transition('failed');
        return buildResult({
          started,
          memory,
          totalSegments: 0,
          narrationRun: { outcome: 'exhausted', narrations: [], failoverEvents: [] },
          failureReason: 'SEGMENTATION_ERROR',
          failureMessage: error.message,
          warnings,
          synthesizerOptions: this.synthesizerOptions(),
        });
      }
      throw error;
    }
    segmentCount = segments.length;

    stateMachine.transition('narrating');
    const narrator = new SegmentNarrator(this.backends, memory, {
      stateMachine,
      estimator,
      onWarning,
      ...(this.options.quota ? { quota: this.options.quota } : {}),
      ...(this.options.signal ? { signal: this.options.signal } : {}),
      ...(this.options.campaign ? { campaign: this.options.campaign } : {}),
      ...(this.options.contextShare !== undefined ? { contextShare: this.options.contextShare } : {}),
      ...(this.options.onProgress ? { onProgress: this.options.onProgress } : {}),
    });
    const narrationRun = await narrator.narrateAll(segments);

    if (narrationRun.outcome === 'complete') {
      stateMachine.transition('synthesizing');
    }

    const result = buildResult({
      started,
      memory,
      totalSegments: segments.length,
      narrationRun,
      warnings,
      synthesizerOptions: this.synthesizerOptions(),
      ...failureFor(narrationRun),
    });

    if (narrationRun.outcome === 'complete') {
      stateMachine.transition('complete');
    }
    return result;
  }

  private synthesizerOptions(): Parameters<typeof synthesizeStory>[2] {
    return {
      ...this.options.synthesizer,
      ...(this.options.campaign ? { campaign: this.options.campaign } : {}),
    };
  }
}

/**
 * Create a story pipeline
 */
export function createStoryPipeline(
  backends: readonly GenerationBackend[],
  options: SynthesizeOptions = {},
): StoryPipeline {
  return new StoryPipeline(backends, options);
}

/**
 * Turn a transcript into one story
 */
export async function synthesize(
  transcript: Transcript | string,
  backends: readonly GenerationBackend[],
  options: SynthesizeOptions = {},
): Promise<SynthesisResult> {
  return new StoryPipeline(backends, options).run(transcript);
}

function failureFor(run: NarrationRun): { failureReason?: FailureReason; failureMessage?: string } {
  switch (run.outcome) {
    case 'complete':
      return {};
    case 'cancelled':
      return {
        failureReason: 'CANCELLED',
        failureMessage: new RunCancelledError(run.narrations.length).message,
      };
    case 'exhausted':
      return {
        failureReason: 'ALL_BACKENDS_EXHAUSTED',
        ...(run.failureMessage !== undefined ? { failureMessage: run.failureMessage } : {}),
      };
  }
}

interface ResultParts {
  started: number;
  memory: SessionMemory;
  totalSegments: number;
  narrationRun: NarrationRun;
  warnings: readonly string[];
  synthesizerOptions: Parameters<typeof synthesizeStory>[2];
  failureReason?: FailureReason;
  failureMessage?: string;
}

function buildResult(parts: ResultParts): SynthesisResult {
  const { memory, narrationRun } = parts;
  const story = synthesizeStory(narrationRun.narrations, memory, parts.synthesizerOptions);
  const narrations: SegmentNarration[] = [...narrationRun.narrations];
  if (narrationRun.failedNarration) {
    narrations.push(narrationRun.failedNarration);
  }
  const failoverEvents: FailoverEvent[] = [...narrationRun.failoverEvents];
  const success = parts.failureReason === undefined;

  const result: SynthesisResult = {
    storyText: story.storyText,
    segmentsProcessed: narrationRun.narrations.length,
    totalSegments: parts.totalSegments,
    characters: memory.characters,
    locations: memory.locations,
    plotPoints: memory.plotPoints.map((point) => ({ ...point })),
    completenessScore: success || story.storyText ? story.completeness.score : 0,
    failoverEvents,
    processingTimeSeconds: (Date.now() - parts.started) / 1000,
    success,
    complete: success,
    wordCount: story.wordCount,
    narrations,
    warnings: [...parts.warnings],
    ...(parts.failureReason !== undefined ? { failureReason: parts.failureReason } : {}),
    ...(parts.failureMessage !== undefined ? { failureMessage: parts.failureMessage } : {}),
  };

  return deepFreeze(result);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
