/**
 * Types shared by memory, narration and synthesis
 */

import type { BackendFailureReason } from '../errors.js';

/**
 * A notable event tagged with the segment it came from
 */
export interface PlotPoint {
  segmentIndex: number;
  text: string;
  /** 1 (routine) to 5 (story-changing) */
  salience: number;
}

/**
 * Heuristic extraction result for one segment
 */
export interface ExtractedElements {
  segmentIndex: number;
  characters: string[];
  locations: string[];
  events: PlotPoint[];
  /** Non-fatal problems hit while extracting */
  warnings: string[];
}

/**
 * Optional campaign-level context supplied by the caller
 */
export interface CampaignContext {
  sessionName?: string;
  setting?: string;
  /** Party members the caller already knows about */
  party?: string[];
  /** Events from earlier sessions */
  previousEvents?: string[];
  campaignNotes?: string;
}

/**
 * Bounded digest of session memory handed to a backend with each segment
 */
export interface ContextDigest {
  /** Rendered digest, never longer than the requested size */
  text: string;
  characters: string[];
  locations: string[];
  recentEvents: string[];
  summary: string;
  segmentIndex: number;
  totalSegments: number;
  campaign?: CampaignContext;
}

/**
 * Narrative position of a segment
 */
export type StyleHint = 'opening' | 'middle' | 'closing';

/**
 * Output of one backend call for one segment
 */
export interface SegmentNarration {
  readonly segmentIndex: number;
  readonly text: string;
  /** Name of the backend that produced (or failed to produce) the text */
  readonly backend: string;
  readonly success: boolean;
  readonly elapsedMs: number;
  readonly error?: string;
}

/**
 * Why the run left a backend
 */
export type FailoverReason = BackendFailureReason | 'quota';

/**
 * Recorded switch from one backend to the next
 */
export interface FailoverEvent {
  readonly segmentIndex: number;
  readonly from: string;
  /** Next backend, absent when none was left */
  readonly to?: string;
  readonly reason: FailoverReason;
  readonly message: string;
  /** ISO timestamp */
  readonly at: string;
}

/**
 * Reason codes for unsuccessful runs
 */
export type FailureReason = 'SEGMENTATION_ERROR' | 'ALL_BACKENDS_EXHAUSTED' | 'CANCELLED';

/**
 * Sole durable output of a run
 */
export interface SynthesisResult {
  readonly storyText: string;
  readonly segmentsProcessed: number;
  readonly totalSegments: number;
  readonly characters: readonly string[];
  readonly locations: readonly string[];
  readonly plotPoints: readonly PlotPoint[];
  /** Fraction of known entities found in the story (0.0-1.0) */
  readonly completenessScore: number;
  readonly failoverEvents: readonly FailoverEvent[];
  readonly processingTimeSeconds: number;
  readonly success: boolean;
  readonly failureReason?: FailureReason;
  readonly failureMessage?: string;
  /** False when the run stopped before narrating every segment */
  readonly complete: boolean;
  readonly wordCount: number;
  readonly narrations: readonly SegmentNarration[];
  readonly warnings: readonly string[];
}
