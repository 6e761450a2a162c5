/**
 * Transcript, boundary and segment types
 */

/**
 * Raw session transcript as handed over by the transcription stage
 */
export interface Transcript {
  /** Plain transcribed text */
  text: string;
  /** Estimated token count of the whole text */
  estimatedTokens: number;
}

/**
 * Kinds of split points, highest priority first
 */
export type BoundaryKind = 'part' | 'combat' | 'scene' | 'chapter' | 'synthetic';

/**
 * Candidate split point in the transcript
 */
export interface Boundary {
  /** Character offset where the next span starts */
  offset: number;
  kind: BoundaryKind;
  /** Used when two boundaries are too close together; higher wins */
  priority: number;
  /** Marker text that produced the boundary (empty for synthetic ones) */
  label: string;
}

/**
 * Contiguous slice of the transcript sized to one backend call
 */
export interface Segment {
  /** Position in the ordered segment list (0-based) */
  readonly index: number;
  /** Inclusive start offset */
  readonly start: number;
  /** Exclusive end offset */
  readonly end: number;
  readonly content: string;
  readonly estimatedTokens: number;
  /** True when the segment opens at a boundary that is never merged across */
  readonly startsAtHardBoundary: boolean;
}

/**
 * Token estimator used for budgets and segment sizes
 */
export type TokenEstimator = (text: string) => number;
