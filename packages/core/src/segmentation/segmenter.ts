/**
 * Segmenter
 *
 * Turns a transcript and its boundaries into an ordered list of segments
 * that each fit a token budget. Concatenating the segment contents in
 * order reproduces the transcript exactly.
 *
 * Spans between boundaries are merged greedily while the merged slice
 * still fits. Spans over budget are split at the last sentence end that
 * fits, then the last word break, then the raw character limit.
 */

import { SegmentationError } from '../errors.js';
import type { Boundary, BoundaryKind, Segment, TokenEstimator } from '../types/transcript.js';

import { lastSentenceEnd, lastWordBreak } from './text-breaks.js';
import { estimateTokens } from './token-estimator.js';

/**
 * Segmentation options
 */
export interface SegmenterOptions {
  /** Largest estimated token count per segment */
  budgetTokens: number;
  /** Defaults to estimateTokens */
  estimator?: TokenEstimator;
  /** Boundary kinds that always start a new segment (default ['part']) */
  hardBoundaryKinds?: readonly BoundaryKind[];
}

interface Span {
  start: number;
  end: number;
  hard: boolean;
}

/**
 * Split a transcript into budget-sized segments
 *
 * @throws SegmentationError on empty text or a non-positive budget
 */
export function segmentTranscript(
  text: string,
  boundaries: readonly Boundary[],
  options: SegmenterOptions,
): Segment[] {
  const { budgetTokens } = options;
  const estimate = options.estimator ?? estimateTokens;
  const hardKinds = new Set<BoundaryKind>(options.hardBoundaryKinds ?? ['part']);

  if (text.trim().length === 0) {
    throw new SegmentationError('Transcript is empty');
  }
  if (!Number.isFinite(budgetTokens) || budgetTokens <= 0) {
    throw new SegmentationError(`Segment token budget must be positive, got ${budgetTokens}`);
  }

  const spans = buildSpans(text, boundaries, hardKinds);
  const pieces = spans.flatMap((span) => splitOversized(text, span, budgetTokens, estimate));
  const merged = mergeGreedy(text, pieces, budgetTokens, estimate);

  return merged.map((span, index) => {
    const content = text.slice(span.start, span.end);
    return Object.freeze({
      index,
      start: span.start,
      end: span.end,
      content,
      estimatedTokens: estimate(content),
      startsAtHardBoundary: span.hard,
    });
  });
}

/**
 * Spans between interior boundaries, in offset order
 */
function buildSpans(text: string, boundaries: readonly Boundary[], hardKinds: Set<BoundaryKind>): Span[] {
  const cuts = new Map<number, boolean>();
  for (const boundary of boundaries) {
    if (boundary.offset <= 0 || boundary.offset >= text.length) continue;
    const hard = hardKinds.has(boundary.kind);
    cuts.set(boundary.offset, (cuts.get(boundary.offset) ?? false) || hard);
  }

  const offsets = [...cuts.keys()].sort((a, b) => a - b);
  const spans: Span[] = [];
  let start = 0;
  let hard = false;

  for (const offset of offsets) {
    spans.push({ start, end: offset, hard });
    start = offset;
    hard = cuts.get(offset) ?? false;
  }
  spans.push({ start, end: text.length, hard });

  return spans;
}

/**
 * Force-split a span until every piece fits the budget
 */
function splitOversized(text: string, span: Span, budget: number, estimate: TokenEstimator): Span[] {
  const pieces: Span[] = [];
  let start = span.start;
  let hard = span.hard;

  while (start < span.end && estimate(text.slice(start, span.end)) > budget) {
    const limit = largestFittingEnd(text, start, span.end, budget, estimate);
    const cut = lastSentenceEnd(text, start, limit) ?? lastWordBreak(text, start, limit) ?? limit;

    pieces.push({ start, end: cut, hard });
    start = cut;
    hard = false;
  }

  if (start < span.end) {
    pieces.push({ start, end: span.end, hard });
  }

  return pieces;
}

/**
 * Largest end in (start, end] whose slice fits the budget.
 * Returns start + 1 when not even one character fits.
 */
function largestFittingEnd(
  text: string,
  start: number,
  end: number,
  budget: number,
  estimate: TokenEstimator,
): number {
  let lo = start + 1;
  let hi = end;

  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (estimate(text.slice(start, mid)) <= budget) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }

  return lo;
}

/**
 * Merge adjacent pieces while the merged slice fits; hard pieces always start fresh
 */
function mergeGreedy(text: string, pieces: readonly Span[], budget: number, estimate: TokenEstimator): Span[] {
  const merged: Span[] = [];
  let current: Span | undefined;

  for (const piece of pieces) {
    if (current && !piece.hard && estimate(text.slice(current.start, piece.end)) <= budget) {
      current = { start: current.start, end: piece.end, hard: current.hard };
      continue;
    }
    if (current) merged.push(current);
    current = { ...piece };
  }
  if (current) merged.push(current);

  return merged;
}
