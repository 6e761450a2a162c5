/**
 * Boundary Detector
 *
 * Finds candidate split points in a transcript. Structural markers come
 * first; when a transcript has none, evenly spaced synthetic boundaries
 * are aligned to the nearest sentence end instead.
 */

import type { Boundary } from '../types/transcript.js';

import { BOUNDARY_PRIORITY, DEFAULT_BOUNDARY_MARKERS } from './boundary-markers.js';
import type { BoundaryMarkerRule } from './boundary-markers.js';
import { nearestSentenceEnd } from './text-breaks.js';

/**
 * Default minimum distance (characters) between two kept boundaries
 */
export const DEFAULT_MIN_BOUNDARY_DISTANCE = 500;

/**
 * Boundary detection options
 */
export interface BoundaryDetectorOptions {
  /** Boundaries closer than this are deduplicated by priority (default 500) */
  minBoundaryDistance?: number;
  /**
   * Target span length for synthetic boundaries.
   * When omitted, text without markers yields no boundaries.
   */
  fallbackSpanChars?: number;
  /** Marker table (defaults to DEFAULT_BOUNDARY_MARKERS) */
  markers?: readonly BoundaryMarkerRule[];
}

/**
 * Detect boundaries, ordered by offset
 */
export function detectBoundaries(text: string, options: BoundaryDetectorOptions = {}): Boundary[] {
  const minDistance = options.minBoundaryDistance ?? DEFAULT_MIN_BOUNDARY_DISTANCE;
  const markers = options.markers ?? DEFAULT_BOUNDARY_MARKERS;

  const found = dedupeBoundaries(findMarkerBoundaries(text, markers), minDistance);
  if (found.length > 0 || options.fallbackSpanChars === undefined) {
    return found;
  }

  return synthesizeBoundaries(text, options.fallbackSpanChars);
}

/**
 * Every marker match, unordered and not deduplicated
 */
export function findMarkerBoundaries(
  text: string,
  markers: readonly BoundaryMarkerRule[] = DEFAULT_BOUNDARY_MARKERS,
): Boundary[] {
  const boundaries: Boundary[] = [];

  for (const rule of markers) {
    for (const match of text.matchAll(rule.pattern)) {
      boundaries.push({
        offset: match.index ?? 0,
        kind: rule.kind,
        priority: rule.priority,
        label: match[0].trim(),
      });
    }
  }

  return boundaries;
}

/**
 * Keep the highest-priority boundary in each cluster closer than minDistance.
 * Ties go to the earlier offset. Result is sorted by offset.
 */
export function dedupeBoundaries(boundaries: readonly Boundary[], minDistance: number): Boundary[] {
  const byPriority = [...boundaries].sort((a, b) => b.priority - a.priority || a.offset - b.offset);
  const gap = Math.max(minDistance, 1);
  const kept: Boundary[] = [];

  for (const candidate of byPriority) {
    if (kept.every((b) => Math.abs(b.offset - candidate.offset) >= gap)) {
      kept.push(candidate);
    }
  }

  return kept.sort((a, b) => a.offset - b.offset);
}

/**
 * Evenly spaced boundaries aligned to sentence ends
 */
export function synthesizeBoundaries(text: string, spanChars: number): Boundary[] {
  if (!(spanChars > 0) || text.length <= spanChars) {
    return [];
  }

  const count = Math.ceil(text.length / spanChars);
  const window = Math.max(40, Math.floor(spanChars / 10));
  const boundaries: Boundary[] = [];
  let previous = 0;

  for (let i = 1; i < count; i++) {
    const target = Math.round((i * text.length) / count);
    const offset = nearestSentenceEnd(text, target, window);
    if (offset <= previous || offset >= text.length) continue;

    boundaries.push({ offset, kind: 'synthetic', priority: BOUNDARY_PRIORITY.synthetic, label: '' });
    previous = offset;
  }

  return boundaries;
}
