/**
 * Boundary marker table
 *
 * Each rule matches a marker at the start of a line, optionally behind
 * markdown bold or heading syntax. Higher priority wins when two
 * boundaries fall too close together.
 */

import type { BoundaryKind } from '../types/transcript.js';

/**
 * One marker recognized by the boundary detector
 */
export interface BoundaryMarkerRule {
  kind: BoundaryKind;
  priority: number;
  /** Must carry the `g` and `m` flags */
  pattern: RegExp;
}

/**
 * Priority per boundary kind
 */
export const BOUNDARY_PRIORITY: Readonly<Record<BoundaryKind, number>> = {
  part: 4,
  combat: 3,
  scene: 2,
  chapter: 1,
  synthetic: 0,
};

/** Line start, then optional `**`, `#` heading or `[` before the marker word */
const LINE_PREFIX = String.raw`^[ \t]*(?:\*\*|#{1,6}[ \t]*|\[)?[ \t]*`;

function lineMarker(body: string): RegExp {
  return new RegExp(`${LINE_PREFIX}${body}`, 'gim');
}

/**
 * Default markers for tabletop session transcripts
 */
export const DEFAULT_BOUNDARY_MARKERS: readonly BoundaryMarkerRule[] = [
  {
    kind: 'part',
    priority: BOUNDARY_PRIORITY.part,
    pattern: lineMarker(String.raw`(?:session|part)[ \t]+(?:\d+|[ivxlc]+)\b`),
  },
  {
    kind: 'combat',
    priority: BOUNDARY_PRIORITY.combat,
    pattern: lineMarker(String.raw`(?:combat|initiative|encounter|round[ \t]+\d+)\b`),
  },
  {
    kind: 'scene',
    priority: BOUNDARY_PRIORITY.scene,
    pattern: lineMarker(String.raw`scene\b`),
  },
  {
    // Horizontal rule used as a scene break
    kind: 'scene',
    priority: BOUNDARY_PRIORITY.scene,
    pattern: /^[ \t]*(?:-{3,}|\*{3,}|_{3,})[ \t]*\r?$/gm,
  },
  {
    kind: 'chapter',
    priority: BOUNDARY_PRIORITY.chapter,
    pattern: lineMarker(String.raw`(?:chapter|act)[ \t]+\w+`),
  },
];
