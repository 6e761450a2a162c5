export {
  DEFAULT_CHARS_PER_TOKEN,
  estimateTokens,
  createCharEstimator,
  createTranscript,
  charsForBudget,
} from './token-estimator.js';

export { BOUNDARY_PRIORITY, DEFAULT_BOUNDARY_MARKERS } from './boundary-markers.js';
export type { BoundaryMarkerRule } from './boundary-markers.js';

export {
  DEFAULT_MIN_BOUNDARY_DISTANCE,
  detectBoundaries,
  findMarkerBoundaries,
  dedupeBoundaries,
  synthesizeBoundaries,
} from './boundary-detector.js';
export type { BoundaryDetectorOptions } from './boundary-detector.js';

export { segmentTranscript } from './segmenter.js';
export type { SegmenterOptions } from './segmenter.js';

export {
  findSentenceEnds,
  lastSentenceEnd,
  lastWordBreak,
  nearestSentenceEnd,
  splitFirstSentence,
  splitSentences,
} from './text-breaks.js';
