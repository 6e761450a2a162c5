export {
  StoryPipeline,
  createStoryPipeline,
  synthesize,
  resolveSegmentBudget,
  FALLBACK_SEGMENT_TOKEN_BUDGET,
} from './story-pipeline.js';
export type { SynthesizeOptions } from './story-pipeline.js';

export {
  SegmentNarrator,
  styleForPosition,
  describeFailure,
  DEFAULT_CONTEXT_SHARE,
} from './segment-narrator.js';
export type {
  RunProgress,
  ProgressCallback,
  WarningCallback,
  NarratorOptions,
  NarrationOutcome,
  NarrationRun,
} from './segment-narrator.js';

export { RunStateMachine, canTransition, isTerminal } from './run-state.js';
export type { RunState } from './run-state.js';

export { callWithTimeout } from './timeout.js';
