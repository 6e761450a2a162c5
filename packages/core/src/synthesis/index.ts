export {
  synthesizeStory,
  buildClosingParagraph,
  DEFAULT_SYNTHESIZER_CONFIG,
} from './synthesizer.js';
export type { SynthesizerConfig, SynthesizerOptions, SynthesizedStory } from './synthesizer.js';

export {
  joinNarrations,
  isSceneSetting,
  isSameScene,
  ATMOSPHERE_WORDS,
  DEFAULT_CONNECTIVE_CONFIG,
} from './connective-pass.js';
export type { ConnectiveConfig, ConnectiveResult } from './connective-pass.js';

export { scoreCompleteness, DEFAULT_PLOT_POINT_COVERAGE } from './completeness.js';
export type { CompletenessInput, CompletenessReport } from './completeness.js';

export { mentionsName, normalizeText, contentWords, jaccard, countWords } from './text-match.js';
