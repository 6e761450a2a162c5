export { extractElements, MAX_EVENT_CHARS } from './element-extractor.js';
export { createDefaultRules, CATEGORY_ORDER } from './rules.js';
export type { ElementCategory, ExtractionRule } from './rules.js';
export { findPackageRoot, isCommonNoun, loadLexicon } from './lexicon.js';
export type { Lexicon } from './lexicon.js';
