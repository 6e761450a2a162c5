/**
 * Extraction rule table
 *
 * Rules are grouped by category and tried in priority order. Location rules
 * run before character rules so that a place name is never claimed as a
 * person by the generic actor rule.
 */

import type { Lexicon } from './lexicon.js';

/**
 * What a rule extracts
 */
export type ElementCategory = 'location' | 'character';

/**
 * A single pattern in the extraction table
 */
export interface ExtractionRule {
  id: string;
  category: ElementCategory;
  /** Higher runs first within its category */
  priority: number;
  pattern: RegExp;
  /** Capture group holding the name */
  group: number;
}

/**
 * Category evaluation order
 */
export const CATEGORY_ORDER: readonly ElementCategory[] = ['location', 'character'];

/** Verbs that mark the preceding name as a speaker */
const SPEECH_VERBS = [
  'said',
  'says',
  'asked',
  'replied',
  'replies',
  'shouted',
  'shouts',
  'whispered',
  'whispers',
  'nodded',
  'nods',
  'laughed',
  'laughs',
  'smiled',
  'grinned',
];

const LOCATIVE_PREPOSITIONS = [
  'in',
  'into',
  'inside',
  'near',
  'through',
  'toward',
  'towards',
  'entering',
  'leaving',
  'reached',
  'across',
  'beneath',
  'within',
];

const WORD = String.raw`\p{Lu}[\p{L}'’-]*`;

/** One to four capitalized words, with "of" / "of the" allowed between them */
const NAME = String.raw`${WORD}(?:[ \t]+(?:of[ \t]+(?:the[ \t]+)?)?${WORD}){0,3}`;

/** Not preceded by a letter */
const WORD_START = String.raw`(?<![\p{L}'’-])`;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches the word in lowercase or with a capital first letter */
function eitherCase(word: string): string {
  const first = word.charAt(0);
  return `[${first.toUpperCase()}${first}]${escapeRegExp(word.slice(1))}`;
}

function rule(id: string, category: ElementCategory, priority: number, source: string): ExtractionRule {
  return { id, category, priority, pattern: new RegExp(source, 'gmdu'), group: 1 };
}

/**
 * Build the default rule table for a lexicon
 */
export function createDefaultRules(lexicon: Lexicon): ExtractionRule[] {
  const suffixes = lexicon.locationSuffixes.map(escapeRegExp).join('|');
  const verbs = [...lexicon.actionVerbs.keys(), ...SPEECH_VERBS].map(escapeRegExp).join('|');
  const prepositions = LOCATIVE_PREPOSITIONS.map(eitherCase).join('|');

  return [
    rule(
      'location-tag',
      'location',
      100,
      String.raw`^[ \t]*(?:\*\*)?[Ll]ocation(?:\*\*)?[ \t]*:(?:\*\*)?[ \t]*(?:[Tt]he[ \t]+)?(${NAME})`,
    ),
    rule(
      'location-suffix',
      'location',
      90,
      String.raw`${WORD_START}((?:${WORD}[ \t]+){0,3}(?:${suffixes})(?:[ \t]+of[ \t]+(?:the[ \t]+)?${WORD})?)(?![\p{L}'’-])`,
    ),
    rule(
      'location-preposition',
      'location',
      50,
      String.raw`${WORD_START}(?:${prepositions})[ \t]+(?:[Tt]he[ \t]+)?(${NAME})`,
    ),
    rule('speaker-bold', 'character', 100, String.raw`^[ \t]*\*\*(${NAME})(?::\*\*|\*\*[ \t]*:)`),
    rule('player-tag', 'character', 90, String.raw`${WORD_START}Player[ \t]*\d+[ \t]*\((${NAME})\)`),
    rule('speaker-tag', 'character', 80, String.raw`^[ \t]*(${NAME})[ \t]*(?:\([^)\n]*\))?[ \t]*:`),
    rule('actor-verb', 'character', 50, String.raw`${WORD_START}(${NAME})[ \t]+(?:${verbs})(?![\p{L}'’-])`),
  ];
}
