/**
 * Text matching helpers for the connective pass and completeness scoring
 */

import { loadLexicon } from '../extraction/lexicon.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive whole-word match of a name
 */
export function mentionsName(text: string, name: string): boolean {
  const trimmed = name.trim();
  if (!trimmed) return false;
  const words = trimmed.split(/\s+/).map(escapeRegExp).join(String.raw`\s+`);
  return new RegExp(String.raw`(?<![\p{L}\p{N}])${words}(?![\p{L}\p{N}])`, 'iu').test(text);
}

/**
 * Lowercase, punctuation folded to single spaces
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[’]/g, "'")
    .replace(/[^\p{L}\p{N}']+/gu, ' ')
    .trim();
}

/**
 * Lowercase words of three or more letters that are not stopwords
 */
export function contentWords(text: string): Set<string> {
  const { stopwords } = loadLexicon();
  const words = normalizeText(text)
    .split(' ')
    .map((word) => word.replace(/^'+|'+$/g, ''))
    .filter((word) => word.length >= 3 && !stopwords.has(word));
  return new Set(words);
}

/**
 * Jaccard similarity of two word sets (0 when both are empty)
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/**
 * Whitespace-separated word count
 */
export function countWords(text: string): number {
  return text.match(/\S+/g)?.length ?? 0;
}
