/**
 * Element Extractor
 *
 * Heuristic, backend-independent extraction of characters, locations and
 * events from one segment. Pure and deterministic: the same text always
 * yields the same elements. Never throws.
 */

import { splitSentences } from '../segmentation/text-breaks.js';
import type { ExtractedElements, PlotPoint } from '../types/narration.js';

import { isCommonNoun, loadLexicon } from './lexicon.js';
import type { Lexicon } from './lexicon.js';
import { CATEGORY_ORDER, createDefaultRules } from './rules.js';
import type { ElementCategory, ExtractionRule } from './rules.js';

/**
 * Longest event text kept per sentence
 */
export const MAX_EVENT_CHARS = 200;

type Span = readonly [number, number];

interface Found {
  name: string;
  offset: number;
}

let defaultRules: ExtractionRule[] | undefined;

function getDefaultRules(lexicon: Lexicon): ExtractionRule[] {
  defaultRules ??= createDefaultRules(lexicon);
  return defaultRules;
}

/**
 * Extract characters, locations and events from a segment
 */
export function extractElements(
  text: string,
  segmentIndex: number,
  rules?: readonly ExtractionRule[],
): ExtractedElements {
  try {
    const lexicon = loadLexicon();
    const found = applyRules(text, rules ?? getDefaultRules(lexicon), lexicon);

    const characters = sortByOffset(found.character);
    const locations = sortByOffset(found.location).filter((name) => !found.character.has(name.toLowerCase()));

    return {
      segmentIndex,
      characters,
      locations,
      events: extractEvents(text, segmentIndex, lexicon),
      warnings: [],
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      segmentIndex,
      characters: [],
      locations: [],
      events: [],
      warnings: [`Element extraction failed for segment ${segmentIndex}: ${message}`],
    };
  }
}

function applyRules(
  text: string,
  rules: readonly ExtractionRule[],
  lexicon: Lexicon,
): Record<ElementCategory, Map<string, Found>> {
  const claims: Record<ElementCategory, Span[]> = { location: [], character: [] };
  const found: Record<ElementCategory, Map<string, Found>> = { location: new Map(), character: new Map() };
  const suffixes = new Set(lexicon.locationSuffixes);

  const ordered = [...rules].sort(
    (a, b) =>
      CATEGORY_ORDER.indexOf(a.category) - CATEGORY_ORDER.indexOf(b.category) || b.priority - a.priority,
  );

  for (const rule of ordered) {
    // The generic character rules must not take a span a location rule already took
    const blocked =
      rule.category === 'character' ? [...claims.character, ...claims.location] : claims.location;

    for (const match of text.matchAll(withIndices(rule.pattern))) {
      const span = match.indices?.[rule.group];
      const raw = match[rule.group];
      if (!span || raw === undefined || overlapsAny(blocked, span)) continue;

      const name = cleanName(raw, lexicon, suffixes);
      if (!name) continue;

      claims[rule.category].push(span);
      const key = name.toLowerCase();
      const existing = found[rule.category].get(key);
      if (!existing || span[0] < existing.offset) {
        found[rule.category].set(key, { name: existing?.name ?? name, offset: span[0] });
      }
    }
  }

  return found;
}

function withIndices(pattern: RegExp): RegExp {
  let flags = pattern.flags;
  if (!flags.includes('g')) flags += 'g';
  if (!flags.includes('d')) flags += 'd';
  return new RegExp(pattern.source, flags);
}

function overlapsAny(spans: readonly Span[], span: Span): boolean {
  return spans.some(([start, end]) => span[0] < end && start < span[1]);
}

function sortByOffset(found: Map<string, Found>): string[] {
  return [...found.values()].sort((a, b) => a.offset - b.offset).map((f) => f.name);
}

/**
 * Strip possessives and leading stopwords; reject stopwords, bare place nouns and common nouns
 */
function cleanName(raw: string, lexicon: Lexicon, suffixes: ReadonlySet<string>): string | undefined {
  const words = raw
    .replace(/['’]s$/u, '')
    .split(/\s+/)
    .filter((word) => word.length > 0);

  while (words.length > 0 && lexicon.stopwords.has((words[0] ?? '').toLowerCase())) {
    words.shift();
  }

  const name = words.join(' ');
  if (name.length < 2 || lexicon.stopwords.has(name.toLowerCase())) {
    return undefined;
  }
  if (words.length === 1 && (suffixes.has(name) || isCommonNoun(name, lexicon))) {
    return undefined;
  }
  return name;
}

/**
 * One event per sentence that contains an action verb
 */
function extractEvents(text: string, segmentIndex: number, lexicon: Lexicon): PlotPoint[] {
  const events: PlotPoint[] = [];
  const seen = new Set<string>();

  for (const sentence of splitSentences(text)) {
    const cleaned = stripMarkup(sentence);
    let salience = 0;
    for (const word of cleaned.toLowerCase().match(/[\p{L}'’]+/gu) ?? []) {
      salience = Math.max(salience, lexicon.actionVerbs.get(word) ?? 0);
    }
    if (salience === 0) continue;

    const eventText = truncateAtWord(cleaned, MAX_EVENT_CHARS);
    const key = eventText.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    events.push({ segmentIndex, text: eventText, salience });
  }

  return events;
}

function stripMarkup(sentence: string): string {
  return sentence
    .replace(/^#+[ \t]*/, '')
    .replace(/\*\*/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const cut = text.lastIndexOf(' ', maxChars);
  return text.slice(0, cut > 0 ? cut : maxChars).trimEnd();
}
