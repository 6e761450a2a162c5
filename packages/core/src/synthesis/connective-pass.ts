/**
 * Connective Pass
 *
 * Joins narrations into one text. When two adjacent narrations both open by
 * setting the same scene, the later opening sentence is dropped. A paragraph
 * repeated verbatim across a join is dropped as well.
 */

import { splitFirstSentence } from '../segmentation/text-breaks.js';

import { contentWords, jaccard, mentionsName, normalizeText } from './text-match.js';

/**
 * Words that mark a sentence as scene-setting
 */
export const ATMOSPHERE_WORDS: readonly string[] = [
  'air',
  'sky',
  'shadows',
  'shadow',
  'mist',
  'fog',
  'rain',
  'wind',
  'darkness',
  'silence',
  'torchlight',
  'moonlight',
  'dawn',
  'dusk',
  'night',
  'cold',
  'smell',
  'scent',
];

/**
 * Connective pass configuration
 */
export interface ConnectiveConfig {
  /** Content-word Jaccard at which two openings count as the same scene (default: 0.5) */
  similarityThreshold: number;
}

export const DEFAULT_CONNECTIVE_CONFIG: ConnectiveConfig = {
  similarityThreshold: 0.5,
};

/**
 * Joined text plus what was removed
 */
export interface ConnectiveResult {
  text: string;
  droppedOpenings: number;
  droppedParagraphs: number;
}

/**
 * Join narrations in order, removing repeated scene-setting at each join
 */
export function joinNarrations(
  texts: readonly string[],
  knownLocations: readonly string[],
  config: Partial<ConnectiveConfig> = {},
): ConnectiveResult {
  const { similarityThreshold } = { ...DEFAULT_CONNECTIVE_CONFIG, ...config };
  const parts: string[] = [];
  let droppedOpenings = 0;
  let droppedParagraphs = 0;
  let previous: string | undefined;

  for (const raw of texts) {
    let current = raw.trim();
    if (!current) continue;

    if (previous !== undefined) {
      const repeated = dropRepeatedParagraph(previous, current);
      if (repeated !== current) {
        current = repeated;
        droppedParagraphs++;
      }

      const prevOpening = splitFirstSentence(previous).first;
      const { first, rest } = splitFirstSentence(current);
      if (
        rest.trim() &&
        isSceneSetting(first, knownLocations) &&
        isSceneSetting(prevOpening, knownLocations) &&
        isSameScene(first, prevOpening, knownLocations, similarityThreshold)
      ) {
        current = rest.trim();
        droppedOpenings++;
      }
    }

    parts.push(current);
    previous = raw.trim();
  }

  return { text: parts.join('\n\n'), droppedOpenings, droppedParagraphs };
}

/**
 * Mentions a known location or an atmosphere word
 */
export function isSceneSetting(sentence: string, knownLocations: readonly string[]): boolean {
  if (knownLocations.some((location) => mentionsName(sentence, location))) {
    return true;
  }
  const words = new Set(normalizeText(sentence).split(' '));
  return ATMOSPHERE_WORDS.some((word) => words.has(word));
}

/**
 * Shares a known location, or enough content words
 */
export function isSameScene(
  a: string,
  b: string,
  knownLocations: readonly string[],
  threshold: number = DEFAULT_CONNECTIVE_CONFIG.similarityThreshold,
): boolean {
  const sharedLocation = knownLocations.some(
    (location) => mentionsName(a, location) && mentionsName(b, location),
  );
  return sharedLocation || jaccard(contentWords(a), contentWords(b)) >= threshold;
}

/**
 * Drop current's first paragraph when it repeats previous's last one
 */
function dropRepeatedParagraph(previous: string, current: string): string {
  const previousParagraphs = previous.split(/\n\s*\n/);
  const currentParagraphs = current.split(/\n\s*\n/);
  const last = previousParagraphs[previousParagraphs.length - 1];
  const [first, ...rest] = currentParagraphs;

  if (
    last !== undefined &&
    first !== undefined &&
    rest.length > 0 &&
    normalizeText(last) === normalizeText(first)
  ) {
    return rest.join('\n\n').trim();
  }
  return current;
}
