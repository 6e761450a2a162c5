/**
 * Completeness scoring
 *
 * Fraction of remembered characters, locations and plot points that
 * appear in the final story.
 */

import type { PlotPoint } from '../types/narration.js';

import { contentWords, mentionsName, normalizeText } from './text-match.js';

/**
 * Share of a plot point's content words that must appear for a near-verbatim match
 */
export const DEFAULT_PLOT_POINT_COVERAGE = 0.8;

/**
 * Entities checked against the story
 */
export interface CompletenessInput {
  characters: readonly string[];
  locations: readonly string[];
  plotPoints: readonly PlotPoint[];
}

/**
 * Per-category counts and what was missing
 */
export interface CompletenessReport {
  /** matched / total, 1.0 when there is nothing to check */
  score: number;
  matched: number;
  total: number;
  missingCharacters: string[];
  missingLocations: string[];
  missingPlotPoints: PlotPoint[];
}

/**
 * Score a story against remembered entities
 */
export function scoreCompleteness(
  story: string,
  input: CompletenessInput,
  plotPointCoverage: number = DEFAULT_PLOT_POINT_COVERAGE,
): CompletenessReport {
  const normalizedStory = normalizeText(story);
  const storyWords = contentWords(story);

  const missingCharacters = input.characters.filter((name) => !mentionsName(story, name));
  const missingLocations = input.locations.filter((name) => !mentionsName(story, name));
  const missingPlotPoints = input.plotPoints.filter(
    (point) => !plotPointAppears(point.text, normalizedStory, storyWords, plotPointCoverage),
  );

  const total = input.characters.length + input.locations.length + input.plotPoints.length;
  const missing = missingCharacters.length + missingLocations.length + missingPlotPoints.length;
  const matched = total - missing;

  return {
    score: total === 0 ? 1 : matched / total,
    matched,
    total,
    missingCharacters,
    missingLocations,
    missingPlotPoints,
  };
}

function plotPointAppears(
  text: string,
  normalizedStory: string,
  storyWords: ReadonlySet<string>,
  coverage: number,
): boolean {
  const normalized = normalizeText(text);
  if (normalized && normalizedStory.includes(normalized)) {
    return true;
  }

  const words = contentWords(text);
  if (words.size === 0) {
    return false;
  }
  let present = 0;
  for (const word of words) {
    if (storyWords.has(word)) present++;
  }
  return present / words.size >= coverage;
}
