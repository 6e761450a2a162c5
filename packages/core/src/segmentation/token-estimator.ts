/**
 * Token estimation
 *
 * Character-count heuristic. Three characters per token overestimates
 * English prose slightly, so segments stay inside real model limits.
 */

import type { TokenEstimator, Transcript } from '../types/transcript.js';

/**
 * Characters per token used by the default estimator
 */
export const DEFAULT_CHARS_PER_TOKEN = 3;

/**
 * Estimate tokens for a piece of text
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / DEFAULT_CHARS_PER_TOKEN);
}

/**
 * Create a character-count estimator with a custom ratio
 */
export function createCharEstimator(charsPerToken: number): TokenEstimator {
  if (!(charsPerToken > 0)) {
    throw new RangeError(`charsPerToken must be positive, got ${charsPerToken}`);
  }
  return (text: string): number => Math.ceil(text.length / charsPerToken);
}

/**
 * Wrap raw transcribed text
 */
export function createTranscript(text: string, estimator: TokenEstimator = estimateTokens): Transcript {
  return { text, estimatedTokens: estimator(text) };
}

/**
 * Characters of this transcript that fit in a token budget, measured on the text itself
 */
export function charsForBudget(transcript: Transcript, budgetTokens: number): number {
  if (transcript.estimatedTokens <= 0) {
    return transcript.text.length;
  }
  const charsPerToken = transcript.text.length / transcript.estimatedTokens;
  return Math.max(1, Math.floor(budgetTokens * charsPerToken));
}
