/**
 * Synthesizer
 *
 * Merges ordered narrations and the final session memory into one story:
 * connective pass, closing roster paragraph, optional title, then a
 * completeness score over everything memory knows about.
 */

import { SynthesisInvariantError } from '../errors.js';
import type { SessionMemory } from '../memory/session-memory.js';
import type { CampaignContext, PlotPoint, SegmentNarration } from '../types/narration.js';

import { scoreCompleteness, DEFAULT_PLOT_POINT_COVERAGE } from './completeness.js';
import type { CompletenessReport } from './completeness.js';
import { joinNarrations, DEFAULT_CONNECTIVE_CONFIG } from './connective-pass.js';
import { countWords } from './text-match.js';

/**
 * Synthesizer configuration
 */
export interface SynthesizerConfig {
  /** Plot threads named in the closing paragraph (default: 5) */
  closingPlotThreads: number;
  /** Opening-sentence similarity for the connective pass (default: 0.5) */
  similarityThreshold: number;
  /** Content-word share for a near-verbatim plot point match (default: 0.8) */
  plotPointCoverage: number;
}

export const DEFAULT_SYNTHESIZER_CONFIG: SynthesizerConfig = {
  closingPlotThreads: 5,
  similarityThreshold: DEFAULT_CONNECTIVE_CONFIG.similarityThreshold,
  plotPointCoverage: DEFAULT_PLOT_POINT_COVERAGE,
};

export interface SynthesizerOptions extends Partial<SynthesizerConfig> {
  campaign?: CampaignContext;
}

/**
 * Assembled story with scoring details
 */
export interface SynthesizedStory {
  storyText: string;
  completeness: CompletenessReport;
  wordCount: number;
  droppedOpenings: number;
  droppedParagraphs: number;
}

/**
 * Assemble the final story
 *
 * @throws SynthesisInvariantError if narrations are not successful, ordered and gap-free from 0
 */
export function synthesizeStory(
  narrations: readonly SegmentNarration[],
  memory: SessionMemory,
  options: SynthesizerOptions = {},
): SynthesizedStory {
  const config: SynthesizerConfig = { ...DEFAULT_SYNTHESIZER_CONFIG, ...options };
  assertOrdered(narrations);

  const joined = joinNarrations(
    narrations.map((n) => n.text),
    memory.locations,
    { similarityThreshold: config.similarityThreshold },
  );

  const sections: string[] = [];
  const title = options.campaign?.sessionName?.trim();
  if (title && joined.text) {
    sections.push(`# ${title}`);
  }
  if (joined.text) {
    sections.push(joined.text);
    const closing = buildClosingParagraph(memory.characters, memory.plotPoints, config.closingPlotThreads);
    if (closing) sections.push(closing);
  }

  const storyText = sections.join('\n\n');
  const completeness = scoreCompleteness(
    storyText,
    { characters: memory.characters, locations: memory.locations, plotPoints: memory.plotPoints },
    config.plotPointCoverage,
  );

  return {
    storyText,
    completeness,
    wordCount: countWords(storyText),
    droppedOpenings: joined.droppedOpenings,
    droppedParagraphs: joined.droppedParagraphs,
  };
}

function assertOrdered(narrations: readonly SegmentNarration[]): void {
  narrations.forEach((narration, position) => {
    if (narration.segmentIndex !== position) {
      throw new SynthesisInvariantError(
        `Expected narration for segment ${position}, got segment ${narration.segmentIndex}`,
      );
    }
    if (!narration.success) {
      throw new SynthesisInvariantError(`Narration for segment ${position} did not succeed`);
    }
  });
}

/**
 * Roster of every character plus the most salient plot threads
 */
export function buildClosingParagraph(
  characters: readonly string[],
  plotPoints: readonly PlotPoint[],
  threadCount: number,
): string {
  const sentences: string[] = [];

  if (characters.length > 0) {
    sentences.push(`When the session drew to a close, the tale had gathered ${formatList(characters)}.`);
  }

  const threads = topThreads(plotPoints, threadCount);
  if (threads.length > 0) {
    sentences.push(`The threads that will echo into the next session: ${threads.map(endSentence).join(' ')}`);
  }

  return sentences.join(' ');
}

/**
 * Highest salience first (later segments on ties), returned in story order
 */
function topThreads(plotPoints: readonly PlotPoint[], count: number): string[] {
  if (count <= 0) return [];
  return plotPoints
    .map((point, order) => ({ point, order }))
    .sort((a, b) => b.point.salience - a.point.salience || b.order - a.order)
    .slice(0, count)
    .sort((a, b) => a.order - b.order)
    .map(({ point }) => point.text);
}

function formatList(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1] ?? ''}`;
}

function endSentence(text: string): string {
  const trimmed = text.trim();
  return /[.!?…"'”’]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}
