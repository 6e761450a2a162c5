/**
 * Renders a synthesis result for writing to a file or stdout
 */

import type { SynthesisResult } from '@chronicler/core';

import type { ChroniclerConfig, OutputFormat } from '../config/schema.js';
import { formatPercentage } from '../progress/formatters.js';

export interface StoryFormatOptions {
  format: OutputFormat;
  /** Append run statistics (markdown only; JSON always carries them) */
  includeStats?: boolean;
}

/**
 * Output options for a resolved config; the session heading comes from the synthesizer
 */
export function storyFormatOptions(config: ChroniclerConfig): StoryFormatOptions {
  return { format: config.output.format, includeStats: config.output.includeStats };
}

/**
 * Markdown statistics block
 */
export function formatStats(result: SynthesisResult): string {
  const lines = [
    '## Session statistics',
    '',
    `- Segments: ${result.segmentsProcessed}/${result.totalSegments}`,
    `- Completeness: ${formatPercentage(result.completenessScore)}`,
    `- Words: ${result.wordCount}`,
    `- Failovers: ${result.failoverEvents.length}`,
  ];
  if (result.characters.length > 0) {
    lines.push(`- Characters: ${result.characters.join(', ')}`);
  }
  if (result.locations.length > 0) {
    lines.push(`- Locations: ${result.locations.join(', ')}`);
  }
  if (!result.complete) {
    lines.push(`- Stopped early: ${result.failureReason ?? 'unknown'}`);
  }
  return lines.join('\n');
}

/**
 * Format a story; the result always ends with a newline
 */
export function formatStory(result: SynthesisResult, options: StoryFormatOptions): string {
  if (options.format === 'json') {
    return `${JSON.stringify(result, null, 2)}\n`;
  }

  const parts: string[] = [];
  if (result.storyText) {
    parts.push(result.storyText);
  }
  if (options.includeStats) {
    parts.push('---', formatStats(result));
  }
  return `${parts.join('\n\n')}\n`;
}
