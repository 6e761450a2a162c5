/**
 * Story output formatting tests
 */

import type { SynthesisResult } from '@chronicler/core';
import { describe, it, expect } from 'vitest';

import { formatStats, formatStory } from '../output/story-formatter.js';

function makeResult(overrides: Partial<SynthesisResult> = {}): SynthesisResult {
  return {
    storyText: 'Kael crossed the bridge.\n\nMira followed him into Ironhold Keep.',
    segmentsProcessed: 2,
    totalSegments: 2,
    characters: ['Kael', 'Mira'],
    locations: ['Ironhold Keep'],
    plotPoints: [],
    completenessScore: 1,
    failoverEvents: [],
    processingTimeSeconds: 0.5,
    success: true,
    complete: true,
    wordCount: 10,
    narrations: [],
    warnings: [],
    ...overrides,
  };
}

describe('formatStory', () => {
  it('should write the story text with a trailing newline', () => {
    expect(formatStory(makeResult(), { format: 'markdown' })).toBe(
      'Kael crossed the bridge.\n\nMira followed him into Ironhold Keep.\n',
    );
  });

  it('should leave a heading in the story text untouched', () => {
    const output = formatStory(makeResult({ storyText: '# The Drowned Bell\n\nKael crossed the bridge.' }), {
      format: 'markdown',
    });
    expect(output).toBe('# The Drowned Bell\n\nKael crossed the bridge.\n');
  });

  it('should append statistics after a rule', () => {
    const output = formatStory(makeResult(), { format: 'markdown', includeStats: true });
    expect(output).toBe(
      [
        'Kael crossed the bridge.',
        '',
        'Mira followed him into Ironhold Keep.',
        '',
        '---',
        '',
        '## Session statistics',
        '',
        '- Segments: 2/2',
        '- Completeness: 100%',
        '- Words: 10',
        '- Failovers: 0',
        '- Characters: Kael, Mira',
        '- Locations: Ironhold Keep',
        '',
      ].join('\n'),
    );
  });

  it('should write the whole result as JSON', () => {
    const output = formatStory(makeResult(), { format: 'json', includeStats: false });
    const parsed: unknown = JSON.parse(output);
    expect(parsed).toMatchObject({
      storyText: 'Kael crossed the bridge.\n\nMira followed him into Ironhold Keep.',
      segmentsProcessed: 2,
      characters: ['Kael', 'Mira'],
      success: true,
    });
    expect(output.endsWith('}\n')).toBe(true);
  });
});

describe('formatStats', () => {
  it('should note a run that stopped early', () => {
    const stats = formatStats(
      makeResult({
        success: false,
        complete: false,
        failureReason: 'CANCELLED',
        segmentsProcessed: 1,
        characters: [],
        locations: [],
        completenessScore: 0.5,
      }),
    );
    expect(stats.split('\n')).toEqual([
      '## Session statistics',
      '',
      '- Segments: 1/2',
      '- Completeness: 50%',
      '- Words: 10',
      '- Failovers: 0',
      '- Stopped early: CANCELLED',
    ]);
  });
});
