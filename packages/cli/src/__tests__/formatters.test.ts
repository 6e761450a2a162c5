/**
 * Formatting utilities tests
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { ChroniclerConfig } from '../config/schema.js';
import { formatConfigDisplay, formatDuration, formatEta, formatPercentage } from '../progress/formatters.js';

describe('formatDuration', () => {
  it('should format milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(5000)).toBe('5.0s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDuration(60000)).toBe('1m 0s');
    expect(formatDuration(90000)).toBe('1m 30s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('formatEta', () => {
  it('should return empty string for null', () => {
    expect(formatEta(null)).toBe('');
  });

  it('should format zero or negative as almost done', () => {
    expect(formatEta(0)).toBe('almost done');
    expect(formatEta(-100)).toBe('almost done');
  });

  it('should format sub-second duration', () => {
    expect(formatEta(500)).toBe('less than a second');
    expect(formatEta(999)).toBe('less than a second');
  });

  it('should format seconds', () => {
    expect(formatEta(1000)).toBe('~1s');
    expect(formatEta(5000)).toBe('~5s');
    expect(formatEta(59999)).toBe('~60s');
  });

  it('should format minutes and seconds', () => {
    expect(formatEta(60000)).toBe('~1m');
    expect(formatEta(90000)).toBe('~1m 30s');
    expect(formatEta(150000)).toBe('~2m 30s');
  });

  it('should round seconds up', () => {
    expect(formatEta(61500)).toBe('~1m 2s'); // 61.5s rounds to 1m 2s
  });
});

describe('formatPercentage', () => {
  it('should format a ratio', () => {
    expect(formatPercentage(0)).toBe('0%');
    expect(formatPercentage(0.5)).toBe('50%');
    expect(formatPercentage(1)).toBe('100%');
  });

  it('should round to nearest integer', () => {
    expect(formatPercentage(1 / 3)).toBe('33%');
    expect(formatPercentage(0.926)).toBe('93%');
  });

  it('should clamp values outside 0..1', () => {
    expect(formatPercentage(-0.2)).toBe('0%');
    expect(formatPercentage(1.4)).toBe('100%');
  });
});

describe('formatConfigDisplay', () => {
  it('should list the backend chain and models', () => {
    const lines = formatConfigDisplay(DEFAULT_CONFIG).split('\n');

    expect(lines).toContain('  Backends: remote -> local -> offline');
    expect(lines).toContain('  Segment budget: smallest backend budget');
    expect(lines).toContain('  Model: gpt-4o-mini');
    expect(lines).toContain('  Endpoint: http://localhost:11434/v1');
    expect(lines).toContain('  Format: markdown');
  });

  it('should show caps and campaign only when set', () => {
    const config: ChroniclerConfig = {
      ...DEFAULT_CONFIG,
      pipeline: { ...DEFAULT_CONFIG.pipeline, segmentTokenBudget: 800 },
      remote: { ...DEFAULT_CONFIG.remote, tokenQuota: 20000, maxCostUsd: 1.5 },
      campaign: { ...DEFAULT_CONFIG.campaign, sessionName: 'Session 12', party: ['Kael', 'Mira'] },
    };
    const lines = formatConfigDisplay(config).split('\n');

    expect(lines).toContain('  Segment budget: 800');
    expect(lines).toContain('  Token quota: 20000');
    expect(lines).toContain('  Cost cap: $1.50');
    expect(lines).toContain('  Session: Session 12');
    expect(lines).toContain('  Party: Kael, Mira');
    expect(formatConfigDisplay(DEFAULT_CONFIG)).not.toContain('Campaign:');
  });
});
