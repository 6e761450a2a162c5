import { describe, it, expect } from 'vitest';

import {
  dedupeBoundaries,
  detectBoundaries,
  synthesizeBoundaries,
} from '../segmentation/boundary-detector.js';
import type { Boundary } from '../types/transcript.js';

describe('Boundary Detector', () => {
  describe('marker detection', () => {
    it('should find markers at line starts with their line offset', () => {
      const text = ['Opening chatter.', '**Session 1**', 'The party gathers.', '## Chapter Two', 'More talk.'].join(
        '\n',
      );

      const boundaries = detectBoundaries(text, { minBoundaryDistance: 0 });

      expect(boundaries).toEqual([
        { offset: 17, kind: 'part', priority: 4, label: '**Session 1' },
        { offset: 50, kind: 'chapter', priority: 1, label: '## Chapter Two' },
      ]);
    });

    it('should treat a horizontal rule as a scene break', () => {
      const text = 'First scene.\n---\nSecond scene.';

      const boundaries = detectBoundaries(text, { minBoundaryDistance: 0 });

      expect(boundaries).toHaveLength(1);
      expect(boundaries[0]!.kind).toBe('scene');
      expect(boundaries[0]!.offset).toBe(13);
    });

    it('should recognize roman numeral parts', () => {
      const boundaries = detectBoundaries('Intro\nPart IV\nBody', { minBoundaryDistance: 0 });

      expect(boundaries.map((b) => b.kind)).toEqual(['part']);
      expect(boundaries[0]!.offset).toBe(6);
    });

    it('should ignore marker words in the middle of a line', () => {
      const boundaries = detectBoundaries('We talked about the last session 3 times.', {
        minBoundaryDistance: 0,
      });

      expect(boundaries).toEqual([]);
    });
  });

  describe('deduplication', () => {
    it('should keep the higher priority boundary when two are too close', () => {
      const text =
        'Combat\n' + 'x'.repeat(100) + '\n**Part 2**\n' + 'y'.repeat(1000) + '\nScene: The Gate\n' + 'z'.repeat(10);

      const boundaries = detectBoundaries(text);

      expect(boundaries.map((b) => [b.offset, b.kind])).toEqual([
        [108, 'part'],
        [1120, 'scene'],
      ]);
    });

    it('should prefer the earlier offset on equal priority', () => {
      const candidates: Boundary[] = [
        { offset: 300, kind: 'scene', priority: 2, label: 'b' },
        { offset: 100, kind: 'scene', priority: 2, label: 'a' },
      ];

      expect(dedupeBoundaries(candidates, 500).map((b) => b.label)).toEqual(['a']);
    });

    it('should collapse identical offsets even with zero distance', () => {
      const candidates: Boundary[] = [
        { offset: 40, kind: 'chapter', priority: 1, label: 'chapter' },
        { offset: 40, kind: 'part', priority: 4, label: 'part' },
      ];

      expect(dedupeBoundaries(candidates, 0)).toEqual([candidates[1]]);
    });
  });

  describe('fallback division', () => {
    it('should place synthetic boundaries on the nearest sentence end', () => {
      const text = 'The bell rang once more. '.repeat(40);

      const boundaries = detectBoundaries(text, { fallbackSpanChars: 400 });

      expect(boundaries).toEqual([
        { offset: 325, kind: 'synthetic', priority: 0, label: '' },
        { offset: 675, kind: 'synthetic', priority: 0, label: '' },
      ]);
      for (const boundary of boundaries) {
        expect(text.slice(0, boundary.offset).endsWith('. ')).toBe(true);
      }
    });

    it('should fall back to the nearest whitespace without sentence ends', () => {
      const text = 'word '.repeat(200);

      expect(synthesizeBoundaries(text, 400).map((b) => b.offset)).toEqual([335, 665]);
    });

    it('should not divide text that already fits one span', () => {
      expect(synthesizeBoundaries('Short text. Still short.', 400)).toEqual([]);
    });

    it('should return nothing without markers when no fallback span is given', () => {
      expect(detectBoundaries('The bell rang once more. '.repeat(40))).toEqual([]);
    });

    it('should not synthesize boundaries when markers exist', () => {
      const text = 'Intro.\n**Session 1**\n' + 'The bell rang once more. '.repeat(40);

      const boundaries = detectBoundaries(text, { fallbackSpanChars: 100 });

      expect(boundaries.map((b) => b.kind)).toEqual(['part']);
    });
  });
});
