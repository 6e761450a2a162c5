/**
 * TimeEstimator unit tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { TimeEstimator } from '../progress/time-estimator.js';

describe('TimeEstimator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('record', () => {
    it('should record segment samples', () => {
      const estimator = new TimeEstimator();

      estimator.record(0);
      expect(estimator.getSampleCount()).toBe(1);

      estimator.record(1);
      expect(estimator.getSampleCount()).toBe(2);
    });

    it('should limit samples to window size', () => {
      const estimator = new TimeEstimator(3);

      estimator.record(0);
      estimator.record(1);
      estimator.record(2);
      expect(estimator.getSampleCount()).toBe(3);

      estimator.record(3);
      expect(estimator.getSampleCount()).toBe(3);
    });
  });

  describe('estimateRemaining', () => {
    it('should return null with a single sample', () => {
      const estimator = new TimeEstimator();

      estimator.record(0);
      expect(estimator.estimateRemaining(0, 10)).toBeNull();
    });

    it('should estimate from the time per segment', () => {
      const estimator = new TimeEstimator();

      vi.setSystemTime(0);
      estimator.record(0);

      vi.setSystemTime(4000);
      estimator.record(2); // 2s per segment

      expect(estimator.estimateRemaining(2, 10)).toBe(16000);
    });

    it('should return 0 when all segments are done', () => {
      const estimator = new TimeEstimator();

      vi.setSystemTime(0);
      estimator.record(0);

      vi.setSystemTime(1000);
      estimator.record(5);

      expect(estimator.estimateRemaining(5, 5)).toBe(0);
    });

    it('should return null if no segment finished between samples', () => {
      const estimator = new TimeEstimator();

      vi.setSystemTime(0);
      estimator.record(3);

      vi.setSystemTime(1000);
      estimator.record(3);

      expect(estimator.estimateRemaining(3, 10)).toBeNull();
    });

    it('should use only the recent window after a slowdown', () => {
      const estimator = new TimeEstimator(3);

      vi.setSystemTime(0);
      estimator.record(0);
      vi.setSystemTime(100);
      estimator.record(1);

      // Failover to a slower backend
      vi.setSystemTime(2100);
      estimator.record(2);
      vi.setSystemTime(4100);
      estimator.record(3);

      // Window holds segments 1..3: 4000ms for 2 segments
      expect(estimator.estimateRemaining(3, 5)).toBe(4000);
    });
  });

  describe('reset', () => {
    it('should return null after reset', () => {
      const estimator = new TimeEstimator();

      vi.setSystemTime(0);
      estimator.record(0);

      vi.setSystemTime(1000);
      estimator.record(2);

      estimator.reset();
      expect(estimator.getSampleCount()).toBe(0);
      expect(estimator.estimateRemaining(2, 4)).toBeNull();
    });
  });
});
