/**
 * Remaining-time estimate for the narration phase
 *
 * Segments take roughly the same time on one backend but very different
 * times across a failover, so only a short window of recent completions
 * is used.
 */

interface SegmentSample {
  timestamp: number;
  segmentsDone: number;
}

export class TimeEstimator {
  private samples: SegmentSample[] = [];
  private readonly windowSize: number;

  /**
   * @param windowSize Completions kept for the rate (default: 5)
   */
  constructor(windowSize: number = 5) {
    this.windowSize = windowSize;
  }

  /**
   * Record how many segments are done now
   */
  record(segmentsDone: number): void {
    this.samples.push({ timestamp: Date.now(), segmentsDone });

    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  /**
   * Milliseconds until all segments are done, or null without a usable rate
   */
  estimateRemaining(segmentsDone: number, totalSegments: number): number | null {
    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    if (!first || !last || first === last) {
      return null;
    }

    const timeDelta = last.timestamp - first.timestamp;
    const segmentDelta = last.segmentsDone - first.segmentsDone;
    if (segmentDelta <= 0 || timeDelta <= 0) {
      return null;
    }

    const remaining = totalSegments - segmentsDone;
    if (remaining <= 0) {
      return 0;
    }

    return Math.round(remaining * (timeDelta / segmentDelta));
  }

  /**
   * Forget all samples (new run)
   */
  reset(): void {
    this.samples = [];
  }

  getSampleCount(): number {
    return this.samples.length;
  }
}
