/**
 * Circuit breaker for model endpoints
 */

import type { CircuitBreakerConfig } from '../config/llm-config.js';
import { CircuitOpenError } from '../errors.js';

import type { CircuitState } from './types.js';

export type CircuitListener = (state: CircuitState, previous: CircuitState) => void;

/**
 * Stops calling an endpoint that keeps failing
 *
 * States:
 * - closed: requests pass through
 * - open: requests fail immediately with CircuitOpenError
 * - half-open: after resetTimeoutMs, requests pass again until one fails
 *   (back to open) or successThreshold succeed (back to closed)
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private openedAt: Date | undefined;

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly onStateChange?: CircuitListener,
  ) {}

  getState(): CircuitState {
    this.checkReset();
    return this.state;
  }

  /**
   * Consecutive failures since the last success
   */
  getFailureCount(): number {
    return this.failures;
  }

  /**
   * Run an operation unless the circuit is open
   *
   * @throws CircuitOpenError while open
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.checkReset();

    if (this.state === 'open') {
      throw new CircuitOpenError(this.openedAt ?? new Date(), this.remainingResetTime());
    }

    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  recordSuccess(): void {
    this.failures = 0;

    if (this.state === 'half-open') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.moveTo('closed');
      }
    }
  }

  recordFailure(): void {
    this.failures++;
    this.successes = 0;

    if (this.state === 'half-open' || this.failures >= this.config.failureThreshold) {
      this.moveTo('open');
    }
  }

  reset(): void {
    this.moveTo('closed');
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.successes = 0;

    if (next === 'open') {
      this.openedAt = new Date();
    } else if (next === 'closed') {
      this.failures = 0;
      this.openedAt = undefined;
    }

    if (previous !== next) {
      this.onStateChange?.(next, previous);
    }
  }

  private checkReset(): void {
    if (this.state === 'open' && this.remainingResetTime() === 0) {
      this.moveTo('half-open');
    }
  }

  private remainingResetTime(): number {
    if (!this.openedAt) return 0;
    const elapsed = Date.now() - this.openedAt.getTime();
    return Math.max(0, this.config.resetTimeoutMs - elapsed);
  }
}
