/**
 * Tracking quota authority for testing
 */

import type { QuotaAuthority } from '@chronicler/core';

export interface QuotaRequest {
  backendName: string;
  estimatedTokens: number;
  allowed: boolean;
}

export interface TrackingQuotaConfig {
  /** Fixed answer, or a decision per request (1-based request number) */
  allow?: boolean | ((backendName: string, estimatedTokens: number, request: number) => boolean);
  /** Throw instead of answering */
  shouldThrow?: boolean;
}

export interface TrackingQuota extends QuotaAuthority {
  readonly requests: QuotaRequest[];
}

/**
 * Quota authority that records every request
 */
export function createTrackingQuota(config: TrackingQuotaConfig = {}): TrackingQuota {
  const { allow = true, shouldThrow = false } = config;
  const requests: QuotaRequest[] = [];

  return {
    requests,
    estimateAndReserve(backendName: string, estimatedTokens: number): boolean {
      if (shouldThrow) {
        throw new Error('quota service unreachable');
      }
      const allowed =
        typeof allow === 'function' ? allow(backendName, estimatedTokens, requests.length + 1) : allow;
      requests.push({ backendName, estimatedTokens, allowed });
      return allowed;
    },
  };
}
