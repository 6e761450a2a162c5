/**
 * Tests for the token quota authority and model pricing
 */

import { describe, it, expect, vi } from 'vitest';

import {
  DEFAULT_PRICING,
  MODEL_PRICING,
  calculateCost,
  formatCost,
  getModelPricing,
} from '../cost/pricing.js';
import { TokenQuotaAuthority, createTokenQuota } from '../quota/token-quota.js';

describe('Model Pricing', () => {
  describe('getModelPricing', () => {
    it('should return exact match pricing', () => {
      const pricing = getModelPricing('gpt-4o');
      expect(pricing.input).toBe(2.5);
      expect(pricing.output).toBe(10.0);
    });

    it('should prefer the longest matching family for dated snapshots', () => {
      const onWarning = vi.fn();
      expect(getModelPricing('gpt-4o-mini-2024-07-18', onWarning)).toBe(MODEL_PRICING['gpt-4o-mini']);
      expect(getModelPricing('gpt-4o-2024-08-06', onWarning)).toBe(MODEL_PRICING['gpt-4o']);
      expect(onWarning).not.toHaveBeenCalled();
    });

    it('should return default pricing for unknown models', () => {
      const onWarning = vi.fn();

      expect(getModelPricing('mystery-model', onWarning)).toEqual(DEFAULT_PRICING);
      expect(onWarning).toHaveBeenCalledWith('Unknown model "mystery-model", using default pricing');
    });
  });

  describe('calculateCost', () => {
    it('should price input and output separately', () => {
      const cost = calculateCost({ input: 2.0, output: 8.0 }, 500_000, 250_000);

      expect(cost.inputCost).toBeCloseTo(1.0);
      expect(cost.outputCost).toBeCloseTo(2.0);
      expect(cost.totalCost).toBeCloseTo(3.0);
    });
  });

  describe('formatCost', () => {
    it('should format with four decimals', () => {
      expect(formatCost(0.0009)).toBe('$0.0009');
      expect(formatCost(0)).toBe('$0.0000');
      expect(formatCost(1.5, '€', 2)).toBe('€1.50');
    });

    it('should show tiny amounts as a bound', () => {
      expect(formatCost(0.00001)).toBe('< $0.0001');
    });
  });
});

describe('TokenQuotaAuthority', () => {
  it('should grant reservations until the cap is reached', () => {
    const quota = createTokenQuota({ limits: { remote: 100 } });

    expect(quota.estimateAndReserve('remote', 60)).toBe(true);
    expect(quota.estimateAndReserve('remote', 50)).toBe(false);
    expect(quota.estimateAndReserve('remote', 40)).toBe(true);

    expect(quota.reserved('remote')).toBe(100);
    expect(quota.remaining('remote')).toBe(0);
    expect(quota.getLedger().map((entry) => entry.granted)).toEqual([true, false, true]);
  });

  it('should never refuse a backend without a cap', () => {
    const quota = new TokenQuotaAuthority({ limits: { remote: 10 } });

    expect(quota.estimateAndReserve('local', 1_000_000)).toBe(true);
    expect(quota.remaining('local')).toBeUndefined();
  });

  it('should round fractional estimates up', () => {
    const quota = new TokenQuotaAuthority();

    quota.estimateAndReserve('remote', 12.2);

    expect(quota.reserved('remote')).toBe(13);
    expect(quota.getLedger()[0]?.estimatedTokens).toBe(13);
  });

  it('should price a third of the estimate as output', () => {
    const quota = new TokenQuotaAuthority({ models: { remote: 'gpt-4o-mini' } });

    quota.estimateAndReserve('remote', 3000);

    // 2000 in at 0.15/M plus 1000 out at 0.6/M
    expect(quota.estimatedCostUsd).toBeCloseTo(0.0009, 10);
  });

  it('should refuse a reservation that would pass the cost cap', () => {
    const quota = new TokenQuotaAuthority({ models: { remote: 'gpt-4o-mini' }, maxCostUsd: 0.001 });

    expect(quota.estimateAndReserve('remote', 3000)).toBe(true);
    expect(quota.estimateAndReserve('remote', 3000)).toBe(false);
    expect(quota.reserved('remote')).toBe(3000);
    expect(quota.estimatedCostUsd).toBeCloseTo(0.0009, 10);
  });

  it('should treat backends without a model as free', () => {
    const quota = new TokenQuotaAuthority({ maxCostUsd: 0 });

    expect(quota.estimateAndReserve('local', 5000)).toBe(true);
    expect(quota.getLedger()[0]?.estimatedCostUsd).toBe(0);
  });
});
