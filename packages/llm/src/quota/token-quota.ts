/**
 * In-process quota authority
 *
 * Keeps a per-backend token cap and an estimated-cost ledger. Reservations
 * are never released: an estimate that turns out high still counts.
 */

import type { QuotaAuthority } from '@chronicler/core';

import { calculateCost, getModelPricing } from '../cost/pricing.js';

/**
 * Share of an estimate that is expected output.
 * The narrator estimates segment + digest in and about one segment out.
 */
export const OUTPUT_SHARE = 1 / 3;

export interface TokenQuotaConfig {
  /** Token cap per backend name; backends without one are never refused on tokens */
  limits?: Record<string, number>;
  /** Model per backend name, used for pricing */
  models?: Record<string, string>;
  /** Refuse any reservation that would take the estimated total past this */
  maxCostUsd?: number;
  onWarning?: (message: string) => void;
}

/**
 * One reservation request
 */
export interface QuotaLedgerEntry {
  backendName: string;
  estimatedTokens: number;
  estimatedCostUsd: number;
  granted: boolean;
}

export class TokenQuotaAuthority implements QuotaAuthority {
  private readonly config: TokenQuotaConfig;
  private readonly reservedTokens = new Map<string, number>();
  private readonly ledger: QuotaLedgerEntry[] = [];
  private spentUsd = 0;

  constructor(config: TokenQuotaConfig = {}) {
    this.config = config;
  }

  estimateAndReserve(backendName: string, estimatedTokens: number): boolean {
    const tokens = Math.max(0, Math.ceil(estimatedTokens));
    const cost = this.estimateCost(backendName, tokens);
    const limit = this.config.limits?.[backendName];
    const reserved = this.reserved(backendName);

    const withinTokens = limit === undefined || reserved + tokens <= limit;
    const withinCost = this.config.maxCostUsd === undefined || this.spentUsd + cost <= this.config.maxCostUsd;
    const granted = withinTokens && withinCost;

    if (granted) {
      this.reservedTokens.set(backendName, reserved + tokens);
      this.spentUsd += cost;
    }
    this.ledger.push({ backendName, estimatedTokens: tokens, estimatedCostUsd: cost, granted });
    return granted;
  }

  /**
   * Tokens reserved so far for a backend
   */
  reserved(backendName: string): number {
    return this.reservedTokens.get(backendName) ?? 0;
  }

  /**
   * Tokens left under a backend's cap, undefined when it has none
   */
  remaining(backendName: string): number | undefined {
    const limit = this.config.limits?.[backendName];
    return limit === undefined ? undefined : Math.max(0, limit - this.reserved(backendName));
  }

  /**
   * Estimated cost of every granted reservation
   */
  get estimatedCostUsd(): number {
    return this.spentUsd;
  }

  getLedger(): readonly QuotaLedgerEntry[] {
    return this.ledger;
  }

  private estimateCost(backendName: string, tokens: number): number {
    const model = this.config.models?.[backendName];
    if (!model) return 0;
    const output = Math.round(tokens * OUTPUT_SHARE);
    return calculateCost(getModelPricing(model, this.config.onWarning), tokens - output, output).totalCost;
  }
}

/**
 * Create a token quota authority
 */
export function createTokenQuota(config: TokenQuotaConfig = {}): TokenQuotaAuthority {
  return new TokenQuotaAuthority(config);
}
