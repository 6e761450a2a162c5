/**
 * Model pricing data for cost estimation
 *
 * Prices are per 1M tokens (in dollars)
 */

/**
 * Pricing for a model
 */
export interface ModelPricing {
  /** Price per 1M input tokens */
  input: number;
  /** Price per 1M output tokens */
  output: number;
}

/**
 * Model pricing table, longest matching prefix wins
 */
export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  'gpt-4o': { input: 2.5, output: 10.0 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4.1': { input: 2.0, output: 8.0 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4.1-nano': { input: 0.1, output: 0.4 },
  'gpt-4-turbo': { input: 10.0, output: 30.0 },
  'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
  'o3-mini': { input: 1.1, output: 4.4 },
};

/**
 * Default pricing for unknown models (use conservative estimate)
 */
export const DEFAULT_PRICING: ModelPricing = {
  input: 10.0,
  output: 30.0,
};

/**
 * Get pricing for a model
 * Falls back to default pricing if model is unknown
 */
export function getModelPricing(
  model: string,
  onWarning: (message: string) => void = console.warn,
): ModelPricing {
  const exact = MODEL_PRICING[model];
  if (exact) {
    return exact;
  }

  // Dated snapshots such as gpt-4o-2024-08-06
  const family = Object.keys(MODEL_PRICING)
    .filter((key) => model.startsWith(key))
    .sort((a, b) => b.length - a.length)[0];
  const familyPricing = family !== undefined ? MODEL_PRICING[family] : undefined;
  if (familyPricing) {
    return familyPricing;
  }

  onWarning(`Unknown model "${model}", using default pricing`);
  return DEFAULT_PRICING;
}

/**
 * Calculate cost in dollars from token counts
 */
export function calculateCost(
  pricing: ModelPricing,
  inputTokens: number,
  outputTokens: number,
): { inputCost: number; outputCost: number; totalCost: number } {
  const inputCost = (inputTokens / 1_000_000) * pricing.input;
  const outputCost = (outputTokens / 1_000_000) * pricing.output;

  return {
    inputCost,
    outputCost,
    totalCost: inputCost + outputCost,
  };
}

/**
 * Format cost for display
 */
export function formatCost(cost: number, currency: string = '$', decimals: number = 4): string {
  if (cost > 0 && cost < 0.0001) {
    return `< ${currency}0.0001`;
  }
  return `${currency}${cost.toFixed(decimals)}`;
}
