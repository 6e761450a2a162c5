/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { ChroniclerConfig } from './schema.js';

/**
 * Names the backend registry knows
 */
export const backendNameSchema = z.enum(['remote', 'local', 'offline']);

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['markdown', 'json']);

/**
 * Ratio schema (exclusive of 0 and 1)
 */
const shareSchema = z.number().gt(0).lt(1);

/**
 * Token budget schema
 */
const tokenBudgetSchema = z.number().int().min(100);

/**
 * Per-call timeout schema (ms)
 */
const timeoutSchema = z.number().int().min(100).max(600_000);

const temperatureSchema = z.number().min(0).max(2);

export const pipelineConfigSchema = z.object({
  backends: z.array(backendNameSchema).min(1, 'at least one backend is required'),
  segmentTokenBudget: tokenBudgetSchema.optional(),
  minBoundaryDistance: z.number().int().min(0),
  contextShare: shareSchema,
  summaryMaxChars: z.number().int().min(100),
  closingPlotThreads: z.number().int().min(0).max(20),
});

export const remoteConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1),
  temperature: temperatureSchema,
  timeoutMs: timeoutSchema,
  maxTokensPerSegment: tokenBudgetSchema,
  tokenQuota: z.number().int().positive().optional(),
  maxCostUsd: z.number().positive().optional(),
});

export const localConfigSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  temperature: temperatureSchema,
  timeoutMs: timeoutSchema,
  maxTokensPerSegment: tokenBudgetSchema,
});

export const offlineConfigSchema = z.object({
  timeoutMs: timeoutSchema,
  maxTokensPerSegment: tokenBudgetSchema,
});

export const campaignConfigSchema = z.object({
  sessionName: z.string().min(1).optional(),
  setting: z.string().min(1).optional(),
  party: z.array(z.string().min(1)),
  previousEvents: z.array(z.string().min(1)),
  campaignNotes: z.string().min(1).optional(),
});

export const outputConfigSchema = z.object({
  format: outputFormatSchema,
  includeStats: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  pipeline: pipelineConfigSchema,
  remote: remoteConfigSchema,
  local: localConfigSchema,
  offline: offlineConfigSchema,
  campaign: campaignConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (config files, environment, flags)
 */
export const partialConfigSchema = z.object({
  pipeline: pipelineConfigSchema.partial().optional(),
  remote: remoteConfigSchema.partial().optional(),
  local: localConfigSchema.partial().optional(),
  offline: offlineConfigSchema.partial().optional(),
  campaign: campaignConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

/**
 * One configuration layer
 */
export type PartialChroniclerConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    public readonly source?: string,
  ) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed${source ? ` (${source})` : ''}:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      `Configuration validation failed${this.source ? ` (${this.source})` : ''}:`,
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError, source?: string): ConfigValidationError {
  const errors = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new ConfigValidationError(errors, source);
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): ChroniclerConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate one configuration layer
 * @param source Where the layer came from, for the error message
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown, source?: string): PartialChroniclerConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error, source);
  }
  return result.data;
}
