/**
 * Default configuration values
 */

import {
  DEFAULT_CONTEXT_SHARE,
  DEFAULT_MIN_BOUNDARY_DISTANCE,
  DEFAULT_SESSION_MEMORY_CONFIG,
  DEFAULT_SYNTHESIZER_CONFIG,
} from '@chronicler/core';
import { DEFAULT_LOCAL_CONFIG, DEFAULT_OFFLINE_CONFIG, DEFAULT_REMOTE_CONFIG } from '@chronicler/llm';

import type {
  CampaignConfigSchema,
  ChroniclerConfig,
  LocalConfigSchema,
  OfflineConfigSchema,
  OutputConfigSchema,
  PipelineConfigSchema,
  RemoteConfigSchema,
} from './schema.js';

/**
 * Default pipeline configuration: hosted model first, then the local
 * daemon, then template narration so a run can always finish
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfigSchema = {
  backends: ['remote', 'local', 'offline'],
  minBoundaryDistance: DEFAULT_MIN_BOUNDARY_DISTANCE,
  contextShare: DEFAULT_CONTEXT_SHARE,
  summaryMaxChars: DEFAULT_SESSION_MEMORY_CONFIG.summaryMaxChars,
  closingPlotThreads: DEFAULT_SYNTHESIZER_CONFIG.closingPlotThreads,
};

export const DEFAULT_REMOTE_SETTINGS: RemoteConfigSchema = {
  model: DEFAULT_REMOTE_CONFIG.model,
  temperature: DEFAULT_REMOTE_CONFIG.temperature,
  timeoutMs: DEFAULT_REMOTE_CONFIG.timeoutMs,
  maxTokensPerSegment: DEFAULT_REMOTE_CONFIG.maxTokensPerSegment,
};

export const DEFAULT_LOCAL_SETTINGS: LocalConfigSchema = {
  baseUrl: DEFAULT_LOCAL_CONFIG.baseUrl,
  model: DEFAULT_LOCAL_CONFIG.model,
  temperature: DEFAULT_LOCAL_CONFIG.temperature,
  timeoutMs: DEFAULT_LOCAL_CONFIG.timeoutMs,
  maxTokensPerSegment: DEFAULT_LOCAL_CONFIG.maxTokensPerSegment,
};

export const DEFAULT_OFFLINE_SETTINGS: OfflineConfigSchema = {
  timeoutMs: DEFAULT_OFFLINE_CONFIG.timeoutMs,
  maxTokensPerSegment: DEFAULT_OFFLINE_CONFIG.maxTokensPerSegment,
};

export const DEFAULT_CAMPAIGN_CONFIG: CampaignConfigSchema = {
  party: [],
  previousEvents: [],
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  format: 'markdown',
  includeStats: false,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ChroniclerConfig = {
  pipeline: DEFAULT_PIPELINE_CONFIG,
  remote: DEFAULT_REMOTE_SETTINGS,
  local: DEFAULT_LOCAL_SETTINGS,
  offline: DEFAULT_OFFLINE_SETTINGS,
  campaign: DEFAULT_CAMPAIGN_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
