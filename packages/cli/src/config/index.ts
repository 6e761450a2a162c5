/**
 * Configuration module exports
 */

// Schema types
export type {
  OutputFormat,
  PipelineConfigSchema,
  RemoteConfigSchema,
  LocalConfigSchema,
  OfflineConfigSchema,
  CampaignConfigSchema,
  OutputConfigSchema,
  ChroniclerConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_REMOTE_SETTINGS,
  DEFAULT_LOCAL_SETTINGS,
  DEFAULT_OFFLINE_SETTINGS,
  DEFAULT_CAMPAIGN_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  backendNameSchema,
  outputFormatSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialChroniclerConfig,
} from './validation.js';

// Loader
export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mapCliToConfig,
  formatConfig,
  CONFIG_SEARCH_PLACES,
  type ConfigSources,
} from './loader.js';
