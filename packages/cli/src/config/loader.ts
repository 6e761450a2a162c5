/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { ChroniclerConfig, CliOptions } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialChroniclerConfig } from './validation.js';

type ConfigSection = keyof ChroniclerConfig;

/**
 * How an environment variable's text becomes a config value
 */
type EnvValueType = 'string' | 'number' | 'list';

interface EnvBinding {
  section: ConfigSection;
  key: string;
  type: EnvValueType;
}

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  // API Keys
  OPENAI_API_KEY: { section: 'remote', key: 'apiKey', type: 'string' },

  // Pipeline
  CHRONICLER_BACKENDS: { section: 'pipeline', key: 'backends', type: 'list' },
  CHRONICLER_SEGMENT_BUDGET: { section: 'pipeline', key: 'segmentTokenBudget', type: 'number' },

  // Remote
  CHRONICLER_REMOTE_MODEL: { section: 'remote', key: 'model', type: 'string' },
  CHRONICLER_REMOTE_BASE_URL: { section: 'remote', key: 'baseUrl', type: 'string' },
  CHRONICLER_REMOTE_TIMEOUT_MS: { section: 'remote', key: 'timeoutMs', type: 'number' },
  CHRONICLER_TOKEN_QUOTA: { section: 'remote', key: 'tokenQuota', type: 'number' },
  CHRONICLER_MAX_COST_USD: { section: 'remote', key: 'maxCostUsd', type: 'number' },

  // Local
  CHRONICLER_LOCAL_URL: { section: 'local', key: 'baseUrl', type: 'string' },
  CHRONICLER_LOCAL_MODEL: { section: 'local', key: 'model', type: 'string' },
  CHRONICLER_LOCAL_TIMEOUT_MS: { section: 'local', key: 'timeoutMs', type: 'number' },

  // Campaign
  CHRONICLER_SETTING: { section: 'campaign', key: 'setting', type: 'string' },

  // Output
  CHRONICLER_FORMAT: { section: 'output', key: 'format', type: 'string' },
};

/**
 * Search places for the config file
 */
export const CONFIG_SEARCH_PLACES = [
  'package.json',
  '.chroniclerrc',
  '.chroniclerrc.json',
  '.chroniclerrc.yaml',
  '.chroniclerrc.yml',
  '.chroniclerrc.js',
  '.chroniclerrc.cjs',
  'chronicler.config.js',
  'chronicler.config.cjs',
];

/**
 * Raw values for one layer, before validation
 */
type RawLayer = Partial<Record<ConfigSection, Record<string, unknown>>>;

function setLayerValue(layer: RawLayer, section: ConfigSection, key: string, value: unknown): void {
  const existing = layer[section] ?? {};
  existing[key] = value;
  layer[section] = existing;
}

/**
 * Deep merge two objects
 * Source values override target values; arrays are replaced
 */
function deepMerge(target: ChroniclerConfig, source: PartialChroniclerConfig): ChroniclerConfig {
  return {
    pipeline: { ...target.pipeline, ...source.pipeline },
    remote: { ...target.remote, ...source.remote },
    local: { ...target.local, ...source.local },
    offline: { ...target.offline, ...source.offline },
    campaign: { ...target.campaign, ...source.campaign },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Parse environment variable value based on expected type
 * (a number that does not parse is kept as text so validation names it)
 */
function parseEnvValue(value: string, type: EnvValueType): unknown {
  switch (type) {
    case 'number': {
      const num = Number(value);
      return Number.isFinite(num) ? num : value;
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialChroniclerConfig {
  const layer: RawLayer = {};

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setLayerValue(layer, binding.section, binding.key, parseEnvValue(value, binding.type));
    }
  }

  return validatePartialConfig(layer, 'environment');
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * @param configPath Explicit file; otherwise search upward from searchFrom
 * @throws ConfigError when the file cannot be read or parsed
 */
export async function loadConfigFile(
  configPath?: string,
  searchFrom?: string,
): Promise<PartialChroniclerConfig | null> {
  const explorer = cosmiconfig('chronicler', { searchPlaces: CONFIG_SEARCH_PLACES });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      configPath ? `Cannot read config file: ${configPath}` : 'Cannot read config file',
      error instanceof Error ? error.message : String(error),
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config, result.filepath);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialChroniclerConfig {
  const layer: RawLayer = {};

  if (options.backends !== undefined) setLayerValue(layer, 'pipeline', 'backends', options.backends);
  if (options.budget !== undefined) setLayerValue(layer, 'pipeline', 'segmentTokenBudget', options.budget);
  if (options.model !== undefined) setLayerValue(layer, 'remote', 'model', options.model);
  if (options.localModel !== undefined) setLayerValue(layer, 'local', 'model', options.localModel);
  if (options.sessionName !== undefined) setLayerValue(layer, 'campaign', 'sessionName', options.sessionName);
  if (options.setting !== undefined) setLayerValue(layer, 'campaign', 'setting', options.setting);
  if (options.format !== undefined) setLayerValue(layer, 'output', 'format', options.format);

  return validatePartialConfig(layer, 'command line');
}

/**
 * Where loadConfig reads from; defaults to the process
 */
export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts in */
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(cliOptions: CliOptions, sources: ConfigSources = {}): Promise<ChroniclerConfig> {
  // 1. Start with defaults
  let config = structuredClone(DEFAULT_CONFIG);

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config, sources.cwd);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  // 3. Apply environment variables
  config = deepMerge(config, loadEnvConfig(sources.env));

  // 4. Apply CLI arguments (highest priority)
  config = deepMerge(config, mapCliToConfig(cliOptions));

  // 5. Validate final config
  return validateConfig(config);
}

/**
 * Format configuration for display, with the API key masked
 */
export function formatConfig(config: ChroniclerConfig): string {
  const shown = config.remote.apiKey ? { ...config, remote: { ...config.remote, apiKey: '********' } } : config;
  return JSON.stringify(shown, null, 2);
}
