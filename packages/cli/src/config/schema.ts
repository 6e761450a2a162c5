/**
 * Configuration schema types for the Chronicler CLI
 */

/**
 * Story output format
 */
export type OutputFormat = 'markdown' | 'json';

/**
 * Pipeline configuration
 */
export interface PipelineConfigSchema {
  /** Backend preference list, tried in order on each segment */
  backends: string[];
  /** Segment budget in tokens (default: smallest backend budget) */
  segmentTokenBudget?: number;
  /** Minimum characters between two detected boundaries */
  minBoundaryDistance: number;
  /** Share of a backend's budget given to the context digest (0.0-1.0) */
  contextShare: number;
  /** Running summary size that triggers compaction */
  summaryMaxChars: number;
  /** Plot threads named in the closing paragraph */
  closingPlotThreads: number;
}

/**
 * Remote backend configuration
 */
export interface RemoteConfigSchema {
  /** OpenAI API key (from env var) */
  apiKey?: string;
  /** Alternative API base URL */
  baseUrl?: string;
  model: string;
  /** Temperature for generation (0.0-2.0) */
  temperature: number;
  timeoutMs: number;
  maxTokensPerSegment: number;
  /** Token cap for the whole run */
  tokenQuota?: number;
  /** Estimated cost cap for the whole run, in dollars */
  maxCostUsd?: number;
}

/**
 * Local backend configuration
 */
export interface LocalConfigSchema {
  /** OpenAI-compatible endpoint of the Ollama daemon */
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxTokensPerSegment: number;
}

/**
 * Offline backend configuration
 */
export interface OfflineConfigSchema {
  timeoutMs: number;
  maxTokensPerSegment: number;
}

/**
 * Campaign context handed to prompts and the digest
 */
export interface CampaignConfigSchema {
  sessionName?: string;
  setting?: string;
  party: string[];
  previousEvents: string[];
  campaignNotes?: string;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  format: OutputFormat;
  /** Append run statistics to markdown output */
  includeStats: boolean;
}

/**
 * Complete Chronicler configuration
 */
export interface ChroniclerConfig {
  pipeline: PipelineConfigSchema;
  remote: RemoteConfigSchema;
  local: LocalConfigSchema;
  offline: OfflineConfigSchema;
  campaign: CampaignConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Input transcript path (undefined = stdin) */
  input?: string;
  /** Output file path (undefined = stdout) */
  output?: string;
  /** Path to config file */
  config?: string;
  /** Backend preference list */
  backends?: string[];
  /** Segment budget override in tokens */
  budget?: number;
  /** Remote model */
  model?: string;
  /** Local model */
  localModel?: string;
  /** Output format, validated with the rest of the configuration */
  format?: string;
  sessionName?: string;
  setting?: string;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Check backends and paths without weaving */
  dryRun?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Report every segment and backend notice */
  verbose?: boolean;
}
