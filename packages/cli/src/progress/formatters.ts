/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { ChroniclerConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: ChroniclerConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  // Pipeline
  lines.push(chalk.dim('Pipeline:'));
  lines.push(`  Backends: ${config.pipeline.backends.join(' -> ')}`);
  lines.push(`  Segment budget: ${config.pipeline.segmentTokenBudget ?? 'smallest backend budget'}`);
  lines.push(`  Min boundary distance: ${config.pipeline.minBoundaryDistance}`);
  lines.push(`  Context share: ${config.pipeline.contextShare}`);
  lines.push('');

  // Remote
  lines.push(chalk.dim('Remote:'));
  lines.push(`  Model: ${config.remote.model}`);
  lines.push(`  API key: ${config.remote.apiKey ? chalk.green('set') : chalk.yellow('not set')}`);
  if (config.remote.baseUrl) {
    lines.push(`  Base URL: ${config.remote.baseUrl}`);
  }
  if (config.remote.tokenQuota !== undefined) {
    lines.push(`  Token quota: ${config.remote.tokenQuota}`);
  }
  if (config.remote.maxCostUsd !== undefined) {
    lines.push(`  Cost cap: $${config.remote.maxCostUsd.toFixed(2)}`);
  }
  lines.push('');

  // Local
  lines.push(chalk.dim('Local:'));
  lines.push(`  Endpoint: ${config.local.baseUrl}`);
  lines.push(`  Model: ${config.local.model}`);
  lines.push('');

  // Campaign
  const { campaign } = config;
  if (campaign.sessionName || campaign.setting || campaign.party.length > 0) {
    lines.push(chalk.dim('Campaign:'));
    if (campaign.sessionName) lines.push(`  Session: ${campaign.sessionName}`);
    if (campaign.setting) lines.push(`  Setting: ${campaign.setting}`);
    if (campaign.party.length > 0) lines.push(`  Party: ${campaign.party.join(', ')}`);
    lines.push('');
  }

  // Output
  lines.push(chalk.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Include stats: ${config.output.includeStats}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format estimated time remaining in human-readable format
 * @param ms Milliseconds remaining, or null if unknown
 * @returns Formatted string like "~2m 30s" or empty string if null
 */
export function formatEta(ms: number | null): string {
  if (ms === null) {
    return '';
  }

  if (ms <= 0) {
    return 'almost done';
  }

  if (ms < 1000) {
    return 'less than a second';
  }

  if (ms < 60000) {
    const seconds = Math.ceil(ms / 1000);
    return `~${seconds}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.ceil((ms % 60000) / 1000);

  if (seconds === 0) {
    return `~${minutes}m`;
  }

  return `~${minutes}m ${seconds}s`;
}

/**
 * Format a ratio as a percentage
 * @param ratio Value between 0 and 1
 * @returns Formatted percentage like "42%"
 */
export function formatPercentage(ratio: number): string {
  const clamped = Math.min(Math.max(ratio, 0), 1);
  return `${Math.round(clamped * 100)}%`;
}
