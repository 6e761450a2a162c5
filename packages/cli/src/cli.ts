/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

/**
 * Backend descriptions for help text
 */
const BACKENDS_HELP = `Comma-separated backend preference list:
    remote  - Hosted model over the OpenAI API (needs OPENAI_API_KEY)
    local   - Model served by a local Ollama daemon
    offline - Template narration, always available
  (default: remote,local,offline)`;

/**
 * Format descriptions for help text
 */
const FORMAT_HELP = `Output format:
    markdown - The story as prose [default]
    json     - The full synthesis result`;

/**
 * Parse a positive integer option
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Parse a comma-separated list option
 */
export function parseList(value: string): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new InvalidArgumentError('List must name at least one entry.');
  }
  return items;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('chronicler')
    .description('Turn a tabletop session transcript into one continuous story')
    .version(VERSION);

  // Weave command
  program
    .command('weave')
    .description('Weave a session transcript into a story')
    .option('-i, --input <file>', 'Input transcript file (default: stdin)')
    .option('-o, --output <file>', 'Output file (default: stdout)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-b, --backends <list>', BACKENDS_HELP, parseList)
    .option('--budget <tokens>', 'Segment budget in tokens (default: smallest backend budget)', parsePositiveInt)
    .option('--model <model>', 'Remote model to use (e.g., gpt-4o-mini)')
    .option('--local-model <model>', 'Local model to use (e.g., llama3.1)')
    .option('-f, --format <format>', FORMAT_HELP)
    .option('--session-name <name>', 'Session name, used as the story title')
    .option('--setting <text>', 'Campaign setting handed to the narrator')
    .option('--verbose', 'Report every finished segment and backend retry')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--dry-run', 'Check backends and paths without weaving')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { weaveCommand } = await import('./commands/weave.js');
      await weaveCommand(options);
    });

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = stringOption(options['input']);
  if (input !== undefined) result.input = input;
  const output = stringOption(options['output']);
  if (output !== undefined) result.output = output;
  const config = stringOption(options['config']);
  if (config !== undefined) result.config = config;

  const backends = options['backends'];
  if (Array.isArray(backends)) {
    result.backends = backends.filter((item): item is string => typeof item === 'string');
  }
  const budget = options['budget'];
  if (typeof budget === 'number') result.budget = budget;

  const model = stringOption(options['model']);
  if (model !== undefined) result.model = model;
  const localModel = stringOption(options['localModel']);
  if (localModel !== undefined) result.localModel = localModel;
  const format = stringOption(options['format']);
  if (format !== undefined) result.format = format;
  const sessionName = stringOption(options['sessionName']);
  if (sessionName !== undefined) result.sessionName = sessionName;
  const setting = stringOption(options['setting']);
  if (setting !== undefined) result.setting = setting;

  const showConfig = booleanOption(options['showConfig']);
  if (showConfig !== undefined) result.showConfig = showConfig;
  const dryRun = booleanOption(options['dryRun']);
  if (dryRun !== undefined) result.dryRun = dryRun;
  const verbose = booleanOption(options['verbose']);
  if (verbose !== undefined) result.verbose = verbose;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
