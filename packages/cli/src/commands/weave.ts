/**
 * Weave command implementation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';

import { formatCost } from '@chronicler/llm';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { InputError, OutputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import {
  failureToError,
  initializeServices,
  orchestrateSynthesis,
  performHealthChecks,
  requireUsableBackend,
} from '../orchestrator/index.js';
import { formatStory, storyFormatOptions } from '../output/story-formatter.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Read the transcript from file or stdin
 */
export async function readInput(inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    // Read from file
    if (!fs.existsSync(inputPath)) {
      throw new InputError(`Input file not found: ${resolveAbsolutePath(inputPath)}`, 'Check the file path and try again');
    }
    try {
      return fs.readFileSync(inputPath, 'utf-8');
    } catch (error) {
      throw new InputError(
        `Failed to read input file: ${inputPath}`,
        error instanceof Error ? error.message : 'unknown error',
      );
    }
  }

  // Check if stdin is a TTY (no piped input)
  if (process.stdin.isTTY) {
    throw new InputError('No input provided', 'Provide a transcript with --input or pipe it to stdin');
  }

  // Read from stdin
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    const rl = readline.createInterface({
      input: process.stdin,
      crlfDelay: Infinity,
    });

    rl.on('line', (line) => {
      chunks.push(line);
    });

    rl.on('close', () => {
      resolve(chunks.join('\n'));
    });

    process.stdin.on('error', (err) => {
      reject(new InputError(`Failed to read from stdin: ${err.message}`));
    });
  });
}

/**
 * Write output to file or stdout
 */
export function writeOutput(output: string, outputPath: string | undefined): void {
  if (outputPath) {
    try {
      fs.writeFileSync(outputPath, output, 'utf-8');
    } catch (error) {
      throw new OutputError(
        `Failed to write output file: ${outputPath}`,
        error instanceof Error ? error.message : 'unknown error',
      );
    }
  } else {
    process.stdout.write(output);
  }
}

/**
 * Main weave command handler
 */
export async function weaveCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    verbose: options.verbose ?? false,
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    reporter.warnSafe('Interrupted, finishing the current segment');
    controller.abort();
  };

  try {
    // Load configuration
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    // Print header
    reporter.printHeader(VERSION);

    const services = initializeServices(config, {
      onBackendNotice: reporter.onBackendNotice,
      onWarning: reporter.onWarning,
    });

    // Perform health checks
    const health = await performHealthChecks(config, services);
    reporter.reportBackendHealth(health);

    // Dry-run mode: validate setup without weaving
    if (options.dryRun) {
      reporter.printMessage('Dry-run mode: validating setup...');
      reporter.printMessage('');

      const unhealthy = health.filter((backend) => !backend.healthy);
      if (unhealthy.length === 0) {
        reporter.printSuccess('All backends healthy. Ready to weave.');
      } else if (unhealthy.length < health.length) {
        reporter.printWarning('Some backends unavailable; runs will fail over past them:');
        for (const backend of unhealthy) {
          reporter.printMessage(`  - ${backend.name}: ${backend.detail}`);
        }
      } else {
        reporter.printError('No backend is available.');
      }

      // Validate input file exists (if provided)
      if (options.input) {
        const inputPath = resolveAbsolutePath(options.input);
        if (fs.existsSync(inputPath)) {
          reporter.printSuccess(`Input file exists: ${inputPath}`);
        } else {
          reporter.printError(`Input file not found: ${inputPath}`);
        }
      }

      // Validate output directory exists (if provided)
      if (options.output) {
        const outputPath = resolveAbsolutePath(options.output);
        const outputDir = path.dirname(outputPath);
        if (fs.existsSync(outputDir)) {
          reporter.printSuccess(`Output directory exists: ${outputDir}`);
        } else {
          reporter.printWarning(`Output directory does not exist: ${outputDir}`);
        }
      }

      reporter.printMessage('');
      reporter.printMessage('Dry-run complete. No story was woven.');
      return;
    }

    requireUsableBackend(health);

    // Read input
    const transcript = await readInput(options.input);

    // Run synthesis
    process.once('SIGINT', onInterrupt);
    const result = await orchestrateSynthesis(transcript, config, services, reporter, controller.signal);

    // A partial story is still written before the failure is reported
    if (result.success || result.storyText) {
      const output = formatStory(result, storyFormatOptions(config));
      writeOutput(output, options.output);
    }

    // Print summary
    reporter.printSummary(result);

    const reservedTokens = services.quota.reserved('remote');
    if (reservedTokens > 0) {
      reporter.printCostSummary({
        model: config.remote.model,
        reservedTokens,
        estimatedCost: formatCost(services.quota.estimatedCostUsd),
      });
    }

    // Print output location if writing to file
    if (options.output && (result.success || result.storyText)) {
      reporter.printOutputLocation(options.output);
    }

    const failure = failureToError(result);
    if (failure) {
      throw failure;
    }
  } catch (error) {
    reporter.stop();
    handleError(error);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
