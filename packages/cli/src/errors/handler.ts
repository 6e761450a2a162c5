/**
 * Error handling utilities
 */

import type { BackendHealth } from '@chronicler/llm';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { BackendError, CliError, EXIT_CODES } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigValidationError) {
    return EXIT_CODES.config;
  }
  if (error instanceof CliError) {
    return error.exitCode;
  }
  return EXIT_CODES.failure;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async function with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Create a backend error with helpful suggestion
 */
export function createBackendError(health: BackendHealth): BackendError {
  const suggestions: Record<BackendHealth['kind'], string> = {
    remote: 'Set the OPENAI_API_KEY environment variable, or drop remote with --backends',
    local: 'Start the daemon with `ollama serve`, or drop local with --backends',
    offline: 'Template narration needs no setup; check the transcript instead',
  };

  return new BackendError(health.name, `Backend unavailable: ${health.detail}`, suggestions[health.kind]);
}
