/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  failure: 1,
  config: 2,
  input: 3,
  output: 4,
  backend: 5,
  cancelled: 130,
} as const;

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = EXIT_CODES.failure,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, EXIT_CODES.config);
    this.name = 'ConfigError';
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, EXIT_CODES.input);
    this.name = 'InputError';
  }
}

/**
 * Output file error
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, EXIT_CODES.output);
    this.name = 'OutputError';
  }
}

/**
 * Generation backend error
 */
export class BackendError extends CliError {
  constructor(
    public readonly backendName: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion, EXIT_CODES.backend);
    this.name = 'BackendError';
  }

  override format(): string {
    const lines = [`Error [${this.backendName}]: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}
