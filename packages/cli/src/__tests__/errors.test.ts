/**
 * CLI error tests
 */

import { describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import { BackendError, CliError, ConfigError, EXIT_CODES, InputError, OutputError } from '../errors/cli-errors.js';
import { createBackendError, exitCodeFor } from '../errors/handler.js';

describe('CliError', () => {
  it('should format the message and suggestion', () => {
    const error = new CliError('Something broke', 'Try again');
    expect(error.format()).toBe('Error: Something broke\n\nSuggestion: Try again');
  });

  it('should format without a suggestion', () => {
    expect(new CliError('Something broke').format()).toBe('Error: Something broke');
  });

  it('should name the backend', () => {
    const error = new BackendError('local', 'Backend unavailable: connection refused');
    expect(error.format()).toBe('Error [local]: Backend unavailable: connection refused');
  });
});

describe('exitCodeFor', () => {
  it('should map each error class to its exit code', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(EXIT_CODES.config);
    expect(exitCodeFor(new InputError('bad'))).toBe(EXIT_CODES.input);
    expect(exitCodeFor(new OutputError('bad'))).toBe(EXIT_CODES.output);
    expect(exitCodeFor(new BackendError('remote', 'bad'))).toBe(EXIT_CODES.backend);
    expect(exitCodeFor(new CliError('stopped', undefined, EXIT_CODES.cancelled))).toBe(130);
  });

  it('should treat validation errors as config errors', () => {
    expect(exitCodeFor(new ConfigValidationError([{ path: 'output.format', message: 'bad' }]))).toBe(2);
  });

  it('should fall back to 1', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('createBackendError', () => {
  it('should suggest starting the daemon for the local backend', () => {
    const error = createBackendError({ name: 'local', kind: 'local', healthy: false, detail: 'connection refused' });
    expect(error.backendName).toBe('local');
    expect(error.message).toBe('Backend unavailable: connection refused');
    expect(error.suggestion).toBe('Start the daemon with `ollama serve`, or drop local with --backends');
  });
});
