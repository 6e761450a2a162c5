/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  BackendError,
  EXIT_CODES,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError, withErrorHandling, createBackendError } from './handler.js';
