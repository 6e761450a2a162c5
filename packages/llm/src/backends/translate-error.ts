/**
 * Translation from client errors to the narrator's failure taxonomy
 */

import { BackendQuotaExceededError, BackendUnavailableError } from '@chronicler/core';
import type { BackendFailureReason } from '@chronicler/core';

import { LLMError, LLMErrorCode } from '../errors.js';

const REASON_BY_CODE: Partial<Record<LLMErrorCode, BackendFailureReason>> = {
  [LLMErrorCode.AUTHENTICATION_FAILED]: 'auth',
  [LLMErrorCode.TIMEOUT]: 'timeout',
  [LLMErrorCode.ABORTED]: 'timeout',
  [LLMErrorCode.INVALID_RESPONSE]: 'invalid_response',
};

/**
 * Map any error thrown by a client call to the error the narrator fails over on
 */
export function toBackendError(
  backend: string,
  error: unknown,
): BackendUnavailableError | BackendQuotaExceededError {
  if (error instanceof BackendUnavailableError || error instanceof BackendQuotaExceededError) {
    return error;
  }
  if (error instanceof LLMError) {
    if (error.code === LLMErrorCode.QUOTA_EXHAUSTED) {
      return new BackendQuotaExceededError(backend, 0, error);
    }
    return new BackendUnavailableError(backend, REASON_BY_CODE[error.code] ?? 'unavailable', error.message, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendUnavailableError(backend, 'unavailable', message, error instanceof Error ? error : undefined);
}
