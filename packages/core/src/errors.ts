/**
 * Error classes for story synthesis
 */

/**
 * Error codes for synthesis runs
 */
export enum ChronicleErrorCode {
  /** Transcript empty or malformed, no segments produced */
  SEGMENTATION_FAILED = 'SEGMENTATION_FAILED',
  /** Backend unreachable, rejected credentials, or timed out */
  BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
  /** Backend or quota authority refused the call */
  BACKEND_QUOTA_EXCEEDED = 'BACKEND_QUOTA_EXCEEDED',
  /** Every configured backend failed on the same segment */
  ALL_BACKENDS_EXHAUSTED = 'ALL_BACKENDS_EXHAUSTED',
  /** Caller aborted the run */
  CANCELLED = 'CANCELLED',
  /** Narrations handed to the synthesizer are out of order or have gaps */
  SYNTHESIS_INVARIANT = 'SYNTHESIS_INVARIANT',
  /** Run state machine received an illegal transition */
  INVALID_TRANSITION = 'INVALID_TRANSITION',
}

/**
 * Base error class for synthesis runs
 */
export class ChronicleError extends Error {
  constructor(
    message: string,
    public readonly code: ChronicleErrorCode,
    public readonly recoverable: boolean,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ChronicleError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChronicleError);
    }
  }
}

/**
 * Thrown when a transcript cannot be segmented
 */
export class SegmentationError extends ChronicleError {
  constructor(message: string) {
    super(message, ChronicleErrorCode.SEGMENTATION_FAILED, false);
    this.name = 'SegmentationError';
  }
}

/**
 * Why a backend call failed
 */
export type BackendFailureReason = 'unavailable' | 'timeout' | 'auth' | 'invalid_response';

/**
 * Thrown by a backend that cannot serve the call (network, auth, timeout)
 */
export class BackendUnavailableError extends ChronicleError {
  constructor(
    public readonly backend: string,
    public readonly reason: BackendFailureReason,
    message: string,
    cause?: Error,
  ) {
    super(`Backend '${backend}' unavailable (${reason}): ${message}`, ChronicleErrorCode.BACKEND_UNAVAILABLE, true, cause);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * Thrown when a quota refuses the call, either the backend's own or the external authority
 */
export class BackendQuotaExceededError extends ChronicleError {
  constructor(
    public readonly backend: string,
    public readonly estimatedTokens: number,
    cause?: Error,
  ) {
    super(
      `Quota exceeded for backend '${backend}' (requested ~${estimatedTokens} tokens)`,
      ChronicleErrorCode.BACKEND_QUOTA_EXCEEDED,
      true,
      cause,
    );
    this.name = 'BackendQuotaExceededError';
  }
}

/**
 * Raised when the last configured backend fails on a segment
 */
export class AllBackendsExhaustedError extends ChronicleError {
  constructor(
    public readonly segmentIndex: number,
    public readonly attempted: readonly string[],
  ) {
    super(
      attempted.length > 0
        ? `All backends failed on segment ${segmentIndex} (tried: ${attempted.join(', ')})`
        : 'No generation backends configured',
      ChronicleErrorCode.ALL_BACKENDS_EXHAUSTED,
      false,
    );
    this.name = 'AllBackendsExhaustedError';
  }
}

/**
 * Raised between segments when the caller's signal has aborted
 */
export class RunCancelledError extends ChronicleError {
  constructor(public readonly segmentsCompleted: number) {
    super(`Run cancelled after ${segmentsCompleted} segment(s)`, ChronicleErrorCode.CANCELLED, false);
    this.name = 'RunCancelledError';
  }
}

/**
 * Thrown when the synthesizer receives a list that is not gap-free and ordered
 */
export class SynthesisInvariantError extends ChronicleError {
  constructor(message: string) {
    super(message, ChronicleErrorCode.SYNTHESIS_INVARIANT, false);
    this.name = 'SynthesisInvariantError';
  }
}

/**
 * Thrown by the run state machine on an illegal transition
 */
export class InvalidRunTransitionError extends ChronicleError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Illegal run transition: ${from} -> ${to}`, ChronicleErrorCode.INVALID_TRANSITION, false);
    this.name = 'InvalidRunTransitionError';
  }
}

/**
 * Non-fatal extraction problem. Logged and treated as an empty extraction, never thrown.
 */
export interface ExtractionWarning {
  segmentIndex: number;
  message: string;
}

/**
 * Whether an error should move the run to the next backend
 */
export function isFailoverError(
  error: unknown,
): error is BackendUnavailableError | BackendQuotaExceededError {
  return error instanceof BackendUnavailableError || error instanceof BackendQuotaExceededError;
}
