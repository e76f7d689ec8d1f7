/**
 * Learner State Module - Domain Errors
 *
 * A missing state is not an error: readers get a fresh empty state instead.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The optimistic write kept losing to concurrent writers.
 */
export interface ConflictError {
  readonly type: 'ConflictError';
  readonly message: string;
  readonly userId: string;
  /** Attempts made before giving up (0 for a single store rejection) */
  readonly attempts: number;
}

/**
 * Malformed data supplied from outside the core.
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
  readonly details: string[];
}

export type UpstreamSource = 'persistence' | 'submissions' | 'topics';

/**
 * A collaborator behind a port failed.
 */
export interface UpstreamUnavailableError {
  readonly type: 'UpstreamUnavailableError';
  readonly message: string;
  readonly source: UpstreamSource;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type LearnerStateError = ConflictError | InvalidInputError | UpstreamUnavailableError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a conflict error.
 */
export const createConflictError = (userId: string, attempts: number): ConflictError => ({
  type: 'ConflictError',
  message:
    attempts > 0
      ? `Learner state for '${userId}' was modified concurrently; gave up after ${String(attempts)} attempts.`
      : `Learner state for '${userId}' was modified concurrently.`,
  userId,
  attempts,
});

/**
 * Create an invalid input error.
 */
export const createInvalidInputError = (
  message: string,
  field: string,
  details: string[] = []
): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
  details,
});

/**
 * Create an upstream unavailable error.
 */
export const createUpstreamUnavailableError = (
  source: UpstreamSource,
  message: string,
  cause?: unknown,
  retryable = true
): UpstreamUnavailableError => ({
  type: 'UpstreamUnavailableError',
  message,
  source,
  retryable,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes for the API layer.
 */
export const LEARNER_STATE_ERROR_HTTP_STATUS: Record<LearnerStateError['type'], number> = {
  ConflictError: 409,
  InvalidInputError: 400,
  UpstreamUnavailableError: 503,
};

/**
 * Get HTTP status code for a learner state error.
 */
export const getHttpStatusForError = (error: LearnerStateError): number => {
  return LEARNER_STATE_ERROR_HTTP_STATUS[error.type];
};
