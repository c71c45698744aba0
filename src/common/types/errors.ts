/**
 * Base error types shared by every module.
 * Module errors are plain objects narrowed on `type`.
 */

export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Failures of collaborators outside the process (database, cache backend).
 */
export interface InfraError extends AppError {
  readonly type: 'DatabaseError';
  readonly retryable: boolean;
}

/**
 * Input that cannot be acted on. `field` names the offending input when known.
 */
export interface ValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly field?: string;
}

export const createValidationError = (message: string, field?: string): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
});
