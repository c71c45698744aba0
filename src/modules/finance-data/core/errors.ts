import type { InfraError } from '../../../common/types/errors.js';

/**
 * Error types for the finance-data module.
 *
 * Repositories return Result<T, FinanceDataError>; callers decide whether a
 * failure becomes a notice on the page or an HTTP status.
 */
export type FinanceDataError = InfraError;

export const createDatabaseError = (message: string, cause?: unknown): InfraError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const FINANCE_DATA_ERROR_HTTP_STATUS: Record<FinanceDataError['type'], number> = {
  DatabaseError: 503,
};

export const getHttpStatusForError = (error: FinanceDataError): number => {
  return FINANCE_DATA_ERROR_HTTP_STATUS[error.type];
};
