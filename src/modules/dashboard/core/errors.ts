import type { FinanceDataError } from '../../finance-data/core/errors.js';
import type { SelectionError } from '../../spending-analytics/core/errors.js';

/**
 * Error types for the dashboard module.
 *
 * The page turns data-access failures into notices; exports report every
 * error as an HTTP status.
 */
export type DashboardError =
  | SelectionError
  | FinanceDataError
  | NoMatchingDataError
  | ReportRenderError;

/** Nothing to put into a report: no visible data, or none matching the filters. */
export interface NoMatchingDataError {
  readonly type: 'NoMatchingDataError';
  readonly message: string;
}

export interface ReportRenderError {
  readonly type: 'ReportRenderError';
  readonly message: string;
  readonly cause?: unknown;
}

export const createNoMatchingDataError = (message: string): NoMatchingDataError => ({
  type: 'NoMatchingDataError',
  message,
});

export const createReportRenderError = (message: string, cause?: unknown): ReportRenderError => ({
  type: 'ReportRenderError',
  message,
  cause,
});

export const DASHBOARD_ERROR_HTTP_STATUS: Record<DashboardError['type'], number> = {
  EmptyYearsError: 400,
  EmptyCategoriesError: 400,
  NoMatchingDataError: 404,
  ReportRenderError: 500,
  DatabaseError: 503,
};

export const getHttpStatusForError = (error: DashboardError): number => {
  return DASHBOARD_ERROR_HTTP_STATUS[error.type];
};
