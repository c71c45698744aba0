// =============================================================================
// Public API for dashboard module
// =============================================================================

// Types
export {
  RECENT_TRANSACTIONS_LIMIT,
  RECORD_LIMITS,
  SORT_ORDERS,
  SELECTION_ACTIONS,
  DEFAULT_DISPLAY_OPTIONS,
  NO_FINANCIAL_DATA_MESSAGE,
  EMPTY_FILTER_MESSAGE,
  type ReportSection,
  type ReportContext,
  type ReportDocument,
  type DetailTable,
  type DisplayOptions,
  type SelectionRequest,
  type FilterOptions,
  type ViewerContext,
  type DashboardView,
  type ExportFile,
} from './core/types.js';

// Errors
export {
  createNoMatchingDataError,
  createReportRenderError,
  getHttpStatusForError,
  DASHBOARD_ERROR_HTTP_STATUS,
  type DashboardError,
  type NoMatchingDataError,
  type ReportRenderError,
} from './core/errors.js';

// Ports
export type { SelectionStore, DashboardLinks, ReportRenderer, CsvEncoder } from './core/ports.js';

// Core
export { deriveFilterOptions, defaultSelection, resolveSelection } from './core/selection.js';
export { buildReport, buildReportContext, unavailableSections } from './core/report.js';
export { buildDetailTable } from './core/detail-table.js';
export { csvFileName, reportFileName } from './core/format.js';

// Use cases
export { loadDashboard, type LoadDashboardDeps } from './core/usecases/load-dashboard.js';
export { exportCsv, type ExportCsvDeps } from './core/usecases/export-csv.js';
export { exportReport, type ExportReportDeps } from './core/usecases/export-report.js';

// Shell
export { makeInMemorySelectionStore } from './shell/store/in-memory-selection-store.js';
export { makeCsvEncoder, CSV_COLUMNS } from './shell/export/csv-encoder.js';
export { makeReportRenderer, type ReportRendererConfig } from './shell/render/index.js';
export {
  makeDashboardRoutes,
  buildDashboardLinks,
  DASHBOARD_PATHS,
  type MakeDashboardRoutesDeps,
} from './shell/rest/routes.js';
