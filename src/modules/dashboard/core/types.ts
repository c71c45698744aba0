import type { AccessSummary, Transaction } from '../../finance-data/core/types.js';
import type {
  CategoryBreakdown,
  CategoryInsight,
  CategoryYearlyTrend,
  DepartmentTotal,
  NoData,
  SeasonalityPoint,
  Selection,
  SummaryMetrics,
  TrendSeries,
} from '../../spending-analytics/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Report document
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A report section that either built or was replaced by placeholder text.
 */
export type ReportSection<T> =
  | { readonly status: 'ok'; readonly data: T }
  | { readonly status: 'unavailable'; readonly placeholder: string; readonly reason: string };

export interface ReportContext {
  readonly currentUser: string;
  /** Selected department, or "All Departments" */
  readonly departmentFocus: string;
  /** Sorted fiscal years joined by ", " */
  readonly analysisPeriod: string;
  /** Up to five category names, otherwise a count */
  readonly categoryFilter: string;
}

export interface TitledChart<T> {
  readonly title: string;
  readonly chart: T;
}

export interface CategoryDeepDive {
  readonly category: string;
  readonly heading: string;
  readonly yearlyTrend: ReportSection<TitledChart<CategoryYearlyTrend>>;
  readonly seasonality: ReportSection<TitledChart<readonly SeasonalityPoint[]>>;
  readonly insights: ReportSection<CategoryInsight>;
}

/**
 * Everything the dashboard and the exported report show, computed once.
 */
export interface ReportDocument {
  readonly generatedAt: Date;
  readonly context: ReportContext;
  readonly transactionCount: number;
  readonly metrics: ReportSection<SummaryMetrics>;
  readonly trend: ReportSection<TitledChart<NoData | TrendSeries>>;
  readonly breakdown: ReportSection<TitledChart<NoData | CategoryBreakdown>>;
  /** null when the viewer sees a single department */
  readonly departmentComparison: ReportSection<TitledChart<readonly DepartmentTotal[]>> | null;
  readonly deepDive: CategoryDeepDive;
  /** At most RECENT_TRANSACTIONS_LIMIT rows, newest first */
  readonly recentTransactions: ReportSection<readonly Transaction[]>;
}

export const RECENT_TRANSACTIONS_LIMIT = 20;

// ─────────────────────────────────────────────────────────────────────────────
// Detail table
// ─────────────────────────────────────────────────────────────────────────────

export const RECORD_LIMITS = ['50', '100', '500', 'all'] as const;
export type RecordLimit = (typeof RECORD_LIMITS)[number];

export const SORT_ORDERS = ['date-desc', 'date-asc', 'amount-desc', 'amount-asc'] as const;
export type SortOrder = (typeof SORT_ORDERS)[number];

export interface DisplayOptions {
  readonly records: RecordLimit;
  readonly sort: SortOrder;
}

export const DEFAULT_DISPLAY_OPTIONS: DisplayOptions = { records: '50', sort: 'date-desc' };

export interface DetailTable {
  readonly title: string;
  readonly caption: string;
  readonly options: DisplayOptions;
  readonly rows: readonly Transaction[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Selection input
// ─────────────────────────────────────────────────────────────────────────────

export const SELECTION_ACTIONS = [
  'select-all-years',
  'deselect-all-years',
  'select-all-categories',
  'deselect-all-categories',
] as const;
export type SelectionAction = (typeof SELECTION_ACTIONS)[number];

/**
 * What one interaction asks for. Absent fields keep the stored value, except
 * that a submitted form without years or categories means "none".
 */
export interface SelectionRequest {
  readonly years?: readonly number[] | undefined;
  readonly categories?: readonly string[] | undefined;
  readonly department?: string | undefined;
  readonly action?: SelectionAction | undefined;
  /** The filter form was submitted */
  readonly submitted?: boolean | undefined;
}

export interface FilterOptions {
  readonly departments: readonly string[];
  readonly years: readonly number[];
  readonly categories: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Dashboard view
// ─────────────────────────────────────────────────────────────────────────────

export interface ViewerContext {
  readonly currentUser: string;
  readonly access: AccessSummary;
  /** Data-access failures, shown to the viewer */
  readonly notices: readonly string[];
  /** When the transactions were read from the database */
  readonly dataAsOf: Date | null;
}

export type DashboardView =
  | { readonly kind: 'no-data'; readonly viewer: ViewerContext; readonly message: string }
  | {
      readonly kind: 'invalid-selection';
      readonly viewer: ViewerContext;
      readonly options: FilterOptions;
      readonly selection: Selection;
      readonly message: string;
    }
  | {
      readonly kind: 'empty-filter';
      readonly viewer: ViewerContext;
      readonly options: FilterOptions;
      readonly selection: Selection;
      readonly message: string;
    }
  | {
      readonly kind: 'ready';
      readonly viewer: ViewerContext;
      readonly options: FilterOptions;
      readonly selection: Selection;
      readonly analysisCategories: readonly string[];
      readonly report: ReportDocument;
      readonly table: DetailTable;
    };

export const NO_FINANCIAL_DATA_MESSAGE = 'No financial data available for your user permissions.';
export const EMPTY_FILTER_MESSAGE =
  'No data available for the selected filters. Please adjust your selections.';

// ─────────────────────────────────────────────────────────────────────────────
// Exports
// ─────────────────────────────────────────────────────────────────────────────

export interface ExportFile {
  readonly fileName: string;
  readonly contentType: string;
  readonly content: string;
}
