import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Selection
// ─────────────────────────────────────────────────────────────────────────────

/** Department choice meaning "every department the viewer can see". */
export const ALL_DEPARTMENTS = 'All';

/**
 * What the viewer asked to look at. Passed explicitly into every calculation;
 * nothing in this module reads stored state.
 */
export interface Selection {
  readonly years: ReadonlySet<number>;
  readonly categories: ReadonlySet<string>;
  /** A department name, or ALL_DEPARTMENTS */
  readonly department: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

/** Returned instead of an empty aggregate. */
export interface NoData {
  readonly kind: 'no-data';
}

export const NO_DATA: NoData = { kind: 'no-data' };

export interface TrendPoint {
  /** First day of the fiscal period, YYYY-MM-01 */
  readonly date: string;
  readonly fiscalYear: number;
  readonly fiscalMonth: number;
  readonly amount: Decimal;
}

export interface TrendSeries {
  readonly kind: 'series';
  /** Ascending by (year, month), one point per period */
  readonly points: readonly TrendPoint[];
}

export interface CategoryBreakdown {
  readonly kind: 'breakdown';
  /** Keys in alphabetical order */
  readonly totals: ReadonlyMap<string, Decimal>;
}

export interface DepartmentTotal {
  readonly department: string;
  readonly fiscalYear: number;
  readonly amount: Decimal;
}

export interface YearTotal {
  readonly fiscalYear: number;
  readonly amount: Decimal;
}

export type CategoryYearlyTrend =
  | NoData
  | {
      readonly kind: 'single-department';
      readonly department: string;
      readonly points: readonly YearTotal[];
    }
  | { readonly kind: 'by-department'; readonly series: readonly DepartmentYearTotals[] };

export interface DepartmentYearTotals {
  readonly department: string;
  readonly points: readonly YearTotal[];
}

export interface SeasonalityPoint {
  /** 1-12 */
  readonly month: number;
  /** Jan..Dec */
  readonly label: string;
  /** Mean transaction amount in that month */
  readonly average: Decimal;
}

export interface SummaryMetrics {
  readonly total: Decimal;
  readonly averageMonthly: Decimal;
  readonly transactionCount: number;
  readonly categoryCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Insights
// ─────────────────────────────────────────────────────────────────────────────

/** high: above 15 %, moderate: above 5 %, low: anything else (including decline). */
export type GrowthBand = 'high' | 'moderate' | 'low';

export type YearOverYearGrowth =
  /** fewer than two fiscal years present */
  | { readonly kind: 'undetermined' }
  /** the earlier year totals zero */
  | { readonly kind: 'undefined'; readonly previousYear: number; readonly latestYear: number }
  | {
      readonly kind: 'computed';
      readonly previousYear: number;
      readonly latestYear: number;
      readonly percent: Decimal;
      readonly band: GrowthBand;
    };

export type CategoryInsight =
  | { readonly kind: 'no-data'; readonly category: string }
  | {
      readonly kind: 'department';
      readonly category: string;
      readonly department: string;
      readonly total: Decimal;
      readonly averageMonthly: Decimal;
      readonly growth: YearOverYearGrowth;
    }
  | {
      readonly kind: 'all-departments';
      readonly category: string;
      readonly total: Decimal;
      readonly averageMonthly: Decimal;
      readonly topDepartment: { readonly name: string; readonly amount: Decimal };
      readonly departmentsAnalyzed: number;
    };

export interface AnalysisCategoryChoice {
  /** Available categories that are part of the selection, sorted */
  readonly options: readonly string[];
  /** null when there is nothing to choose from */
  readonly category: string | null;
}
