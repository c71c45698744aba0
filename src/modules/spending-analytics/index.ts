// =============================================================================
// Public API for spending-analytics module
// =============================================================================
//
// Pure calculations over transactions that the database has already restricted
// to what the viewer may see.

// Types
export {
  ALL_DEPARTMENTS,
  NO_DATA,
  type Selection,
  type NoData,
  type TrendPoint,
  type TrendSeries,
  type CategoryBreakdown,
  type DepartmentTotal,
  type YearTotal,
  type CategoryYearlyTrend,
  type DepartmentYearTotals,
  type SeasonalityPoint,
  type SummaryMetrics,
  type GrowthBand,
  type YearOverYearGrowth,
  type CategoryInsight,
  type AnalysisCategoryChoice,
} from './core/types.js';

// Errors
export {
  createEmptyYearsError,
  createEmptyCategoriesError,
  getHttpStatusForError,
  SELECTION_ERROR_HTTP_STATUS,
  type SelectionError,
  type EmptyYearsError,
  type EmptyCategoriesError,
} from './core/errors.js';

// Calculations
export { filterTransactions, validateSelection } from './core/filter.js';
export { spendingTrend, trendTitle } from './core/trend.js';
export { categoryBreakdown, breakdownTitle } from './core/breakdown.js';
export {
  departmentTotals,
  shouldCompareDepartments,
  visibleDepartments,
  DEPARTMENT_COMPARISON_TITLE,
} from './core/departments.js';
export { categoryInsights, yearOverYearGrowth, topDepartment, growthBand } from './core/insights.js';
export {
  categoryYearlyTrend,
  categoryTrendTitle,
  monthlySeasonality,
  seasonalityTitle,
  resolveAnalysisCategory,
  titleCase,
  DEFAULT_ANALYSIS_CATEGORY,
} from './core/deep-dive.js';
export { summaryMetrics } from './core/metrics.js';
export { averageMonthly, sumAmounts } from './core/amounts.js';
