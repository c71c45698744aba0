import { selectedCategories, selectedYears } from './selection.js';
import {
  RECENT_TRANSACTIONS_LIMIT,
  type ReportContext,
  type ReportDocument,
  type ReportSection,
} from './types.js';
import { compareStrings } from '../../../common/utils/compare.js';
import { breakdownTitle, categoryBreakdown } from '../../spending-analytics/core/breakdown.js';
import {
  categoryTrendTitle,
  categoryYearlyTrend,
  monthlySeasonality,
  seasonalityTitle,
  titleCase,
} from '../../spending-analytics/core/deep-dive.js';
import {
  DEPARTMENT_COMPARISON_TITLE,
  departmentTotals,
  shouldCompareDepartments,
} from '../../spending-analytics/core/departments.js';
import { categoryInsights } from '../../spending-analytics/core/insights.js';
import { summaryMetrics } from '../../spending-analytics/core/metrics.js';
import { spendingTrend, trendTitle } from '../../spending-analytics/core/trend.js';
import { ALL_DEPARTMENTS, type Selection } from '../../spending-analytics/core/types.js';

import type { Clock } from '../../../common/types/clock.js';
import type { Transaction } from '../../finance-data/core/types.js';

const MAX_LISTED_CATEGORIES = 5;

export interface BuildReportInput {
  currentUser: string;
  /** Rows matching the selection */
  filtered: readonly Transaction[];
  /** Departments the comparison would cover; fewer than two leaves it out */
  departments: readonly string[];
  selection: Selection;
  analysisCategory: string;
  clock: Clock;
}

/**
 * Runs one section builder. A throw turns into placeholder text so the rest of
 * the report still renders.
 */
export const buildSection = <T>(placeholder: string, build: () => T): ReportSection<T> => {
  try {
    return { status: 'ok', data: build() };
  } catch (error) {
    return {
      status: 'unavailable',
      placeholder,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
};

export const departmentContext = (selection: Selection): string =>
  selection.department === ALL_DEPARTMENTS ? 'All Departments' : selection.department;

export const buildReportContext = (currentUser: string, selection: Selection): ReportContext => {
  const categories = selectedCategories(selection);

  return {
    currentUser,
    departmentFocus: departmentContext(selection),
    analysisPeriod: selectedYears(selection).map(String).join(', '),
    categoryFilter:
      categories.length <= MAX_LISTED_CATEGORIES
        ? categories.join(', ')
        : `${String(categories.length)} categories`,
  };
};

/**
 * Most recent first; rows sharing a date keep their input order.
 */
export const recentTransactions = (
  filtered: readonly Transaction[],
  limit: number = RECENT_TRANSACTIONS_LIMIT
): Transaction[] =>
  [...filtered]
    .sort((a, b) => compareStrings(b.transaction_date, a.transaction_date))
    .slice(0, limit);

/**
 * Assembles the report. The clock is read once, for `generatedAt`.
 */
export const buildReport = (input: BuildReportInput): ReportDocument => {
  const { currentUser, filtered, departments, selection, analysisCategory, clock } = input;

  const years = selectedYears(selection);
  const categories = selectedCategories(selection);
  const context = buildReportContext(currentUser, selection);
  const categoryData = filtered.filter((t) => t.expenditure_category === analysisCategory);

  return {
    generatedAt: clock.now(),
    context,
    transactionCount: filtered.length,

    metrics: buildSection('Metrics unavailable', () => summaryMetrics(filtered)),

    trend: buildSection('Trend chart unavailable', () => ({
      title: trendTitle(categories),
      chart: spendingTrend(filtered, categories),
    })),

    breakdown: buildSection('Category chart unavailable', () => ({
      title: breakdownTitle(years),
      chart: categoryBreakdown(filtered, years),
    })),

    departmentComparison: shouldCompareDepartments(departments)
      ? buildSection('Department comparison unavailable', () => ({
          title: DEPARTMENT_COMPARISON_TITLE,
          chart: departmentTotals(filtered),
        }))
      : null,

    deepDive: {
      category: analysisCategory,
      heading: `Category Deep Dive: ${titleCase(analysisCategory)} - ${context.departmentFocus}`,
      yearlyTrend: buildSection('Category trend chart unavailable', () => ({
        title: categoryTrendTitle(analysisCategory, selection),
        chart: categoryYearlyTrend(categoryData, selection),
      })),
      seasonality: buildSection('Seasonality chart unavailable', () => ({
        title: seasonalityTitle(analysisCategory, context.departmentFocus),
        chart: monthlySeasonality(categoryData),
      })),
      insights: buildSection('Category insights unavailable', () =>
        categoryInsights(categoryData, selection, analysisCategory)
      ),
    },

    recentTransactions: buildSection('Recent transactions unavailable', () =>
      recentTransactions(filtered)
    ),
  };
};

/**
 * Sections that fell back to a placeholder, for logging.
 */
export const unavailableSections = (
  report: ReportDocument
): { section: string; reason: string }[] => {
  const sections: [string, ReportSection<unknown> | null][] = [
    ['metrics', report.metrics],
    ['trend', report.trend],
    ['breakdown', report.breakdown],
    ['departmentComparison', report.departmentComparison],
    ['yearlyTrend', report.deepDive.yearlyTrend],
    ['seasonality', report.deepDive.seasonality],
    ['insights', report.deepDive.insights],
    ['recentTransactions', report.recentTransactions],
  ];

  return sections.flatMap(([section, value]) =>
    value?.status === 'unavailable' ? [{ section, reason: value.reason }] : []
  );
};
