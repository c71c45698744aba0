import { sumBy } from './amounts.js';
import { groupByDepartment } from './departments.js';
import {
  ALL_DEPARTMENTS,
  NO_DATA,
  type AnalysisCategoryChoice,
  type CategoryYearlyTrend,
  type SeasonalityPoint,
  type Selection,
  type YearTotal,
} from './types.js';

import { compareStrings } from '../../../common/utils/compare.js';

import type { Transaction } from '../../finance-data/core/types.js';

export const DEFAULT_ANALYSIS_CATEGORY = 'software subscriptions';

const MONTH_LABELS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

/** Upper-cases the first letter of every word and lower-cases the rest. */
export const titleCase = (value: string): string =>
  value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

const yearTotals = (rows: readonly Transaction[]): YearTotal[] =>
  [...sumBy(rows, (row) => row.fiscal_year).entries()]
    .sort(([a], [b]) => a - b)
    .map(([fiscalYear, amount]) => ({ fiscalYear, amount }));

/**
 * Yearly totals of one category: a single series for a selected department, one
 * series per department for "All".
 */
export const categoryYearlyTrend = (
  categoryData: readonly Transaction[],
  selection: Selection
): CategoryYearlyTrend => {
  if (categoryData.length === 0) {
    return NO_DATA;
  }

  if (selection.department !== ALL_DEPARTMENTS) {
    return {
      kind: 'single-department',
      department: selection.department,
      points: yearTotals(categoryData),
    };
  }

  const series = [...groupByDepartment(categoryData).entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([department, rows]) => ({ department, points: yearTotals(rows) }));

  return { kind: 'by-department', series };
};

export const categoryTrendTitle = (category: string, selection: Selection): string =>
  selection.department === ALL_DEPARTMENTS
    ? `${titleCase(category)} Spending Trend by Department`
    : `${titleCase(category)} Spending Trend - ${selection.department}`;

/**
 * Mean transaction amount per fiscal month, January first. Months without
 * transactions are absent.
 */
export const monthlySeasonality = (categoryData: readonly Transaction[]): SeasonalityPoint[] => {
  const totals = sumBy(categoryData, (row) => row.fiscal_month);
  const counts = new Map<number, number>();
  for (const row of categoryData) {
    counts.set(row.fiscal_month, (counts.get(row.fiscal_month) ?? 0) + 1);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([month, total]) => ({
      month,
      label: MONTH_LABELS[month - 1] ?? String(month),
      average: total.dividedBy(counts.get(month) ?? 1),
    }));
};

export const seasonalityTitle = (category: string, departmentContext: string): string =>
  `${titleCase(category)} - Monthly Pattern (${departmentContext})`;

/**
 * Picks the category for the deep dive.
 *
 * Options are the available categories that are also selected. The requested
 * category wins when it is an option, then DEFAULT_ANALYSIS_CATEGORY, then the
 * first option.
 */
export const resolveAnalysisCategory = (
  available: readonly string[],
  selected: ReadonlySet<string>,
  requested?: string
): AnalysisCategoryChoice => {
  const options = available.filter((c) => selected.has(c)).sort(compareStrings);

  if (requested !== undefined && options.includes(requested)) {
    return { options, category: requested };
  }
  if (options.includes(DEFAULT_ANALYSIS_CATEGORY)) {
    return { options, category: DEFAULT_ANALYSIS_CATEGORY };
  }
  return { options, category: options[0] ?? null };
};
