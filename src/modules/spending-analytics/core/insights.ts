import { Decimal } from 'decimal.js';

import { averageMonthly, sumAmounts, sumBy } from './amounts.js';
import {
  ALL_DEPARTMENTS,
  type CategoryInsight,
  type GrowthBand,
  type Selection,
  type YearOverYearGrowth,
} from './types.js';

import { compareStrings } from '../../../common/utils/compare.js';

import type { Transaction } from '../../finance-data/core/types.js';

const HIGH_GROWTH_PERCENT = new Decimal(15);
const MODERATE_GROWTH_PERCENT = new Decimal(5);

export const growthBand = (percent: Decimal): GrowthBand => {
  if (percent.greaterThan(HIGH_GROWTH_PERCENT)) return 'high';
  if (percent.greaterThan(MODERATE_GROWTH_PERCENT)) return 'moderate';
  return 'low';
};

/**
 * Growth between the two most recent fiscal years present in `rows`.
 */
export const yearOverYearGrowth = (rows: readonly Transaction[]): YearOverYearGrowth => {
  const yearly = sumBy(rows, (row) => row.fiscal_year);
  const years = [...yearly.keys()].sort((a, b) => a - b);

  const latestYear = years[years.length - 1];
  const previousYear = years[years.length - 2];
  if (latestYear === undefined || previousYear === undefined) {
    return { kind: 'undetermined' };
  }

  const latest = yearly.get(latestYear) ?? new Decimal(0);
  const previous = yearly.get(previousYear) ?? new Decimal(0);
  if (previous.isZero()) {
    return { kind: 'undefined', previousYear, latestYear };
  }

  const percent = latest.minus(previous).dividedBy(previous).times(100);
  return { kind: 'computed', previousYear, latestYear, percent, band: growthBand(percent) };
};

/**
 * Largest department by summed amount; ties go to the alphabetically first name.
 */
export const topDepartment = (
  rows: readonly Transaction[]
): { name: string; amount: Decimal } | undefined => {
  const totals = [...sumBy(rows, (row) => row.department_name).entries()].sort(
    ([nameA, a], [nameB, b]) => b.comparedTo(a) || compareStrings(nameA, nameB)
  );
  const first = totals[0];
  return first === undefined ? undefined : { name: first[0], amount: first[1] };
};

/**
 * Insight for one expenditure category under the current selection.
 *
 * Rows of other categories are ignored. A single selected department yields
 * year-over-year growth; "All" yields the top department.
 */
export const categoryInsights = (
  categoryData: readonly Transaction[],
  selection: Selection,
  category: string
): CategoryInsight => {
  const rows = categoryData.filter((t) => t.expenditure_category === category);
  const top = topDepartment(rows);
  if (top === undefined) {
    return { kind: 'no-data', category };
  }

  const total = sumAmounts(rows);
  const monthly = averageMonthly(rows);

  if (selection.department !== ALL_DEPARTMENTS) {
    return {
      kind: 'department',
      category,
      department: selection.department,
      total,
      averageMonthly: monthly,
      growth: yearOverYearGrowth(rows),
    };
  }

  return {
    kind: 'all-departments',
    category,
    total,
    averageMonthly: monthly,
    topDepartment: top,
    departmentsAnalyzed: new Set(rows.map((t) => t.department_name)).size,
  };
};
