import { sumBy } from './amounts.js';
import { NO_DATA, type CategoryBreakdown, type NoData } from './types.js';

import { compareStrings } from '../../../common/utils/compare.js';

import type { Transaction } from '../../finance-data/core/types.js';

const BASE_BREAKDOWN_TITLE = 'Expenditure Category Breakdown';

/**
 * Total spending per expenditure category, keys sorted alphabetically.
 *
 * A non-empty `yearFilter` narrows the rows first. The totals add up exactly to
 * the sum of the remaining rows.
 */
export const categoryBreakdown = (
  filtered: readonly Transaction[],
  yearFilter?: readonly number[]
): NoData | CategoryBreakdown => {
  const restrict = yearFilter !== undefined && yearFilter.length > 0;
  const allowed = new Set(yearFilter);
  const rows = restrict ? filtered.filter((t) => allowed.has(t.fiscal_year)) : filtered;

  if (rows.length === 0) {
    return NO_DATA;
  }

  const totals = sumBy(rows, (row) => row.expenditure_category);
  const sorted = new Map([...totals.entries()].sort(([a], [b]) => compareStrings(a, b)));

  return { kind: 'breakdown', totals: sorted };
};

/**
 * "Expenditure Category Breakdown", suffixed with the year or the year range.
 */
export const breakdownTitle = (yearFilter?: readonly number[]): string => {
  if (yearFilter === undefined || yearFilter.length === 0) {
    return BASE_BREAKDOWN_TITLE;
  }
  const min = Math.min(...yearFilter);
  const max = Math.max(...yearFilter);
  if (yearFilter.length === 1) {
    return `${BASE_BREAKDOWN_TITLE} - ${String(min)}`;
  }
  return `${BASE_BREAKDOWN_TITLE} - ${String(min)}-${String(max)}`;
};
