import { periodKey, sumBy } from './amounts.js';
import { NO_DATA, type NoData, type TrendSeries } from './types.js';

import type { Transaction } from '../../finance-data/core/types.js';

const BASE_TREND_TITLE = 'Spending Trend Over Time';

/**
 * Monthly spending totals over time.
 *
 * A non-empty `categoryFilter` narrows the rows first. No rows left means NO_DATA.
 */
export const spendingTrend = (
  filtered: readonly Transaction[],
  categoryFilter?: readonly string[]
): NoData | TrendSeries => {
  const restrict = categoryFilter !== undefined && categoryFilter.length > 0;
  const allowed = new Set(categoryFilter);
  const rows = restrict ? filtered.filter((t) => allowed.has(t.expenditure_category)) : filtered;

  if (rows.length === 0) {
    return NO_DATA;
  }

  const totals = sumBy(rows, (row) => periodKey(row.fiscal_year, row.fiscal_month));
  const points = [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([key, amount]) => {
      const fiscalYear = Math.floor(key / 100);
      const fiscalMonth = key % 100;
      return {
        date: `${String(fiscalYear)}-${String(fiscalMonth).padStart(2, '0')}-01`,
        fiscalYear,
        fiscalMonth,
        amount,
      };
    });

  return { kind: 'series', points };
};

/**
 * "Spending Trend Over Time", suffixed with the categories it is restricted to:
 * one or up to three by name, more by count.
 */
export const trendTitle = (categoryFilter?: readonly string[]): string => {
  if (categoryFilter === undefined || categoryFilter.length === 0) {
    return BASE_TREND_TITLE;
  }
  if (categoryFilter.length <= 3) {
    return `${BASE_TREND_TITLE} - ${categoryFilter.join(', ')}`;
  }
  return `${BASE_TREND_TITLE} - ${String(categoryFilter.length)} Categories`;
};
