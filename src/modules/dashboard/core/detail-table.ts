import { ALL_DEPARTMENTS, type Selection } from '../../spending-analytics/core/types.js';
import { formatCount } from './format.js';

import type { DetailTable, DisplayOptions, SortOrder } from './types.js';
import type { Transaction } from '../../finance-data/core/types.js';

const comparators: Record<SortOrder, (a: Transaction, b: Transaction) => number> = {
  'date-desc': (a, b) => compareDates(b, a),
  'date-asc': (a, b) => compareDates(a, b),
  'amount-desc': (a, b) => b.amount.comparedTo(a.amount),
  'amount-asc': (a, b) => a.amount.comparedTo(b.amount),
};

function compareDates(a: Transaction, b: Transaction): number {
  if (a.transaction_date < b.transaction_date) return -1;
  if (a.transaction_date > b.transaction_date) return 1;
  return 0;
}

/**
 * Sorted, truncated copy of the filtered rows for the transaction table.
 * Sorting is stable.
 */
export const buildDetailTable = (
  filtered: readonly Transaction[],
  selection: Selection,
  options: DisplayOptions
): DetailTable => {
  const sorted = [...filtered].sort(comparators[options.sort]);
  const rows =
    options.records === 'all' ? sorted : sorted.slice(0, Number.parseInt(options.records, 10));

  const count = formatCount(filtered.length);
  const single = selection.department !== ALL_DEPARTMENTS;

  return {
    title: single
      ? `Detailed Transaction Data - ${selection.department} Department`
      : 'Detailed Transaction Data - All Departments',
    caption: single
      ? `Showing ${count} transactions for ${selection.department} department`
      : `Showing ${count} transactions across all departments`,
    options,
    rows,
  };
};
