import { Decimal } from 'decimal.js';

import type { Transaction } from '../../finance-data/core/types.js';

export const sumAmounts = (rows: readonly Transaction[]): Decimal =>
  rows.reduce((acc, row) => acc.plus(row.amount), new Decimal(0));

/**
 * Sums amounts per key, keeping the order in which keys are first seen.
 */
export const sumBy = <K>(
  rows: readonly Transaction[],
  keyOf: (row: Transaction) => K
): Map<K, Decimal> => {
  const totals = new Map<K, Decimal>();
  for (const row of rows) {
    const key = keyOf(row);
    totals.set(key, (totals.get(key) ?? new Decimal(0)).plus(row.amount));
  }
  return totals;
};

/** Packs a fiscal period into one sortable number. */
export const periodKey = (fiscalYear: number, fiscalMonth: number): number =>
  fiscalYear * 100 + fiscalMonth;

/**
 * Mean of the per-(year, month) sums. Periods without transactions are left out
 * of the mean rather than counted as zero. Zero for an empty input.
 */
export const averageMonthly = (rows: readonly Transaction[]): Decimal => {
  const monthly = sumBy(rows, (row) => periodKey(row.fiscal_year, row.fiscal_month));
  if (monthly.size === 0) {
    return new Decimal(0);
  }

  let total = new Decimal(0);
  for (const amount of monthly.values()) {
    total = total.plus(amount);
  }
  return total.dividedBy(monthly.size);
};
