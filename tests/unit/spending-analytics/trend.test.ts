import { describe, it, expect } from 'vitest';

import { spendingTrend, trendTitle } from '@/modules/spending-analytics/core/trend.js';

import { makeTransaction } from '../../fixtures/builders.js';

describe('spendingTrend', () => {
  it('sums per fiscal period in ascending order', () => {
    const rows = [
      makeTransaction({ fiscal_year: 2024, fiscal_month: 2, amount: '5.25' }),
      makeTransaction({ fiscal_year: 2023, fiscal_month: 12, amount: 100 }),
      makeTransaction({ fiscal_year: 2024, fiscal_month: 2, amount: '4.75' }),
      makeTransaction({ fiscal_year: 2024, fiscal_month: 1, amount: 7 }),
    ];

    const trend = spendingTrend(rows);

    expect(trend.kind).toBe('series');
    if (trend.kind !== 'series') return;
    expect(
      trend.points.map((p) => ({ date: p.date, amount: p.amount.toString() }))
    ).toEqual([
      { date: '2023-12-01', amount: '100' },
      { date: '2024-01-01', amount: '7' },
      { date: '2024-02-01', amount: '10' },
    ]);
    expect(trend.points[2]?.fiscalYear).toBe(2024);
    expect(trend.points[2]?.fiscalMonth).toBe(2);
  });

  it('restricts to the given categories first', () => {
    const rows = [
      makeTransaction({ expenditure_category: 'travel', amount: 50 }),
      makeTransaction({ expenditure_category: 'equipment', amount: 70 }),
    ];

    const trend = spendingTrend(rows, ['travel']);

    expect(trend.kind === 'series' && trend.points.map((p) => p.amount.toNumber())).toEqual([50]);
  });

  it('treats an empty category filter as no restriction', () => {
    const rows = [makeTransaction({ amount: 50 }), makeTransaction({ amount: 25 })];

    const trend = spendingTrend(rows, []);

    expect(trend.kind === 'series' && trend.points.map((p) => p.amount.toNumber())).toEqual([75]);
  });

  it('returns no-data for an empty input', () => {
    expect(spendingTrend([])).toEqual({ kind: 'no-data' });
  });

  it('returns no-data when the restriction removes every row', () => {
    const rows = [makeTransaction({ expenditure_category: 'travel' })];

    expect(spendingTrend(rows, ['equipment'])).toEqual({ kind: 'no-data' });
  });
});

describe('trendTitle', () => {
  it('has no suffix without a filter', () => {
    expect(trendTitle()).toBe('Spending Trend Over Time');
    expect(trendTitle([])).toBe('Spending Trend Over Time');
  });

  it('names one to three categories', () => {
    expect(trendTitle(['travel'])).toBe('Spending Trend Over Time - travel');
    expect(trendTitle(['a', 'b', 'c'])).toBe('Spending Trend Over Time - a, b, c');
  });

  it('counts more than three categories', () => {
    expect(trendTitle(['a', 'b', 'c', 'd'])).toBe('Spending Trend Over Time - 4 Categories');
  });
});
