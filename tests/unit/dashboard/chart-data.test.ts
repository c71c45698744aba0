import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import {
  breakdownChartData,
  departmentComparisonData,
  seasonalityChartData,
  trendChartData,
  yearlyTrendChartData,
} from '@/modules/dashboard/shell/render/chart-data.js';

describe('trendChartData', () => {
  it('labels points by month', () => {
    const data = trendChartData({
      kind: 'series',
      points: [
        { date: '2024-01-01', fiscalYear: 2024, fiscalMonth: 1, amount: new Decimal(10) },
        { date: '2024-02-01', fiscalYear: 2024, fiscalMonth: 2, amount: new Decimal('2.5') },
      ],
    });

    expect(data).toEqual({
      labels: ['2024-01', '2024-02'],
      series: [{ name: 'Spending', values: [10, 2.5] }],
    });
  });
});

describe('breakdownChartData', () => {
  it('keeps the category order', () => {
    const data = breakdownChartData({
      kind: 'breakdown',
      totals: new Map([
        ['equipment', new Decimal(1)],
        ['travel', new Decimal(2)],
      ]),
    });

    expect(data.map((d) => d.label)).toEqual(['equipment', 'travel']);
  });
});

describe('departmentComparisonData', () => {
  it('fills missing department years with zero', () => {
    const data = departmentComparisonData([
      { department: 'Art', fiscalYear: 2023, amount: new Decimal(5) },
      { department: 'Art', fiscalYear: 2024, amount: new Decimal(6) },
      { department: 'Physics', fiscalYear: 2024, amount: new Decimal(7) },
    ]);

    expect(data).toEqual({
      groups: ['2023', '2024'],
      series: [
        { name: 'Art', values: [5, 6] },
        { name: 'Physics', values: [0, 7] },
      ],
    });
  });
});

describe('yearlyTrendChartData', () => {
  it('leaves gaps for years a department has no spending in', () => {
    const data = yearlyTrendChartData({
      kind: 'by-department',
      series: [
        {
          department: 'Art',
          points: [
            { fiscalYear: 2022, amount: new Decimal(1) },
            { fiscalYear: 2024, amount: new Decimal(3) },
          ],
        },
        { department: 'Physics', points: [{ fiscalYear: 2023, amount: new Decimal(2) }] },
      ],
    });

    expect(data).toEqual({
      labels: ['2022', '2023', '2024'],
      series: [
        { name: 'Art', values: [1, null, 3] },
        { name: 'Physics', values: [null, 2, null] },
      ],
    });
  });

  it('draws one series for a single department', () => {
    const data = yearlyTrendChartData({
      kind: 'single-department',
      department: 'Art',
      points: [{ fiscalYear: 2024, amount: new Decimal(9) }],
    });

    expect(data).toEqual({ labels: ['2024'], series: [{ name: 'Art', values: [9] }] });
  });
});

describe('seasonalityChartData', () => {
  it('uses month labels', () => {
    expect(
      seasonalityChartData([{ month: 3, label: 'Mar', average: new Decimal('12.5') }])
    ).toEqual([{ label: 'Mar', value: 12.5 }]);
  });
});
