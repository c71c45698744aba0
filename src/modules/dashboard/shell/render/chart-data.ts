/**
 * Chart Data
 *
 * Maps analytics results onto the plain shapes the SVG charts draw.
 */

import type {
  CategoryBreakdown,
  CategoryYearlyTrend,
  DepartmentTotal,
  SeasonalityPoint,
  TrendSeries,
  YearTotal,
} from '../../../spending-analytics/core/types.js';
import type { BarDatum, LineSeries, PieDatum } from './components/charts.js';

export interface LineChartData {
  labels: string[];
  series: LineSeries[];
}

export interface GroupedBarData {
  groups: string[];
  series: { name: string; values: number[] }[];
}

const distinctYears = (points: readonly { fiscalYear: number }[]): number[] =>
  [...new Set(points.map((p) => p.fiscalYear))].sort((a, b) => a - b);

/** Labels are "YYYY-MM". */
export const trendChartData = (trend: TrendSeries): LineChartData => ({
  labels: trend.points.map((p) => p.date.slice(0, 7)),
  series: [{ name: 'Spending', values: trend.points.map((p) => p.amount.toNumber()) }],
});

export const breakdownChartData = (breakdown: CategoryBreakdown): PieDatum[] =>
  [...breakdown.totals].map(([label, amount]) => ({ label, amount }));

/** Years become groups, departments become series. Missing pairs draw as zero. */
export const departmentComparisonData = (totals: readonly DepartmentTotal[]): GroupedBarData => {
  const years = distinctYears(totals);
  const departments = [...new Set(totals.map((t) => t.department))];

  return {
    groups: years.map(String),
    series: departments.map((department) => ({
      name: department,
      values: years.map((year) => {
        const match = totals.find((t) => t.department === department && t.fiscalYear === year);
        return match === undefined ? 0 : match.amount.toNumber();
      }),
    })),
  };
};

const alignToYears = (years: readonly number[], points: readonly YearTotal[]): (number | null)[] =>
  years.map((year) => {
    const match = points.find((p) => p.fiscalYear === year);
    return match === undefined ? null : match.amount.toNumber();
  });

export const yearlyTrendChartData = (
  trend: Exclude<CategoryYearlyTrend, { kind: 'no-data' }>
): LineChartData => {
  if (trend.kind === 'single-department') {
    const years = distinctYears(trend.points);
    return {
      labels: years.map(String),
      series: [{ name: trend.department, values: alignToYears(years, trend.points) }],
    };
  }

  const years = distinctYears(trend.series.flatMap((s) => s.points));
  return {
    labels: years.map(String),
    series: trend.series.map((s) => ({
      name: s.department,
      values: alignToYears(years, s.points),
    })),
  };
};

export const seasonalityChartData = (points: readonly SeasonalityPoint[]): BarDatum[] =>
  points.map((p) => ({ label: p.label, value: p.average.toNumber() }));
