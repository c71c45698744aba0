/**
 * Report Body
 *
 * The report document as markup: context, metrics, charts, deep dive and the
 * most recent transactions. Shared by the dashboard page and the export.
 */

import { Heading, Row, Section, Text } from '@react-email/components';
// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { GroupedBarChart, LineChart, BarChart, PieChart } from './charts.js';
import { MetricCard } from './metric-card.js';
import { TransactionsTable } from './transactions-table.js';
import {
  formatCount,
  formatCurrency,
  formatGeneratedAt,
  formatPercent,
} from '../../../core/format.js';
import {
  breakdownChartData,
  departmentComparisonData,
  seasonalityChartData,
  trendChartData,
  yearlyTrendChartData,
} from '../chart-data.js';
import { colors, styles } from '../styles.js';

import type { ReportDocument, ReportSection } from '../../../core/types.js';
import type {
  CategoryInsight,
  GrowthBand,
  YearOverYearGrowth,
} from '../../../../spending-analytics/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const NO_CHART_DATA = 'No data to display for this selection.';

function renderSection<T>(
  section: ReportSection<T>,
  render: (data: T) => React.ReactNode
): React.ReactNode {
  if (section.status === 'unavailable') {
    return <Text style={styles.placeholder}>{section.placeholder}</Text>;
  }
  return render(section.data);
}

const ChartHeading = ({ title }: { title: string }): React.ReactElement => (
  <Heading as="h3" style={styles.sectionHeading}>
    {title}
  </Heading>
);

const BAND_LABELS: Record<GrowthBand, string> = {
  high: 'High growth',
  moderate: 'Moderate growth',
  low: 'Low growth',
};

const BAND_COLORS: Record<GrowthBand, string> = {
  high: colors.high,
  moderate: colors.moderate,
  low: colors.low,
};

const GrowthLine = ({ growth }: { growth: YearOverYearGrowth }): React.ReactElement => {
  switch (growth.kind) {
    case 'undetermined':
      return <Text>{'Year-over-Year Growth: needs at least two fiscal years of data'}</Text>;
    case 'undefined':
      return (
        <Text>
          {`Year-over-Year Growth (${String(growth.previousYear)} to ${String(growth.latestYear)}): undefined, no spending in ${String(growth.previousYear)}`}
        </Text>
      );
    case 'computed':
      return (
        <Text>
          {`Year-over-Year Growth (${String(growth.previousYear)} to ${String(growth.latestYear)}): ${formatPercent(growth.percent)}`}
          <span style={{ marginLeft: '8px', fontWeight: '600', color: BAND_COLORS[growth.band] }}>
            {BAND_LABELS[growth.band]}
          </span>
        </Text>
      );
  }
};

export const InsightPanel = ({ insight }: { insight: CategoryInsight }): React.ReactElement => {
  switch (insight.kind) {
    case 'no-data':
      return <Text style={styles.placeholder}>{`No data available for ${insight.category}.`}</Text>;
    case 'department':
      return (
        <Section>
          <Text>{`Total Spending: ${formatCurrency(insight.total)}`}</Text>
          <Text>{`Average Monthly: ${formatCurrency(insight.averageMonthly)}`}</Text>
          <GrowthLine growth={insight.growth} />
        </Section>
      );
    case 'all-departments':
      return (
        <Section>
          <Text>{`Total Spending: ${formatCurrency(insight.total)}`}</Text>
          <Text>{`Average Monthly: ${formatCurrency(insight.averageMonthly)}`}</Text>
          <Text>
            {`Top Department: ${insight.topDepartment.name} (${formatCurrency(insight.topDepartment.amount)})`}
          </Text>
          <Text>{`Departments Analyzed: ${String(insight.departmentsAnalyzed)}`}</Text>
        </Section>
      );
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Sections
// ─────────────────────────────────────────────────────────────────────────────

const ChartOrNotice = ({
  title,
  empty,
  children,
}: {
  title: string;
  empty: boolean;
  children: React.ReactNode;
}): React.ReactElement => (
  <>
    <ChartHeading title={title} />
    {empty ? <Text style={styles.placeholder}>{NO_CHART_DATA}</Text> : children}
  </>
);

const ContextBlock = ({ report }: { report: ReportDocument }): React.ReactElement => (
  <Section>
    <Text style={styles.muted}>{`Generated: ${formatGeneratedAt(report.generatedAt)}`}</Text>
    <Text style={styles.muted}>{`User: ${report.context.currentUser}`}</Text>
    <Text style={styles.muted}>{`Department Focus: ${report.context.departmentFocus}`}</Text>
    <Text style={styles.muted}>{`Analysis Period: ${report.context.analysisPeriod}`}</Text>
    <Text style={styles.muted}>{`Categories: ${report.context.categoryFilter}`}</Text>
    <Text style={styles.muted}>
      {`Transactions Analyzed: ${formatCount(report.transactionCount)}`}
    </Text>
  </Section>
);

const MetricsRow = ({ section }: { section: ReportDocument['metrics'] }): React.ReactElement => (
  <Section>
    {renderSection(section, (metrics) => (
      <Row>
        <MetricCard label="Total Spending" value={formatCurrency(metrics.total)} />
        <MetricCard label="Average Monthly" value={formatCurrency(metrics.averageMonthly)} />
        <MetricCard label="Transactions" value={formatCount(metrics.transactionCount)} />
        <MetricCard label="Categories" value={formatCount(metrics.categoryCount)} />
      </Row>
    ))}
  </Section>
);

const DeepDive = ({ deepDive }: { deepDive: ReportDocument['deepDive'] }): React.ReactElement => (
  <Section>
    <Heading as="h2" style={styles.sectionHeading}>
      {deepDive.heading}
    </Heading>
    {renderSection(deepDive.yearlyTrend, ({ title, chart }) => (
      <ChartOrNotice title={title} empty={chart.kind === 'no-data'}>
        {chart.kind !== 'no-data' && <LineChart title={title} {...yearlyTrendChartData(chart)} />}
      </ChartOrNotice>
    ))}
    {renderSection(deepDive.seasonality, ({ title, chart }) => (
      <ChartOrNotice title={title} empty={chart.length === 0}>
        <BarChart title={title} bars={seasonalityChartData(chart)} />
      </ChartOrNotice>
    ))}
    <Heading as="h3" style={styles.sectionHeading}>
      {'Category Insights'}
    </Heading>
    {renderSection(deepDive.insights, (insight) => (
      <InsightPanel insight={insight} />
    ))}
  </Section>
);

// ─────────────────────────────────────────────────────────────────────────────
// Component
// ─────────────────────────────────────────────────────────────────────────────

export const ReportBody = ({ report }: { report: ReportDocument }): React.ReactElement => (
  <Section>
    <ContextBlock report={report} />
    <MetricsRow section={report.metrics} />

    {renderSection(report.trend, ({ title, chart }) => (
      <ChartOrNotice title={title} empty={chart.kind === 'no-data'}>
        {chart.kind === 'series' && <LineChart title={title} {...trendChartData(chart)} />}
      </ChartOrNotice>
    ))}

    {renderSection(report.breakdown, ({ title, chart }) => (
      <ChartOrNotice title={title} empty={chart.kind === 'no-data'}>
        {chart.kind === 'breakdown' && (
          <PieChart title={title} data={breakdownChartData(chart)} />
        )}
      </ChartOrNotice>
    ))}

    {report.departmentComparison !== null &&
      renderSection(report.departmentComparison, ({ title, chart }) => (
        <ChartOrNotice title={title} empty={chart.length === 0}>
          <GroupedBarChart title={title} {...departmentComparisonData(chart)} />
        </ChartOrNotice>
      ))}

    <DeepDive deepDive={report.deepDive} />

    <Heading as="h2" style={styles.sectionHeading}>
      {'Recent Transactions'}
    </Heading>
    {renderSection(report.recentTransactions, (rows) => (
      <TransactionsTable rows={rows} />
    ))}
  </Section>
);
