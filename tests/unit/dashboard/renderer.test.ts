import { describe, it, expect } from 'vitest';

import {
  EMPTY_FILTER_MESSAGE,
  NO_FINANCIAL_DATA_MESSAGE,
  buildReport,
  loadDashboard,
  makeInMemorySelectionStore,
  makeReportRenderer,
  type DashboardLinks,
} from '@/modules/dashboard/index.js';

import {
  makeEntitlement,
  makeSelection,
  makeTestClock,
  makeTestLogger,
  makeTransaction,
} from '../../fixtures/builders.js';
import { makeFakeFinanceRepo, makeFakeIdentitySource } from '../../fixtures/fakes.js';

const renderer = makeReportRenderer({ logger: makeTestLogger() });

const links: DashboardLinks = {
  page: '/',
  csvExport: '/export/csv',
  reportExport: '/export/report',
};

const marketing = [
  makeTransaction({ department_name: 'Marketing', fiscal_year: 2023, amount: 1000 }),
  makeTransaction({ department_name: 'Marketing', fiscal_year: 2024, amount: 1600 }),
];

const renderReportHtml = async (): Promise<string> => {
  const report = buildReport({
    currentUser: 'analyst',
    filtered: marketing,
    departments: ['Marketing'],
    selection: makeSelection({ department: 'Marketing' }),
    analysisCategory: 'software subscriptions',
    clock: makeTestClock(),
  });
  const result = await renderer.renderReport(report);
  if (result.isErr()) throw new Error(result.error.message);
  return result.value;
};

describe('makeReportRenderer', () => {
  describe('renderReport', () => {
    it('renders a complete HTML document', async () => {
      const html = await renderReportHtml();

      expect(html).toContain('<html');
      expect(html).toContain('Complete Financial Dashboard Report');
      expect(html).toContain('Generated: March 05, 2024 at 02:07 PM');
      expect(html).toContain('Department Focus: Marketing');
      expect(html).toContain('Analysis Period: 2023, 2024');
    });

    it('includes the category insights', async () => {
      const html = await renderReportHtml();

      expect(html).toContain('Category Deep Dive: Software Subscriptions - Marketing');
      expect(html).toContain('Total Spending: $2,600.00');
      expect(html).toContain('Year-over-Year Growth (2023 to 2024): +60.0%');
      expect(html).toContain('High growth');
    });

    it('draws charts as inline SVG without scripts', async () => {
      const html = await renderReportHtml();

      expect(html).toContain('<svg');
      expect(html).not.toContain('<script');
    });
  });

  describe('renderDashboard', () => {
    const loadView = (transactions = marketing) =>
      loadDashboard(
        {
          repo: makeFakeFinanceRepo({
            transactions,
            entitlements: {
              analyst: [
                makeEntitlement({ department_name: 'Marketing' }),
                makeEntitlement({ department_name: 'Physics' }),
              ],
            },
          }),
          identity: makeFakeIdentitySource('analyst'),
          selectionStore: makeInMemorySelectionStore(),
          clock: makeTestClock(),
        },
        { request: {} }
      );

    it('renders the viewer panel, the filters and the export links', async () => {
      const result = await renderer.renderDashboard(await loadView(), links);

      expect(result.isOk()).toBe(true);
      if (result.isErr()) return;
      const html = result.value;
      expect(html).toContain('University Financial Dashboard');
      expect(html).toContain('Logged in as: analyst');
      expect(html).toContain('Access to 2 departments: Marketing, Physics');
      expect(html).toContain('Access Level: department_viewer');
      expect(html).toContain('href="/export/csv"');
      expect(html).toContain('Download Complete Report (HTML)');
      expect(html).toContain('name="submitted"');
      expect(html).toContain('Detailed Transaction Data - All Departments');
    });

    it('shows the no-data message without filters', async () => {
      const result = await renderer.renderDashboard(await loadView([]), links);

      expect(result.isOk()).toBe(true);
      if (result.isErr()) return;
      expect(result.value).toContain(NO_FINANCIAL_DATA_MESSAGE);
      expect(result.value).not.toContain('name="submitted"');
    });

    it('shows the empty-filter message with the filters', async () => {
      const emptyView = await loadDashboard(
        {
          repo: makeFakeFinanceRepo({
            transactions: [
              ...marketing,
              makeTransaction({ fiscal_year: 2023, expenditure_category: 'travel' }),
            ],
          }),
          identity: makeFakeIdentitySource('analyst'),
          selectionStore: makeInMemorySelectionStore(),
          clock: makeTestClock(),
        },
        { request: { submitted: true, years: [2024], categories: ['travel'] } }
      );
      const result = await renderer.renderDashboard(emptyView, links);

      expect(emptyView.kind).toBe('empty-filter');
      expect(result.isOk() && result.value).toContain(EMPTY_FILTER_MESSAGE);
    });
  });
});
