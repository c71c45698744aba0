import { describe, it, expect } from 'vitest';

import {
  EMPTY_FILTER_MESSAGE,
  NO_FINANCIAL_DATA_MESSAGE,
  loadDashboard,
  makeInMemorySelectionStore,
  type LoadDashboardDeps,
} from '@/modules/dashboard/index.js';

import { UNKNOWN_USER } from '@/modules/finance-data/index.js';

import {
  FIXED_NOW,
  makeEntitlement,
  makeSelection,
  makeTestClock,
  makeTransaction,
} from '../../fixtures/builders.js';
import {
  makeFakeFinanceRepo,
  makeFakeIdentitySource,
  type FakeFinanceRepoOptions,
} from '../../fixtures/fakes.js';

const transactions = [
  makeTransaction({ fiscal_year: 2023, expenditure_category: 'travel', amount: 40 }),
  makeTransaction({ fiscal_year: 2024, amount: 60 }),
  makeTransaction({ department_name: 'Physics', fiscal_year: 2024, amount: 5 }),
];

const setup = (options: FakeFinanceRepoOptions = {}, username: string | null = 'analyst') => {
  const deps: LoadDashboardDeps = {
    repo: makeFakeFinanceRepo({
      transactions,
      entitlements: { analyst: [makeEntitlement()] },
      ...options,
    }),
    identity: makeFakeIdentitySource(username),
    selectionStore: makeInMemorySelectionStore(),
    clock: makeTestClock(),
  };
  return deps;
};

describe('loadDashboard', () => {
  it('builds a ready view with every year and category selected by default', async () => {
    const view = await loadDashboard(setup(), { request: {} });

    expect(view.kind).toBe('ready');
    if (view.kind !== 'ready') return;
    expect(view.viewer).toMatchObject({
      currentUser: 'analyst',
      notices: [],
      dataAsOf: FIXED_NOW,
    });
    expect(view.viewer.access.scope).toBe('single');
    expect([...view.selection.years]).toEqual([2023, 2024]);
    expect(view.report.transactionCount).toBe(3);
    expect(view.table.rows).toHaveLength(3);
    expect(view.analysisCategories).toEqual(['software subscriptions', 'travel']);
    expect(view.report.deepDive.category).toBe('software subscriptions');
  });

  it('keeps the department comparison on the page while several departments are visible', async () => {
    const view = await loadDashboard(setup(), { request: { department: 'Physics' } });

    expect(view.kind).toBe('ready');
    if (view.kind !== 'ready') return;
    expect(view.report.transactionCount).toBe(1);
    expect(view.report.departmentComparison?.status).toBe('ok');
  });

  it('remembers the selection for the next request', async () => {
    const deps = setup();

    await loadDashboard(deps, {
      request: { submitted: true, years: [2024], categories: ['travel'] },
    });
    const stored = await deps.selectionStore.get('analyst');

    expect(stored === undefined ? [] : [...stored.years]).toEqual([2024]);
  });

  it('shares one stored selection between viewers without an identity', async () => {
    const deps = setup({}, null);

    await loadDashboard(deps, {
      request: { submitted: true, years: [2023], categories: ['travel'] },
    });
    const view = await loadDashboard(deps, { request: {} });

    expect(view.kind === 'ready' && [...view.selection.years]).toEqual([2023]);
    const stored = await deps.selectionStore.get(UNKNOWN_USER);
    expect(stored === undefined ? [] : [...stored.categories]).toEqual(['travel']);
  });

  it('starts from the stored selection', async () => {
    const deps = setup();
    await deps.selectionStore.set('analyst', makeSelection({ years: [2024] }));

    const view = await loadDashboard(deps, { request: {} });

    expect(view.kind === 'ready' && view.report.transactionCount).toBe(2);
  });

  it('explains an empty selection', async () => {
    const view = await loadDashboard(setup(), {
      request: { submitted: true, categories: ['travel'] },
    });

    expect(view.kind).toBe('invalid-selection');
    expect(view.kind === 'invalid-selection' && view.message).toBe(
      'Please select at least one fiscal year to view data.'
    );
  });

  it('explains a selection without matches', async () => {
    const view = await loadDashboard(setup(), {
      request: { submitted: true, years: [2024], categories: ['travel'] },
    });

    expect(view.kind === 'empty-filter' && view.message).toBe(EMPTY_FILTER_MESSAGE);
  });

  it('shows the no-data message when nothing is visible', async () => {
    const view = await loadDashboard(setup({ transactions: [] }), { request: {} });

    expect(view).toMatchObject({ kind: 'no-data', message: NO_FINANCIAL_DATA_MESSAGE });
  });

  it('turns a data failure into a notice and the no-data view', async () => {
    const view = await loadDashboard(setup({ failTransactions: true }), { request: {} });

    expect(view.kind).toBe('no-data');
    expect(view.viewer.notices).toEqual(['Error loading finance data']);
    expect(view.viewer.dataAsOf).toBeNull();
  });

  it('continues as the unknown user when identity fails', async () => {
    const deps = setup({}, null);

    const view = await loadDashboard(deps, { request: {} });

    expect(view.viewer.currentUser).toBe('UNKNOWN');
    expect(view.viewer.notices).toEqual(['Error getting current user']);
    expect(view.kind).toBe('ready');
  });

  it('keeps going without entitlements', async () => {
    const view = await loadDashboard(setup({ failEntitlements: true }), { request: {} });

    expect(view.viewer.notices).toEqual(['Error loading user access info']);
    expect(view.viewer.access.scope).toBe('none');
    expect(view.kind).toBe('ready');
  });

  it('honours the requested analysis category and table options', async () => {
    const view = await loadDashboard(setup(), {
      request: {},
      analysisCategory: 'travel',
      records: '50',
      sort: 'amount-asc',
    });

    expect(view.kind).toBe('ready');
    if (view.kind !== 'ready') return;
    expect(view.report.deepDive.category).toBe('travel');
    expect(view.table.rows.map((r) => r.amount.toNumber())).toEqual([5, 40, 60]);
  });
});
