import { summarizeAccess } from '../../../finance-data/core/access.js';
import { UNKNOWN_USER, type Transaction } from '../../../finance-data/core/types.js';
import {
  DEFAULT_ANALYSIS_CATEGORY,
  resolveAnalysisCategory,
} from '../../../spending-analytics/core/deep-dive.js';
import { visibleDepartments } from '../../../spending-analytics/core/departments.js';
import { filterTransactions, validateSelection } from '../../../spending-analytics/core/filter.js';
import { buildDetailTable } from '../detail-table.js';
import { buildReport } from '../report.js';
import { deriveFilterOptions, resolveSelection } from '../selection.js';
import {
  DEFAULT_DISPLAY_OPTIONS,
  EMPTY_FILTER_MESSAGE,
  NO_FINANCIAL_DATA_MESSAGE,
  type DashboardView,
  type RecordLimit,
  type SelectionRequest,
  type SortOrder,
  type ViewerContext,
} from '../types.js';

import type { Clock } from '../../../../common/types/clock.js';
import type { FinanceRepository, IdentitySource } from '../../../finance-data/core/ports.js';
import type { SelectionStore } from '../ports.js';

export interface LoadDashboardDeps {
  repo: FinanceRepository;
  identity: IdentitySource;
  selectionStore: SelectionStore;
  clock: Clock;
}

export interface LoadDashboardInput {
  request: SelectionRequest;
  analysisCategory?: string | undefined;
  records?: RecordLimit | undefined;
  sort?: SortOrder | undefined;
}

interface LoadedViewer {
  viewer: ViewerContext;
  transactions: readonly Transaction[];
}

/**
 * Identity, access summary and transactions. Failures become notices and
 * empty values; nothing here fails the page.
 */
const loadViewer = async (deps: LoadDashboardDeps): Promise<LoadedViewer> => {
  const notices: string[] = [];

  const userResult = await deps.identity.currentUser();
  let currentUser = UNKNOWN_USER;
  if (userResult.isOk()) {
    currentUser = userResult.value;
  } else {
    notices.push(userResult.error.message);
  }

  const accessResult = await deps.repo.listEntitlements(currentUser);
  if (accessResult.isErr()) {
    notices.push(accessResult.error.message);
  }
  const access = summarizeAccess(currentUser, accessResult.isOk() ? accessResult.value.rows : []);

  const dataResult = await deps.repo.listTransactions();
  if (dataResult.isErr()) {
    notices.push(dataResult.error.message);
  }

  return {
    viewer: {
      currentUser,
      access,
      notices,
      dataAsOf: dataResult.isOk() ? dataResult.value.fetchedAt : null,
    },
    transactions: dataResult.isOk() ? dataResult.value.rows : [],
  };
};

/**
 * One recomputation pass for the dashboard page.
 *
 * Resolves and stores the viewer's selection, then either explains why there is
 * nothing to show or builds the report and the transaction table.
 */
export async function loadDashboard(
  deps: LoadDashboardDeps,
  input: LoadDashboardInput
): Promise<DashboardView> {
  const { viewer, transactions } = await loadViewer(deps);

  if (transactions.length === 0) {
    return { kind: 'no-data', viewer, message: NO_FINANCIAL_DATA_MESSAGE };
  }

  const options = deriveFilterOptions(transactions);
  // Keyed by the session user, so viewers on one database login share it
  const stored = await deps.selectionStore.get(viewer.currentUser);
  const selection = resolveSelection(options, stored, input.request);
  await deps.selectionStore.set(viewer.currentUser, selection);

  const validation = validateSelection(selection);
  if (validation.isErr()) {
    return {
      kind: 'invalid-selection',
      viewer,
      options,
      selection,
      message: validation.error.message,
    };
  }

  const filtered = filterTransactions(transactions, selection);
  if (filtered.length === 0) {
    return { kind: 'empty-filter', viewer, options, selection, message: EMPTY_FILTER_MESSAGE };
  }

  const choice = resolveAnalysisCategory(
    options.categories,
    selection.categories,
    input.analysisCategory
  );

  const report = buildReport({
    currentUser: viewer.currentUser,
    filtered,
    departments: visibleDepartments(transactions),
    selection,
    analysisCategory: choice.category ?? DEFAULT_ANALYSIS_CATEGORY,
    clock: deps.clock,
  });

  const table = buildDetailTable(filtered, selection, {
    records: input.records ?? DEFAULT_DISPLAY_OPTIONS.records,
    sort: input.sort ?? DEFAULT_DISPLAY_OPTIONS.sort,
  });

  return {
    kind: 'ready',
    viewer,
    options,
    selection,
    analysisCategories: choice.options,
    report,
    table,
  };
}
