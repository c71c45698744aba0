import { ok, err, type Result } from 'neverthrow';

import { filterTransactions, validateSelection } from '../../../spending-analytics/core/filter.js';
import { deriveFilterOptions, resolveSelection } from '../selection.js';

import type { FinanceRepository, IdentitySource } from '../../../finance-data/core/ports.js';
import type { Transaction } from '../../../finance-data/core/types.js';
import type { Selection } from '../../../spending-analytics/core/types.js';
import type { DashboardError } from '../errors.js';
import type { SelectionStore } from '../ports.js';
import type { SelectionRequest } from '../types.js';

export interface PrepareExportDeps {
  repo: FinanceRepository;
  identity: IdentitySource;
  selectionStore: SelectionStore;
}

export interface PreparedExport {
  currentUser: string;
  full: readonly Transaction[];
  filtered: readonly Transaction[];
  selection: Selection | null;
}

/**
 * Reads what an export needs. Unlike the page, data-access failures are errors
 * here: a download must not silently come out empty.
 *
 * Without any visible data there is nothing to select from, so `selection` is
 * null and `filtered` is empty.
 */
export async function prepareExport(
  deps: PrepareExportDeps,
  request: SelectionRequest
): Promise<Result<PreparedExport, DashboardError>> {
  const userResult = await deps.identity.currentUser();
  if (userResult.isErr()) {
    return err(userResult.error);
  }
  const currentUser = userResult.value;

  const dataResult = await deps.repo.listTransactions();
  if (dataResult.isErr()) {
    return err(dataResult.error);
  }
  const full = dataResult.value.rows;

  if (full.length === 0) {
    return ok({ currentUser, full, filtered: [], selection: null });
  }

  const options = deriveFilterOptions(full);
  const stored = await deps.selectionStore.get(currentUser);
  const validation = validateSelection(resolveSelection(options, stored, request));
  if (validation.isErr()) {
    return err(validation.error);
  }

  const selection = validation.value;
  return ok({
    currentUser,
    full,
    filtered: filterTransactions(full, selection),
    selection,
  });
}
