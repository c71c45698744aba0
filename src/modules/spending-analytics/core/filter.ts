import { ok, err, type Result } from 'neverthrow';

import {
  createEmptyCategoriesError,
  createEmptyYearsError,
  type SelectionError,
} from './errors.js';
import { ALL_DEPARTMENTS, type Selection } from './types.js';

import type { Transaction } from '../../finance-data/core/types.js';

/**
 * Keeps the rows matching all three parts of the selection, in input order.
 *
 * The input is expected to be access-filtered already; this only narrows what
 * the viewer chose to look at.
 */
export const filterTransactions = (
  transactions: readonly Transaction[],
  selection: Selection
): Transaction[] => {
  return transactions.filter(
    (t) =>
      selection.years.has(t.fiscal_year) &&
      selection.categories.has(t.expenditure_category) &&
      (selection.department === ALL_DEPARTMENTS || t.department_name === selection.department)
  );
};

/**
 * A selection without years or without categories cannot be rendered.
 */
export const validateSelection = (selection: Selection): Result<Selection, SelectionError> => {
  if (selection.years.size === 0) {
    return err(createEmptyYearsError());
  }
  if (selection.categories.size === 0) {
    return err(createEmptyCategoriesError());
  }
  return ok(selection);
};
