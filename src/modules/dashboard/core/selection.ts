import { compareStrings } from '../../../common/utils/compare.js';
import { ALL_DEPARTMENTS, type Selection } from '../../spending-analytics/core/types.js';

import type { FilterOptions, SelectionRequest } from './types.js';
import type { Transaction } from '../../finance-data/core/types.js';

/**
 * Sorted distinct values offered by the filter widgets.
 */
export const deriveFilterOptions = (transactions: readonly Transaction[]): FilterOptions => ({
  departments: [...new Set(transactions.map((t) => t.department_name))].sort(compareStrings),
  years: [...new Set(transactions.map((t) => t.fiscal_year))].sort((a, b) => a - b),
  categories: [...new Set(transactions.map((t) => t.expenditure_category))].sort(compareStrings),
});

/** Every year, every category, every department. */
export const defaultSelection = (options: FilterOptions): Selection => ({
  years: new Set(options.years),
  categories: new Set(options.categories),
  department: ALL_DEPARTMENTS,
});

/**
 * Applies one interaction to the previous selection.
 *
 * Order: start from `stored` (or the default), take the explicit values of the
 * request, apply the select-all / deselect-all action, then drop anything that
 * is not an option. An unknown department falls back to "All".
 */
export const resolveSelection = (
  options: FilterOptions,
  stored: Selection | undefined,
  request: SelectionRequest
): Selection => {
  const base = stored ?? defaultSelection(options);
  const submitted = request.submitted === true;

  let years: readonly number[] = request.years ?? (submitted ? [] : [...base.years]);
  let categories: readonly string[] =
    request.categories ?? (submitted ? [] : [...base.categories]);

  switch (request.action) {
    case 'select-all-years':
      years = options.years;
      break;
    case 'deselect-all-years':
      years = [];
      break;
    case 'select-all-categories':
      categories = options.categories;
      break;
    case 'deselect-all-categories':
      categories = [];
      break;
    case undefined:
      break;
  }

  const requestedDepartment = request.department ?? base.department;
  const department = options.departments.includes(requestedDepartment)
    ? requestedDepartment
    : ALL_DEPARTMENTS;

  return {
    years: new Set(options.years.filter((y) => years.includes(y))),
    categories: new Set(options.categories.filter((c) => categories.includes(c))),
    department,
  };
};

/** Selected years, ascending. */
export const selectedYears = (selection: Selection): number[] =>
  [...selection.years].sort((a, b) => a - b);

/** Selected categories, alphabetical. */
export const selectedCategories = (selection: Selection): string[] =>
  [...selection.categories].sort(compareStrings);
