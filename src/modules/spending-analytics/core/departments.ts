import { sumBy } from './amounts.js';

import { compareStrings } from '../../../common/utils/compare.js';

import type { DepartmentTotal } from './types.js';
import type { Transaction } from '../../finance-data/core/types.js';

export const DEPARTMENT_COMPARISON_TITLE = 'Annual Spending by Department';

/**
 * Sorted distinct department names in an (access-filtered) transaction set.
 */
export const visibleDepartments = (transactions: readonly Transaction[]): string[] => {
  return [...new Set(transactions.map((t) => t.department_name))].sort(compareStrings);
};

/**
 * Comparing departments only makes sense when the viewer can see more than one.
 */
export const shouldCompareDepartments = (departments: readonly string[]): boolean => {
  return new Set(departments).size > 1;
};

/**
 * Total spending per (department, fiscal year), ordered by department then year.
 */
export const departmentTotals = (filtered: readonly Transaction[]): DepartmentTotal[] => {
  const totals: DepartmentTotal[] = [];
  for (const [department, rows] of groupByDepartment(filtered)) {
    for (const [fiscalYear, amount] of sumBy(rows, (row) => row.fiscal_year)) {
      totals.push({ department, fiscalYear, amount });
    }
  }

  return totals.sort(
    (a, b) => compareStrings(a.department, b.department) || a.fiscalYear - b.fiscalYear
  );
};

export const groupByDepartment = (
  rows: readonly Transaction[]
): Map<string, Transaction[]> => {
  const groups = new Map<string, Transaction[]>();
  for (const row of rows) {
    const group = groups.get(row.department_name);
    if (group === undefined) {
      groups.set(row.department_name, [row]);
    } else {
      group.push(row);
    }
  }
  return groups;
};
