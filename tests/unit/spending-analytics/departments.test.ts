import { describe, it, expect } from 'vitest';

import {
  departmentTotals,
  shouldCompareDepartments,
  visibleDepartments,
} from '@/modules/spending-analytics/core/departments.js';

import { makeTransaction } from '../../fixtures/builders.js';

describe('visibleDepartments', () => {
  it('lists distinct departments in order', () => {
    const rows = [
      makeTransaction({ department_name: 'Marketing' }),
      makeTransaction({ department_name: 'Engineering' }),
      makeTransaction({ department_name: 'Marketing' }),
    ];

    expect(visibleDepartments(rows)).toEqual(['Engineering', 'Marketing']);
  });
});

describe('shouldCompareDepartments', () => {
  it('is false for one visible department', () => {
    expect(shouldCompareDepartments(['Engineering'])).toBe(false);
  });

  it('is false for none', () => {
    expect(shouldCompareDepartments([])).toBe(false);
  });

  it('is true for more than one', () => {
    expect(shouldCompareDepartments(['Engineering', 'Marketing'])).toBe(true);
  });

  it('counts distinct names only', () => {
    expect(shouldCompareDepartments(['Engineering', 'Engineering'])).toBe(false);
  });
});

describe('departmentTotals', () => {
  it('sums per department and year, ordered by department then year', () => {
    const rows = [
      makeTransaction({ department_name: 'Marketing', fiscal_year: 2024, amount: 5 }),
      makeTransaction({ department_name: 'Engineering', fiscal_year: 2024, amount: 1 }),
      makeTransaction({ department_name: 'Engineering', fiscal_year: 2023, amount: 2 }),
      makeTransaction({ department_name: 'Engineering', fiscal_year: 2024, amount: 3 }),
    ];

    const totals = departmentTotals(rows).map((t) => ({
      department: t.department,
      fiscalYear: t.fiscalYear,
      amount: t.amount.toNumber(),
    }));

    expect(totals).toEqual([
      { department: 'Engineering', fiscalYear: 2023, amount: 2 },
      { department: 'Engineering', fiscalYear: 2024, amount: 4 },
      { department: 'Marketing', fiscalYear: 2024, amount: 5 },
    ]);
  });

  it('returns an empty list for no rows', () => {
    expect(departmentTotals([])).toEqual([]);
  });
});
