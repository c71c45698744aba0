import { describe, it, expect } from 'vitest';

import {
  defaultSelection,
  deriveFilterOptions,
  resolveSelection,
} from '@/modules/dashboard/index.js';

import { makeSelection, makeTransaction } from '../../fixtures/builders.js';

const transactions = [
  makeTransaction({ department_name: 'Physics', fiscal_year: 2024, expenditure_category: 'travel' }),
  makeTransaction({ department_name: 'Art', fiscal_year: 2022, expenditure_category: 'equipment' }),
  makeTransaction({ department_name: 'Physics', fiscal_year: 2023, expenditure_category: 'travel' }),
];
const options = deriveFilterOptions(transactions);

const asLists = (selection: ReturnType<typeof resolveSelection>) => ({
  years: [...selection.years],
  categories: [...selection.categories],
  department: selection.department,
});

describe('deriveFilterOptions', () => {
  it('lists sorted distinct values', () => {
    expect(options).toEqual({
      departments: ['Art', 'Physics'],
      years: [2022, 2023, 2024],
      categories: ['equipment', 'travel'],
    });
  });
});

describe('defaultSelection', () => {
  it('selects everything', () => {
    expect(asLists(defaultSelection(options))).toEqual({
      years: [2022, 2023, 2024],
      categories: ['equipment', 'travel'],
      department: 'All',
    });
  });
});

describe('resolveSelection', () => {
  it('starts from the default without a stored selection', () => {
    expect(asLists(resolveSelection(options, undefined, {}))).toEqual(
      asLists(defaultSelection(options))
    );
  });

  it('keeps the stored selection when nothing is requested', () => {
    const stored = makeSelection({ years: [2023], categories: ['travel'], department: 'Physics' });

    expect(asLists(resolveSelection(options, stored, {}))).toEqual({
      years: [2023],
      categories: ['travel'],
      department: 'Physics',
    });
  });

  it('treats a submitted form without years as no years', () => {
    const selection = resolveSelection(options, undefined, {
      submitted: true,
      categories: ['travel'],
    });

    expect(selection.years.size).toBe(0);
    expect([...selection.categories]).toEqual(['travel']);
  });

  it('applies select-all and deselect-all actions', () => {
    const stored = makeSelection({ years: [2023], categories: ['travel'] });

    expect([...resolveSelection(options, stored, { action: 'select-all-years' }).years]).toEqual([
      2022, 2023, 2024,
    ]);
    expect(resolveSelection(options, stored, { action: 'deselect-all-years' }).years.size).toBe(0);
    expect([
      ...resolveSelection(options, stored, { action: 'select-all-categories' }).categories,
    ]).toEqual(['equipment', 'travel']);
    expect(
      resolveSelection(options, stored, { action: 'deselect-all-categories' }).categories.size
    ).toBe(0);
  });

  it('drops values that are not options', () => {
    const selection = resolveSelection(options, undefined, {
      years: [1999, 2024],
      categories: ['catering', 'equipment'],
    });

    expect([...selection.years]).toEqual([2024]);
    expect([...selection.categories]).toEqual(['equipment']);
  });

  it('falls back to all departments for an unknown department', () => {
    const selection = resolveSelection(options, undefined, { department: 'Chemistry' });

    expect(selection.department).toBe('All');
  });

  it('follows the options order, not the request order', () => {
    const selection = resolveSelection(options, undefined, { years: [2024, 2022] });

    expect([...selection.years]).toEqual([2022, 2024]);
  });
});
