import { stringify } from 'csv-stringify/sync';

import type { Transaction } from '../../../finance-data/core/types.js';
import type { CsvEncoder } from '../../core/ports.js';

export const CSV_COLUMNS = [
  'DEPARTMENT_NAME',
  'DEPARTMENT_CODE',
  'TRANSACTION_DATE',
  'EXPENDITURE_CATEGORY',
  'AMOUNT',
  'FISCAL_YEAR',
  'FISCAL_MONTH',
  'DIRECTOR_NAME',
  'DIRECTOR_START_DATE',
  'IS_CURRENT_DIRECTOR',
] as const;

const toRecord = (row: Transaction): string[] => [
  row.department_name,
  row.department_code,
  row.transaction_date,
  row.expenditure_category,
  row.amount.toFixed(2),
  String(row.fiscal_year),
  String(row.fiscal_month),
  row.director_name ?? '',
  row.director_start_date ?? '',
  row.is_current_director ? 'true' : 'false',
];

export const makeCsvEncoder = (): CsvEncoder => ({
  encode(rows) {
    return stringify([[...CSV_COLUMNS], ...rows.map(toRecord)]);
  },
});
