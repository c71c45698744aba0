/**
 * Finance warehouse schema as seen by this service.
 *
 * Only the read-only surface is declared: the two access-filtered views and the
 * entitlement tables used for display. The row access policy attached to the views
 * lives in the database and is not modelled here.
 */

import type { ColumnType } from 'kysely';

/** NUMERIC columns are returned by `pg` as strings. */
export type Numeric = ColumnType<string, never, never>;

/** DATE columns; selected as `::text` by the repositories. */
export type DateColumn = ColumnType<Date | string, never, never>;

export interface VwFinanceData {
  department_name: string;
  department_code: string;
  transaction_date: DateColumn;
  expenditure_category: string;
  amount: Numeric;
  fiscal_year: number;
  fiscal_month: number;
  director_name: string | null;
  director_start_date: DateColumn | null;
  is_current_director: boolean | null;
}

export interface VwFinanceSummary {
  department_name: string;
  department_code: string;
  fiscal_year: number;
  fiscal_month: number;
  expenditure_category: string;
  total_amount: Numeric;
  /** COUNT(*) is BIGINT, which `pg` also returns as a string */
  transaction_count: ColumnType<string, never, never>;
  average_amount: Numeric;
  director_name: string | null;
  director_start_date: DateColumn | null;
}

export interface UserEntitlements {
  entitlement_id: number;
  username: string;
  department_id: number | null;
  access_level: string;
  is_active: boolean;
}

export interface Departments {
  department_id: number;
  department_name: string;
  department_code: string;
}

export interface FinanceDatabase {
  vw_finance_data: VwFinanceData;
  vw_finance_summary: VwFinanceSummary;
  user_entitlements: UserEntitlements;
  departments: Departments;
}
