import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One spending transaction, as exposed by the access-filtered transaction view.
 *
 * Every set of transactions handed out by this module is already restricted to
 * the departments the viewer may see.
 */
export interface Transaction {
  readonly department_name: string;
  readonly department_code: string;
  /** YYYY-MM-DD */
  readonly transaction_date: string;
  readonly expenditure_category: string;
  readonly amount: Decimal;
  readonly fiscal_year: number;
  /** 1-12 */
  readonly fiscal_month: number;
  readonly director_name: string | null;
  /** YYYY-MM-DD */
  readonly director_start_date: string | null;
  readonly is_current_director: boolean;
}

/**
 * Monthly per-department, per-category aggregate computed by the summary view.
 */
export interface SummaryRow {
  readonly department_name: string;
  readonly department_code: string;
  readonly fiscal_year: number;
  readonly fiscal_month: number;
  readonly expenditure_category: string;
  readonly total_amount: Decimal;
  readonly transaction_count: number;
  readonly average_amount: Decimal;
  readonly director_name: string | null;
  readonly director_start_date: string | null;
}

/**
 * An active entitlement of a user. Department fields are null for entitlements
 * that are not tied to a department (e.g. administrators).
 */
export interface Entitlement {
  readonly access_level: string;
  readonly department_name: string | null;
  readonly department_code: string | null;
}

/**
 * A query result together with the moment it was read from the database.
 */
export interface FetchedRows<T> {
  readonly rows: readonly T[];
  readonly fetchedAt: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Access summary
// ─────────────────────────────────────────────────────────────────────────────

export type AccessScope = 'multiple' | 'single' | 'none';

/**
 * What the viewer is told about their own access. Display only: visibility is
 * decided by the database, never by this value.
 */
export interface AccessSummary {
  readonly username: string;
  /** Access level of the first entitlement, null without entitlements */
  readonly accessLevel: string | null;
  /** Sorted department names */
  readonly departments: readonly string[];
  readonly scope: AccessScope;
}

/** Reported when the identity source cannot be queried. */
export const UNKNOWN_USER = 'UNKNOWN';
