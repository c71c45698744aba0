import type { FinanceDataError } from './errors.js';
import type { Entitlement, FetchedRows, SummaryRow, Transaction } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Read-only access to the finance views.
 *
 * The views carry the row access policy, so the same call returns different rows
 * for different database users. Implementations must not add user filters.
 */
export interface FinanceRepository {
  /** All visible transactions, newest first, then by department name. */
  listTransactions(): Promise<Result<FetchedRows<Transaction>, FinanceDataError>>;

  /** Monthly summary rows, newest period first, then by department name. */
  listSummary(): Promise<Result<FetchedRows<SummaryRow>, FinanceDataError>>;

  /** Active entitlements of `username`, ordered by department name. */
  listEntitlements(username: string): Promise<Result<FetchedRows<Entitlement>, FinanceDataError>>;
}

/**
 * Who the database session belongs to.
 */
export interface IdentitySource {
  currentUser(): Promise<Result<string, FinanceDataError>>;
}

/**
 * Drops cached query results so the next read goes to the database.
 */
export interface QueryCacheInvalidator {
  /** Resolves to the number of entries dropped. */
  invalidate(): Promise<number>;
}
