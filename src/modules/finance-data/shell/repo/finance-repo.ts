/**
 * Finance Repository - Kysely Implementation
 *
 * Fixed, parameterized read-only queries against the access-filtered views.
 * NUMERIC values arrive as strings and become Decimal; DATE values are selected
 * as text so no timezone conversion happens on the way.
 */

import { Decimal } from 'decimal.js';
import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type FinanceDataError } from '../../core/errors.js';

import type { Clock } from '../../../../common/types/clock.js';
import type { FinanceDbClient } from '../../../../infra/database/client.js';
import type { FinanceRepository, IdentitySource } from '../../core/ports.js';
import type { Entitlement, FetchedRows, SummaryRow, Transaction } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface FinanceRepoOptions {
  db: FinanceDbClient;
  logger: Logger;
  clock: Clock;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyFinanceRepo implements FinanceRepository {
  private readonly db: FinanceDbClient;
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(options: FinanceRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ component: 'finance-repo' });
    this.clock = options.clock;
  }

  async listTransactions(): Promise<Result<FetchedRows<Transaction>, FinanceDataError>> {
    try {
      const rows = await this.db
        .selectFrom('vw_finance_data')
        .select([
          'department_name',
          'department_code',
          sql<string>`transaction_date::text`.as('transaction_date'),
          'expenditure_category',
          'amount',
          'fiscal_year',
          'fiscal_month',
          'director_name',
          sql<string | null>`director_start_date::text`.as('director_start_date'),
          'is_current_director',
        ])
        .orderBy('transaction_date', 'desc')
        .orderBy('department_name', 'asc')
        .execute();

      return ok({
        rows: rows.map((row) => ({
          department_name: row.department_name,
          department_code: row.department_code,
          transaction_date: row.transaction_date,
          expenditure_category: row.expenditure_category,
          amount: new Decimal(row.amount),
          fiscal_year: row.fiscal_year,
          fiscal_month: row.fiscal_month,
          director_name: row.director_name,
          director_start_date: row.director_start_date,
          is_current_director: row.is_current_director === true,
        })),
        fetchedAt: this.clock.now(),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to load finance data');
      return err(createDatabaseError('Error loading finance data', error));
    }
  }

  async listSummary(): Promise<Result<FetchedRows<SummaryRow>, FinanceDataError>> {
    try {
      const rows = await this.db
        .selectFrom('vw_finance_summary')
        .select([
          'department_name',
          'department_code',
          'fiscal_year',
          'fiscal_month',
          'expenditure_category',
          'total_amount',
          'transaction_count',
          'average_amount',
          'director_name',
          sql<string | null>`director_start_date::text`.as('director_start_date'),
        ])
        .orderBy('fiscal_year', 'desc')
        .orderBy('fiscal_month', 'desc')
        .orderBy('department_name', 'asc')
        .execute();

      return ok({
        rows: rows.map((row) => ({
          department_name: row.department_name,
          department_code: row.department_code,
          fiscal_year: row.fiscal_year,
          fiscal_month: row.fiscal_month,
          expenditure_category: row.expenditure_category,
          total_amount: new Decimal(row.total_amount),
          transaction_count: Number.parseInt(row.transaction_count, 10),
          average_amount: new Decimal(row.average_amount),
          director_name: row.director_name,
          director_start_date: row.director_start_date,
        })),
        fetchedAt: this.clock.now(),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to load finance summary');
      return err(createDatabaseError('Error loading finance summary', error));
    }
  }

  async listEntitlements(
    username: string
  ): Promise<Result<FetchedRows<Entitlement>, FinanceDataError>> {
    try {
      const rows = await this.db
        .selectFrom('user_entitlements as ue')
        .leftJoin('departments as d', 'd.department_id', 'ue.department_id')
        .select(['ue.access_level', 'd.department_name', 'd.department_code'])
        .where('ue.username', '=', username)
        .where('ue.is_active', '=', true)
        .orderBy('d.department_name', 'asc')
        .execute();

      return ok({ rows, fetchedAt: this.clock.now() });
    } catch (error) {
      this.log.error({ err: error, username }, 'Failed to load user access info');
      return err(createDatabaseError('Error loading user access info', error));
    }
  }
}

class PostgresIdentitySource implements IdentitySource {
  private readonly db: FinanceDbClient;
  private readonly log: Logger;

  constructor(options: Omit<FinanceRepoOptions, 'clock'>) {
    this.db = options.db;
    this.log = options.logger.child({ component: 'identity-source' });
  }

  async currentUser(): Promise<Result<string, FinanceDataError>> {
    try {
      const result = await sql<{ username: string }>`SELECT current_user AS username`.execute(
        this.db
      );
      const username = result.rows[0]?.username;
      if (username === undefined) {
        return err(createDatabaseError('Error getting current user: no session user'));
      }
      return ok(username);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to resolve current user');
      return err(createDatabaseError('Error getting current user', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factories
// ─────────────────────────────────────────────────────────────────────────────

export const makeFinanceRepo = (options: FinanceRepoOptions): FinanceRepository => {
  return new KyselyFinanceRepo(options);
};

export const makeIdentitySource = (options: Omit<FinanceRepoOptions, 'clock'>): IdentitySource => {
  return new PostgresIdentitySource(options);
};
