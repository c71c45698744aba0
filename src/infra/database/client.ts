import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { FinanceDatabase } from './finance/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type FinanceDbClient = Kysely<FinanceDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the finance database client.
 *
 * The connection authenticates as the dashboard viewer; the row access policy on the
 * views keys off that identity, so no filtering by user happens in this process.
 */
export const initDatabase = (config: AppConfig): FinanceDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for Finance Database (DATABASE_URL)');
  }

  return createClient<FinanceDatabase>(database.url);
};

export type * from './finance/types.js';
