/**
 * Caching decorator for the finance repository and identity source.
 *
 * Entries are addressed by (query identity, parameters) and hold the rows with
 * their fetch timestamp. Only successful reads are stored. Entries live until
 * `invalidate()` or TTL expiry.
 */

import { ok, type Result } from 'neverthrow';

import { CacheNamespace, type KeyBuilder, type SilentCachePort } from '../../../../infra/cache/index.js';

import type { FinanceDataError } from '../../core/errors.js';
import type {
  FinanceRepository,
  IdentitySource,
  QueryCacheInvalidator,
} from '../../core/ports.js';
import type { Entitlement, FetchedRows, SummaryRow, Transaction } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Cache entries
// ─────────────────────────────────────────────────────────────────────────────

export type FinanceCacheEntry =
  | { query: 'transactions'; value: FetchedRows<Transaction> }
  | { query: 'summary'; value: FetchedRows<SummaryRow> }
  | { query: 'entitlements'; value: FetchedRows<Entitlement> }
  | { query: 'current-user'; value: string };

export interface CachedFinanceRepoDeps {
  repo: FinanceRepository;
  identity: IdentitySource;
  cache: SilentCachePort<FinanceCacheEntry>;
  keyBuilder: KeyBuilder;
}

export type CachedFinanceRepo = FinanceRepository & IdentitySource & QueryCacheInvalidator;

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeCachedFinanceRepo = (deps: CachedFinanceRepoDeps): CachedFinanceRepo => {
  const { repo, identity, cache, keyBuilder } = deps;

  const keyFor = (query: FinanceCacheEntry['query'], params: Record<string, unknown> = {}) =>
    keyBuilder.fromFilter(CacheNamespace.FINANCE_QUERIES, { query, params });

  return {
    async listTransactions(): Promise<Result<FetchedRows<Transaction>, FinanceDataError>> {
      const key = keyFor('transactions');
      const cached = await cache.get(key);
      if (cached?.query === 'transactions') {
        return ok(cached.value);
      }

      const result = await repo.listTransactions();
      if (result.isOk()) {
        await cache.set(key, { query: 'transactions', value: result.value });
      }
      return result;
    },

    async listSummary(): Promise<Result<FetchedRows<SummaryRow>, FinanceDataError>> {
      const key = keyFor('summary');
      const cached = await cache.get(key);
      if (cached?.query === 'summary') {
        return ok(cached.value);
      }

      const result = await repo.listSummary();
      if (result.isOk()) {
        await cache.set(key, { query: 'summary', value: result.value });
      }
      return result;
    },

    async listEntitlements(
      username: string
    ): Promise<Result<FetchedRows<Entitlement>, FinanceDataError>> {
      const key = keyFor('entitlements', { username });
      const cached = await cache.get(key);
      if (cached?.query === 'entitlements') {
        return ok(cached.value);
      }

      const result = await repo.listEntitlements(username);
      if (result.isOk()) {
        await cache.set(key, { query: 'entitlements', value: result.value });
      }
      return result;
    },

    async currentUser(): Promise<Result<string, FinanceDataError>> {
      const key = keyFor('current-user');
      const cached = await cache.get(key);
      if (cached?.query === 'current-user') {
        return ok(cached.value);
      }

      const result = await identity.currentUser();
      if (result.isOk()) {
        await cache.set(key, { query: 'current-user', value: result.value });
      }
      return result;
    },

    async invalidate(): Promise<number> {
      return cache.clearByPrefix(keyBuilder.getPrefix(CacheNamespace.FINANCE_QUERIES));
    },
  };
};
