/**
 * Cache port interfaces.
 *
 * Adapters report failures as `Result` values; the application talks to the
 * silent wrapper, which turns every failure into a miss.
 */

import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError =
  | { type: 'CacheUnavailableError'; message: string; cause?: unknown }
  | { type: 'CacheCapacityError'; message: string; cause?: unknown };

export const CacheError = {
  unavailable: (message: string, cause?: unknown): CacheError => ({
    type: 'CacheUnavailableError',
    message,
    cause,
  }),
  capacity: (message: string, cause?: unknown): CacheError => ({
    type: 'CacheCapacityError',
    message,
    cause,
  }),
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Options & Stats
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheSetOptions {
  /** TTL in milliseconds. Falls back to the adapter default. */
  ttlMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CachePort (adapter interface)
// ─────────────────────────────────────────────────────────────────────────────

export interface CachePort<T = unknown> {
  /** Ok(undefined) on a miss or an expired entry. */
  get(key: string): Promise<Result<T | undefined, CacheError>>;

  set(key: string, value: T, options?: CacheSetOptions): Promise<Result<void, CacheError>>;

  /** Ok(false) when the key was absent. */
  delete(key: string): Promise<Result<boolean, CacheError>>;

  /**
   * Delete every key starting with `prefix`.
   * Used for namespace invalidation; resolves to the number of keys removed.
   */
  clearByPrefix(prefix: string): Promise<Result<number, CacheError>>;

  stats(): Promise<CacheStats>;
}

// ─────────────────────────────────────────────────────────────────────────────
// SilentCachePort (application interface)
// ─────────────────────────────────────────────────────────────────────────────

export interface SilentCachePort<T = unknown> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, options?: CacheSetOptions): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** 0 when the adapter failed. */
  clearByPrefix(prefix: string): Promise<number>;
  stats(): Promise<CacheStats>;
}
