/**
 * Cache key generation.
 *
 * Keys are `{globalPrefix}:{namespace}:{identifier}` so a whole namespace can be
 * dropped with a single prefix scan.
 */

import { createHash } from 'node:crypto';

export const CacheNamespace = {
  /** Read-only queries against the finance views */
  FINANCE_QUERIES: 'finance:queries',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

export interface KeyBuilder {
  build(namespace: CacheNamespace, identifier: string): string;

  /** Deterministic key from a plain object: same content, same key. */
  fromFilter(namespace: CacheNamespace, filter: Record<string, unknown>): string;

  /** `{globalPrefix}:{namespace}:` */
  getPrefix(namespace: CacheNamespace): string;
}

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const sortObjectKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }
  if (!isPlainRecord(value)) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortObjectKeys(value[key]);
  }
  return sorted;
};

/**
 * SHA-256 of the key-sorted JSON, truncated to 16 hex characters.
 */
const hashFilter = (filter: Record<string, unknown>): string => {
  const normalized = JSON.stringify(sortObjectKeys(filter));
  return createHash('sha256').update(normalized).digest('hex').substring(0, 16);
};

export interface KeyBuilderOptions {
  /** Defaults to 'spending'. */
  globalPrefix?: string;
}

export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'spending';

  return {
    build(namespace, identifier) {
      return `${globalPrefix}:${namespace}:${identifier}`;
    },

    fromFilter(namespace, filter) {
      return `${globalPrefix}:${namespace}:${hashFilter(filter)}`;
    },

    getPrefix(namespace) {
      return `${globalPrefix}:${namespace}:`;
    },
  };
};
