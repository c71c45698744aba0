/**
 * Cache health checker.
 *
 * Probes the raw adapter (the silent wrapper would hide failures). The service
 * works without its cache, so the result is never critical.
 */

import { raceWithTimeout } from './with-timeout.js';

import type { CachePort } from '../../../../infra/cache/index.js';
import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

const DEFAULT_TIMEOUT_MS = 3000;

const HEALTH_CHECK_KEY = 'health:probe';

export interface CacheHealthCheckerOptions {
  /** Default: 'cache' */
  name?: string;
  /** Default: 3000 */
  timeoutMs?: number;
}

export const makeCacheHealthChecker = <T>(
  cache: CachePort<T>,
  options: CacheHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'cache', timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      const result = await raceWithTimeout(cache.get(HEALTH_CHECK_KEY), timeoutMs, 'Cache');
      const latencyMs = Date.now() - startTime;

      if (result.isErr()) {
        return {
          name,
          status: 'unhealthy',
          message: result.error.message,
          latencyMs,
          critical: false,
        };
      }
      return { name, status: 'healthy', latencyMs, critical: false };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown cache error',
        latencyMs: Date.now() - startTime,
        critical: false,
      };
    }
  };
};
