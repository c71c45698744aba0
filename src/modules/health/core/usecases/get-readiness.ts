import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const toCheckResult = (settled: PromiseSettledResult<HealthCheckResult>): HealthCheckResult => {
  if (settled.status === 'fulfilled') {
    return settled.value;
  }
  return {
    name: 'unknown',
    status: 'unhealthy',
    message: settled.reason instanceof Error ? settled.reason.message : 'Check failed',
    critical: true,
  };
};

/**
 * unhealthy: a critical check failed (checks without the flag count as critical).
 * degraded: only non-critical checks failed.
 */
export const determineOverallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((c) => c.status === 'unhealthy');
  if (failed.some((c) => c.critical !== false)) {
    return 'unhealthy';
  }
  return failed.length > 0 ? 'degraded' : 'ok';
};

/**
 * Runs every checker in parallel and aggregates the outcome.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const settled = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
