/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';

export {
  makeDbHealthChecker,
  makeCacheHealthChecker,
  type DbHealthCheckerOptions,
  type CacheHealthCheckerOptions,
} from './shell/checkers/index.js';

export { getReadiness, determineOverallStatus } from './core/usecases/get-readiness.js';

export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
