import type { HealthCheckResult } from './types.js';

/**
 * Probes one dependency. May reject; a rejection counts as a critical failure.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
