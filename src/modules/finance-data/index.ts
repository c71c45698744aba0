// =============================================================================
// Public API for finance-data module
// =============================================================================

// Types
export {
  UNKNOWN_USER,
  type Transaction,
  type SummaryRow,
  type Entitlement,
  type FetchedRows,
  type AccessScope,
  type AccessSummary,
} from './core/types.js';

// Errors
export {
  createDatabaseError,
  getHttpStatusForError,
  FINANCE_DATA_ERROR_HTTP_STATUS,
  type FinanceDataError,
} from './core/errors.js';

// Ports
export type { FinanceRepository, IdentitySource, QueryCacheInvalidator } from './core/ports.js';

// Core
export { summarizeAccess } from './core/access.js';

// Repositories
export {
  makeFinanceRepo,
  makeIdentitySource,
  type FinanceRepoOptions,
} from './shell/repo/finance-repo.js';
export {
  makeCachedFinanceRepo,
  type CachedFinanceRepo,
  type CachedFinanceRepoDeps,
  type FinanceCacheEntry,
} from './shell/repo/cached-finance-repo.js';

// Routes
export { makeFinanceRoutes, type MakeFinanceRoutesDeps } from './shell/rest/routes.js';
