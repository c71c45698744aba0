/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyBaseLogger,
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { systemClock, type Clock } from '../common/types/clock.js';
import { createCacheConfig, initCache, type CacheClient } from '../infra/cache/index.js';
import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import {
  makeCsvEncoder,
  makeDashboardRoutes,
  makeInMemorySelectionStore,
  makeReportRenderer,
  type ReportRenderer,
  type SelectionStore,
} from '../modules/dashboard/index.js';
import {
  makeCachedFinanceRepo,
  makeFinanceRepo,
  makeFinanceRoutes,
  makeIdentitySource,
  type FinanceCacheEntry,
  type FinanceRepository,
  type IdentitySource,
} from '../modules/finance-data/index.js';
import {
  makeCacheHealthChecker,
  makeDbHealthChecker,
  makeHealthRoutes,
  type HealthChecker,
} from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { FinanceDbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Application dependencies. Either `db` or both `financeRepo` and `identity`
 * must be given; tests pass fakes for the latter.
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  db?: FinanceDbClient;
  financeRepo?: FinanceRepository;
  identity?: IdentitySource;
  /** Auto-initialized from config if not provided */
  cacheClient?: CacheClient<FinanceCacheEntry>;
  clock?: Clock;
  selectionStore?: SelectionStore;
  renderer?: ReportRenderer;
  /** Replaces the default database and cache checkers */
  healthCheckers?: HealthChecker[];
}

export interface AppOptions {
  fastifyOptions?: Omit<FastifyServerOptions, 'logger' | 'loggerInstance'>;
  deps: AppDeps;
  version?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

const resolveSources = (
  deps: AppDeps,
  clock: Clock
): { repo: FinanceRepository; identity: IdentitySource } => {
  if (deps.financeRepo !== undefined && deps.identity !== undefined) {
    return { repo: deps.financeRepo, identity: deps.identity };
  }
  if (deps.db === undefined) {
    throw new Error('Missing required dependencies: db, or financeRepo and identity');
  }
  return {
    repo: deps.financeRepo ?? makeFinanceRepo({ db: deps.db, logger: deps.logger, clock }),
    identity: deps.identity ?? makeIdentitySource({ db: deps.db, logger: deps.logger }),
  };
};

export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, logger } = deps;
  const clock = deps.clock ?? systemClock;

  // Request logs go through the same pino root as everything else
  const loggerInstance: FastifyBaseLogger = logger;
  const app = fastifyLib({
    ...fastifyOptions,
    loggerInstance,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // ─────────────────────────────────────────────────────────────────────────────
  // Error handling
  // ─────────────────────────────────────────────────────────────────────────────

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation !== undefined) {
      request.log.info({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      request.log.info({ err: error }, 'Request error');
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Data access
  // ─────────────────────────────────────────────────────────────────────────────

  const cacheClient =
    deps.cacheClient ??
    initCache<FinanceCacheEntry>({ config: createCacheConfig(config), logger });

  const sources = resolveSources(deps, clock);
  const cachedRepo = makeCachedFinanceRepo({
    repo: sources.repo,
    identity: sources.identity,
    cache: cacheClient.cache,
    keyBuilder: cacheClient.keyBuilder,
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────────────────

  const defaultCheckers: HealthChecker[] = [makeCacheHealthChecker(cacheClient.rawCache)];
  if (deps.db !== undefined) {
    defaultCheckers.unshift(makeDbHealthChecker(deps.db, { name: 'database' }));
  }

  await app.register(
    makeHealthRoutes({
      version,
      checkers: deps.healthCheckers ?? defaultCheckers,
    })
  );

  await app.register(
    makeFinanceRoutes({ repo: cachedRepo, identity: cachedRepo, invalidator: cachedRepo })
  );

  await app.register(
    makeDashboardRoutes({
      repo: cachedRepo,
      identity: cachedRepo,
      selectionStore: deps.selectionStore ?? makeInMemorySelectionStore(),
      renderer: deps.renderer ?? makeReportRenderer({ logger }),
      csv: makeCsvEncoder(),
      clock,
    })
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
