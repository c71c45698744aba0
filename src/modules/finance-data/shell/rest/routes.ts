/**
 * Finance Data REST Routes
 *
 * - GET /api/v1/finance/summary: Summary view rows
 * - GET /api/v1/me/access: Caller identity and access summary
 * - POST /api/v1/finance/cache/refresh: Drop cached query results
 */

import {
  AccessResponseSchema,
  CacheRefreshResponseSchema,
  ErrorResponseSchema,
  SummaryResponseSchema,
} from './schemas.js';
import { summarizeAccess } from '../../core/access.js';
import { getHttpStatusForError, type FinanceDataError } from '../../core/errors.js';

import type {
  FinanceRepository,
  IdentitySource,
  QueryCacheInvalidator,
} from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

export interface MakeFinanceRoutesDeps {
  repo: FinanceRepository;
  identity: IdentitySource;
  invalidator: QueryCacheInvalidator;
}

function sendError(reply: FastifyReply, error: FinanceDataError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

export const makeFinanceRoutes = (deps: MakeFinanceRoutesDeps): FastifyPluginAsync => {
  const { repo, identity, invalidator } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/finance/summary
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/finance/summary',
      {
        schema: {
          response: { 200: SummaryResponseSchema, 503: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const result = await repo.listSummary();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: {
            fetchedAt: result.value.fetchedAt.toISOString(),
            rows: result.value.rows.map((row) => ({
              ...row,
              total_amount: row.total_amount.toFixed(),
              average_amount: row.average_amount.toFixed(),
            })),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/me/access
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/me/access',
      {
        schema: {
          response: { 200: AccessResponseSchema, 503: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const user = await identity.currentUser();
        if (user.isErr()) {
          return sendError(reply, user.error);
        }

        const entitlements = await repo.listEntitlements(user.value);
        if (entitlements.isErr()) {
          return sendError(reply, entitlements.error);
        }

        return reply.status(200).send({
          ok: true,
          data: summarizeAccess(user.value, entitlements.value.rows),
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/finance/cache/refresh
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/api/v1/finance/cache/refresh',
      { schema: { response: { 200: CacheRefreshResponseSchema } } },
      async (request, reply) => {
        const cleared = await invalidator.invalidate();
        request.log.info({ cleared }, 'Finance query cache cleared');

        return reply.status(200).send({ ok: true, data: { cleared } });
      }
    );
  };
};
