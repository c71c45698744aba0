/**
 * CORS plugin for Fastify
 *
 * The JSON endpoints may be called from other origins listed in ALLOWED_ORIGINS
 * or CLIENT_BASE_URL. Development additionally admits localhost.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/** Rejected cross-origin request; answered with 403. */
export class CorsOriginError extends Error {
  readonly statusCode = 403;

  constructor(origin: string) {
    super(`CORS origin not allowed: ${origin}`);
    this.name = 'CorsOriginError';
  }
}

/**
 * Allowed origins from ALLOWED_ORIGINS (comma-separated) and CLIENT_BASE_URL.
 */
export function getAllowedOrigins(config: AppConfig): Set<string> {
  const origins = new Set<string>();

  for (const origin of (config.cors.allowedOrigins ?? '').split(',')) {
    const trimmed = origin.trim();
    if (trimmed !== '') origins.add(trimmed);
  }

  const client = config.cors.clientBaseUrl?.trim();
  if (client !== undefined && client !== '') {
    origins.add(client);
  }

  return origins;
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Same-origin and server-to-server requests carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new CorsOriginError(origin), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept', 'x-requested-with'],
    exposedHeaders: ['content-length', 'content-disposition'],
    credentials: true,
  });
}
