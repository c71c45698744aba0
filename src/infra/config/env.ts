/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Finance warehouse (views carry the row access policy)
  DATABASE_URL: Type.String({ minLength: 1 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),

  // Query-result cache
  CACHE_BACKEND: Type.Union([Type.Literal('memory'), Type.Literal('disabled')], {
    default: 'memory',
  }),
  CACHE_DEFAULT_TTL_MS: Type.Integer({ minimum: 1 }),
  CACHE_MEMORY_MAX_ENTRIES: Type.Integer({ minimum: 1 }),
  CACHE_KEY_PREFIX: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

/** Cached query results survive until refreshed or the process restarts. */
const DEFAULT_CACHE_TTL_MS = 365 * 24 * 60 * 60 * 1000;
const DEFAULT_CACHE_MAX_ENTRIES = 1000;

const parseOptionalInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  return Number.parseInt(value, 10);
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    CLIENT_BASE_URL: env['CLIENT_BASE_URL'],
    CACHE_BACKEND: env['CACHE_BACKEND'] ?? 'memory',
    CACHE_DEFAULT_TTL_MS: parseOptionalInt(env['CACHE_DEFAULT_TTL_MS'], DEFAULT_CACHE_TTL_MS),
    CACHE_MEMORY_MAX_ENTRIES: parseOptionalInt(
      env['CACHE_MEMORY_MAX_ENTRIES'],
      DEFAULT_CACHE_MAX_ENTRIES
    ),
    CACHE_KEY_PREFIX: env['CACHE_KEY_PREFIX'] ?? 'spending',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
  cache: {
    backend: env.CACHE_BACKEND,
    defaultTtlMs: env.CACHE_DEFAULT_TTL_MS,
    memoryMaxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
    keyPrefix: env.CACHE_KEY_PREFIX,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
