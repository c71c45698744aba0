/**
 * Logger factory using Pino
 *
 * One root logger per process. Fastify logs requests through it and modules
 * derive child loggers with a `component` binding.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from '../config/env.js';

export type LogLevel = AppConfig['logger']['level'];

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty: boolean;
}

export const LOGGER_NAME = 'spending-dashboard';

/** Connection strings may carry credentials. */
const REDACT_PATHS = ['databaseUrl', 'config.database.url', 'req.headers.cookie'];

/**
 * Pino options for the given configuration. Pretty output goes through the
 * pino-pretty transport and is meant for local development only.
 */
export const buildLoggerOptions = (config: LoggerConfig): LoggerOptions => {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
};

export const createLogger = (config: AppConfig['logger']): Logger =>
  pinoLib(buildLoggerOptions({ name: LOGGER_NAME, level: config.level, pretty: config.pretty }));

export { type Logger } from 'pino';
