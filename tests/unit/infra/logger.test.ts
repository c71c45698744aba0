import { describe, it, expect } from 'vitest';

import { buildLoggerOptions, createLogger, LOGGER_NAME } from '@/infra/logger/index.js';

describe('buildLoggerOptions', () => {
  it('uses the pretty transport only when asked', () => {
    const plain = buildLoggerOptions({ name: LOGGER_NAME, level: 'info', pretty: false });
    const pretty = buildLoggerOptions({ name: LOGGER_NAME, level: 'debug', pretty: true });

    expect(plain.transport).toBeUndefined();
    expect(plain.level).toBe('info');
    expect(pretty.transport).toMatchObject({ target: 'pino-pretty' });
  });

  it('redacts the connection string', () => {
    const options = buildLoggerOptions({ name: LOGGER_NAME, level: 'info', pretty: false });

    expect(options.redact).toMatchObject({ paths: expect.arrayContaining(['databaseUrl']) });
  });
});

describe('createLogger', () => {
  it('honours the configured level', () => {
    const logger = createLogger({ level: 'warn', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
