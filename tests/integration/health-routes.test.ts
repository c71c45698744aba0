import { describe, it, expect, afterEach } from 'vitest';

import { makeTestApp, type TestApp } from './app-setup.js';
import { makeHealthChecker, makeTestConfig } from '../fixtures/builders.js';

describe('Health and platform routes', () => {
  let testApp: TestApp | undefined;

  afterEach(async () => {
    await testApp?.app.close();
    testApp = undefined;
  });

  it('reports liveness', async () => {
    testApp = await makeTestApp();

    const response = await testApp.app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('is ready with a working cache', async () => {
    testApp = await makeTestApp();

    const response = await testApp.app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.checks).toHaveLength(1);
    expect(body.checks[0]).toMatchObject({ name: 'cache', status: 'healthy', critical: false });
  });

  it('answers 503 when a critical dependency is down', async () => {
    testApp = await makeTestApp({
      deps: {
        healthCheckers: [
          makeHealthChecker({ name: 'database', status: 'unhealthy', critical: true }),
        ],
      },
    });

    const response = await testApp.app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().status).toBe('unhealthy');
  });

  it('answers unknown routes with a JSON 404', async () => {
    testApp = await makeTestApp();

    const response = await testApp.app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'Route GET /nope not found',
    });
  });

  describe('CORS', () => {
    const origin = 'https://dashboard.example.org';

    it('allows configured origins', async () => {
      testApp = await makeTestApp({
        deps: { config: makeTestConfig({ cors: { allowedOrigins: origin } }) },
      });

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe(origin);
    });

    it('rejects other origins with 403', async () => {
      testApp = await makeTestApp();

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        ok: false,
        error: 'CorsOriginError',
        message: 'CORS origin not allowed: https://dashboard.example.org',
      });
    });

    it('allows requests without an Origin header', async () => {
      testApp = await makeTestApp();

      const response = await testApp.app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
    });
  });
});
