import { Decimal } from 'decimal.js';
import { describe, it, expect, afterEach } from 'vitest';

import { makeTestApp, type TestApp } from './app-setup.js';
import { makeEntitlement, makeSummaryRow, makeTransaction } from '../fixtures/builders.js';

describe('Finance routes', () => {
  let testApp: TestApp | undefined;

  afterEach(async () => {
    await testApp?.app.close();
    testApp = undefined;
  });

  describe('GET /api/v1/finance/summary', () => {
    it('returns summary rows with amounts as decimal strings', async () => {
      testApp = await makeTestApp({
        summary: [makeSummaryRow({ total_amount: new Decimal('1e21') })],
      });

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/api/v1/finance/summary',
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.ok).toBe(true);
      expect(body.data.fetchedAt).toBe('2024-03-05T14:07:09.000Z');
      expect(body.data.rows).toEqual([
        {
          department_name: 'Engineering',
          department_code: 'ENG',
          fiscal_year: 2024,
          fiscal_month: 1,
          expenditure_category: 'software subscriptions',
          total_amount: '1000000000000000000000',
          transaction_count: 3,
          average_amount: '400.1666666667',
          director_name: 'Dana Director',
          director_start_date: '2020-07-01',
        },
      ]);
    });

    it('returns 503 when the view cannot be read', async () => {
      testApp = await makeTestApp({ failSummary: true });

      const response = await testApp.app.inject({
        method: 'GET',
        url: '/api/v1/finance/summary',
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        ok: false,
        error: 'DatabaseError',
        message: 'Error loading finance summary',
      });
    });
  });

  describe('GET /api/v1/me/access', () => {
    it('summarizes the caller access', async () => {
      testApp = await makeTestApp({
        username: 'alice',
        entitlements: {
          alice: [
            makeEntitlement({ department_name: 'Physics' }),
            makeEntitlement({ department_name: 'Art' }),
          ],
        },
      });

      const response = await testApp.app.inject({ method: 'GET', url: '/api/v1/me/access' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: {
          username: 'alice',
          accessLevel: 'department_viewer',
          departments: ['Art', 'Physics'],
          scope: 'multiple',
        },
      });
    });

    it('returns 503 when the identity is unknown', async () => {
      testApp = await makeTestApp({ username: null });

      const response = await testApp.app.inject({ method: 'GET', url: '/api/v1/me/access' });

      expect(response.statusCode).toBe(503);
    });
  });

  describe('POST /api/v1/finance/cache/refresh', () => {
    it('drops cached results so the next read hits the source', async () => {
      testApp = await makeTestApp({ transactions: [makeTransaction()] });
      const { app, repo } = testApp;
      await app.inject({ method: 'GET', url: '/' });

      const response = await app.inject({ method: 'POST', url: '/api/v1/finance/cache/refresh' });
      await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ ok: true, data: { cleared: 3 } });
      expect(repo.calls.transactions).toBe(2);
    });
  });
});
