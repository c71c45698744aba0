/**
 * Builds the application over in-process fakes.
 */

import { createApp, type AppDeps } from '@/app/build-app.js';

import { makeTestClock, makeTestConfig, makeTestLogger } from '../fixtures/builders.js';
import {
  makeFakeFinanceRepo,
  makeFakeIdentitySource,
  type FakeFinanceRepo,
  type FakeFinanceRepoOptions,
  type FakeIdentitySource,
} from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

export interface TestApp {
  app: FastifyInstance;
  repo: FakeFinanceRepo;
  identity: FakeIdentitySource;
}

export interface TestAppOptions extends FakeFinanceRepoOptions {
  username?: string | null;
  deps?: Partial<AppDeps>;
}

export const makeTestApp = async (options: TestAppOptions = {}): Promise<TestApp> => {
  const { username = 'analyst', deps = {}, ...repoOptions } = options;
  const repo = makeFakeFinanceRepo(repoOptions);
  const identity = makeFakeIdentitySource(username);

  const app = await createApp({
    deps: {
      config: makeTestConfig(),
      logger: makeTestLogger(),
      financeRepo: repo,
      identity,
      clock: makeTestClock(),
      ...deps,
    },
  });

  return { app, repo, identity };
};
