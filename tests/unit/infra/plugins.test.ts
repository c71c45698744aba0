import { describe, it, expect } from 'vitest';

import { getAllowedOrigins, isLocalhostOrigin } from '@/infra/plugins/index.js';

import { makeTestConfig } from '../../fixtures/builders.js';

describe('getAllowedOrigins', () => {
  it('combines the list and the client URL', () => {
    const config = makeTestConfig({
      cors: {
        allowedOrigins: 'https://a.example.org, https://b.example.org,,',
        clientBaseUrl: ' https://app.example.org ',
      },
    });

    expect([...getAllowedOrigins(config)]).toEqual([
      'https://a.example.org',
      'https://b.example.org',
      'https://app.example.org',
    ]);
  });

  it('is empty when nothing is configured', () => {
    expect(getAllowedOrigins(makeTestConfig()).size).toBe(0);
  });
});

describe('isLocalhostOrigin', () => {
  it('accepts loopback origins over http and https', () => {
    expect(isLocalhostOrigin('http://localhost:5173')).toBe(true);
    expect(isLocalhostOrigin('https://127.0.0.1')).toBe(true);
    expect(isLocalhostOrigin('http://[::1]:3000')).toBe(true);
  });

  it('rejects other hosts, schemes and garbage', () => {
    expect(isLocalhostOrigin('https://localhost.example.org')).toBe(false);
    expect(isLocalhostOrigin('ftp://localhost')).toBe(false);
    expect(isLocalhostOrigin('not a url')).toBe(false);
  });
});
