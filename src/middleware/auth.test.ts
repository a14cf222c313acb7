import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { StubResponse, stubMiddlewareRequest } from '../testing/httpStubs';
import { requireApiAuth, validateApiToken } from './auth';

import type { IncomingHttpHeaders } from 'node:http';

const TOKEN = 'sk-test-secret';

describe('requireApiAuth', () => {
  beforeEach(() => {
    vi.stubEnv('API_TOKEN', TOKEN);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('passes a request carrying the token', () => {
    const next = vi.fn();
    const res = new StubResponse();

    requireApiAuth(stubMiddlewareRequest({ headers: { 'api-key': TOKEN } }), res, next);

    expect(next).toHaveBeenCalledOnce();
    expect(res.status).not.toHaveBeenCalled();
  });

  it.each<[string, IncomingHttpHeaders]>([
    ['a missing token', {}],
    ['a token without the prefix', { 'api-key': 'test-secret' }],
    ['a different token', { 'api-key': 'sk-test-other' }],
  ])('rejects %s with 401', (_label, headers) => {
    const next = vi.fn();
    const res = new StubResponse();

    requireApiAuth(stubMiddlewareRequest({ headers }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ error: 'Unauthorized: Invalid API token' });
  });
});

describe('validateApiToken', () => {
  it('accepts a prefixed token', () => {
    expect(() => {
      validateApiToken(TOKEN);
    }).not.toThrow();
  });

  it('rejects a missing or unprefixed token', () => {
    expect(() => {
      validateApiToken(undefined);
    }).toThrow('API_TOKEN environment variable is required');
    expect(() => {
      validateApiToken('test-secret');
    }).toThrow('API_TOKEN must start with "sk-"');
  });
});
