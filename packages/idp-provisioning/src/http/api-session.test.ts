import { describe, it, expect } from 'vitest';
import { createApiSession, parseJsonBody, isSuccessStatus, joinUrl } from './api-session.js';
import { createRoutedHttpClient, createUnreachableHttpClient } from '../test/mocks.js';
import { TEST_AUTHENTIK_URL, TEST_API_TOKEN } from '../test/fixtures.js';

describe('parseJsonBody', () => {
  it('decodes JSON', () => {
    expect(parseJsonBody('{"pk":1}')).toEqual({ pk: 1 });
  });

  it('wraps text that is not JSON', () => {
    expect(parseJsonBody('<html>Bad Gateway</html>')).toEqual({
      error: '<html>Bad Gateway</html>',
    });
  });

  it('decodes an empty body to null', () => {
    expect(parseJsonBody('')).toBeNull();
  });
});

describe('isSuccessStatus', () => {
  it.each([
    [200, true],
    [201, true],
    [302, true],
    [399, true],
    [400, false],
    [409, false],
    [0, false],
  ])('status %i → %s', (status, expected) => {
    expect(isSuccessStatus(status)).toBe(expected);
  });
});

describe('joinUrl', () => {
  it('joins without doubling the slash', () => {
    expect(joinUrl('https://auth.example.com/', '/api/v3/')).toBe('https://auth.example.com/api/v3/');
  });

  it('adds a missing slash', () => {
    expect(joinUrl('https://auth.example.com', 'api/v3/')).toBe('https://auth.example.com/api/v3/');
  });
});

describe('createApiSession', () => {
  describe('given a bearer token', () => {
    it('sends JSON headers, the token and the serialized payload', async () => {
      const client = createRoutedHttpClient({
        'POST /api/v3/core/applications/': { status: 201, body: { pk: 'app-1' } },
      });
      const session = createApiSession({
        baseUrl: `${TEST_AUTHENTIK_URL}/`,
        credentials: { type: 'bearer', token: TEST_API_TOKEN },
        httpClient: client,
      });

      const response = await session.request('POST', '/api/v3/core/applications/', {
        name: 'Nextcloud',
      });

      expect(response).toEqual({ status: 201, body: { pk: 'app-1' } });
      expect(client.requests[0]?.url).toBe(`${TEST_AUTHENTIK_URL}/api/v3/core/applications/`);
      expect(client.requests[0]?.headers).toEqual({
        Accept: 'application/json',
        'Content-Type': 'application/json',
        Authorization: `Bearer ${TEST_API_TOKEN}`,
      });
      expect(client.requests[0]?.json).toEqual({ name: 'Nextcloud' });
    });
  });

  describe('given an error status', () => {
    it('returns the status with the structured body', async () => {
      const client = createRoutedHttpClient({
        'POST /api/v3/providers/oauth2/': {
          status: 400,
          body: { name: ['This field must be unique.'] },
        },
      });
      const session = createApiSession({
        baseUrl: TEST_AUTHENTIK_URL,
        credentials: { type: 'bearer', token: TEST_API_TOKEN },
        httpClient: client,
      });

      const response = await session.request('POST', '/api/v3/providers/oauth2/', {});

      expect(response).toEqual({ status: 400, body: { name: ['This field must be unique.'] } });
    });

    it('wraps an unstructured body', async () => {
      const client = createRoutedHttpClient({
        'GET /api/v3/flows/instances/': { status: 502, body: 'Bad Gateway' },
      });
      const session = createApiSession({
        baseUrl: TEST_AUTHENTIK_URL,
        credentials: { type: 'bearer', token: TEST_API_TOKEN },
        httpClient: client,
      });

      const response = await session.request('GET', '/api/v3/flows/instances/');

      expect(response).toEqual({ status: 502, body: { error: 'Bad Gateway' } });
    });
  });

  describe('given a transport failure', () => {
    it('returns status 0 with an error payload instead of rejecting', async () => {
      const session = createApiSession({
        baseUrl: TEST_AUTHENTIK_URL,
        credentials: { type: 'none' },
        httpClient: createUnreachableHttpClient('connect ECONNREFUSED 10.0.0.5:443'),
      });

      const response = await session.request('GET', '/');

      expect(response).toEqual({
        status: 0,
        body: { error: 'connect ECONNREFUSED 10.0.0.5:443' },
      });
    });
  });

  describe('given a response that sets a cookie', () => {
    it('reuses the captured cookie when no bearer token is configured', async () => {
      const client = createRoutedHttpClient({
        'GET /': { status: 302, headers: { 'set-cookie': 'authentik_session=abc123; Path=/; HttpOnly' } },
        'GET /api/v3/core/users/me/': { status: 200, body: { user: { pk: 1 } } },
      });
      const session = createApiSession({
        baseUrl: TEST_AUTHENTIK_URL,
        credentials: { type: 'none' },
        httpClient: client,
      });

      await session.request('GET', '/');
      await session.request('GET', '/api/v3/core/users/me/');

      expect(session.sessionCookie()).toBe('authentik_session=abc123');
      expect(client.requests[0]?.headers['Cookie']).toBeUndefined();
      expect(client.requests[1]?.headers['Cookie']).toBe('authentik_session=abc123');
    });

    it('keeps the bearer token and does not send the cookie', async () => {
      const client = createRoutedHttpClient({
        'GET /': { status: 200, headers: { 'set-cookie': 'sid=xyz' } },
        'GET /api/v3/flows/instances/': { status: 200, body: { results: [] } },
      });
      const session = createApiSession({
        baseUrl: TEST_AUTHENTIK_URL,
        credentials: { type: 'bearer', token: TEST_API_TOKEN },
        httpClient: client,
      });

      await session.request('GET', '/');
      await session.request('GET', '/api/v3/flows/instances/');

      expect(client.requests[1]?.headers['Cookie']).toBeUndefined();
      expect(client.requests[1]?.headers['Authorization']).toBe(`Bearer ${TEST_API_TOKEN}`);
    });

    it('prefers the captured cookie over the configured one', async () => {
      const client = createRoutedHttpClient({
        'GET /': { status: 200, headers: { 'set-cookie': 'sid=fresh; Secure' } },
        'GET /next': { status: 200, body: {} },
      });
      const session = createApiSession({
        baseUrl: TEST_AUTHENTIK_URL,
        credentials: { type: 'cookie', cookie: 'sid=stale' },
        httpClient: client,
      });

      await session.request('GET', '/');
      await session.request('GET', '/next');

      expect(client.requests[0]?.headers['Cookie']).toBe('sid=stale');
      expect(client.requests[1]?.headers['Cookie']).toBe('sid=fresh');
    });
  });
});
