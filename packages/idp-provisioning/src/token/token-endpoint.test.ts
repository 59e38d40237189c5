import { describe, it, expect } from 'vitest';
import {
  requestToken,
  exchangeJwtAssertion,
  requestPasswordGrant,
  ZITADEL_API_SCOPE,
  JWT_BEARER_GRANT_TYPE,
} from './token-endpoint.js';
import { createRoutedHttpClient, createUnreachableHttpClient } from '../test/mocks.js';
import { TEST_ADMIN_PASSWORD, TEST_ADMIN_USER, TEST_ZITADEL_URL } from '../test/fixtures.js';

const TOKEN_ENDPOINT = `${TEST_ZITADEL_URL}/oauth/v2/token`;

const formOf = (rawBody: string | undefined): URLSearchParams => new URLSearchParams(rawBody ?? '');

describe('requestToken', () => {
  describe('given a successful token response', () => {
    it('returns the access token, type and lifetime', async () => {
      const client = createRoutedHttpClient({
        'POST /oauth/v2/token': {
          status: 200,
          body: { access_token: 'test-access-token', token_type: 'Bearer', expires_in: 43199 },
        },
      });

      const result = await requestToken(client, TOKEN_ENDPOINT, { grant_type: 'client_credentials' });

      expect(result.isOk() && result.value).toEqual({
        accessToken: 'test-access-token',
        tokenType: 'Bearer',
        expiresIn: 43199,
      });
    });

    it('posts the fields form-encoded', async () => {
      const client = createRoutedHttpClient({
        'POST /oauth/v2/token': { status: 200, body: { access_token: 'test-access-token' } },
      });

      await requestToken(client, TOKEN_ENDPOINT, { grant_type: 'password', username: 'a b' });

      const [request] = client.requests;
      expect(request?.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
      expect(request?.rawBody).toBe('grant_type=password&username=a+b');
    });

    it('defaults the token type to Bearer and omits a missing lifetime', async () => {
      const client = createRoutedHttpClient({
        'POST /oauth/v2/token': { status: 200, body: { access_token: 'test-access-token' } },
      });

      const result = await requestToken(client, TOKEN_ENDPOINT, { grant_type: 'password' });

      expect(result.isOk() && result.value).toEqual({
        accessToken: 'test-access-token',
        tokenType: 'Bearer',
      });
    });
  });

  describe('given an OAuth error response', () => {
    it('keeps the error code and description in the message', async () => {
      const client = createRoutedHttpClient({
        'POST /oauth/v2/token': {
          status: 400,
          body: { error: 'invalid_grant', error_description: 'password invalid' },
        },
      });

      const result = await requestToken(client, TOKEN_ENDPOINT, { grant_type: 'password' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          code: 'HTTP_ERROR',
          message: 'Failed to request access token: HTTP 400 (invalid_grant: password invalid)',
          status: 400,
          details: { error: 'invalid_grant', error_description: 'password invalid' },
        });
      }
    });

    it('reports a non-JSON error body as raw text', async () => {
      const client = createRoutedHttpClient({
        'POST /oauth/v2/token': { status: 500, body: '<html>oops</html>' },
      });

      const result = await requestToken(client, TOKEN_ENDPOINT, { grant_type: 'password' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Failed to request access token: HTTP 500');
        expect(result.error.details).toEqual({ error: '<html>oops</html>' });
      }
    });
  });

  describe('given a successful status without a token', () => {
    it('returns an invalid-response error', async () => {
      const client = createRoutedHttpClient({
        'POST /oauth/v2/token': { status: 200, body: { token_type: 'Bearer' } },
      });

      const result = await requestToken(client, TOKEN_ENDPOINT, { grant_type: 'password' });

      expect(result.isErr() && result.error.code).toBe('INVALID_RESPONSE');
    });
  });

  describe('given an unreachable endpoint', () => {
    it('returns a transport error with status 0', async () => {
      const result = await requestToken(createUnreachableHttpClient(), TOKEN_ENDPOINT, {
        grant_type: 'password',
      });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          code: 'TRANSPORT_ERROR',
          message: 'Failed to request access token: no response',
          status: 0,
          details: { error: 'connect ECONNREFUSED' },
        });
      }
    });
  });
});

describe('exchangeJwtAssertion', () => {
  it('sends the jwt-bearer grant with the admin API scope', async () => {
    const client = createRoutedHttpClient({
      'POST /oauth/v2/token': { status: 200, body: { access_token: 'test-access-token' } },
    });

    await exchangeJwtAssertion(client, { tokenEndpoint: TOKEN_ENDPOINT, assertion: 'a.b.c' });

    const form = formOf(client.requests[0]?.rawBody);
    expect(form.get('grant_type')).toBe(JWT_BEARER_GRANT_TYPE);
    expect(form.get('assertion')).toBe('a.b.c');
    expect(form.get('scope')).toBe(ZITADEL_API_SCOPE);
  });
});

describe('requestPasswordGrant', () => {
  it('sends the admin credentials', async () => {
    const client = createRoutedHttpClient({
      'POST /oauth/v2/token': { status: 200, body: { access_token: 'test-access-token' } },
    });

    const result = await requestPasswordGrant(client, {
      tokenEndpoint: TOKEN_ENDPOINT,
      username: TEST_ADMIN_USER,
      password: TEST_ADMIN_PASSWORD,
      scope: 'openid',
    });

    const form = formOf(client.requests[0]?.rawBody);
    expect(form.get('grant_type')).toBe('password');
    expect(form.get('username')).toBe(TEST_ADMIN_USER);
    expect(form.get('password')).toBe(TEST_ADMIN_PASSWORD);
    expect(form.get('scope')).toBe('openid');
    expect(result.isOk() && result.value.accessToken).toBe('test-access-token');
  });
});
