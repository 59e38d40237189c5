import { generateKeyPairSync, createPublicKey } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { jwtVerify } from 'jose';
import { authenticate } from './authenticate.js';
import { issueAdminToken } from './admin-token.js';
import { createRoutedHttpClient } from '../test/mocks.js';
import {
  ADMIN_TOKEN_REPLY,
  TEST_ADMIN_PASSWORD,
  TEST_ADMIN_USER,
  TEST_PAT,
  TEST_ZITADEL_DOMAIN,
  TEST_ZITADEL_URL,
} from '../test/fixtures.js';

const TOKEN = 'POST /oauth/v2/token';
const NOW_MS = 1_700_000_000_000;

const keyPair = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
});

let keyDir = '';
let keyFile = '';

beforeAll(async () => {
  keyDir = await mkdtemp(join(tmpdir(), 'idp-provisioning-'));
  keyFile = join(keyDir, 'key.json');
  await writeFile(
    keyFile,
    JSON.stringify({ type: 'serviceaccount', keyId: 'key-1', key: keyPair.privateKey, userId: 'user-42' })
  );
});

afterAll(async () => {
  await rm(keyDir, { recursive: true, force: true });
});

describe('authenticate', () => {
  it('uses a personal access token as is', async () => {
    const http = createRoutedHttpClient({});

    const result = await authenticate({ domain: TEST_ZITADEL_DOMAIN, pat: TEST_PAT }, { httpClient: http });

    expect(result.isOk() && result.value).toEqual({ baseUrl: TEST_ZITADEL_URL, token: 'test-pat' });
    expect(http.requests).toHaveLength(0);
  });

  it('prefers the token over other credentials', async () => {
    const http = createRoutedHttpClient({});

    const result = await authenticate(
      {
        domain: TEST_ZITADEL_DOMAIN,
        pat: TEST_PAT,
        adminUser: TEST_ADMIN_USER,
        adminPassword: TEST_ADMIN_PASSWORD,
      },
      { httpClient: http }
    );

    expect(result.isOk() && result.value.token).toBe('test-pat');
  });

  describe('given a key file', () => {
    it('exchanges a signed assertion for an access token', async () => {
      const http = createRoutedHttpClient({
        [TOKEN]: { status: 200, body: { access_token: 'test-jwt-token', token_type: 'Bearer' } },
      });

      const result = await authenticate(
        { domain: TEST_ZITADEL_DOMAIN, keyFile },
        { httpClient: http, now: () => NOW_MS }
      );

      expect(result.isOk() && result.value.token).toBe('test-jwt-token');
      const form = new URLSearchParams(http.callsTo(TOKEN)[0]?.rawBody ?? '');
      expect(form.get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:jwt-bearer');
      const { payload } = await jwtVerify(form.get('assertion') ?? '', createPublicKey(keyPair.publicKey), {
        currentDate: new Date(NOW_MS),
      });
      expect(payload).toMatchObject({ iss: 'user-42', sub: 'user-42', aud: TEST_ZITADEL_URL });
    });

    it('reports a missing key file', async () => {
      const missing = join(keyDir, 'missing.json');

      const result = await authenticate(
        { domain: TEST_ZITADEL_DOMAIN, keyFile: missing },
        { httpClient: createRoutedHttpClient({}) }
      );

      expect(result.isErr() && result.error.code).toBe('INVALID_CONFIGURATION');
      expect(result.isErr() && result.error.message.startsWith(`Cannot read key file ${missing}: `)).toBe(
        true
      );
    });
  });

  it('falls back to the admin password grant', async () => {
    const http = createRoutedHttpClient({ [TOKEN]: ADMIN_TOKEN_REPLY });

    const result = await authenticate(
      { domain: TEST_ZITADEL_DOMAIN, adminUser: TEST_ADMIN_USER, adminPassword: TEST_ADMIN_PASSWORD },
      { httpClient: http }
    );

    expect(result.isOk() && result.value.token).toBe('test-admin-token');
    const form = new URLSearchParams(http.callsTo(TOKEN)[0]?.rawBody ?? '');
    expect(form.get('grant_type')).toBe('password');
    expect(form.get('username')).toBe(TEST_ADMIN_USER);
  });

  it('fails without credentials', async () => {
    const result = await authenticate(
      { domain: TEST_ZITADEL_DOMAIN, adminUser: TEST_ADMIN_USER },
      { httpClient: createRoutedHttpClient({}) }
    );

    expect(result.isErr() && result.error).toEqual({
      code: 'INVALID_CONFIGURATION',
      message: 'No Zitadel credentials provided',
      actionRequired: 'Provide --pat, --key-file, or --admin-user with --admin-password',
    });
  });
});

describe('issueAdminToken', () => {
  it('returns the token in snake case', async () => {
    const http = createRoutedHttpClient({ [TOKEN]: ADMIN_TOKEN_REPLY });

    const result = await issueAdminToken(
      { domain: TEST_ZITADEL_DOMAIN, adminUser: TEST_ADMIN_USER, adminPassword: TEST_ADMIN_PASSWORD },
      { httpClient: http }
    );

    expect(result.isOk() && result.value).toEqual({
      access_token: 'test-admin-token',
      token_type: 'Bearer',
      expires_in: 43199,
    });
  });
});
