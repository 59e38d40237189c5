/**
 * OAuth 2.0 token endpoint calls used to obtain an admin bearer token.
 *
 * Tokens are requested once per process and never refreshed.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import {
  createHttpError,
  createInvalidResponseError,
  TRANSPORT_FAILURE_STATUS,
  type ProvisioningError,
} from '../errors.js';
import { isSuccessStatus, parseJsonBody } from '../http/api-session.js';
import type { HttpClient } from '../http/types.js';
import type { AccessToken, JwtBearerGrant, PasswordGrant } from './types.js';

/** Scope that makes Zitadel issue a token accepted by its own admin APIs. */
export const ZITADEL_API_SCOPE = 'openid profile email urn:zitadel:iam:org:project:id:zitadel:aud';

export const JWT_BEARER_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer';

const STEP = 'request access token';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.number().optional(),
});

const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Maps an error answer of the token endpoint, keeping the OAuth error code
 * and description in the message when the body has them.
 */
const toTokenError = (status: number, body: unknown): ProvisioningError => {
  const base = createHttpError(STEP, { status, body });
  const oauthError = oauthErrorSchema.safeParse(body);
  if (!oauthError.success) {
    return base;
  }

  const { error, error_description: description } = oauthError.data;
  const reason = description !== undefined ? `${error}: ${description}` : error;
  return { ...base, message: `${base.message} (${reason})` };
};

/**
 * Posts a form-encoded token request.
 *
 * @param httpClient - Transport
 * @param tokenEndpoint - Absolute token endpoint URL
 * @param fields - Form fields, grant_type included
 */
export const requestToken = async (
  httpClient: HttpClient,
  tokenEndpoint: string,
  fields: Readonly<Record<string, string>>
): Promise<Result<AccessToken, ProvisioningError>> => {
  const response = await httpClient.send({
    url: tokenEndpoint,
    method: 'POST',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: new URLSearchParams(fields).toString(),
  });

  if (response.isErr()) {
    return err(
      createHttpError(STEP, {
        status: TRANSPORT_FAILURE_STATUS,
        body: { error: response.error.message },
      })
    );
  }

  const { status } = response.value;
  const body = parseJsonBody(response.value.body);

  if (!isSuccessStatus(status)) {
    return err(toTokenError(status, body));
  }

  const parsed = tokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    return err(createInvalidResponseError(STEP, parsed.error));
  }

  const { access_token: accessToken, token_type: tokenType, expires_in: expiresIn } = parsed.data;
  const token: AccessToken =
    expiresIn !== undefined ? { accessToken, tokenType, expiresIn } : { accessToken, tokenType };
  return ok(token);
};

/**
 * Exchanges a signed JWT assertion for an access token.
 */
export const exchangeJwtAssertion = (
  httpClient: HttpClient,
  grant: JwtBearerGrant
): Promise<Result<AccessToken, ProvisioningError>> =>
  requestToken(httpClient, grant.tokenEndpoint, {
    grant_type: JWT_BEARER_GRANT_TYPE,
    assertion: grant.assertion,
    scope: grant.scope ?? ZITADEL_API_SCOPE,
  });

/**
 * Resource-owner password grant with admin credentials.
 *
 * Only meant for the one-time bootstrap of automation credentials.
 */
export const requestPasswordGrant = (
  httpClient: HttpClient,
  grant: PasswordGrant
): Promise<Result<AccessToken, ProvisioningError>> =>
  requestToken(httpClient, grant.tokenEndpoint, {
    grant_type: 'password',
    username: grant.username,
    password: grant.password,
    scope: grant.scope ?? ZITADEL_API_SCOPE,
  });
