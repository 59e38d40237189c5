import { ok, err, type Result } from 'neverthrow';
import { createConfigurationError, type ProvisioningError } from '../errors.js';
import { joinUrl } from '../http/api-session.js';
import { silentLogger } from '../log/logger.js';
import { createJwtAssertion } from '../token/jwt-assertion.js';
import { readServiceAccountKey } from '../token/service-account-key.js';
import { exchangeJwtAssertion, requestPasswordGrant } from '../token/token-endpoint.js';
import type { AccessToken } from '../token/types.js';
import type { ApiConnection, ProvisionDeps } from '../types.js';
import { ZITADEL_PATHS, zitadelBaseUrl } from './client.js';
import type { ZitadelAccess } from './types.js';

export interface AdminCredentials {
  readonly domain: string;
  readonly adminUser: string;
  readonly adminPassword: string;
}

/**
 * Password grant against the Zitadel token endpoint.
 */
export const requestAdminToken = (
  credentials: AdminCredentials,
  deps: ProvisionDeps
): Promise<Result<AccessToken, ProvisioningError>> =>
  requestPasswordGrant(deps.httpClient, {
    tokenEndpoint: joinUrl(zitadelBaseUrl(credentials.domain), ZITADEL_PATHS.token),
    username: credentials.adminUser,
    password: credentials.adminPassword,
  });

const exchangeKeyFile = async (
  baseUrl: string,
  keyFile: string,
  deps: ProvisionDeps
): Promise<Result<AccessToken, ProvisioningError>> => {
  const key = await readServiceAccountKey(keyFile);
  if (key.isErr()) {
    return err(key.error);
  }

  const assertion = await createJwtAssertion({ key: key.value, audience: baseUrl, now: deps.now });
  if (assertion.isErr()) {
    return err(assertion.error);
  }

  return exchangeJwtAssertion(deps.httpClient, {
    tokenEndpoint: joinUrl(baseUrl, ZITADEL_PATHS.token),
    assertion: assertion.value,
  });
};

/**
 * Resolves the credentials of `access` to a bearer connection.
 *
 * A personal access token is used as is. A key file is exchanged through a
 * signed JWT assertion, admin credentials through the password grant.
 */
export const authenticate = async (
  access: ZitadelAccess,
  deps: ProvisionDeps
): Promise<Result<ApiConnection, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('zitadel');
  const baseUrl = zitadelBaseUrl(access.domain);

  if (access.pat !== undefined) {
    const connection: ApiConnection = { baseUrl, token: access.pat };
    return ok(connection);
  }

  let token: Result<AccessToken, ProvisioningError>;
  if (access.keyFile !== undefined) {
    logger.info(`Exchanging key file ${access.keyFile} for an access token`);
    token = await exchangeKeyFile(baseUrl, access.keyFile, deps);
  } else if (access.adminUser !== undefined && access.adminPassword !== undefined) {
    logger.info(`Requesting an access token for ${access.adminUser}`);
    token = await requestAdminToken(
      { domain: access.domain, adminUser: access.adminUser, adminPassword: access.adminPassword },
      deps
    );
  } else {
    return err({
      ...createConfigurationError('No Zitadel credentials provided'),
      actionRequired: 'Provide --pat, --key-file, or --admin-user with --admin-password',
    });
  }

  return token.map((issued): ApiConnection => ({ baseUrl, token: issued.accessToken }));
};
