/**
 * OIDC web application provisioning in a Zitadel project.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { ProvisioningError } from '../errors.js';
import { silentLogger } from '../log/logger.js';
import { parseWith, reconcile } from '../reconcile/reconcile.js';
import type { ProvisionDeps } from '../types.js';
import { authenticate } from './authenticate.js';
import { connectZitadel, type OidcAppPayload } from './client.js';
import { DEFAULT_PROJECT_NAME, oidcAppPolicy } from './policies.js';
import { reconcileProject } from './project.js';
import { createdOidcAppSchema, type OidcApp } from './schemas.js';
import type { OidcAppOptions, OidcAppOutput } from './types.js';
import { postLogoutUri } from './urls.js';

/**
 * Confidential code-flow client with refresh tokens; roles and user info
 * are asserted in the tokens.
 */
export const buildOidcAppPayload = (name: string, redirectUri: string): OidcAppPayload => ({
  name,
  redirectUris: [redirectUri],
  responseTypes: ['OIDC_RESPONSE_TYPE_CODE'],
  grantTypes: ['OIDC_GRANT_TYPE_AUTHORIZATION_CODE', 'OIDC_GRANT_TYPE_REFRESH_TOKEN'],
  appType: 'OIDC_APP_TYPE_WEB',
  authMethodType: 'OIDC_AUTH_METHOD_TYPE_BASIC',
  postLogoutRedirectUris: [postLogoutUri(redirectUri)],
  version: 'OIDC_VERSION_1_0',
  devMode: false,
  accessTokenType: 'OIDC_TOKEN_TYPE_BEARER',
  accessTokenRoleAssertion: true,
  idTokenRoleAssertion: true,
  idTokenUserinfoAssertion: true,
  clockSkew: '0s',
});

/**
 * Makes sure an OIDC application named `appName` exists in the SSO project
 * and returns its client credentials.
 *
 * The client secret is only returned by Zitadel when the application is
 * created; for an existing application the output carries a message instead.
 *
 * @example
 * ```typescript
 * const result = await provisionOidcApp(
 *   {
 *     domain: 'id.example.com',
 *     pat: process.env['ZITADEL_PAT'],
 *     appName: 'Nextcloud',
 *     redirectUri: 'https://cloud.example.com/apps/user_oidc/code',
 *   },
 *   { httpClient: createFetchClient() }
 * );
 * ```
 */
export const provisionOidcApp = async (
  options: OidcAppOptions,
  deps: ProvisionDeps
): Promise<Result<OidcAppOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('zitadel');

  const connection = await authenticate(options, deps);
  if (connection.isErr()) {
    return err(connection.error);
  }
  const client = connectZitadel(connection.value, deps.httpClient);

  const project = await reconcileProject(client, options.projectName ?? DEFAULT_PROJECT_NAME, logger);
  if (project.isErr()) {
    return err(project.error);
  }
  const projectId = project.value.resource.id;

  const app = await reconcile(
    {
      kind: 'OIDC application',
      list: () => client.oidcApps(projectId),
      create: () => client.createOidcApp(projectId, buildOidcAppPayload(options.appName, options.redirectUri)),
      parseCreated: (body) =>
        parseWith(createdOidcAppSchema, body, 'create OIDC application').map(
          ({ appId, clientId, clientSecret }): OidcApp =>
            clientSecret !== undefined
              ? { id: appId, name: options.appName, clientId, clientSecret }
              : { id: appId, name: options.appName, clientId }
        ),
    },
    { match: oidcAppPolicy(options.appName), logger }
  );
  if (app.isErr()) {
    return err(app.error);
  }

  const { resource } = app.value;
  if (app.value.status === 'created' && resource.clientId !== undefined) {
    const output: OidcAppOutput = {
      status: 'created',
      app_id: resource.id,
      client_id: resource.clientId,
      ...(resource.clientSecret !== undefined ? { client_secret: resource.clientSecret } : {}),
      redirect_uri: options.redirectUri,
      project_id: projectId,
    };
    return ok(output);
  }

  const output: OidcAppOutput = {
    status: 'exists',
    app_id: resource.id,
    ...(resource.clientId !== undefined ? { client_id: resource.clientId } : {}),
    project_id: projectId,
    message: `App '${options.appName}' already exists`,
  };
  return ok(output);
};
