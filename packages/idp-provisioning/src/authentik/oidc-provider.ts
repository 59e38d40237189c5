/**
 * End-to-end OIDC provider provisioning for one application.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import {
  createBootstrapRequiredError,
  createConfigurationError,
  createNotReadyError,
  type ProvisioningError,
} from '../errors.js';
import { createApiSession, joinUrl } from '../http/api-session.js';
import { silentLogger, type Logger } from '../log/logger.js';
import { waitForReady } from '../readiness/wait-for-ready.js';
import { lookup, parseWith, reconcile } from '../reconcile/reconcile.js';
import type { ProvisionDeps } from '../types.js';
import {
  AUTHENTIK_PATHS,
  createAuthentikClient,
  type ApplicationPayload,
  type AuthentikClient,
  type OAuth2ProviderPayload,
} from './client.js';
import {
  applicationPolicy,
  authorizationFlowPolicy,
  invalidationFlowPolicy,
  providerPolicy,
  signingKeyPolicy,
} from './policies.js';
import { applicationSchema, oauth2ProviderSchema } from './schemas.js';
import type { OidcProviderOptions, OidcProviderOutput } from './types.js';
import { deriveLaunchUrl, deriveSlug, discoveryUrl, issuerUrl } from './urls.js';

const DEFAULT_BOOTSTRAP_USER = 'akadmin';
const DEFAULT_WAIT_TIMEOUT_MS = 300_000;

/**
 * Explains what an operator has to do when no API token was given.
 */
const explainMissingToken = async (
  client: AuthentikClient,
  options: OidcProviderOptions
): Promise<ProvisioningError> => {
  const setupUrl = joinUrl(options.baseUrl, AUTHENTIK_PATHS.initialSetup);

  if (!(await client.initialSetupPending())) {
    return {
      ...createConfigurationError('No API token provided'),
      actionRequired: 'Create an API token in the Authentik admin interface',
      nextStep: 'Re-run with --token <token>',
    };
  }

  if (options.bootstrapPassword === undefined) {
    return createBootstrapRequiredError('Bootstrap needed but no password provided', {
      actionRequired: `Visit ${setupUrl} to complete setup`,
      nextStep: 'Create service account and provide --token',
    });
  }

  // The initial-setup flow is interactive; it is completed in a browser.
  return createBootstrapRequiredError('Bootstrap not yet automated', {
    actionRequired: `Visit ${setupUrl} manually`,
    instructions: [
      `1. Create admin user: ${options.bootstrapUser ?? DEFAULT_BOOTSTRAP_USER}`,
      '2. Create API token in admin UI',
      '3. Re-run with --token <token>',
    ],
  });
};

const resolveSlug = (options: OidcProviderOptions): Result<string, ProvisioningError> => {
  const slug = options.appSlug ?? deriveSlug(options.appName);
  if (slug.length > 0) {
    return ok(slug);
  }
  return err({
    ...createConfigurationError(`Cannot derive an application slug from "${options.appName}"`),
    actionRequired: 'Provide --app-slug',
  });
};

const createProviderAndApplication = async (
  client: AuthentikClient,
  options: OidcProviderOptions,
  slug: string,
  logger: Logger
): Promise<Result<OidcProviderOutput, ProvisioningError>> => {

  const flows = await client.flows();
  const authorizationFlow = lookup(flows, authorizationFlowPolicy, 'No authorization flow found');
  if (authorizationFlow.isErr()) {
    return err(authorizationFlow.error);
  }
  const invalidationFlow = flows.isOk() ? invalidationFlowPolicy.find(flows.value) : undefined;

  const signingKey = lookup(
    await client.certificateKeyPairs(),
    signingKeyPolicy,
    'No signing key found'
  );
  if (signingKey.isErr()) {
    return err(signingKey.error);
  }

  const providerPayload: OAuth2ProviderPayload = {
    name: options.appName,
    authorization_flow: authorizationFlow.value.pk,
    ...(invalidationFlow !== undefined ? { invalidation_flow: invalidationFlow.pk } : {}),
    client_type: 'confidential',
    redirect_uris: [{ matching_mode: 'strict', url: options.redirectUri }],
    signing_key: signingKey.value.pk,
    sub_mode: 'hashed_user_id',
    include_claims_in_id_token: true,
  };

  const provider = await reconcile(
    {
      kind: 'OAuth2 provider',
      list: client.oauth2Providers,
      create: () => client.createOAuth2Provider(providerPayload),
      parseCreated: (body) => parseWith(oauth2ProviderSchema, body, 'create OAuth2 provider'),
    },
    { match: providerPolicy(options.appName), logger }
  );
  if (provider.isErr()) {
    return err(provider.error);
  }
  const providerPk = provider.value.resource.pk;

  const applicationPayload: ApplicationPayload = {
    name: options.appName,
    slug,
    provider: providerPk,
    meta_launch_url: options.launchUrl ?? deriveLaunchUrl(options.redirectUri),
  };

  const application = await reconcile(
    {
      kind: 'application',
      list: client.applications,
      create: () => client.createApplication(applicationPayload),
      parseCreated: (body) => parseWith(applicationSchema, body, 'create application'),
    },
    {
      match: applicationPolicy(slug),
      enforce: {
        description: `link to provider ${String(providerPk)}`,
        isSatisfied: (app) => app.provider === providerPk,
        apply: (app) => client.updateApplication(app.slug, { provider: providerPk }),
      },
      logger,
    }
  );
  if (application.isErr()) {
    return err(application.error);
  }

  const { client_id: clientId, client_secret: clientSecret } = provider.value.resource;
  const output: OidcProviderOutput = {
    success: true,
    provider_id: providerPk,
    application_id: application.value.resource.pk,
    client_id: clientId,
    ...(clientSecret !== undefined ? { client_secret: clientSecret } : {}),
    discovery_uri: discoveryUrl(options.baseUrl, slug),
    issuer: issuerUrl(options.baseUrl, slug),
    provider_status: provider.value.status,
    application_status: application.value.status,
  };
  return ok(output);
};

/**
 * Makes sure an OAuth2/OIDC provider and a linked application exist for
 * `appName`, and returns the client credentials.
 *
 * Waits for Authentik to answer first. Without a token, checks whether the
 * initial setup is still pending and returns operator guidance.
 *
 * @example
 * ```typescript
 * const result = await provisionOidcProvider(
 *   {
 *     baseUrl: 'https://auth.example.com',
 *     token: process.env['AUTHENTIK_TOKEN'],
 *     appName: 'Nextcloud',
 *     redirectUri: 'https://cloud.example.com/apps/user_oidc/code',
 *   },
 *   { httpClient: createFetchClient() }
 * );
 * ```
 */
export const provisionOidcProvider = async (
  options: OidcProviderOptions,
  deps: ProvisionDeps
): Promise<Result<OidcProviderOutput, ProvisioningError>> => {
  const slug = resolveSlug(options);
  if (slug.isErr()) {
    return err(slug.error);
  }

  const logger = (deps.logger ?? silentLogger).child('authentik');
  const session = createApiSession({
    baseUrl: options.baseUrl,
    credentials:
      options.token !== undefined ? { type: 'bearer', token: options.token } : { type: 'none' },
    httpClient: deps.httpClient,
  });
  const client = createAuthentikClient(session);

  const timeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
  const ready = await waitForReady(session, {
    timeoutMs,
    intervalMs: options.waitIntervalMs,
    serviceName: 'Authentik',
    logger,
    now: deps.now,
    sleep: deps.sleep,
  });
  if (!ready) {
    return err(createNotReadyError('Authentik', timeoutMs));
  }

  if (options.token === undefined) {
    return err(await explainMissingToken(client, options));
  }

  return createProviderAndApplication(client, options, slug.value, logger);
};
