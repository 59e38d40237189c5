/**
 * Typed access to the Authentik admin API (`/api/v3`).
 *
 * Listing calls follow `pagination.next` until the last page. Create and
 * update calls return the raw `{ status, body }` so the reconciler can tell
 * a 409 apart from other failures.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import { createPaginationLimitError, type ProvisioningError } from '../errors.js';
import { createApiSession } from '../http/api-session.js';
import type { ApiResponse, ApiSession, HttpClient } from '../http/types.js';
import { expectBody } from '../reconcile/reconcile.js';
import type { Schema } from '../reconcile/types.js';
import type { ApiConnection } from '../types.js';
import {
  applicationSchema,
  authenticatorValidateStageSchema,
  certificateKeyPairSchema,
  flowBindingSchema,
  flowSchema,
  oauth2ProviderSchema,
  pageSchema,
  stageSchema,
  type Application,
  type AuthenticatorValidateStage,
  type CertificateKeyPair,
  type Flow,
  type FlowBinding,
  type OAuth2Provider,
  type Stage,
} from './schemas.js';

export const AUTHENTIK_PATHS = {
  flows: '/api/v3/flows/instances/',
  flowBindings: '/api/v3/flows/bindings/',
  certificateKeyPairs: '/api/v3/crypto/certificatekeypairs/',
  oauth2Providers: '/api/v3/providers/oauth2/',
  applications: '/api/v3/core/applications/',
  invitationStages: '/api/v3/stages/invitation/',
  validateStages: '/api/v3/stages/authenticator/validate/',
  totpStages: '/api/v3/stages/authenticator/totp/',
  initialSetup: '/if/flow/initial-setup/',
} as const;

/** Upper bound on followed pages, in case a server keeps answering `next`. */
export const MAX_PAGES = 100;

type Listing<T> = Promise<Result<readonly T[], ProvisioningError>>;

export interface OAuth2ProviderPayload {
  readonly name: string;
  readonly authorization_flow: string;
  readonly invalidation_flow?: string;
  readonly client_type: 'confidential' | 'public';
  readonly redirect_uris: readonly { readonly matching_mode: 'strict' | 'regex'; readonly url: string }[];
  readonly signing_key: string;
  readonly sub_mode: string;
  readonly include_claims_in_id_token: boolean;
}

export interface ApplicationPayload {
  readonly name: string;
  readonly slug: string;
  readonly provider: number;
  readonly meta_launch_url?: string;
}

export interface InvitationStagePayload {
  readonly name: string;
  readonly continue_flow_without_invitation: boolean;
}

export interface FlowBindingPayload {
  readonly target: string;
  readonly stage: string;
  readonly order: number;
  readonly evaluate_on_plan: boolean;
  readonly re_evaluate_policies: boolean;
}

export interface ValidateStagePatch {
  readonly name: string;
  readonly not_configured_action: 'configure' | 'skip' | 'deny';
  readonly configuration_stages: readonly string[];
}

export interface AuthentikClient {
  readonly session: ApiSession;
  readonly flows: () => Listing<Flow>;
  readonly flowBindings: (flowPk: string) => Listing<FlowBinding>;
  readonly certificateKeyPairs: () => Listing<CertificateKeyPair>;
  readonly oauth2Providers: () => Listing<OAuth2Provider>;
  readonly applications: () => Listing<Application>;
  readonly invitationStages: () => Listing<Stage>;
  readonly validateStages: () => Listing<AuthenticatorValidateStage>;
  readonly totpStages: () => Listing<Stage>;
  readonly createOAuth2Provider: (payload: OAuth2ProviderPayload) => Promise<ApiResponse>;
  readonly createApplication: (payload: ApplicationPayload) => Promise<ApiResponse>;
  readonly updateApplication: (
    slug: string,
    patch: Partial<ApplicationPayload>
  ) => Promise<Result<Application, ProvisioningError>>;
  readonly createInvitationStage: (payload: InvitationStagePayload) => Promise<ApiResponse>;
  readonly createFlowBinding: (payload: FlowBindingPayload) => Promise<ApiResponse>;
  readonly updateValidateStage: (
    pk: string,
    patch: ValidateStagePatch
  ) => Promise<Result<AuthenticatorValidateStage, ProvisioningError>>;
  /** True while the initial-setup flow still renders (200), i.e. no admin exists yet */
  readonly initialSetupPending: () => Promise<boolean>;
}

const withPage = (path: string, page: number): string =>
  `${path}${path.includes('?') ? '&' : '?'}page=${String(page)}`;

/**
 * Reads every page of a listing.
 *
 * @param session - Authenticated session
 * @param path - Listing path, optionally with filters
 * @param item - Schema of one record
 * @param step - What is being listed, for errors
 * @param maxPages - Pages read before the listing is reported as unbounded
 */
export const listAll = async <T>(
  session: ApiSession,
  path: string,
  item: Schema<T>,
  step: string,
  maxPages = MAX_PAGES
): Listing<T> => {
  const schema = pageSchema(item);
  const records: T[] = [];
  let nextPath: string | undefined = path;
  let page = 1;

  while (nextPath !== undefined) {
    if (page > maxPages) {
      return err(createPaginationLimitError(step, maxPages));
    }

    const parsed = expectBody(await session.request('GET', nextPath), schema, step);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    records.push(...parsed.value.results);
    const next: number = parsed.value.pagination?.next ?? 0;
    nextPath = next > page ? withPage(path, next) : undefined;
    page = next;
  }

  return ok(records);
};

/**
 * Creates an Authentik admin API client over a session.
 *
 * @example
 * ```typescript
 * const authentik = createAuthentikClient(session);
 * const flows = await authentik.flows();
 * ```
 */
export const createAuthentikClient = (session: ApiSession): AuthentikClient => ({
  session,
  flows: () => listAll(session, AUTHENTIK_PATHS.flows, flowSchema, 'list flows'),
  flowBindings: (flowPk) =>
    listAll(
      session,
      `${AUTHENTIK_PATHS.flowBindings}?target=${encodeURIComponent(flowPk)}`,
      flowBindingSchema,
      'list flow bindings'
    ),
  certificateKeyPairs: () =>
    listAll(
      session,
      AUTHENTIK_PATHS.certificateKeyPairs,
      certificateKeyPairSchema,
      'list certificate key pairs'
    ),
  oauth2Providers: () =>
    listAll(session, AUTHENTIK_PATHS.oauth2Providers, oauth2ProviderSchema, 'list OAuth2 providers'),
  applications: () =>
    listAll(session, AUTHENTIK_PATHS.applications, applicationSchema, 'list applications'),
  invitationStages: () =>
    listAll(session, AUTHENTIK_PATHS.invitationStages, stageSchema, 'list invitation stages'),
  validateStages: () =>
    listAll(
      session,
      AUTHENTIK_PATHS.validateStages,
      authenticatorValidateStageSchema,
      'list authenticator validate stages'
    ),
  totpStages: () => listAll(session, AUTHENTIK_PATHS.totpStages, stageSchema, 'list TOTP setup stages'),

  createOAuth2Provider: (payload) => session.request('POST', AUTHENTIK_PATHS.oauth2Providers, payload),
  createApplication: (payload) => session.request('POST', AUTHENTIK_PATHS.applications, payload),
  updateApplication: async (slug, patch) =>
    expectBody(
      await session.request(
        'PATCH',
        `${AUTHENTIK_PATHS.applications}${encodeURIComponent(slug)}/`,
        patch
      ),
      applicationSchema,
      'update application'
    ),
  createInvitationStage: (payload) =>
    session.request('POST', AUTHENTIK_PATHS.invitationStages, payload),
  createFlowBinding: (payload) => session.request('POST', AUTHENTIK_PATHS.flowBindings, payload),
  updateValidateStage: async (pk, patch) =>
    expectBody(
      await session.request('PATCH', `${AUTHENTIK_PATHS.validateStages}${encodeURIComponent(pk)}/`, patch),
      authenticatorValidateStageSchema,
      'update authenticator validate stage'
    ),
  initialSetupPending: async () => {
    const { status } = await session.request('GET', AUTHENTIK_PATHS.initialSetup);
    return status === 200;
  },
});

/**
 * Creates a client authenticated with the connection's API token.
 */
export const connectAuthentik = (connection: ApiConnection, httpClient: HttpClient): AuthentikClient =>
  createAuthentikClient(
    createApiSession({
      baseUrl: connection.baseUrl,
      credentials: { type: 'bearer', token: connection.token },
      httpClient,
    })
  );
