/**
 * Typed access to the Zitadel management API (`/management/v1`).
 *
 * Searches are POST calls; create calls return the raw `{ status, body }`
 * so the reconciler can tell a 409 apart from other failures.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import { createHttpError, type ProvisioningError } from '../errors.js';
import { createApiSession, isSuccessStatus } from '../http/api-session.js';
import type { ApiResponse, ApiSession, HttpClient } from '../http/types.js';
import { expectBody } from '../reconcile/reconcile.js';
import type { Schema } from '../reconcile/types.js';
import type { ApiConnection } from '../types.js';
import {
  machineKeySchema,
  oidcAppRecordSchema,
  personalAccessTokenSchema,
  projectMemberSchema,
  projectSchema,
  searchSchema,
  userSchema,
  type OidcApp,
  type PersonalAccessToken,
  type Project,
  type ProjectMember,
  type User,
} from './schemas.js';

type Listing<T> = Promise<Result<readonly T[], ProvisioningError>>;

const MANAGEMENT = '/management/v1';

export const ZITADEL_PATHS = {
  token: '/oauth/v2/token',
  projects: `${MANAGEMENT}/projects`,
  users: `${MANAGEMENT}/users`,
  machineUsers: `${MANAGEMENT}/users/machine`,
} as const;

const projectPath = (projectId: string): string =>
  `${ZITADEL_PATHS.projects}/${encodeURIComponent(projectId)}`;

const userPath = (userId: string): string => `${ZITADEL_PATHS.users}/${encodeURIComponent(userId)}`;

export type OidcResponseType = 'OIDC_RESPONSE_TYPE_CODE';
export type OidcGrantType = 'OIDC_GRANT_TYPE_AUTHORIZATION_CODE' | 'OIDC_GRANT_TYPE_REFRESH_TOKEN';

export interface OidcAppPayload {
  readonly name: string;
  readonly redirectUris: readonly string[];
  readonly responseTypes: readonly OidcResponseType[];
  readonly grantTypes: readonly OidcGrantType[];
  readonly appType: 'OIDC_APP_TYPE_WEB';
  readonly authMethodType: 'OIDC_AUTH_METHOD_TYPE_BASIC';
  readonly postLogoutRedirectUris: readonly string[];
  readonly version: 'OIDC_VERSION_1_0';
  readonly devMode: boolean;
  readonly accessTokenType: 'OIDC_TOKEN_TYPE_BEARER';
  readonly accessTokenRoleAssertion: boolean;
  readonly idTokenRoleAssertion: boolean;
  readonly idTokenUserinfoAssertion: boolean;
  readonly clockSkew: string;
}

export type AccessTokenType = 'ACCESS_TOKEN_TYPE_JWT' | 'ACCESS_TOKEN_TYPE_BEARER';

export interface MachineUserPayload {
  readonly userName: string;
  readonly name: string;
  readonly description: string;
  readonly accessTokenType: AccessTokenType;
}

export interface MachineKey {
  readonly keyId: string;
  /** Base64 of the key JSON */
  readonly keyDetails: string;
}

export interface ZitadelClient {
  readonly session: ApiSession;
  readonly projects: () => Listing<Project>;
  readonly createProject: (name: string) => Promise<ApiResponse>;
  readonly oidcApps: (projectId: string) => Listing<OidcApp>;
  readonly createOidcApp: (projectId: string, payload: OidcAppPayload) => Promise<ApiResponse>;
  /** Users whose user name equals `userName` */
  readonly usersByName: (userName: string) => Listing<User>;
  readonly createMachineUser: (payload: MachineUserPayload) => Promise<ApiResponse>;
  readonly createMachineKey: (
    userId: string,
    expirationDate: string
  ) => Promise<Result<MachineKey, ProvisioningError>>;
  readonly personalAccessTokens: (userId: string) => Listing<PersonalAccessToken>;
  readonly createPersonalAccessToken: (userId: string, expirationDate: string) => Promise<ApiResponse>;
  readonly projectMembers: (projectId: string) => Listing<ProjectMember>;
  readonly addProjectMember: (projectId: string, member: ProjectMember) => Promise<ApiResponse>;
  /** Replaces the roles of a member; the answer carries no member, so `member` is returned */
  readonly updateProjectMember: (
    projectId: string,
    member: ProjectMember
  ) => Promise<Result<ProjectMember, ProvisioningError>>;
}

/**
 * Runs a management API search and returns its `result` list.
 *
 * @param session - Authenticated session
 * @param path - Search path, ending in `/_search`
 * @param item - Schema of one record
 * @param step - What is being searched, for errors
 * @param query - Search body (default: no filter)
 */
export const search = async <T>(
  session: ApiSession,
  path: string,
  item: Schema<T>,
  step: string,
  query: unknown = {}
): Listing<T> => {
  const parsed = expectBody(await session.request('POST', path, query), searchSchema(item), step);
  return parsed.map(({ result }) => result);
};

/**
 * Creates a Zitadel management API client over a session.
 */
export const createZitadelClient = (session: ApiSession): ZitadelClient => ({
  session,
  projects: () => search(session, `${ZITADEL_PATHS.projects}/_search`, projectSchema, 'search projects'),
  createProject: (name) => session.request('POST', ZITADEL_PATHS.projects, { name }),

  oidcApps: async (projectId) => {
    const apps = await search(
      session,
      `${projectPath(projectId)}/apps/_search`,
      oidcAppRecordSchema,
      'search applications'
    );
    return apps.map((records) =>
      records.map(
        ({ id, name, oidcConfig }): OidcApp =>
          oidcConfig !== undefined ? { id, name, clientId: oidcConfig.clientId } : { id, name }
      )
    );
  },
  createOidcApp: (projectId, payload) =>
    session.request('POST', `${projectPath(projectId)}/apps/oidc`, payload),

  usersByName: (userName) =>
    search(session, `${ZITADEL_PATHS.users}/_search`, userSchema, 'search users', {
      queries: [{ userNameQuery: { userName, method: 'TEXT_QUERY_METHOD_EQUALS' } }],
    }),
  createMachineUser: (payload) => session.request('POST', ZITADEL_PATHS.machineUsers, payload),
  createMachineKey: async (userId, expirationDate) =>
    expectBody(
      await session.request('POST', `${userPath(userId)}/keys`, {
        type: 'KEY_TYPE_JSON',
        expirationDate,
      }),
      machineKeySchema,
      'create machine key'
    ),

  personalAccessTokens: (userId) =>
    search(
      session,
      `${userPath(userId)}/pats/_search`,
      personalAccessTokenSchema,
      'search personal access tokens'
    ),
  createPersonalAccessToken: (userId, expirationDate) =>
    session.request('POST', `${userPath(userId)}/pats`, { expirationDate }),

  projectMembers: (projectId) =>
    search(session, `${projectPath(projectId)}/members/_search`, projectMemberSchema, 'search project members'),
  addProjectMember: (projectId, member) =>
    session.request('POST', `${projectPath(projectId)}/members`, member),
  updateProjectMember: async (projectId, member) => {
    const response = await session.request(
      'PUT',
      `${projectPath(projectId)}/members/${encodeURIComponent(member.userId)}`,
      { roles: member.roles }
    );
    if (!isSuccessStatus(response.status)) {
      return err(createHttpError('update project member', response));
    }
    return ok(member);
  },
});

/**
 * Normalizes a Zitadel domain to a base URL; `https://` is assumed when no
 * scheme is given.
 */
export const zitadelBaseUrl = (domain: string): string => {
  const trimmed = domain.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
};

/**
 * Creates a client authenticated with the connection's bearer token.
 */
export const connectZitadel = (connection: ApiConnection, httpClient: HttpClient): ZitadelClient =>
  createZitadelClient(
    createApiSession({
      baseUrl: connection.baseUrl,
      credentials: { type: 'bearer', token: connection.token },
      httpClient,
    })
  );
