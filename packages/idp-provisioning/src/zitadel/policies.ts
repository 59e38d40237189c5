/**
 * How each Zitadel resource kind is recognised in a search result.
 *
 * | Kind                  | Policy               |
 * |-----------------------|----------------------|
 * | project               | exact name           |
 * | OIDC application      | exact name           |
 * | machine user          | exact user name      |
 * | personal access token | first listed         |
 * | project member        | exact user id        |
 *
 * @packageDocumentation
 */

import { exactMatch, firstMatch, type MatchPolicy } from '../reconcile/match.js';
import type { OidcApp, PersonalAccessToken, Project, ProjectMember, User } from './schemas.js';

export const DEFAULT_PROJECT_NAME = 'SSO Applications';
export const DEFAULT_MACHINE_USER_NAME = 'api-automation';
export const PROJECT_OWNER_ROLE = 'PROJECT_OWNER';

export const projectPolicy = (name: string): MatchPolicy<Project> =>
  exactMatch<Project>('name', (p) => p.name, name);

export const oidcAppPolicy = (name: string): MatchPolicy<OidcApp> =>
  exactMatch<OidcApp>('name', (a) => a.name, name);

export const machineUserPolicy = (userName: string): MatchPolicy<User> =>
  exactMatch<User>('userName', (u) => u.userName, userName);

export const personalAccessTokenPolicy: MatchPolicy<PersonalAccessToken> =
  firstMatch('first listed personal access token');

export const projectMemberPolicy = (userId: string): MatchPolicy<ProjectMember> =>
  exactMatch<ProjectMember>('userId', (m) => m.userId, userId);
