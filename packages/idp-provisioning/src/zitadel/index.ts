export { provisionOidcApp, buildOidcAppPayload } from './oidc-app.js';
export {
  provisionMachineUser,
  bootstrapApiToken,
  reconcileMachineUser,
  DEFAULT_MACHINE_USER_DISPLAY_NAME,
  MACHINE_KEY_EXPIRATION,
  PERSONAL_ACCESS_TOKEN_EXPIRATION,
} from './machine-user.js';
export { setupAutomation } from './setup-automation.js';
export { issueAdminToken } from './admin-token.js';
export { authenticate, requestAdminToken } from './authenticate.js';
export type { AdminCredentials } from './authenticate.js';
export { reconcileProject } from './project.js';
export {
  createZitadelClient,
  connectZitadel,
  search,
  zitadelBaseUrl,
  ZITADEL_PATHS,
} from './client.js';
export type {
  AccessTokenType,
  MachineKey,
  MachineUserPayload,
  OidcAppPayload,
  ZitadelClient,
} from './client.js';
export {
  projectPolicy,
  oidcAppPolicy,
  machineUserPolicy,
  personalAccessTokenPolicy,
  projectMemberPolicy,
  DEFAULT_PROJECT_NAME,
  DEFAULT_MACHINE_USER_NAME,
  PROJECT_OWNER_ROLE,
} from './policies.js';
export { postLogoutUri } from './urls.js';
export type { OidcApp, PersonalAccessToken, Project, ProjectMember, User } from './schemas.js';
export type {
  AdminTokenOptions,
  AdminTokenOutput,
  BootstrapTokenOptions,
  BootstrapTokenOutput,
  MachineUserOptions,
  MachineUserOutput,
  OidcAppCreatedOutput,
  OidcAppExistsOutput,
  OidcAppOptions,
  OidcAppOutput,
  SetupAutomationOptions,
  SetupAutomationOutput,
  ZitadelAccess,
  ZitadelCredentials,
} from './types.js';
