/**
 * IdP provisioning - idempotent setup of Authentik and Zitadel through their
 * admin APIs
 *
 * @packageDocumentation
 */

export type { ApiConnection, ProvisionDeps } from './types.js';

// ============================================================================
// CORE: Errors and Output
// ============================================================================

export {
  createHttpError,
  createInvalidResponseError,
  createMissingPrerequisiteError,
  createNotReadyError,
  createBootstrapRequiredError,
  createConfigurationError,
  createUnresolvedConflictError,
  createPaginationLimitError,
  TRANSPORT_FAILURE_STATUS,
} from './errors.js';
export type { ProvisioningError, ProvisioningErrorCode } from './errors.js';

export { toErrorOutput, renderSuccess, renderFailure, emitResult } from './output/index.js';
export type { ErrorOutput, ExitCode, OutputSink } from './output/index.js';

// ============================================================================
// CORE: HTTP and Readiness
// ============================================================================

export {
  createFetchClient,
  createApiSession,
  parseJsonBody,
  isSuccessStatus,
  isConflictStatus,
  joinUrl,
} from './http/index.js';
export type {
  ApiResponse,
  ApiSession,
  ApiSessionOptions,
  Credentials,
  HttpClient,
  HttpClientOptions,
  HttpError,
  HttpMethod,
  HttpRequest,
  HttpResponse,
} from './http/index.js';

export { waitForReady } from './readiness/index.js';
export type { ReadinessOptions } from './readiness/index.js';

// ============================================================================
// CORE: Reconciliation
// ============================================================================

export {
  reconcile,
  applyEnforcement,
  lookup,
  parseWith,
  expectBody,
  exactMatch,
  containsMatch,
  firstMatch,
  preferMatch,
  findMatch,
} from './reconcile/index.js';
export type {
  Enforcement,
  MatchPolicy,
  Reconciled,
  ReconcileOptions,
  ReconcileResult,
  ReconcileStatus,
  ResourceHandle,
  Schema,
} from './reconcile/index.js';

// ============================================================================
// CORE: Token Minting
// ============================================================================

export {
  createJwtAssertion,
  readServiceAccountKey,
  parseServiceAccountKey,
  decodeKeyDetails,
  requestToken,
  exchangeJwtAssertion,
  requestPasswordGrant,
  ZITADEL_API_SCOPE,
} from './token/index.js';
export type {
  AccessToken,
  JwtAssertionOptions,
  JwtBearerGrant,
  PasswordGrant,
  ServiceAccountKey,
} from './token/index.js';

// ============================================================================
// PROVIDERS: Authentik
// ============================================================================

export {
  provisionOidcProvider,
  enforceMfaEnrollment,
  configureInvitationFlow,
  resolveRecoveryFlow,
  createAuthentikClient,
  connectAuthentik,
  deriveSlug,
  deriveLaunchUrl,
  discoveryUrl,
  issuerUrl,
} from './authentik/index.js';
export type {
  AuthentikClient,
  InvitationFlowOutput,
  MfaEnforcementOutput,
  OidcProviderOptions,
  OidcProviderOutput,
  RecoveryFlowOutput,
} from './authentik/index.js';

// ============================================================================
// PROVIDERS: Zitadel
// ============================================================================

export {
  provisionOidcApp,
  provisionMachineUser,
  bootstrapApiToken,
  setupAutomation,
  issueAdminToken,
  authenticate,
  createZitadelClient,
  connectZitadel,
  zitadelBaseUrl,
  postLogoutUri,
} from './zitadel/index.js';
export type {
  AdminTokenOptions,
  AdminTokenOutput,
  BootstrapTokenOptions,
  BootstrapTokenOutput,
  MachineUserOptions,
  MachineUserOutput,
  OidcAppOptions,
  OidcAppOutput,
  SetupAutomationOptions,
  SetupAutomationOutput,
  ZitadelAccess,
  ZitadelClient,
  ZitadelCredentials,
} from './zitadel/index.js';

// ============================================================================
// UTILITIES: Logging
// ============================================================================

export { createConsoleLogger, silentLogger, isLogLevel, LOG_LEVELS } from './log/logger.js';
export type { ConsoleLoggerOptions, Logger, LogLevel } from './log/logger.js';
