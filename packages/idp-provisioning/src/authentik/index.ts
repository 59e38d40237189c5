export { provisionOidcProvider } from './oidc-provider.js';
export { enforceMfaEnrollment } from './mfa-enforcement.js';
export { configureInvitationFlow } from './invitation-flow.js';
export { resolveRecoveryFlow } from './recovery-flow.js';
export { createAuthentikClient, connectAuthentik, listAll, AUTHENTIK_PATHS } from './client.js';
export type {
  AuthentikClient,
  ApplicationPayload,
  FlowBindingPayload,
  InvitationStagePayload,
  OAuth2ProviderPayload,
  ValidateStagePatch,
} from './client.js';
export {
  authorizationFlowPolicy,
  invalidationFlowPolicy,
  enrollmentFlowPolicy,
  recoveryFlowPolicy,
  signingKeyPolicy,
  providerPolicy,
  applicationPolicy,
  invitationStagePolicy,
  bindingPolicy,
  mfaValidationStagePolicy,
  totpSetupStagePolicy,
  INVITATION_STAGE_NAME,
  MFA_VALIDATION_STAGE_NAME,
  TOTP_SETUP_STAGE_NAME,
} from './policies.js';
export { deriveSlug, deriveLaunchUrl, discoveryUrl, issuerUrl } from './urls.js';
export type {
  Application,
  AuthenticatorValidateStage,
  CertificateKeyPair,
  Flow,
  FlowBinding,
  OAuth2Provider,
  Stage,
} from './schemas.js';
export type {
  InvitationFlowOutput,
  MfaEnforcementOutput,
  OidcProviderOptions,
  OidcProviderOutput,
  RecoveryFlowOutput,
} from './types.js';
