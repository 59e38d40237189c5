/**
 * How each Authentik resource kind is recognised in a listing.
 *
 * | Kind                 | Policy                                                                      |
 * |----------------------|-----------------------------------------------------------------------------|
 * | authorization flow   | slug `default-authorization-flow`, else designation `authorization`         |
 * | invalidation flow    | slug `default-invalidation-flow`, else designation `invalidation`           |
 * | enrollment flow      | slug `default-enrollment-flow`, else designation `enrollment`               |
 * | recovery flow        | slug `recovery-flow`, else `default-recovery-flow`, else designation `recovery` |
 * | signing key          | first listed                                                                |
 * | OAuth2 provider      | exact name                                                                  |
 * | application          | exact slug                                                                  |
 * | invitation stage     | exact name `default-enrollment-invitation`                                  |
 * | flow binding         | exact stage pk                                                              |
 * | MFA validation stage | exact name `default-authentication-mfa-validation`                          |
 * | TOTP setup stage     | exact name `default-authenticator-totp-setup`, else name contains `setup`   |
 *
 * @packageDocumentation
 */

import { containsMatch, exactMatch, firstMatch, preferMatch, type MatchPolicy } from '../reconcile/match.js';
import type {
  Application,
  AuthenticatorValidateStage,
  CertificateKeyPair,
  Flow,
  FlowBinding,
  OAuth2Provider,
  Stage,
} from './schemas.js';

export const INVITATION_STAGE_NAME = 'default-enrollment-invitation';
export const MFA_VALIDATION_STAGE_NAME = 'default-authentication-mfa-validation';
export const TOTP_SETUP_STAGE_NAME = 'default-authenticator-totp-setup';

const flowBySlug = (slug: string): MatchPolicy<Flow> => exactMatch<Flow>('slug', (f) => f.slug, slug);

const flowByDesignation = (designation: string): MatchPolicy<Flow> =>
  exactMatch<Flow>('designation', (f) => f.designation, designation);

export const authorizationFlowPolicy: MatchPolicy<Flow> = preferMatch(
  flowBySlug('default-authorization-flow'),
  flowByDesignation('authorization')
);

export const invalidationFlowPolicy: MatchPolicy<Flow> = preferMatch(
  flowBySlug('default-invalidation-flow'),
  flowByDesignation('invalidation')
);

export const enrollmentFlowPolicy: MatchPolicy<Flow> = preferMatch(
  flowBySlug('default-enrollment-flow'),
  flowByDesignation('enrollment')
);

export const recoveryFlowPolicy: MatchPolicy<Flow> = preferMatch(
  flowBySlug('recovery-flow'),
  flowBySlug('default-recovery-flow'),
  flowByDesignation('recovery')
);

export const signingKeyPolicy: MatchPolicy<CertificateKeyPair> = firstMatch('first listed key pair');

export const providerPolicy = (name: string): MatchPolicy<OAuth2Provider> =>
  exactMatch<OAuth2Provider>('name', (p) => p.name, name);

export const applicationPolicy = (slug: string): MatchPolicy<Application> =>
  exactMatch<Application>('slug', (a) => a.slug, slug);

export const invitationStagePolicy: MatchPolicy<Stage> = exactMatch<Stage>(
  'name',
  (s) => s.name,
  INVITATION_STAGE_NAME
);

export const bindingPolicy = (stagePk: string): MatchPolicy<FlowBinding> =>
  exactMatch<FlowBinding>('stage', (b) => b.stage, stagePk);

export const mfaValidationStagePolicy: MatchPolicy<AuthenticatorValidateStage> =
  exactMatch<AuthenticatorValidateStage>('name', (s) => s.name, MFA_VALIDATION_STAGE_NAME);

export const totpSetupStagePolicy: MatchPolicy<Stage> = preferMatch(
  exactMatch<Stage>('name', (s) => s.name, TOTP_SETUP_STAGE_NAME),
  containsMatch<Stage>('name', (s) => s.name, 'setup')
);
