import { ok, err, type Result } from 'neverthrow';
import type { ProvisioningError } from '../errors.js';
import { silentLogger } from '../log/logger.js';
import { applyEnforcement, lookup } from '../reconcile/reconcile.js';
import type { ApiConnection, ProvisionDeps } from '../types.js';
import { connectAuthentik } from './client.js';
import { mfaValidationStagePolicy, totpSetupStagePolicy } from './policies.js';
import type { AuthenticatorValidateStage } from './schemas.js';
import type { MfaEnforcementOutput } from './types.js';

const requiresConfiguration = (stage: AuthenticatorValidateStage, totpPk: string): boolean =>
  stage.not_configured_action === 'configure' && stage.configuration_stages.includes(totpPk);

/**
 * Forces users without a second factor to enrol TOTP at login.
 *
 * Points the default MFA validation stage at the TOTP setup stage with
 * `not_configured_action = configure`. A stage already configured that way
 * is left untouched.
 */
export const enforceMfaEnrollment = async (
  connection: ApiConnection,
  deps: ProvisionDeps
): Promise<Result<MfaEnforcementOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('authentik');
  const client = connectAuthentik(connection, deps.httpClient);

  const validationStage = lookup(
    await client.validateStages(),
    mfaValidationStagePolicy,
    'default-authentication-mfa-validation stage not found'
  );
  if (validationStage.isErr()) {
    return err(validationStage.error);
  }

  const totpStage = lookup(await client.totpStages(), totpSetupStagePolicy, 'TOTP setup stage not found');
  if (totpStage.isErr()) {
    return err(totpStage.error);
  }
  const totpPk = totpStage.value.pk;

  const enforced = await applyEnforcement(
    'MFA validation stage',
    validationStage.value,
    {
      description: `configure TOTP stage ${totpPk} for users without MFA`,
      isSatisfied: (stage) => requiresConfiguration(stage, totpPk),
      apply: (stage) =>
        client.updateValidateStage(stage.pk, {
          name: stage.name,
          not_configured_action: 'configure',
          configuration_stages: [totpPk],
        }),
    },
    logger
  );
  if (enforced.isErr()) {
    return err(enforced.error);
  }

  const { resource, status } = enforced.value;
  const output: MfaEnforcementOutput = {
    success: true,
    message: status === 'exists' ? '2FA enforcement already configured' : '2FA enforcement configured',
    stage_name: resource.name,
    stage_pk: resource.pk,
    configuration_stage_pk: totpPk,
    status,
  };
  return ok(output);
};
