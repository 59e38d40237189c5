import type { Result } from 'neverthrow';
import type { ProvisioningError } from '../errors.js';
import { silentLogger } from '../log/logger.js';
import { lookup } from '../reconcile/reconcile.js';
import type { ApiConnection, ProvisionDeps } from '../types.js';
import { connectAuthentik } from './client.js';
import { recoveryFlowPolicy } from './policies.js';
import type { RecoveryFlowOutput } from './types.js';

/**
 * Finds the recovery flow used by "Create recovery link". Authentik ships
 * one, so nothing is created.
 */
export const resolveRecoveryFlow = async (
  connection: ApiConnection,
  deps: ProvisionDeps
): Promise<Result<RecoveryFlowOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('authentik');
  const client = connectAuthentik(connection, deps.httpClient);

  const flow = lookup(
    await client.flows(),
    recoveryFlowPolicy,
    'No recovery flow found - Authentik should create one by default'
  );

  return flow.map((found): RecoveryFlowOutput => {
    logger.info(`Using recovery flow ${found.slug}`);
    return {
      success: true,
      message: 'Recovery flow configured',
      flow_slug: found.slug,
      flow_pk: found.pk,
    };
  });
};
