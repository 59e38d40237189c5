import { ok, err, type Result } from 'neverthrow';
import type { ProvisioningError } from '../errors.js';
import { silentLogger } from '../log/logger.js';
import { lookup, parseWith, reconcile } from '../reconcile/reconcile.js';
import type { ApiConnection, ProvisionDeps } from '../types.js';
import { connectAuthentik } from './client.js';
import {
  INVITATION_STAGE_NAME,
  bindingPolicy,
  enrollmentFlowPolicy,
  invitationStagePolicy,
} from './policies.js';
import { flowBindingSchema, stageSchema } from './schemas.js';
import type { InvitationFlowOutput } from './types.js';

/**
 * Puts an invitation stage in front of the enrollment flow.
 *
 * The stage lets the flow continue without an invitation, so open
 * enrollment keeps working while invitation links become usable.
 */
export const configureInvitationFlow = async (
  connection: ApiConnection,
  deps: ProvisionDeps
): Promise<Result<InvitationFlowOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('authentik');
  const client = connectAuthentik(connection, deps.httpClient);

  const flow = lookup(await client.flows(), enrollmentFlowPolicy, 'No enrollment flow found');
  if (flow.isErr()) {
    return err(flow.error);
  }

  const stage = await reconcile(
    {
      kind: 'invitation stage',
      list: client.invitationStages,
      create: () =>
        client.createInvitationStage({
          name: INVITATION_STAGE_NAME,
          continue_flow_without_invitation: true,
        }),
      parseCreated: (body) => parseWith(stageSchema, body, 'create invitation stage'),
    },
    { match: invitationStagePolicy, logger }
  );
  if (stage.isErr()) {
    return err(stage.error);
  }

  const flowPk = flow.value.pk;
  const stagePk = stage.value.resource.pk;
  const binding = await reconcile(
    {
      kind: 'flow binding',
      list: () => client.flowBindings(flowPk),
      create: () =>
        client.createFlowBinding({
          target: flowPk,
          stage: stagePk,
          order: 0,
          evaluate_on_plan: true,
          re_evaluate_policies: false,
        }),
      parseCreated: (body) => parseWith(flowBindingSchema, body, 'bind invitation stage to flow'),
    },
    { match: bindingPolicy(stagePk), logger }
  );
  if (binding.isErr()) {
    return err(binding.error);
  }

  const output: InvitationFlowOutput = {
    success: true,
    message: 'Invitation flow configured',
    flow_slug: flow.value.slug,
    flow_pk: flowPk,
    stage_pk: stagePk,
    stage_status: stage.value.status,
    binding_status: binding.value.status,
  };
  return ok(output);
};
