import { ok, err, type Result } from 'neverthrow';
import { createMissingPrerequisiteError, type ProvisioningError } from '../errors.js';
import { silentLogger } from '../log/logger.js';
import { lookup, reconcile } from '../reconcile/reconcile.js';
import type { ProvisionDeps } from '../types.js';
import { authenticate } from './authenticate.js';
import { connectZitadel } from './client.js';
import {
  DEFAULT_MACHINE_USER_NAME,
  DEFAULT_PROJECT_NAME,
  PROJECT_OWNER_ROLE,
  machineUserPolicy,
  projectMemberPolicy,
} from './policies.js';
import { reconcileProject } from './project.js';
import type { ProjectMember } from './schemas.js';
import type { SetupAutomationOptions, SetupAutomationOutput } from './types.js';

/**
 * One-time preparation for unattended OIDC provisioning: creates the SSO
 * project and makes the automation service user its owner.
 *
 * The service user is never created here; it has to exist already (see
 * `bootstrapApiToken` or `provisionMachineUser`).
 */
export const setupAutomation = async (
  options: SetupAutomationOptions,
  deps: ProvisionDeps
): Promise<Result<SetupAutomationOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('zitadel');
  const userName = options.userName ?? DEFAULT_MACHINE_USER_NAME;

  const connection = await authenticate(options, deps);
  if (connection.isErr()) {
    return err(connection.error);
  }
  const client = connectZitadel(connection.value, deps.httpClient);

  const project = await reconcileProject(client, options.projectName ?? DEFAULT_PROJECT_NAME, logger);
  if (project.isErr()) {
    return err(project.error);
  }
  const projectId = project.value.resource.id;

  const user = lookup(
    await client.usersByName(userName),
    machineUserPolicy(userName),
    createMissingPrerequisiteError(`Service user '${userName}' not found`, {
      actionRequired: `Create the machine user '${userName}' first`,
      instructions: [
        '1. Run: idp-provision zitadel bootstrap-token',
        `2. Or create the machine user '${userName}' in the Zitadel console`,
        '3. Re-run setup-automation',
      ],
    })
  );
  if (user.isErr()) {
    return err(user.error);
  }
  const userId = user.value.id;

  const owner: ProjectMember = { userId, roles: [PROJECT_OWNER_ROLE] };
  const membership = await reconcile(
    {
      kind: 'project member',
      list: () => client.projectMembers(projectId),
      create: () => client.addProjectMember(projectId, owner),
      parseCreated: () => ok(owner),
    },
    {
      match: projectMemberPolicy(userId),
      enforce: {
        description: `grant ${PROJECT_OWNER_ROLE}`,
        isSatisfied: (member) => member.roles.includes(PROJECT_OWNER_ROLE),
        apply: (member) =>
          client.updateProjectMember(projectId, {
            userId: member.userId,
            roles: [...member.roles, PROJECT_OWNER_ROLE],
          }),
      },
      logger,
    }
  );
  if (membership.isErr()) {
    return err(membership.error);
  }

  const output: SetupAutomationOutput = {
    success: true,
    project_id: projectId,
    project_status: project.value.status,
    user_id: userId,
    user_name: userName,
    membership_status: membership.value.status,
  };
  return ok(output);
};
