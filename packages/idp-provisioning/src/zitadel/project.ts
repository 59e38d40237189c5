import { reconcile, parseWith } from '../reconcile/reconcile.js';
import type { ReconcileResult } from '../reconcile/types.js';
import type { Logger } from '../log/logger.js';
import type { ZitadelClient } from './client.js';
import { projectPolicy } from './policies.js';
import { createdProjectSchema, type Project } from './schemas.js';

/**
 * Makes sure a project named `name` exists.
 */
export const reconcileProject = (
  client: ZitadelClient,
  name: string,
  logger: Logger
): Promise<ReconcileResult<Project>> =>
  reconcile(
    {
      kind: 'project',
      list: client.projects,
      create: () => client.createProject(name),
      parseCreated: (body) =>
        parseWith(createdProjectSchema, body, 'create project').map(({ id }): Project => ({ id, name })),
    },
    { match: projectPolicy(name), logger }
  );
