import { ok, err, type Result } from 'neverthrow';
import {
  createHttpError,
  createInvalidResponseError,
  createMissingPrerequisiteError,
  createUnresolvedConflictError,
  type ProvisioningError,
} from '../errors.js';
import { isConflictStatus, isSuccessStatus } from '../http/api-session.js';
import type { ApiResponse } from '../http/types.js';
import { silentLogger, type Logger } from '../log/logger.js';
import type { MatchPolicy } from './match.js';
import type {
  Enforcement,
  Reconciled,
  ReconcileOptions,
  ReconcileResult,
  ResourceHandle,
  Schema,
} from './types.js';

/**
 * Validates a response body against a schema.
 *
 * @param schema - Expected shape
 * @param body - Decoded response body
 * @param step - What was being attempted, for the error message
 */
export const parseWith = <T>(
  schema: Schema<T>,
  body: unknown,
  step: string
): Result<T, ProvisioningError> => {
  const parsed = schema.safeParse(body);
  return parsed.success ? ok(parsed.data) : err(createInvalidResponseError(step, parsed.error));
};

/**
 * Checks the status of a required step, then validates its body.
 */
export const expectBody = <T>(
  response: ApiResponse,
  schema: Schema<T>,
  step: string
): Result<T, ProvisioningError> => {
  if (!isSuccessStatus(response.status)) {
    return err(createHttpError(step, response));
  }
  return parseWith(schema, response.body, step);
};

/**
 * Finds a pre-existing resource this code never creates.
 *
 * @param records - Listing result
 * @param policy - Match policy of the kind
 * @param missing - Error reported when nothing matches
 */
export const lookup = <T>(
  records: Result<readonly T[], ProvisioningError>,
  policy: MatchPolicy<T>,
  missing: string | ProvisioningError
): Result<T, ProvisioningError> =>
  records.andThen((list): Result<T, ProvisioningError> => {
    const found = policy.find(list);
    if (found !== undefined) {
      return ok(found);
    }
    return err(typeof missing === 'string' ? createMissingPrerequisiteError(missing) : missing);
  });

/**
 * Applies an enforcement rule to a resource that already exists.
 * Reports `exists` when the rule already holds, `updated` after applying it.
 */
export const applyEnforcement = async <T>(
  kind: string,
  existing: T,
  enforce: Enforcement<T> | undefined,
  logger: Logger
): Promise<ReconcileResult<T>> => {
  if (enforce === undefined || enforce.isSatisfied(existing)) {
    const unchanged: Reconciled<T> = { status: 'exists', resource: existing };
    return ok(unchanged);
  }

  logger.info(`Updating ${kind}: ${enforce.description}`);
  const applied = await enforce.apply(existing);
  return applied.map((resource): Reconciled<T> => ({ status: 'updated', resource }));
};

/**
 * Makes sure one resource matching the policy exists.
 *
 * Lists, and reports the match without writing anything when there is one.
 * Otherwise issues exactly one create call. A 409 from the create call means
 * the resource appeared meanwhile (or was hidden from the listing), so the
 * listing is read again instead of failing.
 *
 * @param handle - Remote operations of the resource kind
 * @param options - Match policy, optional enforcement, logger
 * @returns The resource and whether it existed, was created or was updated
 *
 * @example
 * ```typescript
 * const provider = await reconcile(providerHandle(client, payload), {
 *   match: providerPolicy(payload.name),
 *   logger,
 * });
 * if (provider.isOk()) {
 *   console.error(provider.value.status, provider.value.resource.pk);
 * }
 * ```
 */
export const reconcile = async <T>(
  handle: ResourceHandle<T>,
  options: ReconcileOptions<T>
): Promise<ReconcileResult<T>> => {
  const { match, enforce, logger = silentLogger } = options;

  const listed = await handle.list();
  if (listed.isErr()) {
    return err(listed.error);
  }

  const existing = match.find(listed.value);
  if (existing !== undefined) {
    logger.info(`${handle.kind} with ${match.description} already exists`);
    return applyEnforcement(handle.kind, existing, enforce, logger);
  }

  logger.info(`Creating ${handle.kind} with ${match.description}`);
  const response = await handle.create();

  if (isConflictStatus(response.status)) {
    logger.info(`${handle.kind} already exists (409), looking it up`);
    const relisted = await handle.list();
    if (relisted.isErr()) {
      return err(relisted.error);
    }
    const conflicting = match.find(relisted.value);
    if (conflicting === undefined) {
      return err(createUnresolvedConflictError(handle.kind, match.description, response));
    }
    return applyEnforcement(handle.kind, conflicting, enforce, logger);
  }

  if (!isSuccessStatus(response.status)) {
    return err(createHttpError(`create ${handle.kind}`, response));
  }

  return handle
    .parseCreated(response.body)
    .map((resource): Reconciled<T> => ({ status: 'created', resource }));
};
