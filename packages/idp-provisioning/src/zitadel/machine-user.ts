/**
 * Machine users for API automation, with a JSON key or a personal access
 * token as credential.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { ProvisioningError } from '../errors.js';
import { silentLogger, type Logger } from '../log/logger.js';
import { parseWith, reconcile } from '../reconcile/reconcile.js';
import type { ReconcileResult } from '../reconcile/types.js';
import { decodeKeyDetails } from '../token/service-account-key.js';
import type { ProvisionDeps } from '../types.js';
import { authenticate } from './authenticate.js';
import { connectZitadel, type MachineUserPayload, type ZitadelClient } from './client.js';
import { DEFAULT_MACHINE_USER_NAME, machineUserPolicy, personalAccessTokenPolicy } from './policies.js';
import {
  createdPersonalAccessTokenSchema,
  createdUserSchema,
  type PersonalAccessToken,
  type User,
} from './schemas.js';
import type {
  BootstrapTokenOptions,
  BootstrapTokenOutput,
  MachineUserOptions,
  MachineUserOutput,
} from './types.js';

export const DEFAULT_MACHINE_USER_DISPLAY_NAME = 'API Automation Service';
export const MACHINE_KEY_EXPIRATION = '2030-01-01T00:00:00Z';
export const PERSONAL_ACCESS_TOKEN_EXPIRATION = '2099-12-31T23:59:59Z';

/**
 * Makes sure a machine user with the payload's user name exists.
 */
export const reconcileMachineUser = (
  client: ZitadelClient,
  payload: MachineUserPayload,
  logger: Logger
): Promise<ReconcileResult<User>> =>
  reconcile(
    {
      kind: 'machine user',
      list: () => client.usersByName(payload.userName),
      create: () => client.createMachineUser(payload),
      parseCreated: (body) =>
        parseWith(createdUserSchema, body, 'create machine user').map(
          ({ userId }): User => ({ id: userId, userName: payload.userName })
        ),
    },
    { match: machineUserPolicy(payload.userName), logger }
  );

/**
 * Makes sure a JWT-type machine user exists and creates a new JSON key for it.
 *
 * A key is created on every run; Zitadel never returns the private key of
 * an existing one.
 */
export const provisionMachineUser = async (
  options: MachineUserOptions,
  deps: ProvisionDeps
): Promise<Result<MachineUserOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('zitadel');

  const connection = await authenticate(options, deps);
  if (connection.isErr()) {
    return err(connection.error);
  }
  const client = connectZitadel(connection.value, deps.httpClient);

  const user = await reconcileMachineUser(
    client,
    {
      userName: options.userName ?? DEFAULT_MACHINE_USER_NAME,
      name: options.displayName ?? DEFAULT_MACHINE_USER_DISPLAY_NAME,
      description: 'Service account for automated API operations',
      accessTokenType: 'ACCESS_TOKEN_TYPE_JWT',
    },
    logger
  );
  if (user.isErr()) {
    return err(user.error);
  }
  const userId = user.value.resource.id;

  logger.info(`Creating JSON key for machine user ${userId}`);
  const key = await client.createMachineKey(userId, MACHINE_KEY_EXPIRATION);
  if (key.isErr()) {
    return err(key.error);
  }

  const keyFile = decodeKeyDetails(key.value.keyDetails);
  if (keyFile.isErr()) {
    return err(keyFile.error);
  }

  const output: MachineUserOutput = {
    status: user.value.status,
    user_id: userId,
    key_id: key.value.keyId,
    key_file: keyFile.value,
  };
  return ok(output);
};

/**
 * Makes sure a bearer-type machine user exists and has a personal access
 * token.
 *
 * When the user already has a token, it is reported as `exists` without the
 * secret, which Zitadel only returns once. `mintNew` forces a new token.
 */
export const bootstrapApiToken = async (
  options: BootstrapTokenOptions,
  deps: ProvisionDeps
): Promise<Result<BootstrapTokenOutput, ProvisioningError>> => {
  const logger = (deps.logger ?? silentLogger).child('zitadel');

  const connection = await authenticate(options, deps);
  if (connection.isErr()) {
    return err(connection.error);
  }
  const client = connectZitadel(connection.value, deps.httpClient);

  const user = await reconcileMachineUser(
    client,
    {
      userName: options.userName ?? DEFAULT_MACHINE_USER_NAME,
      name: DEFAULT_MACHINE_USER_DISPLAY_NAME,
      description: 'Service account for automated OIDC app provisioning',
      accessTokenType: 'ACCESS_TOKEN_TYPE_BEARER',
    },
    logger
  );
  if (user.isErr()) {
    return err(user.error);
  }
  const userId = user.value.resource.id;

  const noTokens: Result<readonly PersonalAccessToken[], ProvisioningError> = ok([]);
  const pat = await reconcile(
    {
      kind: 'personal access token',
      list: () =>
        options.mintNew === true ? Promise.resolve(noTokens) : client.personalAccessTokens(userId),
      create: () => client.createPersonalAccessToken(userId, PERSONAL_ACCESS_TOKEN_EXPIRATION),
      parseCreated: (body) =>
        parseWith(createdPersonalAccessTokenSchema, body, 'create personal access token').map(
          ({ tokenId, token }): PersonalAccessToken => ({ id: tokenId, token })
        ),
    },
    { match: personalAccessTokenPolicy, logger }
  );
  if (pat.isErr()) {
    return err(pat.error);
  }

  const { status, resource } = pat.value;
  if (resource.token === undefined) {
    logger.warn('A personal access token already exists; its secret cannot be read back');
  }

  const output: BootstrapTokenOutput = {
    status,
    user_id: userId,
    user_status: user.value.status,
    token_id: resource.id,
    ...(resource.token !== undefined ? { token: resource.token } : {}),
  };
  return ok(output);
};
