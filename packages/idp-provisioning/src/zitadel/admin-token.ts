import type { Result } from 'neverthrow';
import type { ProvisioningError } from '../errors.js';
import type { ProvisionDeps } from '../types.js';
import { requestAdminToken } from './authenticate.js';
import type { AdminTokenOptions, AdminTokenOutput } from './types.js';

/**
 * Issues an admin access token with the password grant, for callers that
 * talk to the management API themselves.
 */
export const issueAdminToken = async (
  options: AdminTokenOptions,
  deps: ProvisionDeps
): Promise<Result<AdminTokenOutput, ProvisioningError>> => {
  const token = await requestAdminToken(options, deps);
  return token.map(
    ({ accessToken, tokenType, expiresIn }): AdminTokenOutput =>
      expiresIn !== undefined
        ? { access_token: accessToken, token_type: tokenType, expires_in: expiresIn }
        : { access_token: accessToken, token_type: tokenType }
  );
};
