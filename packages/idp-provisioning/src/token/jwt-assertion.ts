import { createPrivateKey, type KeyObject } from 'node:crypto';
import { SignJWT } from 'jose';
import { ok, err, type Result } from 'neverthrow';
import { createConfigurationError, type ProvisioningError } from '../errors.js';
import type { JwtAssertionOptions } from './types.js';

/** Default assertion validity: 1 hour */
const DEFAULT_LIFETIME_SECONDS = 3600;

/**
 * Loads a PEM private key. node:crypto reads PKCS#1 ("BEGIN RSA PRIVATE KEY"),
 * which is what Zitadel issues, as well as PKCS#8.
 */
const loadPrivateKey = (pem: string, keyId: string): Result<KeyObject, ProvisioningError> => {
  try {
    return ok(createPrivateKey(pem));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(createConfigurationError(`Private key ${keyId} cannot be loaded: ${reason}`));
  }
};

/**
 * Creates an RS256-signed JWT assertion for the jwt-bearer grant.
 *
 * The service-account user id is both `iss` and `sub`; the header carries
 * the key id as `kid`.
 *
 * @example
 * ```typescript
 * const assertion = await createJwtAssertion({
 *   key,
 *   audience: 'https://id.example.com',
 * });
 * ```
 */
export const createJwtAssertion = async (
  options: JwtAssertionOptions
): Promise<Result<string, ProvisioningError>> => {
  const { key, audience, lifetimeSeconds = DEFAULT_LIFETIME_SECONDS, now = Date.now } = options;

  const privateKey = loadPrivateKey(key.key, key.keyId);
  if (privateKey.isErr()) {
    return err(privateKey.error);
  }

  const issuedAt = Math.floor(now() / 1000);

  try {
    const jwt = await new SignJWT({})
      .setProtectedHeader({ alg: 'RS256', kid: key.keyId })
      .setIssuer(key.userId)
      .setSubject(key.userId)
      .setAudience(audience)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + lifetimeSeconds)
      .sign(privateKey.value);
    return ok(jwt);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(createConfigurationError(`Cannot sign assertion with key ${key.keyId}: ${reason}`));
  }
};
