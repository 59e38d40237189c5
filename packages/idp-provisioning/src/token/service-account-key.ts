import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { createConfigurationError, type ProvisioningError } from '../errors.js';
import { parseJsonBody } from '../http/api-session.js';
import type { ServiceAccountKey } from './types.js';

export const serviceAccountKeySchema = z.object({
  type: z.string().optional(),
  keyId: z.string().min(1),
  key: z.string().min(1),
  userId: z.string().min(1),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');

/**
 * Validates decoded key JSON.
 *
 * @param value - Decoded JSON
 * @param source - Where the key came from, for the error message
 */
export const parseServiceAccountKey = (
  value: unknown,
  source: string
): Result<ServiceAccountKey, ProvisioningError> => {
  const parsed = serviceAccountKeySchema.safeParse(value);
  if (!parsed.success) {
    return err(
      createConfigurationError(
        `Invalid service account key in ${source}: ${describeIssues(parsed.error)}`
      )
    );
  }

  const { type, keyId, key, userId } = parsed.data;
  const serviceAccountKey: ServiceAccountKey =
    type !== undefined ? { type, keyId, key, userId } : { keyId, key, userId };
  return ok(serviceAccountKey);
};

/**
 * Decodes the base64 `keyDetails` of a freshly created machine key.
 */
export const decodeKeyDetails = (keyDetails: string): Result<ServiceAccountKey, ProvisioningError> =>
  parseServiceAccountKey(
    parseJsonBody(Buffer.from(keyDetails, 'base64').toString('utf8')),
    'key details'
  );

/**
 * Reads a machine-user JSON key file.
 *
 * @param path - Path of the key file
 * @param read - File reader (default: fs/promises readFile as UTF-8)
 */
export const readServiceAccountKey = async (
  path: string,
  read: (path: string) => Promise<string> = (p) => readFile(p, 'utf8')
): Promise<Result<ServiceAccountKey, ProvisioningError>> => {
  let text: string;
  try {
    text = await read(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(createConfigurationError(`Cannot read key file ${path}: ${reason}`));
  }

  return parseServiceAccountKey(parseJsonBody(text), path);
};
