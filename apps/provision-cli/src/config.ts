/**
 * Command option validation.
 *
 * Every option resolves with priority flag > environment > default, then
 * goes through a zod schema. Invalid input becomes an INVALID_CONFIGURATION
 * error so it is reported like any other failure.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import {
  createConfigurationError,
  type LogLevel,
  type ProvisioningError,
  type Schema,
} from '@collab-stack/idp-provisioning';

export type Env = Readonly<Record<string, string | undefined>>;

/** Default per-request timeout: 30 seconds */
const DEFAULT_TIMEOUT_MS = 30_000;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export const isTruthy = (value: string | undefined): boolean =>
  value !== undefined && TRUTHY.has(value.trim().toLowerCase());

/** `appName` becomes `--app-name` */
export const toFlag = (key: string): string =>
  `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const [key] = issue.path;
      return key !== undefined ? `${toFlag(String(key))}: ${issue.message}` : issue.message;
    })
    .join('; ');

/**
 * Validates merged options against a command schema.
 */
export const parseOptions = <T>(schema: Schema<T>, input: unknown): Result<T, ProvisioningError> => {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  return err(createConfigurationError(`Invalid options: ${describeIssues(parsed.error)}`));
};

/**
 * Fills options missing from the command line from environment variables.
 *
 * @param flags - Parsed command-line options
 * @param env - Process environment
 * @param fallbacks - Option key to environment variable name
 */
export const withEnvFallback = (
  flags: Readonly<Record<string, unknown>>,
  env: Env,
  fallbacks: Readonly<Record<string, string>>
): Record<string, unknown> => {
  const merged: Record<string, unknown> = { ...flags };
  for (const [key, variable] of Object.entries(fallbacks)) {
    const value = env[variable];
    if (merged[key] === undefined && value !== undefined && value.length > 0) {
      merged[key] = value;
    }
  }
  return merged;
};

// ============================================================================
// Global options
// ============================================================================

export interface GlobalOptions {
  readonly insecureTls: boolean;
  readonly timeoutMs: number;
  readonly logLevel: LogLevel;
}

const globalOptionsSchema = z.object({
  insecureTls: z.boolean(),
  timeoutMs: z.coerce.number().int().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

const globalFlagsSchema = z.object({
  insecureTls: z.boolean().optional(),
  timeoutMs: z.string().optional(),
  verbose: z.boolean().optional(),
});

/**
 * Resolves `--insecure-tls`, `--timeout-ms` and `--verbose` with their
 * environment fallbacks. TLS verification stays on unless one of them asks
 * otherwise.
 */
export const resolveGlobalOptions = (
  flags: Readonly<Record<string, unknown>>,
  env: Env
): Result<GlobalOptions, ProvisioningError> =>
  parseOptions(globalFlagsSchema, flags).andThen(({ insecureTls, timeoutMs, verbose }) =>
    parseOptions(globalOptionsSchema, {
      insecureTls: insecureTls === true || isTruthy(env['PROVISION_INSECURE_TLS']),
      timeoutMs: timeoutMs ?? env['PROVISION_TIMEOUT_MS'] ?? DEFAULT_TIMEOUT_MS,
      logLevel: verbose === true ? 'debug' : (env['PROVISION_LOG_LEVEL'] ?? 'info'),
    })
  );

// ============================================================================
// Command options
// ============================================================================

const required = z.string().trim().min(1);
const optional = z.string().trim().min(1).optional();
const url = z.string().trim().url();

/** Positive number of seconds, converted to milliseconds */
const seconds = (fallback: number) =>
  z.coerce
    .number()
    .positive()
    .default(fallback)
    .transform((value) => Math.round(value * 1000));

export const AUTHENTIK_ENV = { domain: 'AUTHENTIK_URL', token: 'AUTHENTIK_TOKEN' } as const;

export const ZITADEL_ENV = {
  domain: 'ZITADEL_DOMAIN',
  pat: 'ZITADEL_PAT',
  keyFile: 'ZITADEL_KEY_FILE',
  adminUser: 'ZITADEL_ADMIN_USER',
  adminPassword: 'ZITADEL_ADMIN_PASSWORD',
} as const;

export const waitReadySchema = z.object({
  url,
  timeout: seconds(300),
  interval: seconds(5),
});
export type WaitReadyOptions = z.infer<typeof waitReadySchema>;

export const authentikConnectionSchema = z.object({
  domain: url,
  token: required,
});

export const oidcProviderSchema = z.object({
  domain: url,
  appName: required,
  redirectUri: url,
  appSlug: optional,
  launchUrl: url.optional(),
  token: optional,
  bootstrapUser: optional,
  bootstrapPassword: optional,
  waitTimeout: seconds(300),
});

const zitadelAccessSchema = z.object({
  domain: required,
  pat: optional,
  keyFile: optional,
  adminUser: optional,
  adminPassword: optional,
});

export const zitadelOidcAppSchema = zitadelAccessSchema.extend({
  appName: required,
  redirectUri: url,
  project: optional,
});

export const machineUserSchema = zitadelAccessSchema.extend({
  username: optional,
  displayName: optional,
});

export const bootstrapTokenSchema = zitadelAccessSchema.extend({
  username: optional,
  mintNew: z.boolean().optional(),
});

export const setupAutomationSchema = zitadelAccessSchema.extend({
  project: optional,
  username: optional,
});

export const adminTokenSchema = z.object({
  domain: required,
  adminUser: required,
  adminPassword: required,
});
