/**
 * `idp-provision authentik ...`
 */

import type { Command } from 'commander';
import { err, type Result } from 'neverthrow';
import {
  configureInvitationFlow,
  enforceMfaEnrollment,
  provisionOidcProvider,
  resolveRecoveryFlow,
  type ApiConnection,
  type OidcProviderOutput,
  type ProvisionDeps,
  type ProvisioningError,
} from '@collab-stack/idp-provisioning';
import {
  AUTHENTIK_ENV,
  authentikConnectionSchema,
  oidcProviderSchema,
  parseOptions,
  withEnvFallback,
} from '../config.js';
import { runCommand, type CliRuntime, type CommandTask } from '../run.js';

type ConnectionWorkflow<T> = (
  connection: ApiConnection,
  deps: ProvisionDeps
) => Promise<Result<T, ProvisioningError>>;

const connectionTask =
  <T>(runtime: CliRuntime, workflow: ConnectionWorkflow<T>): CommandTask<T> =>
  async (flags, deps) => {
    const options = parseOptions(
      authentikConnectionSchema,
      withEnvFallback(flags, runtime.env, AUTHENTIK_ENV)
    );
    if (options.isErr()) {
      return err(options.error);
    }
    return workflow({ baseUrl: options.value.domain, token: options.value.token }, deps);
  };

const oidcProviderTask =
  (runtime: CliRuntime): CommandTask<OidcProviderOutput> =>
  async (flags, deps) => {
    const options = parseOptions(oidcProviderSchema, withEnvFallback(flags, runtime.env, AUTHENTIK_ENV));
    if (options.isErr()) {
      return err(options.error);
    }
    const { domain, waitTimeout, ...rest } = options.value;
    return provisionOidcProvider({ ...rest, baseUrl: domain, waitTimeoutMs: waitTimeout }, deps);
  };

const addConnectionOptions = (command: Command): Command =>
  command
    .option('--domain <url>', 'Authentik base URL (env: AUTHENTIK_URL)')
    .option('--token <token>', 'Admin API token (env: AUTHENTIK_TOKEN)');

export const registerAuthentikCommands = (program: Command, runtime: CliRuntime): void => {
  const authentik = program.command('authentik').description('Configure an Authentik instance');

  authentik
    .command('oidc-provider')
    .description('Make sure an OAuth2/OIDC provider and its application exist')
    .option('--domain <url>', 'Authentik base URL (env: AUTHENTIK_URL)')
    .option('--app-name <name>', 'Display name of the provider and application')
    .option('--redirect-uri <uri>', 'OIDC redirect URI of the application')
    .option('--app-slug <slug>', 'Application slug (default: derived from the name)')
    .option('--launch-url <url>', 'Application launch URL (default: derived from the redirect URI)')
    .option('--token <token>', 'Admin API token (env: AUTHENTIK_TOKEN)')
    .option('--bootstrap-user <user>', 'Admin user named in bootstrap instructions')
    .option('--bootstrap-password <password>', 'Admin password for the initial setup')
    .option('--wait-timeout <seconds>', 'How long to wait for Authentik', '300')
    .action(async (_flags: unknown, command: Command) => {
      await runCommand(runtime, command, oidcProviderTask(runtime));
    });

  addConnectionOptions(
    authentik.command('enforce-2fa').description('Require TOTP enrolment for users without MFA')
  ).action(async (_flags: unknown, command: Command) => {
    await runCommand(runtime, command, connectionTask(runtime, enforceMfaEnrollment));
  });

  addConnectionOptions(
    authentik
      .command('invitation-flow')
      .description('Put an invitation stage in front of the enrollment flow')
  ).action(async (_flags: unknown, command: Command) => {
    await runCommand(runtime, command, connectionTask(runtime, configureInvitationFlow));
  });

  addConnectionOptions(
    authentik.command('recovery-flow').description('Report the recovery flow used for recovery links')
  ).action(async (_flags: unknown, command: Command) => {
    await runCommand(runtime, command, connectionTask(runtime, resolveRecoveryFlow));
  });
};
