/**
 * `idp-provision zitadel ...`
 */

import type { Command } from 'commander';
import { err } from 'neverthrow';
import {
  bootstrapApiToken,
  issueAdminToken,
  provisionMachineUser,
  provisionOidcApp,
  setupAutomation,
  type AdminTokenOutput,
  type BootstrapTokenOutput,
  type MachineUserOutput,
  type OidcAppOutput,
  type SetupAutomationOutput,
} from '@collab-stack/idp-provisioning';
import {
  ZITADEL_ENV,
  adminTokenSchema,
  bootstrapTokenSchema,
  machineUserSchema,
  parseOptions,
  setupAutomationSchema,
  withEnvFallback,
  zitadelOidcAppSchema,
} from '../config.js';
import { runCommand, type CliRuntime, type CommandTask } from '../run.js';

const oidcAppTask =
  (runtime: CliRuntime): CommandTask<OidcAppOutput> =>
  async (flags, deps) => {
    const options = parseOptions(zitadelOidcAppSchema, withEnvFallback(flags, runtime.env, ZITADEL_ENV));
    if (options.isErr()) {
      return err(options.error);
    }
    const { project, ...rest } = options.value;
    return provisionOidcApp({ ...rest, projectName: project }, deps);
  };

const machineUserTask =
  (runtime: CliRuntime): CommandTask<MachineUserOutput> =>
  async (flags, deps) => {
    const options = parseOptions(machineUserSchema, withEnvFallback(flags, runtime.env, ZITADEL_ENV));
    if (options.isErr()) {
      return err(options.error);
    }
    const { username, ...rest } = options.value;
    return provisionMachineUser({ ...rest, userName: username }, deps);
  };

const bootstrapTokenTask =
  (runtime: CliRuntime): CommandTask<BootstrapTokenOutput> =>
  async (flags, deps) => {
    const options = parseOptions(bootstrapTokenSchema, withEnvFallback(flags, runtime.env, ZITADEL_ENV));
    if (options.isErr()) {
      return err(options.error);
    }
    const { username, ...rest } = options.value;
    return bootstrapApiToken({ ...rest, userName: username }, deps);
  };

const setupAutomationTask =
  (runtime: CliRuntime): CommandTask<SetupAutomationOutput> =>
  async (flags, deps) => {
    const options = parseOptions(setupAutomationSchema, withEnvFallback(flags, runtime.env, ZITADEL_ENV));
    if (options.isErr()) {
      return err(options.error);
    }
    const { project, username, ...rest } = options.value;
    return setupAutomation({ ...rest, projectName: project, userName: username }, deps);
  };

const adminTokenTask =
  (runtime: CliRuntime): CommandTask<AdminTokenOutput> =>
  async (flags, deps) => {
    const options = parseOptions(adminTokenSchema, withEnvFallback(flags, runtime.env, ZITADEL_ENV));
    if (options.isErr()) {
      return err(options.error);
    }
    return issueAdminToken(options.value, deps);
  };

const addDomainOption = (command: Command): Command =>
  command.option('--domain <domain>', 'Zitadel domain (env: ZITADEL_DOMAIN)');

const addAdminOptions = (command: Command): Command =>
  command
    .option('--admin-user <user>', 'Admin login name (env: ZITADEL_ADMIN_USER)')
    .option('--admin-password <password>', 'Admin password (env: ZITADEL_ADMIN_PASSWORD)');

const addTokenOptions = (command: Command): Command =>
  command
    .option('--pat <token>', 'Personal access token (env: ZITADEL_PAT)')
    .option('--key-file <path>', 'Machine-user JSON key (env: ZITADEL_KEY_FILE)');

export const registerZitadelCommands = (program: Command, runtime: CliRuntime): void => {
  const zitadel = program.command('zitadel').description('Configure a Zitadel instance');

  addAdminOptions(
    addTokenOptions(
      addDomainOption(
        zitadel.command('oidc-app').description('Make sure an OIDC web application exists')
      )
    )
  )
    .option('--app-name <name>', 'Application name')
    .option('--redirect-uri <uri>', 'OIDC redirect URI')
    .option('--project <name>', 'Project of the application (default: SSO Applications)')
    .action(async (_flags: unknown, command: Command) => {
      await runCommand(runtime, command, oidcAppTask(runtime));
    });

  addTokenOptions(
    addAdminOptions(
      addDomainOption(
        zitadel
          .command('machine-user')
          .description('Make sure an automation machine user exists and create a JSON key')
      )
    )
  )
    .option('--username <name>', 'Machine user name (default: api-automation)')
    .option('--display-name <name>', 'Display name (default: API Automation Service)')
    .action(async (_flags: unknown, command: Command) => {
      await runCommand(runtime, command, machineUserTask(runtime));
    });

  addTokenOptions(
    addAdminOptions(
      addDomainOption(
        zitadel
          .command('bootstrap-token')
          .description('Make sure an automation user exists and has a personal access token')
      )
    )
  )
    .option('--username <name>', 'Machine user name (default: api-automation)')
    .option('--mint-new', 'Create a new token even if one exists')
    .action(async (_flags: unknown, command: Command) => {
      await runCommand(runtime, command, bootstrapTokenTask(runtime));
    });

  addAdminOptions(
    addTokenOptions(
      addDomainOption(
        zitadel
          .command('setup-automation')
          .description('Create the SSO project and make the automation user its owner')
      )
    )
  )
    .option('--project <name>', 'Project name (default: SSO Applications)')
    .option('--username <name>', 'Automation user (default: api-automation)')
    .action(async (_flags: unknown, command: Command) => {
      await runCommand(runtime, command, setupAutomationTask(runtime));
    });

  addAdminOptions(
    addDomainOption(zitadel.command('admin-token').description('Print an admin access token'))
  ).action(async (_flags: unknown, command: Command) => {
    await runCommand(runtime, command, adminTokenTask(runtime));
  });
};
