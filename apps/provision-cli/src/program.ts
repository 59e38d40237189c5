import { Command, CommanderError } from 'commander';
import { createConfigurationError, renderFailure } from '@collab-stack/idp-provisioning';
import { registerAuthentikCommands } from './commands/authentik.js';
import { registerWaitReadyCommand } from './commands/wait-ready.js';
import { registerZitadelCommands } from './commands/zitadel.js';
import type { CliRuntime } from './run.js';

const VERSION = '0.1.0';

/** Commander codes that end a run without a failure document */
const INFORMATIONAL_CODES = new Set(['commander.help', 'commander.helpDisplayed', 'commander.version']);

export const createProgram = (runtime: CliRuntime): Command => {
  const program = new Command();

  program
    .name('idp-provision')
    .description('Idempotent provisioning of Authentik and Zitadel through their admin APIs')
    .version(VERSION)
    .option('--insecure-tls', 'Skip TLS certificate verification (env: PROVISION_INSECURE_TLS)')
    .option('--timeout-ms <ms>', 'Per-request timeout (env: PROVISION_TIMEOUT_MS)')
    .option('--verbose', 'Log debug lines to standard error')
    .exitOverride()
    .configureOutput({
      writeOut: runtime.stdout,
      writeErr: runtime.stderr,
    });

  registerWaitReadyCommand(program, runtime);
  registerAuthentikCommands(program, runtime);
  registerZitadelCommands(program, runtime);

  return program;
};

/**
 * Parses the user arguments and runs the selected command. Usage errors are
 * reported as an INVALID_CONFIGURATION document with exit code 1.
 *
 * @param argv - Arguments after the executable and script names
 */
export const runProgram = async (argv: readonly string[], runtime: CliRuntime): Promise<void> => {
  const program = createProgram(runtime);
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (INFORMATIONAL_CODES.has(error.code)) {
      runtime.setExitCode(error.exitCode);
      return;
    }
    runtime.stdout(`${renderFailure(createConfigurationError(error.message))}\n`);
    runtime.setExitCode(1);
  }
};
