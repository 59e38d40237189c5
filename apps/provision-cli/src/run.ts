import type { Command } from 'commander';
import { err, type Result } from 'neverthrow';
import {
  createFetchClient,
  emitResult,
  type HttpClient,
  type ProvisionDeps,
  type ProvisioningError,
} from '@collab-stack/idp-provisioning';
import { resolveGlobalOptions, type Env } from './config.js';
import { createCliLogger } from './logger.js';

/**
 * What a command run touches outside the library: environment, output
 * streams, exit code. Tests pass in-memory versions.
 */
export interface CliRuntime {
  readonly env: Env;
  /** Standard output, receives the JSON document */
  readonly stdout: (text: string) => void;
  /** Standard error, receives log lines */
  readonly stderr: (text: string) => void;
  readonly setExitCode: (code: number) => void;
  /** Replaces the fetch-based client */
  readonly httpClient?: HttpClient;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

export type CommandTask<T> = (
  flags: Readonly<Record<string, unknown>>,
  deps: ProvisionDeps
) => Promise<Result<T, ProvisioningError>>;

/**
 * Runs one command: resolves the global options, builds the HTTP client and
 * logger for this run, then writes the outcome as one JSON document and sets
 * the exit code.
 */
export const runCommand = async <T>(
  runtime: CliRuntime,
  command: Command,
  task: CommandTask<T>
): Promise<void> => {
  const globals = resolveGlobalOptions(command.optsWithGlobals(), runtime.env);
  if (globals.isErr()) {
    runtime.setExitCode(emitResult(err(globals.error), runtime.stdout));
    return;
  }

  const { insecureTls, timeoutMs, logLevel } = globals.value;
  const logger = createCliLogger(logLevel, (line) => {
    runtime.stderr(`${line}\n`);
  });
  if (insecureTls) {
    logger.warn('TLS certificate verification is disabled for this run');
  }

  const deps: ProvisionDeps = {
    httpClient: runtime.httpClient ?? createFetchClient({ timeoutMs, insecureTls }),
    logger,
    ...(runtime.now !== undefined ? { now: runtime.now } : {}),
    ...(runtime.sleep !== undefined ? { sleep: runtime.sleep } : {}),
  };

  const result = await task(command.opts(), deps);
  runtime.setExitCode(emitResult(result, runtime.stdout));
};
