import type { Command } from 'commander';
import { ok, err } from 'neverthrow';
import {
  createApiSession,
  createNotReadyError,
  waitForReady,
} from '@collab-stack/idp-provisioning';
import { parseOptions, waitReadySchema } from '../config.js';
import { runCommand, type CliRuntime, type CommandTask } from '../run.js';

export interface WaitReadyOutput {
  readonly success: true;
  readonly ready: true;
  readonly url: string;
}

const waitReadyTask: CommandTask<WaitReadyOutput> = async (flags, deps) => {
  const options = parseOptions(waitReadySchema, flags);
  if (options.isErr()) {
    return err(options.error);
  }

  const { url, timeout, interval } = options.value;
  const target = new URL(url);
  const session = createApiSession({
    baseUrl: target.origin,
    credentials: { type: 'none' },
    httpClient: deps.httpClient,
  });
  const ready = await waitForReady(session, {
    path: `${target.pathname}${target.search}`,
    serviceName: url,
    timeoutMs: timeout,
    intervalMs: interval,
    logger: deps.logger,
    now: deps.now,
    sleep: deps.sleep,
  });
  if (!ready) {
    return err(createNotReadyError(url, timeout));
  }

  const output: WaitReadyOutput = { success: true, ready: true, url };
  return ok(output);
};

export const registerWaitReadyCommand = (program: Command, runtime: CliRuntime): void => {
  program
    .command('wait-ready')
    .description('Poll a URL until it answers 200 or 302')
    .option('--url <url>', 'URL to probe')
    .option('--timeout <seconds>', 'Overall wait', '300')
    .option('--interval <seconds>', 'Pause between probes', '5')
    .action(async (_flags: unknown, command: Command) => {
      await runCommand(runtime, command, waitReadyTask);
    });
};
