/**
 * The single JSON document a command writes to standard output.
 *
 * Successes are pretty-printed, failures are one compact line, so a caller
 * scanning the output line by line still finds the error.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { ProvisioningError, ProvisioningErrorCode } from '../errors.js';

export interface ErrorOutput {
  readonly error: string;
  readonly code: ProvisioningErrorCode;
  readonly status?: number;
  readonly details?: unknown;
  readonly action_required?: string;
  readonly instructions?: readonly string[];
  readonly next_step?: string;
}

/** Receives the rendered document, newline included. */
export type OutputSink = (text: string) => void;

export type ExitCode = 0 | 1;

export const toErrorOutput = (error: ProvisioningError): ErrorOutput => ({
  error: error.message,
  code: error.code,
  ...(error.status !== undefined ? { status: error.status } : {}),
  ...(error.details !== undefined ? { details: error.details } : {}),
  ...(error.actionRequired !== undefined ? { action_required: error.actionRequired } : {}),
  ...(error.instructions !== undefined ? { instructions: error.instructions } : {}),
  ...(error.nextStep !== undefined ? { next_step: error.nextStep } : {}),
});

export const renderSuccess = (payload: unknown): string => JSON.stringify(payload, null, 2);

export const renderFailure = (error: ProvisioningError): string => JSON.stringify(toErrorOutput(error));

/**
 * Writes the outcome of a command as exactly one JSON document.
 *
 * @param result - Outcome of the command
 * @param sink - Standard output writer
 * @returns The process exit code
 *
 * @example
 * ```typescript
 * const code = emitResult(await resolveRecoveryFlow(connection, deps), (text) => {
 *   process.stdout.write(text);
 * });
 * process.exitCode = code;
 * ```
 */
export const emitResult = <T>(result: Result<T, ProvisioningError>, sink: OutputSink): ExitCode =>
  result.match(
    (payload): ExitCode => {
      sink(`${renderSuccess(payload)}\n`);
      return 0;
    },
    (error): ExitCode => {
      sink(`${renderFailure(error)}\n`);
      return 1;
    }
  );
