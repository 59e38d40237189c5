import { chalkStderr } from 'chalk';
import { createConsoleLogger, type Logger, type LogLevel } from '@collab-stack/idp-provisioning';

const COLOURS: Record<LogLevel, (text: string) => string> = {
  debug: chalkStderr.dim,
  info: chalkStderr.cyan,
  warn: chalkStderr.yellow,
  error: chalkStderr.red,
};

/**
 * Logger for the command line: lines on standard error, coloured when
 * standard error is a terminal.
 */
export const createCliLogger = (level: LogLevel, write: (line: string) => void): Logger =>
  createConsoleLogger({
    scope: 'idp-provision',
    level,
    write,
    decorate: (lineLevel, line) => COLOURS[lineLevel](line),
  });
