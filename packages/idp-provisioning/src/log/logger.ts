/**
 * Diagnostic logging to standard error.
 *
 * Standard output is reserved for the single JSON result of a command, so
 * every log line goes through `console.error`.
 *
 * @packageDocumentation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
  /** Returns a logger whose lines carry a nested scope, e.g. `[authentik:provider]` */
  readonly child: (scope: string) => Logger;
}

export interface ConsoleLoggerOptions {
  /** Scope printed in brackets before every line */
  readonly scope: string;
  /** Lowest level that is written (default: info) */
  readonly level?: LogLevel;
  /** Line sink (default: console.error) */
  readonly write?: (line: string) => void;
  /** Rewrites a formatted line before it is written, e.g. to colour it */
  readonly decorate?: (level: LogLevel, line: string) => string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Creates a logger that writes `[scope] message` lines.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ scope: 'authentik', level: 'debug' });
 * logger.child('provider').info('Creating OAuth2 provider "Nextcloud"');
 * // stderr: [authentik:provider] Creating OAuth2 provider "Nextcloud"
 * ```
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions): Logger => {
  const {
    scope,
    level = 'info',
    write = (line: string): void => {
      console.error(line);
    },
    decorate,
  } = options;

  const threshold = LEVEL_ORDER[level];

  const log =
    (messageLevel: LogLevel) =>
    (message: string): void => {
      if (LEVEL_ORDER[messageLevel] < threshold) {
        return;
      }
      const line = `[${scope}] ${message}`;
      write(decorate !== undefined ? decorate(messageLevel, line) : line);
    };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child: (childScope) => createConsoleLogger({ ...options, scope: `${scope}:${childScope}` }),
  };
};

const noop = (): void => undefined;

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
