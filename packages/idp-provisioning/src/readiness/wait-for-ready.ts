import type { ApiSession } from '../http/types.js';
import type { Logger } from '../log/logger.js';
import { silentLogger } from '../log/logger.js';

/** Default overall wait: 5 minutes */
const DEFAULT_TIMEOUT_MS = 300_000;

/** Default pause between probes: 5 seconds */
const DEFAULT_INTERVAL_MS = 5_000;

/** A login page either renders (200) or redirects to the login flow (302). */
const DEFAULT_READY_STATUSES: readonly number[] = [200, 302];

export interface ReadinessOptions {
  /** Path probed with GET (default: "/") */
  readonly path?: string;
  /** Overall wait in milliseconds (default: 300000) */
  readonly timeoutMs?: number | undefined;
  /** Fixed pause between probes in milliseconds (default: 5000) */
  readonly intervalMs?: number | undefined;
  /** Statuses that count as ready (default: 200, 302) */
  readonly readyStatuses?: readonly number[];
  /** Name used in log lines (default: the session base URL) */
  readonly serviceName?: string;
  readonly logger?: Logger | undefined;
  /** Clock in milliseconds (default: Date.now) */
  readonly now?: (() => number) | undefined;
  /** Pause implementation (default: setTimeout) */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Polls a service until it answers with a ready status or the timeout elapses.
 *
 * @param session - Session bound to the service base URL
 * @param options - Probe path, timing and clock overrides
 * @returns true as soon as one probe is ready, false after the timeout
 *
 * @example
 * ```typescript
 * const ready = await waitForReady(session, { timeoutMs: 120_000 });
 * if (!ready) {
 *   return err(createNotReadyError('Authentik', 120_000));
 * }
 * ```
 */
export const waitForReady = async (
  session: ApiSession,
  options: ReadinessOptions = {}
): Promise<boolean> => {
  const {
    path = '/',
    timeoutMs = DEFAULT_TIMEOUT_MS,
    intervalMs = DEFAULT_INTERVAL_MS,
    readyStatuses = DEFAULT_READY_STATUSES,
    serviceName = session.baseUrl,
    logger = silentLogger,
    now = Date.now,
    sleep = defaultSleep,
  } = options;

  logger.info(`Waiting for ${serviceName} to be ready...`);
  const startedAt = now();

  while (now() - startedAt < timeoutMs) {
    const { status } = await session.request('GET', path);
    if (readyStatuses.includes(status)) {
      logger.info(`${serviceName} is ready`);
      return true;
    }
    logger.debug(`${serviceName} answered ${String(status)}, retrying in ${String(intervalMs)}ms`);
    await sleep(intervalMs);
  }

  logger.warn(`Timeout waiting for ${serviceName} after ${String(Math.round(timeoutMs / 1000))}s`);
  return false;
};
