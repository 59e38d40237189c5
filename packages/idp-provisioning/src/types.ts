import type { HttpClient } from './http/types.js';
import type { Logger } from './log/logger.js';

/**
 * Connection to an admin API authenticated with a bearer token.
 */
export interface ApiConnection {
  /** Base URL of the identity provider (e.g., "https://auth.example.com") */
  readonly baseUrl: string;
  /** Admin API token */
  readonly token: string;
}

/**
 * Collaborators every provisioning workflow runs with.
 */
export interface ProvisionDeps {
  readonly httpClient: HttpClient;
  /** Diagnostics sink (default: silent) */
  readonly logger?: Logger;
  /** Clock in milliseconds, used by readiness polling and token minting */
  readonly now?: () => number;
  /** Pause used by readiness polling */
  readonly sleep?: (ms: number) => Promise<void>;
}
