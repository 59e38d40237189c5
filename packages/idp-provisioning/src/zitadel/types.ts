import type { ReconcileStatus } from '../reconcile/types.js';
import type { ServiceAccountKey } from '../token/types.js';

/**
 * Ways to obtain an admin bearer token, tried in this order: a personal
 * access token, a machine-user key file, admin user name and password.
 */
export interface ZitadelCredentials {
  readonly pat?: string | undefined;
  /** Path of a machine-user JSON key */
  readonly keyFile?: string | undefined;
  readonly adminUser?: string | undefined;
  readonly adminPassword?: string | undefined;
}

export interface ZitadelAccess extends ZitadelCredentials {
  /** Zitadel domain, e.g. "id.example.com"; a URL with scheme is accepted too */
  readonly domain: string;
}

export interface OidcAppOptions extends ZitadelAccess {
  readonly appName: string;
  readonly redirectUri: string;
  /** Project holding the application (default: "SSO Applications") */
  readonly projectName?: string | undefined;
}

export interface OidcAppCreatedOutput {
  readonly status: 'created';
  readonly app_id: string;
  readonly client_id: string;
  readonly client_secret?: string;
  readonly redirect_uri: string;
  readonly project_id: string;
}

export interface OidcAppExistsOutput {
  readonly status: 'exists';
  readonly app_id: string;
  readonly client_id?: string;
  readonly project_id: string;
  readonly message: string;
}

export type OidcAppOutput = OidcAppCreatedOutput | OidcAppExistsOutput;

export interface MachineUserOptions extends ZitadelAccess {
  /** Default: "api-automation" */
  readonly userName?: string | undefined;
  /** Default: "API Automation Service" */
  readonly displayName?: string | undefined;
}

export interface MachineUserOutput {
  /** Whether the user existed or was created; a new key is created either way */
  readonly status: ReconcileStatus;
  readonly user_id: string;
  readonly key_id: string;
  readonly key_file: ServiceAccountKey;
}

export interface BootstrapTokenOptions extends ZitadelAccess {
  /** Default: "api-automation" */
  readonly userName?: string | undefined;
  /** Mint a token even when the user already has one */
  readonly mintNew?: boolean | undefined;
}

export interface BootstrapTokenOutput {
  /** `exists` when the user already had a token; its secret cannot be read back */
  readonly status: ReconcileStatus;
  readonly user_id: string;
  readonly user_status: ReconcileStatus;
  readonly token_id: string;
  readonly token?: string;
}

export interface SetupAutomationOptions extends ZitadelAccess {
  /** Default: "SSO Applications" */
  readonly projectName?: string | undefined;
  /** Service user to make project owner (default: "api-automation") */
  readonly userName?: string | undefined;
}

export interface SetupAutomationOutput {
  readonly success: true;
  readonly project_id: string;
  readonly project_status: ReconcileStatus;
  readonly user_id: string;
  readonly user_name: string;
  readonly membership_status: ReconcileStatus;
}

export interface AdminTokenOptions {
  readonly domain: string;
  readonly adminUser: string;
  readonly adminPassword: string;
}

export interface AdminTokenOutput {
  readonly access_token: string;
  readonly token_type: string;
  readonly expires_in?: number;
}
