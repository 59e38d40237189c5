import type { ReconcileStatus } from '../reconcile/types.js';

export interface OidcProviderOptions {
  /** Authentik base URL, e.g. "https://auth.example.com" */
  readonly baseUrl: string;
  /** Admin API token; without one only the bootstrap check runs */
  readonly token?: string | undefined;
  /** Display name of the provider and application */
  readonly appName: string;
  readonly redirectUri: string;
  /** Defaults to the slugified app name */
  readonly appSlug?: string | undefined;
  /** Defaults to the redirect URI without its last two path segments */
  readonly launchUrl?: string | undefined;
  /** Admin user named in the bootstrap instructions (default: akadmin) */
  readonly bootstrapUser?: string | undefined;
  readonly bootstrapPassword?: string | undefined;
  /** Readiness wait (default: 300000) */
  readonly waitTimeoutMs?: number | undefined;
  readonly waitIntervalMs?: number | undefined;
}

export interface OidcProviderOutput {
  readonly success: true;
  readonly provider_id: number;
  readonly application_id: string;
  readonly client_id: string;
  /** Absent when the server does not return the secret of an existing provider */
  readonly client_secret?: string;
  readonly discovery_uri: string;
  readonly issuer: string;
  readonly provider_status: ReconcileStatus;
  readonly application_status: ReconcileStatus;
}

export interface MfaEnforcementOutput {
  readonly success: true;
  readonly message: string;
  readonly stage_name: string;
  readonly stage_pk: string;
  readonly configuration_stage_pk: string;
  readonly status: ReconcileStatus;
}

export interface InvitationFlowOutput {
  readonly success: true;
  readonly message: string;
  readonly flow_slug: string;
  readonly flow_pk: string;
  readonly stage_pk: string;
  readonly stage_status: ReconcileStatus;
  readonly binding_status: ReconcileStatus;
}

export interface RecoveryFlowOutput {
  readonly success: true;
  readonly message: string;
  readonly flow_slug: string;
  readonly flow_pk: string;
}
