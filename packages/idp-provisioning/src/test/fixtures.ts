/**
 * Shared test fixtures and constants.
 * Sample records mirror what the Authentik and Zitadel admin APIs return.
 */

// ============================================================================
// Authentik
// ============================================================================

export const TEST_AUTHENTIK_URL = 'https://auth.example.com';
export const TEST_API_TOKEN = 'test-api-token';

export const TEST_APP_NAME = 'Nextcloud';
export const TEST_APP_SLUG = 'nextcloud';
export const TEST_REDIRECT_URI = 'https://cloud.example.com/apps/user_oidc/code';

export const AUTHORIZATION_FLOW = {
  pk: 'flow-authz-1',
  slug: 'default-provider-authorization-implicit-consent',
  name: 'Authorize Application',
  designation: 'authorization',
} as const;

export const DEFAULT_AUTHORIZATION_FLOW = {
  pk: 'flow-authz-default',
  slug: 'default-authorization-flow',
  name: 'Default Authorization',
  designation: 'authorization',
} as const;

export const INVALIDATION_FLOW = {
  pk: 'flow-invalidation-1',
  slug: 'default-invalidation-flow',
  name: 'Logout',
  designation: 'invalidation',
} as const;

export const ENROLLMENT_FLOW = {
  pk: 'flow-enrollment-1',
  slug: 'default-enrollment-flow',
  name: 'Enrollment',
  designation: 'enrollment',
} as const;

export const RECOVERY_FLOW = {
  pk: 'flow-recovery-1',
  slug: 'default-recovery-flow',
  name: 'Recovery',
  designation: 'recovery',
} as const;

export const SIGNING_KEY = {
  pk: 'key-1',
  name: 'authentik Self-signed Certificate',
} as const;

export const OAUTH2_PROVIDER = {
  pk: 7,
  name: TEST_APP_NAME,
  client_id: 'test-client-id',
  client_secret: 'test-client-secret',
} as const;

export const APPLICATION = {
  pk: 'app-uuid-1',
  name: TEST_APP_NAME,
  slug: TEST_APP_SLUG,
  provider: 7,
} as const;

export const MFA_VALIDATION_STAGE = {
  pk: 'stage-mfa-1',
  name: 'default-authentication-mfa-validation',
  not_configured_action: 'skip',
  configuration_stages: [],
} as const;

export const TOTP_SETUP_STAGE = {
  pk: 'stage-totp-1',
  name: 'default-authenticator-totp-setup',
} as const;

export const INVITATION_STAGE = {
  pk: 'stage-invitation-1',
  name: 'default-enrollment-invitation',
} as const;

/**
 * Wraps records in Authentik's paginated list envelope (single page).
 */
export const page = (results: readonly unknown[]) => ({
  pagination: { next: 0, count: results.length },
  results,
});

// ============================================================================
// Zitadel
// ============================================================================

export const TEST_ZITADEL_DOMAIN = 'id.example.com';
export const TEST_ZITADEL_URL = `https://${TEST_ZITADEL_DOMAIN}`;
export const TEST_PAT = 'test-pat';
export const TEST_ADMIN_USER = 'admin@id.example.com';
export const TEST_ADMIN_PASSWORD = 'test-password';

export const SSO_PROJECT = { id: 'project-1', name: 'SSO Applications' } as const;

export const MACHINE_USER = {
  id: 'user-42',
  userName: 'api-automation',
} as const;

export const NEXTCLOUD_APP = {
  id: 'app-1',
  name: 'Nextcloud',
  oidcConfig: { clientId: 'test-zitadel-client-id' },
} as const;

/** Token endpoint answer to the admin password grant */
export const ADMIN_TOKEN_REPLY = {
  status: 200,
  body: { access_token: 'test-admin-token', token_type: 'Bearer', expires_in: 43199 },
} as const;

/**
 * A management API search answer.
 */
export const found = (result: readonly unknown[]) => ({ details: { totalResult: String(result.length) }, result });
