export { createJwtAssertion } from './jwt-assertion.js';
export {
  readServiceAccountKey,
  parseServiceAccountKey,
  decodeKeyDetails,
  serviceAccountKeySchema,
} from './service-account-key.js';
export {
  requestToken,
  exchangeJwtAssertion,
  requestPasswordGrant,
  ZITADEL_API_SCOPE,
  JWT_BEARER_GRANT_TYPE,
} from './token-endpoint.js';
export type {
  AccessToken,
  JwtAssertionOptions,
  JwtBearerGrant,
  PasswordGrant,
  ServiceAccountKey,
} from './types.js';
