/**
 * A Zitadel machine-user JSON key, as downloaded from the console or
 * returned (base64) by the key API.
 */
export interface ServiceAccountKey {
  readonly type?: string;
  readonly keyId: string;
  /** PEM private key, PKCS#1 or PKCS#8 */
  readonly key: string;
  readonly userId: string;
}

/**
 * Access token returned by a token endpoint.
 */
export interface AccessToken {
  readonly accessToken: string;
  readonly tokenType: string;
  /** Lifetime in seconds, when the endpoint reports one */
  readonly expiresIn?: number;
}

export interface JwtAssertionOptions {
  readonly key: ServiceAccountKey;
  /** The provider base URL the assertion is meant for */
  readonly audience: string;
  /** Validity in seconds (default: 3600) */
  readonly lifetimeSeconds?: number | undefined;
  /** Clock in milliseconds (default: Date.now) */
  readonly now?: (() => number) | undefined;
}

export interface JwtBearerGrant {
  readonly tokenEndpoint: string;
  readonly assertion: string;
  readonly scope?: string | undefined;
}

export interface PasswordGrant {
  readonly tokenEndpoint: string;
  readonly username: string;
  readonly password: string;
  readonly scope?: string | undefined;
}
