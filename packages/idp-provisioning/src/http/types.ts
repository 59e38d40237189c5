import type { Result } from 'neverthrow';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

/**
 * HTTP response with typed body. Header names are lower-case.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * Transport failure: no HTTP response was received.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * HTTP client interface for making requests.
 * Abstraction over fetch for dependency injection and testing.
 *
 * Every HTTP status, error statuses included, is an `ok` result; only
 * transport failures are `err`.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request and returns the raw text response.
   * @param request - The request configuration
   * @returns Result with text response or transport error
   */
  readonly send: (request: HttpRequest) => Promise<Result<HttpResponse<string>, HttpError>>;
}

/**
 * The subset of fetch `Headers` the client reads.
 */
export interface FetchHeaders {
  /** Yields every `Set-Cookie` header as its own entry */
  forEach(callback: (value: string, key: string) => void): void;
  /** Every `Set-Cookie` value in order */
  getSetCookie?(): string[];
}

/**
 * The subset of a fetch `Response` the client reads.
 */
export interface FetchResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: FetchHeaders;
  text(): Promise<string>;
}

/**
 * Init passed to the fetch implementation.
 */
export interface FetchInit {
  readonly method: HttpMethod;
  readonly headers: Record<string, string>;
  readonly body?: string;
  readonly signal: AbortSignal;
  readonly redirect: 'manual';
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
  /**
   * Skip TLS certificate verification for this client only.
   * Meant for self-signed certificates on a private network during bootstrap.
   */
  readonly insecureTls?: boolean;
  /** Fetch implementation (default: undici fetch) */
  readonly fetch?: FetchFn;
}

/**
 * Credentials attached by an API session.
 */
export type Credentials =
  | { readonly type: 'bearer'; readonly token: string }
  | { readonly type: 'cookie'; readonly cookie: string }
  | { readonly type: 'none' };

/**
 * Uniform outcome of an API call: the status and the decoded body.
 * Status 0 means no response was received; the body then holds `{ error }`.
 */
export interface ApiResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * JSON API session bound to one base URL and one set of credentials.
 */
export interface ApiSession {
  readonly baseUrl: string;
  /**
   * Performs a JSON request. Never rejects.
   * @param method - HTTP method
   * @param path - Path relative to the base URL, including any query string
   * @param payload - JSON payload, serialized when present
   */
  readonly request: (method: HttpMethod, path: string, payload?: unknown) => Promise<ApiResponse>;
  /** The session cookie captured from a `Set-Cookie` header, if any */
  readonly sessionCookie: () => string | undefined;
}

export interface ApiSessionOptions {
  /** Base URL, e.g. "https://auth.example.com" (a trailing slash is dropped) */
  readonly baseUrl: string;
  readonly credentials: Credentials;
  readonly httpClient: HttpClient;
}
