import { TRANSPORT_FAILURE_STATUS } from '../errors.js';
import type {
  ApiResponse,
  ApiSession,
  ApiSessionOptions,
  Credentials,
  HttpMethod,
} from './types.js';

/**
 * Decodes a response body as JSON.
 *
 * An empty body decodes to `null`; text that is not JSON is wrapped as
 * `{ error: text }` so callers can still branch on it.
 */
export const parseJsonBody = (text: string): unknown => {
  if (text.trim().length === 0) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { error: text };
  }
};

/** 2xx and 3xx. */
export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 400;

export const isConflictStatus = (status: number): boolean => status === 409;

/**
 * Joins a base URL and a path without doubling or dropping the slash.
 */
export const joinUrl = (baseUrl: string, path: string): string => {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const suffix = path.startsWith('/') ? path : `/${path}`;
  return `${base}${suffix}`;
};

/**
 * Keeps the `name=value` part of a `Set-Cookie` header.
 */
const toCookiePair = (setCookie: string): string | undefined => {
  const [pair] = setCookie.split(';');
  const trimmed = pair?.trim();
  return trimmed !== undefined && trimmed.length > 0 ? trimmed : undefined;
};

const authorizationHeaders = (
  credentials: Credentials,
  capturedCookie: string | undefined
): Record<string, string> => {
  switch (credentials.type) {
    case 'bearer':
      return { Authorization: `Bearer ${credentials.token}` };
    case 'cookie':
      return { Cookie: capturedCookie ?? credentials.cookie };
    case 'none':
      return capturedCookie !== undefined ? { Cookie: capturedCookie } : {};
  }
};

/**
 * Creates a JSON API session.
 *
 * Every call resolves to `{ status, body }`, error statuses included. A
 * transport failure resolves to status 0 with `{ error: message }`. The first
 * cookie a response sets is kept and sent with later calls unless the session
 * authenticates with a bearer token.
 *
 * @example
 * ```typescript
 * const session = createApiSession({
 *   baseUrl: 'https://auth.example.com',
 *   credentials: { type: 'bearer', token: process.env['AUTHENTIK_TOKEN'] ?? '' },
 *   httpClient: createFetchClient(),
 * });
 *
 * const { status, body } = await session.request('GET', '/api/v3/flows/instances/');
 * ```
 */
export const createApiSession = (options: ApiSessionOptions): ApiSession => {
  const { credentials, httpClient } = options;
  const baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl.slice(0, -1) : options.baseUrl;
  let sessionCookie: string | undefined;

  const request = async (
    method: HttpMethod,
    path: string,
    payload?: unknown
  ): Promise<ApiResponse> => {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      ...authorizationHeaders(credentials, sessionCookie),
    };

    const url = joinUrl(baseUrl, path);
    const result = await httpClient.send(
      payload !== undefined
        ? { url, method, headers, body: JSON.stringify(payload) }
        : { url, method, headers }
    );

    if (result.isErr()) {
      return { status: TRANSPORT_FAILURE_STATUS, body: { error: result.error.message } };
    }

    const response = result.value;
    const setCookie = response.headers['set-cookie'];
    if (setCookie !== undefined && sessionCookie === undefined) {
      sessionCookie = toCookiePair(setCookie);
    }

    return { status: response.status, body: parseJsonBody(response.body) };
  };

  return {
    baseUrl,
    request,
    sessionCookie: () => sessionCookie,
  };
};
