import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type {
  FetchFn,
  FetchHeaders,
  FetchInit,
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';

/** Default request timeout: 30 seconds */
const DEFAULT_TIMEOUT_MS = 30_000;

const SET_COOKIE = 'set-cookie';

/**
 * Extracts headers from a fetch Response into a plain object.
 * Only the first `Set-Cookie` header is kept.
 */
const extractHeaders = (headers: FetchHeaders): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    const name = key.toLowerCase();
    if (name === SET_COOKIE && result[name] !== undefined) {
      return;
    }
    result[name] = value;
  });

  const [firstCookie] = headers.getSetCookie?.() ?? [];
  if (firstCookie !== undefined) {
    result[SET_COOKIE] = firstCookie;
  }
  return result;
};

/**
 * undici reports "fetch failed" and keeps the reason (DNS, refused, TLS) in `cause`.
 */
const describeNetworkError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return 'Network error';
  }
  return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
};

/**
 * Builds the default fetch on undici, with certificate checks switched off
 * only when asked to.
 */
const createUndiciFetch = (insecureTls: boolean): FetchFn => {
  if (!insecureTls) {
    return (url, init) => undiciFetch(url, init);
  }

  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
};

/**
 * Creates an HTTP client on fetch.
 *
 * Redirects are not followed, so a 302 from the probed service reaches the
 * caller as is.
 *
 * @param options - Optional client configuration. `insecureTls` applies to the
 *   default fetch; a caller passing its own `fetch` owns its TLS settings.
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.send({ url: 'https://auth.example.com/', method: 'GET' });
 *
 * if (result.isOk()) {
 *   console.error(result.value.status);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {}, insecureTls = false } = options;
  const fetchFn = options.fetch ?? createUndiciFetch(insecureTls);

  const send = async (request: HttpRequest): Promise<Result<HttpResponse<string>, HttpError>> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      const headers = { ...baseHeaders, ...request.headers };
      const init: FetchInit =
        request.body !== undefined
          ? { method: request.method, headers, body: request.body, signal: controller.signal, redirect: 'manual' }
          : { method: request.method, headers, signal: controller.signal, redirect: 'manual' };

      const response = await fetchFn(request.url, init);
      const body = await response.text();

      return ok({
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      return err({
        type: 'network',
        message: describeNetworkError(error),
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  };

  return { send };
};
