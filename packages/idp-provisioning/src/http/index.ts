export { createFetchClient } from './fetch-client.js';
export {
  createApiSession,
  parseJsonBody,
  isSuccessStatus,
  isConflictStatus,
  joinUrl,
} from './api-session.js';
export type {
  ApiResponse,
  ApiSession,
  ApiSessionOptions,
  Credentials,
  FetchFn,
  FetchInit,
  FetchHeaders,
  FetchResponse,
  HttpClient,
  HttpClientOptions,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';
