import type { ZodError } from 'zod';
import type { ApiResponse } from './http/types.js';

/**
 * Error codes for provisioning failures.
 *
 * `TRANSPORT_ERROR` is reported for the status sentinel 0 (no response at all).
 */
export type ProvisioningErrorCode =
  | 'TRANSPORT_ERROR'
  | 'HTTP_ERROR'
  | 'INVALID_RESPONSE'
  | 'MISSING_PREREQUISITE'
  | 'NOT_READY'
  | 'BOOTSTRAP_REQUIRED'
  | 'INVALID_CONFIGURATION'
  | 'CONFLICT_UNRESOLVED';

/**
 * A provisioning failure, passed up as data rather than thrown.
 */
export interface ProvisioningError {
  readonly code: ProvisioningErrorCode;
  /** Human-readable summary, becomes the `error` field of the JSON output */
  readonly message: string;
  /** HTTP status of the failing call, 0 when no response arrived */
  readonly status?: number;
  /** Parsed response body or validation issues */
  readonly details?: unknown;
  /** What an operator has to do before re-running */
  readonly actionRequired?: string;
  /** Step-by-step operator guidance */
  readonly instructions?: readonly string[];
  /** What to do once the action is done */
  readonly nextStep?: string;
}

/** Sentinel status used when no HTTP response was received. */
export const TRANSPORT_FAILURE_STATUS = 0;

/**
 * Creates an error for a failed HTTP step.
 *
 * @param step - What was being attempted, e.g. "create OAuth2 provider"
 * @param response - The normalized response of the failing call
 */
export const createHttpError = (step: string, response: ApiResponse): ProvisioningError => {
  if (response.status === TRANSPORT_FAILURE_STATUS) {
    return {
      code: 'TRANSPORT_ERROR',
      message: `Failed to ${step}: no response`,
      status: TRANSPORT_FAILURE_STATUS,
      details: response.body,
    };
  }

  return {
    code: 'HTTP_ERROR',
    message: `Failed to ${step}: HTTP ${String(response.status)}`,
    status: response.status,
    details: response.body,
  };
};

/**
 * Creates an error for a response body that does not have the expected shape.
 */
export const createInvalidResponseError = (step: string, issues: ZodError): ProvisioningError => ({
  code: 'INVALID_RESPONSE',
  message: `Unexpected response while trying to ${step}`,
  details: issues.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  })),
});

/**
 * Creates an error for a listing that still announces a next page after the
 * page limit, which would otherwise be read as a complete listing.
 */
export const createPaginationLimitError = (step: string, maxPages: number): ProvisioningError => ({
  code: 'INVALID_RESPONSE',
  message: `Unexpected response while trying to ${step}: more than ${String(maxPages)} pages`,
});

export const createMissingPrerequisiteError = (
  message: string,
  guidance: Pick<ProvisioningError, 'actionRequired' | 'instructions'> = {}
): ProvisioningError => ({
  code: 'MISSING_PREREQUISITE',
  message,
  ...guidance,
});

export const createNotReadyError = (service: string, timeoutMs: number): ProvisioningError => ({
  code: 'NOT_READY',
  message: `${service} not ready after ${String(Math.round(timeoutMs / 1000))}s`,
});

export const createBootstrapRequiredError = (
  message: string,
  guidance: Pick<ProvisioningError, 'actionRequired' | 'instructions' | 'nextStep'>
): ProvisioningError => ({
  code: 'BOOTSTRAP_REQUIRED',
  message,
  ...guidance,
});

export const createConfigurationError = (message: string, details?: unknown): ProvisioningError =>
  details === undefined
    ? { code: 'INVALID_CONFIGURATION', message }
    : { code: 'INVALID_CONFIGURATION', message, details };

/**
 * Creates an error for a create call that answered 409 although no matching
 * resource shows up in the listing afterwards.
 */
export const createUnresolvedConflictError = (
  kind: string,
  description: string,
  response: ApiResponse
): ProvisioningError => ({
  code: 'CONFLICT_UNRESOLVED',
  message: `${kind} conflicts with an existing resource, but none matches ${description}`,
  status: response.status,
  details: response.body,
});
