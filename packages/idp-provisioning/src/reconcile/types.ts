import type { Result } from 'neverthrow';
import type { z } from 'zod';
import type { ProvisioningError } from '../errors.js';
import type { ApiResponse } from '../http/types.js';
import type { Logger } from '../log/logger.js';
import type { MatchPolicy } from './match.js';

/**
 * A zod schema producing `T` from any input.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * How a reconciliation ended.
 * - `exists`: a matching resource was found, nothing was written
 * - `created`: the resource was created by this run
 * - `updated`: a matching resource was found and brought in line with policy
 */
export type ReconcileStatus = 'exists' | 'created' | 'updated';

export interface Reconciled<T> {
  readonly status: ReconcileStatus;
  readonly resource: T;
}

export type ReconcileResult<T> = Result<Reconciled<T>, ProvisioningError>;

/**
 * The remote operations of one resource kind.
 */
export interface ResourceHandle<T> {
  /** Human name of the kind, e.g. "OAuth2 provider" */
  readonly kind: string;
  /** Lists the candidates the match policy is applied to */
  readonly list: () => Promise<Result<readonly T[], ProvisioningError>>;
  /** Issues the create call */
  readonly create: () => Promise<ApiResponse>;
  /** Reads the created resource (identifiers, secrets) from the create response */
  readonly parseCreated: (body: unknown) => Result<T, ProvisioningError>;
}

/**
 * A configuration rule an existing resource must satisfy.
 */
export interface Enforcement<T> {
  /** What is enforced, for logs, e.g. "linked to provider 12" */
  readonly description: string;
  readonly isSatisfied: (resource: T) => boolean;
  /** Brings the resource in line, usually with a PATCH */
  readonly apply: (resource: T) => Promise<Result<T, ProvisioningError>>;
}

export interface ReconcileOptions<T> {
  readonly match: MatchPolicy<T>;
  readonly enforce?: Enforcement<T>;
  readonly logger?: Logger;
}
