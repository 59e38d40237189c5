/**
 * Shapes of the Zitadel management API (`/management/v1`) answers this
 * package reads. Search calls answer `{ result: [...] }` and drop `result`
 * entirely when nothing matched.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { Schema } from '../reconcile/types.js';

export const searchSchema = <T>(item: Schema<T>) =>
  z.object({
    result: z.array(item).default([]),
  });

export const projectSchema = z.object({
  id: z.string(),
  name: z.string(),
});
export type Project = z.infer<typeof projectSchema>;

export const createdProjectSchema = z.object({ id: z.string().min(1) });

export const oidcAppRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  oidcConfig: z.object({ clientId: z.string() }).optional(),
});

export const createdOidcAppSchema = z.object({
  appId: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
});

/**
 * An OIDC application, from a search or a create answer. The secret is only
 * known right after creation.
 */
export interface OidcApp {
  readonly id: string;
  readonly name: string;
  readonly clientId?: string;
  readonly clientSecret?: string;
}

export const userSchema = z.object({
  id: z.string(),
  userName: z.string(),
});
export type User = z.infer<typeof userSchema>;

export const createdUserSchema = z.object({ userId: z.string().min(1) });

export const machineKeySchema = z.object({
  keyId: z.string().min(1),
  keyDetails: z.string().min(1),
});

export const personalAccessTokenSchema = z.object({ id: z.string() });

export const createdPersonalAccessTokenSchema = z.object({
  tokenId: z.string().min(1),
  token: z.string().min(1),
});

/** A personal access token; `token` is only known right after creation. */
export interface PersonalAccessToken {
  readonly id: string;
  readonly token?: string;
}

export const projectMemberSchema = z.object({
  userId: z.string(),
  roles: z.array(z.string()).default([]),
});
export type ProjectMember = z.infer<typeof projectMemberSchema>;
