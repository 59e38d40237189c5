/**
 * Shapes of the Authentik admin API records this package reads.
 *
 * Only the fields used by the workflows are declared; zod strips the rest.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import type { Schema } from '../reconcile/types.js';

export const flowSchema = z.object({
  pk: z.string(),
  slug: z.string(),
  name: z.string(),
  designation: z.string(),
});
export type Flow = z.infer<typeof flowSchema>;

export const certificateKeyPairSchema = z.object({
  pk: z.string(),
  name: z.string(),
});
export type CertificateKeyPair = z.infer<typeof certificateKeyPairSchema>;

export const oauth2ProviderSchema = z.object({
  pk: z.number(),
  name: z.string(),
  client_id: z.string(),
  client_secret: z.string().optional(),
});
export type OAuth2Provider = z.infer<typeof oauth2ProviderSchema>;

export const applicationSchema = z.object({
  pk: z.string(),
  name: z.string(),
  slug: z.string(),
  provider: z.number().nullable().optional(),
});
export type Application = z.infer<typeof applicationSchema>;

export const stageSchema = z.object({
  pk: z.string(),
  name: z.string(),
});
export type Stage = z.infer<typeof stageSchema>;

export const authenticatorValidateStageSchema = stageSchema.extend({
  not_configured_action: z.string().optional(),
  configuration_stages: z.array(z.string()).default([]),
});
export type AuthenticatorValidateStage = z.infer<typeof authenticatorValidateStageSchema>;

export const flowBindingSchema = z.object({
  pk: z.string(),
  target: z.string(),
  stage: z.string(),
  order: z.number(),
});
export type FlowBinding = z.infer<typeof flowBindingSchema>;

/**
 * One page of a paginated listing. `pagination.next` is the next page
 * number, 0 on the last page.
 */
export const pageSchema = <T>(item: Schema<T>) =>
  z.object({
    pagination: z.object({ next: z.number().optional() }).optional(),
    results: z.array(item),
  });
