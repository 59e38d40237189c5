/**
 * Match policies: how a listing record is recognised as "the" resource.
 *
 * Each resource kind gets exactly one policy, declared next to its client
 * (see `authentik/policies.ts` and `zitadel/policies.ts`), so re-runs of every
 * command decide "already exists" the same way.
 *
 * @packageDocumentation
 */

export interface MatchPolicy<T> {
  /** Shown in logs and errors, e.g. `slug = "default-authorization-flow"` */
  readonly description: string;
  /** Returns the matching record, if any */
  readonly find: (records: readonly T[]) => T | undefined;
}

/**
 * Matches the record whose selected field equals `value`.
 *
 * @param field - Field name for the description
 * @param select - Reads the field from a record
 * @param value - Expected value
 */
export const exactMatch = <T>(
  field: string,
  select: (record: T) => string | number | undefined,
  value: string | number
): MatchPolicy<T> => ({
  description: `${field} = ${JSON.stringify(value)}`,
  find: (records) => records.find((record) => select(record) === value),
});

/**
 * Matches the record whose selected field contains `fragment`, ignoring case.
 */
export const containsMatch = <T>(
  field: string,
  select: (record: T) => string | undefined,
  fragment: string
): MatchPolicy<T> => {
  const needle = fragment.toLowerCase();
  return {
    description: `${field} contains ${JSON.stringify(fragment)}`,
    find: (records) =>
      records.find((record) => (select(record) ?? '').toLowerCase().includes(needle)),
  };
};

/**
 * Matches the first record of the listing.
 */
export const firstMatch = <T>(description = 'first listed'): MatchPolicy<T> => ({
  description,
  find: (records) => records[0],
});

/**
 * Tries policies in priority order; the first policy with a hit wins.
 *
 * @example
 * ```typescript
 * const authorizationFlow = preferMatch(
 *   exactMatch<Flow>('slug', (f) => f.slug, 'default-authorization-flow'),
 *   exactMatch<Flow>('designation', (f) => f.designation, 'authorization')
 * );
 * ```
 */
export const preferMatch = <T>(...policies: readonly MatchPolicy<T>[]): MatchPolicy<T> => ({
  description: policies.map((policy) => policy.description).join(', else '),
  find: (records) => {
    for (const policy of policies) {
      const found = policy.find(records);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  },
});

export const findMatch = <T>(records: readonly T[], policy: MatchPolicy<T>): T | undefined =>
  policy.find(records);
