import { describe, it, expect, vi } from 'vitest';
import { ok, err } from 'neverthrow';
import { z } from 'zod';
import { reconcile, lookup, parseWith, expectBody } from './reconcile.js';
import { exactMatch } from './match.js';
import type { Enforcement, ResourceHandle } from './types.js';
import type { ApiResponse } from '../http/types.js';
import type { ProvisioningError } from '../errors.js';

interface Widget {
  readonly id: string;
  readonly name: string;
  readonly secret?: string | undefined;
  readonly color?: string | undefined;
}

const widgetSchema = z.object({
  id: z.string(),
  name: z.string(),
  secret: z.string().optional(),
  color: z.string().optional(),
});

const byName = (name: string) => exactMatch<Widget>('name', (w) => w.name, name);

/**
 * Builds a handle whose listing replies are consumed in order (the last one repeats).
 */
const createHandle = (listings: readonly (readonly Widget[])[], createReply: ApiResponse) => {
  let listCalls = 0;
  const list = vi.fn(() => {
    const listing: readonly Widget[] = listings[Math.min(listCalls, listings.length - 1)] ?? [];
    listCalls += 1;
    return Promise.resolve(ok(listing));
  });
  const create = vi.fn(() => Promise.resolve(createReply));
  const handle: ResourceHandle<Widget> = {
    kind: 'widget',
    list,
    create,
    parseCreated: (body) => parseWith(widgetSchema, body, 'create widget'),
  };
  return { handle, list, create };
};

describe('reconcile', () => {
  describe('given a listing containing the target', () => {
    it('reports the existing resource without issuing a create call', async () => {
      const { handle, create } = createHandle(
        [[{ id: 'w-1', name: 'other' }, { id: 'w-2', name: 'Nextcloud' }]],
        { status: 201, body: { id: 'w-9', name: 'Nextcloud' } }
      );

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          status: 'exists',
          resource: { id: 'w-2', name: 'Nextcloud' },
        });
      }
      expect(create).not.toHaveBeenCalled();
    });
  });

  describe('given an empty listing', () => {
    it('issues exactly one create call and reports the new identifier and secret', async () => {
      const { handle, create } = createHandle([[]], {
        status: 201,
        body: { id: 'w-9', name: 'Nextcloud', secret: 'test-secret' },
      });

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(create).toHaveBeenCalledTimes(1);
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          status: 'created',
          resource: { id: 'w-9', name: 'Nextcloud', secret: 'test-secret' },
        });
      }
    });
  });

  describe('given a listing without a match', () => {
    it('does not mistake a similarly named resource for the target', async () => {
      const { handle, create } = createHandle([[{ id: 'w-1', name: 'Nextcloud Staging' }]], {
        status: 201,
        body: { id: 'w-2', name: 'Nextcloud' },
      });

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(create).toHaveBeenCalledTimes(1);
      expect(result.isOk() && result.value.resource.id).toBe('w-2');
    });
  });

  describe('given a create call answering 409', () => {
    it('looks the resource up instead of failing', async () => {
      const { handle, list, create } = createHandle(
        [[], [{ id: 'w-5', name: 'Nextcloud' }]],
        { status: 409, body: { message: 'Project already exists' } }
      );

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(create).toHaveBeenCalledTimes(1);
      expect(list).toHaveBeenCalledTimes(2);
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({ status: 'exists', resource: { id: 'w-5', name: 'Nextcloud' } });
      }
    });

    it('fails when the conflicting resource cannot be found', async () => {
      const { handle } = createHandle([[]], { status: 409, body: { message: 'conflict' } });

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('CONFLICT_UNRESOLVED');
        expect(result.error.status).toBe(409);
        expect(result.error.message).toBe(
          'widget conflicts with an existing resource, but none matches name = "Nextcloud"'
        );
      }
    });
  });

  describe('given a create call that fails', () => {
    it('returns an HTTP error with the response body', async () => {
      const { handle } = createHandle([[]], {
        status: 400,
        body: { redirect_uris: ['This field is required.'] },
      });

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          code: 'HTTP_ERROR',
          message: 'Failed to create widget: HTTP 400',
          status: 400,
          details: { redirect_uris: ['This field is required.'] },
        });
      }
    });

    it('returns a transport error for status 0', async () => {
      const { handle } = createHandle([[]], { status: 0, body: { error: 'connect ECONNREFUSED' } });

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(result.isErr() && result.error.code).toBe('TRANSPORT_ERROR');
    });

    it('returns an invalid-response error when the created body lacks identifiers', async () => {
      const { handle } = createHandle([[]], { status: 201, body: { name: 'Nextcloud' } });

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('INVALID_RESPONSE');
        expect(result.error.details).toEqual([{ path: 'id', message: 'Required' }]);
      }
    });
  });

  describe('given a listing that fails', () => {
    it('returns the listing error without creating', async () => {
      const create = vi.fn(() => Promise.resolve({ status: 201, body: {} }));
      const forbidden: ProvisioningError = {
        code: 'HTTP_ERROR',
        message: 'Failed to list widgets: HTTP 403',
        status: 403,
      };
      const handle: ResourceHandle<Widget> = {
        kind: 'widget',
        list: () => Promise.resolve(err(forbidden)),
        create,
        parseCreated: (body) => parseWith(widgetSchema, body, 'create widget'),
      };

      const result = await reconcile(handle, { match: byName('Nextcloud') });

      expect(result.isErr() && result.error.status).toBe(403);
      expect(create).not.toHaveBeenCalled();
    });
  });

  describe('given an enforcement rule', () => {
    const paintBlue = (apply: Enforcement<Widget>['apply']): Enforcement<Widget> => ({
      description: 'color is blue',
      isSatisfied: (w) => w.color === 'blue',
      apply,
    });

    it('updates an existing resource that violates the rule', async () => {
      const { handle, create } = createHandle([[{ id: 'w-1', name: 'Nextcloud', color: 'red' }]], {
        status: 201,
        body: {},
      });
      const apply = vi.fn((w: Widget) => Promise.resolve(ok({ ...w, color: 'blue' })));

      const result = await reconcile(handle, { match: byName('Nextcloud'), enforce: paintBlue(apply) });

      expect(create).not.toHaveBeenCalled();
      expect(apply).toHaveBeenCalledTimes(1);
      expect(result.isOk() && result.value).toEqual({
        status: 'updated',
        resource: { id: 'w-1', name: 'Nextcloud', color: 'blue' },
      });
    });

    it('leaves a compliant resource untouched', async () => {
      const { handle } = createHandle([[{ id: 'w-1', name: 'Nextcloud', color: 'blue' }]], {
        status: 201,
        body: {},
      });
      const apply = vi.fn((w: Widget) => Promise.resolve(ok(w)));

      const result = await reconcile(handle, { match: byName('Nextcloud'), enforce: paintBlue(apply) });

      expect(apply).not.toHaveBeenCalled();
      expect(result.isOk() && result.value.status).toBe('exists');
    });

    it('does not enforce on a freshly created resource', async () => {
      const { handle } = createHandle([[]], {
        status: 201,
        body: { id: 'w-3', name: 'Nextcloud', color: 'red' },
      });
      const apply = vi.fn((w: Widget) => Promise.resolve(ok(w)));

      const result = await reconcile(handle, { match: byName('Nextcloud'), enforce: paintBlue(apply) });

      expect(apply).not.toHaveBeenCalled();
      expect(result.isOk() && result.value.status).toBe('created');
    });
  });
});

describe('lookup', () => {
  it('returns the matching record', () => {
    const result = lookup(ok<readonly Widget[]>([{ id: 'w-1', name: 'Nextcloud' }]), byName('Nextcloud'), 'not found');

    expect(result.isOk() && result.value.id).toBe('w-1');
  });

  it('returns a missing-prerequisite error when nothing matches', () => {
    const result = lookup(ok<readonly Widget[]>([]), byName('Nextcloud'), 'No widget found');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ code: 'MISSING_PREREQUISITE', message: 'No widget found' });
    }
  });
});

describe('expectBody', () => {
  it('rejects an error status before looking at the body', () => {
    const result = expectBody({ status: 404, body: { detail: 'Not found.' } }, widgetSchema, 'read widget');

    expect(result.isErr() && result.error.message).toBe('Failed to read widget: HTTP 404');
  });

  it('parses a successful body', () => {
    const result = expectBody({ status: 200, body: { id: 'w-1', name: 'x' } }, widgetSchema, 'read widget');

    expect(result.isOk() && result.value).toEqual({ id: 'w-1', name: 'x' });
  });
});
