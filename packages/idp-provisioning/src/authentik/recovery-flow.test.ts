import { describe, it, expect } from 'vitest';
import { resolveRecoveryFlow } from './recovery-flow.js';
import { createRoutedHttpClient } from '../test/mocks.js';
import {
  AUTHORIZATION_FLOW,
  RECOVERY_FLOW,
  TEST_API_TOKEN,
  TEST_AUTHENTIK_URL,
  page,
} from '../test/fixtures.js';

const run = (flows: readonly unknown[]) =>
  resolveRecoveryFlow(
    { baseUrl: TEST_AUTHENTIK_URL, token: TEST_API_TOKEN },
    {
      httpClient: createRoutedHttpClient({
        'GET /api/v3/flows/instances/': { status: 200, body: page(flows) },
      }),
    }
  );

describe('resolveRecoveryFlow', () => {
  it('reports the default recovery flow', async () => {
    const result = await run([AUTHORIZATION_FLOW, RECOVERY_FLOW]);

    expect(result.isOk() && result.value).toEqual({
      success: true,
      message: 'Recovery flow configured',
      flow_slug: 'default-recovery-flow',
      flow_pk: 'flow-recovery-1',
    });
  });

  it('prefers a dedicated "recovery-flow"', async () => {
    const dedicated = { ...RECOVERY_FLOW, pk: 'flow-recovery-2', slug: 'recovery-flow' };

    const result = await run([RECOVERY_FLOW, dedicated]);

    expect(result.isOk() && result.value.flow_pk).toBe('flow-recovery-2');
  });

  it('falls back to any flow designated for recovery', async () => {
    const custom = { ...RECOVERY_FLOW, pk: 'flow-recovery-3', slug: 'reset-password' };

    const result = await run([custom]);

    expect(result.isOk() && result.value.flow_slug).toBe('reset-password');
  });

  it('fails when there is no recovery flow', async () => {
    const result = await run([AUTHORIZATION_FLOW]);

    expect(result.isErr() && result.error).toEqual({
      code: 'MISSING_PREREQUISITE',
      message: 'No recovery flow found - Authentik should create one by default',
    });
  });
});
