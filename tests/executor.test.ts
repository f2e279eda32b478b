import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { GraphQLExecutor } from '../src/core/executor.js';
import { TransportError } from '../src/utils/errors.js';
import { recordingTransport, silentLogger } from './helpers/fake-github.js';

const viewerSchema = z.object({ viewer: z.object({ login: z.string() }) });

function executorFor(respond: Parameters<typeof recordingTransport>[0]) {
  const fake = recordingTransport(respond);
  const sleep = vi.fn(async (_ms: number) => {});
  const executor = new GraphQLExecutor(fake.transport, {
    policy: { maxAttempts: 3, baseDelayMs: 2000 },
    sleep,
    logger: silentLogger(),
  });
  return { fake, sleep, executor };
}

const request = {
  label: 'Get viewer',
  query: 'query { viewer { login } }',
  schema: viewerSchema,
};

describe('GraphQLExecutor.execute', () => {
  it('should return the parsed data of a successful call', async () => {
    const { fake, executor } = executorFor(() => ({ data: { viewer: { login: 'octo' } } }));
    const result = await executor.execute(request);

    expect(result).toEqual({ ok: true, value: { viewer: { login: 'octo' } } });
    expect(fake.calls).toHaveLength(1);
    expect(fake.calls[0].variables).toEqual({});
  });

  it('should pass variables through to the transport', async () => {
    const { fake, executor } = executorFor(() => ({ data: { viewer: { login: 'octo' } } }));
    await executor.execute({ ...request, variables: { number: 4 } });

    expect(fake.calls[0].variables).toEqual({ number: 4 });
  });

  it('should surface errors[] verbatim and without retrying', async () => {
    const { fake, sleep, executor } = executorFor(() => ({
      data: null,
      errors: [{ message: 'Name has already been taken' }, { message: 'Permission denied' }],
    }));
    const result = await executor.execute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RemoteLogicalError');
      expect(result.error.message).toBe('Name has already been taken, Permission denied');
    }
    expect(fake.calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry transport failures and succeed within the attempt budget', async () => {
    const { fake, sleep, executor } = executorFor((_call, index) => {
      if (index < 2) throw new TransportError('connection reset');
      return { data: { viewer: { login: 'octo' } } };
    });
    const result = await executor.execute(request);

    expect(result.ok).toBe(true);
    expect(fake.calls).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('should return a terminal TransportError after the last attempt', async () => {
    const { fake, executor } = executorFor(() => {
      throw new TransportError('gh api graphql timed out after 30000ms');
    });
    const result = await executor.execute(request);

    expect(fake.calls).toHaveLength(3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('gh api graphql timed out after 30000ms');
    }
  });

  it('should report data of the wrong shape as a logical failure', async () => {
    const { fake, executor } = executorFor(() => ({ data: { viewer: { login: 42 } } }));
    const result = await executor.execute(request);

    expect(fake.calls).toHaveLength(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RemoteLogicalError');
      expect(result.error.message).toContain('Get viewer: unexpected response at viewer.login');
    }
  });

  it('should reject a response that is not an envelope', async () => {
    const { executor } = executorFor(() => 'not json');
    const result = await executor.execute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Get viewer: response is not a GraphQL envelope');
    }
  });
});
