import {
  computeBackoffMs,
  executeWithRetry,
  resolveMaxAttempts,
  sleep,
} from '@/modules/order-status/infrastructure/adapters/shared';

class TransientError extends Error {}

describe('executeWithRetry', () => {
  const isRetryable = (error: unknown) => error instanceof TransientError;

  function recordingSleep() {
    const delays: number[] = [];
    return {
      delays,
      sleep: async (ms: number) => {
        delays.push(ms);
      },
    };
  }

  it('waits 1, 2, 4 units between four failed attempts', async () => {
    const { delays, sleep: recordSleep } = recordingSleep();
    const operation = jest.fn().mockRejectedValue(new TransientError('down'));

    const outcome = await executeWithRetry(operation, {
      policy: { maxAttempts: 4, backoffUnitMs: 1000 },
      isRetryable,
      sleep: recordSleep,
    });

    expect(operation).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(outcome).toEqual({
      ok: false,
      reason: 'exhausted',
      attempts: 4,
      lastError: expect.any(TransientError),
    });
  });

  it('makes a single attempt with no wait when maxAttempts is 1', async () => {
    const { delays, sleep: recordSleep } = recordingSleep();
    const operation = jest.fn().mockRejectedValue(new TransientError('down'));

    const outcome = await executeWithRetry(operation, {
      policy: { maxAttempts: 1, backoffUnitMs: 1000 },
      isRetryable,
      sleep: recordSleep,
    });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(outcome.ok).toBe(false);
  });

  it('rounds a fractional bound down and never waits after the last attempt', async () => {
    const { delays, sleep: recordSleep } = recordingSleep();
    const operation = jest.fn().mockRejectedValue(new TransientError('down'));

    const outcome = await executeWithRetry(operation, {
      policy: { maxAttempts: 2.5, backoffUnitMs: 1 },
      isRetryable,
      sleep: recordSleep,
    });

    expect(operation).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([1]);
    expect(outcome).toMatchObject({ ok: false, reason: 'exhausted', attempts: 2 });
  });

  it('returns the first successful value', async () => {
    const { delays, sleep: recordSleep } = recordingSleep();
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new TransientError('down'))
      .mockResolvedValueOnce('order');

    const outcome = await executeWithRetry(operation, {
      policy: { maxAttempts: 3, backoffUnitMs: 10 },
      isRetryable,
      sleep: recordSleep,
    });

    expect(outcome).toEqual({ ok: true, value: 'order', attempts: 2 });
    expect(delays).toEqual([10]);
    expect(operation).toHaveBeenNthCalledWith(2, 1);
  });

  it('rethrows errors that are not retryable without retrying', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('bug'));

    await expect(
      executeWithRetry(operation, {
        policy: { maxAttempts: 3, backoffUnitMs: 0 },
        isRetryable,
      }),
    ).rejects.toThrow('bug');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports each retry before waiting', async () => {
    const { sleep: recordSleep } = recordingSleep();
    const onRetry = jest.fn();

    await executeWithRetry(jest.fn().mockRejectedValue(new TransientError('down')), {
      policy: { maxAttempts: 3, backoffUnitMs: 5 },
      isRetryable,
      sleep: recordSleep,
      onRetry,
    });

    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.delayMs])).toEqual([
      [1, 5],
      [2, 10],
    ]);
  });

  it('stops attempting once the signal aborts', async () => {
    const controller = new AbortController();
    const operation = jest.fn().mockRejectedValue(new TransientError('down'));

    const outcome = await executeWithRetry(operation, {
      policy: { maxAttempts: 5, backoffUnitMs: 1000 },
      isRetryable,
      signal: controller.signal,
      sleep: async () => {
        controller.abort();
      },
    });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({
      ok: false,
      reason: 'aborted',
      attempts: 1,
      lastError: expect.any(TransientError),
    });
  });

  it('makes no attempt when the signal is already aborted', async () => {
    const operation = jest.fn();

    const outcome = await executeWithRetry(operation, {
      policy: { maxAttempts: 3, backoffUnitMs: 0 },
      isRetryable,
      signal: AbortSignal.abort(),
    });

    expect(operation).not.toHaveBeenCalled();
    expect(outcome).toEqual({ ok: false, reason: 'aborted', attempts: 0, lastError: undefined });
  });
});

describe('resolveMaxAttempts', () => {
  it('keeps whole bounds of at least one attempt', () => {
    expect(resolveMaxAttempts(3)).toBe(3);
    expect(resolveMaxAttempts(2.9)).toBe(2);
    expect(resolveMaxAttempts(0)).toBe(1);
    expect(resolveMaxAttempts(Number.POSITIVE_INFINITY)).toBe(1);
    expect(resolveMaxAttempts(Number.NaN)).toBe(1);
  });
});

describe('computeBackoffMs', () => {
  it('doubles per attempt', () => {
    expect([0, 1, 2, 3].map((attempt) => computeBackoffMs(250, attempt))).toEqual([
      250, 500, 1000, 2000,
    ]);
  });
});

describe('sleep', () => {
  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - startedAt).toBeLessThan(1000);
  });
});
