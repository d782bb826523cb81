import { describe, it, expect, vi, afterEach } from 'vitest';

import { OrderRejectedError, TimeoutError, TransientExchangeError } from '../../src/core/errors.js';
import { backoffDelay, retryWithBackoff, withTimeout } from '../../src/core/retry.js';

describe('backoffDelay', () => {
  it('doubles from the base and caps at the maximum', () => {
    expect(backoffDelay(0, 250, 4000)).toBe(250);
    expect(backoffDelay(2, 250, 4000)).toBe(1000);
    expect(backoffDelay(5, 250, 4000)).toBe(4000);
  });
});

describe('retryWithBackoff', () => {
  it('retries transient failures with growing delays', async () => {
    const sleeps: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientExchangeError('bad gateway', 502))
      .mockRejectedValueOnce(new TimeoutError('placeOrder', 10))
      .mockResolvedValueOnce('ok');

    const result = await retryWithBackoff(fn, {
      maxRetries: 3,
      baseMs: 100,
      maxMs: 1000,
      sleepFn: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('does not retry rejections', async () => {
    const fn = vi.fn(async () => {
      throw new OrderRejectedError('no', 400, 'insufficient_balance');
    });
    await expect(
      retryWithBackoff(fn, { maxRetries: 3, baseMs: 1, maxMs: 1, sleepFn: async () => {} })
    ).rejects.toBeInstanceOf(OrderRejectedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries with the last error', async () => {
    const fn = vi.fn(async () => {
      throw new TransientExchangeError('unavailable', 503);
    });
    await expect(
      retryWithBackoff(fn, { maxRetries: 2, baseMs: 1, maxMs: 1, sleepFn: async () => {} })
    ).rejects.toThrow('unavailable');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects with TimeoutError and aborts the signal', async () => {
    vi.useFakeTimers();
    const captured: { signal?: AbortSignal } = {};
    const pending = withTimeout('getOrder', 50, (signal) => {
      captured.signal = signal;
      return new Promise<string>(() => {});
    });
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(captured.signal?.aborted).toBe(true);
  });

  it('resolves when the operation finishes first', async () => {
    await expect(withTimeout('getOrder', 1000, async () => 'done')).resolves.toBe('done');
  });
});
