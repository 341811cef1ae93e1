import { describe, expect, it, vi } from 'vitest';
import { RetryExhaustedError } from '../src/errors.js';
import { attemptWithPolicy, delayFor, type RetryPolicy } from '../src/retry.js';

const fixed: RetryPolicy = { maxAttempts: 4, delayStrategy: 'fixed', baseDelayMs: 15 };
const exponential: RetryPolicy = { maxAttempts: 4, delayStrategy: 'exponential', baseDelayMs: 100 };

describe('delayFor', () => {
  it('keeps fixed delays constant', () => {
    expect([1, 2, 3].map((n) => delayFor(fixed, n))).toEqual([15, 15, 15]);
  });

  it('doubles exponential delays per attempt', () => {
    expect([1, 2, 3].map((n) => delayFor(exponential, n))).toEqual([100, 200, 400]);
  });
});

describe('attemptWithPolicy', () => {
  it('returns the first successful result', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(attemptWithPolicy(exponential, fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it('gives up after maxAttempts with the last error as cause', async () => {
    const sleep = vi.fn(async () => {});
    const last = new Error('still down');
    const fn = vi
      .fn<() => Promise<never>>()
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(new Error('down'))
      .mockRejectedValueOnce(last);

    const err = await attemptWithPolicy(exponential, fn, { sleep }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 4, cause: last });
    expect(sleep.mock.calls).toEqual([[100], [200], [400]]);
  });

  it('rethrows immediately when shouldRetry says no', async () => {
    const sleep = vi.fn(async () => {});
    const fatal = new Error('fatal');
    const fn = vi.fn<() => Promise<never>>().mockRejectedValue(fatal);

    await expect(
      attemptWithPolicy(fixed, fn, { sleep, shouldRetry: () => false })
    ).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports each retry before sleeping', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('a'))
      .mockResolvedValueOnce(1);

    await attemptWithPolicy(fixed, fn, { sleep: async () => {}, onRetry });

    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ message: 'a' }), 1, 15);
  });
});
