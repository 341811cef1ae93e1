import { setTimeout as delay } from 'node:timers/promises';
import { RetryExhaustedError } from './errors.js';

export type DelayStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number;
  delayStrategy: DelayStrategy;
  baseDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => delay(ms);

export interface AttemptOptions {
  sleep?: Sleep;
  /** Return false to give up immediately and rethrow the error */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/** Delay to wait after the given (1-based) failed attempt */
export function delayFor(policy: RetryPolicy, attempt: number): number {
  if (policy.delayStrategy === 'fixed') return policy.baseDelayMs;
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run `fn` until it resolves or the policy runs out of attempts.
 *
 * `fn` receives the 1-based attempt number. Non-retryable errors are
 * rethrown as-is; exhaustion throws RetryExhaustedError with the last error
 * as `cause`.
 */
export async function attemptWithPolicy<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  options: AttemptOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) {
        throw err;
      }
      if (attempt < maxAttempts) {
        const ms = delayFor(policy, attempt);
        options.onRetry?.(err, attempt, ms);
        await sleep(ms);
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
