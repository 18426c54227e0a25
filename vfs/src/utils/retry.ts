import { setTimeout as delay } from 'timers/promises';
import { ApiError } from '../errors.js';

// Too Many Requests, Internal Server Error, Bad Gateway, Gateway Timeout, Bandwidth Limit Exceeded
export const RETRY_STATUS_CODES: readonly number[] = [429, 500, 502, 504, 509];

// The remote turned the request away before acting on it
export const REJECTED_STATUS_CODES: readonly number[] = [429];

export interface RetryOptions {
  attempts: number;
  delay: number; // ms
  signal?: AbortSignal;
  label?: string;
  statuses?: readonly number[];
}

export function isRetryable(error: unknown, statuses: readonly number[] = RETRY_STATUS_CODES): boolean {
  return error instanceof ApiError && statuses.includes(error.status);
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
}

/**
 * Runs `fn` until it succeeds, fails with a non-transient error or
 * `attempts` calls were made. Waits a fixed delay between calls.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error, options.statuses) || attempt >= attempts) {
        throw error;
      }
      const status = error instanceof ApiError ? error.status : 'unknown';
      console.warn(`[Retry] ${options.label ?? 'request'} got ${status}, attempt ${attempt}/${attempts}, retrying in ${options.delay}ms`);
      await sleep(options.delay, options.signal);
    }
  }
}
