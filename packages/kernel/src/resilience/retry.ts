/**
 * Retry Pattern Implementation
 *
 * Bounded retries with exponential backoff and proportional jitter. The
 * same delay curve drives local store retries and task retry scheduling.
 */

import { isTransientStoreError } from '../errors/kernel-errors';
import { sleep } from '../utils/time';

export interface BackoffSettings {
  /** Delay before the first retry in ms */
  baseDelayMs: number;
  /** Upper bound for any delay in ms */
  maxDelayMs: number;
  /** Delay varies by up to ±jitterRatio of its nominal value */
  jitterRatio: number;
}

export interface RetryOptions extends BackoffSettings {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Function to determine if error is retryable */
  retryCondition: (error: unknown) => boolean;
  /** Callback on each retry attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Source of randomness for jitter, in [0, 1) */
  random: () => number;
  /** Waits between attempts */
  wait: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 50,
  maxDelayMs: 1000,
  jitterRatio: 0.25,
  retryCondition: isTransientStoreError,
  random: Math.random,
  wait: ms => sleep(ms),
};

/**
 * Execute a function with retry logic. When attempts run out, or the error
 * is not retryable, the last error is rethrown as-is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxRetries || !opts.retryCondition(error)) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, opts, opts.random);
      opts.onRetry?.(attempt + 1, error, delay);
      await opts.wait(delay);
    }
  }
}

/**
 * Delay before retry number `attempt + 1`:
 * baseDelayMs * 2^attempt, scaled by a factor in [1 - jitterRatio, 1 + jitterRatio],
 * capped at maxDelayMs.
 *
 * With jitterRatio <= 1/3 the delay never decreases from one attempt to the
 * next, whatever the random draws.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffSettings,
  random: () => number = Math.random
): number {
  const nominal = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt));
  const factor = 1 + policy.jitterRatio * (2 * random() - 1);
  return Math.min(policy.maxDelayMs, Math.round(nominal * factor));
}
