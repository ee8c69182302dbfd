import { computeBackoffDelay, withRetry } from '../retry';
import { ConnectionError, ValidationError } from '../../errors/kernel-errors';
import { rejectionOf } from '@test/helpers';

const noWait = async () => undefined;

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = jest.fn().mockRejectedValueOnce(new ConnectionError()).mockResolvedValueOnce('value');
    await expect(withRetry(fn, { maxRetries: 2, wait: noWait })).resolves.toBe('value');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should rethrow the last error once retries run out', async () => {
    const fn = jest.fn(() => Promise.reject(new ConnectionError('still down')));
    const error = await rejectionOf(withRetry(fn, { maxRetries: 2, wait: noWait }));

    expect(error).toBeInstanceOf(ConnectionError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry errors that are not transient', async () => {
    const fn = jest.fn(() => Promise.reject(new ValidationError('bad')));
    await expect(withRetry(fn, { maxRetries: 5, wait: noWait })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wait the backoff delay between attempts', async () => {
    const waits: number[] = [];
    const fn = jest.fn(() => Promise.reject(new ConnectionError()));
    await rejectionOf(
      withRetry(fn, {
        maxRetries: 3,
        baseDelayMs: 100,
        maxDelayMs: 10_000,
        jitterRatio: 0.25,
        random: () => 0.5,
        wait: async ms => {
          waits.push(ms);
        },
      })
    );
    expect(waits).toEqual([100, 200, 400]);
  });

  it('should report each retry', async () => {
    const onRetry = jest.fn();
    const fn = jest.fn().mockRejectedValueOnce(new ConnectionError()).mockResolvedValueOnce(1);
    await withRetry(fn, { maxRetries: 1, baseDelayMs: 10, random: () => 0.5, wait: noWait, onRetry });

    expect(onRetry).toHaveBeenCalledWith(1, expect.any(ConnectionError), 10);
  });
});

describe('computeBackoffDelay', () => {
  const policy = { baseDelayMs: 1_000, maxDelayMs: 300_000, jitterRatio: 0.25 };

  it('should double the nominal delay per attempt', () => {
    expect([0, 1, 2, 3].map(attempt => computeBackoffDelay(attempt, policy, () => 0.5))).toEqual([
      1_000, 2_000, 4_000, 8_000,
    ]);
  });

  it('should apply jitter within the ratio', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(750);
    expect(computeBackoffDelay(0, policy, () => 0.999999)).toBe(1_250);
  });

  it('should cap at maxDelayMs', () => {
    expect(computeBackoffDelay(20, policy, () => 0.5)).toBe(300_000);
  });

  it('should never decrease across attempts whatever the draws', () => {
    const draws = [0.999, 0, 0.7, 0.01, 0.99, 0.3, 0, 0.999, 0.5, 0];
    const extreme = { ...policy, jitterRatio: 1 / 3 };
    for (let attempt = 0; attempt < draws.length - 1; attempt++) {
      const current = computeBackoffDelay(attempt, extreme, () => 0.999999);
      const next = computeBackoffDelay(attempt + 1, extreme, () => 0);
      expect(next).toBeGreaterThanOrEqual(current);

      const sampled = computeBackoffDelay(attempt, extreme, () => draws[attempt] ?? 0);
      const sampledNext = computeBackoffDelay(attempt + 1, extreme, () => draws[attempt + 1] ?? 0);
      expect(sampledNext).toBeGreaterThanOrEqual(sampled);
    }
  });
});
