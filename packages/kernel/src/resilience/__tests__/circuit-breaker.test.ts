/**
 * Unit tests for Circuit Breaker
 */

import { CircuitBreaker, CircuitState } from '../circuit-breaker';
import {
  CircuitOpenError,
  ConnectionError,
  PoolExhaustedError,
  TimeoutError,
  ValidationError,
} from '../../errors/kernel-errors';
import { InMemoryMetrics } from '../../observability/metrics';
import { ManualClock, rejectionOf } from '@test/helpers';

const connectionLost = () => Promise.reject(new ConnectionError('connection refused'));

describe('CircuitBreaker', () => {
  let clock: ManualClock;
  let metrics: InMemoryMetrics;
  let transitions: Array<[CircuitState, CircuitState]>;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = new ManualClock();
    metrics = new InMemoryMetrics();
    transitions = [];
    breaker = new CircuitBreaker({
      name: 'test-breaker',
      failureThreshold: 5,
      recoveryTimeoutMs: 60_000,
      successThreshold: 3,
      halfOpenMaxCalls: 1,
      callTimeoutMs: 1_000,
      clock: clock.now,
      metrics,
      onStateChange: (from, to) => transitions.push([from, to]),
    });
  });

  async function trip(): Promise<void> {
    for (let i = 0; i < 5; i++) {
      await expect(breaker.execute(connectionLost)).rejects.toBeInstanceOf(ConnectionError);
    }
  }

  describe('CLOSED state', () => {
    it('should start in CLOSED state', () => {
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('should pass through successful calls', async () => {
      await expect(breaker.execute(() => Promise.resolve('success'))).resolves.toBe('success');
      expect(breaker.snapshot().successfulCalls).toBe(1);
    });

    it('should stay closed below the failure threshold', async () => {
      for (let i = 0; i < 4; i++) {
        await expect(breaker.execute(connectionLost)).rejects.toThrow('connection refused');
      }
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.snapshot().consecutiveFailures).toBe(4);
    });

    it('should open after five consecutive failures', async () => {
      await trip();
      expect(breaker.getState()).toBe(CircuitState.OPEN);
      expect(breaker.snapshot().openedAt).toBe(clock.current);
      expect(transitions).toEqual([[CircuitState.CLOSED, CircuitState.OPEN]]);
    });

    it('should reset the failure count on success', async () => {
      for (let i = 0; i < 4; i++) {
        await expect(breaker.execute(connectionLost)).rejects.toThrow();
      }
      await breaker.execute(() => Promise.resolve('ok'));
      await expect(breaker.execute(connectionLost)).rejects.toThrow();

      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.snapshot().consecutiveFailures).toBe(1);
    });

    it('should ignore errors that are not store failures', async () => {
      for (let i = 0; i < 10; i++) {
        await expect(breaker.execute(() => Promise.reject(new ValidationError('bad input')))).rejects.toBeInstanceOf(
          ValidationError
        );
      }
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.snapshot().failedCalls).toBe(0);
    });

    it('should not open while only the local pool is exhausted', async () => {
      for (let i = 0; i < 10; i++) {
        await expect(
          breaker.execute(() => Promise.reject(new PoolExhaustedError('redis', 4, 100)))
        ).rejects.toBeInstanceOf(PoolExhaustedError);
      }
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.snapshot().consecutiveFailures).toBe(0);
    });

    it('should time out slow calls and count them as failures', async () => {
      const fast = new CircuitBreaker({
        name: 'slow',
        failureThreshold: 1,
        recoveryTimeoutMs: 1_000,
        successThreshold: 1,
        halfOpenMaxCalls: 1,
        callTimeoutMs: 10,
        clock: clock.now,
      });
      const error = await rejectionOf(fast.execute(() => new Promise(resolve => setTimeout(resolve, 200)), 'store.get'));

      expect(error).toBeInstanceOf(TimeoutError);
      expect(fast.getState()).toBe(CircuitState.OPEN);
      expect(fast.snapshot().timeoutCalls).toBe(1);
    });
  });

  describe('OPEN state', () => {
    beforeEach(trip);

    it('should fail fast without invoking the call', async () => {
      const fn = jest.fn(() => Promise.resolve('never'));
      const error = await rejectionOf(breaker.execute(fn));

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(fn).not.toHaveBeenCalled();
      expect(breaker.snapshot().rejectedCalls).toBe(1);
      expect(metrics.counter('breaker.rejected', { breaker: 'test-breaker' })).toBe(1);
    });

    it('should report the remaining recovery time', async () => {
      clock.advance(45_000);
      const error = await rejectionOf(breaker.execute(() => Promise.resolve('x')));

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error instanceof CircuitOpenError && error.retryAfterMs).toBe(15_000);
    });

    it('should allow a trial call after the recovery timeout', async () => {
      clock.advance(60_000);
      await expect(breaker.execute(() => Promise.resolve('trial'))).resolves.toBe('trial');
      expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    });
  });

  describe('HALF_OPEN state', () => {
    beforeEach(async () => {
      await trip();
      clock.advance(60_000);
    });

    it('should close after three consecutive successes', async () => {
      for (let i = 0; i < 2; i++) {
        await breaker.execute(() => Promise.resolve('ok'));
        expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
      }
      await breaker.execute(() => Promise.resolve('ok'));

      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(transitions).toEqual([
        [CircuitState.CLOSED, CircuitState.OPEN],
        [CircuitState.OPEN, CircuitState.HALF_OPEN],
        [CircuitState.HALF_OPEN, CircuitState.CLOSED],
      ]);
    });

    it('should reopen on a single failure', async () => {
      await breaker.execute(() => Promise.resolve('ok'));
      await expect(breaker.execute(connectionLost)).rejects.toBeInstanceOf(ConnectionError);

      expect(breaker.getState()).toBe(CircuitState.OPEN);
      expect(breaker.snapshot().circuitOpens).toBe(2);
    });

    it('should limit concurrent trial calls', async () => {
      let release: () => void = () => undefined;
      const pending = breaker.execute(() => new Promise<void>(resolve => (release = () => resolve())));

      const error = await rejectionOf(breaker.execute(() => Promise.resolve()));
      expect(error).toBeInstanceOf(CircuitOpenError);

      release();
      await pending;
    });
  });

  describe('reset', () => {
    it('should return to CLOSED with cleared counters', async () => {
      await trip();
      breaker.reset();

      const snapshot = breaker.snapshot();
      expect(snapshot.state).toBe(CircuitState.CLOSED);
      expect(snapshot.totalCalls).toBe(0);
      expect(snapshot.consecutiveFailures).toBe(0);
    });
  });
});
