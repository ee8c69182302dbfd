/**
 * Circuit Breaker Pattern Implementation
 *
 * Wraps every call to the key-value store so an unreachable store is
 * detected quickly and callers fail fast instead of piling up on timeouts.
 *
 * States:
 * - CLOSED: Normal operation, calls pass through
 * - OPEN: Circuit tripped, calls fail immediately with CircuitOpenError
 * - HALF_OPEN: A limited number of trial calls test whether the store recovered
 *
 * Only errors selected by `isFailure` (connection loss and timeouts by
 * default, never an exhausted local pool) move the breaker; anything else
 * passes through untouched.
 */

import { CircuitBreakerSnapshot, CircuitState } from '@tessellate/types';
import { CircuitOpenError, TimeoutError, isStoreOutage } from '../errors/kernel-errors';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { Clock, systemClock } from '../utils/time';

export { CircuitState };

export interface CircuitBreakerOptions {
  /** Name of the circuit breaker for logging */
  name: string;
  /** Consecutive failures before opening the circuit */
  failureThreshold: number;
  /** Time in ms the circuit stays OPEN before allowing trial calls */
  recoveryTimeoutMs: number;
  /** Consecutive successes in HALF_OPEN needed to close the circuit */
  successThreshold: number;
  /** Concurrent trial calls allowed while HALF_OPEN */
  halfOpenMaxCalls: number;
  /** Timeout for individual calls in ms */
  callTimeoutMs: number;
  /** Which errors count as failures */
  isFailure?: (error: unknown) => boolean;
  clock?: Clock;
  logger?: StructuredLogger;
  metrics?: MetricsSink;
  /** Optional callback when state changes */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount: number = 0;
  private successCount: number = 0;
  private halfOpenInFlight: number = 0;
  private openedAt: number | null = null;
  private nextAttempt: number = 0;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private totalCalls: number = 0;
  private successfulCalls: number = 0;
  private failedCalls: number = 0;
  private rejectedCalls: number = 0;
  private timeoutCalls: number = 0;
  private circuitOpens: number = 0;

  private readonly clock: Clock;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly metrics: MetricsSink;
  private readonly logger?: StructuredLogger;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.clock = options.clock ?? systemClock;
    this.isFailure = options.isFailure ?? isStoreOutage;
    this.metrics = options.metrics ?? new NoopMetrics();
    this.logger = options.logger?.child({ component: 'circuit-breaker', breaker: options.name });
  }

  /**
   * Execute a function through the circuit breaker
   */
  async execute<T>(fn: () => Promise<T>, operation: string = this.options.name): Promise<T> {
    this.totalCalls++;

    if (this.state === CircuitState.OPEN) {
      const now = this.clock();
      if (now < this.nextAttempt) {
        throw this.reject(operation, this.nextAttempt - now);
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    const trial = this.state === CircuitState.HALF_OPEN;
    if (trial) {
      if (this.halfOpenInFlight >= this.options.halfOpenMaxCalls) {
        throw this.reject(operation, 0);
      }
      this.halfOpenInFlight++;
    }

    const start = performance.now();
    try {
      const result = await this.executeWithTimeout(fn, operation);
      this.onSuccess();
      return result;
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.timeoutCalls++;
      }
      if (this.isFailure(error)) {
        this.onFailure(operation, error);
      }
      throw error;
    } finally {
      if (trial) this.halfOpenInFlight--;
      this.metrics.timing('breaker.call_ms', performance.now() - start, { breaker: this.options.name, operation });
    }
  }

  /**
   * Execute function with timeout
   */
  private executeWithTimeout<T>(fn: () => Promise<T>, operation: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TimeoutError(operation, this.options.callTimeoutMs));
      }, this.options.callTimeoutMs);

      fn()
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch(error => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private reject(operation: string, retryAfterMs: number): CircuitOpenError {
    this.rejectedCalls++;
    this.metrics.increment('breaker.rejected', 1, { breaker: this.options.name });
    this.logger?.debug('Call rejected by open circuit', { operation, retryAfterMs });
    return new CircuitOpenError(this.options.name, retryAfterMs);
  }

  /**
   * Handle successful call
   */
  private onSuccess(): void {
    this.successfulCalls++;
    this.lastSuccessTime = this.clock();
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    }
  }

  /**
   * Handle failed call
   */
  private onFailure(operation: string, error: unknown): void {
    this.failedCalls++;
    this.lastFailureTime = this.clock();
    this.failureCount++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN, operation, error);
    } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold) {
      this.transitionTo(CircuitState.OPEN, operation, error);
    }
  }

  /**
   * Transition to a new state
   */
  private transitionTo(newState: CircuitState, operation?: string, cause?: unknown): void {
    const oldState = this.state;
    if (oldState === newState) return;
    this.state = newState;
    this.successCount = 0;

    if (newState === CircuitState.OPEN) {
      this.openedAt = this.clock();
      this.nextAttempt = this.openedAt + this.options.recoveryTimeoutMs;
      this.circuitOpens++;
      this.logger?.warn('Circuit opened', {
        from: oldState,
        operation,
        consecutiveFailures: this.failureCount,
        retryAfterMs: this.options.recoveryTimeoutMs,
        reason: cause instanceof Error ? cause.message : undefined,
      });
    } else {
      if (newState === CircuitState.CLOSED) {
        this.openedAt = null;
        this.failureCount = 0;
      }
      this.logger?.info(`Circuit ${newState === CircuitState.CLOSED ? 'closed' : 'half-open'}`, { from: oldState });
    }

    this.metrics.increment('breaker.transition', 1, { breaker: this.options.name, from: oldState, to: newState });
    this.options.onStateChange?.(oldState, newState);
  }

  /**
   * Get current state
   */
  getState(): CircuitState {
    return this.state;
  }

  getName(): string {
    return this.options.name;
  }

  /**
   * Point-in-time view of state and counters
   */
  snapshot(): CircuitBreakerSnapshot {
    return {
      name: this.options.name,
      state: this.state,
      consecutiveFailures: this.failureCount,
      consecutiveSuccesses: this.successCount,
      openedAt: this.openedAt,
      totalCalls: this.totalCalls,
      successfulCalls: this.successfulCalls,
      failedCalls: this.failedCalls,
      rejectedCalls: this.rejectedCalls,
      timeoutCalls: this.timeoutCalls,
      circuitOpens: this.circuitOpens,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
    };
  }

  /**
   * Reset the circuit breaker
   */
  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.halfOpenInFlight = 0;
    this.openedAt = null;
    this.nextAttempt = 0;
    this.totalCalls = 0;
    this.successfulCalls = 0;
    this.failedCalls = 0;
    this.rejectedCalls = 0;
    this.timeoutCalls = 0;
    this.circuitOpens = 0;
    this.lastFailureTime = null;
    this.lastSuccessTime = null;
  }
}
