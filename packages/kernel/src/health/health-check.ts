/**
 * Health Check System
 *
 * Named checks with per-check timeouts, aggregated into one status:
 * - any critical check unhealthy: unhealthy
 * - any other check degraded or unhealthy: degraded
 */

import { CircuitState, HealthStatus } from '@tessellate/types';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { KeyStoreClient } from '../store/key-store';
import { Clock, systemClock } from '../utils/time';

export { HealthStatus };

export interface HealthCheckResult {
  status: HealthStatus;
  name: string;
  message?: string;
  duration: number;
  timestamp: number;
  details?: Record<string, unknown>;
}

export interface AggregatedHealthResult {
  status: HealthStatus;
  version: string;
  uptime: number;
  timestamp: number;
  checks: HealthCheckResult[];
}

export type HealthCheckFn = () => Promise<HealthCheckResult>;

export interface HealthCheckOptions {
  /** Name of the health check */
  name: string;
  /** Timeout for the check in ms */
  timeout: number;
  /** Whether this check is critical (affects overall status) */
  critical: boolean;
}

/**
 * Health Check Registry
 */
export class HealthCheckRegistry {
  private checks: Map<string, { fn: HealthCheckFn; options: HealthCheckOptions }> = new Map();
  private lastResults: Map<string, HealthCheckResult> = new Map();
  private readonly startTime: number;

  constructor(
    private readonly version: string = '1.0.0',
    private readonly clock: Clock = systemClock
  ) {
    this.startTime = clock();
  }

  register(options: HealthCheckOptions, fn: HealthCheckFn): void {
    this.checks.set(options.name, { fn, options });
  }

  unregister(name: string): void {
    this.checks.delete(name);
    this.lastResults.delete(name);
  }

  /**
   * Execute a single health check
   */
  async executeCheck(name: string): Promise<HealthCheckResult> {
    const check = this.checks.get(name);
    if (!check) {
      return {
        status: HealthStatus.UNHEALTHY,
        name,
        message: `Health check '${name}' not found`,
        duration: 0,
        timestamp: this.clock(),
      };
    }

    const startTime = this.clock();
    let timer: NodeJS.Timeout | undefined;
    let result: HealthCheckResult;

    try {
      const outcome = await Promise.race([
        check.fn(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Health check '${name}' timed out after ${check.options.timeout}ms`)),
            check.options.timeout
          );
        }),
      ]);
      result = { ...outcome, name, duration: this.clock() - startTime, timestamp: this.clock() };
    } catch (error) {
      result = {
        status: HealthStatus.UNHEALTHY,
        name,
        message: error instanceof Error ? error.message : 'Unknown error',
        duration: this.clock() - startTime,
        timestamp: this.clock(),
      };
    } finally {
      clearTimeout(timer);
    }

    this.lastResults.set(name, result);
    return result;
  }

  /**
   * Execute all health checks and return aggregated result
   */
  async checkAll(): Promise<AggregatedHealthResult> {
    const names = Array.from(this.checks.keys());
    const results = await Promise.all(names.map(name => this.executeCheck(name)));

    const critical = new Set(
      Array.from(this.checks.values())
        .filter(check => check.options.critical)
        .map(check => check.options.name)
    );

    return {
      status: aggregate(results, critical),
      version: this.version,
      uptime: this.clock() - this.startTime,
      timestamp: this.clock(),
      checks: results,
    };
  }

  /**
   * Liveness check - is the service running?
   */
  liveness(): { status: HealthStatus; uptime: number } {
    return {
      status: HealthStatus.HEALTHY,
      uptime: this.clock() - this.startTime,
    };
  }

  /** Most recent result of a check, without running it */
  latest(name: string): HealthCheckResult | undefined {
    return this.lastResults.get(name);
  }

  names(): string[] {
    return Array.from(this.checks.keys());
  }
}

export function aggregate(results: HealthCheckResult[], critical: ReadonlySet<string>): HealthStatus {
  let overall = HealthStatus.HEALTHY;
  for (const result of results) {
    if (result.status === HealthStatus.UNHEALTHY && critical.has(result.name)) {
      return HealthStatus.UNHEALTHY;
    }
    if (result.status !== HealthStatus.HEALTHY) {
      overall = HealthStatus.DEGRADED;
    }
  }
  return overall;
}

/**
 * Common health check factories
 */
export const HealthChecks = {
  /** Store round trip; slow answers count as degraded */
  store(name: string, store: KeyStoreClient, degradedLatencyMs: number, clock: Clock = systemClock): HealthCheckFn {
    return async () => {
      const started = clock();
      try {
        await store.ping();
        const latencyMs = clock() - started;
        return {
          status: latencyMs > degradedLatencyMs ? HealthStatus.DEGRADED : HealthStatus.HEALTHY,
          name,
          message: `Store responded in ${latencyMs}ms`,
          duration: latencyMs,
          timestamp: clock(),
          details: { latencyMs },
        };
      } catch (error) {
        return {
          status: HealthStatus.UNHEALTHY,
          name,
          message: `Store check failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
          duration: clock() - started,
          timestamp: clock(),
        };
      }
    };
  },

  /** Open circuit: unhealthy; probing: degraded */
  breaker(name: string, breaker: CircuitBreaker, clock: Clock = systemClock): HealthCheckFn {
    return async () => {
      const snapshot = breaker.snapshot();
      const status =
        snapshot.state === CircuitState.OPEN
          ? HealthStatus.UNHEALTHY
          : snapshot.state === CircuitState.HALF_OPEN
            ? HealthStatus.DEGRADED
            : HealthStatus.HEALTHY;
      return {
        status,
        name,
        message: `Circuit '${snapshot.name}' is ${snapshot.state}`,
        duration: 0,
        timestamp: clock(),
        details: {
          state: snapshot.state,
          consecutiveFailures: snapshot.consecutiveFailures,
          rejectedCalls: snapshot.rejectedCalls,
        },
      };
    };
  },
};
