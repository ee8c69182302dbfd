import type { KernelHealthReport, QueueStats, TaskType } from '@tessellate/types';
import { StructuredLogger } from '../observability/structured-logger';
import { TaskQueueManager } from '../queue/task-queue-manager';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { KeyStoreClient } from '../store/key-store';
import { Clock, systemClock } from '../utils/time';
import { HealthCheckRegistry, HealthChecks, HealthStatus } from './health-check';

export interface KernelHealthOptions {
  store: KeyStoreClient;
  breaker: CircuitBreaker;
  queue: TaskQueueManager;
  logger: StructuredLogger;
  version?: string;
  clock?: Clock;
  /** Store round trips slower than this report as degraded */
  degradedLatencyMs?: number;
  checkTimeoutMs?: number;
}

const STORE_CHECK = 'store';
const BREAKER_CHECK = 'circuit-breaker';

/**
 * Aggregated health of the store, the breaker guarding it and the queues.
 */
export class KernelHealth {
  readonly registry: HealthCheckRegistry;
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;

  constructor(private readonly options: KernelHealthOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger.child({ component: 'health' });
    this.registry = new HealthCheckRegistry(options.version, this.clock);

    const timeout = options.checkTimeoutMs ?? 5_000;
    this.registry.register(
      { name: STORE_CHECK, timeout, critical: true },
      HealthChecks.store(STORE_CHECK, options.store, options.degradedLatencyMs ?? 100, this.clock)
    );
    this.registry.register(
      { name: BREAKER_CHECK, timeout, critical: false },
      HealthChecks.breaker(BREAKER_CHECK, options.breaker, this.clock)
    );
  }

  async check(): Promise<KernelHealthReport> {
    const aggregated = await this.registry.checkAll();
    const store = aggregated.checks.find(result => result.name === STORE_CHECK);

    let queues: Partial<Record<TaskType, QueueStats>> = {};
    if (store?.status !== HealthStatus.UNHEALTHY) {
      try {
        queues = await this.options.queue.depths();
      } catch (error) {
        this.logger.warn('Queue statistics unavailable', {
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (aggregated.status !== HealthStatus.HEALTHY) {
      this.logger.warn('Kernel health check not healthy', {
        status: aggregated.status,
        failing: aggregated.checks.filter(result => result.status !== HealthStatus.HEALTHY).map(result => result.name),
      });
    }

    return {
      status: aggregated.status,
      timestamp: aggregated.timestamp,
      store: {
        status: store?.status ?? HealthStatus.UNHEALTHY,
        latencyMs: store && store.status !== HealthStatus.UNHEALTHY ? store.duration : null,
        message: store?.message,
      },
      breaker: this.options.breaker.snapshot(),
      queues,
    };
  }
}
