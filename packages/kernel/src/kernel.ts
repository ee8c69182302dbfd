/**
 * Kernel composition
 *
 * Builds every component from one configuration object. Nothing here is a
 * module-level singleton: each Kernel owns its store connections, breaker,
 * services and timers, and releases them on shutdown.
 */

import { HealthStatus, KernelHealthReport } from '@tessellate/types';
import { KernelConfig } from './config/kernel-config';
import { ProgressTracker } from './cache/progress-tracker';
import { SessionStore } from './cache/session-store';
import { TenantCache } from './cache/tenant-cache';
import { UsageCounter } from './cache/usage-counter';
import { isStoreUnavailable } from './errors/kernel-errors';
import { KernelHealth } from './health/kernel-health';
import { MaintenanceScheduler } from './maintenance/scheduler';
import { MetricsSink, NoopMetrics } from './observability/metrics';
import { StructuredLogger, createLogger } from './observability/structured-logger';
import { DeadLetterStore } from './queue/dead-letter-store';
import { TASK_TYPES } from './queue/queue-config';
import { QueueWorker, QueueWorkerOptions } from './queue/queue-worker';
import { TaskQueueManager } from './queue/task-queue-manager';
import { RateLimiter } from './rate-limiting/rate-limiter';
import { CircuitBreaker, CircuitState } from './resilience/circuit-breaker';
import { KeyStoreClient } from './store/key-store';
import { RedisKeyStore } from './store/redis-key-store';
import { TenantAccessor } from './tenancy/tenant-accessor';
import { Clock, systemClock } from './utils/time';

export interface KernelDependencies {
  /** Defaults to a RedisKeyStore built from config.store */
  store?: KeyStoreClient;
  logger?: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
  /** Jitter source for retries */
  random?: () => number;
  /** Wait between local store retries */
  wait?: (ms: number) => Promise<void>;
}

export type WorkerOptions = Omit<QueueWorkerOptions, 'queue' | 'queues' | 'logger' | 'metrics' | 'clock'>;

export class Kernel {
  readonly store: KeyStoreClient;
  readonly breaker: CircuitBreaker;
  readonly accessor: TenantAccessor;
  readonly cache: TenantCache;
  readonly sessions: SessionStore;
  readonly progress: ProgressTracker;
  readonly usage: UsageCounter;
  readonly rateLimiter: RateLimiter;
  readonly queue: TaskQueueManager;
  readonly deadLetters: DeadLetterStore;
  readonly health: KernelHealth;
  readonly maintenance: MaintenanceScheduler;
  readonly logger: StructuredLogger;
  readonly metrics: MetricsSink;

  private readonly clock: Clock;
  private readonly workers: QueueWorker[] = [];
  private lastHealth: KernelHealthReport | null = null;
  private started = false;

  constructor(readonly config: KernelConfig, deps: KernelDependencies = {}) {
    const clock = deps.clock ?? systemClock;
    this.clock = clock;
    this.logger = deps.logger ?? createLogger({ service: config.serviceName });
    this.metrics = deps.metrics ?? new NoopMetrics();
    const { logger, metrics } = this;

    this.store =
      deps.store ??
      new RedisKeyStore({
        url: config.store.url,
        maxConnections: config.store.maxConnections,
        maxWaiters: config.store.maxWaiters,
        acquireTimeoutMs: config.store.acquireTimeoutMs,
        connectTimeoutMs: config.store.connectTimeoutMs,
        operationTimeoutMs: config.store.operationTimeoutMs,
        logger,
        metrics,
      });

    this.breaker = new CircuitBreaker({
      name: 'key-store',
      ...config.breaker,
      clock,
      logger,
      metrics,
    });

    this.accessor = new TenantAccessor({
      store: this.store,
      breaker: this.breaker,
      tenancy: config.tenancy,
      retry: config.retry,
      logger,
      random: deps.random,
      wait: deps.wait,
    });

    const accessor = this.accessor;
    this.cache = new TenantCache({ accessor, defaultTtlMs: config.cache.defaultTtlMs, logger, metrics, clock });
    this.sessions = new SessionStore({ accessor, ttlMs: config.sessions.ttlMs, logger, clock });
    this.progress = new ProgressTracker({
      accessor,
      ttlMs: config.progress.ttlMs,
      terminalGraceMs: config.progress.terminalGraceMs,
      logger,
      clock,
    });
    this.usage = new UsageCounter({ accessor, clock });
    this.rateLimiter = new RateLimiter({ accessor, policies: config.rateLimits, logger, metrics, clock });
    this.queue = new TaskQueueManager({
      accessor,
      queues: config.queues,
      backoff: config.backoff,
      logger,
      metrics,
      clock,
      random: deps.random,
    });
    this.deadLetters = new DeadLetterStore({ accessor, queues: config.queues, logger, metrics, clock });
    this.health = new KernelHealth({
      store: this.store,
      breaker: this.breaker,
      queue: this.queue,
      logger,
      version: config.serviceName,
      clock,
    });
    this.maintenance = new MaintenanceScheduler({ logger, metrics, clock });
    this.registerMaintenance();
  }

  /**
   * Check connectivity and start maintenance. An unreachable store is
   * logged and the kernel starts degraded; the breaker takes over from there.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    try {
      await this.accessor.execute('startup.ping', store => store.ping());
      this.logger.info('Kernel started', { service: this.config.serviceName });
    } catch (error) {
      if (!isStoreUnavailable(error)) throw error;
      this.logger.warn('Kernel started without store connectivity', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    this.maintenance.start();
  }

  /**
   * Stop workers (draining in-flight tasks), maintenance and store connections
   */
  async shutdown(gracefulTimeoutMs?: number): Promise<void> {
    this.logger.info('Kernel shutting down', { workers: this.workers.length });
    await Promise.all(this.workers.map(worker => worker.stop(gracefulTimeoutMs)));
    await this.maintenance.stop();
    await this.store.close();
    this.started = false;
    this.logger.info('Kernel stopped');
  }

  /**
   * A worker bound to this kernel's queue; it is stopped on shutdown
   */
  createWorker(options: WorkerOptions): QueueWorker {
    const worker = new QueueWorker({
      ...options,
      queue: this.queue,
      queues: this.config.queues,
      logger: this.logger,
      metrics: this.metrics,
      clock: this.clock,
    });
    this.workers.push(worker);
    return worker;
  }

  /** Report from the latest health check, if one has run */
  latestHealth(): KernelHealthReport | null {
    return this.lastHealth;
  }

  private registerMaintenance(): void {
    const { maintenance } = this.config;
    const storeReachable = () => this.breaker.getState() !== CircuitState.OPEN;

    this.maintenance.register({
      name: 'queue-promotion',
      intervalMs: maintenance.promoteIntervalMs,
      run: async () => {
        if (!storeReachable()) return;
        for (const type of TASK_TYPES) {
          await this.queue.promoteDue(type);
        }
      },
    });

    this.maintenance.register({
      name: 'stall-recovery',
      intervalMs: maintenance.stallCheckIntervalMs,
      run: async () => {
        if (!storeReachable()) return;
        for (const type of TASK_TYPES) {
          await this.queue.recoverStalled(type);
        }
      },
    });

    this.maintenance.register({
      name: 'health-check',
      intervalMs: maintenance.healthIntervalMs,
      run: async () => {
        this.lastHealth = await this.health.check();
        this.metrics.gauge('kernel.healthy', this.lastHealth.status === HealthStatus.HEALTHY ? 1 : 0);
      },
    });

    // Drives an open breaker back to CLOSED once the store answers again
    this.maintenance.register({
      name: 'breaker-recovery',
      intervalMs: maintenance.healthIntervalMs,
      run: async () => {
        if (this.breaker.getState() === CircuitState.CLOSED) return;
        try {
          await this.accessor.execute('breaker.recovery', store => store.ping());
        } catch (error) {
          if (!isStoreUnavailable(error)) throw error;
          this.logger.debug('Breaker recovery check failed', { state: this.breaker.getState() });
        }
      },
    });
  }
}

export function createKernel(config: KernelConfig, deps: KernelDependencies = {}): Kernel {
  return new Kernel(config, deps);
}
