/**
 * Queue Worker
 *
 * Polls one or more task types, runs each claimed task through its handler
 * under the type's processing timeout, then completes or fails it. Handlers
 * receive an AbortSignal that fires on timeout or forced shutdown; either
 * way the task goes through the failure path.
 */

import type { Task, TaskType } from '@tessellate/types';
import { v4 as uuidv4 } from 'uuid';
import { QueuesConfig } from '../config/kernel-config';
import { TimeoutError, ValidationError } from '../errors/kernel-errors';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { TaskLease } from '../store/key-store';
import { Clock, sleep, systemClock } from '../utils/time';
import { TASK_TYPES } from './queue-config';
import { TaskQueueManager } from './task-queue-manager';

export interface TaskContext {
  signal: AbortSignal;
  workerId: string;
}

export type TaskHandler = (task: Task, context: TaskContext) => Promise<unknown>;

export interface QueueWorkerOptions {
  queue: TaskQueueManager;
  queues: QueuesConfig;
  handlers: Partial<Record<TaskType, TaskHandler>>;
  logger: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
  /** Types polled, in order; defaults to every type with a handler */
  taskTypes?: TaskType[];
  workerId?: string;
  concurrency?: number;
  pollIntervalMs?: number;
}

export interface WorkerStats {
  workerId: string;
  running: boolean;
  inFlight: number;
  processed: number;
  completed: number;
  failed: number;
  startedAt: number | null;
  lastActivityAt: number | null;
}

export class WorkerStoppedError extends Error {
  constructor(workerId: string) {
    super(`Worker '${workerId}' stopped before the task finished`);
    this.name = 'WorkerStoppedError';
  }
}

const DEFAULT_CONCURRENCY = 5;
const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_GRACEFUL_TIMEOUT_MS = 30_000;

export class QueueWorker {
  readonly workerId: string;
  private readonly taskTypes: TaskType[];
  private readonly concurrency: number;
  private readonly pollIntervalMs: number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsSink;
  private readonly clock: Clock;

  private running = false;
  private loop: Promise<void> | null = null;
  private pollAbort = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly controllers = new Set<AbortController>();
  private stats: Omit<WorkerStats, 'workerId' | 'running' | 'inFlight'> = {
    processed: 0,
    completed: 0,
    failed: 0,
    startedAt: null,
    lastActivityAt: null,
  };

  constructor(private readonly options: QueueWorkerOptions) {
    this.workerId = options.workerId ?? `worker-${uuidv4()}`;
    this.taskTypes = options.taskTypes ?? TASK_TYPES.filter(type => options.handlers[type] !== undefined);
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger.child({ component: 'queue-worker', workerId: this.workerId });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.clock = options.clock ?? systemClock;

    if (this.taskTypes.length === 0) {
      throw new ValidationError('A worker needs at least one task type');
    }
    const missing = this.taskTypes.filter(type => !options.handlers[type]);
    if (missing.length > 0) {
      throw new ValidationError('Every polled task type needs a handler', { missing });
    }
    if (!Number.isInteger(this.concurrency) || this.concurrency <= 0) {
      throw new ValidationError('concurrency must be a positive integer', { concurrency: this.concurrency });
    }
  }

  /**
   * Begin polling in the background. Calling start on a running worker does
   * nothing.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.pollAbort = new AbortController();
    this.stats.startedAt = this.clock();
    this.logger.info('Worker started', { taskTypes: this.taskTypes, concurrency: this.concurrency });
    this.loop = this.pollLoop();
  }

  /**
   * Stop polling and wait for in-flight tasks. Tasks still running after
   * `gracefulTimeoutMs` are aborted and go through the failure path.
   */
  async stop(gracefulTimeoutMs: number = DEFAULT_GRACEFUL_TIMEOUT_MS): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.pollAbort.abort();
    await this.loop;
    this.loop = null;

    if (this.inFlight.size > 0) {
      this.logger.info('Waiting for in-flight tasks', { inFlight: this.inFlight.size });
      const grace = new AbortController();
      const drained = await Promise.race([
        Promise.all(Array.from(this.inFlight)).then(() => true),
        sleep(gracefulTimeoutMs, grace.signal).then(() => false),
      ]);
      grace.abort();
      if (!drained) {
        this.logger.warn('Graceful shutdown timed out, aborting tasks', { inFlight: this.inFlight.size });
        for (const controller of this.controllers) {
          controller.abort(new WorkerStoppedError(this.workerId));
        }
        await Promise.all(Array.from(this.inFlight));
      }
    }
    this.logger.info('Worker stopped', { processed: this.stats.processed });
  }

  /**
   * Claim and process a single task, if one is ready. Returns whether a
   * task was processed.
   */
  async runOnce(): Promise<boolean> {
    const task = await this.claimNext();
    if (!task) return false;
    await this.process(task);
    return true;
  }

  getStats(): WorkerStats {
    return { ...this.stats, workerId: this.workerId, running: this.running, inFlight: this.inFlight.size };
  }

  private async pollLoop(): Promise<void> {
    while (this.running) {
      if (this.inFlight.size >= this.concurrency) {
        await Promise.race(Array.from(this.inFlight));
        continue;
      }

      const task = await this.claimNext();
      if (!task) {
        await sleep(this.pollIntervalMs, this.pollAbort.signal);
        continue;
      }

      const running: Promise<void> = this.process(task).finally(() => this.inFlight.delete(running));
      this.inFlight.add(running);
    }
  }

  private async claimNext(): Promise<Task | null> {
    for (const type of this.taskTypes) {
      try {
        const task = await this.options.queue.dequeue(type, this.workerId);
        if (task) return task;
      } catch (error) {
        this.metrics.increment('worker.dequeue_error', 1, { taskType: type });
        this.logger.warn('Failed to dequeue task', {
          taskType: type,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return null;
  }

  private async process(task: Task): Promise<void> {
    this.stats.lastActivityAt = this.clock();
    const started = this.clock();
    const log = this.logger.child({ taskId: task.taskId, taskType: task.taskType });

    try {
      let result: unknown;
      try {
        result = await this.execute(task);
      } catch (error) {
        this.stats.failed++;
        await this.reportFailure(task, error, log);
        return;
      }
      await this.reportSuccess(task, result, log);
      log.debug('Task processed', { durationMs: this.clock() - started });
    } finally {
      this.stats.processed++;
      this.metrics.timing('worker.task_ms', this.clock() - started, { taskType: task.taskType });
    }
  }

  private async execute(task: Task): Promise<unknown> {
    const handler = this.options.handlers[task.taskType];
    if (!handler) {
      throw new ValidationError(`No handler for task type '${task.taskType}'`);
    }

    const timeoutMs = this.options.queues[task.taskType].processingTimeoutMs;
    const controller = new AbortController();
    this.controllers.add(controller);
    let timer: NodeJS.Timeout | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => controller.abort(new TimeoutError(`task.${task.taskType}`, timeoutMs)), timeoutMs);
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      return await Promise.race([handler(task, { signal: controller.signal, workerId: this.workerId }), interrupted]);
    } finally {
      clearTimeout(timer);
      this.controllers.delete(controller);
    }
  }

  private leaseOf(task: Task): TaskLease {
    return { workerId: this.workerId, attempt: task.attempts };
  }

  private async reportSuccess(task: Task, result: unknown, log: StructuredLogger): Promise<void> {
    try {
      await this.options.queue.complete(task.taskId, this.leaseOf(task), result);
      this.stats.completed++;
    } catch (error) {
      // The task may already have been recovered as stalled by another process
      this.metrics.increment('worker.report_error', 1, { taskType: task.taskType });
      log.error('Could not record task completion', error);
    }
  }

  private async reportFailure(task: Task, error: unknown, log: StructuredLogger): Promise<void> {
    try {
      const outcome = await this.options.queue.fail(task.taskId, this.leaseOf(task), error);
      log.warn('Task failed', {
        outcome: outcome.status,
        attempt: task.attempts,
        reason: error instanceof Error ? error.message : String(error),
      });
    } catch (failError) {
      this.metrics.increment('worker.report_error', 1, { taskType: task.taskType });
      log.error('Could not record task failure', failError);
    }
  }
}
