/**
 * Task Queue Manager
 *
 * Priority queues, one per task type, shared by every process through the
 * key-value store. Each state change (enqueue with its size checks, claim,
 * complete, fail) is a single atomic store operation, so concurrent workers
 * never receive the same task twice. Delivery is at-least-once: a task whose
 * worker disappears is recovered once its processing deadline passes.
 */

import type { FailureOutcome, QueueStats, Task, TaskType } from '@tessellate/types';
import { v4 as uuidv4 } from 'uuid';
import { BackoffPolicy, QueuesConfig } from '../config/kernel-config';
import {
  InvalidTaskStateError,
  QueueFullError,
  TaskNotFoundError,
  ValidationError,
} from '../errors/kernel-errors';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { computeBackoffDelay } from '../resilience/retry';
import { TaskLease, TaskTransitionResult } from '../store/key-store';
import { ScopeInput, TenantAccessor } from '../tenancy/tenant-accessor';
import { Clock, systemClock } from '../utils/time';
import {
  FINISHED_TASK_RETENTION_MS,
  TASK_TYPES,
  deadLetterIndexKey,
  deadLetterKey,
  defaultPriority,
  queueKeys,
  taskKey,
  tenantLimit,
  tenantQueueKey,
} from './queue-config';
import { decodeTask, encodeTask, toJson } from './task-record';

export interface TaskQueueManagerOptions {
  accessor: TenantAccessor;
  queues: QueuesConfig;
  backoff: BackoffPolicy;
  logger: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
  /** Jitter source for retry scheduling */
  random?: () => number;
  retentionMs?: number;
}

export interface EnqueueOptions {
  /** 0 is the most urgent level; defaults to the middle level */
  priority?: number;
  maxAttempts?: number;
  /** Hold the task back for this long before it can be dequeued */
  delayMs?: number;
  metadata?: Record<string, unknown>;
}

/** Counters kept per task type since the queue was created */
export interface QueueCounters {
  enqueued: number;
  dequeued: number;
  completed: number;
  failed: number;
  retried: number;
  deadLettered: number;
}

export interface DetailedQueueStats extends QueueStats {
  counters: QueueCounters;
}

const PROMOTE_BATCH = 100;
const STALLED_ERROR = 'Processing timeout exceeded';

export class TaskQueueManager {
  private readonly accessor: TenantAccessor;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsSink;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly retentionMs: number;

  constructor(private readonly options: TaskQueueManagerOptions) {
    this.accessor = options.accessor;
    this.logger = options.logger.child({ component: 'task-queue' });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.retentionMs = options.retentionMs ?? FINISHED_TASK_RETENTION_MS;
  }

  // ============================================================
  // PRODUCERS
  // ============================================================

  /**
   * Add a task. The size check, the tenant share check and the insert are
   * one atomic step; a full queue raises QueueFullError.
   */
  async enqueue<P>(scope: ScopeInput, type: TaskType, payload: P, options: EnqueueOptions = {}): Promise<Task<P>> {
    const tenant = this.accessor.resolveScope(scope, 'queue.enqueue');
    const definition = this.options.queues[type];
    const priority = options.priority ?? defaultPriority(definition);
    const maxAttempts = options.maxAttempts ?? definition.maxAttempts;
    const delayMs = options.delayMs ?? 0;

    if (!Number.isInteger(priority) || priority < 0 || priority >= definition.priorityLevels) {
      throw new ValidationError(`Priority must be an integer from 0 to ${definition.priorityLevels - 1}`, {
        taskType: type,
        priority,
      });
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts <= 0) {
      throw new ValidationError('maxAttempts must be a positive integer', { maxAttempts });
    }
    if (!Number.isInteger(delayMs) || delayMs < 0) {
      throw new ValidationError('delayMs must be a non-negative integer', { delayMs });
    }

    const now = this.clock();
    const task: Task<P> = {
      taskId: uuidv4(),
      taskType: type,
      scope: tenant,
      payload,
      priority,
      attempts: 0,
      maxAttempts,
      status: 'queued',
      enqueuedAt: now,
      availableAt: now + delayMs,
      startedAt: null,
      completedAt: null,
      lastError: null,
      result: null,
      workerId: null,
      metadata: options.metadata ?? {},
    };
    const limit = tenantLimit(definition);

    const result = await this.accessor.execute('queue.enqueue', store =>
      store.enqueueTask({
        keys: queueKeys(type),
        taskId: task.taskId,
        fields: encodeTask(task),
        priority,
        availableAt: task.availableAt,
        nowMs: now,
        maxSize: definition.maxSize,
        tenantKey: tenantQueueKey(type, tenant),
        tenantLimit: limit,
      })
    );

    switch (result.status) {
      case 'queue_full':
        this.metrics.increment('queue.rejected', 1, { taskType: type, reason: 'queue' });
        this.logger.warn('Queue full, task rejected', { taskType: type, size: result.size, maxSize: definition.maxSize });
        throw new QueueFullError(type, definition.maxSize, 'queue');
      case 'tenant_full':
        this.metrics.increment('queue.rejected', 1, { taskType: type, reason: 'tenant' });
        this.logger.warn('Tenant queue share exhausted, task rejected', { taskType: type, scope: tenant, limit });
        throw new QueueFullError(type, limit, 'tenant');
      case 'enqueued':
        this.metrics.increment('queue.enqueued', 1, { taskType: type });
        this.logger.debug('Task enqueued', { taskId: task.taskId, taskType: type, priority, delayed: result.delayed });
        return task;
    }
  }

  // ============================================================
  // CONSUMERS
  // ============================================================

  /**
   * Claim the most urgent, oldest available task of a type, or null when
   * none is ready. Due delayed tasks are promoted first.
   */
  async dequeue(type: TaskType, workerId: string): Promise<Task | null> {
    if (workerId === '') {
      throw new ValidationError('workerId must not be empty');
    }
    const definition = this.options.queues[type];
    const claimed = await this.accessor.execute('queue.dequeue', store =>
      store.claimTask({
        keys: queueKeys(type),
        nowMs: this.clock(),
        workerId,
        processingTimeoutMs: definition.processingTimeoutMs,
      })
    );
    if (!claimed) return null;

    const task = decodeTask(claimed.fields);
    if (!task) {
      throw new TaskNotFoundError(claimed.taskId);
    }
    this.metrics.increment('queue.dequeued', 1, { taskType: type });
    this.logger.debug('Task dequeued', { taskId: task.taskId, taskType: type, workerId, attempt: task.attempts });
    return task;
  }

  /**
   * Mark a task succeeded. Only the worker holding the attempt may settle
   * it; anyone else gets an InvalidTaskStateError. A bare worker id stands
   * for the task's current attempt.
   */
  async complete(taskId: string, holder: string | TaskLease, result: unknown = null): Promise<Task> {
    const current = await this.require(taskId);
    const lease = toLease(holder, current);
    const now = this.clock();

    const transition = await this.accessor.execute('queue.complete', store =>
      store.completeTask({
        keys: queueKeys(current.taskType),
        taskId,
        lease,
        tenantKey: tenantQueueKey(current.taskType, current.scope),
        fields: {
          result: result === null || result === undefined ? '' : toJson(result, 'result'),
          completedAt: String(now),
          lastError: '',
        },
        retentionMs: this.retentionMs,
      })
    );
    const fields = this.unwrap(taskId, transition, lease);
    const task = decodeTask(fields);
    if (!task) throw new TaskNotFoundError(taskId);

    this.metrics.increment('queue.completed', 1, { taskType: task.taskType });
    if (task.startedAt !== null) {
      this.metrics.timing('queue.processing_ms', now - task.startedAt, { taskType: task.taskType });
    }
    this.logger.debug('Task completed', { taskId, taskType: task.taskType, attempts: task.attempts });
    return task;
  }

  /**
   * Record a failed attempt. The task is retried after an exponential
   * backoff delay, or dead-lettered once its attempts are used up.
   */
  async fail(taskId: string, holder: string | TaskLease, error: unknown): Promise<FailureOutcome> {
    const current = await this.require(taskId);
    return this.settleFailure(current, toLease(holder, current), error);
  }

  private async settleFailure(current: Task, lease: TaskLease, error: unknown): Promise<FailureOutcome> {
    const { taskId } = current;
    const reason = describeError(error);
    const now = this.clock();
    const delayMs = computeBackoffDelay(Math.max(0, current.attempts - 1), this.options.backoff, this.random);

    const transition = await this.accessor.execute('queue.fail', store =>
      store.failTask({
        keys: queueKeys(current.taskType),
        taskId,
        lease,
        tenantKey: tenantQueueKey(current.taskType, current.scope),
        nowMs: now,
        error: reason,
        retryAt: now + delayMs,
        deadLetterKey: deadLetterKey(current.taskType, taskId),
        deadLetterIndex: deadLetterIndexKey(current.taskType),
        retentionMs: this.retentionMs,
      })
    );
    const outcome = this.unwrap(taskId, transition, lease);
    const task = await this.require(taskId);
    this.metrics.increment('queue.failed', 1, { taskType: task.taskType });

    if (outcome.kind === 'retry') {
      this.metrics.increment('queue.retry_scheduled', 1, { taskType: task.taskType });
      this.logger.info('Task failed, retry scheduled', {
        taskId,
        taskType: task.taskType,
        attempt: outcome.attempts,
        maxAttempts: task.maxAttempts,
        delayMs,
        reason,
      });
      return { status: 'retry_scheduled', task, delayMs, availableAt: now + delayMs };
    }

    this.metrics.increment('queue.dead_lettered', 1, { taskType: task.taskType });
    this.logger.warn('Task moved to dead letter', {
      taskId,
      taskType: task.taskType,
      scope: task.scope,
      attempts: outcome.attempts,
      reason,
    });
    return { status: 'dead_lettered', task };
  }

  // ============================================================
  // INSPECTION
  // ============================================================

  async get(taskId: string): Promise<Task | null> {
    if (taskId === '') return null;
    const fields = await this.accessor.execute('queue.get', store => store.hgetall(taskKey(taskId)));
    return decodeTask(fields);
  }

  async stats(type: TaskType): Promise<DetailedQueueStats> {
    const keys = queueKeys(type);
    const snapshot = await this.accessor.execute('queue.stats', async store => ({
      pending: await store.zcard(keys.pending),
      delayed: await store.zcard(keys.delayed),
      inFlight: await store.zcard(keys.processing),
      deadLettered: await store.zcard(deadLetterIndexKey(type)),
      counters: await store.hgetall(keys.stats),
    }));

    this.metrics.gauge('queue.depth', snapshot.pending + snapshot.delayed, { taskType: type });
    return {
      taskType: type,
      pending: snapshot.pending,
      delayed: snapshot.delayed,
      inFlight: snapshot.inFlight,
      deadLettered: snapshot.deadLettered,
      maxSize: this.options.queues[type].maxSize,
      counters: {
        enqueued: counter(snapshot.counters.enqueued),
        dequeued: counter(snapshot.counters.dequeued),
        completed: counter(snapshot.counters.completed),
        failed: counter(snapshot.counters.failed),
        retried: counter(snapshot.counters.retried),
        deadLettered: counter(snapshot.counters.dead_lettered),
      },
    };
  }

  async depths(): Promise<Partial<Record<TaskType, DetailedQueueStats>>> {
    const depths: Partial<Record<TaskType, DetailedQueueStats>> = {};
    for (const type of TASK_TYPES) {
      depths[type] = await this.stats(type);
    }
    return depths;
  }

  /** Tasks a tenant currently holds in a queue (queued or in flight) */
  async tenantDepth(scope: ScopeInput, type: TaskType): Promise<number> {
    const tenant = this.accessor.resolveScope(scope, 'queue.tenantDepth');
    const raw = await this.accessor.execute('queue.tenantDepth', store => store.get(tenantQueueKey(type, tenant)));
    return raw === null ? 0 : Number(raw);
  }

  // ============================================================
  // MAINTENANCE
  // ============================================================

  /** Move delayed tasks whose time has come into the ready queue */
  async promoteDue(type: TaskType): Promise<number> {
    return this.accessor.execute('queue.promote', store =>
      store.promoteDueTasks({ keys: queueKeys(type), nowMs: this.clock(), limit: PROMOTE_BATCH })
    );
  }

  /**
   * Send in-flight tasks past their processing deadline through the
   * failure path. Returns how many were recovered.
   */
  async recoverStalled(type: TaskType): Promise<number> {
    const keys = queueKeys(type);
    const now = this.clock();
    const stalled = await this.accessor.execute('queue.recoverStalled', store =>
      store.zrangeByScore(keys.processing, Number.NEGATIVE_INFINITY, now, { count: PROMOTE_BATCH })
    );

    let recovered = 0;
    for (const taskId of stalled) {
      try {
        const current = await this.require(taskId);
        await this.settleFailure(current, { workerId: current.workerId ?? '', attempt: current.attempts }, STALLED_ERROR);
        recovered++;
      } catch (error) {
        if (error instanceof TaskNotFoundError) {
          await this.accessor.execute('queue.recoverStalled', store => store.zrem(keys.processing, taskId));
          continue;
        }
        if (error instanceof InvalidTaskStateError) {
          // Finished between the scan and the failure
          this.logger.debug('Stalled task already settled', { taskId, status: error.actual });
          continue;
        }
        throw error;
      }
    }

    if (recovered > 0) {
      this.metrics.increment('queue.stalled_recovered', recovered, { taskType: type });
      this.logger.warn('Recovered stalled tasks', { taskType: type, recovered });
    }
    return recovered;
  }

  /**
   * Drop queue index entries whose task hash is gone or already finished.
   * Returns how many entries were removed.
   */
  async purgeFinished(type: TaskType): Promise<number> {
    const keys = queueKeys(type);
    const indexes = [keys.pending, keys.delayed, keys.processing];

    const removed = await this.accessor.execute('queue.purgeFinished', async store => {
      let count = 0;
      for (const index of indexes) {
        const members = await store.zrange(index, 0, -1);
        for (const taskId of members) {
          const status = await store.hget(taskKey(taskId), 'status');
          const live = index === keys.processing ? status === 'in_progress' : status === 'queued';
          if (!live) {
            count += await store.zrem(index, taskId);
          }
        }
      }
      return count;
    });

    if (removed > 0) {
      this.logger.info('Purged finished queue entries', { taskType: type, removed });
    }
    return removed;
  }

  private async require(taskId: string): Promise<Task> {
    const task = await this.get(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  private unwrap<T>(taskId: string, transition: TaskTransitionResult<T>, lease: TaskLease): T {
    switch (transition.status) {
      case 'ok':
        return transition.value;
      case 'not_found':
        throw new TaskNotFoundError(taskId);
      case 'invalid_state':
        throw new InvalidTaskStateError(taskId, transition.actual, `in_progress under '${lease.workerId}'`);
    }
  }
}

function toLease(holder: string | TaskLease, current: Task): TaskLease {
  return typeof holder === 'string' ? { workerId: holder, attempt: current.attempts } : holder;
}

function counter(raw: string | undefined): number {
  return raw === undefined ? 0 : Number(raw);
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return typeof error === 'string' ? error : String(error);
}
