/**
 * Dead Letter Store
 *
 * Tasks that used up their attempts, kept per task type for inspection and
 * manual requeue. Records are indexed by failure time, newest first.
 */

import type { DeadLetterRecord, Task, TaskType } from '@tessellate/types';
import { QueuesConfig } from '../config/kernel-config';
import { QueueFullError } from '../errors/kernel-errors';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { TenantAccessor } from '../tenancy/tenant-accessor';
import { isValidScope } from '../tenancy/tenant-scope';
import { Clock, systemClock } from '../utils/time';
import { deadLetterIndexKey, deadLetterKey, queueKeys, tenantLimit, tenantQueueKey } from './queue-config';
import { decodeTask, encodeTask } from './task-record';

export interface DeadLetterStoreOptions {
  accessor: TenantAccessor;
  queues: QueuesConfig;
  logger: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
}

export interface DeadLetterListOptions {
  limit?: number;
  offset?: number;
  /** Only records of this tenant */
  scope?: string;
}

const DEFAULT_PAGE_SIZE = 50;
export const DEAD_LETTER_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000;

export class DeadLetterStore {
  private readonly accessor: TenantAccessor;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsSink;
  private readonly clock: Clock;

  constructor(private readonly options: DeadLetterStoreOptions) {
    this.accessor = options.accessor;
    this.logger = options.logger.child({ component: 'dead-letter' });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.clock = options.clock ?? systemClock;
  }

  async list(type: TaskType, options: DeadLetterListOptions = {}): Promise<DeadLetterRecord[]> {
    const limit = options.limit ?? DEFAULT_PAGE_SIZE;
    const offset = options.offset ?? 0;
    const scope = options.scope;
    if (scope !== undefined) this.accessor.resolveScope(scope, 'deadletter.list');

    return this.accessor.execute('deadletter.list', async store => {
      const ids = await store.zrange(deadLetterIndexKey(type), 0, -1, true);
      const found: DeadLetterRecord[] = [];
      let skipped = 0;
      for (const taskId of ids) {
        if (found.length >= limit) break;
        const record = toRecord(await store.hgetall(deadLetterKey(type, taskId)));
        if (!record || (scope !== undefined && record.task.scope !== scope)) continue;
        if (skipped < offset) {
          skipped++;
          continue;
        }
        found.push(record);
      }
      return found;
    });
  }

  async get(type: TaskType, taskId: string): Promise<DeadLetterRecord | null> {
    const fields = await this.accessor.execute('deadletter.get', store => store.hgetall(deadLetterKey(type, taskId)));
    return toRecord(fields);
  }

  count(type: TaskType): Promise<number> {
    return this.accessor.execute('deadletter.count', store => store.zcard(deadLetterIndexKey(type)));
  }

  /**
   * Put a dead-lettered task back on its queue with a fresh attempt budget.
   * The record is removed only once the task is queued again.
   */
  async requeue(type: TaskType, taskId: string): Promise<Task | null> {
    const record = await this.get(type, taskId);
    if (!record) return null;

    const definition = this.options.queues[type];
    const now = this.clock();
    const task: Task = {
      ...record.task,
      attempts: 0,
      status: 'queued',
      enqueuedAt: now,
      availableAt: now,
      startedAt: null,
      completedAt: null,
      lastError: record.reason,
      result: null,
      workerId: null,
    };
    const limit = tenantLimit(definition);

    const result = await this.accessor.execute('deadletter.requeue', store =>
      store.enqueueTask({
        keys: queueKeys(type),
        taskId,
        fields: encodeTask(task),
        priority: task.priority,
        availableAt: now,
        nowMs: now,
        maxSize: definition.maxSize,
        tenantKey: tenantQueueKey(type, task.scope),
        tenantLimit: limit,
      })
    );
    if (result.status === 'queue_full') throw new QueueFullError(type, definition.maxSize, 'queue');
    if (result.status === 'tenant_full') throw new QueueFullError(type, limit, 'tenant');

    await this.delete(type, taskId);
    this.metrics.increment('deadletter.requeued', 1, { taskType: type });
    this.logger.info('Dead-lettered task requeued', { taskId, taskType: type, scope: task.scope });
    return task;
  }

  async remove(type: TaskType, taskId: string): Promise<boolean> {
    const removed = await this.delete(type, taskId);
    if (removed) {
      this.logger.info('Dead-lettered task removed', { taskId, taskType: type });
    }
    return removed;
  }

  /**
   * Drop records that failed more than `maxAgeMs` ago; returns how many
   */
  async purgeOlderThan(type: TaskType, maxAgeMs: number = DEAD_LETTER_MAX_AGE_MS): Promise<number> {
    const cutoff = this.clock() - maxAgeMs;
    const index = deadLetterIndexKey(type);
    const removed = await this.accessor.execute('deadletter.purge', async store => {
      const ids = await store.zrangeByScore(index, Number.NEGATIVE_INFINITY, cutoff);
      if (ids.length === 0) return 0;
      await store.del(...ids.map(id => deadLetterKey(type, id)));
      return store.zrem(index, ...ids);
    });
    if (removed > 0) {
      this.logger.info('Purged old dead-letter records', { taskType: type, removed });
    }
    return removed;
  }

  private async delete(type: TaskType, taskId: string): Promise<boolean> {
    return this.accessor.execute('deadletter.remove', async store => {
      const removed = await store.zrem(deadLetterIndexKey(type), taskId);
      const deleted = await store.del(deadLetterKey(type, taskId));
      return removed + deleted > 0;
    });
  }
}

function toRecord(fields: Record<string, string>): DeadLetterRecord | null {
  const task = decodeTask(fields);
  if (!task || !isValidScope(task.scope)) return null;
  return {
    task,
    reason: fields.reason ?? task.lastError ?? '',
    failedAt: Number(fields.failedAt ?? task.completedAt ?? 0),
    attempts: task.attempts,
  };
}
