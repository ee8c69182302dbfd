/**
 * Queue key layout and per-type settings
 *
 *   queue:{type}                   counters hash
 *   queue:{type}:priority          ready tasks (priority, then enqueue order)
 *   queue:{type}:delayed           tasks waiting for availableAt
 *   queue:{type}:processing        claimed tasks by processing deadline
 *   queue:{type}:sequence          enqueue counter
 *   queue:{type}:tenant:{scope}    tasks a tenant holds in the queue
 *   task:{id}                      task hash
 *   deadletter:{type}              dead-letter index by failure time
 *   deadletter:{type}:task:{id}    dead-letter record
 */

import type { TaskType, TenantScope } from '@tessellate/types';
import { QueueDefinition } from '../config/kernel-config';
import { ValidationError } from '../errors/kernel-errors';
import { QueueKeys } from '../store/key-store';

export const TASK_TYPES: readonly TaskType[] = [
  'embeddings',
  'background-jobs',
  'exports',
  'notifications',
  'cleanup',
  'health-checks',
];

export const TASK_KEY_PREFIX = 'task:';

/** How long finished tasks stay readable */
export const FINISHED_TASK_RETENTION_MS = 24 * 60 * 60 * 1000;

export function isTaskType(value: unknown): value is TaskType {
  return TASK_TYPES.some(type => type === value);
}

export function assertTaskType(value: string): TaskType {
  if (!isTaskType(value)) {
    throw new ValidationError(`Unknown task type '${value}'`, { taskType: value, known: TASK_TYPES });
  }
  return value;
}

export function queueKeys(type: TaskType): QueueKeys {
  const base = `queue:${type}`;
  return {
    pending: `${base}:priority`,
    delayed: `${base}:delayed`,
    processing: `${base}:processing`,
    sequence: `${base}:sequence`,
    stats: base,
    taskPrefix: TASK_KEY_PREFIX,
  };
}

export function taskKey(taskId: string): string {
  return `${TASK_KEY_PREFIX}${taskId}`;
}

export function tenantQueueKey(type: TaskType, scope: TenantScope): string {
  return `queue:${type}:tenant:${scope}`;
}

export function deadLetterIndexKey(type: TaskType): string {
  return `deadletter:${type}`;
}

export function deadLetterKey(type: TaskType, taskId: string): string {
  return `deadletter:${type}:task:${taskId}`;
}

/** A single tenant may hold at most this many tasks of one type */
export function tenantLimit(definition: QueueDefinition): number {
  return Math.max(1, Math.floor(definition.maxSize * definition.tenantShare));
}

/** Middle priority level; lower values are more urgent */
export function defaultPriority(definition: QueueDefinition): number {
  return Math.floor((definition.priorityLevels - 1) / 2);
}
