/**
 * Task hash encoding. Every field is stored as a string; an empty string
 * stands for null.
 */

import type { Task, TaskStatus } from '@tessellate/types';
import { ValidationError } from '../errors/kernel-errors';
import { isTaskType } from './queue-config';

const STATUSES: readonly TaskStatus[] = ['queued', 'in_progress', 'succeeded', 'failed', 'dead_lettered'];

export function encodeTask(task: Task): Record<string, string> {
  return {
    taskId: task.taskId,
    taskType: task.taskType,
    scope: task.scope,
    payload: toJson(task.payload, 'payload'),
    priority: String(task.priority),
    attempts: String(task.attempts),
    maxAttempts: String(task.maxAttempts),
    status: task.status,
    enqueuedAt: String(task.enqueuedAt),
    availableAt: String(task.availableAt),
    startedAt: optionalNumber(task.startedAt),
    completedAt: optionalNumber(task.completedAt),
    lastError: task.lastError ?? '',
    result: task.result === null || task.result === undefined ? '' : toJson(task.result, 'result'),
    workerId: task.workerId ?? '',
    metadata: toJson(task.metadata, 'metadata'),
  };
}

/** Null when the hash is missing or not a task */
export function decodeTask(fields: Record<string, string>): Task | null {
  const { taskId, taskType, scope } = fields;
  const status = STATUSES.find(candidate => candidate === fields.status);
  if (!taskId || !scope || !isTaskType(taskType) || status === undefined) {
    return null;
  }

  return {
    taskId,
    taskType,
    scope,
    payload: parseJson(fields.payload),
    priority: Number(fields.priority ?? '0'),
    attempts: Number(fields.attempts ?? '0'),
    maxAttempts: Number(fields.maxAttempts ?? '1'),
    status,
    enqueuedAt: Number(fields.enqueuedAt ?? '0'),
    availableAt: Number(fields.availableAt ?? fields.enqueuedAt ?? '0'),
    startedAt: nullableNumber(fields.startedAt),
    completedAt: nullableNumber(fields.completedAt),
    lastError: fields.lastError ? fields.lastError : null,
    result: parseJson(fields.result),
    workerId: fields.workerId ? fields.workerId : null,
    metadata: parseMetadata(fields.metadata),
  };
}

export function toJson(value: unknown, field: string): string {
  const json = JSON.stringify(value);
  if (json === undefined) {
    throw new ValidationError(`Task ${field} is not JSON serialisable`, { field });
  }
  return json;
}

function optionalNumber(value: number | null): string {
  return value === null ? '' : String(value);
}

function nullableNumber(value: string | undefined): number | null {
  return value === undefined || value === '' ? null : Number(value);
}

function parseJson(raw: string | undefined): unknown {
  if (raw === undefined || raw === '') return null;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function parseMetadata(raw: string | undefined): Record<string, unknown> {
  const value = parseJson(raw);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}
