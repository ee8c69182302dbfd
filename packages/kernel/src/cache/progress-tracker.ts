/**
 * Progress Tracker
 *
 * Step-based progress of long-running work, keyed by correlation id under
 * `tenant:{scope}:progress:{id}`. Records expire after the progress TTL;
 * once completed or failed they stay readable for a shorter grace period.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ProgressRecord, ProgressStatus, TenantScope } from '@tessellate/types';
import { ValidationError } from '../errors/kernel-errors';
import { StructuredLogger } from '../observability/structured-logger';
import { ProgressChange, ProgressMutationRequest } from '../store/key-store';
import { ScopeInput, TenantAccessor } from '../tenancy/tenant-accessor';
import { Clock, systemClock } from '../utils/time';

export interface ProgressTrackerOptions {
  accessor: TenantAccessor;
  ttlMs: number;
  terminalGraceMs: number;
  logger: StructuredLogger;
  clock?: Clock;
}

export interface StartProgressOptions {
  correlationId?: string;
  message?: string;
}

export interface ProgressUpdate {
  completedSteps?: number;
  totalSteps?: number;
  message?: string;
}

const STATUSES: readonly ProgressStatus[] = ['in_progress', 'completed', 'failed'];

export class ProgressTracker {
  private readonly accessor: TenantAccessor;
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;

  constructor(private readonly options: ProgressTrackerOptions) {
    this.accessor = options.accessor;
    this.logger = options.logger.child({ component: 'progress-tracker' });
    this.clock = options.clock ?? systemClock;
  }

  async start(scope: ScopeInput, totalSteps: number, options: StartProgressOptions = {}): Promise<ProgressRecord> {
    const tenant = this.accessor.resolveScope(scope, 'progress.start');
    if (!Number.isInteger(totalSteps) || totalSteps <= 0) {
      throw new ValidationError('totalSteps must be a positive integer', { totalSteps });
    }

    const now = this.clock();
    const record: ProgressRecord = {
      correlationId: options.correlationId ?? uuidv4(),
      scope: tenant,
      totalSteps,
      completedSteps: 0,
      lastMessage: options.message ?? '',
      status: 'in_progress',
      startedAt: now,
      updatedAt: now,
      percentage: 0,
    };

    const key = this.key(tenant, record.correlationId);
    await this.accessor.execute('progress.start', async store => {
      await store.del(key);
      await store.hset(key, encode(record));
      await store.expire(key, this.options.ttlMs);
    });
    return record;
  }

  /**
   * Advance by `steps`, clamping at totalSteps
   */
  async increment(scope: ScopeInput, correlationId: string, steps: number = 1, message?: string): Promise<ProgressRecord | null> {
    if (!Number.isInteger(steps) || steps < 0) {
      throw new ValidationError('steps must be a non-negative integer', { steps });
    }
    return this.mutate(scope, correlationId, { kind: 'increment', steps }, message);
  }

  async update(scope: ScopeInput, correlationId: string, update: ProgressUpdate): Promise<ProgressRecord | null> {
    const { totalSteps, completedSteps } = update;
    if (totalSteps !== undefined && (!Number.isInteger(totalSteps) || totalSteps <= 0)) {
      throw new ValidationError('totalSteps must be a positive integer', { totalSteps });
    }
    if (completedSteps !== undefined && (!Number.isInteger(completedSteps) || completedSteps < 0)) {
      throw new ValidationError('completedSteps must be a non-negative integer', { completedSteps });
    }
    return this.mutate(scope, correlationId, { kind: 'set', totalSteps, completedSteps }, update.message);
  }

  async complete(scope: ScopeInput, correlationId: string, message?: string): Promise<ProgressRecord | null> {
    return this.mutate(scope, correlationId, { kind: 'complete' }, message);
  }

  async fail(scope: ScopeInput, correlationId: string, error: string): Promise<ProgressRecord | null> {
    return this.mutate(scope, correlationId, { kind: 'fail', error });
  }

  async get(scope: ScopeInput, correlationId: string): Promise<ProgressRecord | null> {
    const tenant = this.accessor.resolveScope(scope, 'progress.get');
    const fields = await this.accessor.execute('progress.get', store => store.hgetall(this.key(tenant, correlationId)));
    return decode(fields);
  }

  async remove(scope: ScopeInput, correlationId: string): Promise<boolean> {
    const tenant = this.accessor.resolveScope(scope, 'progress.remove');
    return (await this.accessor.execute('progress.remove', store => store.del(this.key(tenant, correlationId)))) > 0;
  }

  // Read, change and expiry happen in one store operation
  private async mutate(
    scope: ScopeInput,
    correlationId: string,
    change: ProgressChange,
    message?: string
  ): Promise<ProgressRecord | null> {
    const tenant = this.accessor.resolveScope(scope, `progress.${change.kind}`);
    const request: ProgressMutationRequest = {
      key: this.key(tenant, correlationId),
      change,
      message,
      nowMs: this.clock(),
      activeTtlMs: this.options.ttlMs,
      terminalTtlMs: this.options.terminalGraceMs,
    };
    const result = await this.accessor.execute(`progress.${change.kind}`, store => store.mutateProgress(request));

    switch (result.status) {
      case 'not_found':
        return null;
      case 'terminal':
        throw new ValidationError(`Progress '${correlationId}' is already ${result.actual}`, {
          correlationId,
          status: result.actual,
        });
      case 'ok': {
        const record = decode(result.fields);
        if (record && record.status !== 'in_progress') {
          this.logger.debug('Progress finished', { correlationId, status: record.status });
        }
        return record;
      }
    }
  }

  private key(scope: TenantScope, correlationId: string): string {
    return this.accessor.keyFor(scope, `progress:${correlationId}`, 'progress');
  }
}

function percentage(completed: number, total: number): number {
  return Math.round((completed / total) * 10000) / 100;
}

function encode(record: ProgressRecord): Record<string, string> {
  const fields: Record<string, string> = {
    correlationId: record.correlationId,
    scope: record.scope,
    totalSteps: String(record.totalSteps),
    completedSteps: String(record.completedSteps),
    lastMessage: record.lastMessage,
    status: record.status,
    startedAt: String(record.startedAt),
    updatedAt: String(record.updatedAt),
  };
  if (record.error !== undefined) fields.error = record.error;
  return fields;
}

function decode(fields: Record<string, string>): ProgressRecord | null {
  const status = STATUSES.find(candidate => candidate === fields.status);
  if (fields.correlationId === undefined || status === undefined) return null;

  const totalSteps = Number(fields.totalSteps);
  const completedSteps = Number(fields.completedSteps);
  const record: ProgressRecord = {
    correlationId: fields.correlationId,
    scope: fields.scope ?? '',
    totalSteps,
    completedSteps,
    lastMessage: fields.lastMessage ?? '',
    status,
    startedAt: Number(fields.startedAt),
    updatedAt: Number(fields.updatedAt),
    percentage: totalSteps > 0 ? percentage(completedSteps, totalSteps) : 0,
  };
  if (fields.error !== undefined) record.error = fields.error;
  return record;
}
