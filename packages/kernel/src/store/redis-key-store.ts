/**
 * Redis-backed KeyStoreClient.
 *
 * Commands run on ioredis connections borrowed from a ConnectionPool.
 * Atomic operations are Lua scripts invoked by SHA with EVALSHA, falling
 * back to EVAL when the server has not cached them yet. Driver failures are
 * normalised through toKernelError so the breaker and retry layers only
 * ever see the kernel taxonomy.
 */

import { createHash } from 'crypto';
import Redis from 'ioredis';
import { StoreCommandError, toKernelError } from '../errors/kernel-errors';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { ConnectionPool, ConnectionPoolStats } from './connection-pool';
import {
  ClaimTaskRequest,
  ClaimedTask,
  CompleteTaskRequest,
  EnqueueTaskRequest,
  EnqueueTaskResult,
  FailTaskOutcome,
  FailTaskRequest,
  FixedWindowRequest,
  FixedWindowResult,
  KeyStoreClient,
  PRIORITY_SCORE_FACTOR,
  ProgressChange,
  ProgressMutationRequest,
  ProgressMutationResult,
  PromoteRequest,
  RangeOptions,
  SlidingWindowRequest,
  SlidingWindowResult,
  TaskTransitionResult,
  TokenBucketRequest,
  TokenBucketResult,
  VersionedWriteRequest,
} from './key-store';
import {
  CLAIM_SCRIPT,
  COMPLETE_SCRIPT,
  ENQUEUE_SCRIPT,
  FAIL_SCRIPT,
  FIXED_WINDOW_SCRIPT,
  PROGRESS_SCRIPT,
  PROMOTE_SCRIPT,
  SLIDING_WINDOW_SCRIPT,
  TOKEN_BUCKET_SCRIPT,
  VERSIONED_WRITE_SCRIPT,
} from './scripts';

export interface RedisKeyStoreOptions {
  url: string;
  maxConnections: number;
  maxWaiters: number;
  acquireTimeoutMs: number;
  connectTimeoutMs: number;
  operationTimeoutMs: number;
  logger: StructuredLogger;
  metrics?: MetricsSink;
}

const SCAN_COUNT = 200;
const PROMOTE_BATCH = 100;

export class RedisKeyStore implements KeyStoreClient {
  private readonly pool: ConnectionPool<Redis>;
  private readonly metrics: MetricsSink;
  private readonly logger: StructuredLogger;

  constructor(private readonly options: RedisKeyStoreOptions) {
    this.logger = options.logger.child({ component: 'redis-key-store' });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.pool = new ConnectionPool<Redis>({
      name: 'redis',
      maxSize: options.maxConnections,
      maxWaiters: options.maxWaiters,
      acquireTimeoutMs: options.acquireTimeoutMs,
      create: () => this.connect(),
      destroy: async client => {
        await client.quit();
      },
      isHealthy: client => client.status === 'ready',
      onDestroyError: error => this.logger.warn('Failed to close store connection', { reason: String(error) }),
    });
  }

  getPoolStats(): ConnectionPoolStats {
    return this.pool.getStats();
  }

  // ============================================================
  // PRIMITIVES
  // ============================================================

  async ping(): Promise<void> {
    await this.command('ping', client => client.ping());
  }

  get(key: string): Promise<string | null> {
    return this.command('get', client => client.get(key));
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    await this.command('set', client => (ttlMs && ttlMs > 0 ? client.set(key, value, 'PX', ttlMs) : client.set(key, value)));
  }

  async setIfExists(key: string, value: string, ttlMs: number): Promise<boolean> {
    return (await this.command('setIfExists', client => client.set(key, value, 'PX', ttlMs, 'XX'))) === 'OK';
  }

  del(...keys: string[]): Promise<number> {
    if (keys.length === 0) return Promise.resolve(0);
    return this.command('del', client => client.del(...keys));
  }

  async exists(key: string): Promise<boolean> {
    return (await this.command('exists', client => client.exists(key))) === 1;
  }

  async expire(key: string, ttlMs: number): Promise<boolean> {
    return (await this.command('expire', client => client.pexpire(key, ttlMs))) === 1;
  }

  pttl(key: string): Promise<number> {
    return this.command('pttl', client => client.pttl(key));
  }

  incr(key: string): Promise<number> {
    return this.command('incr', client => client.incr(key));
  }

  scan(pattern: string): Promise<string[]> {
    return this.command('scan', async client => {
      const keys = new Set<string>();
      let cursor = '0';
      do {
        const [next, batch] = await client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
        batch.forEach(key => keys.add(key));
        cursor = next;
      } while (cursor !== '0');
      return Array.from(keys);
    });
  }

  async hset(key: string, fields: Record<string, string>): Promise<void> {
    if (Object.keys(fields).length === 0) return;
    await this.command('hset', client => client.hset(key, fields));
  }

  hget(key: string, field: string): Promise<string | null> {
    return this.command('hget', client => client.hget(key, field));
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.command('hgetall', client => client.hgetall(key));
  }

  hincrby(key: string, field: string, by: number): Promise<number> {
    return this.command('hincrby', client => client.hincrby(key, field, by));
  }

  sadd(key: string, ...members: string[]): Promise<number> {
    if (members.length === 0) return Promise.resolve(0);
    return this.command('sadd', client => client.sadd(key, ...members));
  }

  srem(key: string, ...members: string[]): Promise<number> {
    if (members.length === 0) return Promise.resolve(0);
    return this.command('srem', client => client.srem(key, ...members));
  }

  smembers(key: string): Promise<string[]> {
    return this.command('smembers', client => client.smembers(key));
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return (await this.command('sismember', client => client.sismember(key, member))) === 1;
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    await this.command('zadd', client => client.zadd(key, score, member));
  }

  zrem(key: string, ...members: string[]): Promise<number> {
    if (members.length === 0) return Promise.resolve(0);
    return this.command('zrem', client => client.zrem(key, ...members));
  }

  zcard(key: string): Promise<number> {
    return this.command('zcard', client => client.zcard(key));
  }

  zcount(key: string, min: number, max: number): Promise<number> {
    return this.command('zcount', client => client.zcount(key, scoreArg(min), scoreArg(max)));
  }

  zrangeByScore(key: string, min: number, max: number, options: RangeOptions = {}): Promise<string[]> {
    return this.command('zrangeByScore', client =>
      options.count === undefined
        ? client.zrangebyscore(key, scoreArg(min), scoreArg(max))
        : client.zrangebyscore(key, scoreArg(min), scoreArg(max), 'LIMIT', options.offset ?? 0, options.count)
    );
  }

  zrange(key: string, start: number, stop: number, reverse: boolean = false): Promise<string[]> {
    return this.command('zrange', client => (reverse ? client.zrevrange(key, start, stop) : client.zrange(key, start, stop)));
  }

  // ============================================================
  // ATOMIC OPERATIONS
  // ============================================================

  async slidingWindowHit(request: SlidingWindowRequest): Promise<SlidingWindowResult> {
    const reply = await this.script('slidingWindowHit', SLIDING_WINDOW_SCRIPT, [request.key], [
      request.nowMs,
      request.windowMs,
      request.limit,
      request.cost,
      request.memberId,
    ]);
    const [allowed, count, retryAfterMs, resetMs] = numbers('slidingWindowHit', reply, 4);
    return { allowed: allowed === 1, count, retryAfterMs, resetMs };
  }

  async tokenBucketTake(request: TokenBucketRequest): Promise<TokenBucketResult> {
    const reply = await this.script('tokenBucketTake', TOKEN_BUCKET_SCRIPT, [request.key], [
      request.nowMs,
      request.capacity,
      request.refillPerSecond / 1000,
      request.cost,
      request.ttlMs,
    ]);
    const [allowed, tokens, retryAfterMs, resetMs] = numbers('tokenBucketTake', reply, 4);
    return { allowed: allowed === 1, tokens, retryAfterMs, resetMs };
  }

  async fixedWindowHit(request: FixedWindowRequest): Promise<FixedWindowResult> {
    const reply = await this.script('fixedWindowHit', FIXED_WINDOW_SCRIPT, [request.key], [
      request.windowMs,
      request.limit,
      request.cost,
    ]);
    const [allowed, count, resetMs] = numbers('fixedWindowHit', reply, 3);
    return { allowed: allowed === 1, count, resetMs };
  }

  async versionedWrite(request: VersionedWriteRequest): Promise<number> {
    const reply = await this.script('versionedWrite', VERSIONED_WRITE_SCRIPT, [request.key], [
      request.nowMs,
      request.ttlMs,
      ...flattenFields(request.fields),
    ]);
    return toInteger('versionedWrite', reply);
  }

  async mutateProgress(request: ProgressMutationRequest): Promise<ProgressMutationResult> {
    const { change } = request;
    const reply = await this.script('mutateProgress', PROGRESS_SCRIPT, [request.key], [
      request.nowMs,
      change.kind,
      change.kind === 'increment' ? change.steps : 0,
      change.kind === 'set' ? optionalArg(change.completedSteps) : '',
      change.kind === 'set' ? optionalArg(change.totalSteps) : '',
      request.message === undefined ? 0 : 1,
      request.message ?? '',
      failureText(change),
      request.activeTtlMs,
      request.terminalTtlMs,
    ]);
    const [status, value] = tuple('mutateProgress', reply);
    switch (status) {
      case 'ok':
        return { status: 'ok', fields: pairsToRecord('mutateProgress', value) };
      case 'not_found':
        return { status: 'not_found' };
      case 'terminal':
        return { status: 'terminal', actual: toText('mutateProgress', value) };
      default:
        throw unexpectedReply('mutateProgress', reply);
    }
  }

  async enqueueTask(request: EnqueueTaskRequest): Promise<EnqueueTaskResult> {
    const { keys } = request;
    const reply = await this.script(
      'enqueueTask',
      ENQUEUE_SCRIPT,
      [keys.pending, keys.delayed, keys.sequence, keys.stats, `${keys.taskPrefix}${request.taskId}`, request.tenantKey],
      [
        request.taskId,
        request.priority,
        request.availableAt,
        request.nowMs,
        request.maxSize,
        request.tenantLimit,
        PRIORITY_SCORE_FACTOR,
        ...flattenFields(request.fields),
      ]
    );
    const [status, value] = tuple('enqueueTask', reply);
    const amount = toInteger('enqueueTask', value);
    switch (status) {
      case 'enqueued':
        return { status: 'enqueued', delayed: amount === 1 };
      case 'queue_full':
        return { status: 'queue_full', size: amount };
      case 'tenant_full':
        return { status: 'tenant_full', size: amount };
      default:
        throw unexpectedReply('enqueueTask', reply);
    }
  }

  async claimTask(request: ClaimTaskRequest): Promise<ClaimedTask | null> {
    const { keys } = request;
    const reply = await this.script(
      'claimTask',
      CLAIM_SCRIPT,
      [keys.pending, keys.delayed, keys.processing, keys.sequence, keys.stats],
      [request.nowMs, request.workerId, request.processingTimeoutMs, keys.taskPrefix, PRIORITY_SCORE_FACTOR, PROMOTE_BATCH]
    );
    if (reply === null) return null;
    const [taskId, fields] = tuple('claimTask', reply);
    return { taskId: toText('claimTask', taskId), fields: pairsToRecord('claimTask', fields) };
  }

  async completeTask(request: CompleteTaskRequest): Promise<TaskTransitionResult<Record<string, string>>> {
    const { keys } = request;
    const reply = await this.script(
      'completeTask',
      COMPLETE_SCRIPT,
      [keys.processing, keys.stats, `${keys.taskPrefix}${request.taskId}`, request.tenantKey],
      [request.taskId, request.retentionMs, request.lease.workerId, request.lease.attempt, ...flattenFields(request.fields)]
    );
    const [status, value] = tuple('completeTask', reply);
    if (status === 'ok') return { status: 'ok', value: pairsToRecord('completeTask', value) };
    return transitionFailure('completeTask', status, value, reply);
  }

  async failTask(request: FailTaskRequest): Promise<TaskTransitionResult<FailTaskOutcome>> {
    const { keys } = request;
    const reply = await this.script(
      'failTask',
      FAIL_SCRIPT,
      [
        keys.processing,
        keys.delayed,
        keys.stats,
        `${keys.taskPrefix}${request.taskId}`,
        request.tenantKey,
        request.deadLetterKey,
        request.deadLetterIndex,
      ],
      [
        request.taskId,
        request.nowMs,
        request.error,
        request.retryAt,
        request.retentionMs,
        request.lease.workerId,
        request.lease.attempt,
      ]
    );
    const [status, value] = tuple('failTask', reply);
    if (status === 'retry') {
      return { status: 'ok', value: { kind: 'retry', attempts: toInteger('failTask', value) } };
    }
    if (status === 'dead_lettered') {
      return { status: 'ok', value: { kind: 'dead_lettered', attempts: toInteger('failTask', value) } };
    }
    return transitionFailure('failTask', status, value, reply);
  }

  async promoteDueTasks(request: PromoteRequest): Promise<number> {
    const { keys } = request;
    const reply = await this.script(
      'promoteDueTasks',
      PROMOTE_SCRIPT,
      [keys.pending, keys.delayed, keys.processing, keys.sequence],
      [request.nowMs, keys.taskPrefix, PRIORITY_SCORE_FACTOR, request.limit]
    );
    return toInteger('promoteDueTasks', reply);
  }

  async close(): Promise<void> {
    await this.pool.drain();
    this.logger.info('Store connections closed');
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private async connect(): Promise<Redis> {
    const client = new Redis(this.options.url, {
      lazyConnect: true,
      connectTimeout: this.options.connectTimeoutMs,
      commandTimeout: this.options.operationTimeoutMs,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
    });
    client.on('error', (error: Error) => this.logger.debug('Store connection error', { reason: error.message }));
    await client.connect();
    this.logger.debug('Store connection opened', { pool: this.pool.getStats().size });
    return client;
  }

  private script(operation: string, source: string, keys: string[], args: Array<string | number>): Promise<unknown> {
    const sha = scriptSha(source);
    const argv = [...keys, ...args.map(String)];
    return this.command(operation, async client => {
      try {
        return await client.evalsha(sha, keys.length, ...argv);
      } catch (error) {
        if (!isNoScript(error)) throw error;
        return client.eval(source, keys.length, ...argv);
      }
    });
  }

  private async command<T>(operation: string, fn: (client: Redis) => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await this.pool.use(fn);
      this.metrics.increment('store.operation', 1, { operation });
      return result;
    } catch (error) {
      const kernelError = toKernelError(error, operation, this.options.operationTimeoutMs);
      this.metrics.increment('store.error', 1, { operation, code: kernelError.code });
      throw kernelError;
    } finally {
      this.metrics.timing('store.latency_ms', performance.now() - start, { operation });
    }
  }
}

// ============================================================
// SCRIPT CACHE
// ============================================================

const scriptShas = new Map<string, string>();

function scriptSha(source: string): string {
  let sha = scriptShas.get(source);
  if (sha === undefined) {
    sha = createHash('sha1').update(source).digest('hex');
    scriptShas.set(source, sha);
  }
  return sha;
}

function isNoScript(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith('NOSCRIPT');
}

// ============================================================
// REPLY PARSING
// ============================================================

function optionalArg(value: number | undefined): string {
  return value === undefined ? '' : String(value);
}

function failureText(change: ProgressChange): string {
  return change.kind === 'fail' ? change.error : '';
}

function scoreArg(score: number): string {
  if (score === Number.NEGATIVE_INFINITY) return '-inf';
  if (score === Number.POSITIVE_INFINITY) return '+inf';
  return String(score);
}

function flattenFields(fields: Record<string, string>): string[] {
  return Object.entries(fields).flat();
}

function unexpectedReply(operation: string, reply: unknown): StoreCommandError {
  return new StoreCommandError(operation, new Error(`Unexpected script reply: ${JSON.stringify(reply)}`));
}

function tuple(operation: string, reply: unknown): [string, unknown] {
  if (!Array.isArray(reply) || reply.length === 0) throw unexpectedReply(operation, reply);
  const items: unknown[] = reply;
  return [toText(operation, items[0]), items[1]];
}

function toText(operation: string, value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  throw unexpectedReply(operation, value);
}

function toInteger(operation: string, value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value !== '' && Number.isFinite(Number(value))) return Number(value);
  throw unexpectedReply(operation, value);
}

function numbers(operation: string, reply: unknown, count: number): number[] {
  if (!Array.isArray(reply) || reply.length < count) throw unexpectedReply(operation, reply);
  const items: unknown[] = reply;
  return items.slice(0, count).map(item => toInteger(operation, item));
}

function pairsToRecord(operation: string, value: unknown): Record<string, string> {
  if (!Array.isArray(value) || value.length % 2 !== 0) throw unexpectedReply(operation, value);
  const items: unknown[] = value;
  const record: Record<string, string> = {};
  for (let i = 0; i < items.length; i += 2) {
    record[toText(operation, items[i])] = toText(operation, items[i + 1]);
  }
  return record;
}

function transitionFailure<T>(operation: string, status: string, value: unknown, reply: unknown): TaskTransitionResult<T> {
  if (status === 'not_found') return { status: 'not_found' };
  if (status === 'invalid_state') return { status: 'invalid_state', actual: toText(operation, value) };
  throw unexpectedReply(operation, reply);
}
