/**
 * In-process KeyStoreClient.
 *
 * Mirrors the Redis data model (strings, hashes, sets, sorted sets, ms
 * expiry) closely enough that the kernel behaves identically on top of it.
 * Every operation body runs synchronously once started, so the atomic
 * operations cannot interleave. Used by the test suite and by single-process
 * deployments that do not need a shared store.
 */

import { ConnectionError, StoreCommandError } from '../errors/kernel-errors';
import { Clock, systemClock } from '../utils/time';
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
  ProgressMutationRequest,
  ProgressMutationResult,
  PromoteRequest,
  QueueKeys,
  RangeOptions,
  SlidingWindowRequest,
  SlidingWindowResult,
  TaskLease,
  TaskTransitionResult,
  TokenBucketRequest,
  TokenBucketResult,
  VersionedWriteRequest,
} from './key-store';

type StoredValue =
  | { kind: 'string'; value: string }
  | { kind: 'hash'; value: Map<string, string> }
  | { kind: 'set'; value: Set<string> }
  | { kind: 'zset'; value: Map<string, number> };

interface StoredEntry {
  data: StoredValue;
  expiresAt: number | null;
}

export interface MemoryKeyStoreOptions {
  clock?: Clock;
}

const PROMOTE_BATCH = 100;

export class MemoryKeyStore implements KeyStoreClient {
  private entries = new Map<string, StoredEntry>();
  private available: boolean = true;
  private readonly clock: Clock;

  /** Number of operations that reached the store, including failed ones */
  operationCount: number = 0;

  constructor(options: MemoryKeyStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Simulate an outage: while unavailable every operation rejects with
   * ConnectionError.
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Drop all data */
  flush(): void {
    this.entries.clear();
  }

  // ============================================================
  // PRIMITIVES
  // ============================================================

  ping(): Promise<void> {
    return this.run('ping', () => undefined);
  }

  get(key: string): Promise<string | null> {
    return this.run('get', () => this.readString(key));
  }

  set(key: string, value: string, ttlMs?: number): Promise<void> {
    return this.run('set', () => {
      this.entries.set(key, {
        data: { kind: 'string', value },
        expiresAt: ttlMs && ttlMs > 0 ? this.clock() + ttlMs : null,
      });
    });
  }

  setIfExists(key: string, value: string, ttlMs: number): Promise<boolean> {
    return this.run('setIfExists', () => {
      if (!this.live(key)) return false;
      this.entries.set(key, { data: { kind: 'string', value }, expiresAt: this.clock() + ttlMs });
      return true;
    });
  }

  del(...keys: string[]): Promise<number> {
    return this.run('del', () => {
      let removed = 0;
      for (const key of keys) {
        if (this.live(key) && this.entries.delete(key)) removed++;
      }
      return removed;
    });
  }

  exists(key: string): Promise<boolean> {
    return this.run('exists', () => this.live(key) !== undefined);
  }

  expire(key: string, ttlMs: number): Promise<boolean> {
    return this.run('expire', () => this.pexpire(key, ttlMs));
  }

  pttl(key: string): Promise<number> {
    return this.run('pttl', () => this.remainingTtl(key));
  }

  incr(key: string): Promise<number> {
    return this.run('incr', () => this.incrBy(key, 1));
  }

  scan(pattern: string): Promise<string[]> {
    return this.run('scan', () => {
      const matcher = globToRegExp(pattern);
      const keys: string[] = [];
      for (const key of Array.from(this.entries.keys())) {
        if (this.live(key) && matcher.test(key)) keys.push(key);
      }
      return keys;
    });
  }

  hset(key: string, fields: Record<string, string>): Promise<void> {
    return this.run('hset', () => this.writeHash(key, fields));
  }

  hget(key: string, field: string): Promise<string | null> {
    return this.run('hget', () => this.readHash(key)?.get(field) ?? null);
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.run('hgetall', () => this.hashToRecord(key));
  }

  hincrby(key: string, field: string, by: number): Promise<number> {
    return this.run('hincrby', () => this.hashIncrBy(key, field, by));
  }

  sadd(key: string, ...members: string[]): Promise<number> {
    return this.run('sadd', () => {
      const set = this.readSet(key) ?? this.create(key, { kind: 'set', value: new Set<string>() }).value;
      let added = 0;
      for (const member of members) {
        if (!set.has(member)) {
          set.add(member);
          added++;
        }
      }
      return added;
    });
  }

  srem(key: string, ...members: string[]): Promise<number> {
    return this.run('srem', () => {
      const set = this.readSet(key);
      if (!set) return 0;
      let removed = 0;
      for (const member of members) {
        if (set.delete(member)) removed++;
      }
      this.dropIfEmpty(key, set.size);
      return removed;
    });
  }

  smembers(key: string): Promise<string[]> {
    return this.run('smembers', () => Array.from(this.readSet(key) ?? []));
  }

  sismember(key: string, member: string): Promise<boolean> {
    return this.run('sismember', () => this.readSet(key)?.has(member) ?? false);
  }

  zadd(key: string, score: number, member: string): Promise<void> {
    return this.run('zadd', () => this.zsetAdd(key, score, member));
  }

  zrem(key: string, ...members: string[]): Promise<number> {
    return this.run('zrem', () => this.zsetRemove(key, members));
  }

  zcard(key: string): Promise<number> {
    return this.run('zcard', () => this.readZset(key)?.size ?? 0);
  }

  zcount(key: string, min: number, max: number): Promise<number> {
    return this.run('zcount', () => this.sortedByScore(key).filter(([, score]) => score >= min && score <= max).length);
  }

  zrangeByScore(key: string, min: number, max: number, options: RangeOptions = {}): Promise<string[]> {
    return this.run('zrangeByScore', () => this.rangeByScore(key, min, max, options));
  }

  zrange(key: string, start: number, stop: number, reverse: boolean = false): Promise<string[]> {
    return this.run('zrange', () => {
      const members = this.sortedByScore(key).map(([member]) => member);
      if (reverse) members.reverse();
      const len = members.length;
      const from = start < 0 ? Math.max(0, len + start) : start;
      const to = stop < 0 ? len + stop : Math.min(stop, len - 1);
      return from > to ? [] : members.slice(from, to + 1);
    });
  }

  // ============================================================
  // ATOMIC OPERATIONS
  // ============================================================

  slidingWindowHit(request: SlidingWindowRequest): Promise<SlidingWindowResult> {
    return this.run('slidingWindowHit', () => {
      const { key, nowMs, windowMs, limit, cost, memberId } = request;
      const zset = this.readZset(key);
      if (zset) {
        for (const [member, score] of Array.from(zset)) {
          if (score <= nowMs - windowMs) zset.delete(member);
        }
        this.dropIfEmpty(key, zset.size);
      }

      const entries = this.sortedByScore(key);
      const current = entries.length;

      if (current + cost > limit) {
        const idx = current + cost - limit - 1;
        const needed = idx < current ? entries[idx] : undefined;
        const newest = entries[current - 1];
        return {
          allowed: false,
          count: current,
          retryAfterMs: needed ? needed[1] + windowMs - nowMs : windowMs,
          resetMs: newest ? newest[1] + windowMs - nowMs : windowMs,
        };
      }

      for (let i = 1; i <= cost; i++) {
        this.zsetAdd(key, nowMs, `${memberId}:${i}`);
      }
      this.pexpire(key, windowMs);
      return { allowed: true, count: current + cost, retryAfterMs: 0, resetMs: windowMs };
    });
  }

  tokenBucketTake(request: TokenBucketRequest): Promise<TokenBucketResult> {
    return this.run('tokenBucketTake', () => {
      const { key, nowMs, capacity, refillPerSecond, cost, ttlMs } = request;
      const rate = refillPerSecond / 1000;
      const hash = this.readHash(key);
      const storedTokens = parseNumber(hash?.get('tokens'));
      const storedLast = parseNumber(hash?.get('last_refill'));

      let tokens = capacity;
      let last = nowMs;
      if (storedTokens !== null && storedLast !== null) {
        tokens = storedTokens;
        last = storedLast;
      }
      tokens = Math.min(capacity, tokens + Math.max(0, nowMs - last) * rate);

      let allowed = false;
      let retryAfterMs = 0;
      if (tokens >= cost) {
        tokens -= cost;
        allowed = true;
      } else {
        retryAfterMs = Math.ceil((cost - tokens) / rate);
      }

      this.writeHash(key, { tokens: String(tokens), last_refill: String(nowMs) });
      this.pexpire(key, ttlMs);
      return {
        allowed,
        tokens: Math.floor(tokens),
        retryAfterMs,
        resetMs: Math.ceil((capacity - tokens) / rate),
      };
    });
  }

  fixedWindowHit(request: FixedWindowRequest): Promise<FixedWindowResult> {
    return this.run('fixedWindowHit', () => {
      const { key, windowMs, limit, cost } = request;
      const current = parseNumber(this.readString(key)) ?? 0;
      let ttl = this.remainingTtl(key);

      if (current + cost > limit) {
        return { allowed: false, count: current, resetMs: ttl < 0 ? windowMs : ttl };
      }

      const count = this.incrBy(key, cost);
      if (ttl < 0) {
        this.pexpire(key, windowMs);
        ttl = windowMs;
      }
      return { allowed: true, count, resetMs: ttl };
    });
  }

  versionedWrite(request: VersionedWriteRequest): Promise<number> {
    return this.run('versionedWrite', () => {
      const { key, fields, nowMs, ttlMs } = request;
      const version = this.hashIncrBy(key, 'version', 1);
      const hash = this.readHash(key);
      if (hash && !hash.has('createdAt')) hash.set('createdAt', String(nowMs));
      this.writeHash(key, fields);
      const entry = this.live(key);
      if (entry) entry.expiresAt = ttlMs > 0 ? this.clock() + ttlMs : null;
      return version;
    });
  }

  mutateProgress(request: ProgressMutationRequest): Promise<ProgressMutationResult> {
    return this.run('mutateProgress', (): ProgressMutationResult => {
      const { key, change, message, nowMs, activeTtlMs, terminalTtlMs } = request;
      const hash = this.readHash(key);
      const status = hash?.get('status');
      if (!hash || status === undefined) return { status: 'not_found' };
      if (status !== 'in_progress') return { status: 'terminal', actual: status };

      const stored = parseNumber(hash.get('completedSteps')) ?? 0;
      let total = parseNumber(hash.get('totalSteps')) ?? 0;
      let completed = stored;
      let next = 'in_progress';
      switch (change.kind) {
        case 'increment':
          completed = stored + change.steps;
          break;
        case 'set':
          total = change.totalSteps ?? total;
          completed = change.completedSteps ?? stored;
          break;
        case 'complete':
          completed = total;
          next = 'completed';
          break;
        case 'fail':
          next = 'failed';
          break;
      }

      const fields: Record<string, string> = {
        totalSteps: String(total),
        completedSteps: String(Math.min(total, completed)),
        status: next,
        updatedAt: String(nowMs),
      };
      const lastMessage = change.kind === 'fail' ? change.error : message;
      if (lastMessage !== undefined) fields.lastMessage = lastMessage;
      if (change.kind === 'fail') fields.error = change.error;

      this.writeHash(key, fields);
      this.pexpire(key, next === 'in_progress' ? activeTtlMs : terminalTtlMs);
      return { status: 'ok', fields: this.hashToRecord(key) };
    });
  }

  enqueueTask(request: EnqueueTaskRequest): Promise<EnqueueTaskResult> {
    return this.run('enqueueTask', (): EnqueueTaskResult => {
      const { keys, taskId, fields, priority, availableAt, nowMs, maxSize, tenantKey, tenantLimit } = request;
      const taskKey = `${keys.taskPrefix}${taskId}`;
      const existing = this.readHash(taskKey)?.get('status');
      if (existing !== undefined && existing !== 'dead_lettered') {
        return { status: 'enqueued', delayed: this.readZset(keys.delayed)?.has(taskId) ?? false };
      }

      const size = (this.readZset(keys.pending)?.size ?? 0) + (this.readZset(keys.delayed)?.size ?? 0);
      if (size >= maxSize) {
        return { status: 'queue_full', size };
      }
      const tenantSize = parseNumber(this.readString(tenantKey)) ?? 0;
      if (tenantSize >= tenantLimit) {
        return { status: 'tenant_full', size: tenantSize };
      }

      this.entries.delete(taskKey);
      this.writeHash(taskKey, fields);
      this.incrBy(tenantKey, 1);
      this.hashIncrBy(keys.stats, 'enqueued', 1);

      if (availableAt > nowMs) {
        this.zsetAdd(keys.delayed, availableAt, taskId);
        return { status: 'enqueued', delayed: true };
      }
      const seq = this.incrBy(keys.sequence, 1);
      this.zsetAdd(keys.pending, priority * PRIORITY_SCORE_FACTOR + seq, taskId);
      return { status: 'enqueued', delayed: false };
    });
  }

  claimTask(request: ClaimTaskRequest): Promise<ClaimedTask | null> {
    return this.run('claimTask', () => {
      const { keys, nowMs, workerId, processingTimeoutMs } = request;
      this.promote(keys, nowMs, PROMOTE_BATCH);

      for (;;) {
        const head = this.sortedByScore(keys.pending)[0];
        if (!head) return null;
        const [taskId] = head;
        this.zsetRemove(keys.pending, [taskId]);

        const taskKey = `${keys.taskPrefix}${taskId}`;
        const hash = this.readHash(taskKey);
        if (hash?.get('status') !== 'queued') continue;

        this.writeHash(taskKey, { status: 'in_progress', startedAt: String(nowMs), workerId, settledBy: '', settledAs: '' });
        this.hashIncrBy(taskKey, 'attempts', 1);
        this.zsetAdd(keys.processing, nowMs + processingTimeoutMs, taskId);
        this.hashIncrBy(keys.stats, 'dequeued', 1);
        return { taskId, fields: this.hashToRecord(taskKey) };
      }
    });
  }

  completeTask(request: CompleteTaskRequest): Promise<TaskTransitionResult<Record<string, string>>> {
    return this.run('completeTask', (): TaskTransitionResult<Record<string, string>> => {
      const { keys, taskId, lease, tenantKey, fields, retentionMs } = request;
      const taskKey = `${keys.taskPrefix}${taskId}`;
      const hash = this.readHash(taskKey);
      const status = hash?.get('status');
      if (!hash || status === undefined) return { status: 'not_found' };
      const token = leaseToken(lease);
      if (hash.get('settledBy') === token && hash.get('settledAs') === 'succeeded') {
        return { status: 'ok', value: this.hashToRecord(taskKey) };
      }
      if (!holdsLease(hash, lease)) return { status: 'invalid_state', actual: status };

      this.writeHash(taskKey, { ...fields, status: 'succeeded', settledBy: token, settledAs: 'succeeded' });
      this.zsetRemove(keys.processing, [taskId]);
      this.decrementFloor(tenantKey);
      this.hashIncrBy(keys.stats, 'completed', 1);
      this.pexpire(taskKey, retentionMs);
      return { status: 'ok', value: this.hashToRecord(taskKey) };
    });
  }

  failTask(request: FailTaskRequest): Promise<TaskTransitionResult<FailTaskOutcome>> {
    return this.run('failTask', (): TaskTransitionResult<FailTaskOutcome> => {
      const { keys, taskId, lease, tenantKey, nowMs, error, retryAt, deadLetterKey, deadLetterIndex, retentionMs } = request;
      const taskKey = `${keys.taskPrefix}${taskId}`;
      const hash = this.readHash(taskKey);
      const status = hash?.get('status');
      if (!hash || status === undefined) return { status: 'not_found' };
      const token = leaseToken(lease);
      if (hash.get('settledBy') === token) {
        const settledAs = hash.get('settledAs');
        if (settledAs === 'retry' || settledAs === 'dead_lettered') {
          return { status: 'ok', value: { kind: settledAs, attempts: lease.attempt } };
        }
      }
      if (!holdsLease(hash, lease)) return { status: 'invalid_state', actual: status };

      const attempts = parseNumber(hash.get('attempts')) ?? 0;
      const maxAttempts = parseNumber(hash.get('maxAttempts')) ?? 1;
      this.zsetRemove(keys.processing, [taskId]);
      this.hashIncrBy(keys.stats, 'failed', 1);

      if (attempts < maxAttempts) {
        this.writeHash(taskKey, {
          status: 'queued',
          lastError: error,
          availableAt: String(retryAt),
          workerId: '',
          settledBy: token,
          settledAs: 'retry',
        });
        this.zsetAdd(keys.delayed, retryAt, taskId);
        this.hashIncrBy(keys.stats, 'retried', 1);
        return { status: 'ok', value: { kind: 'retry', attempts } };
      }

      this.writeHash(taskKey, {
        status: 'dead_lettered',
        lastError: error,
        completedAt: String(nowMs),
        workerId: '',
        settledBy: token,
        settledAs: 'dead_lettered',
      });
      this.entries.delete(deadLetterKey);
      this.writeHash(deadLetterKey, { ...this.hashToRecord(taskKey), reason: error, failedAt: String(nowMs) });
      this.zsetAdd(deadLetterIndex, nowMs, taskId);
      this.decrementFloor(tenantKey);
      this.hashIncrBy(keys.stats, 'dead_lettered', 1);
      this.pexpire(taskKey, retentionMs);
      return { status: 'ok', value: { kind: 'dead_lettered', attempts } };
    });
  }

  promoteDueTasks(request: PromoteRequest): Promise<number> {
    return this.run('promoteDueTasks', () => this.promote(request.keys, request.nowMs, request.limit));
  }

  close(): Promise<void> {
    return Promise.resolve();
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private async run<T>(operation: string, fn: () => T): Promise<T> {
    this.operationCount++;
    if (!this.available) {
      throw new ConnectionError(`Store operation '${operation}' failed: store unavailable`, { operation });
    }
    return fn();
  }

  private promote(keys: QueueKeys, nowMs: number, limit: number): number {
    const due = this.rangeByScore(keys.delayed, Number.NEGATIVE_INFINITY, nowMs, { count: limit });
    let promoted = 0;
    for (const taskId of due) {
      this.zsetRemove(keys.delayed, [taskId]);
      const priority = parseNumber(this.readHash(`${keys.taskPrefix}${taskId}`)?.get('priority'));
      if (priority === null) continue;
      const seq = this.incrBy(keys.sequence, 1);
      this.zsetAdd(keys.pending, priority * PRIORITY_SCORE_FACTOR + seq, taskId);
      promoted++;
    }
    return promoted;
  }

  /** The entry if present and not expired; expired entries are evicted */
  private live(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private create<V extends StoredValue>(key: string, data: V): V {
    this.entries.set(key, { data, expiresAt: null });
    return data;
  }

  private wrongType(key: string, expected: StoredValue['kind']): never {
    throw new StoreCommandError('typecheck', new Error(`WRONGTYPE key '${key}' does not hold a ${expected}`));
  }

  private readString(key: string): string | null {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.data.kind !== 'string') return this.wrongType(key, 'string');
    return entry.data.value;
  }

  private readHash(key: string): Map<string, string> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    if (entry.data.kind !== 'hash') return this.wrongType(key, 'hash');
    return entry.data.value;
  }

  private readSet(key: string): Set<string> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    if (entry.data.kind !== 'set') return this.wrongType(key, 'set');
    return entry.data.value;
  }

  private readZset(key: string): Map<string, number> | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;
    if (entry.data.kind !== 'zset') return this.wrongType(key, 'zset');
    return entry.data.value;
  }

  private writeHash(key: string, fields: Record<string, string>): void {
    const hash = this.readHash(key) ?? this.create(key, { kind: 'hash', value: new Map<string, string>() }).value;
    for (const [field, value] of Object.entries(fields)) {
      hash.set(field, value);
    }
  }

  private hashToRecord(key: string): Record<string, string> {
    return Object.fromEntries(this.readHash(key) ?? []);
  }

  private hashIncrBy(key: string, field: string, by: number): number {
    const hash = this.readHash(key) ?? this.create(key, { kind: 'hash', value: new Map<string, string>() }).value;
    const next = (parseNumber(hash.get(field)) ?? 0) + by;
    hash.set(field, String(next));
    return next;
  }

  private incrBy(key: string, by: number): number {
    const entry = this.live(key);
    const current = parseNumber(this.readString(key)) ?? 0;
    const next = current + by;
    this.entries.set(key, { data: { kind: 'string', value: String(next) }, expiresAt: entry?.expiresAt ?? null });
    return next;
  }

  private decrementFloor(key: string): void {
    if ((parseNumber(this.readString(key)) ?? 0) > 0) this.incrBy(key, -1);
  }

  private zsetAdd(key: string, score: number, member: string): void {
    const zset = this.readZset(key) ?? this.create(key, { kind: 'zset', value: new Map<string, number>() }).value;
    zset.set(member, score);
  }

  private zsetRemove(key: string, members: string[]): number {
    const zset = this.readZset(key);
    if (!zset) return 0;
    let removed = 0;
    for (const member of members) {
      if (zset.delete(member)) removed++;
    }
    this.dropIfEmpty(key, zset.size);
    return removed;
  }

  /** Ascending by score, ties broken by member like Redis */
  private sortedByScore(key: string): Array<[string, number]> {
    const zset = this.readZset(key);
    if (!zset) return [];
    return Array.from(zset).sort((a, b) => a[1] - b[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }

  private rangeByScore(key: string, min: number, max: number, options: RangeOptions): string[] {
    const inRange = this.sortedByScore(key)
      .filter(([, score]) => score >= min && score <= max)
      .map(([member]) => member);
    const offset = options.offset ?? 0;
    return options.count === undefined ? inRange.slice(offset) : inRange.slice(offset, offset + options.count);
  }

  private pexpire(key: string, ttlMs: number): boolean {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.clock() + ttlMs;
    return true;
  }

  private remainingTtl(key: string): number {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return entry.expiresAt - this.clock();
  }

  private dropIfEmpty(key: string, size: number): void {
    if (size === 0) this.entries.delete(key);
  }
}

function leaseToken(lease: TaskLease): string {
  return `${lease.workerId}:${lease.attempt}`;
}

function holdsLease(hash: Map<string, string>, lease: TaskLease): boolean {
  return (
    hash.get('status') === 'in_progress' &&
    hash.get('workerId') === lease.workerId &&
    hash.get('attempts') === String(lease.attempt)
  );
}

function parseNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(char => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[\\^$.|+()[\]{}]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}
