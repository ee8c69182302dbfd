/**
 * Key-Value Store Contract
 *
 * The kernel talks to its backing store only through this interface.
 * Primitive commands cover plain reads and writes; every multi-step
 * mutation that must not interleave with other clients is a named atomic
 * operation, executed as a single script by the Redis implementation and
 * synchronously by the in-memory one.
 */

// ============================================================
// ATOMIC OPERATION SHAPES
// ============================================================

export interface SlidingWindowRequest {
  key: string;
  nowMs: number;
  windowMs: number;
  limit: number;
  cost: number;
  /** Unique per request; each unit of cost is stored as `${memberId}:${n}` */
  memberId: string;
}

export interface SlidingWindowResult {
  allowed: boolean;
  /** Entries inside the window after this request */
  count: number;
  /** 0 when allowed */
  retryAfterMs: number;
  /** Time until the newest entry leaves the window */
  resetMs: number;
}

export interface TokenBucketRequest {
  key: string;
  nowMs: number;
  capacity: number;
  refillPerSecond: number;
  cost: number;
  ttlMs: number;
}

export interface TokenBucketResult {
  allowed: boolean;
  /** Whole tokens left after this request */
  tokens: number;
  retryAfterMs: number;
  /** Time until the bucket is full again */
  resetMs: number;
}

export interface FixedWindowRequest {
  key: string;
  windowMs: number;
  limit: number;
  cost: number;
}

export interface FixedWindowResult {
  allowed: boolean;
  count: number;
  /** Remaining lifetime of the current window */
  resetMs: number;
}

export interface VersionedWriteRequest {
  key: string;
  fields: Record<string, string>;
  nowMs: number;
  ttlMs: number;
}

/** Key layout of one task type's queue. */
export interface QueueKeys {
  /** Ready tasks, score = priority * PRIORITY_SCORE_FACTOR + sequence */
  pending: string;
  /** Tasks waiting for availableAt, score = availableAt */
  delayed: string;
  /** Claimed tasks, score = processing deadline */
  processing: string;
  /** Monotonic enqueue counter */
  sequence: string;
  /** Counters hash */
  stats: string;
  /** Prefix of task hashes; `${taskPrefix}${taskId}` */
  taskPrefix: string;
}

/** Keeps FIFO order inside a priority level and strict order across levels. */
export const PRIORITY_SCORE_FACTOR = 1e12;

export interface EnqueueTaskRequest {
  keys: QueueKeys;
  taskId: string;
  fields: Record<string, string>;
  priority: number;
  availableAt: number;
  nowMs: number;
  maxSize: number;
  tenantKey: string;
  tenantLimit: number;
}

export type EnqueueTaskResult =
  | { status: 'enqueued'; delayed: boolean }
  | { status: 'queue_full'; size: number }
  | { status: 'tenant_full'; size: number };

export interface ClaimTaskRequest {
  keys: QueueKeys;
  nowMs: number;
  workerId: string;
  processingTimeoutMs: number;
}

export interface ClaimedTask {
  taskId: string;
  fields: Record<string, string>;
}

/**
 * Identifies one claim of a task. Complete and fail only apply while the
 * stored owner and attempt still match; a settled lease is remembered so
 * the same call can be repeated safely.
 */
export interface TaskLease {
  workerId: string;
  attempt: number;
}

export interface CompleteTaskRequest {
  keys: QueueKeys;
  taskId: string;
  lease: TaskLease;
  tenantKey: string;
  fields: Record<string, string>;
  retentionMs: number;
}

export interface FailTaskRequest {
  keys: QueueKeys;
  taskId: string;
  lease: TaskLease;
  tenantKey: string;
  nowMs: number;
  error: string;
  /** When a retry is still allowed, the time it becomes available */
  retryAt: number;
  deadLetterKey: string;
  deadLetterIndex: string;
  retentionMs: number;
}

export type TaskTransitionResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'not_found' }
  | { status: 'invalid_state'; actual: string };

export type FailTaskOutcome =
  | { kind: 'retry'; attempts: number }
  | { kind: 'dead_lettered'; attempts: number };

export type ProgressChange =
  | { kind: 'increment'; steps: number }
  | { kind: 'set'; completedSteps?: number; totalSteps?: number }
  | { kind: 'complete' }
  | { kind: 'fail'; error: string };

export interface ProgressMutationRequest {
  key: string;
  change: ProgressChange;
  message?: string;
  nowMs: number;
  /** Expiry while the record is still in progress */
  activeTtlMs: number;
  /** Expiry once completed or failed */
  terminalTtlMs: number;
}

export type ProgressMutationResult =
  | { status: 'ok'; fields: Record<string, string> }
  | { status: 'not_found' }
  | { status: 'terminal'; actual: string };

export interface PromoteRequest {
  keys: QueueKeys;
  nowMs: number;
  limit: number;
}

export interface RangeOptions {
  offset?: number;
  count?: number;
}

// ============================================================
// CLIENT CONTRACT
// ============================================================

export interface KeyStoreClient {
  ping(): Promise<void>;

  get(key: string): Promise<string | null>;
  /** ttlMs omitted or 0 means no expiry */
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  /** Overwrite only an existing key (SET XX); false when the key is gone */
  setIfExists(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Number of keys removed */
  del(...keys: string[]): Promise<number>;
  exists(key: string): Promise<boolean>;
  /** False when the key does not exist */
  expire(key: string, ttlMs: number): Promise<boolean>;
  /** Remaining lifetime in ms, -1 without expiry, -2 when missing */
  pttl(key: string): Promise<number>;
  incr(key: string): Promise<number>;
  /** Every key matching a glob pattern (`*` and `?`) */
  scan(pattern: string): Promise<string[]>;

  hset(key: string, fields: Record<string, string>): Promise<void>;
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hincrby(key: string, field: string, by: number): Promise<number>;

  sadd(key: string, ...members: string[]): Promise<number>;
  srem(key: string, ...members: string[]): Promise<number>;
  smembers(key: string): Promise<string[]>;
  sismember(key: string, member: string): Promise<boolean>;

  zadd(key: string, score: number, member: string): Promise<void>;
  zrem(key: string, ...members: string[]): Promise<number>;
  zcard(key: string): Promise<number>;
  zcount(key: string, min: number, max: number): Promise<number>;
  /** Members with min <= score <= max in ascending score order */
  zrangeByScore(key: string, min: number, max: number, options?: RangeOptions): Promise<string[]>;
  /** Members by rank, ascending, or descending when `reverse` is set */
  zrange(key: string, start: number, stop: number, reverse?: boolean): Promise<string[]>;

  slidingWindowHit(request: SlidingWindowRequest): Promise<SlidingWindowResult>;
  tokenBucketTake(request: TokenBucketRequest): Promise<TokenBucketResult>;
  fixedWindowHit(request: FixedWindowRequest): Promise<FixedWindowResult>;
  /** Writes fields, bumps `version`, keeps the first `createdAt`; returns the new version */
  versionedWrite(request: VersionedWriteRequest): Promise<number>;
  /** Applies one change to an in-progress record, clamped to totalSteps */
  mutateProgress(request: ProgressMutationRequest): Promise<ProgressMutationResult>;

  /** A no-op reporting success when the task already exists and is not dead-lettered */
  enqueueTask(request: EnqueueTaskRequest): Promise<EnqueueTaskResult>;
  claimTask(request: ClaimTaskRequest): Promise<ClaimedTask | null>;
  completeTask(request: CompleteTaskRequest): Promise<TaskTransitionResult<Record<string, string>>>;
  failTask(request: FailTaskRequest): Promise<TaskTransitionResult<FailTaskOutcome>>;
  /** Moves due delayed tasks to pending; returns how many moved */
  promoteDueTasks(request: PromoteRequest): Promise<number>;

  close(): Promise<void>;
}
