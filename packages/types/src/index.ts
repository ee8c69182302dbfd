/**
 * @package @tessellate/types
 * Shared data model for the tenant-isolated cache, rate limiter and task queue.
 * Every record persisted by the kernel is described here.
 */

// ============================================================
// TENANCY
// ============================================================

/** Opaque tenant identifier. All tenant-owned keys and quotas are partitioned by it. */
export type TenantScope = string;

// ============================================================
// RESULT
// ============================================================

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ============================================================
// CACHE DOMAIN
// ============================================================

export interface CacheEntry<T = unknown> {
  scope: TenantScope;
  key: string;
  payload: T;
  /** Incremented atomically on every write */
  version: number;
  createdAt: number;
  lastAccessedAt: number;
  ttlMs: number;
  tags: string[];
}

export interface CacheWriteOptions {
  ttlMs?: number;
  tags?: string[];
}

export interface Session {
  sessionId: string;
  userId: string;
  tenants: TenantScope[];
  userData: Record<string, unknown>;
  createdAt: number;
  lastActivityAt: number;
  ttlMs: number;
  expiresAt: number;
}

export type ProgressStatus = 'in_progress' | 'completed' | 'failed';

export interface ProgressRecord {
  correlationId: string;
  scope: TenantScope;
  totalSteps: number;
  completedSteps: number;
  lastMessage: string;
  status: ProgressStatus;
  error?: string;
  startedAt: number;
  updatedAt: number;
  /** completedSteps / totalSteps * 100, rounded to two decimals */
  percentage: number;
}

// ============================================================
// RATE LIMITING
// ============================================================

export type RateLimitWindowKind = 'minute' | 'hour' | 'day';

export interface RateLimitWindow {
  identifier: string;
  /** Named window, or a custom length such as `90000ms` */
  windowKind: RateLimitWindowKind | `${number}ms`;
  count: number;
  windowStart: number;
  resetAt: number;
}

export type RateLimitAlgorithm = 'sliding-window' | 'token-bucket' | 'fixed-window';

/** Scopes in the order they are evaluated; the first denial wins. */
export type RateLimitScope = 'ip' | 'user' | 'tenant' | 'endpoint';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** 0 when allowed */
  retryAfterMs: number;
  /** Time until the window (or bucket) is fully replenished */
  resetMs: number;
  scope: RateLimitScope;
  identifier: string;
  algorithm: RateLimitAlgorithm;
  /** True when the limiter could not reach the store and failed open */
  degraded: boolean;
}

// ============================================================
// TASK QUEUE
// ============================================================

export type TaskType =
  | 'embeddings'
  | 'background-jobs'
  | 'exports'
  | 'notifications'
  | 'cleanup'
  | 'health-checks';

export type TaskStatus = 'queued' | 'in_progress' | 'succeeded' | 'failed' | 'dead_lettered';

export interface Task<P = unknown> {
  taskId: string;
  taskType: TaskType;
  scope: TenantScope;
  payload: P;
  /** Lower value = more urgent */
  priority: number;
  attempts: number;
  maxAttempts: number;
  status: TaskStatus;
  enqueuedAt: number;
  /** Earliest time the task may be dequeued (later than enqueuedAt for retries) */
  availableAt: number;
  startedAt: number | null;
  completedAt: number | null;
  lastError: string | null;
  result: unknown;
  workerId: string | null;
  metadata: Record<string, unknown>;
}

export type FailureOutcome =
  | { status: 'retry_scheduled'; task: Task; delayMs: number; availableAt: number }
  | { status: 'dead_lettered'; task: Task };

export interface DeadLetterRecord {
  task: Task;
  reason: string;
  failedAt: number;
  attempts: number;
}

export interface QueueStats {
  taskType: TaskType;
  pending: number;
  delayed: number;
  inFlight: number;
  deadLettered: number;
  maxSize: number;
}

// ============================================================
// RESILIENCE
// ============================================================

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  openedAt: number | null;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rejectedCalls: number;
  timeoutCalls: number;
  circuitOpens: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
}

// ============================================================
// HEALTH
// ============================================================

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
}

export interface KernelHealthReport {
  status: HealthStatus;
  timestamp: number;
  store: { status: HealthStatus; latencyMs: number | null; message?: string };
  breaker: CircuitBreakerSnapshot;
  queues: Partial<Record<TaskType, QueueStats>>;
}
