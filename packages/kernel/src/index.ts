/**
 * @package @tessellate/kernel
 * Multi-tenant caching and task-queue infrastructure over a shared key store.
 *
 * Architecture:
 * ```
 * Kernel
 *   ├── KeyStoreClient (Redis or in-memory, atomic scripts)
 *   ├── CircuitBreaker + withRetry (guard every store call)
 *   ├── TenantAccessor (tenant key namespacing)
 *   ├── TenantCache / SessionStore / ProgressTracker / UsageCounter
 *   ├── RateLimiter (sliding window, token bucket, fixed window)
 *   ├── TaskQueueManager / DeadLetterStore / QueueWorker
 *   └── KernelHealth + MaintenanceScheduler
 * ```
 *
 * Usage:
 * ```typescript
 * const kernel = createKernel(loadKernelConfig());
 * await kernel.start();
 * await kernel.cache.set('acme', 'report:42', report, { tags: ['reports'] });
 * await kernel.queue.enqueue('acme', 'exports', { reportId: 42 });
 * await kernel.shutdown();
 * ```
 */

export { Kernel, createKernel, type KernelDependencies, type WorkerOptions } from './kernel';

// Configuration
export {
  loadKernelConfig,
  KernelConfigSchema,
  SCOPE_PATTERN,
  type KernelConfig,
  type KernelConfigInput,
  type StoreConfig,
  type BreakerConfig,
  type RetryConfig,
  type BackoffPolicy,
  type TenancyConfig,
  type RateLimitPolicy,
  type RateLimitConfig,
  type QueueDefinition,
  type QueuesConfig,
  type EnvSource,
} from './config/kernel-config';

// Errors
export {
  KernelError,
  ConnectionError,
  TimeoutError,
  ScopeRequiredError,
  CircuitOpenError,
  PoolExhaustedError,
  QueueFullError,
  RateLimitExceededError,
  TaskNotFoundError,
  InvalidTaskStateError,
  ValidationError,
  ConfigurationError,
  StoreCommandError,
  isTransientStoreError,
  isStoreOutage,
  isStoreUnavailable,
  toKernelError,
  type KernelErrorCode,
} from './errors/kernel-errors';
export { ok, err } from './errors/result';

// Observability
export { StructuredLogger, createLogger, LogLevel, type LogEntry, type LoggerOptions } from './observability/structured-logger';
export {
  NoopMetrics,
  InMemoryMetrics,
  type MetricsSink,
  type MetricTags,
  type MetricsSnapshot,
  type TimingSummary,
} from './observability/metrics';
export { systemClock, sleep, type Clock } from './utils/time';

// Store
export { RedisKeyStore, type RedisKeyStoreOptions } from './store/redis-key-store';
export { MemoryKeyStore, type MemoryKeyStoreOptions } from './store/memory-key-store';
export { ConnectionPool, type ConnectionPoolOptions, type ConnectionPoolStats } from './store/connection-pool';
export type { KeyStoreClient, RangeOptions, TaskLease } from './store/key-store';

// Resilience
export { CircuitBreaker, CircuitState, type CircuitBreakerOptions } from './resilience/circuit-breaker';
export { withRetry, computeBackoffDelay, type RetryOptions, type BackoffSettings } from './resilience/retry';

// Tenancy
export { TenantAccessor, type TenantAccessorOptions, type ScopeInput } from './tenancy/tenant-accessor';
export { isValidScope, tenantPrefix, TENANT_KEY_PREFIX } from './tenancy/tenant-scope';

// Cache
export { TenantCache, type TenantCacheOptions, type CacheReadOptions } from './cache/tenant-cache';
export { SessionStore, type SessionStoreOptions, type CreateSessionOptions } from './cache/session-store';
export {
  ProgressTracker,
  type ProgressTrackerOptions,
  type StartProgressOptions,
  type ProgressUpdate,
} from './cache/progress-tracker';
export { UsageCounter, WINDOW_MS, type UsageCounterOptions, type UsageWindow } from './cache/usage-counter';

// Rate limiting
export {
  RateLimiter,
  SCOPE_ORDER,
  type RateLimiterOptions,
  type RateLimitRequest,
  type RateLimitSubjects,
  type CheckAllOptions,
  type CombinedDecision,
} from './rate-limiting/rate-limiter';

// Task queue
export { TASK_TYPES, isTaskType } from './queue/queue-config';
export {
  TaskQueueManager,
  type TaskQueueManagerOptions,
  type EnqueueOptions,
  type QueueCounters,
  type DetailedQueueStats,
} from './queue/task-queue-manager';
export {
  DeadLetterStore,
  DEAD_LETTER_MAX_AGE_MS,
  type DeadLetterStoreOptions,
  type DeadLetterListOptions,
} from './queue/dead-letter-store';
export {
  QueueWorker,
  WorkerStoppedError,
  type QueueWorkerOptions,
  type TaskHandler,
  type TaskContext,
  type WorkerStats,
} from './queue/queue-worker';

// Health & maintenance
export {
  HealthCheckRegistry,
  HealthChecks,
  HealthStatus,
  type HealthCheckResult,
  type AggregatedHealthResult,
  type HealthCheckOptions,
} from './health/health-check';
export { KernelHealth, type KernelHealthOptions } from './health/kernel-health';
export { MaintenanceScheduler, type MaintenanceJob, type JobStatus } from './maintenance/scheduler';
