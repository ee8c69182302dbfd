/**
 * Kernel Error Taxonomy
 *
 * Every failure surfaced by the kernel is a KernelError subclass with a
 * stable `code`. `retryable` tells callers whether backing off and trying
 * again can succeed; isolation and validation errors never are.
 */

export type KernelErrorCode =
  | 'CONNECTION_ERROR'
  | 'TIMEOUT'
  | 'SCOPE_REQUIRED'
  | 'CIRCUIT_OPEN'
  | 'POOL_EXHAUSTED'
  | 'QUEUE_FULL'
  | 'RATE_LIMIT_EXCEEDED'
  | 'TASK_NOT_FOUND'
  | 'INVALID_TASK_STATE'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'STORE_COMMAND_ERROR';

export class KernelError extends Error {
  constructor(
    message: string,
    public readonly code: KernelErrorCode,
    public readonly retryable: boolean,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'KernelError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/**
 * Backing store unreachable. Counts as a breaker failure.
 */
export class ConnectionError extends KernelError {
  constructor(message: string = 'Key-value store connection failed', details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', true, details, { cause });
    this.name = 'ConnectionError';
  }
}

/**
 * Operation exceeded its time bound. Counts as a breaker failure.
 */
export class TimeoutError extends KernelError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, 'TIMEOUT', true, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

/**
 * A tenant-owned key was addressed without a valid tenant scope.
 */
export class ScopeRequiredError extends KernelError {
  constructor(operation: string, key?: string) {
    super(
      `Tenant scope is required for '${operation}'`,
      'SCOPE_REQUIRED',
      false,
      key !== undefined ? { operation, key } : { operation }
    );
    this.name = 'ScopeRequiredError';
  }
}

export class CircuitOpenError extends KernelError {
  constructor(
    public readonly breakerName: string,
    public readonly retryAfterMs: number
  ) {
    super(
      `Circuit breaker '${breakerName}' is OPEN. Request rejected.`,
      'CIRCUIT_OPEN',
      false,
      { breaker: breakerName, retryAfterMs }
    );
    this.name = 'CircuitOpenError';
  }
}

export class PoolExhaustedError extends KernelError {
  constructor(poolName: string, size: number, waiting: number) {
    super(
      `Connection pool '${poolName}' exhausted: ${size}/${size} in use, ${waiting} waiting`,
      'POOL_EXHAUSTED',
      true,
      { pool: poolName, size, waiting }
    );
    this.name = 'PoolExhaustedError';
  }
}

export class QueueFullError extends KernelError {
  constructor(taskType: string, limit: number, reason: 'queue' | 'tenant' = 'queue') {
    super(
      reason === 'queue'
        ? `Queue '${taskType}' is full (limit ${limit})`
        : `Tenant share of queue '${taskType}' is full (limit ${limit})`,
      'QUEUE_FULL',
      false,
      { taskType, limit, reason }
    );
    this.name = 'QueueFullError';
  }
}

/**
 * Raised only by callers that opt into exceptions (RateLimiter.enforce);
 * a denial is otherwise a normal decision value.
 */
export class RateLimitExceededError extends KernelError {
  constructor(
    public readonly identifier: string,
    public readonly retryAfterMs: number
  ) {
    super(
      `Rate limit exceeded for '${identifier}'. Retry in ${Math.ceil(retryAfterMs / 1000)}s`,
      'RATE_LIMIT_EXCEEDED',
      false,
      { identifier, retryAfterMs }
    );
    this.name = 'RateLimitExceededError';
  }
}

export class TaskNotFoundError extends KernelError {
  constructor(public readonly taskId: string) {
    super(`Task '${taskId}' not found`, 'TASK_NOT_FOUND', false, { taskId });
    this.name = 'TaskNotFoundError';
  }
}

export class InvalidTaskStateError extends KernelError {
  constructor(
    public readonly taskId: string,
    public readonly actual: string,
    public readonly expected: string
  ) {
    super(
      `Task '${taskId}' is '${actual}', expected '${expected}'`,
      'INVALID_TASK_STATE',
      false,
      { taskId, actual, expected }
    );
    this.name = 'InvalidTaskStateError';
  }
}

export class ValidationError extends KernelError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', false, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends KernelError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', false, { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * The store answered but rejected the command (wrong type, script error).
 * Not a connectivity problem, so it never trips the breaker.
 */
export class StoreCommandError extends KernelError {
  constructor(operation: string, cause: Error) {
    super(`Store operation '${operation}' failed: ${cause.message}`, 'STORE_COMMAND_ERROR', false, { operation }, { cause });
    this.name = 'StoreCommandError';
  }
}

// ============================================================
// CLASSIFICATION
// ============================================================

const NETWORK_ERROR_MARKERS = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'Connection is closed',
  'Stream isn\'t writeable',
  'MaxRetriesPerRequestError',
];

/** Errors worth retrying locally: the store may answer on the next attempt. */
export function isTransientStoreError(error: unknown): boolean {
  return (
    error instanceof ConnectionError ||
    error instanceof TimeoutError ||
    error instanceof PoolExhaustedError
  );
}

/**
 * Errors that say something about the store's health. A full local pool
 * is local back-pressure and does not count.
 */
export function isStoreOutage(error: unknown): boolean {
  return error instanceof ConnectionError || error instanceof TimeoutError;
}

/** Errors meaning the store cannot be used right now (fail-open / cache-miss triggers). */
export function isStoreUnavailable(error: unknown): boolean {
  return isTransientStoreError(error) || error instanceof CircuitOpenError;
}

/**
 * Normalise anything thrown by a driver into the taxonomy. Kernel errors
 * pass through untouched.
 */
export function toKernelError(error: unknown, operation: string = 'store', timeoutMs: number = 0): KernelError {
  if (error instanceof KernelError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const haystack = `${err.name} ${err.message} ${readCode(err)}`;

  if (haystack.includes('Command timed out')) {
    return new TimeoutError(operation, timeoutMs);
  }

  if (NETWORK_ERROR_MARKERS.some(marker => haystack.includes(marker))) {
    return new ConnectionError(`Store operation '${operation}' failed: ${err.message}`, { operation }, err);
  }

  return new StoreCommandError(operation, err);
}

function readCode(error: Error): string {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : '';
}
