/**
 * Kernel Configuration
 *
 * Every component takes its settings from one validated, deep-frozen
 * KernelConfig. Values come from schema defaults, then environment
 * variables, then explicit overrides.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/kernel-errors';

// ============================================================
// VALIDATION SCHEMAS
// ============================================================

const positiveInt = () => z.number().int().positive();

/** Tenant and subject identifiers: 1-64 chars of letters, digits, '_' or '-' */
export const SCOPE_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export const StoreConfigSchema = z.object({
  url: z.string().url('KV_URL must be a redis:// or rediss:// URL').default('redis://localhost:6379'),
  maxConnections: positiveInt().max(1000).default(20),
  connectTimeoutMs: positiveInt().default(5_000),
  operationTimeoutMs: positiveInt().default(5_000),
  acquireTimeoutMs: positiveInt().default(1_000),
  maxWaiters: z.number().int().min(0).default(100),
});

export const BreakerConfigSchema = z.object({
  failureThreshold: positiveInt().default(5),
  recoveryTimeoutMs: positiveInt().default(60_000),
  successThreshold: positiveInt().default(3),
  halfOpenMaxCalls: positiveInt().default(1),
  callTimeoutMs: positiveInt().default(10_000),
});

export const BackoffPolicySchema = z.object({
  baseDelayMs: positiveInt(),
  maxDelayMs: positiveInt(),
  // Above 1/3 consecutive delays could shrink
  jitterRatio: z.number().min(0).max(1 / 3, 'jitterRatio must not exceed 1/3'),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(2),
  baseDelayMs: positiveInt().default(50),
  maxDelayMs: positiveInt().default(1_000),
  jitterRatio: z.number().min(0).max(1 / 3).default(0.25),
});

export const TenancyConfigSchema = z.object({
  strict: z.boolean().default(true),
  fallbackScope: z.string().regex(SCOPE_PATTERN).optional(),
});

export const RateLimitPolicySchema = z.discriminatedUnion('algorithm', [
  z.object({
    algorithm: z.literal('sliding-window'),
    limit: positiveInt(),
    windowMs: positiveInt(),
  }),
  z.object({
    algorithm: z.literal('fixed-window'),
    limit: positiveInt(),
    windowMs: positiveInt(),
  }),
  z.object({
    algorithm: z.literal('token-bucket'),
    capacity: positiveInt(),
    refillPerSecond: z.number().positive(),
  }),
]);

export const RateLimitConfigSchema = z.object({
  ip: RateLimitPolicySchema.default({ algorithm: 'sliding-window', limit: 100, windowMs: 60_000 }),
  user: RateLimitPolicySchema.default({ algorithm: 'sliding-window', limit: 1_000, windowMs: 3_600_000 }),
  tenant: RateLimitPolicySchema.default({ algorithm: 'sliding-window', limit: 5_000, windowMs: 3_600_000 }),
  /** Per-endpoint policies; endpoints without one use the user policy */
  endpoints: z.record(z.string().min(1), RateLimitPolicySchema).default({}),
});

export const QueueDefinitionSchema = z
  .object({
    maxSize: positiveInt(),
    priorityLevels: positiveInt().max(10),
    processingTimeoutMs: positiveInt(),
    maxAttempts: positiveInt().max(10).default(3),
    /** Fraction of maxSize a single tenant may hold */
    tenantShare: z.number().gt(0).max(1).default(0.25),
  });

const queue = (maxSize: number, priorityLevels: number, processingTimeoutMs: number) =>
  QueueDefinitionSchema.default({ maxSize, priorityLevels, processingTimeoutMs });

export const QueuesConfigSchema = z.object({
  'embeddings': queue(1_000, 5, 600_000),
  'background-jobs': queue(500, 5, 1_800_000),
  'exports': queue(200, 3, 1_200_000),
  'notifications': queue(5_000, 2, 30_000),
  'cleanup': queue(100, 2, 600_000),
  'health-checks': queue(50, 1, 60_000),
});

export const KernelConfigSchema = z.object({
  serviceName: z.string().min(1).default('tessellate-kernel'),
  store: StoreConfigSchema.default({}),
  breaker: BreakerConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  tenancy: TenancyConfigSchema.default({}),
  cache: z.object({
    defaultTtlMs: positiveInt().default(3_600_000),
  }).default({}),
  sessions: z.object({
    ttlMs: positiveInt().default(7_200_000),
  }).default({}),
  progress: z.object({
    ttlMs: positiveInt().default(1_800_000),
    /** How long a completed or failed record stays readable */
    terminalGraceMs: positiveInt().default(300_000),
  }).default({}),
  rateLimits: RateLimitConfigSchema.default({}),
  queues: QueuesConfigSchema.default({}),
  backoff: BackoffPolicySchema.default({ baseDelayMs: 1_000, maxDelayMs: 300_000, jitterRatio: 0.25 }),
  maintenance: z.object({
    promoteIntervalMs: positiveInt().default(1_000),
    stallCheckIntervalMs: positiveInt().default(30_000),
    healthIntervalMs: positiveInt().default(30_000),
  }).default({}),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type BreakerConfig = z.infer<typeof BreakerConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type BackoffPolicy = z.infer<typeof BackoffPolicySchema>;
export type TenancyConfig = z.infer<typeof TenancyConfigSchema>;
export type RateLimitPolicy = z.infer<typeof RateLimitPolicySchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type QueueDefinition = z.infer<typeof QueueDefinitionSchema>;
export type QueuesConfig = z.infer<typeof QueuesConfigSchema>;
export type KernelConfig = z.infer<typeof KernelConfigSchema>;
export type KernelConfigInput = z.input<typeof KernelConfigSchema>;

export type EnvSource = Record<string, string | undefined>;

// ============================================================
// LOADING
// ============================================================

/**
 * Build the kernel configuration from environment variables and overrides.
 * Throws ConfigurationError listing every invalid field.
 */
export function loadKernelConfig(env: EnvSource = process.env, overrides: KernelConfigInput = {}): KernelConfig {
  const production = env.NODE_ENV === 'production';

  const input: KernelConfigInput = {
    ...overrides,
    store: {
      url: env.KV_URL,
      maxConnections: readNumber(env.KV_MAX_CONNECTIONS),
      operationTimeoutMs: readNumber(env.KV_OPERATION_TIMEOUT_MS),
      connectTimeoutMs: readNumber(env.KV_CONNECT_TIMEOUT_MS),
      ...overrides.store,
    },
    breaker: {
      failureThreshold: readNumber(env.BREAKER_FAILURE_THRESHOLD),
      recoveryTimeoutMs: readNumber(env.BREAKER_RECOVERY_TIMEOUT_MS),
      successThreshold: readNumber(env.BREAKER_SUCCESS_THRESHOLD),
      callTimeoutMs: readNumber(env.BREAKER_CALL_TIMEOUT_MS),
      ...overrides.breaker,
    },
    tenancy: {
      strict: readBoolean(env.TENANCY_STRICT) ?? production,
      fallbackScope: env.TENANCY_FALLBACK_SCOPE ?? (production ? undefined : 'default'),
      ...overrides.tenancy,
    },
  };

  const parsed = KernelConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid kernel configuration: ${issues.join('; ')}`, issues);
  }

  const config = parsed.data;
  if (!config.tenancy.strict && config.tenancy.fallbackScope === undefined) {
    throw new ConfigurationError('Non-strict tenancy requires a fallbackScope', ['tenancy.fallbackScope: required when strict is false']);
  }
  if (config.backoff.baseDelayMs > config.backoff.maxDelayMs) {
    throw new ConfigurationError('backoff.baseDelayMs exceeds backoff.maxDelayMs', ['backoff.baseDelayMs: must be <= maxDelayMs']);
  }

  return deepFreeze(config);
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is rejected by the schema with the field path attached
  return Number(value);
}

function readBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalised = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalised)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalised)) return false;
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
