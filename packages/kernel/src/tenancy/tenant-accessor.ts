/**
 * Tenant-Isolated Accessor
 *
 * The single gateway between domain services and the key-value store.
 * It owns key naming, so every tenant-owned key lands under
 * `tenant:{scope}:`, and it runs all store work through retry, then the
 * circuit breaker, then the store.
 */

import type { TenantScope } from '@tessellate/types';
import { RetryConfig, TenancyConfig } from '../config/kernel-config';
import { ScopeRequiredError, ValidationError } from '../errors/kernel-errors';
import { StructuredLogger } from '../observability/structured-logger';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { withRetry } from '../resilience/retry';
import { KeyStoreClient } from '../store/key-store';
import { sleep } from '../utils/time';
import { isMissingScope, isValidScope, tenantPrefix } from './tenant-scope';

export interface TenantAccessorOptions {
  store: KeyStoreClient;
  breaker: CircuitBreaker;
  tenancy: TenancyConfig;
  retry: RetryConfig;
  logger: StructuredLogger;
  /** Jitter source for local retries */
  random?: () => number;
  /** Wait between local retries */
  wait?: (ms: number) => Promise<void>;
}

/** Scope argument as callers may supply it; only non-strict mode accepts a missing one. */
export type ScopeInput = TenantScope | null | undefined;

const UNSAFE_PATTERN_CHARS = /[[\]\\]/;

export class TenantAccessor {
  private readonly store: KeyStoreClient;
  private readonly breaker: CircuitBreaker;
  private readonly logger: StructuredLogger;
  private readonly random: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: TenantAccessorOptions) {
    this.store = options.store;
    this.breaker = options.breaker;
    this.logger = options.logger.child({ component: 'tenant-accessor' });
    this.random = options.random ?? Math.random;
    this.wait = options.wait ?? (ms => sleep(ms));
  }

  get strict(): boolean {
    return this.options.tenancy.strict;
  }

  /**
   * Validate a caller-supplied scope. In strict mode a missing or malformed
   * scope is rejected; in non-strict mode a missing scope falls back to the
   * configured fallback scope.
   */
  resolveScope(scope: ScopeInput, operation: string): TenantScope {
    if (isMissingScope(scope)) {
      const fallback = this.options.tenancy.fallbackScope;
      if (this.options.tenancy.strict || fallback === undefined) {
        throw new ScopeRequiredError(operation);
      }
      this.logger.warn('Tenant scope missing, using fallback scope', { operation, fallbackScope: fallback });
      return fallback;
    }
    if (!isValidScope(scope)) {
      throw new ScopeRequiredError(operation);
    }
    return scope;
  }

  /**
   * Physical key for a tenant-owned logical key: `tenant:{scope}:{key}`
   */
  keyFor(scope: ScopeInput, key: string, operation: string = 'keyFor'): string {
    if (key === '') {
      throw new ValidationError('Key must not be empty', { operation });
    }
    return `${tenantPrefix(this.resolveScope(scope, operation))}${key}`;
  }

  /**
   * Key in one of the explicitly global namespaces (sessions, rate limits, queues)
   */
  globalKey(...parts: Array<string | number>): string {
    if (parts.length === 0 || parts.some(part => part === '')) {
      throw new ValidationError('Global key parts must not be empty', { parts });
    }
    return parts.join(':');
  }

  /**
   * Run store work with bounded local retries for transient errors, each
   * attempt passing through the circuit breaker. An open circuit fails fast
   * without touching the store and is not retried.
   */
  execute<T>(operation: string, fn: (store: KeyStoreClient) => Promise<T>): Promise<T> {
    const { maxRetries, baseDelayMs, maxDelayMs, jitterRatio } = this.options.retry;
    return withRetry(() => this.breaker.execute(() => fn(this.store), operation), {
      maxRetries,
      baseDelayMs,
      maxDelayMs,
      jitterRatio,
      random: this.random,
      wait: this.wait,
      onRetry: (attempt, error, delayMs) =>
        this.logger.debug('Retrying store operation', {
          operation,
          attempt,
          delayMs,
          reason: error instanceof Error ? error.message : String(error),
        }),
    });
  }

  // ============================================================
  // TENANT-SCOPED KEY/VALUE
  // ============================================================

  get(scope: ScopeInput, key: string): Promise<string | null> {
    const physical = this.keyFor(scope, key, 'get');
    return this.execute('get', store => store.get(physical));
  }

  async set(scope: ScopeInput, key: string, value: string, ttlMs?: number): Promise<void> {
    const physical = this.keyFor(scope, key, 'set');
    await this.execute('set', store => store.set(physical, value, ttlMs));
  }

  async delete(scope: ScopeInput, key: string): Promise<boolean> {
    const physical = this.keyFor(scope, key, 'delete');
    return (await this.execute('delete', store => store.del(physical))) > 0;
  }

  exists(scope: ScopeInput, key: string): Promise<boolean> {
    const physical = this.keyFor(scope, key, 'exists');
    return this.execute('exists', store => store.exists(physical));
  }

  /**
   * Logical keys of one tenant matching a glob (`*`, `?`). Character classes
   * and escapes are refused so a pattern cannot reach past the tenant prefix.
   */
  async scan(scope: ScopeInput, pattern: string = '*'): Promise<string[]> {
    if (UNSAFE_PATTERN_CHARS.test(pattern)) {
      throw new ValidationError('Scan pattern may only use * and ? wildcards', { pattern });
    }
    const prefix = tenantPrefix(this.resolveScope(scope, 'scan'));
    const keys = await this.execute('scan', store => store.scan(`${prefix}${pattern}`));
    return keys.filter(key => key.startsWith(prefix)).map(key => key.slice(prefix.length));
  }

  /**
   * Delete every key of one tenant, returning how many were removed
   */
  async deleteAll(scope: ScopeInput): Promise<number> {
    const prefix = tenantPrefix(this.resolveScope(scope, 'deleteAll'));
    const keys = await this.execute('deleteAll', store => store.scan(`${prefix}*`));
    if (keys.length === 0) return 0;
    return this.execute('deleteAll', store => store.del(...keys));
  }
}
