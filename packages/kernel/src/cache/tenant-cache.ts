/**
 * Tenant Cache
 *
 * Typed, versioned cache entries stored as hashes under
 * `tenant:{scope}:cache:{key}`, with a per-tenant tag index
 * (`tenant:{scope}:cache-tag:{tag}`) for group invalidation.
 *
 * Reads treat an unavailable store as a miss; writes and invalidations
 * surface every error.
 */

import type { CacheEntry, CacheWriteOptions, Result, TenantScope } from '@tessellate/types';
import type { ZodType } from 'zod';
import { KernelError, ValidationError, isStoreUnavailable, toKernelError } from '../errors/kernel-errors';
import { err, ok } from '../errors/result';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { ScopeInput, TenantAccessor } from '../tenancy/tenant-accessor';
import { Clock, systemClock } from '../utils/time';

export interface TenantCacheOptions {
  accessor: TenantAccessor;
  defaultTtlMs: number;
  logger: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
}

export interface CacheReadOptions<T> {
  /** Validates the stored payload; a mismatch is treated as a miss */
  schema?: ZodType<T>;
}

const MAX_TTL_MS = 365 * 24 * 60 * 60 * 1000;
const ENTRY_PREFIX = 'cache:';
const TAG_PREFIX = 'cache-tag:';

export class TenantCache {
  private readonly accessor: TenantAccessor;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsSink;
  private readonly clock: Clock;

  constructor(private readonly options: TenantCacheOptions) {
    this.accessor = options.accessor;
    this.logger = options.logger.child({ component: 'tenant-cache' });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Write an entry. Each write bumps the entry version; createdAt is kept
   * from the first write while the entry lives.
   */
  async set<T>(scope: ScopeInput, key: string, value: T, options: CacheWriteOptions = {}): Promise<CacheEntry<T>> {
    const tenant = this.accessor.resolveScope(scope, 'cache.set');
    const entryKey = this.entryKey(tenant, key);
    const ttlMs = options.ttlMs ?? this.options.defaultTtlMs;
    const tags = Array.from(new Set(options.tags ?? []));

    if (!Number.isInteger(ttlMs) || ttlMs <= 0 || ttlMs > MAX_TTL_MS) {
      throw new ValidationError('Cache TTL must be a positive integer of at most one year', { ttlMs });
    }
    if (tags.some(tag => tag === '')) {
      throw new ValidationError('Cache tags must not be empty', { key });
    }
    const payload = JSON.stringify(value);
    if (payload === undefined) {
      throw new ValidationError('Cache value is not JSON serialisable', { key });
    }

    const now = this.clock();
    const previousTags = parseTags(await this.accessor.execute('cache.set', store => store.hget(entryKey, 'tags')));

    const version = await this.accessor.execute('cache.set', store =>
      store.versionedWrite({
        key: entryKey,
        nowMs: now,
        ttlMs,
        fields: {
          payload,
          lastAccessedAt: String(now),
          ttlMs: String(ttlMs),
          tags: JSON.stringify(tags),
        },
      })
    );

    await this.accessor.execute('cache.set', async store => {
      for (const tag of previousTags.filter(t => !tags.includes(t))) {
        await store.srem(this.tagKey(tenant, tag), key);
      }
      for (const tag of tags) {
        const tagKey = this.tagKey(tenant, tag);
        await store.sadd(tagKey, key);
        // The index lives as long as its longest-lived entry
        if ((await store.pttl(tagKey)) < ttlMs) {
          await store.expire(tagKey, ttlMs);
        }
      }
    });

    const createdAt = await this.accessor.execute('cache.set', store => store.hget(entryKey, 'createdAt'));
    return {
      scope: tenant,
      key,
      payload: value,
      version,
      createdAt: createdAt === null ? now : Number(createdAt),
      lastAccessedAt: now,
      ttlMs,
      tags,
    };
  }

  /**
   * Read an entry, distinguishing a miss (`ok(null)`) from a store failure
   * (`err`). Scope errors are thrown.
   */
  async lookup<T = unknown>(scope: ScopeInput, key: string, options: CacheReadOptions<T> = {}): Promise<Result<CacheEntry<T> | null, KernelError>> {
    const tenant = this.accessor.resolveScope(scope, 'cache.get');
    const entryKey = this.entryKey(tenant, key);
    const now = this.clock();

    try {
      const fields = await this.accessor.execute('cache.get', async store => {
        const hash = await store.hgetall(entryKey);
        if (hash.payload === undefined) return null;
        const remaining = await store.pttl(entryKey);
        if (remaining > 0) {
          await store.hset(entryKey, { lastAccessedAt: String(now) });
          // Re-arm in case the entry expired between the read and the write
          await store.expire(entryKey, remaining);
        }
        return hash;
      });

      if (fields === null) {
        this.metrics.increment('cache.miss');
        return ok(null);
      }

      const entry = this.decodeEntry(tenant, key, fields, now, options.schema);
      this.metrics.increment(entry ? 'cache.hit' : 'cache.miss');
      return ok(entry);
    } catch (error) {
      return err(toKernelError(error, 'cache.get'));
    }
  }

  /**
   * Entry with metadata, or null on a miss. An unavailable store counts as
   * a miss.
   */
  async getEntry<T = unknown>(scope: ScopeInput, key: string, options: CacheReadOptions<T> = {}): Promise<CacheEntry<T> | null> {
    const result = await this.lookup(scope, key, options);
    if (result.ok) return result.value;
    return this.missOnOutage(result.error, key);
  }

  async get<T = unknown>(scope: ScopeInput, key: string, options: CacheReadOptions<T> = {}): Promise<T | null> {
    const entry = await this.getEntry(scope, key, options);
    return entry ? entry.payload : null;
  }

  /**
   * Cache-aside read. On a miss the factory runs and its value is cached.
   * While the store is unavailable the factory value is returned without
   * being cached.
   */
  async getOrSet<T>(
    scope: ScopeInput,
    key: string,
    factory: () => Promise<T>,
    options: CacheWriteOptions & CacheReadOptions<T> = {}
  ): Promise<T> {
    const result = await this.lookup(scope, key, options);
    if (result.ok && result.value) {
      return result.value.payload;
    }
    if (!result.ok) {
      this.missOnOutage(result.error, key);
      return factory();
    }

    const value = await factory();
    try {
      await this.set(scope, key, value, options);
    } catch (error) {
      if (!isStoreUnavailable(error)) throw error;
      this.metrics.increment('cache.unavailable');
      this.logger.warn('Cache write skipped, store unavailable', { key, reason: describe(error) });
    }
    return value;
  }

  /**
   * Remove one entry and its tag index memberships
   */
  async invalidate(scope: ScopeInput, key: string): Promise<boolean> {
    const tenant = this.accessor.resolveScope(scope, 'cache.invalidate');
    const entryKey = this.entryKey(tenant, key);
    return this.accessor.execute('cache.invalidate', async store => {
      const tags = parseTags(await store.hget(entryKey, 'tags'));
      for (const tag of tags) {
        await store.srem(this.tagKey(tenant, tag), key);
      }
      return (await store.del(entryKey)) > 0;
    });
  }

  /**
   * Remove every entry carrying `tag`; returns how many entries were
   * removed. Repeating the call returns 0.
   */
  async invalidateByTag(scope: ScopeInput, tag: string): Promise<number> {
    const tenant = this.accessor.resolveScope(scope, 'cache.invalidateByTag');
    const tagKey = this.tagKey(tenant, tag);
    const removed = await this.accessor.execute('cache.invalidateByTag', async store => {
      let count = 0;
      // The index can outlive an entry that has since been rewritten without the tag
      for (const key of await store.smembers(tagKey)) {
        const entryKey = this.entryKey(tenant, key);
        if (parseTags(await store.hget(entryKey, 'tags')).includes(tag)) {
          count += await store.del(entryKey);
        }
      }
      await store.del(tagKey);
      return count;
    });
    this.logger.debug('Invalidated cache tag', { scope: tenant, tag, removed });
    return removed;
  }

  /**
   * Drop the whole cache of one tenant; returns how many entries were removed
   */
  async invalidateAll(scope: ScopeInput): Promise<number> {
    const tenant = this.accessor.resolveScope(scope, 'cache.invalidateAll');
    const entries = await this.accessor.scan(tenant, `${ENTRY_PREFIX}*`);
    const tags = await this.accessor.scan(tenant, `${TAG_PREFIX}*`);
    const physical = [...entries, ...tags].map(key => this.accessor.keyFor(tenant, key));
    if (physical.length === 0) return 0;
    await this.accessor.execute('cache.invalidateAll', store => store.del(...physical));
    return entries.length;
  }

  private entryKey(scope: TenantScope, key: string): string {
    return this.accessor.keyFor(scope, `${ENTRY_PREFIX}${key}`, 'cache');
  }

  private tagKey(scope: TenantScope, tag: string): string {
    if (tag === '') throw new ValidationError('Cache tag must not be empty');
    return this.accessor.keyFor(scope, `${TAG_PREFIX}${tag}`, 'cache');
  }

  private decodeEntry<T>(
    scope: TenantScope,
    key: string,
    fields: Record<string, string>,
    now: number,
    schema?: ZodType<T>
  ): CacheEntry<T> | null {
    const payload = decodePayload(fields.payload ?? 'null', schema);
    if (!payload.ok) {
      this.logger.warn('Cached payload failed validation, treating as miss', { scope, key });
      return null;
    }
    return {
      scope,
      key,
      payload: payload.value,
      version: Number(fields.version ?? '1'),
      createdAt: Number(fields.createdAt ?? String(now)),
      lastAccessedAt: now,
      ttlMs: Number(fields.ttlMs ?? '0'),
      tags: parseTags(fields.tags ?? null),
    };
  }

  private missOnOutage(error: KernelError, key: string): null {
    if (!isStoreUnavailable(error)) {
      throw error;
    }
    this.metrics.increment('cache.unavailable');
    this.logger.warn('Cache read failed, treating as miss', { key, code: error.code });
    return null;
  }
}

function decodePayload<T>(raw: string, schema?: ZodType<T>): Result<T, Error> {
  try {
    const value = JSON.parse(raw);
    if (!schema) return ok(value);
    const parsed = schema.safeParse(value);
    return parsed.success ? ok(parsed.data) : err(parsed.error);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

function parseTags(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === 'string') : [];
  } catch {
    return [];
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
