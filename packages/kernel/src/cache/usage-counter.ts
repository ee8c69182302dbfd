/**
 * Usage Counter
 *
 * Per-tenant fixed-window counters (API calls, tokens spent, exports run).
 * A window opens on its first increment and closes when the key expires.
 */

import type { RateLimitWindow, RateLimitWindowKind, TenantScope } from '@tessellate/types';
import { ValidationError } from '../errors/kernel-errors';
import { ScopeInput, TenantAccessor } from '../tenancy/tenant-accessor';
import { Clock, systemClock } from '../utils/time';

export interface UsageCounterOptions {
  accessor: TenantAccessor;
  clock?: Clock;
}

/** A named window or a custom length in milliseconds */
export type UsageWindow = RateLimitWindowKind | number;

export const WINDOW_MS: Readonly<Record<RateLimitWindowKind, number>> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

export class UsageCounter {
  private readonly accessor: TenantAccessor;
  private readonly clock: Clock;

  constructor(options: UsageCounterOptions) {
    this.accessor = options.accessor;
    this.clock = options.clock ?? systemClock;
  }

  async increment(scope: ScopeInput, name: string, window: UsageWindow, by: number = 1): Promise<RateLimitWindow> {
    if (!Number.isInteger(by) || by <= 0) {
      throw new ValidationError('Usage increment must be a positive integer', { by });
    }
    const tenant = this.accessor.resolveScope(scope, 'usage.increment');
    const windowMs = toWindowMs(window);
    const key = this.key(tenant, name, window);

    const hit = await this.accessor.execute('usage.increment', store =>
      store.fixedWindowHit({ key, windowMs, limit: Number.MAX_SAFE_INTEGER, cost: by })
    );
    return this.describe(tenant, name, window, hit.count, hit.resetMs);
  }

  /**
   * Current window, or null when no window is open
   */
  async get(scope: ScopeInput, name: string, window: UsageWindow): Promise<RateLimitWindow | null> {
    const tenant = this.accessor.resolveScope(scope, 'usage.get');
    const key = this.key(tenant, name, window);

    const found = await this.accessor.execute('usage.get', async store => {
      const raw = await store.get(key);
      return raw === null ? null : { count: Number(raw), ttl: await store.pttl(key) };
    });
    if (found === null || found.ttl === -2) return null;
    return this.describe(tenant, name, window, found.count, found.ttl < 0 ? toWindowMs(window) : found.ttl);
  }

  async reset(scope: ScopeInput, name: string, window: UsageWindow): Promise<boolean> {
    const tenant = this.accessor.resolveScope(scope, 'usage.reset');
    const key = this.key(tenant, name, window);
    return (await this.accessor.execute('usage.reset', store => store.del(key))) > 0;
  }

  private describe(scope: TenantScope, name: string, window: UsageWindow, count: number, resetMs: number): RateLimitWindow {
    const now = this.clock();
    const windowMs = toWindowMs(window);
    return {
      identifier: `${scope}:${name}`,
      windowKind: typeof window === 'number' ? `${window}ms` : window,
      count,
      windowStart: now + resetMs - windowMs,
      resetAt: now + resetMs,
    };
  }

  private key(scope: TenantScope, name: string, window: UsageWindow): string {
    if (name === '') throw new ValidationError('Usage counter name must not be empty');
    return this.accessor.keyFor(scope, `usage:${name}:${windowLabel(window)}`, 'usage');
  }
}

export function toWindowMs(window: UsageWindow): number {
  if (typeof window !== 'number') return WINDOW_MS[window];
  if (!Number.isInteger(window) || window <= 0) {
    throw new ValidationError('Window length must be a positive integer of milliseconds', { window });
  }
  return window;
}

function windowLabel(window: UsageWindow): string {
  return typeof window === 'number' ? `${window}ms` : window;
}
