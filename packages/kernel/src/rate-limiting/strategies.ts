/**
 * Rate Limiting Strategies
 *
 * Each algorithm maps a policy onto one atomic store operation:
 * - Sliding Window: timestamped entries in a sorted set, pruned, counted
 *   and added in a single script
 * - Token Bucket: smooth limiting with burst capacity
 * - Fixed Window: counter that expires with its window
 *
 * `peek` reads the same state without charging anything.
 */

import { RateLimitPolicy } from '../config/kernel-config';
import { ValidationError } from '../errors/kernel-errors';
import { KeyStoreClient } from '../store/key-store';

export interface StrategyOutcome {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfterMs: number;
  resetMs: number;
}

export interface ConsumeRequest {
  key: string;
  nowMs: number;
  cost: number;
  /** Unique per request; used by the sliding window */
  memberId: string;
}

/** Maximum requests (or bucket capacity) a policy admits */
export function policyLimit(policy: RateLimitPolicy): number {
  return policy.algorithm === 'token-bucket' ? policy.capacity : policy.limit;
}

/**
 * Window length in whole seconds, as used in key names. A token bucket's
 * window is the time it takes to refill from empty.
 */
export function windowSeconds(policy: RateLimitPolicy): number {
  if (policy.algorithm === 'token-bucket') {
    return Math.ceil(policy.capacity / policy.refillPerSecond);
  }
  return Math.ceil(policy.windowMs / 1000);
}

/** Time for an empty bucket to fill up; bucket state idles out after it */
function bucketTtlMs(policy: { capacity: number; refillPerSecond: number }): number {
  return Math.max(1000, Math.ceil((policy.capacity / policy.refillPerSecond) * 1000));
}

export function validateCost(policy: RateLimitPolicy, cost: number): void {
  if (!Number.isInteger(cost) || cost <= 0) {
    throw new ValidationError('Rate limit cost must be a positive integer', { cost });
  }
  const limit = policyLimit(policy);
  if (cost > limit) {
    throw new ValidationError(`Rate limit cost ${cost} exceeds the policy limit of ${limit}`, {
      cost,
      limit,
      algorithm: policy.algorithm,
    });
  }
}

export async function consume(store: KeyStoreClient, policy: RateLimitPolicy, request: ConsumeRequest): Promise<StrategyOutcome> {
  switch (policy.algorithm) {
    case 'sliding-window': {
      const hit = await store.slidingWindowHit({
        key: request.key,
        nowMs: request.nowMs,
        windowMs: policy.windowMs,
        limit: policy.limit,
        cost: request.cost,
        memberId: request.memberId,
      });
      return {
        allowed: hit.allowed,
        limit: policy.limit,
        remaining: Math.max(0, policy.limit - hit.count),
        retryAfterMs: hit.allowed ? 0 : Math.max(1, hit.retryAfterMs),
        resetMs: hit.resetMs,
      };
    }

    case 'token-bucket': {
      const take = await store.tokenBucketTake({
        key: request.key,
        nowMs: request.nowMs,
        capacity: policy.capacity,
        refillPerSecond: policy.refillPerSecond,
        cost: request.cost,
        ttlMs: bucketTtlMs(policy),
      });
      return {
        allowed: take.allowed,
        limit: policy.capacity,
        remaining: take.tokens,
        retryAfterMs: take.allowed ? 0 : Math.max(1, take.retryAfterMs),
        resetMs: take.resetMs,
      };
    }

    case 'fixed-window': {
      const hit = await store.fixedWindowHit({
        key: request.key,
        windowMs: policy.windowMs,
        limit: policy.limit,
        cost: request.cost,
      });
      return {
        allowed: hit.allowed,
        limit: policy.limit,
        remaining: Math.max(0, policy.limit - hit.count),
        retryAfterMs: hit.allowed ? 0 : Math.max(1, hit.resetMs),
        resetMs: hit.resetMs,
      };
    }
  }
}

/**
 * Current state for a policy without recording a request. `allowed` tells
 * whether a request of `cost` would pass right now.
 */
export async function peek(store: KeyStoreClient, policy: RateLimitPolicy, key: string, nowMs: number, cost: number = 1): Promise<StrategyOutcome> {
  switch (policy.algorithm) {
    case 'sliding-window': {
      // Members are `${timestamp}:${requestId}:${n}`
      const members = await store.zrangeByScore(key, nowMs - policy.windowMs + 1, Number.POSITIVE_INFINITY);
      const scores = members.map(member => Number(member.split(':')[0])).sort((a, b) => a - b);
      const count = scores.length;
      const allowed = count + cost <= policy.limit;
      const newest = scores[count - 1];
      const needed = scores[count + cost - policy.limit - 1];
      return {
        allowed,
        limit: policy.limit,
        remaining: Math.max(0, policy.limit - count),
        retryAfterMs: allowed ? 0 : needed === undefined ? policy.windowMs : Math.max(1, needed + policy.windowMs - nowMs),
        resetMs: newest === undefined ? 0 : Math.max(0, newest + policy.windowMs - nowMs),
      };
    }

    case 'token-bucket': {
      const state = await store.hgetall(key);
      const rate = policy.refillPerSecond / 1000;
      const stored = Number(state.tokens);
      const last = Number(state.last_refill);
      const tokens = Number.isFinite(stored) && Number.isFinite(last) && state.tokens !== undefined
        ? Math.min(policy.capacity, stored + Math.max(0, nowMs - last) * rate)
        : policy.capacity;
      const allowed = tokens >= cost;
      return {
        allowed,
        limit: policy.capacity,
        remaining: Math.floor(tokens),
        retryAfterMs: allowed ? 0 : Math.ceil((cost - tokens) / rate),
        resetMs: Math.ceil((policy.capacity - tokens) / rate),
      };
    }

    case 'fixed-window': {
      const raw = await store.get(key);
      const count = raw === null ? 0 : Number(raw);
      const ttl = raw === null ? -2 : await store.pttl(key);
      const resetMs = ttl > 0 ? ttl : 0;
      const allowed = count + cost <= policy.limit;
      return {
        allowed,
        limit: policy.limit,
        remaining: Math.max(0, policy.limit - count),
        retryAfterMs: allowed ? 0 : Math.max(1, resetMs),
        resetMs,
      };
    }
  }
}
