/**
 * Rate Limiter
 *
 * Distributed limits shared by every process through the key-value store.
 * Scopes are evaluated in a fixed order (ip, user, tenant, endpoint) and
 * the first denial wins. When the store cannot be reached the limiter
 * fails open and marks the decision as degraded.
 */

import type { RateLimitDecision, RateLimitScope, Result } from '@tessellate/types';
import { v4 as uuidv4 } from 'uuid';
import { RateLimitConfig, RateLimitPolicy } from '../config/kernel-config';
import {
  KernelError,
  RateLimitExceededError,
  ValidationError,
  isStoreUnavailable,
  toKernelError,
} from '../errors/kernel-errors';
import { err, ok } from '../errors/result';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { TenantAccessor } from '../tenancy/tenant-accessor';
import { Clock, systemClock } from '../utils/time';
import { StrategyOutcome, consume, peek, policyLimit, validateCost, windowSeconds } from './strategies';

export interface RateLimiterOptions {
  accessor: TenantAccessor;
  policies: RateLimitConfig;
  logger: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
}

export interface RateLimitRequest {
  scope: RateLimitScope;
  identifier: string;
  /** Overrides the configured policy for this scope */
  policy?: RateLimitPolicy;
  cost?: number;
}

/** Identifiers of one request, one per scope that applies */
export interface RateLimitSubjects {
  ip?: string;
  user?: string;
  tenant?: string;
  endpoint?: string;
}

export interface CheckAllOptions {
  cost?: number;
  policies?: Partial<Record<RateLimitScope, RateLimitPolicy>>;
}

export interface CombinedDecision {
  allowed: boolean;
  /** Decisions in evaluation order, up to and including the first denial */
  decisions: RateLimitDecision[];
  denied: RateLimitDecision | null;
}

export const SCOPE_ORDER: readonly RateLimitScope[] = ['ip', 'user', 'tenant', 'endpoint'];

export class RateLimiter {
  private readonly accessor: TenantAccessor;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsSink;
  private readonly clock: Clock;

  constructor(private readonly options: RateLimiterOptions) {
    this.accessor = options.accessor;
    this.logger = options.logger.child({ component: 'rate-limiter' });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Charge one request against its scope. Store failures come back as
   * `err`; validation failures are thrown.
   */
  async evaluate(request: RateLimitRequest): Promise<Result<RateLimitDecision, KernelError>> {
    const policy = this.policyFor(request);
    const cost = request.cost ?? 1;
    validateCost(policy, cost);
    const key = this.key(request.scope, request.identifier, policy);
    const now = this.clock();

    try {
      const outcome = await this.accessor.execute('ratelimit.check', store =>
        consume(store, policy, { key, nowMs: now, cost, memberId: `${now}:${uuidv4()}` })
      );
      const decision = this.decide(request, policy, outcome);
      this.metrics.increment(decision.allowed ? 'ratelimit.allowed' : 'ratelimit.denied', 1, {
        scope: request.scope,
        algorithm: policy.algorithm,
      });
      if (!decision.allowed) {
        this.logger.info('Rate limit exceeded', {
          scope: request.scope,
          identifier: request.identifier,
          retryAfterMs: decision.retryAfterMs,
        });
      }
      return ok(decision);
    } catch (error) {
      return err(toKernelError(error, 'ratelimit.check'));
    }
  }

  /**
   * Charge one request, failing open while the store is unavailable
   */
  async check(request: RateLimitRequest): Promise<RateLimitDecision> {
    const result = await this.evaluate(request);
    if (result.ok) return result.value;

    if (!isStoreUnavailable(result.error)) {
      throw result.error;
    }
    const policy = this.policyFor(request);
    this.metrics.increment('ratelimit.fail_open', 1, { scope: request.scope });
    this.logger.warn('Rate limiter store unavailable, allowing request', {
      scope: request.scope,
      identifier: request.identifier,
      code: result.error.code,
    });
    return {
      allowed: true,
      limit: policyLimit(policy),
      remaining: policyLimit(policy),
      retryAfterMs: 0,
      resetMs: 0,
      scope: request.scope,
      identifier: request.identifier,
      algorithm: policy.algorithm,
      degraded: true,
    };
  }

  /**
   * Check every supplied scope in order. Scopes after the first denial are
   * neither evaluated nor charged.
   */
  async checkAll(subjects: RateLimitSubjects, options: CheckAllOptions = {}): Promise<CombinedDecision> {
    const decisions: RateLimitDecision[] = [];
    for (const request of this.requestsFor(subjects, options)) {
      const decision = await this.check(request);
      decisions.push(decision);
      if (!decision.allowed) {
        return { allowed: false, decisions, denied: decision };
      }
    }
    return { allowed: true, decisions, denied: null };
  }

  /**
   * Like check, but a denial throws RateLimitExceededError
   */
  async enforce(request: RateLimitRequest): Promise<RateLimitDecision> {
    const decision = await this.check(request);
    if (!decision.allowed) {
      throw new RateLimitExceededError(`${decision.scope}:${decision.identifier}`, decision.retryAfterMs);
    }
    return decision;
  }

  async enforceAll(subjects: RateLimitSubjects, options: CheckAllOptions = {}): Promise<CombinedDecision> {
    const combined = await this.checkAll(subjects, options);
    if (combined.denied) {
      throw new RateLimitExceededError(`${combined.denied.scope}:${combined.denied.identifier}`, combined.denied.retryAfterMs);
    }
    return combined;
  }

  /**
   * Current standing of an identifier without charging it
   */
  async status(request: RateLimitRequest): Promise<RateLimitDecision> {
    const policy = this.policyFor(request);
    const cost = request.cost ?? 1;
    validateCost(policy, cost);
    const key = this.key(request.scope, request.identifier, policy);
    const outcome = await this.accessor.execute('ratelimit.status', store => peek(store, policy, key, this.clock(), cost));
    return this.decide(request, policy, outcome);
  }

  async reset(scope: RateLimitScope, identifier: string, policy?: RateLimitPolicy): Promise<boolean> {
    const key = this.key(scope, identifier, this.policyFor({ scope, identifier, policy }));
    const removed = await this.accessor.execute('ratelimit.reset', store => store.del(key));
    this.logger.info('Rate limit reset', { scope, identifier });
    return removed > 0;
  }

  /**
   * Policy for a request: explicit override, then the endpoint table, then
   * the scope default. Endpoints without their own policy use the user policy.
   */
  policyFor(request: RateLimitRequest): RateLimitPolicy {
    if (request.policy) return request.policy;
    const { policies } = this.options;
    switch (request.scope) {
      case 'ip':
        return policies.ip;
      case 'user':
        return policies.user;
      case 'tenant':
        return policies.tenant;
      case 'endpoint':
        return policies.endpoints[endpointName(request.identifier)] ?? policies.user;
    }
  }

  private requestsFor(subjects: RateLimitSubjects, options: CheckAllOptions): RateLimitRequest[] {
    const requests: RateLimitRequest[] = [];
    for (const scope of SCOPE_ORDER) {
      const identifier = scope === 'endpoint' ? endpointIdentifier(subjects) : subjects[scope];
      if (identifier === undefined) continue;
      requests.push({ scope, identifier, policy: options.policies?.[scope], cost: options.cost });
    }
    return requests;
  }

  private decide(request: RateLimitRequest, policy: RateLimitPolicy, outcome: StrategyOutcome): RateLimitDecision {
    return {
      ...outcome,
      scope: request.scope,
      identifier: request.identifier,
      algorithm: policy.algorithm,
      degraded: false,
    };
  }

  /** `ratelimit:{algorithm}:{scope}:{identifier}:{windowSeconds}` */
  private key(scope: RateLimitScope, identifier: string, policy: RateLimitPolicy): string {
    if (identifier === '') {
      throw new ValidationError('Rate limit identifier must not be empty', { scope });
    }
    return this.accessor.globalKey('ratelimit', policy.algorithm, scope, identifier, windowSeconds(policy));
  }
}

/** Endpoint limits are per user when the user is known */
function endpointIdentifier(subjects: RateLimitSubjects): string | undefined {
  if (subjects.endpoint === undefined) return undefined;
  return subjects.user === undefined ? subjects.endpoint : `${subjects.endpoint}:user:${subjects.user}`;
}

function endpointName(identifier: string): string {
  const marker = identifier.indexOf(':user:');
  return marker === -1 ? identifier : identifier.slice(0, marker);
}
