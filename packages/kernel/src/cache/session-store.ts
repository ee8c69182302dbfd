/**
 * Session Store
 *
 * Sessions live in the global `session:` namespace:
 *   session:{id}           JSON session record
 *   session:{id}:tenants   set of tenant scopes the session may act for
 *   session:user:{userId}  set of the user's session ids
 * All three share the session's expiry, which slides forward on activity.
 */

import { randomBytes } from 'crypto';
import type { Session, TenantScope } from '@tessellate/types';
import { z } from 'zod';
import { ScopeRequiredError, ValidationError } from '../errors/kernel-errors';
import { StructuredLogger } from '../observability/structured-logger';
import { KeyStoreClient } from '../store/key-store';
import { TenantAccessor } from '../tenancy/tenant-accessor';
import { isValidScope } from '../tenancy/tenant-scope';
import { Clock, systemClock } from '../utils/time';

export interface SessionStoreOptions {
  accessor: TenantAccessor;
  ttlMs: number;
  logger: StructuredLogger;
  clock?: Clock;
}

export interface CreateSessionOptions {
  ttlMs?: number;
  userData?: Record<string, unknown>;
}

const SESSION_ID_BYTES = 32;
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{43}$/;

const StoredSessionSchema = z.object({
  sessionId: z.string(),
  userId: z.string(),
  userData: z.record(z.unknown()),
  createdAt: z.number(),
  lastActivityAt: z.number(),
  ttlMs: z.number(),
  expiresAt: z.number(),
});

type StoredSession = z.infer<typeof StoredSessionSchema>;

export class SessionStore {
  private readonly accessor: TenantAccessor;
  private readonly logger: StructuredLogger;
  private readonly clock: Clock;

  constructor(private readonly options: SessionStoreOptions) {
    this.accessor = options.accessor;
    this.logger = options.logger.child({ component: 'session-store' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Create a session with a 256-bit random id
   */
  async create(userId: string, tenants: TenantScope[], options: CreateSessionOptions = {}): Promise<Session> {
    if (userId === '') {
      throw new ValidationError('userId must not be empty');
    }
    const invalid = tenants.find(scope => !isValidScope(scope));
    if (invalid !== undefined) {
      throw new ScopeRequiredError('session.create', invalid);
    }
    const ttlMs = this.validTtl(options.ttlMs ?? this.options.ttlMs);

    const now = this.clock();
    const stored: StoredSession = {
      sessionId: randomBytes(SESSION_ID_BYTES).toString('base64url'),
      userId,
      userData: options.userData ?? {},
      createdAt: now,
      lastActivityAt: now,
      ttlMs,
      expiresAt: now + ttlMs,
    };
    const uniqueTenants = Array.from(new Set(tenants));

    await this.accessor.execute('session.create', async store => {
      await store.set(this.sessionKey(stored.sessionId), JSON.stringify(stored), ttlMs);
      if (uniqueTenants.length > 0) {
        await store.sadd(this.tenantsKey(stored.sessionId), ...uniqueTenants);
        await store.expire(this.tenantsKey(stored.sessionId), ttlMs);
      }
      await store.sadd(this.userKey(userId), stored.sessionId);
      await this.extendUserIndex(store, userId, ttlMs);
    });

    this.logger.info('Session created', { userId, tenants: uniqueTenants.length, ttlMs });
    return { ...stored, tenants: uniqueTenants };
  }

  /**
   * Resolve a session and record activity. With `scope`, the session must
   * also hold access to that tenant. Returns null for unknown, expired or
   * unauthorised sessions.
   */
  async validate(sessionId: string, scope?: TenantScope): Promise<Session | null> {
    const session = await this.read(sessionId);
    if (!session) return null;

    if (scope !== undefined && !session.tenants.includes(scope)) {
      this.logger.warn('Session denied access to tenant', { userId: session.userId, scope });
      return null;
    }
    return this.refresh(session, session.ttlMs);
  }

  /**
   * Record activity, sliding the expiry forward by the session's TTL
   */
  async touch(sessionId: string): Promise<Session | null> {
    const session = await this.read(sessionId);
    return session ? this.refresh(session, session.ttlMs) : null;
  }

  /**
   * Replace the session TTL, counting from now
   */
  async extend(sessionId: string, ttlMs: number): Promise<Session | null> {
    const valid = this.validTtl(ttlMs);
    const session = await this.read(sessionId);
    return session ? this.refresh(session, valid) : null;
  }

  /** Read without recording activity */
  get(sessionId: string): Promise<Session | null> {
    return this.read(sessionId);
  }

  async grantAccess(sessionId: string, scope: TenantScope): Promise<boolean> {
    if (!isValidScope(scope)) throw new ScopeRequiredError('session.grantAccess', scope);
    const session = await this.read(sessionId);
    if (!session) return false;

    const remaining = Math.max(1, session.expiresAt - this.clock());
    await this.accessor.execute('session.grantAccess', async store => {
      await store.sadd(this.tenantsKey(sessionId), scope);
      await store.expire(this.tenantsKey(sessionId), remaining);
    });
    return true;
  }

  async revokeAccess(sessionId: string, scope: TenantScope): Promise<boolean> {
    if (!SESSION_ID_PATTERN.test(sessionId)) return false;
    const removed = await this.accessor.execute('session.revokeAccess', store => store.srem(this.tenantsKey(sessionId), scope));
    return removed > 0;
  }

  async revoke(sessionId: string): Promise<boolean> {
    const session = await this.read(sessionId);
    if (!session) return false;

    await this.accessor.execute('session.revoke', async store => {
      await store.del(this.sessionKey(sessionId), this.tenantsKey(sessionId));
      await store.srem(this.userKey(session.userId), sessionId);
    });
    this.logger.info('Session revoked', { userId: session.userId });
    return true;
  }

  /**
   * Revoke every session of a user; returns how many were live
   */
  async revokeAllForUser(userId: string): Promise<number> {
    const revoked = await this.accessor.execute('session.revokeAllForUser', async store => {
      const ids = (await store.smembers(this.userKey(userId))).filter(id => SESSION_ID_PATTERN.test(id));
      const keys = ids.flatMap(id => [this.sessionKey(id), this.tenantsKey(id)]);
      let live = 0;
      for (const id of ids) {
        if (await store.exists(this.sessionKey(id))) live++;
      }
      if (keys.length > 0) await store.del(...keys);
      await store.del(this.userKey(userId));
      return live;
    });
    this.logger.info('All sessions revoked for user', { userId, revoked });
    return revoked;
  }

  private async read(sessionId: string): Promise<Session | null> {
    if (!SESSION_ID_PATTERN.test(sessionId)) return null;

    const found = await this.accessor.execute('session.read', async store => {
      const raw = await store.get(this.sessionKey(sessionId));
      if (raw === null) return null;
      return { raw, tenants: await store.smembers(this.tenantsKey(sessionId)) };
    });
    if (found === null) return null;

    const parsed = StoredSessionSchema.safeParse(safeJson(found.raw));
    if (!parsed.success) {
      this.logger.warn('Discarding malformed session record', { issues: parsed.error.issues.length });
      return null;
    }
    return { ...parsed.data, tenants: found.tenants.sort() };
  }

  /** Null when the session was revoked or expired after it was read */
  private async refresh(session: Session, ttlMs: number): Promise<Session | null> {
    const now = this.clock();
    const updated: Session = { ...session, lastActivityAt: now, ttlMs, expiresAt: now + ttlMs };
    const { tenants, ...stored } = updated;

    const refreshed = await this.accessor.execute('session.refresh', async store => {
      if (!(await store.setIfExists(this.sessionKey(session.sessionId), JSON.stringify(stored), ttlMs))) {
        return false;
      }
      if (tenants.length > 0) {
        await store.expire(this.tenantsKey(session.sessionId), ttlMs);
      }
      await this.extendUserIndex(store, session.userId, ttlMs);
      return true;
    });
    return refreshed ? updated : null;
  }

  /** The user index lives as long as the user's longest-lived session */
  private async extendUserIndex(store: KeyStoreClient, userId: string, ttlMs: number): Promise<void> {
    const key = this.userKey(userId);
    if ((await store.pttl(key)) < ttlMs) {
      await store.expire(key, ttlMs);
    }
  }

  private validTtl(ttlMs: number): number {
    if (!Number.isInteger(ttlMs) || ttlMs <= 0) {
      throw new ValidationError('Session TTL must be a positive integer', { ttlMs });
    }
    return ttlMs;
  }

  private sessionKey(sessionId: string): string {
    return this.accessor.globalKey('session', sessionId);
  }

  private tenantsKey(sessionId: string): string {
    return this.accessor.globalKey('session', sessionId, 'tenants');
  }

  private userKey(userId: string): string {
    return this.accessor.globalKey('session', 'user', userId);
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
