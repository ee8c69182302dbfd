import { MemoryKeyStore } from '../memory-key-store';
import { ConnectionError, StoreCommandError } from '../../errors/kernel-errors';
import { queueKeys } from '../../queue/queue-config';
import { ProgressChange } from '../key-store';
import { ManualClock, T0 } from '@test/helpers';

describe('MemoryKeyStore', () => {
  let clock: ManualClock;
  let store: MemoryKeyStore;

  beforeEach(() => {
    clock = new ManualClock();
    store = new MemoryKeyStore({ clock: clock.now });
  });

  describe('expiry', () => {
    it('should expire keys once their TTL has elapsed', async () => {
      await store.set('greeting', 'hello', 1000);

      clock.advance(999);
      expect(await store.get('greeting')).toBe('hello');
      expect(await store.pttl('greeting')).toBe(1);

      clock.advance(1);
      expect(await store.get('greeting')).toBeNull();
      expect(await store.exists('greeting')).toBe(false);
    });

    it('should report -1 for keys without expiry and -2 for missing keys', async () => {
      await store.set('forever', 'x');
      expect(await store.pttl('forever')).toBe(-1);
      expect(await store.pttl('missing')).toBe(-2);
    });

    it('should overwrite only keys that are still live', async () => {
      expect(await store.setIfExists('session', 'v2', 1000)).toBe(false);
      expect(await store.exists('session')).toBe(false);

      await store.set('session', 'v1', 500);
      expect(await store.setIfExists('session', 'v2', 1000)).toBe(true);
      expect(await store.get('session')).toBe('v2');
      expect(await store.pttl('session')).toBe(1000);

      clock.advance(1000);
      expect(await store.setIfExists('session', 'v3', 1000)).toBe(false);
    });

    it('should keep the expiry across increments', async () => {
      await store.set('counter', '1', 500);
      await store.incr('counter');
      expect(await store.pttl('counter')).toBe(500);
    });
  });

  describe('data types', () => {
    it('should store hashes, sets and sorted sets', async () => {
      await store.hset('h', { a: '1', b: '2' });
      expect(await store.hincrby('h', 'a', 4)).toBe(5);
      expect(await store.hgetall('h')).toEqual({ a: '5', b: '2' });

      await store.sadd('s', 'x', 'y', 'x');
      expect((await store.smembers('s')).sort()).toEqual(['x', 'y']);
      expect(await store.srem('s', 'x', 'y')).toBe(2);
      expect(await store.exists('s')).toBe(false);

      await store.zadd('z', 3, 'c');
      await store.zadd('z', 1, 'a');
      await store.zadd('z', 2, 'b');
      expect(await store.zrange('z', 0, -1)).toEqual(['a', 'b', 'c']);
      expect(await store.zrange('z', 0, 0, true)).toEqual(['c']);
      expect(await store.zrangeByScore('z', 2, Number.POSITIVE_INFINITY)).toEqual(['b', 'c']);
      expect(await store.zcount('z', 1, 2)).toBe(2);
    });

    it('should reject commands against the wrong type', async () => {
      await store.set('plain', 'value');
      await expect(store.hget('plain', 'field')).rejects.toBeInstanceOf(StoreCommandError);
    });

    it('should match keys with glob patterns', async () => {
      await store.set('tenant:a:cache:1', 'x');
      await store.set('tenant:a:cache:2', 'x');
      await store.set('tenant:b:cache:1', 'x');
      expect((await store.scan('tenant:a:*')).sort()).toEqual(['tenant:a:cache:1', 'tenant:a:cache:2']);
      expect(await store.scan('tenant:?:cache:2')).toEqual(['tenant:a:cache:2']);
    });
  });

  describe('availability', () => {
    it('should reject every operation while unavailable and count attempts', async () => {
      store.setAvailable(false);
      await expect(store.get('k')).rejects.toBeInstanceOf(ConnectionError);
      await expect(store.ping()).rejects.toBeInstanceOf(ConnectionError);
      expect(store.operationCount).toBe(2);

      store.setAvailable(true);
      await expect(store.ping()).resolves.toBeUndefined();
    });
  });

  describe('slidingWindowHit', () => {
    const hit = (memberId: string) =>
      store.slidingWindowHit({ key: 'rl', nowMs: clock.current, windowMs: 1000, limit: 2, cost: 1, memberId });

    it('should admit up to the limit within the window', async () => {
      expect(await hit('a')).toEqual({ allowed: true, count: 1, retryAfterMs: 0, resetMs: 1000 });
      clock.advance(100);
      expect(await hit('b')).toEqual({ allowed: true, count: 2, retryAfterMs: 0, resetMs: 1000 });
      clock.advance(100);
      expect(await hit('c')).toEqual({ allowed: false, count: 2, retryAfterMs: 800, resetMs: 900 });
    });

    it('should let old entries slide out of the window', async () => {
      await hit('a');
      clock.advance(100);
      await hit('b');
      clock.advance(900);

      const result = await hit('c');
      expect(result.allowed).toBe(true);
      expect(result.count).toBe(2);
    });
  });

  describe('tokenBucketTake', () => {
    const take = () =>
      store.tokenBucketTake({ key: 'tb', nowMs: clock.current, capacity: 2, refillPerSecond: 1, cost: 1, ttlMs: 2000 });

    it('should spend the burst capacity and then refill over time', async () => {
      expect(await take()).toEqual({ allowed: true, tokens: 1, retryAfterMs: 0, resetMs: 1000 });
      expect(await take()).toEqual({ allowed: true, tokens: 0, retryAfterMs: 0, resetMs: 2000 });
      expect(await take()).toMatchObject({ allowed: false, retryAfterMs: 1000 });

      clock.advance(500);
      expect(await take()).toMatchObject({ allowed: false, tokens: 0, retryAfterMs: 500 });

      clock.advance(500);
      expect(await take()).toMatchObject({ allowed: true, tokens: 0 });
    });
  });

  describe('fixedWindowHit', () => {
    const hit = () => store.fixedWindowHit({ key: 'fw', windowMs: 1000, limit: 2, cost: 1 });

    it('should count within a window and reset when it expires', async () => {
      expect(await hit()).toEqual({ allowed: true, count: 1, resetMs: 1000 });
      clock.advance(300);
      expect(await hit()).toEqual({ allowed: true, count: 2, resetMs: 700 });
      expect(await hit()).toEqual({ allowed: false, count: 2, resetMs: 700 });

      clock.advance(700);
      expect(await hit()).toEqual({ allowed: true, count: 1, resetMs: 1000 });
    });
  });

  describe('versionedWrite', () => {
    it('should bump the version and keep createdAt from the first write', async () => {
      expect(await store.versionedWrite({ key: 'v', fields: { payload: '1' }, nowMs: T0, ttlMs: 5000 })).toBe(1);
      clock.advance(1000);
      expect(await store.versionedWrite({ key: 'v', fields: { payload: '2' }, nowMs: T0 + 1000, ttlMs: 5000 })).toBe(2);

      expect(await store.hgetall('v')).toEqual({ version: '2', createdAt: String(T0), payload: '2' });
      expect(await store.pttl('v')).toBe(5000);
    });
  });

  describe('task operations', () => {
    const keys = queueKeys('exports');

    async function enqueue(taskId: string, priority: number, availableAt: number = clock.current) {
      return store.enqueueTask({
        keys,
        taskId,
        fields: { taskId, status: 'queued', priority: String(priority), attempts: '0', maxAttempts: '2' },
        priority,
        availableAt,
        nowMs: clock.current,
        maxSize: 10,
        tenantKey: 'queue:exports:tenant:a',
        tenantLimit: 3,
      });
    }

    const claim = () => store.claimTask({ keys, nowMs: clock.current, workerId: 'w1', processingTimeoutMs: 1000 });

    it('should claim by priority, then in enqueue order', async () => {
      await enqueue('low', 2);
      await enqueue('urgent-1', 0);
      await enqueue('urgent-2', 0);

      const order: string[] = [];
      for (let claimed = await claim(); claimed; claimed = await claim()) {
        order.push(claimed.taskId);
      }
      expect(order).toEqual(['urgent-1', 'urgent-2', 'low']);
    });

    it('should enforce the tenant limit', async () => {
      await enqueue('t1', 0);
      await enqueue('t2', 0);
      await enqueue('t3', 0);
      expect(await enqueue('t4', 0)).toEqual({ status: 'tenant_full', size: 3 });
    });

    it('should hold delayed tasks until they are due', async () => {
      expect(await enqueue('later', 0, clock.current + 500)).toEqual({ status: 'enqueued', delayed: true });
      expect(await claim()).toBeNull();

      clock.advance(500);
      const claimed = await claim();
      expect(claimed?.taskId).toBe('later');
      expect(claimed?.fields).toMatchObject({ status: 'in_progress', attempts: '1', workerId: 'w1' });
    });

    it('should hand each task to exactly one concurrent claimer', async () => {
      for (let i = 0; i < 5; i++) {
        await enqueue(`task-${i}`, 0);
      }
      const claims = await Promise.all(Array.from({ length: 20 }, () => claim()));
      const ids = claims.flatMap(claimed => (claimed ? [claimed.taskId] : []));

      expect(ids).toHaveLength(5);
      expect(new Set(ids).size).toBe(5);
    });

    it('should leave a live task alone when it is enqueued again', async () => {
      await enqueue('t1', 0);
      expect(await enqueue('t1', 0)).toEqual({ status: 'enqueued', delayed: false });

      expect(await store.zcard(keys.pending)).toBe(1);
      expect(await store.get('queue:exports:tenant:a')).toBe('1');
      expect(await store.hget(keys.stats, 'enqueued')).toBe('1');
    });

    it('should settle only under the current lease and replay a repeated call', async () => {
      const tenantKey = 'queue:exports:tenant:a';
      const fail = (workerId: string, attempt: number) =>
        store.failTask({
          keys,
          taskId: 't1',
          lease: { workerId, attempt },
          tenantKey,
          nowMs: clock.current,
          error: 'boom',
          retryAt: clock.current + 100,
          deadLetterKey: 'deadletter:exports:t1',
          deadLetterIndex: 'deadletter:exports',
          retentionMs: 60_000,
        });
      const complete = (workerId: string, attempt: number) =>
        store.completeTask({ keys, taskId: 't1', lease: { workerId, attempt }, tenantKey, fields: {}, retentionMs: 60_000 });

      await enqueue('t1', 0);
      await claim();
      expect(await fail('w2', 1)).toEqual({ status: 'invalid_state', actual: 'in_progress' });
      expect(await fail('w1', 1)).toEqual({ status: 'ok', value: { kind: 'retry', attempts: 1 } });
      expect(await fail('w1', 1)).toEqual({ status: 'ok', value: { kind: 'retry', attempts: 1 } });
      expect(await store.hget(keys.stats, 'failed')).toBe('1');

      clock.advance(100);
      await claim();
      expect(await fail('w1', 1)).toEqual({ status: 'invalid_state', actual: 'in_progress' });
      expect(await complete('w1', 1)).toEqual({ status: 'invalid_state', actual: 'in_progress' });
      expect(await complete('w1', 2)).toMatchObject({ status: 'ok', value: { status: 'succeeded' } });
      expect(await complete('w1', 2)).toMatchObject({ status: 'ok', value: { status: 'succeeded' } });
      expect(await store.hget(keys.stats, 'completed')).toBe('1');
      expect(await store.get(tenantKey)).toBe('0');
    });
  });

  describe('progress', () => {
    const start = () =>
      store.hset('progress:p1', {
        correlationId: 'p1',
        totalSteps: '4',
        completedSteps: '0',
        lastMessage: '',
        status: 'in_progress',
      });
    const mutate = (change: ProgressChange, message?: string) =>
      store.mutateProgress({ key: 'progress:p1', change, message, nowMs: clock.current, activeTtlMs: 1000, terminalTtlMs: 100 });

    it('should apply each change in one step and clamp at the total', async () => {
      await start();

      expect(await mutate({ kind: 'increment', steps: 3 }, 'three')).toEqual({
        status: 'ok',
        fields: {
          correlationId: 'p1',
          totalSteps: '4',
          completedSteps: '3',
          lastMessage: 'three',
          status: 'in_progress',
          updatedAt: String(T0),
        },
      });
      expect(await store.pttl('progress:p1')).toBe(1000);
      expect(await mutate({ kind: 'increment', steps: 3 })).toMatchObject({ fields: { completedSteps: '4', lastMessage: 'three' } });
      expect(await mutate({ kind: 'set', totalSteps: 8 })).toMatchObject({ fields: { totalSteps: '8', completedSteps: '4' } });

      clock.advance(10);
      expect(await mutate({ kind: 'complete' }, 'done')).toMatchObject({
        fields: { completedSteps: '8', status: 'completed', lastMessage: 'done', updatedAt: String(T0 + 10) },
      });
      expect(await store.pttl('progress:p1')).toBe(100);
    });

    it('should refuse changes to finished or missing records', async () => {
      expect(await mutate({ kind: 'increment', steps: 1 })).toEqual({ status: 'not_found' });

      await start();
      expect(await mutate({ kind: 'fail', error: 'disk full' })).toMatchObject({
        fields: { status: 'failed', error: 'disk full', lastMessage: 'disk full', completedSteps: '0' },
      });
      expect(await mutate({ kind: 'increment', steps: 1 })).toEqual({ status: 'terminal', actual: 'failed' });
    });
  });
});
