import { ConnectionPool } from '../connection-pool';
import { ConnectionError, PoolExhaustedError } from '../../errors/kernel-errors';
import { rejectionOf } from '@test/helpers';

interface FakeConnection {
  id: number;
  healthy: boolean;
}

function createPool(overrides: { maxSize?: number; maxWaiters?: number; acquireTimeoutMs?: number } = {}) {
  let nextId = 0;
  const destroyed: number[] = [];
  const pool = new ConnectionPool<FakeConnection>({
    name: 'test-pool',
    maxSize: overrides.maxSize ?? 2,
    maxWaiters: overrides.maxWaiters ?? 1,
    acquireTimeoutMs: overrides.acquireTimeoutMs ?? 50,
    create: async () => ({ id: ++nextId, healthy: true }),
    destroy: async connection => {
      destroyed.push(connection.id);
    },
    isHealthy: connection => connection.healthy,
  });
  return { pool, destroyed };
}

describe('ConnectionPool', () => {
  it('should create connections lazily and reuse released ones', async () => {
    const { pool } = createPool();
    const first = await pool.acquire();
    pool.release(first);
    const again = await pool.acquire();

    expect(again.id).toBe(first.id);
    expect(pool.getStats()).toMatchObject({ size: 1, idle: 0, inUse: 1, totalAcquired: 2 });
  });

  it('should hand a released connection to the next waiter', async () => {
    const { pool } = createPool({ maxSize: 1 });
    const held = await pool.acquire();
    const waiting = pool.acquire();

    expect(pool.getStats().waiting).toBe(1);
    pool.release(held);
    await expect(waiting).resolves.toBe(held);
  });

  it('should reject when the waiter queue is full', async () => {
    const { pool } = createPool({ maxSize: 1, maxWaiters: 1 });
    const held = await pool.acquire();
    const waiting = pool.acquire();

    const error = await rejectionOf(pool.acquire());
    expect(error).toBeInstanceOf(PoolExhaustedError);
    expect(pool.getStats().totalExhausted).toBe(1);

    pool.release(held);
    await waiting;
  });

  it('should time out waiters after acquireTimeoutMs', async () => {
    const { pool } = createPool({ maxSize: 1, acquireTimeoutMs: 10 });
    await pool.acquire();

    await expect(pool.acquire()).rejects.toBeInstanceOf(PoolExhaustedError);
    expect(pool.getStats().waiting).toBe(0);
  });

  it('should destroy unhealthy connections on release', async () => {
    const { pool, destroyed } = createPool();
    const connection = await pool.acquire();
    connection.healthy = false;
    pool.release(connection);

    expect(destroyed).toEqual([connection.id]);
    expect(pool.getStats().size).toBe(0);
  });

  it('should release the connection after use, even when the work fails', async () => {
    const { pool } = createPool();
    await expect(pool.use(async () => Promise.reject(new Error('query failed')))).rejects.toThrow('query failed');
    expect(pool.getStats()).toMatchObject({ size: 1, idle: 1, inUse: 0 });
  });

  it('should close idle connections and refuse new work once drained', async () => {
    const { pool, destroyed } = createPool();
    const connection = await pool.acquire();
    pool.release(connection);

    await pool.drain();
    expect(destroyed).toEqual([connection.id]);
    await expect(pool.acquire()).rejects.toBeInstanceOf(ConnectionError);
  });
});
