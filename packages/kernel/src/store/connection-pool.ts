/**
 * Connection Pool
 *
 * Caps the number of live store connections per process. Connections are
 * created lazily up to `maxSize`; once every one is in use, callers wait in
 * a bounded FIFO queue for at most `acquireTimeoutMs` and then fail with
 * PoolExhaustedError.
 */

import { ConnectionError, PoolExhaustedError, toKernelError } from '../errors/kernel-errors';

export interface ConnectionPoolOptions<T> {
  /** Name of the pool for errors and metrics */
  name: string;
  /** Maximum live connections */
  maxSize: number;
  /** Maximum callers waiting for a connection */
  maxWaiters: number;
  /** How long a waiting caller may wait in ms */
  acquireTimeoutMs: number;
  create: () => Promise<T>;
  destroy: (connection: T) => Promise<void>;
  /** Broken connections are destroyed on release instead of reused */
  isHealthy?: (connection: T) => boolean;
  /** Invoked when a connection cannot be closed cleanly */
  onDestroyError?: (error: unknown) => void;
}

export interface ConnectionPoolStats {
  name: string;
  size: number;
  idle: number;
  inUse: number;
  waiting: number;
  maxSize: number;
  totalAcquired: number;
  totalExhausted: number;
}

interface Waiter<T> {
  resolve: (connection: T) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class ConnectionPool<T> {
  private idle: T[] = [];
  private size: number = 0;
  private waiters: Waiter<T>[] = [];
  private closed: boolean = false;
  private totalAcquired: number = 0;
  private totalExhausted: number = 0;

  constructor(private readonly options: ConnectionPoolOptions<T>) {}

  /**
   * Run `fn` with a pooled connection, releasing it afterwards
   */
  async use<R>(fn: (connection: T) => Promise<R>): Promise<R> {
    const connection = await this.acquire();
    try {
      return await fn(connection);
    } finally {
      this.release(connection);
    }
  }

  async acquire(): Promise<T> {
    if (this.closed) {
      throw new ConnectionError(`Connection pool '${this.options.name}' is closed`);
    }

    while (this.idle.length > 0) {
      const connection = this.idle.pop();
      if (connection === undefined) break;
      if (this.isHealthy(connection)) {
        this.totalAcquired++;
        return connection;
      }
      this.discard(connection);
    }

    if (this.size < this.options.maxSize) {
      const connection = await this.open();
      this.totalAcquired++;
      return connection;
    }

    if (this.waiters.length >= this.options.maxWaiters) {
      this.totalExhausted++;
      throw new PoolExhaustedError(this.options.name, this.options.maxSize, this.waiters.length);
    }

    return this.wait();
  }

  /**
   * Return a connection. A waiting caller receives it directly.
   */
  release(connection: T): void {
    if (this.closed || !this.isHealthy(connection)) {
      this.discard(connection);
      this.replaceForWaiter();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      this.totalAcquired++;
      waiter.resolve(connection);
      return;
    }

    this.idle.push(connection);
  }

  /**
   * Close idle connections and reject waiters. Connections still in use are
   * closed when released.
   */
  async drain(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new ConnectionError(`Connection pool '${this.options.name}' is closed`));
    }

    const idle = this.idle.splice(0);
    this.size -= idle.length;
    await Promise.all(idle.map(connection => this.options.destroy(connection).catch(error => this.options.onDestroyError?.(error))));
  }

  getStats(): ConnectionPoolStats {
    return {
      name: this.options.name,
      size: this.size,
      idle: this.idle.length,
      inUse: this.size - this.idle.length,
      waiting: this.waiters.length,
      maxSize: this.options.maxSize,
      totalAcquired: this.totalAcquired,
      totalExhausted: this.totalExhausted,
    };
  }

  private async open(): Promise<T> {
    this.size++;
    try {
      return await this.options.create();
    } catch (error) {
      this.size--;
      throw toKernelError(error, 'connect');
    }
  }

  private wait(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
            this.totalExhausted++;
            reject(new PoolExhaustedError(this.options.name, this.options.maxSize, this.waiters.length));
          }
        }, this.options.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private replaceForWaiter(): void {
    if (this.closed || this.waiters.length === 0 || this.size >= this.options.maxSize) {
      return;
    }
    const waiter = this.waiters.shift();
    if (!waiter) return;
    clearTimeout(waiter.timer);

    this.open()
      .then(connection => {
        this.totalAcquired++;
        waiter.resolve(connection);
      })
      .catch(waiter.reject);
  }

  private discard(connection: T): void {
    this.size--;
    this.options.destroy(connection).catch(error => this.options.onDestroyError?.(error));
  }

  private isHealthy(connection: T): boolean {
    return this.options.isHealthy ? this.options.isHealthy(connection) : true;
  }
}
