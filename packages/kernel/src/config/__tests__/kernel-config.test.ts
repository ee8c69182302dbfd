import { loadKernelConfig } from '../kernel-config';
import { ConfigurationError } from '../../errors/kernel-errors';
import { rejectionOf } from '@test/helpers';

describe('loadKernelConfig', () => {
  it('should apply defaults', () => {
    const config = loadKernelConfig({});

    expect(config.store.url).toBe('redis://localhost:6379');
    expect(config.store.maxConnections).toBe(20);
    expect(config.breaker).toEqual({
      failureThreshold: 5,
      recoveryTimeoutMs: 60_000,
      successThreshold: 3,
      halfOpenMaxCalls: 1,
      callTimeoutMs: 10_000,
    });
    expect(config.rateLimits.ip).toEqual({ algorithm: 'sliding-window', limit: 100, windowMs: 60_000 });
    expect(config.queues.exports).toEqual({
      maxSize: 200,
      priorityLevels: 3,
      processingTimeoutMs: 1_200_000,
      maxAttempts: 3,
      tenantShare: 0.25,
    });
    expect(config.backoff).toEqual({ baseDelayMs: 1_000, maxDelayMs: 300_000, jitterRatio: 0.25 });
  });

  it('should read store and breaker settings from the environment', () => {
    const config = loadKernelConfig({
      KV_URL: 'redis://cache.internal:6380',
      KV_MAX_CONNECTIONS: '50',
      BREAKER_FAILURE_THRESHOLD: '8',
    });

    expect(config.store.url).toBe('redis://cache.internal:6380');
    expect(config.store.maxConnections).toBe(50);
    expect(config.breaker.failureThreshold).toBe(8);
  });

  it('should default to strict tenancy in production', () => {
    const production = loadKernelConfig({ NODE_ENV: 'production' });
    expect(production.tenancy).toEqual({ strict: true });

    const development = loadKernelConfig({ NODE_ENV: 'development' });
    expect(development.tenancy).toEqual({ strict: false, fallbackScope: 'default' });
  });

  it('should let overrides win over the environment', () => {
    const config = loadKernelConfig({ KV_MAX_CONNECTIONS: '50' }, { store: { maxConnections: 5 } });
    expect(config.store.maxConnections).toBe(5);
  });

  it('should report every invalid field', async () => {
    const error = await rejectionOf(
      Promise.resolve().then(() =>
        loadKernelConfig({ KV_URL: 'not a url', KV_MAX_CONNECTIONS: 'many', BREAKER_SUCCESS_THRESHOLD: '0' })
      )
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    const issues = error instanceof ConfigurationError ? error.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues[0]).toBe('store.url: KV_URL must be a redis:// or rediss:// URL');
    expect(issues.some(issue => issue.startsWith('store.maxConnections:'))).toBe(true);
    expect(issues.some(issue => issue.startsWith('breaker.successThreshold:'))).toBe(true);
  });

  it('should reject jitter that could shrink consecutive delays', () => {
    expect(() => loadKernelConfig({}, { backoff: { baseDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0.5 } })).toThrow(
      'backoff.jitterRatio: jitterRatio must not exceed 1/3'
    );
  });

  it('should require a fallback scope for non-strict tenancy', () => {
    expect(() => loadKernelConfig({ NODE_ENV: 'production', TENANCY_STRICT: 'false' })).toThrow(
      'Non-strict tenancy requires a fallbackScope'
    );
  });

  it('should reject base delays above the maximum', () => {
    expect(() => loadKernelConfig({}, { backoff: { baseDelayMs: 5000, maxDelayMs: 1000, jitterRatio: 0 } })).toThrow(
      ConfigurationError
    );
  });

  it('should return a frozen configuration', () => {
    const config = loadKernelConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.queues.embeddings)).toBe(true);
  });
});
