import { CircuitState } from '../../resilience/circuit-breaker';
import { CircuitOpenError, ConnectionError, ScopeRequiredError, ValidationError } from '../../errors/kernel-errors';
import { Harness, TENANT_A, TENANT_B, createHarness, rejectionOf } from '@test/helpers';

describe('TenantAccessor', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('key isolation', () => {
    it('should namespace tenant keys under tenant:{scope}:', async () => {
      await h.accessor.set(TENANT_A, 'profile', 'alpha');
      expect(await h.store.get('tenant:tenant-a:profile')).toBe('alpha');
    });

    it('should keep one tenant from reading another tenant\'s data', async () => {
      await h.accessor.set(TENANT_A, 'secret', 'a-only');

      expect(await h.accessor.get(TENANT_B, 'secret')).toBeNull();
      expect(await h.accessor.exists(TENANT_B, 'secret')).toBe(false);
      expect(await h.accessor.delete(TENANT_B, 'secret')).toBe(false);
      expect(await h.accessor.get(TENANT_A, 'secret')).toBe('a-only');
    });

    it('should scan only the caller\'s own keys', async () => {
      await h.accessor.set(TENANT_A, 'doc:1', 'x');
      await h.accessor.set(TENANT_A, 'doc:2', 'x');
      await h.accessor.set(TENANT_B, 'doc:3', 'x');

      expect((await h.accessor.scan(TENANT_A, 'doc:*')).sort()).toEqual(['doc:1', 'doc:2']);
    });

    it('should refuse scan patterns that could escape the prefix', async () => {
      await expect(h.accessor.scan(TENANT_A, '[a-z]*')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should delete all keys of one tenant only', async () => {
      await h.accessor.set(TENANT_A, 'one', '1');
      await h.accessor.set(TENANT_A, 'two', '2');
      await h.accessor.set(TENANT_B, 'one', '1');

      expect(await h.accessor.deleteAll(TENANT_A)).toBe(2);
      expect(await h.accessor.get(TENANT_B, 'one')).toBe('1');
    });
  });

  describe('scope validation', () => {
    it('should reject a missing scope in strict mode without touching the store', async () => {
      expect(() => h.accessor.keyFor(undefined, 'k')).toThrow(ScopeRequiredError);
      await expect(h.accessor.get(null, 'k')).rejects.toBeInstanceOf(ScopeRequiredError);
      await expect(h.accessor.get('   ', 'k')).rejects.toBeInstanceOf(ScopeRequiredError);
      expect(h.store.operationCount).toBe(0);
    });

    it('should reject malformed scopes', () => {
      expect(() => h.accessor.keyFor('tenant:evil', 'k')).toThrow(ScopeRequiredError);
      expect(() => h.accessor.keyFor('x'.repeat(65), 'k')).toThrow(ScopeRequiredError);
    });

    it('should fall back to the configured scope in non-strict mode', async () => {
      const lenient = createHarness({ tenancy: { strict: false, fallbackScope: 'shared' } });
      await lenient.accessor.set(undefined, 'k', 'v');

      expect(await lenient.store.get('tenant:shared:k')).toBe('v');
      expect(lenient.accessor.strict).toBe(false);
    });

    it('should reject empty keys and global key parts', () => {
      expect(() => h.accessor.keyFor(TENANT_A, '')).toThrow(ValidationError);
      expect(() => h.accessor.globalKey('session', '')).toThrow(ValidationError);
      expect(h.accessor.globalKey('ratelimit', 'ip', 60)).toBe('ratelimit:ip:60');
    });
  });

  describe('resilience', () => {
    it('should retry transient failures locally', async () => {
      const get = jest
        .spyOn(h.store, 'get')
        .mockRejectedValueOnce(new ConnectionError('reset'))
        .mockResolvedValueOnce('recovered');

      await expect(h.accessor.get(TENANT_A, 'k')).resolves.toBe('recovered');
      expect(get).toHaveBeenCalledTimes(2);
    });

    it('should open the breaker after repeated outages and then fail fast', async () => {
      h.store.setAvailable(false);

      // 2 calls of 3 attempts each reach the threshold of 5 on the second call
      await expect(h.accessor.get(TENANT_A, 'k')).rejects.toBeInstanceOf(ConnectionError);
      const error = await rejectionOf(h.accessor.get(TENANT_A, 'k'));
      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(h.breaker.getState()).toBe(CircuitState.OPEN);

      const before = h.store.operationCount;
      await expect(h.accessor.get(TENANT_A, 'k')).rejects.toBeInstanceOf(CircuitOpenError);
      expect(h.store.operationCount).toBe(before);
    });

    it('should not retry errors that are not transient', async () => {
      await h.store.set('tenant:tenant-a:plain', 'x');
      const before = h.store.operationCount;

      await expect(h.accessor.execute('hget', store => store.hget('tenant:tenant-a:plain', 'f'))).rejects.toThrow(
        'WRONGTYPE'
      );
      expect(h.store.operationCount).toBe(before + 1);
    });
  });
});
