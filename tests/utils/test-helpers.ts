/**
 * Test helper utilities
 */

import { KernelConfig, KernelConfigInput, loadKernelConfig } from '../../packages/kernel/src/config/kernel-config';
import { InMemoryMetrics } from '../../packages/kernel/src/observability/metrics';
import { LogEntry, LogLevel, StructuredLogger } from '../../packages/kernel/src/observability/structured-logger';
import { CircuitBreaker } from '../../packages/kernel/src/resilience/circuit-breaker';
import { MemoryKeyStore } from '../../packages/kernel/src/store/memory-key-store';
import { TenantAccessor } from '../../packages/kernel/src/tenancy/tenant-accessor';
import { Clock } from '../../packages/kernel/src/utils/time';

export const TENANT_A = 'tenant-a';
export const TENANT_B = 'tenant-b';

/** Fixed start time so expected timestamps can be written down */
export const T0 = 1_700_000_000_000;

/**
 * Clock that only moves when told to
 */
export class ManualClock {
  constructor(public current: number = T0) {}

  readonly now: Clock = () => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export function silentLogger(): StructuredLogger {
  return new StructuredLogger({ service: 'test', level: LogLevel.SILENT, pretty: false, includeStackTrace: false });
}

/**
 * Logger that keeps every entry for assertions
 */
export function captureLogger(level: LogLevel = LogLevel.DEBUG): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    service: 'test',
    level,
    pretty: false,
    includeStackTrace: false,
    output: entry => entries.push(entry),
  });
  return { logger, entries };
}

export function testConfig(overrides: KernelConfigInput = {}): KernelConfig {
  return loadKernelConfig({ NODE_ENV: 'test' }, overrides);
}

export interface Harness {
  clock: ManualClock;
  store: MemoryKeyStore;
  breaker: CircuitBreaker;
  accessor: TenantAccessor;
  metrics: InMemoryMetrics;
  logger: StructuredLogger;
  config: KernelConfig;
}

/**
 * In-memory store behind a breaker and accessor, on a manual clock.
 * Retries never wait and jitter is neutral (factor 1).
 */
export function createHarness(overrides: KernelConfigInput = {}): Harness {
  const config = testConfig({ tenancy: { strict: true }, ...overrides });
  const clock = new ManualClock();
  const store = new MemoryKeyStore({ clock: clock.now });
  const metrics = new InMemoryMetrics();
  const logger = silentLogger();
  const breaker = new CircuitBreaker({ name: 'key-store', ...config.breaker, clock: clock.now, logger, metrics });
  const accessor = new TenantAccessor({
    store,
    breaker,
    tenancy: config.tenancy,
    retry: config.retry,
    logger,
    random: () => 0.5,
    wait: async () => undefined,
  });
  return { clock, store, breaker, accessor, metrics, logger, config };
}

/** Collect a rejection so its fields can be asserted */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
