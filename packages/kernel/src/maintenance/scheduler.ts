/**
 * Maintenance Scheduler
 *
 * Named periodic jobs (delayed-task promotion, stall recovery, health
 * checks). A job never overlaps with its own previous run; a run that is
 * still going when the next tick arrives is skipped. Timers are unref'd so
 * they never keep the process alive on their own.
 */

import { ValidationError } from '../errors/kernel-errors';
import { MetricsSink, NoopMetrics } from '../observability/metrics';
import { StructuredLogger } from '../observability/structured-logger';
import { Clock, systemClock } from '../utils/time';

export interface MaintenanceJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
}

export interface JobStatus {
  name: string;
  intervalMs: number;
  running: boolean;
  runs: number;
  failures: number;
  skipped: number;
  lastRunAt: number | null;
  lastDurationMs: number | null;
  lastError: string | null;
}

export interface MaintenanceSchedulerOptions {
  logger: StructuredLogger;
  metrics?: MetricsSink;
  clock?: Clock;
}

interface ScheduledJob {
  job: MaintenanceJob;
  status: JobStatus;
  timer: ReturnType<typeof setInterval> | null;
  current: Promise<void> | null;
}

export class MaintenanceScheduler {
  private readonly jobs: Map<string, ScheduledJob> = new Map();
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsSink;
  private readonly clock: Clock;
  private started = false;

  constructor(options: MaintenanceSchedulerOptions) {
    this.logger = options.logger.child({ component: 'maintenance' });
    this.metrics = options.metrics ?? new NoopMetrics();
    this.clock = options.clock ?? systemClock;
  }

  register(job: MaintenanceJob): void {
    if (this.jobs.has(job.name)) {
      throw new ValidationError(`Maintenance job '${job.name}' is already registered`);
    }
    if (!Number.isInteger(job.intervalMs) || job.intervalMs <= 0) {
      throw new ValidationError('Maintenance interval must be a positive integer', { job: job.name, intervalMs: job.intervalMs });
    }
    const scheduled: ScheduledJob = {
      job,
      timer: null,
      current: null,
      status: {
        name: job.name,
        intervalMs: job.intervalMs,
        running: false,
        runs: 0,
        failures: 0,
        skipped: 0,
        lastRunAt: null,
        lastDurationMs: null,
        lastError: null,
      },
    };
    this.jobs.set(job.name, scheduled);
    if (this.started) this.schedule(scheduled);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const scheduled of this.jobs.values()) {
      this.schedule(scheduled);
    }
    this.logger.info('Maintenance started', { jobs: Array.from(this.jobs.keys()) });
  }

  /**
   * Cancel every timer and wait for runs already in progress
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    const pending: Promise<void>[] = [];
    for (const scheduled of this.jobs.values()) {
      if (scheduled.timer) clearInterval(scheduled.timer);
      scheduled.timer = null;
      if (scheduled.current) pending.push(scheduled.current);
    }
    await Promise.all(pending);
    this.logger.info('Maintenance stopped');
  }

  /**
   * Run a job now. Resolves to false when a run of the same job is already
   * in progress.
   */
  async runNow(name: string): Promise<boolean> {
    const scheduled = this.jobs.get(name);
    if (!scheduled) {
      throw new ValidationError(`Unknown maintenance job '${name}'`);
    }
    return this.tick(scheduled);
  }

  status(): JobStatus[] {
    return Array.from(this.jobs.values()).map(scheduled => ({ ...scheduled.status }));
  }

  private schedule(scheduled: ScheduledJob): void {
    const timer = setInterval(() => {
      void this.tick(scheduled);
    }, scheduled.job.intervalMs);
    timer.unref();
    scheduled.timer = timer;
  }

  private async tick(scheduled: ScheduledJob): Promise<boolean> {
    const { job, status } = scheduled;
    if (scheduled.current) {
      status.skipped++;
      return false;
    }

    const run = this.execute(job, status);
    scheduled.current = run;
    try {
      await run;
    } finally {
      scheduled.current = null;
    }
    return true;
  }

  /** Never rejects; failures are recorded on the job status */
  private async execute(job: MaintenanceJob, status: JobStatus): Promise<void> {
    const started = this.clock();
    status.running = true;
    status.lastRunAt = started;
    try {
      await job.run();
      status.lastError = null;
    } catch (error) {
      status.failures++;
      status.lastError = error instanceof Error ? error.message : String(error);
      this.metrics.increment('maintenance.failure', 1, { job: job.name });
      this.logger.error(`Maintenance job '${job.name}' failed`, error);
    } finally {
      status.running = false;
      status.runs++;
      status.lastDurationMs = this.clock() - started;
      this.metrics.timing('maintenance.duration_ms', status.lastDurationMs, { job: job.name });
    }
  }
}
