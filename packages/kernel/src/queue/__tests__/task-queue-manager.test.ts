import { TaskQueueManager } from '../task-queue-manager';
import { KernelConfigInput } from '../../config/kernel-config';
import {
  ConnectionError,
  InvalidTaskStateError,
  QueueFullError,
  ScopeRequiredError,
  TaskNotFoundError,
  ValidationError,
} from '../../errors/kernel-errors';
import { Harness, T0, TENANT_A, TENANT_B, createHarness, rejectionOf } from '@test/helpers';

function setup(overrides: KernelConfigInput = {}): { h: Harness; queue: TaskQueueManager } {
  const h = createHarness(overrides);
  const queue = new TaskQueueManager({
    accessor: h.accessor,
    queues: h.config.queues,
    backoff: h.config.backoff,
    logger: h.logger,
    metrics: h.metrics,
    clock: h.clock.now,
    random: () => 0.5,
  });
  return { h, queue };
}

describe('TaskQueueManager', () => {
  let h: Harness;
  let queue: TaskQueueManager;

  beforeEach(() => {
    ({ h, queue } = setup());
  });

  describe('enqueue', () => {
    it('should queue a task with the type defaults', async () => {
      const task = await queue.enqueue(TENANT_A, 'exports', { reportId: 'r1' }, { metadata: { source: 'api' } });

      expect(task).toMatchObject({
        taskType: 'exports',
        scope: TENANT_A,
        payload: { reportId: 'r1' },
        priority: 1,
        attempts: 0,
        maxAttempts: 3,
        status: 'queued',
        enqueuedAt: T0,
        availableAt: T0,
        metadata: { source: 'api' },
      });
      expect(await queue.get(task.taskId)).toEqual(task);
      expect(await queue.tenantDepth(TENANT_A, 'exports')).toBe(1);
    });

    it('should store the task once when the reply is lost and the call retried', async () => {
      const enqueueTask = h.store.enqueueTask.bind(h.store);
      jest.spyOn(h.store, 'enqueueTask').mockImplementationOnce(async request => {
        await enqueueTask(request);
        throw new ConnectionError('reply lost');
      });

      const task = await queue.enqueue(TENANT_A, 'exports', {});
      expect(await queue.get(task.taskId)).toMatchObject({ status: 'queued' });
      expect(await queue.tenantDepth(TENANT_A, 'exports')).toBe(1);
      const stats = await queue.stats('exports');
      expect(stats.pending).toBe(1);
      expect(stats.counters.enqueued).toBe(1);
    });

    it('should validate options before touching the store', async () => {
      await expect(queue.enqueue(TENANT_A, 'exports', {}, { priority: 3 })).rejects.toBeInstanceOf(ValidationError);
      await expect(queue.enqueue(TENANT_A, 'exports', {}, { priority: -1 })).rejects.toBeInstanceOf(ValidationError);
      await expect(queue.enqueue(TENANT_A, 'exports', {}, { maxAttempts: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(queue.enqueue(TENANT_A, 'exports', {}, { delayMs: -1 })).rejects.toBeInstanceOf(ValidationError);
      await expect(queue.enqueue(undefined, 'exports', {})).rejects.toBeInstanceOf(ScopeRequiredError);
      expect(h.store.operationCount).toBe(0);
    });

    it('should reject tasks once the queue is full', async () => {
      ({ h, queue } = setup({ queues: { exports: { maxSize: 2, priorityLevels: 3, processingTimeoutMs: 1_000, tenantShare: 1 } } }));
      await queue.enqueue(TENANT_A, 'exports', {});
      await queue.enqueue(TENANT_B, 'exports', {});

      const error = await rejectionOf(queue.enqueue(TENANT_A, 'exports', {}));
      expect(error).toBeInstanceOf(QueueFullError);
      expect(error).toMatchObject({ code: 'QUEUE_FULL', message: "Queue 'exports' is full (limit 2)" });
      expect(h.metrics.counter('queue.rejected', { taskType: 'exports', reason: 'queue' })).toBe(1);

      // in-flight tasks do not count towards the size
      await queue.dequeue('exports', 'w1');
      await expect(queue.enqueue(TENANT_B, 'exports', {})).resolves.toMatchObject({ status: 'queued' });
    });

    it('should cap the share a single tenant may hold', async () => {
      ({ h, queue } = setup({ queues: { exports: { maxSize: 4, priorityLevels: 3, processingTimeoutMs: 1_000, tenantShare: 0.5 } } }));
      await queue.enqueue(TENANT_A, 'exports', {});
      await queue.enqueue(TENANT_A, 'exports', {});

      await expect(queue.enqueue(TENANT_A, 'exports', {})).rejects.toThrow(
        "Tenant share of queue 'exports' is full (limit 2)"
      );
      await expect(queue.enqueue(TENANT_B, 'exports', {})).resolves.toMatchObject({ scope: TENANT_B });
    });
  });

  describe('dequeue', () => {
    it('should deliver by priority, then in enqueue order', async () => {
      const low = await queue.enqueue(TENANT_A, 'exports', 'low', { priority: 2 });
      const urgent = await queue.enqueue(TENANT_A, 'exports', 'urgent', { priority: 0 });
      const normal = await queue.enqueue(TENANT_A, 'exports', 'normal', { priority: 1 });
      const urgentLater = await queue.enqueue(TENANT_B, 'exports', 'urgent later', { priority: 0 });

      const order: string[] = [];
      for (let i = 0; i < 4; i++) {
        const task = await queue.dequeue('exports', 'w1');
        if (task) order.push(task.taskId);
      }
      expect(order).toEqual([urgent.taskId, urgentLater.taskId, normal.taskId, low.taskId]);
      expect(await queue.dequeue('exports', 'w1')).toBeNull();
    });

    it('should mark the claimed task as in progress', async () => {
      await queue.enqueue(TENANT_A, 'exports', {});
      h.clock.advance(250);

      const task = await queue.dequeue('exports', 'worker-7');
      expect(task).toMatchObject({ status: 'in_progress', attempts: 1, startedAt: T0 + 250, workerId: 'worker-7' });
      expect((await queue.stats('exports')).inFlight).toBe(1);
    });

    it('should hand each task to exactly one of many concurrent workers', async () => {
      for (let i = 0; i < 5; i++) {
        await queue.enqueue(TENANT_A, 'exports', { n: i });
      }

      const claims = await Promise.all(Array.from({ length: 20 }, (_, i) => queue.dequeue('exports', `w${i}`)));
      const ids = claims.flatMap(task => (task ? [task.taskId] : []));

      expect(ids).toHaveLength(5);
      expect(new Set(ids).size).toBe(5);
    });

    it('should hold delayed tasks back until they are due', async () => {
      const task = await queue.enqueue(TENANT_A, 'exports', {}, { delayMs: 5_000 });

      expect(await queue.dequeue('exports', 'w1')).toBeNull();
      expect((await queue.stats('exports')).delayed).toBe(1);

      h.clock.advance(5_000);
      expect((await queue.dequeue('exports', 'w1'))?.taskId).toBe(task.taskId);
    });

    it('should promote due tasks on demand', async () => {
      await queue.enqueue(TENANT_A, 'exports', {}, { delayMs: 1_000 });
      expect(await queue.promoteDue('exports')).toBe(0);

      h.clock.advance(1_000);
      expect(await queue.promoteDue('exports')).toBe(1);
      expect(await queue.stats('exports')).toMatchObject({ pending: 1, delayed: 0 });
    });

    it('should require a worker id', async () => {
      await expect(queue.dequeue('exports', '')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('complete', () => {
    it('should store the result and release the tenant slot', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');
      h.clock.advance(400);

      const done = await queue.complete(taskId, 'w1', { url: 'https://files.test/r1.csv' });
      expect(done).toMatchObject({ status: 'succeeded', result: { url: 'https://files.test/r1.csv' }, completedAt: T0 + 400 });
      expect(await queue.tenantDepth(TENANT_A, 'exports')).toBe(0);
      expect(h.metrics.snapshot().timings['queue.processing_ms{taskType=exports}']).toMatchObject({ count: 1, sum: 400 });
    });

    it('should refuse tasks that are not in progress', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});

      const error = await rejectionOf(queue.complete(taskId, 'w1'));
      expect(error).toBeInstanceOf(InvalidTaskStateError);
      expect(error).toMatchObject({ actual: 'queued', expected: "in_progress under 'w1'" });
      await expect(queue.complete('missing-task', 'w1')).rejects.toBeInstanceOf(TaskNotFoundError);
    });

    it('should refuse a worker that does not hold the task', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');

      await expect(queue.complete(taskId, 'w2')).rejects.toBeInstanceOf(InvalidTaskStateError);
      await expect(queue.complete(taskId, { workerId: 'w1', attempt: 2 })).rejects.toBeInstanceOf(InvalidTaskStateError);
      expect(await queue.complete(taskId, { workerId: 'w1', attempt: 1 })).toMatchObject({ status: 'succeeded' });
    });

    it('should settle once when the reply is lost and the call retried', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');
      const completeTask = h.store.completeTask.bind(h.store);
      jest.spyOn(h.store, 'completeTask').mockImplementationOnce(async request => {
        await completeTask(request);
        throw new ConnectionError('reply lost');
      });

      expect(await queue.complete(taskId, 'w1', 'done')).toMatchObject({ status: 'succeeded', result: 'done' });
      expect((await queue.stats('exports')).counters.completed).toBe(1);
      expect(await queue.tenantDepth(TENANT_A, 'exports')).toBe(0);
    });
  });

  describe('fail', () => {
    it('should schedule retries with growing delays', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');

      const first = await queue.fail(taskId, 'w1', new Error('upstream 503'));
      expect(first).toMatchObject({ status: 'retry_scheduled', delayMs: 1_000, availableAt: T0 + 1_000 });
      expect(first.task).toMatchObject({ status: 'queued', attempts: 1, lastError: 'upstream 503', workerId: null });
      expect(await queue.dequeue('exports', 'w1')).toBeNull();

      h.clock.advance(1_000);
      expect((await queue.dequeue('exports', 'w1'))?.attempts).toBe(2);
      const second = await queue.fail(taskId, 'w1', 'upstream 503');
      expect(second.status === 'retry_scheduled' ? second.delayMs : 0).toBe(2_000);
    });

    it('should dead-letter a task once its attempts are used up', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {}, { maxAttempts: 2 });
      await queue.dequeue('exports', 'w1');
      await queue.fail(taskId, 'w1', 'bad input');
      h.clock.advance(1_000);
      await queue.dequeue('exports', 'w1');

      const outcome = await queue.fail(taskId, 'w1', 'bad input');
      expect(outcome.status).toBe('dead_lettered');
      expect(outcome.task).toMatchObject({ status: 'dead_lettered', attempts: 2, completedAt: T0 + 1_000 });
      expect(await queue.tenantDepth(TENANT_A, 'exports')).toBe(0);

      const stats = await queue.stats('exports');
      expect(stats).toMatchObject({ pending: 0, delayed: 0, inFlight: 0, deadLettered: 1 });
      expect(stats.counters).toEqual({ enqueued: 1, dequeued: 2, completed: 0, failed: 2, retried: 1, deadLettered: 1 });
    });

    it('should report the same outcome when the reply is lost and the call retried', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');
      const failTask = h.store.failTask.bind(h.store);
      jest.spyOn(h.store, 'failTask').mockImplementationOnce(async request => {
        await failTask(request);
        throw new ConnectionError('reply lost');
      });

      const outcome = await queue.fail(taskId, 'w1', 'upstream 503');
      expect(outcome).toMatchObject({ status: 'retry_scheduled', delayMs: 1_000 });
      expect((await queue.stats('exports')).counters).toMatchObject({ failed: 1, retried: 1, deadLettered: 0 });
    });
  });

  describe('maintenance', () => {
    beforeEach(() => {
      ({ h, queue } = setup({ queues: { exports: { maxSize: 10, priorityLevels: 3, processingTimeoutMs: 1_000 } } }));
    });

    it('should recover tasks whose worker missed the processing deadline', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');

      expect(await queue.recoverStalled('exports')).toBe(0);
      h.clock.advance(1_000);
      expect(await queue.recoverStalled('exports')).toBe(1);

      expect(await queue.get(taskId)).toMatchObject({ status: 'queued', lastError: 'Processing timeout exceeded' });
      expect(h.metrics.counter('queue.stalled_recovered', { taskType: 'exports' })).toBe(1);
    });

    it('should refuse a late report from a worker whose task was recovered', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');
      h.clock.advance(1_000);
      expect(await queue.recoverStalled('exports')).toBe(1);
      h.clock.advance(1_000);
      expect(await queue.dequeue('exports', 'w2')).toMatchObject({ taskId, workerId: 'w2', attempts: 2 });

      const error = await rejectionOf(queue.fail(taskId, 'w1', 'late failure'));
      expect(error).toBeInstanceOf(InvalidTaskStateError);
      expect(error).toMatchObject({ actual: 'in_progress' });
      expect(await queue.dequeue('exports', 'w3')).toBeNull();
      await expect(queue.complete(taskId, 'w1')).rejects.toBeInstanceOf(InvalidTaskStateError);
      expect(await queue.complete(taskId, 'w2', 'done')).toMatchObject({ status: 'succeeded', workerId: 'w2' });
    });

    it('should purge index entries without a live task', async () => {
      await queue.enqueue(TENANT_A, 'exports', {});
      await h.store.zadd('queue:exports:priority', 5, 'ghost');

      expect(await queue.purgeFinished('exports')).toBe(1);
      expect((await queue.stats('exports')).pending).toBe(1);
    });

    it('should report counters and publish the depth gauge', async () => {
      const { taskId } = await queue.enqueue(TENANT_A, 'exports', {});
      await queue.enqueue(TENANT_A, 'exports', {});
      await queue.dequeue('exports', 'w1');
      await queue.complete(taskId, 'w1');

      const stats = await queue.stats('exports');
      expect(stats).toMatchObject({ taskType: 'exports', pending: 1, inFlight: 0, maxSize: 10 });
      expect(stats.counters).toMatchObject({ enqueued: 2, dequeued: 1, completed: 1 });
      expect(h.metrics.gaugeValue('queue.depth', { taskType: 'exports' })).toBe(1);
    });

    it('should report every queue type', async () => {
      const depths = await queue.depths();
      expect(Object.keys(depths)).toEqual(['embeddings', 'background-jobs', 'exports', 'notifications', 'cleanup', 'health-checks']);
    });
  });
});
