/**
 * End-to-end worker runs against the in-process queue and the job registry.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { Worker } from '../src/worker/worker.js';
import { MemoryQueue } from '../src/queue/memory.js';
import { RetryPolicy, TaskState } from '../src/queue/types.js';
import { BaseJob } from '../src/job/base.js';
import { SimpleJobFactory, defineJob, encodeJobData } from '../src/job/simple-factory.js';
import { Deferred, createMockLogger } from '../src/worker/test-utils.js';

const AddArgs = z.object({ a: z.number(), b: z.number() });
type AddArgs = z.infer<typeof AddArgs>;

class AddJob extends BaseJob<AddArgs> {
  protected async run({ a, b }: AddArgs) {
    return { sum: a + b };
  }
}

const FlakyArgs = z.object({ failures: z.number().int().min(0) });
type FlakyArgs = z.infer<typeof FlakyArgs>;

const attempts = new Map<string, number>();

class FlakyJob extends BaseJob<FlakyArgs> {
  protected async run({ failures }: FlakyArgs) {
    const attempt = (attempts.get(this.task.id) ?? 0) + 1;
    attempts.set(this.task.id, attempt);
    if (attempt <= failures) {
      throw new Error(`attempt ${attempt} failed`);
    }
    return { attempts: attempt };
  }
}

const gates = new Map<string, Deferred>();

class BlockingJob extends BaseJob {
  protected async run() {
    const gate = new Deferred();
    gates.set(this.task.id, gate);
    await gate.promise;
  }
}

function createFactory(): SimpleJobFactory {
  return new SimpleJobFactory({
    add: defineJob(AddArgs, (task, args) => new AddJob(task, args)),
    flaky: defineJob(FlakyArgs, (task, args) => new FlakyJob(task, args)),
    block: defineJob(z.object({}), (task) => new BlockingJob(task, {})),
  });
}

const running: Array<{ worker: Worker; done: Promise<void> }> = [];

function start(worker: Worker): void {
  running.push({ worker, done: worker.run() });
}

afterEach(async () => {
  for (const gate of gates.values()) gate.resolve();
  gates.clear();
  attempts.clear();
  for (const { worker, done } of running.splice(0)) {
    worker.stop();
    await done;
  }
});

describe('Worker with MemoryQueue', () => {
  it('stores job results on completed tasks across priority queues', async () => {
    const urgent = new MemoryQueue('urgent');
    const normal = new MemoryQueue('normal');
    normal.addTask({ id: 'n1', data: encodeJobData('add', { a: 10, b: 20 }) });
    urgent.addTask({ id: 'u1', data: encodeJobData('add', { a: 2, b: 3 }) });

    const worker = new Worker({ queueList: [urgent, normal], taskFactory: createFactory(), pollIntervalMs: 10 });
    start(worker);

    await vi.waitFor(() => {
      expect(urgent.getTaskById('u1')).toMatchObject({ state: TaskState.Completed, result: { sum: 5 } });
      expect(normal.getTaskById('n1')).toMatchObject({ state: TaskState.Completed, result: { sum: 30 } });
    });
    expect(worker.getStatus()).toMatchObject({ tasksAcquired: 2, tasksCompleted: 2, tasksFailed: 0 });
  });

  it('retries a failing job until it succeeds', async () => {
    const queue = new MemoryQueue('retry');
    queue.addTask({
      id: 'flaky-1',
      data: encodeJobData('flaky', { failures: 2 }),
      retryPolicy: RetryPolicy.Fixed,
      retryLimit: 3,
      retryDelayMs: 0,
    });

    const worker = new Worker({ queueList: [queue], taskFactory: createFactory(), pollIntervalMs: 10 });
    start(worker);

    await vi.waitFor(() => expect(queue.getTaskById('flaky-1')?.state).toBe(TaskState.Completed));
    expect(queue.getTaskById('flaky-1')).toMatchObject({ retryCounter: 2, result: { attempts: 3 } });
    expect(worker.getStatus()).toMatchObject({ tasksRescheduled: 2, tasksCompleted: 1 });
  });

  it('fails a task once its retries are exhausted and keeps the traceback', async () => {
    const queue = new MemoryQueue('exhaust');
    queue.addTask({
      id: 'doomed',
      data: encodeJobData('flaky', { failures: 5 }),
      retryPolicy: RetryPolicy.Linear,
      retryLimit: 1,
      retryDelayMs: 0,
    });
    const logger = createMockLogger();

    const worker = new Worker({ queueList: [queue], taskFactory: createFactory(), logger, pollIntervalMs: 10 });
    start(worker);

    await vi.waitFor(() => expect(queue.getTaskById('doomed')?.state).toBe(TaskState.Failed));
    const task = queue.getTaskById('doomed');
    expect(task?.retryCounter).toBe(1);
    expect(String(task?.result?.traceback)).toContain('Error: attempt 2 failed');
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to reschedule task doomed: Task doomed cannot be rescheduled: retry limit 1 reached',
    );
    expect(worker.getStatus()).toMatchObject({ tasksRescheduled: 1, rescheduleFailures: 1 });
  });

  it('fails tasks whose payload cannot become a job', async () => {
    const queue = new MemoryQueue('bad-input');
    queue.addTask({ id: 'unknown', data: encodeJobData('resize', {}), retryPolicy: RetryPolicy.Fixed, retryLimit: 3 });
    queue.addTask({ id: 'bad-args', data: encodeJobData('add', { a: 'one', b: 2 }) });
    queue.addTask({ id: 'not-json', data: 'add(1, 2)' });

    const worker = new Worker({ queueList: [queue], taskFactory: createFactory(), pollIntervalMs: 10 });
    start(worker);

    await vi.waitFor(() => expect(worker.getStatus().tasksFailed).toBe(3));
    for (const id of ['unknown', 'bad-args', 'not-json']) {
      expect(queue.getTaskById(id)?.state).toBe(TaskState.Failed);
    }
    expect(queue.getTaskById('unknown')?.retryCounter).toBe(0);
  });

  it('buries a task whose lease expires while its job is still running', async () => {
    const queue = new MemoryQueue('slow');
    queue.addTask({ id: 'stuck', data: encodeJobData('block'), timeoutMs: 20 });
    const logger = createMockLogger();
    const gravekeeperLogger = createMockLogger();

    const worker = new Worker({
      queueList: [queue],
      taskFactory: createFactory(),
      logger,
      gravekeeperLogger,
      pollIntervalMs: 10,
      gravekeeperIntervalMs: 10,
    });
    start(worker);

    await vi.waitFor(() => expect(queue.getTaskById('stuck')?.state).toBe(TaskState.Buried));
    expect(gravekeeperLogger.warn).toHaveBeenCalledWith("Buried 1 tasks in queue 'slow'");
    expect(worker.inFlightCount).toBe(1);

    gates.get('stuck')?.resolve();
    await vi.waitFor(() => expect(worker.inFlightCount).toBe(0));

    expect(logger.error).toHaveBeenCalledWith('Failed to report outcome for task stuck', expect.any(Error));
    expect(queue.getTaskById('stuck')?.state).toBe(TaskState.Buried);
  });

  it('finishes running jobs on stop and leaves the rest queued', async () => {
    const queue = new MemoryQueue('drain');
    for (const id of ['d1', 'd2', 'd3']) {
      queue.addTask({ id, data: encodeJobData('block') });
    }

    const worker = new Worker({ queueList: [queue], taskFactory: createFactory(), maxJobs: 2, pollIntervalMs: 10 });
    const done = worker.run();
    await vi.waitFor(() => expect(gates.size).toBe(2));

    worker.stop();
    for (const gate of gates.values()) gate.resolve();
    await done;

    expect(queue.getTaskById('d1')?.state).toBe(TaskState.Completed);
    expect(queue.getTaskById('d2')?.state).toBe(TaskState.Completed);
    expect(queue.getTaskById('d3')?.state).toBe(TaskState.Pending);
    expect(queue.pendingCount).toBe(1);
  });
});
