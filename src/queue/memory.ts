/**
 * In-process queue backend.
 *
 * Implements the {@link Queue} contract over a Map so a worker can run in a
 * single process, in tests, or in examples without a remote store. Claimed
 * tasks are handed out as copies; the stored record only changes through the
 * queue's own mutation methods, the same way a remote store would behave.
 *
 * @module
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { TaskRescheduleError, TaskStateError, ValidationError } from '../types/errors.js';
import {
  RetryPolicy,
  TaskState,
  type Queue,
  type RescheduleOptions,
  type Task,
  type TaskWrapper,
} from './types.js';

export const DEFAULT_TASK_TIMEOUT_MS = 300_000;

const AddTaskInputSchema = z.object({
  data: z.string(),
  id: z.string().min(1).optional(),
  retryPolicy: z.nativeEnum(RetryPolicy).default(RetryPolicy.None),
  retryLimit: z.number().int().min(0).default(0),
  retryDelayMs: z.number().min(0).default(0),
  timeoutMs: z.number().positive().default(DEFAULT_TASK_TIMEOUT_MS),
  delayMs: z.number().min(0).default(0),
});

export type AddTaskInput = z.input<typeof AddTaskInputSchema>;

export interface MemoryQueueOptions {
  /** Clock used for eligibility and lease checks (default: Date.now) */
  now?: () => number;
}

interface StoredTask {
  task: Task;
  eligibleAt: number;
  claimKey: string | null;
  leaseUntil: number;
}

/**
 * Delay before retry number `attempt` (1-based) under the given policy.
 */
export function computeRetryDelay(policy: RetryPolicy, baseDelayMs: number, attempt: number): number {
  switch (policy) {
    case RetryPolicy.None:
      return 0;
    case RetryPolicy.Fixed:
      return baseDelayMs;
    case RetryPolicy.Linear:
      return baseDelayMs * attempt;
    case RetryPolicy.Exponential:
      return baseDelayMs * 2 ** (attempt - 1);
  }
}

function copyTask(task: Task): Task {
  return { ...task, result: task.result === null ? null : { ...task.result } };
}

export class MemoryQueue implements Queue {
  readonly name: string;
  private readonly now: () => number;
  private records = new Map<string, StoredTask>();

  constructor(name: string, options: MemoryQueueOptions = {}) {
    this.name = name;
    this.now = options.now ?? Date.now;
  }

  /**
   * Enqueue a task. It becomes eligible for claiming after `delayMs`.
   *
   * @throws ValidationError if the input is malformed or the id is taken
   */
  addTask(input: AddTaskInput): Task {
    const parsed = AddTaskInputSchema.safeParse(input);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(`Invalid task for queue "${this.name}": ${reason}`);
    }
    const options = parsed.data;
    const id = options.id ?? randomUUID();
    if (this.records.has(id)) {
      throw new ValidationError(`Task ${id} already exists in queue "${this.name}"`);
    }

    const task: Task = {
      id,
      state: TaskState.Pending,
      encodedData: options.data,
      result: null,
      retryPolicy: options.retryPolicy,
      retryDelayMs: options.retryDelayMs,
      retryCounter: 0,
      retryLimit: options.retryLimit,
      timeoutMs: options.timeoutMs,
    };
    this.records.set(id, {
      task,
      eligibleAt: this.now() + options.delayMs,
      claimKey: null,
      leaseUntil: 0,
    });
    return copyTask(task);
  }

  async getTask(): Promise<TaskWrapper | null> {
    const now = this.now();
    for (const record of this.records.values()) {
      if (record.task.state !== TaskState.Pending || record.eligibleAt > now) {
        continue;
      }
      const key = randomUUID();
      record.task.state = TaskState.Processing;
      record.claimKey = key;
      record.leaseUntil = now + record.task.timeoutMs;
      return { key, task: copyTask(record.task) };
    }
    return null;
  }

  async completeTask(wrapper: TaskWrapper): Promise<void> {
    const record = this.requireClaim(wrapper);
    record.task.state = TaskState.Completed;
    record.task.result = wrapper.task.result;
    record.claimKey = null;
  }

  async failTask(wrapper: TaskWrapper): Promise<void> {
    const record = this.requireClaim(wrapper);
    record.task.state = TaskState.Failed;
    record.task.result = wrapper.task.result;
    record.claimKey = null;
    wrapper.task.state = TaskState.Failed;
  }

  async autoRescheduleTask(wrapper: TaskWrapper, options: RescheduleOptions = {}): Promise<number> {
    const record = this.requireClaim(wrapper);
    const task = record.task;
    task.result = wrapper.task.result;

    if (!options.force) {
      if (task.retryPolicy === RetryPolicy.None) {
        await this.failTask(wrapper);
        throw new TaskRescheduleError(task.id, 'retry policy is "none"');
      }
      if (task.retryCounter >= task.retryLimit) {
        await this.failTask(wrapper);
        throw new TaskRescheduleError(task.id, `retry limit ${task.retryLimit} reached`);
      }
    }

    const delayMs = this.requeue(task.id, record);
    wrapper.task.state = TaskState.Rescheduled;
    wrapper.task.retryCounter = task.retryCounter;
    return delayMs;
  }

  async buryTasks(): Promise<number> {
    const now = this.now();
    let count = 0;
    for (const [id, record] of [...this.records]) {
      if (record.task.state !== TaskState.Processing || record.leaseUntil > now) {
        continue;
      }
      const task = record.task;
      if (task.retryPolicy !== RetryPolicy.None && task.retryCounter < task.retryLimit) {
        this.requeue(id, record);
      } else {
        task.state = TaskState.Buried;
        record.claimKey = null;
      }
      count += 1;
    }
    return count;
  }

  /** Snapshot of a stored task, or undefined if the id is unknown. */
  getTaskById(id: string): Task | undefined {
    const record = this.records.get(id);
    return record ? copyTask(record.task) : undefined;
  }

  get pendingCount(): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.task.state === TaskState.Pending) count += 1;
    }
    return count;
  }

  // Moves the record to the back so FIFO order holds among eligible tasks.
  private requeue(id: string, record: StoredTask): number {
    const task = record.task;
    task.retryCounter += 1;
    const delayMs = computeRetryDelay(task.retryPolicy, task.retryDelayMs, task.retryCounter);
    task.state = TaskState.Pending;
    record.claimKey = null;
    record.eligibleAt = this.now() + delayMs;
    this.records.delete(id);
    this.records.set(id, record);
    return delayMs;
  }

  private requireClaim(wrapper: TaskWrapper): StoredTask {
    const record = this.records.get(wrapper.task.id);
    if (!record) {
      throw new TaskStateError(wrapper.task.id, `Task ${wrapper.task.id} is not in queue "${this.name}"`);
    }
    if (record.claimKey !== wrapper.key) {
      throw new TaskStateError(
        wrapper.task.id,
        `Claim on task ${wrapper.task.id} is no longer held (lease expired or task already settled)`,
      );
    }
    return record;
  }
}
