import { vi, type Mock } from 'vitest';
import { RetryPolicy, TaskState } from './types.js';
import type { Queue, RescheduleOptions, Task, TaskWrapper } from './types.js';

let nextId = 0;

export function createTask(overrides: Partial<Task> = {}): Task {
  nextId += 1;
  return {
    id: `task-${nextId}`,
    state: TaskState.Processing,
    encodedData: '{"name":"noop"}',
    result: null,
    retryPolicy: RetryPolicy.None,
    retryDelayMs: 0,
    retryCounter: 0,
    retryLimit: 0,
    timeoutMs: 300_000,
    ...overrides,
  };
}

export function createWrapper(overrides: Partial<Task> = {}): TaskWrapper {
  const task = createTask(overrides);
  return { key: `key-${task.id}`, task };
}

export type MockQueue = Queue & {
  getTask: Mock<() => Promise<TaskWrapper | null>>;
  completeTask: Mock<(wrapper: TaskWrapper) => Promise<void>>;
  failTask: Mock<(wrapper: TaskWrapper) => Promise<void>>;
  autoRescheduleTask: Mock<(wrapper: TaskWrapper, options?: RescheduleOptions) => Promise<number>>;
  buryTasks: Mock<() => Promise<number>>;
};

/**
 * Queue whose `getTask` hands out the given wrappers in order, then null.
 */
export function createMockQueue(name: string, wrappers: TaskWrapper[] = []): MockQueue {
  const pending = [...wrappers];
  return {
    name,
    getTask: vi.fn<() => Promise<TaskWrapper | null>>(async () => pending.shift() ?? null),
    completeTask: vi.fn<(wrapper: TaskWrapper) => Promise<void>>(async () => {}),
    failTask: vi.fn<(wrapper: TaskWrapper) => Promise<void>>(async () => {}),
    autoRescheduleTask: vi.fn<(wrapper: TaskWrapper, options?: RescheduleOptions) => Promise<number>>(
      async () => 5000,
    ),
    buryTasks: vi.fn<() => Promise<number>>(async () => 0),
  };
}
