/**
 * Task, wrapper and queue contracts shared by the worker and queue backends.
 *
 * @module
 */

// ============================================================================
// Task State
// ============================================================================

/**
 * Lifecycle of one task attempt. A task moves pending → processing → one of
 * completed / failed / rescheduled / buried; a rescheduled task returns to
 * pending for its next attempt.
 */
export enum TaskState {
  Pending = 'pending',
  Processing = 'processing',
  Completed = 'completed',
  Failed = 'failed',
  Rescheduled = 'rescheduled',
  Buried = 'buried',
}

/**
 * How a queue spaces out retries of a failed task.
 */
export enum RetryPolicy {
  /** Never retry */
  None = 'none',
  /** Same delay before every retry */
  Fixed = 'fixed',
  /** delay × attempt */
  Linear = 'linear',
  /** delay × 2^(attempt - 1) */
  Exponential = 'exponential',
}

// ============================================================================
// Task
// ============================================================================

/**
 * What a handler leaves in a task's result slot: a job's return value on
 * success, or diagnostics such as a rendered traceback on failure.
 */
export type TaskResult = Record<string, unknown>;

export interface Task {
  /** Opaque identifier assigned by the queue */
  readonly id: string;
  state: TaskState;
  /** Payload interpreted only by the job factory */
  readonly encodedData: string;
  result: TaskResult | null;
  readonly retryPolicy: RetryPolicy;
  /** Base delay used by the retry policy */
  readonly retryDelayMs: number;
  /** Retries already scheduled for this task */
  retryCounter: number;
  /** Maximum number of retries */
  readonly retryLimit: number;
  /** Claim lease length; a processing task older than this is stale */
  readonly timeoutMs: number;
}

/**
 * A claimed task together with the key its queue needs to find the same
 * claim again. Only queues create wrappers.
 */
export interface TaskWrapper {
  readonly key: string;
  readonly task: Task;
}

// ============================================================================
// Queue
// ============================================================================

export interface RescheduleOptions {
  /** Skip the retry policy and limit checks */
  force?: boolean;
}

/**
 * A named, durable source of tasks.
 *
 * Implementations talk to whatever store backs them; the worker only relies
 * on this contract.
 */
export interface Queue {
  /** Stable identifier used in logs */
  readonly name: string;
  /**
   * Atomically claim the next eligible task, or resolve to `null` when none
   * is available. A task must never be handed to two callers at once.
   */
  getTask(): Promise<TaskWrapper | null>;
  /** Record a successful attempt. */
  completeTask(wrapper: TaskWrapper): Promise<void>;
  /** Mark the task permanently failed; no further retries. */
  failTask(wrapper: TaskWrapper): Promise<void>;
  /**
   * Schedule another attempt and resolve to the delay in ms before the task
   * becomes eligible again. Rejects with `TaskRescheduleError` when the
   * retry policy forbids it.
   */
  autoRescheduleTask(wrapper: TaskWrapper, options?: RescheduleOptions): Promise<number>;
  /** Reclaim tasks whose lease has gone stale; resolves to how many. */
  buryTasks(): Promise<number>;
}
