/**
 * Worker that pulls tasks from a prioritized list of queues and runs them as
 * jobs with bounded concurrency.
 *
 * The worker owns three loops on the event loop:
 * - the **main loop**, which claims tasks while admission allows and
 *   otherwise sleeps until the poll ticker or a stop request wakes it;
 * - the **poll ticker**, which wakes the main loop every `pollIntervalMs`;
 * - the **gravekeeper**, which asks every queue to reclaim stale tasks every
 *   `gravekeeperIntervalMs`.
 *
 * Each claimed task gets its own handler. A handler always ends in exactly one
 * of `completeTask`, `failTask` or a reschedule attempt on the task's queue.
 *
 * @module
 */

import { z } from 'zod';
import type { JobFactory, Job } from '../job/types.js';
import { TaskState, type Queue, type TaskWrapper } from '../queue/types.js';
import { TaskRescheduleError, WorkerConfigError, WorkerStateError } from '../types/errors.js';
import { formatTraceback, toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { AsyncEvent, waitForAny } from './async-event.js';
import { startPeriodic, type PeriodicHandle } from './periodic.js';

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_MAX_JOBS = 8;
export const DEFAULT_GRAVEKEEPER_INTERVAL_MS = 30_000;

const WorkerTuningSchema = z.object({
  pollIntervalMs: z.number().positive().finite().default(DEFAULT_POLL_INTERVAL_MS),
  maxJobs: z.number().int().positive().default(DEFAULT_MAX_JOBS),
  gravekeeperIntervalMs: z.number().positive().finite().default(DEFAULT_GRAVEKEEPER_INTERVAL_MS),
});

export type WorkerTuning = z.input<typeof WorkerTuningSchema>;

export interface WorkerConfig extends WorkerTuning {
  /** Queues in priority order; the first queue with work wins each cycle */
  queueList: readonly Queue[];
  taskFactory: JobFactory;
  logger?: Logger;
  /** Logger for reclamation messages (default: `logger`) */
  gravekeeperLogger?: Logger;
}

export type WorkerState = 'idle' | 'running' | 'stopping' | 'drained';

export interface WorkerStatus {
  state: WorkerState;
  queues: string[];
  maxJobs: number;
  tasksInFlight: number;
  tasksAcquired: number;
  tasksCompleted: number;
  tasksFailed: number;
  tasksRescheduled: number;
  rescheduleFailures: number;
  tasksBuried: number;
}

// ============================================================================
// Worker
// ============================================================================

/**
 * @example
 * ```typescript
 * const worker = new Worker({
 *   queueList: [urgent, normal],
 *   taskFactory: new SimpleJobFactory({ resize }),
 *   maxJobs: 4,
 *   logger: createLogger('info', '[taskline:worker]'),
 * });
 *
 * process.on('SIGTERM', () => worker.stop());
 * await worker.run(); // resolves after stop() and drain
 * ```
 */
export class Worker {
  readonly queueList: readonly Queue[];
  readonly taskFactory: JobFactory;

  /** Pulsed each time `run()` starts */
  readonly started = new AsyncEvent();
  /** Pulsed each time a task is claimed */
  readonly gotTask = new AsyncEvent();
  /** Pulsed each time a handler finishes, whatever its outcome */
  readonly completedTask = new AsyncEvent();

  private readonly pollIntervalMs: number;
  private readonly maxJobs: number;
  private readonly gravekeeperIntervalMs: number;
  private readonly logger: Logger;
  private readonly gravekeeperLogger: Logger;

  private readonly pollEvent = new AsyncEvent();
  private readonly stopEvent = new AsyncEvent();
  private readonly jobHandlers = new Set<Promise<void>>();
  private _state: WorkerState = 'idle';

  private metrics = {
    tasksAcquired: 0,
    tasksCompleted: 0,
    tasksFailed: 0,
    tasksRescheduled: 0,
    rescheduleFailures: 0,
    tasksBuried: 0,
  };

  /**
   * @throws WorkerConfigError if a tuning option is out of range or the
   *   queue list is empty
   */
  constructor(config: WorkerConfig) {
    const tuning = WorkerTuningSchema.safeParse({
      pollIntervalMs: config.pollIntervalMs,
      maxJobs: config.maxJobs,
      gravekeeperIntervalMs: config.gravekeeperIntervalMs,
    });
    if (!tuning.success) {
      const fields = tuning.error.issues.map((issue) => issue.path.join('.'));
      const reason = tuning.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new WorkerConfigError(fields, reason);
    }
    if (config.queueList.length === 0) {
      throw new WorkerConfigError(['queueList'], 'queueList: at least one queue is required');
    }

    this.queueList = [...config.queueList];
    this.taskFactory = config.taskFactory;
    this.pollIntervalMs = tuning.data.pollIntervalMs;
    this.maxJobs = tuning.data.maxJobs;
    this.gravekeeperIntervalMs = tuning.data.gravekeeperIntervalMs;
    this.logger = config.logger ?? silentLogger;
    this.gravekeeperLogger = config.gravekeeperLogger ?? this.logger;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get state(): WorkerState {
    return this._state;
  }

  /** Admission control: true while fewer than `maxJobs` handlers are in flight. */
  get shouldGetNewTask(): boolean {
    return this.jobHandlers.size < this.maxJobs;
  }

  get inFlightCount(): number {
    return this.jobHandlers.size;
  }

  getStatus(): WorkerStatus {
    return {
      state: this._state,
      queues: this.queueList.map((queue) => queue.name),
      maxJobs: this.maxJobs,
      tasksInFlight: this.jobHandlers.size,
      ...this.metrics,
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Run until {@link Worker.stop} is called, then wait for every in-flight
   * handler to finish. There is no drain timeout: a stuck job keeps `run()`
   * pending.
   *
   * @throws WorkerStateError if the worker is already running
   */
  async run(): Promise<void> {
    if (this._state === 'running' || this._state === 'stopping') {
      throw new WorkerStateError('Worker is already running');
    }

    this.logger.info(`Starting worker, queue list: ${this.queueList.map((q) => q.name).join(', ')}`);
    this._state = 'running';
    this.stopEvent.clear();
    this.started.pulse();

    const poller = startPeriodic(
      () => this.pollEvent.set(),
      this.pollIntervalMs,
      (err) => this.logger.error('Poll ticker failed', err),
    );
    const gravekeeper = startPeriodic(
      (signal) => this.callGravekeeper(signal),
      this.gravekeeperIntervalMs,
      (err) => this.gravekeeperLogger.error('Gravekeeper tick failed', err),
    );

    try {
      while (!this.stopEvent.isSet) {
        if (this.shouldGetNewTask) {
          const fetched = await this.tryFetchTask();
          if (fetched) continue;
        }
        await this.waitPoll();
      }

      this._state = 'stopping';
      await this.completePendingJobs();
    } finally {
      this.cancelLoops(poller, gravekeeper);
      this._state = 'drained';
    }
    this.logger.info('Worker stopped');
  }

  /**
   * Request a graceful stop. Safe to call repeatedly and from signal
   * handlers; returns immediately. In-flight handlers are not interrupted.
   */
  stop(): void {
    if (this.stopEvent.isSet) {
      return;
    }
    this.logger.info('Stopping worker');
    this.stopEvent.set();
    this.pollEvent.set();
  }

  private async waitPoll(): Promise<void> {
    await waitForAny([this.pollEvent, this.stopEvent]);
    this.pollEvent.clear();
  }

  private cancelLoops(...handles: PeriodicHandle[]): void {
    for (const handle of handles) {
      handle.cancel();
    }
  }

  private async completePendingJobs(): Promise<void> {
    if (this.jobHandlers.size === 0) {
      this.logger.info('No running jobs; exiting');
      return;
    }
    this.logger.info(`Waiting for ${this.jobHandlers.size} running job(s) to finish`);
    await Promise.all([...this.jobHandlers]);
  }

  // ==========================================================================
  // Fetch & dispatch
  // ==========================================================================

  /**
   * Try each queue in priority order and dispatch the first task claimed.
   * A queue that throws is skipped for this cycle. A stop request ends the
   * cycle before the next queue is asked.
   */
  private async tryFetchTask(): Promise<boolean> {
    for (const queue of this.queueList) {
      if (this.stopEvent.isSet) return false;
      this.logger.debug(`Requesting new task from queue ${queue.name}`);

      let wrapper: TaskWrapper | null;
      try {
        wrapper = await queue.getTask();
      } catch (err) {
        this.logger.error(`Error getting task from queue ${queue.name}`, err);
        continue;
      }

      if (!wrapper) continue;

      this.startTaskProcessing(wrapper, queue);
      return true;
    }
    return false;
  }

  private startTaskProcessing(wrapper: TaskWrapper, queue: Queue): void {
    this.logger.info(`Got task ${wrapper.task.id}`);
    this.logger.debug(`Task data: ${wrapper.task.encodedData}`);
    this.metrics.tasksAcquired++;
    this.gotTask.pulse();

    const handler: Promise<void> = this.handleTask(wrapper, queue)
      .catch((err: unknown) => {
        this.logger.error(`Failed to report outcome for task ${wrapper.task.id}`, err);
      })
      .finally(() => {
        this.jobHandlers.delete(handler);
        this.completedTask.pulse();
      });
    this.jobHandlers.add(handler);
  }

  private async handleTask(wrapper: TaskWrapper, queue: Queue): Promise<void> {
    const taskId = wrapper.task.id;

    let job: Job;
    try {
      job = this.taskFactory.createJob(wrapper.task);
    } catch (err) {
      this.logger.error(`Failed to create job for task ${taskId}`, err);
      await this.failTask(wrapper, queue);
      return;
    }

    let processing: Promise<void>;
    try {
      processing = job.process();
    } catch (err) {
      this.logger.error(`Failed to start job for task ${taskId}`, err);
      await this.failTask(wrapper, queue);
      return;
    }

    this.logger.info(`Starting job for task ${taskId}`);
    try {
      await processing;
    } catch (err) {
      this.logger.error(`Exception in job for task ${taskId}`, err);
      wrapper.task.result = { traceback: formatTraceback(err) };
      await this.tryRescheduleTask(wrapper, queue);
      return;
    }

    wrapper.task.state = TaskState.Completed;
    await queue.completeTask(wrapper);
    this.metrics.tasksCompleted++;

    try {
      await job.doPostProcess();
    } catch (err) {
      this.logger.error(`Exception in job post processing for task ${taskId}`, err);
    }

    this.logger.info(
      `Finished task ${taskId} after ${formatDuration(job.processDurationMs)} ` +
        `(${formatDuration(job.postProcessDurationMs)} postprocessing) with state ${wrapper.task.state}`,
    );
  }

  private async failTask(wrapper: TaskWrapper, queue: Queue): Promise<void> {
    await queue.failTask(wrapper);
    this.metrics.tasksFailed++;
  }

  // ==========================================================================
  // Reschedule
  // ==========================================================================

  /**
   * Ask `queue` to schedule another attempt of the wrapped task. A refusal
   * is logged as a warning; the queue decides the task's final state.
   */
  async tryRescheduleTask(
    wrapper: TaskWrapper,
    queue: Queue,
    options: { force?: boolean } = {},
  ): Promise<void> {
    const taskId = wrapper.task.id;
    let delayMs: number;
    try {
      delayMs = await queue.autoRescheduleTask(wrapper, { force: options.force ?? false });
    } catch (err) {
      this.metrics.rescheduleFailures++;
      if (err instanceof TaskRescheduleError) {
        this.logger.warn(`Failed to reschedule task ${taskId}: ${err.message}`);
      } else {
        this.logger.error(`Error rescheduling task ${taskId} in queue ${queue.name}: ${toErrorMessage(err)}`, err);
      }
      return;
    }

    this.metrics.tasksRescheduled++;
    this.logger.info(`Rescheduling task ${taskId}, next try after ${delayMs}ms`);
  }

  // ==========================================================================
  // Gravekeeper
  // ==========================================================================

  private async callGravekeeper(signal: AbortSignal): Promise<void> {
    for (const queue of this.queueList) {
      if (signal.aborted) return;

      let buried: number;
      try {
        buried = await queue.buryTasks();
      } catch (err) {
        this.gravekeeperLogger.error(`Failed to bury tasks in queue '${queue.name}'`, err);
        continue;
      }

      if (buried > 0) {
        this.metrics.tasksBuried += buried;
        this.gravekeeperLogger.warn(`Buried ${buried} tasks in queue '${queue.name}'`);
      }
    }
  }
}

function formatDuration(ms: number | null): string {
  return ms === null ? 'n/a' : `${Math.round(ms)}ms`;
}
