/**
 * Job contracts consumed by the worker.
 *
 * @module
 */

import type { Task } from '../queue/types.js';

/**
 * One attempt at running a task. Created fresh per attempt and discarded
 * afterwards.
 */
export interface Job {
  /**
   * Start the job's processing and return the promise the worker awaits.
   * A synchronous throw is treated like a failure to build the job.
   */
  process(): Promise<void>;
  /** Best-effort hook run after the task has been reported complete. */
  doPostProcess(): Promise<void>;
  /** Wall time of the last `process()` run in ms, or null if it never ran */
  readonly processDurationMs: number | null;
  /** Wall time of the last `doPostProcess()` run in ms, or null */
  readonly postProcessDurationMs: number | null;
}

/**
 * Builds a job from a claimed task. Throws when the payload is malformed or
 * names an unsupported job type; the worker fails such tasks permanently.
 */
export interface JobFactory {
  createJob(task: Task): Job;
}
