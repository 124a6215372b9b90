/**
 * Base class for jobs with timing and result capture.
 *
 * @module
 */

import type { Task, TaskResult } from '../queue/types.js';
import { monotonicNow } from '../utils/async.js';
import type { Job } from './types.js';

/**
 * Subclasses implement {@link BaseJob.run}; whatever it resolves to is
 * written to the task's result slot. Override {@link BaseJob.postProcess}
 * for work that should only happen once the queue has recorded success.
 *
 * @example
 * ```typescript
 * class ResizeImageJob extends BaseJob<{ url: string; width: number }> {
 *   protected async run({ url, width }: { url: string; width: number }) {
 *     const out = await resize(url, width);
 *     return { out };
 *   }
 * }
 * ```
 */
export abstract class BaseJob<TArgs = Record<string, unknown>> implements Job {
  readonly task: Task;
  readonly args: TArgs;

  private _processDurationMs: number | null = null;
  private _postProcessDurationMs: number | null = null;

  constructor(task: Task, args: TArgs) {
    this.task = task;
    this.args = args;
  }

  get processDurationMs(): number | null {
    return this._processDurationMs;
  }

  get postProcessDurationMs(): number | null {
    return this._postProcessDurationMs;
  }

  async process(): Promise<void> {
    const startedAt = monotonicNow();
    try {
      const result = await this.run(this.args);
      if (result !== undefined) {
        this.task.result = result;
      }
    } finally {
      this._processDurationMs = monotonicNow() - startedAt;
    }
  }

  async doPostProcess(): Promise<void> {
    const startedAt = monotonicNow();
    try {
      await this.postProcess();
    } finally {
      this._postProcessDurationMs = monotonicNow() - startedAt;
    }
  }

  protected abstract run(args: TArgs): Promise<TaskResult | void>;

  protected async postProcess(): Promise<void> {}
}
