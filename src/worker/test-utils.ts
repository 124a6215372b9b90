import { EventEmitter } from 'node:events';
import { vi, type Mock } from 'vitest';
import { BaseJob } from '../job/base.js';
import type { Job, JobFactory } from '../job/types.js';
import type { Task } from '../queue/types.js';
import type { Logger } from '../utils/logger.js';
import type { SignalSource } from './run.js';

export class Deferred<T = void> {
  resolve: (value: T) => void = () => {};
  reject: (reason: unknown) => void = () => {};
  readonly promise = new Promise<T>((resolve, reject) => {
    this.resolve = resolve;
    this.reject = reject;
  });
}

export type MockLogger = Logger & {
  debug: Mock<(message: string, ...args: unknown[]) => void>;
  info: Mock<(message: string, ...args: unknown[]) => void>;
  warn: Mock<(message: string, ...args: unknown[]) => void>;
  error: Mock<(message: string, ...args: unknown[]) => void>;
};

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<(message: string, ...args: unknown[]) => void>(),
    info: vi.fn<(message: string, ...args: unknown[]) => void>(),
    warn: vi.fn<(message: string, ...args: unknown[]) => void>(),
    error: vi.fn<(message: string, ...args: unknown[]) => void>(),
    setLevel: vi.fn(),
  };
}

export interface GatedJobStats {
  /** Task ids in the order their jobs started running */
  started: string[];
  active: number;
  peak: number;
}

/**
 * Job factory whose jobs block until the test releases them by task id.
 */
export function createGatedFactory(): {
  factory: JobFactory & { createJob: Mock<(task: Task) => Job> };
  stats: GatedJobStats;
  release: (taskId: string) => void;
  releaseAll: () => void;
} {
  const gates = new Map<string, Deferred>();
  const gate = (taskId: string): Deferred => {
    let deferred = gates.get(taskId);
    if (!deferred) {
      deferred = new Deferred();
      gates.set(taskId, deferred);
    }
    return deferred;
  };
  const stats: GatedJobStats = { started: [], active: 0, peak: 0 };

  class GatedJob extends BaseJob {
    protected async run(): Promise<void> {
      stats.started.push(this.task.id);
      stats.active += 1;
      stats.peak = Math.max(stats.peak, stats.active);
      try {
        await gate(this.task.id).promise;
      } finally {
        stats.active -= 1;
      }
    }
  }

  return {
    factory: { createJob: vi.fn<(task: Task) => Job>((task) => new GatedJob(task, {})) },
    stats,
    release: (taskId) => gate(taskId).resolve(),
    releaseAll: () => {
      for (const id of stats.started) gate(id).resolve();
    },
  };
}

/** Stand-in for `process` signal delivery */
export class FakeSignals extends EventEmitter implements SignalSource {
  deliver(signal: NodeJS.Signals): void {
    this.emit(signal);
  }
}
