/**
 * taskline-worker - worker-side execution engine for a distributed task queue
 *
 * Re-exports the worker, the queue and job contracts, the in-process
 * reference queue, settings loading and the shared error and logging types.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Worker
export {
  Worker,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_MAX_JOBS,
  DEFAULT_GRAVEKEEPER_INTERVAL_MS,
  type WorkerConfig,
  type WorkerTuning,
  type WorkerState,
  type WorkerStatus,
} from './worker/worker.js';
export { AsyncEvent, waitForAny } from './worker/async-event.js';
export { startPeriodic, type PeriodicHandle } from './worker/periodic.js';
export { buildWorker, type BuildWorkerOptions } from './worker/build.js';
export { runWorker, SHUTDOWN_SIGNALS, type RunWorkerOptions, type SignalSource } from './worker/run.js';
export {
  loadSettings,
  parseWorkerSettings,
  parseSettingsSpecifier,
  DEFAULT_QUEUE_NAMESPACE,
  type WorkerSettings,
  type SettingsSpecifier,
} from './worker/settings.js';

// Queues
export {
  TaskState,
  RetryPolicy,
  type Task,
  type TaskResult,
  type TaskWrapper,
  type Queue,
  type RescheduleOptions,
} from './queue/types.js';
export {
  MemoryQueue,
  computeRetryDelay,
  DEFAULT_TASK_TIMEOUT_MS,
  type AddTaskInput,
  type MemoryQueueOptions,
} from './queue/memory.js';

// Jobs
export type { Job, JobFactory } from './job/types.js';
export { BaseJob } from './job/base.js';
export {
  SimpleJobFactory,
  defineJob,
  encodeJobData,
  decodeJobData,
  type JobDefinition,
  type JobPayload,
} from './job/simple-factory.js';

// Errors
export {
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  RuntimeError,
  ValidationError,
  WorkerConfigError,
  WorkerStateError,
  JobCreationError,
  TaskRescheduleError,
  TaskStateError,
  SettingsLoadError,
  isRuntimeError,
} from './types/errors.js';

// Utilities
export {
  type Logger,
  type LogLevel,
  createLogger,
  silentLogger,
  isLogLevel,
  DEFAULT_LOG_PREFIX,
} from './utils/logger.js';
export { sleep, toErrorMessage, formatTraceback } from './utils/async.js';

// CLI
export { runCli, parseArgv } from './cli/index.js';
export type { CliRunOptions, CliStatusCode, ParsedArgv } from './cli/types.js';
