import type { Logger } from '../utils/logger.js';
import { DEFAULT_QUEUE_NAMESPACE, type WorkerSettings } from './settings.js';
import { DEFAULT_MAX_JOBS, Worker } from './worker.js';

export interface BuildWorkerOptions {
  maxJobs?: number;
  logger?: Logger;
  gravekeeperLogger?: Logger;
}

/**
 * Create a {@link Worker} over the named queues, highest priority first.
 *
 * @throws WorkerConfigError if `queueNames` is empty or an option is invalid
 */
export function buildWorker(
  settings: WorkerSettings,
  queueNames: readonly string[],
  options: BuildWorkerOptions = {},
): Worker {
  const namespace = settings.queueNamespace ?? DEFAULT_QUEUE_NAMESPACE;
  return new Worker({
    queueList: queueNames.map((name) => settings.createQueue(name, namespace)),
    taskFactory: settings.createJobFactory(),
    maxJobs: options.maxJobs ?? DEFAULT_MAX_JOBS,
    pollIntervalMs: settings.worker?.pollIntervalMs,
    gravekeeperIntervalMs: settings.worker?.gravekeeperIntervalMs,
    logger: options.logger,
    gravekeeperLogger: options.gravekeeperLogger,
  });
}
