/**
 * Process-level entry: run one worker until a termination signal.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { buildWorker } from './build.js';
import type { WorkerSettings } from './settings.js';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGHUP', 'SIGTERM', 'SIGINT'];

/** Subset of `process` used for signal wiring */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface RunWorkerOptions {
  settings: WorkerSettings;
  queueNames: readonly string[];
  maxJobs?: number;
  logger?: Logger;
  gravekeeperLogger?: Logger;
  /** Where to listen for shutdown signals (default: `process`) */
  signals?: SignalSource;
}

/**
 * Run `settings.onStartup`, then a worker over `queueNames` until SIGHUP,
 * SIGTERM or SIGINT asks it to stop and it has drained. `onShutdown` runs
 * once startup succeeded, even if the worker failed.
 */
export async function runWorker(options: RunWorkerOptions): Promise<void> {
  const { settings } = options;
  const logger = options.logger ?? silentLogger;
  const signals = options.signals ?? process;

  await settings.onStartup?.();

  let onSignal: (() => void) | null = null;
  try {
    const worker = buildWorker(settings, options.queueNames, {
      maxJobs: options.maxJobs,
      logger,
      gravekeeperLogger: options.gravekeeperLogger,
    });

    const handler = () => {
      worker.stop();
    };
    onSignal = handler;
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.on(signal, handler);
    }

    await worker.run();
  } finally {
    if (onSignal) {
      for (const signal of SHUTDOWN_SIGNALS) {
        signals.off(signal, onSignal);
      }
    }
    logger.debug('Running shutdown hook');
    await settings.onShutdown?.();
  }
}
