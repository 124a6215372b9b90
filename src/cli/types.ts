import type { LogLevel } from '../utils/logger.js';
import type { SignalSource } from '../worker/run.js';

export interface ParsedArgv {
  positional: string[];
  flags: Record<string, string | number | boolean>;
}

export type CliStatusCode = 0 | 1 | 2;

export interface CliRunOptions {
  argv?: string[];
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Directory the settings module path is resolved against */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signals?: SignalSource;
}

export interface WorkerCliOptions {
  settingsModule: string;
  queueNames: string[];
  maxJobs: number;
  logLevel: LogLevel;
}
