/**
 * `taskline-worker` command line.
 *
 * @module
 */

import { ValidationError, isRuntimeError, RuntimeErrorCodes } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import { createLogger, isLogLevel, type LogLevel } from '../utils/logger.js';
import { runWorker } from '../worker/run.js';
import { loadSettings } from '../worker/settings.js';
import { DEFAULT_MAX_JOBS } from '../worker/worker.js';
import type { CliRunOptions, CliStatusCode, ParsedArgv, WorkerCliOptions } from './types.js';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const LOG_LEVEL_ENV = 'TASKLINE_LOG_LEVEL';
const KNOWN_FLAGS = new Set(['help', 'h', 'max-jobs', 'log-level']);

function buildHelp(): string {
  return [
    'taskline-worker [--help] <settings-module> <queue...> [options]',
    '',
    'Runs a worker that pulls tasks from the given queues, highest priority first,',
    'until it receives SIGHUP, SIGTERM or SIGINT.',
    '',
    'Arguments:',
    '  <settings-module>   Path to a module exporting worker settings, optionally',
    '                      followed by #<export> (default export: settings, then default)',
    '  <queue...>          Queue names in priority order',
    '',
    'Options:',
    '  -h, --help                         Show this usage',
    `      --max-jobs <n>                 Maximum concurrent jobs (default: ${DEFAULT_MAX_JOBS})`,
    `      --log-level debug|info|warn|error  Log verbosity (default: $${LOG_LEVEL_ENV} or ${DEFAULT_LOG_LEVEL})`,
  ].join('\n');
}

export function parseArgv(argv: string[]): ParsedArgv {
  const positional: string[] = [];
  const flags: Record<string, string | number | boolean> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--') {
      positional.push(...argv.slice(index + 1));
      break;
    }

    if (!token.startsWith('-') || token === '-') {
      positional.push(token);
      continue;
    }

    if (token === '-h') {
      flags.h = true;
      continue;
    }

    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }

    const body = token.slice(2);
    if (!body) {
      continue;
    }

    const eq = body.indexOf('=');
    if (eq !== -1) {
      flags[body.slice(0, eq)] = parseStringValue(body.slice(eq + 1));
      continue;
    }

    const next = argv[index + 1];
    if (next !== undefined && !next.startsWith('-')) {
      flags[body] = parseStringValue(next);
      index += 1;
      continue;
    }

    flags[body] = true;
  }

  return { positional, flags };
}

function parseStringValue(raw: string): string | number | boolean {
  const lowered = raw.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  if (/^-?\d+$/.test(raw) && raw.length <= 15) {
    return Number.parseInt(raw, 10);
  }
  return raw;
}

/**
 * @throws ValidationError on a missing argument, an unknown flag or a bad value
 */
export function normalizeOptions(parsed: ParsedArgv, env: NodeJS.ProcessEnv = {}): WorkerCliOptions {
  const unknown = Object.keys(parsed.flags).filter((name) => !KNOWN_FLAGS.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown option: --${unknown[0]}`);
  }

  const [settingsModule, ...queueNames] = parsed.positional;
  if (settingsModule === undefined) {
    throw new ValidationError('Missing <settings-module> argument');
  }
  if (queueNames.length === 0) {
    throw new ValidationError('At least one queue name is required');
  }

  const rawMaxJobs = parsed.flags['max-jobs'] ?? DEFAULT_MAX_JOBS;
  if (typeof rawMaxJobs !== 'number' || rawMaxJobs < 1) {
    throw new ValidationError(`--max-jobs must be a positive integer, got ${String(rawMaxJobs)}`);
  }

  const rawLevel = parsed.flags['log-level'] ?? env[LOG_LEVEL_ENV] ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(rawLevel)) {
    throw new ValidationError(`--log-level must be one of debug, info, warn, error; got ${String(rawLevel)}`);
  }

  return { settingsModule, queueNames, maxJobs: rawMaxJobs, logLevel: rawLevel };
}

export async function runCli(options: CliRunOptions = {}): Promise<CliStatusCode> {
  const argv = options.argv ?? process.argv.slice(2);
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;

  const parsed = parseArgv(argv);
  if (parsed.flags.help || parsed.flags.h) {
    stdout.write(`${buildHelp()}\n`);
    return 0;
  }

  let cli: WorkerCliOptions;
  try {
    cli = normalizeOptions(parsed, env);
  } catch (error) {
    stderr.write(`error: ${toErrorMessage(error)}\n\n${buildHelp()}\n`);
    return 2;
  }

  const logger = createLogger(cli.logLevel, '[taskline:worker]');
  const gravekeeperLogger = createLogger(cli.logLevel, '[taskline:gravekeeper]');

  try {
    const settings = await loadSettings(cli.settingsModule, options.cwd);
    await runWorker({
      settings,
      queueNames: cli.queueNames,
      maxJobs: cli.maxJobs,
      logger,
      gravekeeperLogger,
      signals: options.signals,
    });
  } catch (error) {
    if (isRuntimeError(error, RuntimeErrorCodes.SETTINGS_LOAD_ERROR)) {
      stderr.write(`error: ${error.message}\n`);
    } else {
      logger.error('Worker failed', error);
    }
    return 1;
  }

  return 0;
}
