/**
 * Console logger used by the worker, the gravekeeper and the CLI.
 *
 * Lines are written as `<ISO timestamp> <LEVEL> <prefix> <message>`, with any
 * extra arguments passed straight to the console method.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_LOG_PREFIX = '[taskline]';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

/**
 * @param value - Untrusted input such as a CLI flag or environment variable
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a logger that drops messages below `minLevel`.
 *
 * @param minLevel - Lowest level written (default: 'info')
 * @param prefix - Tag placed after the level, e.g. the component name
 * @returns Logger whose level can be changed later with `setLevel`
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[taskline:worker]');
 * logger.info('Got task 42'); // 2026-01-21T12:00:00.000Z INFO  [taskline:worker] Got task 42
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = DEFAULT_LOG_PREFIX): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < currentLevel) {
      return;
    }
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(line, ...args);
        break;
      case 'info':
        console.info(line, ...args);
        break;
      case 'warn':
        console.warn(line, ...args);
        break;
      case 'error':
        console.error(line, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/** Logger that discards everything; the default for library components. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};
