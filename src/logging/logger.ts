/**
 * Logger: scoped console output in the `[Scope] message` format used across
 * the shim, filtered by a process-wide level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger for a nested scope, e.g. `Engine:tk-host`. */
  child(scope: string): Logger;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    scope,

    debug(message: string, ...details: unknown[]): void {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },

    info(message: string, ...details: unknown[]): void {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },

    warn(message: string, ...details: unknown[]): void {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },

    error(message: string, ...details: unknown[]): void {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },

    child(childScope: string): Logger {
      return createLogger(`${scope}:${childScope}`);
    },
  };
}
