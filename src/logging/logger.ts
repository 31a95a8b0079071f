/**
 * Logger — Tag-prefixed console output filtered by `runtime.logLevel`.
 *
 * Lines look like `[Engine] Step 120 | t=1.20 | 0.4ms`. The threshold is
 * process-wide; call `setLogLevel()` once at startup.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (isLevelEnabled('debug')) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (isLevelEnabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (isLevelEnabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (isLevelEnabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
