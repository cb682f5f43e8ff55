export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Read on every call so LOG_LEVEL set after import (e.g. by dotenv) still applies
function currentLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

/**
 * Console logger. Messages follow the `[Component] message` convention used
 * throughout the codebase; extra values are passed straight to console.
 */
export const logger = {
  debug(message: string, ...details: unknown[]): void {
    if (enabled('debug')) console.debug(message, ...details);
  },
  info(message: string, ...details: unknown[]): void {
    if (enabled('info')) console.log(message, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled('warn')) console.warn(message, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    if (enabled('error')) console.error(message, ...details);
  },
};
