/**
 * Console logging gated by LOG_LEVEL
 */

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'error' || value === 'warn' || value === 'info' || value === 'debug';
}

function enabled(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL;
  const threshold = isLogLevel(configured) ? configured : 'info';
  return LEVEL_ORDER[level] <= LEVEL_ORDER[threshold];
}

export const log = {
  error(...args: unknown[]): void {
    if (enabled('error')) console.error(...args);
  },
  warn(...args: unknown[]): void {
    if (enabled('warn')) console.warn(...args);
  },
  info(...args: unknown[]): void {
    if (enabled('info')) console.log(...args);
  },
  debug(...args: unknown[]): void {
    if (enabled('debug')) console.log(...args);
  },
};
