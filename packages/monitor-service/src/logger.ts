import { log, LogLevel } from 'crawlee';
import type { Log } from 'crawlee';

export type Logger = Pick<Log, 'debug' | 'info' | 'warning' | 'error' | 'exception'>;

export const LOG_LEVELS = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

export function configureLogging(level: LogLevelName): void {
  log.setLevel(LOG_LEVELS[level]);
}

export function createLogger(prefix: string): Log {
  return log.child({ prefix });
}
