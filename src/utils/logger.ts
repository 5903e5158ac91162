/**
 * Tagged stderr logger.
 *
 * Every engine class writes `[Tag] message` lines through console.error so
 * that stdout stays free for CLI output. A logger created with a level uses
 * it; the others follow the process-wide threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  readonly tag: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string, level?: LogLevel): Logger {
  const write = (messageLevel: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[messageLevel] < LEVEL_ORDER[level ?? threshold]) {
      return;
    }
    console.error(`[${tag}] ${message}`, ...details);
  };

  return {
    tag,
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details)
  };
}
