/**
 * Leveled logging used across the engine.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = '[tagvalid]';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (
    at: Exclude<LogLevel, 'silent'>,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (LEVEL_RANK[at] < threshold) return;
    if (meta && Object.keys(meta).length > 0) {
      sink[at](`${PREFIX} ${message}`, meta);
    } else {
      sink[at](`${PREFIX} ${message}`);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
