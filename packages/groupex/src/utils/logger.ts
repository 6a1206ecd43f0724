/**
 * Levelled console logger shared by the parser, grammar loader and CLI.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta, error?: Error): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = '[groupex]';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function formatLine(level: string, message: string, meta?: LogMeta): string {
  const base = `${PREFIX} ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(meta)}`;
}

/**
 * Create a logger that drops every entry below `level`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.debug('Parsed expression', { length: 12 });
 * ```
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_PRIORITY[level];
  const enabled = (entry: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_PRIORITY[entry] >= threshold;

  return {
    debug(message, meta) {
      if (enabled('debug')) console.debug(formatLine('debug', message, meta));
    },
    info(message, meta) {
      if (enabled('info')) console.info(formatLine('info', message, meta));
    },
    warn(message, meta) {
      if (enabled('warn')) console.warn(formatLine('warn', message, meta));
    },
    error(message, meta, error) {
      if (!enabled('error')) return;
      console.error(formatLine('error', message, meta));
      if (error?.stack) {
        console.error(error.stack);
      }
    },
  };
}
