/**
 * @fileoverview Logging for the dispatch layer
 */

/**
 * Logger interface used by the mediator and pipeline behaviours.
 *
 * Any logger with these four methods fits (pino, winston, console).
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels in increasing severity. `silent` disables output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Logger that drops everything.
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Wrap a logger so that messages below `level` are dropped.
 *
 * @example
 * ```typescript
 * const logger = createLogger('warn');
 * logger.info('dropped');
 * logger.warn('printed');
 * ```
 */
export function createLogger(level: LogLevel, sink: ILogger = consoleLogger): ILogger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean =>
    LOG_LEVELS.indexOf(candidate) >= threshold && level !== 'silent';

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) sink.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) sink.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) sink.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) sink.error(message, ...args);
    },
  };
}
