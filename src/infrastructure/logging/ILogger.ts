/**
 * @fileoverview Logger interface and console implementations
 *
 * Containers log what they decide (a binding replaced, a nested container
 * answering, a context pushed or popped) at `debug`. Failures are thrown,
 * never only logged.
 *
 * @module wirestack/infrastructure/logging
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels, lowest first. `silent` disables output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Check whether a string names a {@link LogLevel}.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

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
 * Console logger that drops messages below `minimum`.
 *
 * @example
 * ```typescript
 * const container = new Container({ logger: createConsoleLogger('debug') });
 * ```
 */
export function createConsoleLogger(minimum: LogLevel, target: ILogger = consoleLogger): ILogger {
  const threshold = LOG_LEVELS.indexOf(minimum);
  const forward =
    (level: keyof ILogger) =>
    (message: string, ...args: unknown[]): void => {
      if (LOG_LEVELS.indexOf(level) >= threshold) {
        target[level](message, ...args);
      }
    };

  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  };
}
