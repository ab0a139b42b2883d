/**
 * @fileoverview Environment configuration
 *
 * | Variable | Values | Default |
 * |----------|--------|---------|
 * | `DI_LOG_LEVEL` | `debug`, `info`, `warn`, `error`, `silent` | `warn` |
 *
 * @module wirestack/infrastructure/config
 */

import { ILogger, LogLevel, createConsoleLogger, isLogLevel } from '../logging';

export const LOG_LEVEL_VARIABLE = 'DI_LOG_LEVEL';

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Read the log level from the environment.
 *
 * @throws RangeError if the variable holds an unknown level
 */
export function loadLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[LOG_LEVEL_VARIABLE]?.trim().toLowerCase();
  if (!raw) {
    return DEFAULT_LOG_LEVEL;
  }
  if (!isLogLevel(raw)) {
    throw new RangeError(`Invalid ${LOG_LEVEL_VARIABLE} "${raw}"`);
  }
  return raw;
}

let defaultLogger: ILogger | undefined;

/**
 * Logger used by containers that were not given one.
 *
 * Created on first use from {@link loadLogLevel}.
 */
export function getDefaultLogger(): ILogger {
  defaultLogger ??= createConsoleLogger(loadLogLevel());
  return defaultLogger;
}
