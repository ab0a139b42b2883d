export type { ILogger, LogLevel } from './ILogger';
export { LOG_LEVELS, isLogLevel, consoleLogger, createConsoleLogger } from './ILogger';
