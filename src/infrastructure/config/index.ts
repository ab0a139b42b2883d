export {
  LOG_LEVEL_VARIABLE,
  DEFAULT_LOG_LEVEL,
  loadLogLevel,
  getDefaultLogger,
} from './env';
