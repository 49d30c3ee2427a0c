export {
  XsqlLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type XsqlLoggerConfig,
} from './logger.js';
