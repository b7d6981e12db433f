export {
  WatchpointLogger,
  createLogger,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type WatchpointLoggerConfig,
} from './logger.js';
