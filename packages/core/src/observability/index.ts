export {
  Logger,
  createLogger,
  jsonSink,
  prettySink,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerConfig,
} from './logger.js';
