export {
  initLogger,
  getLogger,
  flushLoggers,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { ConsoleSink, type ConsoleSinkOptions, type LineWriter } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
