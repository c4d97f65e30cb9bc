/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  LogEntrySchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  LoggerConfigSchema,
  type LoggerConfig,
  createDefaultLoggerConfig,
  parseLogLevel,
  shouldLog,
  formatError,
} from './types.js';

export { Logger, createLogger, createSilentLogger } from './logger.js';
