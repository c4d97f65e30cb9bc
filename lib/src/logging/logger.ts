/**
 * Logger Implementation
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
  }

  /**
   * Create a child logger whose source is appended to this one's
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
    } else {
      this.log(LogLevelEnum.ERROR, message, errorOrContext);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      source: this.config.source,
      error: error ? formatError(error) : undefined,
    };

    const formatted = this.format(entry);

    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    console.error(formatted);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          message: entry.message,
          source: entry.source,
          context: entry.context,
          error: entry.error,
        });
      case LogFormat.COMPACT: {
        const time = entry.timestamp.toISOString().slice(11, 19);
        return `${time} ${LogLevelName[entry.level].charAt(0)} ${entry.message}`;
      }
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(LogLevelName[entry.level].padEnd(5));

    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }

    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }
}

/**
 * Create a logger with a specific source
 */
export function createLogger(source: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * A logger that discards everything; the default for library callers that
 * pass none.
 */
export function createSilentLogger(): Logger {
  return new Logger({ output: () => undefined });
}
