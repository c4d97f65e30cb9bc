/**
 * Logging Types and Schemas
 *
 * Structured logging for the ingest tool. Everything goes to stderr so that
 * stdout stays free for the JSON status line the CLI prints on success.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  /** Fatal problems with the document or the run */
  ERROR: 0,
  /** Recovered page-level faults */
  WARN: 1,
  /** Progress of the run */
  INFO: 2,
  /** Per-page detail */
  DEBUG: 3,
  /** Backend-level detail */
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Source identifier, e.g. 'ingest:selector' */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line */
  JSON: 'json',
  /** Time, level letter and message only */
  COMPACT: 'compact',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * Output format
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  /**
   * Whether to include timestamps
   * @default true
   */
  timestamps: z.boolean().default(true),

  /** Source identifier for all logs from this logger */
  source: z.string().optional(),

  /**
   * Custom sink for formatted lines. When unset, lines go to stderr.
   */
  output: z.function().args(z.string(), LogLevelSchema).returns(z.void()).optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(overrides?: Partial<LoggerConfig>): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Parse a log level name, case-insensitively. Unknown names yield INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.trim().toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'TRACE':
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO;
  }
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Serialize an error for a log entry, keeping an ingest error code if present
 */
export function formatError(error: unknown): {
  name: string;
  message: string;
  code?: string;
  stack?: string;
} {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined ? { code } : {}),
      ...(error.stack !== undefined ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
