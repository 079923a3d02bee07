/**
 * @spanwise/core - Log Levels
 * Level constants and the log entry shape shared by the logger and its transports
 */

/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name string literal type (TRACE, DEBUG, INFO, WARN, ERROR, FATAL, SILENT) */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value type */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Check whether a string names a log level
 */
export function isLogLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LogLevel, value);
}

/**
 * Structured error information included in log entries.
 * Extracted from Error objects for serialization.
 */
export interface ErrorInfo {
  /** Error class name (e.g., "TypeError", "ExportError") */
  name: string;
  /** Error message */
  message: string;
  /** Stack trace if available */
  stack: string | undefined;
}

/**
 * Structured log entry passed to transports.
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}
