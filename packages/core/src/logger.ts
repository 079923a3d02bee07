/**
 * @module
 * Lightweight structured logging with pluggable transports.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@spanwise/core';
 *
 * const log = createLogger({
 *   name: 'my-service',
 *   level: 'DEBUG',
 *   pretty: true
 * });
 *
 * log.info('Server started', { port: 3000 });
 * log.error('Request failed', error, { route: '/hello/:name' });
 *
 * // Child logger with context
 * const requestLog = log.child({ requestId: 'abc123' });
 * ```
 */

import { getEnv } from "./env.js";
import {
  LogLevel,
  isLogLevelName,
  type LogEntry,
  type LogLevelName,
  type LogLevelValue,
} from "./levels.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { LogLevel, isLogLevelName, type LogEntry, type LogLevelName, type LogLevelValue, type ErrorInfo } from "./levels.js";
export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Produces fields merged into every log entry at the time it is written.
 * Used to stamp the active trace onto log lines.
 */
export type LogMixin = () => Record<string, unknown>;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevelName | undefined;
  /** Logger name/module */
  name: string | undefined;
  /** Base context added to all logs */
  context: Record<string, unknown> | undefined;
  /** Custom transports */
  transports: LogTransport[] | undefined;
  /** Pretty print in development */
  pretty: boolean | undefined;
  /** Redact sensitive fields */
  redact: string[] | undefined;
  /** Timestamp format */
  timestamp: boolean | (() => string) | undefined;
  /** Dynamic fields evaluated per entry */
  mixin: LogMixin | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive fields from context
 */
function redactFields(
  obj: Record<string, unknown>,
  fields: string[]
): Record<string, unknown> {
  const result = { ...obj };
  for (const field of fields) {
    if (field in result) {
      result[field] = "[REDACTED]";
    }
    // Nested fields like "headers.authorization"
    const parts = field.split(".");
    if (parts.length > 1) {
      // Copy along the path so the caller's objects are never mutated
      let current: Record<string, unknown> | undefined = result;
      for (const part of parts.slice(0, -1)) {
        const val: unknown = current[part];
        if (!isRecord(val)) {
          current = undefined;
          break;
        }
        const copy: Record<string, unknown> = { ...val };
        current[part] = copy;
        current = copy;
      }
      const lastPart = parts[parts.length - 1];
      if (lastPart && current && lastPart in current) {
        current[lastPart] = "[REDACTED]";
      }
    }
  }
  return result;
}

const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "authorization",
  "cookie",
];

/**
 * Structured logger with support for multiple transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'exporter', level: 'DEBUG' });
 * logger.info('Batch exported', { spans: 12 });
 * logger.error('Export failed', new Error('connect ECONNREFUSED'), { endpoint });
 * ```
 */
export class Logger {
  private level: LogLevelValue;
  private levelName: LogLevelName;
  private name: string | undefined;
  private context: Record<string, unknown>;
  private transports: LogTransport[];
  private redactFields: string[];
  private timestampFn: () => string;
  private mixin: LogMixin | undefined;

  constructor(config: Partial<LoggerConfig> = {}) {
    const envLevel = getEnv("LOG_LEVEL")?.toUpperCase();
    this.levelName = config.level ?? (isLogLevelName(envLevel) ? envLevel : "INFO");
    this.level = LogLevel[this.levelName];
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(
        config.pretty !== undefined ? { pretty: config.pretty } : {}
      ),
    ];
    this.redactFields = [...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])];
    this.mixin = config.mixin;

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactFields,
      timestamp: this.timestampFn,
      mixin: this.mixin,
    });
  }

  /**
   * Check whether a level would be written
   */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level;
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const levelValue = LogLevel[level];
    if (levelValue < this.level) return;

    let finalContext = { ...this.context };
    if (this.name) {
      finalContext["module"] = this.name;
    }
    if (this.mixin) {
      finalContext = { ...finalContext, ...this.mixin() };
    }
    if (context) {
      finalContext = { ...finalContext, ...context };
    }

    finalContext = redactFields(finalContext, this.redactFields);

    const entry: LogEntry = {
      level,
      levelValue,
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => {
          console.error(`[logger] transport "${transport.name}" failed`, err);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error message with optional Error object.
   * @param error - Error object, or context when there is no error
   * @param context - Additional context when `error` is an Error
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else {
      this.log("ERROR", message, isRecord(error) ? error : context);
    }
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else {
      this.log("FATAL", message, isRecord(error) ? error : context);
    }
  }

  /**
   * Flush transports that buffer entries
   */
  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }
}

/**
 * Create a new Logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: 'tracing', level: 'DEBUG' });
 * ```
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

/**
 * Default logger instance.
 * Level can be controlled via LOG_LEVEL environment variable.
 */
export const logger = createLogger();

/**
 * Log an error of unknown type.
 * Non-Error values are stringified into the context.
 *
 * @example
 * ```typescript
 * try {
 *   await sink.send(batch);
 * } catch (error) {
 *   logError(logger, error, 'Span export failed', { batchSize: batch.length });
 * }
 * ```
 */
export function logError(
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}
