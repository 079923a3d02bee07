/**
 * @module
 * Core utilities shared by the spanwise packages: environment access,
 * structured logging and base error classes.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnv } from '@spanwise/core';
 *
 * const log = createLogger({ name: 'my-service' });
 * log.info('Service started', { port: getEnv('PORT', '3000') });
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export {
  getEnv,
  getEnvNumber,
  setEnvOverrides,
  clearEnvOverrides,
  isDevelopment,
  getEnvMode,
  type EnvMode,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  ConsoleTransport,
  LogLevel,
  isLogLevelName,
  createLogger,
  logger,
  logError,
  type LogMixin,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type ErrorInfo,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportOptions,
} from "./logger.js";

export type { BaseTransportOptions } from "./transports/types.js";

// ============================================
// ERRORS
// ============================================

export * from "./errors.js";
