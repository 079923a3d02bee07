/**
 * @spanwise/core - Transport Types
 * Interfaces for log transports
 */

import type { LogEntry } from "../logger.js";

/**
 * Log transport interface
 * Implement this to create custom log destinations
 */
export interface LogTransport {
  /** Transport name for identification */
  readonly name: string;

  /**
   * Log an entry
   * Can be sync or async - async transports should handle their own buffering
   */
  log(entry: LogEntry): void | Promise<void>;

  /**
   * Flush any buffered logs
   * Called on graceful shutdown
   */
  flush?(): Promise<void>;
}

/**
 * Transport options common to all transports
 */
export interface BaseTransportOptions {
  /** Minimum log level to transport */
  minLevel?: "TRACE" | "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";
  /** Enable/disable the transport */
  enabled?: boolean;
}
