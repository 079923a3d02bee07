/**
 * @spanwise/tracing - Errors
 */

import { SpanwiseError } from "@spanwise/core";

/**
 * Tracing could not be initialized: invalid configuration, an unsupported
 * export protocol or an unusable endpoint. Nothing was registered.
 */
export class TracingInitError extends SpanwiseError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "TRACING_INIT_ERROR", details, options);
    this.name = "TracingInitError";
  }
}

/**
 * A batch of spans could not be delivered to its sink.
 * Raised inside the batch processor and logged; request code never sees it.
 */
export class ExportError extends SpanwiseError {
  readonly sink: string;
  readonly spanCount: number;

  constructor(message: string, sink: string, spanCount: number, options?: { cause?: unknown }) {
    super(message, "EXPORT_ERROR", { sink, spanCount }, options);
    this.name = "ExportError";
    this.sink = sink;
    this.spanCount = spanCount;
  }
}

/**
 * Error thrown when an operation exceeds its timeout.
 */
export class TimeoutExceededError extends SpanwiseError {
  /** The timeout value in milliseconds that was exceeded */
  readonly timeout: number;

  constructor(timeout: number) {
    super(`Operation timed out after ${timeout}ms`, "TIMEOUT_EXCEEDED", { timeout });
    this.name = "TimeoutExceededError";
    this.timeout = timeout;
  }
}
