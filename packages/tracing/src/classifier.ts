/**
 * @spanwise/tracing - Response Classifier
 * Finalizes the status fields of an open span from the request outcome
 */

import { SpanAttributes, record, recordException, setStatus } from "./spans.js";
import type { Span } from "./types.js";

export type StatusClassification = "ok" | "error";

/**
 * Classify an HTTP status code.
 * Anything from 300 upwards counts as an error, redirects included.
 */
export function classifyStatus(statusCode: number): StatusClassification {
  return statusCode < 300 ? "ok" : "error";
}

/**
 * A response was produced: record its status code and classification
 */
export function onResponse(statusCode: number, span: Span): void {
  const classification = classifyStatus(statusCode);
  record(span, SpanAttributes.HTTP_RESPONSE_STATUS_CODE, statusCode);
  record(span, SpanAttributes.OTEL_STATUS_CODE, classification);
  setStatus(span, classification);
}

/**
 * No response was produced. The status code slot stays empty.
 */
export function onFailure(span: Span, error?: unknown): void {
  record(span, SpanAttributes.OTEL_STATUS_CODE, "error");
  setStatus(span, "error");
  if (error !== undefined) {
    recordException(span, error);
  }
}
