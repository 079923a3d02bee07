/**
 * @spanwise/tracing - Spans
 * Span creation, attribute recording and closing
 */

import type {
  Resource,
  Span,
  SpanAttributeMap,
  SpanAttributeValue,
  SpanEvent,
  SpanKind,
  SpanStatus,
  TraceContext,
} from "./types.js";
import { createChildContext, createTraceContext } from "./context.js";

// ============================================================================
// SEMANTIC CONVENTIONS
// ============================================================================

/**
 * Span attribute keys (OpenTelemetry semantic conventions)
 */
export const SpanAttributes = {
  // Span
  OTEL_NAME: "otel.name",
  OTEL_STATUS_CODE: "otel.status_code",
  SPAN_KIND: "span.kind",

  // HTTP
  HTTP_REQUEST_METHOD: "http.request.method",
  HTTP_RESPONSE_STATUS_CODE: "http.response.status_code",
  HTTP_ROUTE: "http.route",
  URL_FULL: "url.full",
  NETWORK_PROTOCOL_VERSION: "network.protocol.version",
  USER_AGENT_ORIGINAL: "user_agent.original",

  // Resource
  SERVICE_NAME: "service.name",
  SERVICE_VERSION: "service.version",

  // Error
  EXCEPTION_TYPE: "exception.type",
  EXCEPTION_MESSAGE: "exception.message",
  EXCEPTION_STACKTRACE: "exception.stacktrace",
} as const;

// ============================================================================
// SPAN CREATION
// ============================================================================

export interface SpanOptions {
  /** Span name */
  name: string;
  /** Span kind (default: internal) */
  kind?: SpanKind;
  /** Parent trace context; a new trace is started without one */
  parent?: TraceContext | undefined;
  /** Declared attributes; `undefined` values are empty slots */
  attributes?: SpanAttributeMap;
  /** Service identity */
  resource?: Resource | undefined;
  /** Start time (default: now) */
  startTime?: number;
}

/**
 * Create a new open span
 */
export function createSpan(options: SpanOptions): Span {
  const parent = options.parent;

  return {
    name: options.name,
    kind: options.kind ?? "internal",
    traceContext: parent ? createChildContext(parent) : createTraceContext(),
    parent,
    parentSpanId: parent?.spanId,
    resource: options.resource,
    startTime: options.startTime ?? Date.now(),
    endTime: undefined,
    status: "unset",
    attributes: { ...options.attributes },
    events: [],
  };
}

// ============================================================================
// SPAN MUTATION
// ============================================================================

/**
 * Check if span is still open
 */
export function isSpanOpen(span: Span): boolean {
  return span.endTime === undefined;
}

/**
 * Write a value into a declared attribute slot.
 * Undeclared keys and closed spans are left untouched.
 *
 * @returns whether the value was written
 */
export function record(span: Span, key: string, value: SpanAttributeValue): boolean {
  if (!isSpanOpen(span) || !Object.prototype.hasOwnProperty.call(span.attributes, key)) {
    return false;
  }
  span.attributes[key] = value;
  return true;
}

/**
 * Set an attribute on an open span, declaring it if needed
 */
export function setAttribute(span: Span, key: string, value: SpanAttributeValue): void {
  if (!isSpanOpen(span)) return;
  span.attributes[key] = value;
}

/**
 * Set span status
 */
export function setStatus(span: Span, status: SpanStatus): void {
  if (!isSpanOpen(span)) return;
  span.status = status;
}

/**
 * Add span event
 */
export function addEvent(
  span: Span,
  name: string,
  attributes?: Record<string, SpanAttributeValue>
): void {
  if (!isSpanOpen(span)) return;

  const event: SpanEvent = {
    name,
    time: Date.now(),
    attributes,
  };
  span.events.push(event);
}

/**
 * Record an exception event on the span.
 * Does not change the status.
 */
export function recordException(span: Span, error: unknown): void {
  if (error instanceof Error) {
    addEvent(span, "exception", {
      [SpanAttributes.EXCEPTION_TYPE]: error.name,
      [SpanAttributes.EXCEPTION_MESSAGE]: error.message,
      [SpanAttributes.EXCEPTION_STACKTRACE]: error.stack ?? "",
    });
  } else {
    addEvent(span, "exception", {
      [SpanAttributes.EXCEPTION_MESSAGE]: String(error),
    });
  }
}

/**
 * Close a span and freeze it.
 *
 * @returns `false` when the span was already closed
 */
export function endSpan(span: Span, endTime: number = Date.now()): boolean {
  if (!isSpanOpen(span)) return false;

  span.endTime = Math.max(endTime, span.startTime);
  Object.freeze(span.attributes);
  Object.freeze(span.events);
  Object.freeze(span);
  return true;
}

// ============================================================================
// SPAN UTILITIES
// ============================================================================

/**
 * Calculate span duration in milliseconds
 */
export function getSpanDuration(span: Span): number | undefined {
  if (span.endTime === undefined) return undefined;
  return span.endTime - span.startTime;
}

/**
 * Attributes that hold a value; empty slots are left out
 */
export function recordedAttributes(span: Span): Record<string, SpanAttributeValue> {
  const result: Record<string, SpanAttributeValue> = {};
  for (const [key, value] of Object.entries(span.attributes)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Get span as simplified object (for logging)
 */
export function spanToLogObject(span: Span): Record<string, unknown> {
  return {
    traceId: span.traceContext.traceId,
    spanId: span.traceContext.spanId,
    parentSpanId: span.parentSpanId,
    name: span.name,
    kind: span.kind,
    status: span.status,
    startTime: new Date(span.startTime).toISOString(),
    endTime: span.endTime !== undefined ? new Date(span.endTime).toISOString() : undefined,
    durationMs: getSpanDuration(span),
    attributes: recordedAttributes(span),
    events: span.events.map((e) => ({
      name: e.name,
      time: new Date(e.time).toISOString(),
      attributes: e.attributes,
    })),
  };
}
