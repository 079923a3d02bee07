/**
 * @spanwise/tracing - Types
 * Trace context, span and resource shapes
 */

// ============================================================================
// TRACE CONTEXT
// ============================================================================

/**
 * Position in a distributed trace.
 * Frozen once constructed.
 */
export interface TraceContext {
  /** Trace ID (32 lowercase hex chars) */
  readonly traceId: string;
  /** Span ID (16 lowercase hex chars) */
  readonly spanId: string;
  /** Trace flags; only the sampled bit is kept */
  readonly traceFlags: number;
  /** Whether the context was received from another process */
  readonly isRemote: boolean;
  /** Vendor-specific tracestate, passed through unparsed */
  readonly traceState: string | undefined;
}

// ============================================================================
// SPANS
// ============================================================================

export type SpanKind = "internal" | "server" | "client";
export type SpanStatus = "unset" | "ok" | "error";
export type SpanAttributeValue = string | number | boolean | string[] | number[] | boolean[];

/**
 * Span attributes keyed by name.
 * A declared attribute holds `undefined` until it is recorded.
 */
export type SpanAttributeMap = Record<string, SpanAttributeValue | undefined>;

export interface SpanEvent {
  name: string;
  time: number;
  attributes: Record<string, SpanAttributeValue> | undefined;
}

/**
 * Service identity attached to every span of a process
 */
export interface Resource {
  readonly serviceName: string;
  readonly serviceVersion: string;
}

/**
 * Span for tracing.
 * Writable through the span helpers until it is ended, frozen afterwards.
 */
export interface Span {
  /** Span name */
  readonly name: string;
  /** Span kind */
  readonly kind: SpanKind;
  /** Trace context of this span */
  readonly traceContext: TraceContext;
  /** Context of the parent, for lookup only */
  readonly parent: TraceContext | undefined;
  /** Parent span ID */
  readonly parentSpanId: string | undefined;
  /** Service identity of the provider that created the span */
  readonly resource: Resource | undefined;
  /** Start time (unix ms) */
  readonly startTime: number;
  /** End time (unix ms) */
  endTime: number | undefined;
  /** Span status */
  status: SpanStatus;
  /** Span attributes */
  readonly attributes: SpanAttributeMap;
  /** Span events */
  readonly events: SpanEvent[];
}
