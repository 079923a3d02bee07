/**
 * @spanwise/tracing - Trace Context
 * Identifier generation, context construction and the active-span scope
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { Span, TraceContext } from "./types.js";

// ============================================================================
// TRACE ID GENERATION
// ============================================================================

export const INVALID_TRACE_ID = "00000000000000000000000000000000";
export const INVALID_SPAN_ID = "0000000000000000";

function randomHex(byteLength: number): string {
  const bytes = new Uint8Array(byteLength);
  crypto.getRandomValues(bytes);
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Generate a trace ID (32 hex characters)
 */
export function generateTraceId(): string {
  let id = randomHex(16);
  while (id === INVALID_TRACE_ID) id = randomHex(16);
  return id;
}

/**
 * Generate a span ID (16 hex characters)
 */
export function generateSpanId(): string {
  let id = randomHex(8);
  while (id === INVALID_SPAN_ID) id = randomHex(8);
  return id;
}

// ============================================================================
// TRACE CONTEXT
// ============================================================================

/** Trace flag bits */
export const TraceFlags = {
  NONE: 0x00,
  SAMPLED: 0x01,
} as const;

/**
 * Create a new (root) trace context
 */
export function createTraceContext(options?: {
  traceId?: string;
  spanId?: string;
  traceFlags?: number;
  traceState?: string;
  isRemote?: boolean;
}): TraceContext {
  return Object.freeze({
    traceId: options?.traceId ?? generateTraceId(),
    spanId: options?.spanId ?? generateSpanId(),
    traceFlags: options?.traceFlags ?? TraceFlags.SAMPLED,
    isRemote: options?.isRemote ?? false,
    traceState: options?.traceState,
  });
}

/**
 * Create child trace context (new span in same trace)
 */
export function createChildContext(parent: TraceContext): TraceContext {
  return Object.freeze({
    traceId: parent.traceId,
    spanId: generateSpanId(),
    traceFlags: parent.traceFlags,
    isRemote: false,
    traceState: parent.traceState,
  });
}

// ============================================================================
// TRACE CONTEXT MANAGER
// ============================================================================

/**
 * Tracks the active span per async execution flow.
 *
 * `run` makes a span active for the duration of a callback and everything it
 * awaits; once the callback settles the previously active span is visible
 * again. Concurrent requests each see their own span.
 */
export class TraceContextManager {
  private readonly storage = new AsyncLocalStorage<Span>();

  /**
   * Get the active span
   */
  active(): Span | undefined {
    return this.storage.getStore();
  }

  /**
   * Get the trace context of the active span
   */
  current(): TraceContext | undefined {
    return this.storage.getStore()?.traceContext;
  }

  /**
   * Run a function with a span as the active scope
   */
  run<T>(span: Span, fn: () => T): T {
    return this.storage.run(span, fn);
  }

  /**
   * Run a function with no active span
   */
  exit<T>(fn: () => T): T {
    return this.storage.exit(fn);
  }
}

/**
 * Process-wide scope shared by the tracer, middleware and log correlation
 */
export const defaultContextManager = new TraceContextManager();
