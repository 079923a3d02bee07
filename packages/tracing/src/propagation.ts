/**
 * @spanwise/tracing - Propagation
 * W3C Trace Context (traceparent / tracestate) text format
 *
 * @see https://www.w3.org/TR/trace-context/
 */

import type { Carrier } from "./carrier.js";
import { INVALID_SPAN_ID, INVALID_TRACE_ID, TraceFlags } from "./context.js";
import type { TraceContext } from "./types.js";

export const TRACEPARENT_HEADER = "traceparent";
export const TRACESTATE_HEADER = "tracestate";

const SUPPORTED_VERSION = "00";
const INVALID_VERSION = "ff";

const VERSION_PATTERN = /^[0-9a-f]{2}$/;
const TRACE_ID_PATTERN = /^[0-9a-f]{32}$/;
const SPAN_ID_PATTERN = /^[0-9a-f]{16}$/;
const FLAGS_PATTERN = /^[0-9a-f]{2}$/;

// ============================================================================
// W3C TRACEPARENT HEADER
// ============================================================================

/**
 * Parse W3C traceparent header.
 * Format: {version}-{trace-id}-{parent-id}-{trace-flags}
 *
 * Only lowercase hex is accepted. Version `00` takes exactly four fields and
 * flags up to `02`; later versions may append fields, which are ignored.
 * Returns `undefined` for anything malformed.
 */
export function parseTraceparent(header: string): TraceContext | undefined {
  const parts = header.split("-");
  if (parts.length < 4) return undefined;

  const [version, traceId, spanId, flags] = parts;
  if (version === undefined || traceId === undefined || spanId === undefined || flags === undefined) {
    return undefined;
  }

  if (!VERSION_PATTERN.test(version) || version === INVALID_VERSION) return undefined;
  if (version === SUPPORTED_VERSION && parts.length !== 4) return undefined;

  if (!TRACE_ID_PATTERN.test(traceId) || traceId === INVALID_TRACE_ID) return undefined;
  if (!SPAN_ID_PATTERN.test(spanId) || spanId === INVALID_SPAN_ID) return undefined;
  if (!FLAGS_PATTERN.test(flags)) return undefined;

  const flagValue = parseInt(flags, 16);
  if (version === SUPPORTED_VERSION && flagValue > 2) return undefined;

  return Object.freeze({
    traceId,
    spanId,
    traceFlags: flagValue & TraceFlags.SAMPLED,
    isRemote: true,
    traceState: undefined,
  });
}

/**
 * Format trace context as W3C traceparent header
 *
 * Example: 00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01
 */
export function formatTraceparent(ctx: TraceContext): string {
  const flags = (ctx.traceFlags & 0xff).toString(16).padStart(2, "0");
  return `${SUPPORTED_VERSION}-${ctx.traceId}-${ctx.spanId}-${flags}`;
}

// ============================================================================
// PROPAGATORS
// ============================================================================

/**
 * Reads and writes trace context through a carrier
 */
export interface TextMapPropagator {
  /** Header names this propagator reads and writes */
  fields(): string[];
  /** Extract a remote context; `undefined` when absent or malformed */
  extract(carrier: Carrier): TraceContext | undefined;
  /** Write the context into the carrier */
  inject(context: TraceContext, carrier: Carrier): void;
}

/**
 * Propagator for the W3C Trace Context headers.
 * `tracestate` is copied verbatim, never parsed.
 */
export class W3CTraceContextPropagator implements TextMapPropagator {
  fields(): string[] {
    return [TRACEPARENT_HEADER, TRACESTATE_HEADER];
  }

  extract(carrier: Carrier): TraceContext | undefined {
    const traceparent = carrier.get(TRACEPARENT_HEADER);
    if (!traceparent) return undefined;

    const ctx = parseTraceparent(traceparent);
    if (!ctx) return undefined;

    const traceState = carrier.get(TRACESTATE_HEADER);
    return traceState ? Object.freeze({ ...ctx, traceState }) : ctx;
  }

  inject(context: TraceContext, carrier: Carrier): void {
    carrier.set(TRACEPARENT_HEADER, formatTraceparent(context));
    if (context.traceState) {
      carrier.set(TRACESTATE_HEADER, context.traceState);
    }
  }
}

/**
 * Propagator that neither reads nor writes anything.
 * Active until tracing is initialized.
 */
export class NoopPropagator implements TextMapPropagator {
  fields(): string[] {
    return [];
  }

  extract(_carrier: Carrier): TraceContext | undefined {
    return undefined;
  }

  inject(_context: TraceContext, _carrier: Carrier): void {}
}
