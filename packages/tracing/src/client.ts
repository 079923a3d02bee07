/**
 * @spanwise/tracing - Traced Fetch
 * Client spans for outgoing HTTP requests
 */

import { HeadersCarrier } from "./carrier.js";
import { onFailure, onResponse } from "./classifier.js";
import { DEFAULT_PROTOCOL_VERSION, SpanFactory } from "./factory.js";
import type { TextMapPropagator } from "./propagation.js";
import { closeSpan, getPropagator } from "./provider.js";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface TracedFetchOptions {
  /** Fetch implementation to wrap (default: global fetch) */
  fetch?: FetchLike;
  /** Span factory */
  factory?: SpanFactory;
  /** Propagator for outgoing headers (default: the global propagator) */
  propagator?: TextMapPropagator;
}

/**
 * Wrap fetch so each call runs in a client span and carries `traceparent`.
 *
 * The client span is a child of the active span. A rejected fetch marks the
 * span as failed and the error is rethrown.
 *
 * @example
 * ```typescript
 * const tracedFetch = createTracedFetch();
 * const res = await tracedFetch('http://inventory:3000/items');
 * ```
 */
export function createTracedFetch(options: TracedFetchOptions = {}): FetchLike {
  const baseFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const factory = options.factory ?? new SpanFactory();

  return async (input, init) => {
    const request = new Request(input, init);
    const headers = new Headers(request.headers);
    const carrier = new HeadersCarrier(headers);

    const span = factory.makeSpan(
      {
        method: request.method,
        matchedRoute: undefined,
        path: new URL(request.url).pathname,
        url: request.url,
        protocolVersion: DEFAULT_PROTOCOL_VERSION,
        userAgent: headers.get("user-agent") ?? undefined,
        headers: carrier,
      },
      "client"
    );

    const propagator = options.propagator ?? getPropagator();
    propagator.inject(span.traceContext, carrier);

    try {
      const response = await baseFetch(new Request(request, { headers }));
      onResponse(response.status, span);
      return response;
    } catch (error) {
      onFailure(span, error);
      throw error;
    } finally {
      closeSpan(span);
    }
  };
}
