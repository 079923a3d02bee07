/**
 * @spanwise/tracing - Span Factory
 * Builds server and client spans for HTTP requests
 */

import type { Carrier } from "./carrier.js";
import { defaultContextManager, type TraceContextManager } from "./context.js";
import type { TextMapPropagator } from "./propagation.js";
import { getPropagator, getTracerProvider } from "./provider.js";
import { SpanAttributes, createSpan } from "./spans.js";
import type { Resource, Span, SpanAttributeMap } from "./types.js";

/** Route slot used in span names when no route matched */
export const UNKNOWN_ROUTE = "{unknown}";

/** Protocol version assumed when the transport does not report one */
export const DEFAULT_PROTOCOL_VERSION = "1.1";

export type HttpSpanKind = "server" | "client";

/**
 * What the factory needs to know about a request
 */
export interface RequestMetadata {
  /** HTTP method, e.g. "GET" */
  method: string;
  /** Route template the router matched, e.g. "/hello/:name" */
  matchedRoute: string | undefined;
  /** Raw request path */
  path: string;
  /** Full request URL, when known */
  url: string | undefined;
  /** HTTP protocol version, e.g. "1.1" */
  protocolVersion: string;
  /** User-Agent header value */
  userAgent: string | undefined;
  /** Request headers */
  headers: Carrier;
}

export interface SpanFactoryOptions {
  /** Propagator for inbound context (default: the global propagator) */
  propagator?: TextMapPropagator;
  /** Scope consulted for client span parents (default: process scope) */
  contextManager?: TraceContextManager;
  /** Resource attached to spans (default: the registered provider's) */
  resource?: Resource;
}

/**
 * Creates HTTP spans.
 *
 * Server spans continue a valid remote context from the request headers or
 * start a new trace; the active scope is not consulted. Their name uses the
 * matched route template, or `{unknown}` when nothing matched, while the raw
 * path is kept in `http.route`.
 *
 * Client spans are children of the active span, if any, and are named by the
 * method alone.
 */
export class SpanFactory {
  private readonly propagator: TextMapPropagator | undefined;
  private readonly contextManager: TraceContextManager;
  private readonly resource: Resource | undefined;

  constructor(options: SpanFactoryOptions = {}) {
    this.propagator = options.propagator;
    this.contextManager = options.contextManager ?? defaultContextManager;
    this.resource = options.resource;
  }

  makeSpan(request: RequestMetadata, kind: HttpSpanKind): Span {
    return kind === "server" ? this.makeServerSpan(request) : this.makeClientSpan(request);
  }

  private makeServerSpan(request: RequestMetadata): Span {
    const propagator = this.propagator ?? getPropagator();
    const parent = propagator.extract(request.headers);
    const name = `${request.method} ${request.matchedRoute ?? UNKNOWN_ROUTE}`;

    const attributes: SpanAttributeMap = {
      [SpanAttributes.OTEL_NAME]: name,
      [SpanAttributes.SPAN_KIND]: "server",
      [SpanAttributes.HTTP_REQUEST_METHOD]: request.method,
      [SpanAttributes.HTTP_ROUTE]: request.path,
      [SpanAttributes.URL_FULL]: request.url ?? request.path,
      [SpanAttributes.NETWORK_PROTOCOL_VERSION]: request.protocolVersion,
      [SpanAttributes.USER_AGENT_ORIGINAL]: request.userAgent ?? "",
      [SpanAttributes.HTTP_RESPONSE_STATUS_CODE]: undefined,
      [SpanAttributes.OTEL_STATUS_CODE]: undefined,
    };

    return createSpan({
      name,
      kind: "server",
      parent,
      attributes,
      resource: this.resource ?? getTracerProvider()?.resource,
    });
  }

  private makeClientSpan(request: RequestMetadata): Span {
    const name = request.method;

    const attributes: SpanAttributeMap = {
      [SpanAttributes.OTEL_NAME]: name,
      [SpanAttributes.SPAN_KIND]: "client",
      [SpanAttributes.HTTP_REQUEST_METHOD]: request.method,
      [SpanAttributes.URL_FULL]: request.url ?? request.path,
      [SpanAttributes.NETWORK_PROTOCOL_VERSION]: request.protocolVersion,
      [SpanAttributes.HTTP_RESPONSE_STATUS_CODE]: undefined,
      [SpanAttributes.OTEL_STATUS_CODE]: undefined,
    };

    return createSpan({
      name,
      kind: "client",
      parent: this.contextManager.current(),
      attributes,
      resource: this.resource ?? getTracerProvider()?.resource,
    });
  }
}
