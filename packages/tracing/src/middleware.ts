/**
 * @spanwise/tracing - Instrumentation Middleware
 * Wraps a request handler in a server span
 */

import { toCarrier } from "./carrier.js";
import { onFailure, onResponse } from "./classifier.js";
import { defaultContextManager, type TraceContextManager } from "./context.js";
import {
  DEFAULT_PROTOCOL_VERSION,
  SpanFactory,
  type RequestMetadata,
} from "./factory.js";
import { closeSpan } from "./provider.js";
import type { Span } from "./types.js";

export interface InstrumentOptions<TResponse> {
  /**
   * Status code of a produced response; `undefined` when the response only
   * stands in for a failed handler
   */
  statusOf: (response: TResponse) => number | undefined;
  /** Span factory (default: one using the global propagator) */
  factory?: SpanFactory;
  /** Scope the span is made active in (default: process scope) */
  contextManager?: TraceContextManager;
}

const defaultFactory = new SpanFactory();

/**
 * Run a request handler inside a server span.
 *
 * The span is active while the handler runs. A produced response is
 * classified by its status code; a rejected handler marks the span as failed
 * and the error is rethrown. The span is closed exactly once either way.
 */
export async function instrumentRequest<TResponse>(
  request: RequestMetadata,
  handler: (span: Span) => Promise<TResponse>,
  options: InstrumentOptions<TResponse>
): Promise<TResponse> {
  const factory = options.factory ?? defaultFactory;
  const contextManager = options.contextManager ?? defaultContextManager;
  const span = factory.makeSpan(request, "server");

  try {
    const response = await contextManager.run(span, () => handler(span));
    const statusCode = options.statusOf(response);
    if (statusCode === undefined) {
      onFailure(span);
    } else {
      onResponse(statusCode, span);
    }
    return response;
  } catch (error) {
    onFailure(span, error);
    throw error;
  } finally {
    closeSpan(span);
  }
}

/**
 * Describe a Fetch API request for the span factory
 */
export function requestMetadataFromRequest(
  request: Request,
  matchedRoute?: string,
  protocolVersion: string = DEFAULT_PROTOCOL_VERSION
): RequestMetadata {
  return {
    method: request.method,
    matchedRoute,
    path: new URL(request.url).pathname,
    url: request.url,
    protocolVersion,
    userAgent: request.headers.get("user-agent") ?? undefined,
    headers: toCarrier(request.headers),
  };
}

/**
 * Instrument a Fetch-style handler, e.g. for `serve({ fetch })`.
 * No route information is available, so span names use `{unknown}`.
 */
export function instrumentFetchHandler(
  handler: (request: Request) => Promise<Response> | Response,
  options: Omit<InstrumentOptions<Response>, "statusOf"> = {}
): (request: Request) => Promise<Response> {
  return (request) =>
    instrumentRequest(requestMetadataFromRequest(request), async () => handler(request), {
      ...options,
      statusOf: (response) => response.status,
    });
}
