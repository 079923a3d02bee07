/**
 * @spanwise/tracing - Hono Adapter
 * Server spans for Hono applications
 */

import type { Context, MiddlewareHandler } from "hono";
import { METHOD_NAME_ALL } from "hono/router";
import type { Logger } from "@spanwise/core";
import { createLogger } from "@spanwise/core";
import { toCarrier } from "./carrier.js";
import type { TraceContextManager } from "./context.js";
import { DEFAULT_PROTOCOL_VERSION, type RequestMetadata, type SpanFactory } from "./factory.js";
import { instrumentRequest } from "./middleware.js";
import { recordException } from "./spans.js";
import type { Span } from "./types.js";

/**
 * Values the tracing middleware sets on the Hono context
 */
export interface TracingVariables {
  /** Server span of the request */
  span: Span;
  /** Trace ID of the request */
  traceId: string;
  /** Logger whose entries carry the trace and span IDs */
  logger: Logger;
}

export type TracingEnv = { Variables: TracingVariables };

export interface HonoTracingOptions {
  /** Parent of the per-request logger (default: logger named "http") */
  logger?: Logger;
  /** Span factory */
  factory?: SpanFactory;
  /** Scope the span is made active in */
  contextManager?: TraceContextManager;
}

/**
 * Route template of the handler that will serve the request.
 *
 * Middleware is registered for every method (`app.use`, `app.all`) and takes
 * `next`; such registrations are skipped. Method routes count whatever their
 * arity, so `(c, next)` handlers and handler factories keep their template.
 */
function matchedRouteTemplate(c: Context): string | undefined {
  // Deprecated from Hono 4.8 (see `hono/route`); still present in every 4.x
  const routes = c.req.matchedRoutes;
  for (let i = routes.length - 1; i >= 0; i--) {
    const route = routes[i];
    if (!route) continue;
    const isMiddleware = route.method === METHOD_NAME_ALL && route.handler.length >= 2;
    if (!isMiddleware) {
      return route.path;
    }
  }
  return undefined;
}

/**
 * HTTP version reported by `@hono/node-server`'s incoming message
 */
function protocolVersionOf(env: unknown): string {
  if (typeof env === "object" && env !== null && "incoming" in env) {
    const incoming: unknown = env.incoming;
    if (
      typeof incoming === "object" &&
      incoming !== null &&
      "httpVersion" in incoming &&
      typeof incoming.httpVersion === "string"
    ) {
      return incoming.httpVersion;
    }
  }
  return DEFAULT_PROTOCOL_VERSION;
}

/**
 * Tracing middleware
 *
 * Creates one server span per request and keeps it active while downstream
 * middleware and the route handler run. A handler that throws counts as a
 * failure even though Hono's error handler still answers the request.
 *
 * @example
 * ```typescript
 * const app = new Hono<TracingEnv>();
 * app.use('*', tracing());
 *
 * app.get('/hello/:name', (c) => {
 *   c.get('logger').info('Greeting', { name: c.req.param('name') });
 *   return c.text(`Hello, ${c.req.param('name')}!`);
 * });
 * ```
 */
export function tracing(options: HonoTracingOptions = {}): MiddlewareHandler<TracingEnv> {
  const baseLogger = options.logger ?? createLogger({ name: "http" });

  return async (c, next) => {
    const request: RequestMetadata = {
      method: c.req.method,
      matchedRoute: matchedRouteTemplate(c),
      path: c.req.path,
      url: c.req.url,
      protocolVersion: protocolVersionOf(c.env),
      userAgent: c.req.header("user-agent"),
      headers: toCarrier(c.req.raw.headers),
    };

    await instrumentRequest(
      request,
      async (span) => {
        const { traceId, spanId } = span.traceContext;
        c.set("span", span);
        c.set("traceId", traceId);
        c.set("logger", baseLogger.child({ traceId, spanId }));

        await next();

        // Hono turns a thrown handler error into an error-handler response
        if (c.error) {
          recordException(span, c.error);
        }
        return c.res;
      },
      {
        statusOf: (response) => (c.error ? undefined : response.status),
        ...(options.factory ? { factory: options.factory } : {}),
        ...(options.contextManager ? { contextManager: options.contextManager } : {}),
      }
    );
  };
}
