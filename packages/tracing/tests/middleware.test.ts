/**
 * @spanwise/tracing - Middleware tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { createLogger, type LogEntry, type LogTransport } from "@spanwise/core";
import { RecordCarrier } from "../src/carrier.js";
import { createTracedFetch, type FetchLike } from "../src/client.js";
import { defaultContextManager } from "../src/context.js";
import { InMemorySink } from "../src/exporters.js";
import { tracing, type TracingEnv } from "../src/hono.js";
import { traceLogFields } from "../src/logging.js";
import { instrumentFetchHandler, instrumentRequest } from "../src/middleware.js";
import { initTracing, resetTracing, type ShutdownGuard } from "../src/provider.js";
import { SpanAttributes, createSpan } from "../src/spans.js";
import { getTracer } from "../src/tracer.js";
import type { Span } from "../src/types.js";

const TRACE_ID = "0af7651916cd43dd8448eb211c80319c";
const SPAN_ID = "b7ad6b7169203331";

class MemoryTransport implements LogTransport {
  readonly name = "memory";
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

const silent = createLogger({ level: "SILENT" });

let sink: InMemorySink;
let guard: ShutdownGuard;

beforeEach(() => {
  sink = new InMemorySink();
  guard = initTracing({ serviceName: "hello-api", serviceVersion: "0.1.0", sink, logger: silent });
});

afterEach(async () => {
  await guard.release();
  resetTracing();
});

async function exportedSpans(): Promise<readonly Span[]> {
  await guard.release();
  return sink.getFinishedSpans();
}

function requestMetadata(headers: Record<string, string> = {}) {
  return {
    method: "GET",
    matchedRoute: "/orders/:id",
    path: "/orders/7",
    url: "http://localhost/orders/7",
    protocolVersion: "1.1",
    userAgent: "test-agent",
    headers: new RecordCarrier(headers),
  };
}

describe("instrumentRequest", () => {
  it("should keep the span active while the handler runs", async () => {
    let seen: Span | undefined;

    const response = await instrumentRequest(
      requestMetadata(),
      async (span) => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        seen = defaultContextManager.active();
        expect(seen).toBe(span);
        return { status: 201 };
      },
      { statusOf: (res) => res.status }
    );

    expect(response).toEqual({ status: 201 });
    expect(defaultContextManager.active()).toBeUndefined();

    const spans = await exportedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]).toBe(seen);
    expect(spans[0]?.status).toBe("ok");
    expect(spans[0]?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBe(201);
    expect(spans[0]?.endTime).toBeDefined();
  });

  it("should mark a rejected handler as failed, rethrow and close the span once", async () => {
    const failure = new Error("database unavailable");

    await expect(
      instrumentRequest(requestMetadata(), async () => Promise.reject(failure), { statusOf: () => 200 })
    ).rejects.toBe(failure);

    const spans = await exportedSpans();
    expect(spans).toHaveLength(1);
    const span = spans[0];
    expect(span?.status).toBe("error");
    expect(span?.attributes[SpanAttributes.OTEL_STATUS_CODE]).toBe("error");
    expect(span?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBeUndefined();
    expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
    expect(Object.isFrozen(span)).toBe(true);
  });

  it("should treat a response without status as a failure", async () => {
    await instrumentRequest(requestMetadata(), async () => "fallback", { statusOf: () => undefined });

    const [span] = await exportedSpans();
    expect(span?.status).toBe("error");
    expect(span?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBeUndefined();
  });

  it("should continue the caller's trace", async () => {
    await instrumentRequest(
      requestMetadata({ traceparent: `00-${TRACE_ID}-${SPAN_ID}-01` }),
      async () => ({ status: 200 }),
      { statusOf: (res) => res.status }
    );

    const [span] = await exportedSpans();
    expect(span?.traceContext.traceId).toBe(TRACE_ID);
    expect(span?.parentSpanId).toBe(SPAN_ID);
    expect(span?.resource).toEqual({ serviceName: "hello-api", serviceVersion: "0.1.0" });
  });
});

describe("instrumentFetchHandler", () => {
  it("should trace a Fetch-style handler", async () => {
    const handler = instrumentFetchHandler(async () => new Response("hi", { status: 200 }));

    const response = await handler(new Request("http://localhost/plain?x=1", { headers: { "user-agent": "curl/8" } }));

    expect(await response.text()).toBe("hi");
    const [span] = await exportedSpans();
    expect(span?.name).toBe("GET {unknown}");
    expect(span?.attributes[SpanAttributes.HTTP_ROUTE]).toBe("/plain");
    expect(span?.attributes[SpanAttributes.URL_FULL]).toBe("http://localhost/plain?x=1");
    expect(span?.attributes[SpanAttributes.USER_AGENT_ORIGINAL]).toBe("curl/8");
  });
});

describe("Hono tracing middleware", () => {
  function createTestApp(logger = silent) {
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger }));
    app.onError((_err, c) => c.text("failed", 500));

    app.get("/hello/:name", (c) => c.text(`Hello, ${c.req.param("name")}!`));
    app.get("/not-modified", () => new Response(null, { status: 304 }));
    app.get("/boom", () => {
      throw new Error("handler failed");
    });
    return app;
  }

  it("should name the span by route template and record the raw path", async () => {
    const res = await createTestApp().request("/hello/world");

    expect(await res.text()).toBe("Hello, world!");
    const [span] = await exportedSpans();
    expect(span?.name).toBe("GET /hello/:name");
    expect(span?.kind).toBe("server");
    expect(span?.attributes).toEqual({
      "otel.name": "GET /hello/:name",
      "span.kind": "server",
      "http.request.method": "GET",
      "http.route": "/hello/world",
      "url.full": "http://localhost/hello/world",
      "network.protocol.version": "1.1",
      "user_agent.original": "",
      "http.response.status_code": 200,
      "otel.status_code": "ok",
    });
    expect(span?.status).toBe("ok");
  });

  it("should keep the template of a route whose handler takes next", async () => {
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger: silent }));
    app.use("/items/*", async (_c, next) => {
      await next();
    });
    app.get("/items/:id", async (c, _next) => c.text(`item ${c.req.param("id")}`));

    const res = await app.request("/items/42");

    expect(await res.text()).toBe("item 42");
    const [span] = await exportedSpans();
    expect(span?.name).toBe("GET /items/:id");
    expect(span?.attributes[SpanAttributes.HTTP_ROUTE]).toBe("/items/42");
  });

  it("should name spans of a mounted sub-app by the full template", async () => {
    const api = new Hono<TracingEnv>();
    api.get("/orders/:id", (c) => c.json({ id: c.req.param("id") }));
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger: silent }));
    app.route("/api", api);

    const res = await app.request("/api/orders/7");

    expect(await res.json()).toEqual({ id: "7" });
    const [span] = await exportedSpans();
    expect(span?.name).toBe("GET /api/orders/:id");
  });

  it("should keep the template of an all-methods route without next", async () => {
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger: silent }));
    app.all("/ping", (c) => c.text("pong"));

    await app.request("/ping", { method: "POST" });

    const [span] = await exportedSpans();
    expect(span?.name).toBe("POST /ping");
  });

  it("should use the unknown sentinel for unrouted paths", async () => {
    const res = await createTestApp().request("/does-not-exist");

    expect(res.status).toBe(404);
    const [span] = await exportedSpans();
    expect(span?.name).toBe("GET {unknown}");
    expect(span?.attributes[SpanAttributes.HTTP_ROUTE]).toBe("/does-not-exist");
    expect(span?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBe(404);
    expect(span?.status).toBe("error");
  });

  it("should continue a valid incoming traceparent", async () => {
    await createTestApp().request("/hello/world", {
      headers: { traceparent: `00-${TRACE_ID}-${SPAN_ID}-01` },
    });

    const [span] = await exportedSpans();
    expect(span?.traceContext.traceId).toBe(TRACE_ID);
    expect(span?.parentSpanId).toBe(SPAN_ID);
  });

  it("should classify a 304 response as an error", async () => {
    const res = await createTestApp().request("/not-modified");

    expect(res.status).toBe(304);
    const [span] = await exportedSpans();
    expect(span?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBe(304);
    expect(span?.attributes[SpanAttributes.OTEL_STATUS_CODE]).toBe("error");
    expect(span?.status).toBe("error");
  });

  it("should record a throwing handler as a failure without status code", async () => {
    const res = await createTestApp().request("/boom");

    expect(res.status).toBe(500);
    const spans = await exportedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.status).toBe("error");
    expect(spans[0]?.attributes[SpanAttributes.OTEL_STATUS_CODE]).toBe("error");
    expect(spans[0]?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBeUndefined();
    expect(spans[0]?.events[0]?.attributes?.["exception.message"]).toBe("handler failed");
  });

  it("should expose the span, trace id and a correlated logger", async () => {
    const transport = new MemoryTransport();
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger: createLogger({ transports: [transport], level: "INFO" }) }));
    app.get("/whoami", (c) => {
      c.get("logger").info("handling");
      return c.json({ traceId: c.get("traceId"), spanId: c.get("span").traceContext.spanId });
    });

    const body: unknown = await (await app.request("/whoami")).json();
    const [span] = await exportedSpans();

    expect(body).toEqual({ traceId: span?.traceContext.traceId, spanId: span?.traceContext.spanId });
    expect(transport.entries[0]?.context).toEqual({
      traceId: span?.traceContext.traceId,
      spanId: span?.traceContext.spanId,
    });
  });

  it("should keep concurrent requests in their own traces", async () => {
    const otherTrace = "1234567890abcdef1234567890abcdef";
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger: silent }));
    app.get("/slow/:ms", async (c) => {
      await new Promise((resolve) => setTimeout(resolve, Number(c.req.param("ms"))));
      return c.text(getTracer().currentTraceId() ?? "none");
    });

    const [a, b] = await Promise.all([
      app.request("/slow/15", { headers: { traceparent: `00-${TRACE_ID}-${SPAN_ID}-01` } }),
      app.request("/slow/1", { headers: { traceparent: `00-${otherTrace}-${SPAN_ID}-01` } }),
    ]);

    expect(await a.text()).toBe(TRACE_ID);
    expect(await b.text()).toBe(otherTrace);
  });

  it("should parent spans started inside the handler", async () => {
    const app = new Hono<TracingEnv>();
    app.use("*", tracing({ logger: silent }));
    app.get("/nested", async (c) => {
      const greeting = await getTracer().trace("load-greeting", async () => "hi");
      return c.text(greeting);
    });

    await app.request("/nested");
    const [child, server] = await exportedSpans();

    expect(child?.name).toBe("load-greeting");
    expect(child?.kind).toBe("internal");
    expect(child?.status).toBe("ok");
    expect(server?.name).toBe("GET /nested");
    expect(child?.traceContext.traceId).toBe(server?.traceContext.traceId);
    expect(child?.parentSpanId).toBe(server?.traceContext.spanId);
  });
});

describe("createTracedFetch", () => {
  it("should inject traceparent from a client span under the active span", async () => {
    const stub = vi.fn<FetchLike>(async () => new Response("ok", { status: 200 }));
    const tracedFetch = createTracedFetch({ fetch: stub });
    const server = createSpan({ name: "GET /checkout", kind: "server" });

    await defaultContextManager.run(server, () => tracedFetch("http://inventory:3000/items?limit=5"));

    const sent = stub.mock.calls[0]?.[0];
    expect(sent).toBeInstanceOf(Request);
    const traceparent = sent instanceof Request ? sent.headers.get("traceparent") : null;

    const [client] = await exportedSpans();
    expect(client?.name).toBe("GET");
    expect(client?.kind).toBe("client");
    expect(client?.parentSpanId).toBe(server.traceContext.spanId);
    expect(traceparent).toBe(`00-${server.traceContext.traceId}-${client?.traceContext.spanId}-01`);
    expect(client?.attributes[SpanAttributes.URL_FULL]).toBe("http://inventory:3000/items?limit=5");
    expect(client?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBe(200);
    expect("http.route" in (client?.attributes ?? {})).toBe(false);
  });

  it("should mark a failed fetch and rethrow", async () => {
    const stub = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    const tracedFetch = createTracedFetch({ fetch: stub });

    await expect(tracedFetch("http://inventory:3000/items")).rejects.toThrow("fetch failed");

    const [client] = await exportedSpans();
    expect(client?.status).toBe("error");
    expect(client?.attributes[SpanAttributes.HTTP_RESPONSE_STATUS_CODE]).toBeUndefined();
  });
});

describe("Tracer", () => {
  it("should end spans with error when the traced function throws", async () => {
    await expect(
      getTracer().trace("risky", async () => {
        throw new Error("nope");
      })
    ).rejects.toThrow("nope");

    const [span] = await exportedSpans();
    expect(span?.status).toBe("error");
    expect(span?.events.map((e) => e.name)).toEqual(["exception"]);
  });

  it("should write attributes and events to the active span", async () => {
    const tracer = getTracer();

    await tracer.trace("work", async () => {
      tracer.setAttribute("items", 3);
      tracer.addEvent("checkpoint");
    });

    const [span] = await exportedSpans();
    expect(span?.attributes).toEqual({ items: 3 });
    expect(span?.events.map((e) => e.name)).toEqual(["checkpoint"]);
  });

  it("should report nothing outside a span", () => {
    expect(getTracer().currentSpan()).toBeUndefined();
    expect(getTracer().currentTraceId()).toBeUndefined();
  });
});

describe("traceLogFields", () => {
  it("should be empty outside a span", () => {
    expect(traceLogFields()).toEqual({});
  });

  it("should stamp log entries with the active trace", async () => {
    const transport = new MemoryTransport();
    const log = createLogger({ transports: [transport], mixin: traceLogFields, level: "INFO" });

    const span = createSpan({ name: "job" });
    defaultContextManager.run(span, () => log.info("inside"));
    log.info("outside");

    expect(transport.entries[0]?.context).toEqual({
      traceId: span.traceContext.traceId,
      spanId: span.traceContext.spanId,
    });
    expect(transport.entries[1]?.context).toBeUndefined();
  });
});
