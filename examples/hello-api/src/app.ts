/**
 * Hello API
 *
 * Routes:
 * - GET /              service info
 * - GET /health        liveness
 * - GET /hello/:name   greeting
 * - GET /relay/:name   greeting fetched from an upstream hello-api
 */

import { Hono } from "hono";
import type { Logger } from "@spanwise/core";
import { createTracedFetch, tracing, type FetchLike, type TracingEnv } from "@spanwise/tracing";

export interface AppOptions {
  /** Parent logger for request loggers */
  logger?: Logger;
  /** Base URL of the upstream used by /relay */
  upstreamUrl?: string;
  /** Fetch used for upstream calls */
  fetch?: FetchLike;
}

export function createApp(options: AppOptions = {}): Hono<TracingEnv> {
  const app = new Hono<TracingEnv>();
  const upstreamUrl = (options.upstreamUrl ?? "http://localhost:3001").replace(/\/+$/, "");
  const upstreamFetch = createTracedFetch(options.fetch ? { fetch: options.fetch } : {});

  app.use("*", tracing(options.logger ? { logger: options.logger } : {}));

  app.get("/", (c) =>
    c.json({
      name: "hello-api",
      endpoints: ["/health", "/hello/:name", "/relay/:name"],
    })
  );

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/hello/:name", (c) => {
    const name = c.req.param("name");
    c.get("logger").info("Greeting", { name });
    return c.text(`Hello, ${name}!`);
  });

  app.get("/relay/:name", async (c) => {
    const res = await upstreamFetch(`${upstreamUrl}/hello/${encodeURIComponent(c.req.param("name"))}`);
    if (!res.ok) {
      return c.text("Upstream unavailable", 502);
    }
    return c.text(await res.text());
  });

  return app;
}
