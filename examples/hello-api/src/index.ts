/**
 * Hello API entry point
 *
 * Run with: npm start -w @spanwise/example-hello-api
 *
 * Export settings come from OTEL_* environment variables; set
 * OTEL_TRACES_EXPORTER=console to print spans instead of sending them.
 */

import { serve } from "@hono/node-server";
import { createLogger, getEnv, getEnvNumber } from "@spanwise/core";
import { initTracing, installShutdownHooks, traceLogFields } from "@spanwise/tracing";
import { createApp } from "./app.js";

const log = createLogger({ name: "hello-api", mixin: traceLogFields });

const guard = initTracing({
  serviceName: getEnv("SERVICE_NAME", "hello-api") ?? "hello-api",
  serviceVersion: "0.1.0",
  logger: log,
});
installShutdownHooks(guard, { logger: log });

const port = getEnvNumber("PORT", 3000) ?? 3000;
const upstreamUrl = getEnv("UPSTREAM_URL");
const app = createApp({ logger: log, ...(upstreamUrl ? { upstreamUrl } : {}) });

serve({ fetch: app.fetch, port }, (info) => {
  log.info("Listening", { port: info.port });
});
