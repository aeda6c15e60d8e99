import { Hono } from "hono";
import { logger } from "../config/logger.js";
import type { ControllerMetrics } from "../observability/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMetricsRoutes } from "./routes/metrics.js";

/** HTTP surface for probes and scraping. Nothing here mutates controller state. */
export function createApp(metrics: ControllerMetrics): Hono {
  const app = new Hono();

  app.route("/", createHealthRoutes(metrics));
  app.route("/", createMetricsRoutes(metrics));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError((err, c) => {
    logger.error("Unhandled HTTP error", { path: c.req.path, err });
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
