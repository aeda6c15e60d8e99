import { Hono } from "hono";
import type { ControllerMetrics } from "../../observability/metrics.js";

export function createMetricsRoutes(metrics: ControllerMetrics): Hono {
  const routes = new Hono();

  routes.get("/metrics", async (c) => {
    c.header("Content-Type", metrics.contentType);
    return c.body(await metrics.metrics());
  });

  return routes;
}
