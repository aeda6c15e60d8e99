import { Hono } from "hono";

/** Readiness as seen by the HTTP layer. */
export interface ReadinessSource {
  readonly ready: boolean;
}

/**
 * Liveness and readiness probes.
 *
 * /health answers 200 while the process is up. /ready answers 503 until the
 * first reconciliation pass has succeeded.
 */
export function createHealthRoutes(readiness: ReadinessSource): Hono {
  const routes = new Hono();

  routes.get("/health", (c) => c.json({ status: "healthy", timestamp: new Date().toISOString() }));

  routes.get("/ready", (c) => {
    const timestamp = new Date().toISOString();
    if (!readiness.ready) {
      return c.json({ status: "not ready", timestamp }, 503);
    }
    return c.json({ status: "ready", timestamp });
  });

  return routes;
}
