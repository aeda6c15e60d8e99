import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { ClusterEventSource } from "./cluster/event-source.js";
import { NomadClient } from "./cluster/nomad-client.js";
import { NodeSetResolver } from "./cluster/node-resolver.js";
import { type Config, ConfigError, loadConfig } from "./config/index.js";
import { logger, setLogLevel } from "./config/logger.js";
import { CloudflareClient } from "./dns/cloudflare-client.js";
import { captureError, ControllerMetrics, flushSentry, initSentry } from "./observability/index.js";
import { ControlLoop } from "./reconcile/control-loop.js";
import { Reconciler } from "./reconcile/reconciler.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    component: "process",
    extra: { source: "unhandledRejection" },
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { component: "process", extra: { source: "uncaughtException", origin } });
  // Exit immediately after logging (Winston Console transport is synchronous).
  process.exit(1);
};

export interface Controller {
  loop: ControlLoop;
  metrics: ControllerMetrics;
}

/** Wire the clients, reconciler and control loop for one configuration. */
export function buildController(cfg: Config, metrics: ControllerMetrics = new ControllerMetrics()): Controller {
  const nomad = new NomadClient({
    address: cfg.nomad.address,
    token: cfg.nomad.token,
    namespace: cfg.nomad.namespace,
  });
  const dns = new CloudflareClient({
    apiToken: cfg.cloudflare.apiToken,
    zoneId: cfg.cloudflare.zoneId,
    recordName: cfg.dns.recordName,
    ttl: cfg.dns.ttl,
    proxied: cfg.dns.proxied,
  });

  const reconciler = new Reconciler({
    nodes: new NodeSetResolver(nomad, cfg.nomad.jobName),
    dns,
    recorder: metrics,
  });
  const events = new ClusterEventSource(nomad, {
    jobName: cfg.nomad.jobName,
    maxFailures: cfg.controller.watchMaxFailures,
  });
  const loop = new ControlLoop(
    { reconciler, events, observer: metrics },
    {
      syncIntervalMs: cfg.controller.syncIntervalMs,
      debounceMs: cfg.controller.debounceMs,
      queueCapacity: cfg.controller.queueCapacity,
    },
  );
  return { loop, metrics };
}

/** Run the controller until SIGINT/SIGTERM or a fatal error. Resolves with the exit code. */
export async function main(): Promise<number> {
  let cfg: Config;
  try {
    cfg = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message, { problems: err.problems });
      return 1;
    }
    throw err;
  }

  setLogLevel(cfg.logLevel);
  // Initialize Sentry error tracking (no-op when SENTRY_DSN absent)
  initSentry(cfg.sentryDsn, cfg.nodeEnv);

  logger.info("Starting edge DNS controller", {
    nomadAddress: cfg.nomad.address,
    namespace: cfg.nomad.namespace,
    job: cfg.nomad.jobName,
    recordName: cfg.dns.recordName,
    syncIntervalMs: cfg.controller.syncIntervalMs,
  });

  const { loop, metrics } = buildController(cfg);
  const app = createApp(metrics);
  const server = serve({ fetch: app.fetch, port: cfg.metricsPort }, () => {
    logger.info(`Metrics server listening on port ${cfg.metricsPort}`);
  });

  const shutdown = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    shutdown.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  let exitCode = 0;
  try {
    await loop.run(shutdown.signal);
  } catch (err) {
    logger.error("Controller stopped on fatal error", { err });
    captureError(err, { component: "control-loop" });
    exitCode = 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    await flushSentry();
  }

  logger.info("Edge DNS controller stopped", { exitCode });
  return exitCode;
}

// Don't start the controller when imported by tests
if (process.env.NODE_ENV !== "test") {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      logger.error("Edge DNS controller failed to start", { err });
      process.exit(1);
    },
  );
}
