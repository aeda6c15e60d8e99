import { Counter, Gauge, Histogram, Registry } from "prom-client";
import { logger } from "../config/logger.js";
import type { LoopObserver } from "../reconcile/control-loop.js";
import type { PassEndHook, PassRecorder, ReconciliationOutcome } from "../reconcile/reconciler.js";

const METRIC_PREFIX = "edge_dns_controller";

/**
 * Sync metrics and readiness, created once at startup and passed to the
 * reconciler, the control loop and the HTTP routes. Each instance owns its
 * registry.
 */
export class ControllerMetrics implements PassRecorder, LoopObserver {
  readonly registry = new Registry();

  private readonly syncTotal = new Counter({
    name: `${METRIC_PREFIX}_sync_total`,
    help: "Total number of DNS sync operations performed",
    registers: [this.registry],
  });

  private readonly syncErrors = new Counter({
    name: `${METRIC_PREFIX}_sync_errors_total`,
    help: "Total number of DNS sync errors",
    registers: [this.registry],
  });

  private readonly syncDuration = new Histogram({
    name: `${METRIC_PREFIX}_sync_duration_seconds`,
    help: "Duration of DNS sync operations in seconds",
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [this.registry],
  });

  private readonly dnsRecords = new Gauge({
    name: `${METRIC_PREFIX}_dns_records_total`,
    help: "Current number of DNS records managed",
    registers: [this.registry],
  });

  private readonly eligibleNodes = new Gauge({
    name: `${METRIC_PREFIX}_eligible_nodes`,
    help: "Current number of healthy proxy nodes",
    registers: [this.registry],
  });

  private readonly lastSyncTime = new Gauge({
    name: `${METRIC_PREFIX}_last_sync_timestamp`,
    help: "Timestamp of the last successful sync operation",
    registers: [this.registry],
  });

  private readonly recordsCreated = new Counter({
    name: `${METRIC_PREFIX}_records_created_total`,
    help: "DNS records created",
    registers: [this.registry],
  });

  private readonly recordsDeleted = new Counter({
    name: `${METRIC_PREFIX}_records_deleted_total`,
    help: "DNS records deleted",
    registers: [this.registry],
  });

  private readonly recordFailures = new Counter({
    name: `${METRIC_PREFIX}_record_operation_failures_total`,
    help: "Individual DNS record create/delete calls that failed",
    registers: [this.registry],
  });

  private readonly clusterEvents = new Counter({
    name: `${METRIC_PREFIX}_cluster_events_total`,
    help: "Cluster events that triggered a sync",
    registers: [this.registry],
  });

  private readonly readyGauge = new Gauge({
    name: `${METRIC_PREFIX}_ready`,
    help: "1 once the first sync has succeeded",
    registers: [this.registry],
  });

  private readonly now: () => number;
  private isReady = false;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  recordSyncStart(): PassEndHook {
    const start = this.now();
    return (outcome: ReconciliationOutcome) => {
      const finished = this.now();

      this.syncTotal.inc();
      this.syncDuration.observe((finished - start) / 1000);
      this.dnsRecords.set(outcome.addressesDesired);
      this.eligibleNodes.set(outcome.eligibleNodes);
      this.recordsCreated.inc(outcome.created);
      this.recordsDeleted.inc(outcome.deleted);
      this.recordFailures.inc(outcome.failedOperations);

      if (outcome.error) {
        this.syncErrors.inc();
      } else {
        this.lastSyncTime.set(Math.floor(finished / 1000));
      }
    };
  }

  recordEvents(count: number): void {
    this.clusterEvents.inc(count);
  }

  markReady(): void {
    if (this.isReady) return;
    this.isReady = true;
    this.readyGauge.set(1);
    logger.info("Application marked as ready");
  }

  get ready(): boolean {
    return this.isReady;
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /** Render every metric in the Prometheus text exposition format. */
  async metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
