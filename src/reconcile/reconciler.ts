import { desiredAddresses } from "../cluster/node-resolver.js";
import type { ClusterNode } from "../cluster/types.js";
import { logger } from "../config/logger.js";
import type { DnsProvider } from "../dns/types.js";
import { DnsConverger } from "./converger.js";
import { diffRecords, isEmptyPlan } from "./differ.js";

/** Summary of one reconciliation pass, handed to the metrics hook and then dropped. */
export interface ReconciliationOutcome {
  addressesDesired: number;
  eligibleNodes: number;
  recordsObserved: number;
  created: number;
  deleted: number;
  /** Individual create/delete calls that failed; these never fail the pass. */
  failedOperations: number;
  /** Set when the pass could not list allocations or records. */
  error: Error | null;
}

/** Called when a pass ends, with the outcome of that pass. */
export type PassEndHook = (outcome: ReconciliationOutcome) => void;

/** Start-of-pass hook; returns the matching end-of-pass hook. */
export interface PassRecorder {
  recordSyncStart(): PassEndHook;
}

/** Source of the eligible node set, read fresh on every call. */
export interface NodeSource {
  resolve(signal?: AbortSignal): Promise<ClusterNode[]>;
}

export interface ReconcilerDeps {
  nodes: NodeSource;
  dns: DnsProvider;
  recorder: PassRecorder;
  converger?: DnsConverger;
}

/**
 * One reconciliation pass: resolve eligible nodes, read published records,
 * diff, converge. Never throws; failures are reported in the outcome.
 */
export class Reconciler {
  private readonly nodes: NodeSource;
  private readonly dns: DnsProvider;
  private readonly recorder: PassRecorder;
  private readonly converger: DnsConverger;

  constructor(deps: ReconcilerDeps) {
    this.nodes = deps.nodes;
    this.dns = deps.dns;
    this.recorder = deps.recorder;
    this.converger = deps.converger ?? new DnsConverger(deps.dns);
  }

  async reconcile(signal?: AbortSignal): Promise<ReconciliationOutcome> {
    logger.info("Syncing DNS records");
    const end = this.recorder.recordSyncStart();
    const outcome: ReconciliationOutcome = {
      addressesDesired: 0,
      eligibleNodes: 0,
      recordsObserved: 0,
      created: 0,
      deleted: 0,
      failedOperations: 0,
      error: null,
    };

    try {
      const nodes = await this.nodes.resolve(signal);
      const desired = desiredAddresses(nodes);
      outcome.eligibleNodes = nodes.length;
      outcome.addressesDesired = desired.size;

      const records = await this.dns.listAddressRecords(signal);
      outcome.recordsObserved = records.length;

      const plan = diffRecords(desired, records);
      logger.info("Syncing address records", {
        currentCount: records.length,
        desired: [...desired],
        toCreate: plan.toCreate,
        toDelete: plan.toDelete.map((r) => r.content),
      });

      if (!isEmptyPlan(plan)) {
        const result = await this.converger.apply(plan, signal);
        outcome.created = result.created;
        outcome.deleted = result.deleted;
        outcome.failedOperations = result.failedCreates + result.failedDeletes;
      }
    } catch (err) {
      outcome.error = err instanceof Error ? err : new Error(String(err));
    }

    end(outcome);

    if (outcome.error) {
      logger.error("DNS sync failed", { err: outcome.error });
    } else {
      logger.info("DNS sync completed", {
        addressCount: outcome.addressesDesired,
        created: outcome.created,
        deleted: outcome.deleted,
        failedOperations: outcome.failedOperations,
      });
    }
    return outcome;
  }
}
