import { logger } from "../config/logger.js";
import type { BoundedQueue } from "../reconcile/event-queue.js";
import { sleep } from "../reconcile/sleep.js";
import type { NomadEvent, NomadTopics, OrchestratorClient } from "./nomad-client.js";
import { type ClusterEvent, isClusterEventKind } from "./types.js";

const DEFAULT_RETRY_DELAY_MS = 1_000;

/** Raised once the event stream has failed more times in a row than the controller tolerates. */
export class EventStreamError extends Error {
  readonly name = "EventStreamError" as const;
  readonly failures: number;

  constructor(failures: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cluster event stream failed ${failures} time(s) in a row: ${reason}`, { cause });
    this.failures = failures;
  }
}

export interface ClusterEventSourceOptions {
  /** Job whose events are watched in addition to all allocation and node events. */
  jobName: string;
  /** Consecutive stream failures tolerated; 1 makes the first failure fatal. */
  maxFailures?: number;
  /** Pause before re-opening the stream while under the failure threshold. */
  retryDelayMs?: number;
}

/** Read a string field from a loosely-typed map; anything else counts as absent. */
function stringField(source: unknown, key: string): string {
  if (typeof source !== "object" || source === null || !(key in source)) return "";
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : "";
}

/**
 * Normalize a raw stream event. Returns null for event types the controller
 * does not react to and for events missing a type or stream index.
 *
 * Ids are looked up at the top level of the payload first, then on the
 * embedded Allocation / Node / Job object.
 */
export function toClusterEvent(raw: NomadEvent): ClusterEvent | null {
  if (!raw.Type || !isClusterEventKind(raw.Type)) return null;
  if (!raw.Index) return null;

  const payload = raw.Payload ?? {};
  const nodeId =
    stringField(payload, "NodeID") || stringField(payload.Allocation, "NodeID") || stringField(payload.Node, "ID");
  const jobId = stringField(payload, "JobID") || stringField(payload.Allocation, "JobID") || stringField(payload.Job, "ID");

  return {
    kind: raw.Type,
    timestamp: raw.Index,
    nodeId,
    jobId,
    details: { raw },
  };
}

/**
 * Consumes the orchestrator event stream and forwards relevant events to the
 * control loop's queue. Stream failures are counted; once `maxFailures`
 * consecutive failures happen, `watch()` rejects with EventStreamError.
 */
export class ClusterEventSource {
  private readonly client: OrchestratorClient;
  private readonly jobName: string;
  private readonly maxFailures: number;
  private readonly retryDelayMs: number;

  constructor(client: OrchestratorClient, options: ClusterEventSourceOptions) {
    this.client = client;
    this.jobName = options.jobName;
    this.maxFailures = options.maxFailures ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  topics(): NomadTopics {
    return {
      Job: [this.jobName, "*"],
      Allocation: ["*"],
      Node: ["*"],
    };
  }

  /**
   * Stream events into the queue until the signal aborts (resolves) or the
   * failure threshold is reached (rejects).
   */
  async watch(queue: BoundedQueue<ClusterEvent>, signal: AbortSignal): Promise<void> {
    logger.info("Starting cluster event watcher", { job: this.jobName, maxFailures: this.maxFailures });
    let failures = 0;

    while (!signal.aborted) {
      let failure: unknown;
      try {
        for await (const frame of this.client.streamEvents(this.topics(), signal)) {
          failures = 0;
          for (const raw of frame.Events ?? []) {
            const event = toClusterEvent(raw);
            if (!event) continue;
            logger.debug("Forwarding cluster event", { kind: event.kind, nodeId: event.nodeId, jobId: event.jobId });
            await queue.push(event, signal);
          }
        }
        failure = new Error("event stream closed by server");
      } catch (err) {
        failure = err;
      }
      if (signal.aborted) break;

      failures++;
      if (failures >= this.maxFailures) {
        throw new EventStreamError(failures, failure);
      }
      logger.warn("Cluster event stream failed, re-establishing", {
        failures,
        maxFailures: this.maxFailures,
        err: failure,
      });
      await sleep(this.retryDelayMs, signal);
    }

    logger.info("Cluster event watcher stopped");
  }
}
