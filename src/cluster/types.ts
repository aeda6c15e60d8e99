/** Event types that can change which nodes run the proxy job. Everything else is dropped at the source. */
export const CLUSTER_EVENT_KINDS = ["AllocationUpdated", "NodeUpdated", "JobRegistered", "JobDeregistered"] as const;

export type ClusterEventKind = (typeof CLUSTER_EVENT_KINDS)[number];

export function isClusterEventKind(kind: string): kind is ClusterEventKind {
  return (CLUSTER_EVENT_KINDS as readonly string[]).includes(kind);
}

/** Node status the orchestrator reports for a healthy, schedulable client. */
export const READY_NODE_STATUS = "ready";

/** One orchestrator-managed host, rebuilt from scratch on every reconciliation pass. */
export interface ClusterNode {
  id: string;
  displayName: string;
  /** Empty when the orchestrator does not report one. */
  publicAddress: string;
  status: string;
}

/** Eligible: ready and has an address to publish. */
export function isEligibleNode(node: ClusterNode): boolean {
  return node.status === READY_NODE_STATUS && node.publicAddress !== "";
}

/** Normalized trigger produced by the event source. */
export interface ClusterEvent {
  kind: ClusterEventKind;
  /**
   * Stream offset of the event. Monotonic and nanosecond-scaled, but not a
   * wall-clock time.
   */
  timestamp: number;
  /** Empty when the payload carries no usable node id. */
  nodeId: string;
  /** Empty when the payload carries no usable job id. */
  jobId: string;
  details: Record<string, unknown>;
}
