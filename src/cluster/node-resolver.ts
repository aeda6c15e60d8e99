import { logger } from "../config/logger.js";
import type { NomadNode, OrchestratorClient } from "./nomad-client.js";
import { type ClusterNode, isEligibleNode } from "./types.js";

/** Node attribute holding the address the node fingerprinted for itself. */
export const NODE_ADDRESS_ATTRIBUTE = "unique.network.ip-address";

/** Allocation client status for a task group that is up. */
const RUNNING_ALLOCATION_STATUS = "running";

export function toClusterNode(node: NomadNode): ClusterNode {
  return {
    id: node.ID,
    displayName: node.Name,
    publicAddress: node.Attributes?.[NODE_ADDRESS_ATTRIBUTE]?.trim() ?? "",
    status: node.Status,
  };
}

/**
 * Derives the set of eligible nodes running the proxy job.
 *
 * Every call reads the orchestrator fresh; nothing is cached between passes.
 * A failed allocation listing rejects; a failed node lookup only skips that node.
 */
export class NodeSetResolver {
  private readonly client: OrchestratorClient;
  private readonly jobName: string;

  constructor(client: OrchestratorClient, jobName: string) {
    this.client = client;
    this.jobName = jobName;
  }

  async resolve(signal?: AbortSignal): Promise<ClusterNode[]> {
    const allocations = await this.client.listJobAllocations(this.jobName, signal);

    const nodeIds = new Set<string>();
    for (const alloc of allocations) {
      if (alloc.ClientStatus !== RUNNING_ALLOCATION_STATUS) continue;
      if (!alloc.NodeID) continue;
      nodeIds.add(alloc.NodeID);
    }

    const nodes: ClusterNode[] = [];
    for (const nodeId of nodeIds) {
      let node: ClusterNode;
      try {
        node = toClusterNode(await this.client.getNode(nodeId, signal));
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.warn(`Failed to get node info for ${nodeId}`, { nodeId, err });
        continue;
      }

      if (!isEligibleNode(node)) {
        logger.debug(`Node ${node.displayName} not eligible`, {
          nodeId: node.id,
          status: node.status,
          address: node.publicAddress,
        });
        continue;
      }
      nodes.push(node);
    }

    logger.info(`Resolved ${nodes.length} eligible node(s) for job ${this.jobName}`, {
      runningNodes: nodeIds.size,
      eligibleNodes: nodes.length,
    });
    return nodes;
  }
}

/** The address set to publish. Colliding addresses collapse. */
export function desiredAddresses(nodes: readonly ClusterNode[]): ReadonlySet<string> {
  return new Set(nodes.filter(isEligibleNode).map((n) => n.publicAddress));
}
