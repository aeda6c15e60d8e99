import { logger } from "../config/logger.js";
import type { DnsProvider } from "../dns/types.js";
import type { DnsChangePlan } from "./differ.js";

export interface ConvergenceResult {
  created: number;
  deleted: number;
  failedCreates: number;
  failedDeletes: number;
}

/**
 * Applies a change plan against the DNS provider, deletes before creates.
 *
 * Each record is its own provider call. A failed call is logged and counted
 * and the rest of the batch still runs; failures never fail the pass.
 * An aborted signal stops the batch before the next call.
 */
export class DnsConverger {
  private readonly provider: DnsProvider;

  constructor(provider: DnsProvider) {
    this.provider = provider;
  }

  async apply(plan: DnsChangePlan, signal?: AbortSignal): Promise<ConvergenceResult> {
    const result: ConvergenceResult = { created: 0, deleted: 0, failedCreates: 0, failedDeletes: 0 };

    for (const record of plan.toDelete) {
      if (signal?.aborted) return result;
      try {
        await this.provider.deleteAddressRecord(record.id, signal);
        result.deleted++;
        logger.info(`Deleted ${record.recordKind} record ${record.name} -> ${record.content}`, { recordId: record.id });
      } catch (err) {
        result.failedDeletes++;
        logger.error(`Error deleting record ${record.id}`, { recordId: record.id, content: record.content, err });
      }
    }

    for (const address of plan.toCreate) {
      if (signal?.aborted) return result;
      try {
        const record = await this.provider.createAddressRecord(address, signal);
        result.created++;
        logger.info(`Created ${record.recordKind} record ${record.name} -> ${record.content}`, { recordId: record.id });
      } catch (err) {
        result.failedCreates++;
        logger.error(`Error creating record for ${address}`, { address, err });
      }
    }

    return result;
  }
}
