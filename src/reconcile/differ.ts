import { canonicalAddress } from "../dns/address.js";
import type { DnsRecord } from "../dns/types.js";

/** Minimal set of record changes that makes the published set match the desired one. */
export interface DnsChangePlan {
  /** Addresses that need a new record. */
  toCreate: string[];
  /** Records whose address is no longer desired. */
  toDelete: DnsRecord[];
  /** Records already pointing at a desired address; never touched. */
  unchanged: DnsRecord[];
}

/**
 * Compare desired addresses with the records currently published.
 *
 * - An empty desired set deletes every record: no eligible nodes means the
 *   hostname serves nothing rather than stale addresses.
 * - Records are matched on address only, so two records sharing an address
 *   are both kept or both deleted.
 */
export function diffRecords(desired: ReadonlySet<string>, records: readonly DnsRecord[]): DnsChangePlan {
  if (desired.size === 0) {
    return { toCreate: [], toDelete: [...records], unchanged: [] };
  }

  const wanted = new Map<string, string>();
  for (const address of desired) {
    const key = canonicalAddress(address);
    if (!wanted.has(key)) wanted.set(key, address.trim());
  }

  const toDelete: DnsRecord[] = [];
  const unchanged: DnsRecord[] = [];
  const published = new Set<string>();
  for (const record of records) {
    const key = canonicalAddress(record.content);
    published.add(key);
    if (wanted.has(key)) {
      unchanged.push(record);
    } else {
      toDelete.push(record);
    }
  }

  const toCreate: string[] = [];
  for (const [key, address] of wanted) {
    if (!published.has(key)) toCreate.push(address);
  }

  return { toCreate, toDelete, unchanged };
}

/** True when applying the plan would not call the provider at all. */
export function isEmptyPlan(plan: DnsChangePlan): boolean {
  return plan.toCreate.length === 0 && plan.toDelete.length === 0;
}
