import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ClusterNode } from "../cluster/types.js";
import type { DnsProvider, DnsRecord } from "../dns/types.js";
import { type NodeSource, type PassRecorder, Reconciler, type ReconciliationOutcome } from "./reconciler.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

function node(id: string, publicAddress: string): ClusterNode {
  return { id, displayName: id, publicAddress, status: "ready" };
}

function record(id: string, content: string): DnsRecord {
  return { id, name: "edge.example.com", recordKind: "A", content, ttl: 1 };
}

function fakeDns(records: DnsRecord[]): DnsProvider {
  return {
    listAddressRecords: vi.fn(async () => records),
    createAddressRecord: vi.fn(async (address: string) => record(`new-${address}`, address)),
    updateAddressRecord: vi.fn(async (recordId: string, address: string) => record(recordId, address)),
    deleteAddressRecord: vi.fn(async () => undefined),
  };
}

describe("Reconciler", () => {
  let outcomes: ReconciliationOutcome[];
  let recorder: PassRecorder;

  beforeEach(() => {
    outcomes = [];
    recorder = {
      recordSyncStart: vi.fn(() => (outcome: ReconciliationOutcome) => {
        outcomes.push(outcome);
      }),
    };
  });

  it("converges records onto the eligible node addresses", async () => {
    const nodes: NodeSource = { resolve: vi.fn(async () => [node("n1", "1.1.1.1"), node("n3", "3.3.3.3")]) };
    const dns = fakeDns([record("A", "1.1.1.1"), record("B", "2.2.2.2")]);
    const reconciler = new Reconciler({ nodes, dns, recorder });

    const outcome = await reconciler.reconcile();

    expect(dns.deleteAddressRecord).toHaveBeenCalledWith("B", undefined);
    expect(dns.createAddressRecord).toHaveBeenCalledWith("3.3.3.3", undefined);
    expect(outcome).toEqual({
      addressesDesired: 2,
      eligibleNodes: 2,
      recordsObserved: 2,
      created: 1,
      deleted: 1,
      failedOperations: 0,
      error: null,
    });
    expect(outcomes).toEqual([outcome]);
  });

  it("makes no provider writes when records already match", async () => {
    const nodes: NodeSource = { resolve: vi.fn(async () => [node("n1", "1.1.1.1")]) };
    const dns = fakeDns([record("A", "1.1.1.1")]);
    const reconciler = new Reconciler({ nodes, dns, recorder });

    const outcome = await reconciler.reconcile();

    expect(dns.createAddressRecord).not.toHaveBeenCalled();
    expect(dns.deleteAddressRecord).not.toHaveBeenCalled();
    expect(outcome.error).toBeNull();
  });

  it("reports a node listing failure without touching DNS", async () => {
    const nodes: NodeSource = { resolve: vi.fn(async () => Promise.reject(new Error("nomad down"))) };
    const dns = fakeDns([record("A", "1.1.1.1")]);
    const reconciler = new Reconciler({ nodes, dns, recorder });

    const outcome = await reconciler.reconcile();

    expect(outcome.error?.message).toBe("nomad down");
    expect(dns.listAddressRecords).not.toHaveBeenCalled();
    expect(dns.deleteAddressRecord).not.toHaveBeenCalled();
    expect(outcomes).toHaveLength(1);
  });

  it("reports a record listing failure", async () => {
    const nodes: NodeSource = { resolve: vi.fn(async () => [node("n1", "1.1.1.1")]) };
    const dns = fakeDns([]);
    vi.mocked(dns.listAddressRecords).mockRejectedValueOnce(new Error("cloudflare down"));
    const reconciler = new Reconciler({ nodes, dns, recorder });

    const outcome = await reconciler.reconcile();

    expect(outcome.error?.message).toBe("cloudflare down");
    expect(outcome.eligibleNodes).toBe(1);
    expect(dns.createAddressRecord).not.toHaveBeenCalled();
  });

  it("counts failed record operations without failing the pass", async () => {
    const nodes: NodeSource = { resolve: vi.fn(async () => [node("n1", "1.1.1.1")]) };
    const dns = fakeDns([]);
    vi.mocked(dns.createAddressRecord).mockRejectedValueOnce(new Error("rate limited"));
    const reconciler = new Reconciler({ nodes, dns, recorder });

    const outcome = await reconciler.reconcile();

    expect(outcome.error).toBeNull();
    expect(outcome.failedOperations).toBe(1);
    expect(outcome.created).toBe(0);
  });

  it("wraps non-Error rejections", async () => {
    const nodes: NodeSource = { resolve: vi.fn(async () => Promise.reject("plain string")) };
    const reconciler = new Reconciler({ nodes, dns: fakeDns([]), recorder });

    const outcome = await reconciler.reconcile();

    expect(outcome.error).toEqual(new Error("plain string"));
  });
});
