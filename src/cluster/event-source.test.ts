import { describe, expect, it, vi } from "vitest";
import { BoundedQueue } from "../reconcile/event-queue.js";
import { ClusterEventSource, EventStreamError, toClusterEvent } from "./event-source.js";
import type { NomadEvent, NomadEventFrame, NomadTopics, OrchestratorClient } from "./nomad-client.js";
import type { ClusterEvent } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

function allocationEvent(index: number, nodeId: string): NomadEvent {
  return {
    Topic: "Allocation",
    Type: "AllocationUpdated",
    Index: index,
    Payload: { Allocation: { NodeID: nodeId, JobID: "ingress" } },
  };
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

type StreamScript = (signal: AbortSignal) => AsyncGenerator<NomadEventFrame>;

async function* failing(): AsyncGenerator<NomadEventFrame> {
  throw new Error("connection refused");
}

function framesThenHold(...frames: NomadEventFrame[]): StreamScript {
  return async function* (signal) {
    yield* frames;
    await untilAborted(signal);
  };
}

function framesThenFail(...frames: NomadEventFrame[]): StreamScript {
  return async function* () {
    yield* frames;
    throw new Error("stream reset");
  };
}

function scriptedClient(scripts: StreamScript[]) {
  let call = 0;
  const streamEvents = vi.fn((_topics: NomadTopics, signal: AbortSignal) => {
    const script = scripts[Math.min(call, scripts.length - 1)];
    call++;
    return script(signal);
  });
  const client: OrchestratorClient = {
    listJobAllocations: vi.fn(async () => []),
    getNode: vi.fn(async () => Promise.reject(new Error("not used"))),
    streamEvents,
  };
  return { client, streamEvents };
}

describe("toClusterEvent", () => {
  it("reads ids from the embedded allocation", () => {
    const raw = allocationEvent(42, "n1");
    expect(toClusterEvent(raw)).toEqual({
      kind: "AllocationUpdated",
      timestamp: 42,
      nodeId: "n1",
      jobId: "ingress",
      details: { raw },
    });
  });

  it("prefers ids at the top level of the payload", () => {
    const event = toClusterEvent({
      Topic: "Allocation",
      Type: "AllocationUpdated",
      Index: 7,
      Payload: { NodeID: "top", JobID: "job-top", Allocation: { NodeID: "nested", JobID: "job-nested" } },
    });
    expect(event?.nodeId).toBe("top");
    expect(event?.jobId).toBe("job-top");
  });

  it("reads the node id from a node payload", () => {
    const event = toClusterEvent({ Topic: "Node", Type: "NodeUpdated", Index: 3, Payload: { Node: { ID: "n9" } } });
    expect(event?.nodeId).toBe("n9");
    expect(event?.jobId).toBe("");
  });

  it("drops event types the controller ignores", () => {
    expect(toClusterEvent({ Topic: "Deployment", Type: "SomeOtherEvent", Index: 5, Payload: {} })).toBeNull();
  });

  it("drops events without a stream index", () => {
    expect(toClusterEvent({ Topic: "Job", Type: "JobRegistered", Index: 0, Payload: {} })).toBeNull();
  });

  it("treats non-string ids as absent", () => {
    const event = toClusterEvent({ Topic: "Node", Type: "NodeUpdated", Index: 9, Payload: { NodeID: 12345 } });
    expect(event?.nodeId).toBe("");
  });

  it("accepts an event without a payload", () => {
    const event = toClusterEvent({ Topic: "Job", Type: "JobDeregistered", Index: 11 });
    expect(event?.nodeId).toBe("");
    expect(event?.jobId).toBe("");
  });
});

describe("ClusterEventSource", () => {
  it("subscribes to the proxy job and every allocation and node", () => {
    const { client } = scriptedClient([failing]);
    const source = new ClusterEventSource(client, { jobName: "ingress" });
    expect(source.topics()).toEqual({ Job: ["ingress", "*"], Allocation: ["*"], Node: ["*"] });
  });

  it("forwards relevant events to the queue until aborted", async () => {
    const { client } = scriptedClient([
      framesThenHold({
        Index: 2,
        Events: [
          allocationEvent(1, "n1"),
          { Topic: "Deployment", Type: "SomeOtherEvent", Index: 2 },
          allocationEvent(2, "n2"),
        ],
      }),
    ]);
    const source = new ClusterEventSource(client, { jobName: "ingress" });
    const queue = new BoundedQueue<ClusterEvent>(8);
    const controller = new AbortController();

    const watching = source.watch(queue, controller.signal);
    await vi.waitFor(() => expect(queue.size).toBe(2));
    controller.abort();
    await watching;

    expect(queue.drain().map((e) => e.nodeId)).toEqual(["n1", "n2"]);
  });

  it("waits for queue space instead of dropping events", async () => {
    const { client } = scriptedClient([
      framesThenHold({ Events: [allocationEvent(1, "n1"), allocationEvent(2, "n2")] }),
    ]);
    const source = new ClusterEventSource(client, { jobName: "ingress" });
    const queue = new BoundedQueue<ClusterEvent>(1);
    const controller = new AbortController();

    const watching = source.watch(queue, controller.signal);
    await vi.waitFor(() => expect(queue.size).toBe(1));
    expect(queue.drain().map((e) => e.nodeId)).toEqual(["n1"]);
    await vi.waitFor(() => expect(queue.size).toBe(1));
    expect(queue.drain().map((e) => e.nodeId)).toEqual(["n2"]);

    controller.abort();
    await watching;
  });

  it("fails on the first stream error by default", async () => {
    const { client, streamEvents } = scriptedClient([failing]);
    const source = new ClusterEventSource(client, { jobName: "ingress" });

    const watching = source.watch(new BoundedQueue<ClusterEvent>(4), new AbortController().signal);

    await expect(watching).rejects.toBeInstanceOf(EventStreamError);
    await expect(watching).rejects.toThrow("Cluster event stream failed 1 time(s) in a row: connection refused");
    expect(streamEvents).toHaveBeenCalledTimes(1);
  });

  it("treats a stream closed by the server as a failure", async () => {
    const { client } = scriptedClient([framesThenFail()]);
    const source = new ClusterEventSource(client, { jobName: "ingress" });

    await expect(source.watch(new BoundedQueue<ClusterEvent>(4), new AbortController().signal)).rejects.toThrow(
      "stream reset",
    );
  });

  it("re-establishes the stream while under the failure threshold", async () => {
    const { client, streamEvents } = scriptedClient([failing, framesThenHold({ Events: [allocationEvent(5, "n5")] })]);
    const source = new ClusterEventSource(client, { jobName: "ingress", maxFailures: 3, retryDelayMs: 0 });
    const queue = new BoundedQueue<ClusterEvent>(4);
    const controller = new AbortController();

    const watching = source.watch(queue, controller.signal);
    await vi.waitFor(() => expect(queue.size).toBe(1));
    controller.abort();
    await watching;

    expect(streamEvents).toHaveBeenCalledTimes(2);
  });

  it("counts only consecutive failures", async () => {
    const { client, streamEvents } = scriptedClient([
      failing,
      framesThenFail({ Events: [allocationEvent(5, "n5")] }),
      failing,
    ]);
    const source = new ClusterEventSource(client, { jobName: "ingress", maxFailures: 2, retryDelayMs: 0 });

    const err = await source.watch(new BoundedQueue<ClusterEvent>(4), new AbortController().signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EventStreamError);
    expect(err instanceof EventStreamError && err.failures).toBe(2);
    expect(streamEvents).toHaveBeenCalledTimes(3);
  });

  it("resolves without opening a stream when already aborted", async () => {
    const { client, streamEvents } = scriptedClient([failing]);
    const source = new ClusterEventSource(client, { jobName: "ingress" });

    await source.watch(new BoundedQueue<ClusterEvent>(4), AbortSignal.abort());

    expect(streamEvents).not.toHaveBeenCalled();
  });
});
