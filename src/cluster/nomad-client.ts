import { z } from "zod";
import { logger } from "../config/logger.js";

/** Nomad API response types (only what we need) */
export interface NomadAllocationStub {
  ID: string;
  JobID: string;
  NodeID: string;
  ClientStatus: string;
}

export interface NomadNode {
  ID: string;
  Name: string;
  Status: string;
  Attributes?: Record<string, string>;
}

const nomadEventSchema = z
  .object({
    Topic: z.string().default(""),
    Type: z.string(),
    Key: z.string().optional(),
    Index: z.number().default(0),
    Payload: z.record(z.unknown()).nullish(),
  })
  .passthrough();

const nomadEventFrameSchema = z.object({
  Index: z.number().optional(),
  Events: z.array(nomadEventSchema).optional(),
});

export type NomadEvent = z.infer<typeof nomadEventSchema>;
export type NomadEventFrame = z.infer<typeof nomadEventFrameSchema>;

/** Event stream topic -> filter keys, e.g. `{ Job: ["ingress", "*"] }`. */
export type NomadTopics = Record<string, string[]>;

export class NomadApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly nomadMessage: string,
  ) {
    super(`Nomad API error ${statusCode}: ${nomadMessage}`);
    this.name = "NomadApiError";
  }
}

/** The three orchestrator reads the controller depends on. */
export interface OrchestratorClient {
  listJobAllocations(jobId: string, signal?: AbortSignal): Promise<NomadAllocationStub[]>;
  getNode(nodeId: string, signal?: AbortSignal): Promise<NomadNode>;
  streamEvents(topics: NomadTopics, signal: AbortSignal): AsyncIterable<NomadEventFrame>;
}

export interface NomadClientOptions {
  address: string;
  token: string;
  namespace?: string;
}

export class NomadClient implements OrchestratorClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly namespace: string;

  constructor(options: NomadClientOptions) {
    this.baseUrl = options.address.replace(/\/+$/, "");
    this.token = options.token;
    this.namespace = options.namespace ?? "default";
  }

  /** List every allocation of a job, including terminal ones. */
  async listJobAllocations(jobId: string, signal?: AbortSignal): Promise<NomadAllocationStub[]> {
    return this.get<NomadAllocationStub[]>(`/v1/job/${encodeURIComponent(jobId)}/allocations`, { all: "true" }, signal);
  }

  /** Get a node by ID */
  async getNode(nodeId: string, signal?: AbortSignal): Promise<NomadNode> {
    return this.get<NomadNode>(`/v1/node/${encodeURIComponent(nodeId)}`, {}, signal);
  }

  /**
   * Open the event stream and yield decoded frames until the server closes it
   * or the signal aborts. Heartbeat frames (`{}`) are yielded as empty frames.
   */
  async *streamEvents(topics: NomadTopics, signal: AbortSignal): AsyncGenerator<NomadEventFrame> {
    const query = new URLSearchParams({ index: "0", namespace: this.namespace });
    for (const [topic, keys] of Object.entries(topics)) {
      for (const key of keys) {
        query.append("topic", `${topic}:${key}`);
      }
    }

    const res = await fetch(`${this.baseUrl}/v1/event/stream?${query.toString()}`, {
      method: "GET",
      headers: this.headers(),
      signal,
    });
    if (!res.ok) {
      throw new NomadApiError(res.status, await errorText(res));
    }
    if (!res.body) {
      throw new NomadApiError(res.status, "event stream response has no body");
    }

    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let buffered = "";
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        buffered += decoder.decode(value, { stream: true });

        let newline = buffered.indexOf("\n");
        while (newline !== -1) {
          const line = buffered.slice(0, newline).trim();
          buffered = buffered.slice(newline + 1);
          newline = buffered.indexOf("\n");
          if (!line) continue;

          const frame = parseFrame(line);
          if (frame) yield frame;
        }
      }
    } finally {
      await reader.cancel().catch((err: unknown) => {
        logger.debug("Event stream reader cancel failed", { err });
      });
    }
  }

  private headers(): Record<string, string> {
    return {
      "X-Nomad-Token": this.token,
      Accept: "application/json",
    };
  }

  private async get<T>(path: string, params: Record<string, string>, signal?: AbortSignal): Promise<T> {
    const query = new URLSearchParams({ ...params, namespace: this.namespace });
    const res = await fetch(`${this.baseUrl}${path}?${query.toString()}`, {
      method: "GET",
      headers: this.headers(),
      signal,
    });
    if (!res.ok) {
      throw new NomadApiError(res.status, await errorText(res));
    }
    return res.json() as Promise<T>;
  }
}

async function errorText(res: Response): Promise<string> {
  const text = await res.text().catch(() => "");
  return text.trim() || res.statusText;
}

/**
 * Decode one newline-delimited frame. Malformed JSON means the stream is
 * corrupt and throws; a well-formed frame of an unexpected shape is skipped.
 */
function parseFrame(line: string): NomadEventFrame | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new Error(`Malformed event stream frame: ${line.slice(0, 200)}`);
  }

  const parsed = nomadEventFrameSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Skipping event stream frame with unexpected shape", { issues: parsed.error.issues.length });
    return null;
  }
  return parsed.data;
}
