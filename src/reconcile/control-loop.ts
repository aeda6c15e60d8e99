import type { ClusterEvent } from "../cluster/types.js";
import { MAX_TIMER_DELAY_MS } from "../config/index.js";
import { logger } from "../config/logger.js";
import { BoundedQueue } from "./event-queue.js";
import type { ReconciliationOutcome } from "./reconciler.js";
import { sleep } from "./sleep.js";

export type LoopState = "idle" | "reconciling" | "stopped";

/** What caused a reconciliation pass. */
export type PassTrigger = "startup" | "event" | "timer";

type Wakeup = PassTrigger | "stop" | "fatal";

export interface PassRunner {
  reconcile(signal?: AbortSignal): Promise<ReconciliationOutcome>;
}

/** Long-running producer of cluster events; rejects only on a fatal stream failure. */
export interface EventWatcher {
  watch(queue: BoundedQueue<ClusterEvent>, signal: AbortSignal): Promise<void>;
}

/** Health collaborator the loop reports to. */
export interface LoopObserver {
  /** Called once, after the first successful pass. */
  markReady(): void;
  recordEvents(count: number): void;
}

export interface ControlLoopDeps {
  reconciler: PassRunner;
  events: EventWatcher;
  observer: LoopObserver;
}

export interface ControlLoopOptions {
  /** Fallback timer period. */
  syncIntervalMs: number;
  /** Fixed wait between the first event of a burst and the pass it triggers. */
  debounceMs: number;
  /** Capacity of the event queue between the watcher and the loop. */
  queueCapacity: number;
}

function checkDelay(name: string, ms: number): number {
  if (!(ms > 0 && ms <= MAX_TIMER_DELAY_MS)) {
    throw new RangeError(`${name} must be between 1 and ${MAX_TIMER_DELAY_MS}ms, got ${ms}`);
  }
  return ms;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Top-level scheduler. Runs one pass at startup, then one pass per debounced
 * event burst and one per fallback tick, strictly one at a time.
 *
 * ```
 * idle → reconciling → idle
 * idle | reconciling → stopped   (abort signal, or fatal watcher error)
 * ```
 *
 * The loop only looks for its next trigger once the current pass (including
 * its debounce wait) is done, so passes never overlap. Events that arrive
 * meanwhile stay queued and are coalesced into the next pass.
 */
export class ControlLoop {
  private readonly reconciler: PassRunner;
  private readonly events: EventWatcher;
  private readonly observer: LoopObserver;
  private readonly queue: BoundedQueue<ClusterEvent>;
  private readonly syncIntervalMs: number;
  private readonly debounceMs: number;

  private loopState: LoopState = "idle";
  private started = false;
  private ready = false;
  private timerDue = false;
  private fatal: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(deps: ControlLoopDeps, options: ControlLoopOptions) {
    this.reconciler = deps.reconciler;
    this.events = deps.events;
    this.observer = deps.observer;
    this.queue = new BoundedQueue<ClusterEvent>(options.queueCapacity);
    this.syncIntervalMs = checkDelay("syncIntervalMs", options.syncIntervalMs);
    this.debounceMs = checkDelay("debounceMs", options.debounceMs);
  }

  get state(): LoopState {
    return this.loopState;
  }

  /**
   * Run until the signal aborts (resolves) or the event watcher fails fatally
   * (rejects with the watcher's error). A loop runs at most once.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.started) {
      throw new Error("Control loop can only be run once");
    }
    this.started = true;

    const watchAbort = new AbortController();
    const onAbort = () => {
      watchAbort.abort();
      this.notify();
    };
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) onAbort();
    const unsubscribe = this.queue.onItem(() => this.notify());

    logger.info("Control loop starting", {
      syncIntervalMs: this.syncIntervalMs,
      debounceMs: this.debounceMs,
      queueCapacity: this.queue.capacity,
    });

    const watching = this.events.watch(this.queue, watchAbort.signal).catch((err: unknown) => {
      this.fatal = toError(err);
      logger.error("Event watcher fatal error", { err: this.fatal });
      this.notify();
    });
    const ticker = setInterval(() => {
      this.timerDue = true;
      this.notify();
    }, this.syncIntervalMs);

    try {
      if (!signal.aborted) await this.runPass("startup", signal);

      for (;;) {
        const trigger = await this.nextTrigger(signal);
        if (trigger === "stop") break;
        if (trigger === "fatal") {
          logger.error("Event watcher exceeded error threshold, shutting down", { err: this.fatal });
          throw this.fatal ?? new Error("event watcher failed");
        }

        if (trigger === "event") {
          const completed = await sleep(this.debounceMs, signal);
          if (!completed) break;
          const coalesced = this.queue.drain();
          this.observer.recordEvents(coalesced.length);
          logger.info("Received cluster events", {
            count: coalesced.length,
            kinds: [...new Set(coalesced.map((e) => e.kind))],
          });
        } else {
          logger.info("Performing periodic sync");
        }

        await this.runPass(trigger, signal);
      }
    } finally {
      clearInterval(ticker);
      watchAbort.abort();
      await watching;
      unsubscribe();
      signal.removeEventListener("abort", onAbort);
      this.loopState = "stopped";
      logger.info("Control loop stopped");
    }
  }

  private async runPass(trigger: PassTrigger, signal: AbortSignal): Promise<void> {
    // Any pass satisfies a pending fallback tick.
    this.timerDue = false;
    this.loopState = "reconciling";
    logger.debug("Reconciliation pass starting", { trigger });
    try {
      const outcome = await this.reconciler.reconcile(signal);
      if (!outcome.error && !this.ready) {
        this.ready = true;
        this.observer.markReady();
      }
    } catch (err) {
      logger.error(`Reconciliation pass after ${trigger} failed`, { err });
    } finally {
      this.loopState = "idle";
    }
  }

  /** Wait for whichever of abort, fatal error, queued event or fallback tick comes first. */
  private async nextTrigger(signal: AbortSignal): Promise<Wakeup> {
    for (;;) {
      if (signal.aborted) return "stop";
      if (this.fatal) return "fatal";
      if (this.queue.size > 0) return "event";
      if (this.timerDue) return "timer";
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
