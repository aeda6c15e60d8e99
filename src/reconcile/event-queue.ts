/** Internal waiting-producer state */
interface PendingPush {
  release: () => void;
  onAbort: () => void;
}

export class QueueAbortedError extends Error {
  readonly name = "QueueAbortedError" as const;
  constructor() {
    super("Push aborted while waiting for queue capacity");
  }
}

/**
 * Bounded FIFO between the event source (producer) and the control loop
 * (single consumer). A full queue makes `push` wait rather than drop.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waiting: PendingPush[] = [];
  private readonly listeners = new Set<() => void>();
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Enqueue an item, waiting for space while the queue is full.
   * Rejects with QueueAbortedError if the signal aborts first.
   */
  async push(item: T, signal?: AbortSignal): Promise<void> {
    while (this.items.length >= this.capacity) {
      await this.waitForSpace(signal);
    }
    this.items.push(item);
    for (const listener of this.listeners) listener();
  }

  /** Remove and return every queued item, oldest first. */
  drain(): T[] {
    const drained = this.items.splice(0, this.items.length);
    for (let i = 0; i < drained.length; i++) this.releaseOne();
    return drained;
  }

  /** Register a callback fired after every successful push. Returns an unsubscribe function. */
  onItem(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private waitForSpace(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new QueueAbortedError());

    return new Promise<void>((resolve, reject) => {
      const pending: PendingPush = {
        release: () => {
          signal?.removeEventListener("abort", pending.onAbort);
          resolve();
        },
        onAbort: () => {
          const idx = this.waiting.indexOf(pending);
          if (idx !== -1) this.waiting.splice(idx, 1);
          reject(new QueueAbortedError());
        },
      };
      signal?.addEventListener("abort", pending.onAbort, { once: true });
      this.waiting.push(pending);
    });
  }

  private releaseOne(): void {
    this.waiting.shift()?.release();
  }
}
