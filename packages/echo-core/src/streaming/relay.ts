// Bounded relay queue between two activities of one call.

import type { CancellationToken, RelayItem } from "./types.ts";

export interface RelayQueueOptions {
  /** Maximum number of data items held at once. Defaults to 10. */
  capacity?: number;
  /**
   * Upper bound (ms) on a single wait before `put`/`take` re-check the
   * caller's token. Defaults to 100.
   */
  pollIntervalMs?: number;
}

type Waiter = () => void;

/**
 * A fixed-capacity FIFO hand-off from one producer to one consumer.
 *
 * `put` suspends while the queue is full, which is how a fast producer is
 * slowed to the consumer's pace. The end sentinel does not count against
 * capacity, so a producer can always finish. The sentinel stays at the head
 * once reached: every later `take` sees `end` again.
 */
export class RelayQueue<T> {
  readonly capacity: number;
  readonly pollIntervalMs: number;

  private buffer: T[] = [];
  private _ended = false;
  private _abandoned = false;
  private _highWaterMark = 0;
  private itemWaiters: Waiter[] = [];
  private spaceWaiters: Waiter[] = [];

  constructor(options: RelayQueueOptions = {}) {
    const capacity = options.capacity ?? 10;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`relay queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  /** Number of data items currently held. */
  get size(): number {
    return this.buffer.length;
  }

  /** Largest `size` observed since construction. */
  get highWaterMark(): number {
    return this._highWaterMark;
  }

  /** Whether the sentinel has been put. */
  get ended(): boolean {
    return this._ended;
  }

  /** Whether the consumer has gone away. */
  get abandoned(): boolean {
    return this._abandoned;
  }

  /**
   * Append a value, waiting while the queue is full.
   *
   * Resolves `false` without enqueuing when the token is cancelled, the
   * queue has ended, or the consumer abandoned it.
   */
  async put(value: T, token?: CancellationToken): Promise<boolean> {
    while (true) {
      if (this._ended || this._abandoned) return false;
      if (token?.isCancelled()) return false;

      if (this.buffer.length < this.capacity) {
        this.push(value);
        return true;
      }

      await this.park(this.spaceWaiters, token);
    }
  }

  /** Append a value if there is room right now. */
  tryPut(value: T): boolean {
    if (this._ended || this._abandoned) return false;
    if (this.buffer.length >= this.capacity) return false;
    this.push(value);
    return true;
  }

  /**
   * Remove and return the head, waiting while the queue is empty.
   *
   * Data items queued before the sentinel are always delivered first. A
   * cancelled token wins over anything still queued.
   */
  async take(token?: CancellationToken): Promise<RelayItem<T>> {
    while (true) {
      if (token?.isCancelled()) return { kind: "cancelled" };

      if (this.buffer.length > 0) {
        const [value] = this.buffer.splice(0, 1);
        wakeAll(this.spaceWaiters);
        return { kind: "data", value };
      }

      if (this._ended) return { kind: "end" };

      await this.park(this.itemWaiters, token);
    }
  }

  /**
   * Put the end sentinel.
   *
   * Returns false if it was already put; the queue only ever holds one.
   */
  end(): boolean {
    if (this._ended) return false;
    this._ended = true;
    wakeAll(this.itemWaiters);
    wakeAll(this.spaceWaiters);
    return true;
  }

  /**
   * Mark the consumer as gone.
   *
   * Pending and future `put`s resolve false, and held items are discarded.
   */
  abandon(): void {
    if (this._abandoned) return;
    this._abandoned = true;
    this.buffer.length = 0;
    wakeAll(this.spaceWaiters);
  }

  private push(value: T): void {
    this.buffer.push(value);
    if (this.buffer.length > this._highWaterMark) {
      this._highWaterMark = this.buffer.length;
    }
    wakeAll(this.itemWaiters);
  }

  // Resolves on the first of: a wake-up from the other side, the token's
  // signal, or the poll interval.
  private park(waiters: Waiter[], token?: CancellationToken): Promise<void> {
    return new Promise((resolve) => {
      const signal = token?.signal;
      const wake = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", wake);
        const index = waiters.indexOf(wake);
        if (index >= 0) waiters.splice(index, 1);
        resolve();
      };
      const timer = setTimeout(wake, this.pollIntervalMs);
      if (signal?.aborted) {
        wake();
        return;
      }
      signal?.addEventListener("abort", wake, { once: true });
      waiters.push(wake);
    });
  }
}

function wakeAll(waiters: Waiter[]): void {
  for (const waiter of waiters.splice(0)) {
    waiter();
  }
}
