// Streaming type definitions

import { Status } from "../status.ts";

/**
 * One item handed across a relay queue.
 *
 * - `data` carries a message.
 * - `end` is the sentinel: the producer will put nothing more.
 * - `cancelled` is returned to a consumer whose cancellation token fired while it waited.
 */
export type RelayItem<T> =
  | { kind: "data"; value: T }
  | { kind: "end" }
  | { kind: "cancelled" };

/** Result of reading the inbound side of a stream. */
export type Received<T> = { kind: "data"; value: T } | { kind: "end" };

/**
 * Cancellation capability shared with every suspend point of a call.
 *
 * `signal` wakes waiters immediately; `isCancelled()` is re-checked on every
 * poll-interval wake-up, so it may also consult liveness that has no event.
 */
export interface CancellationToken {
  readonly signal: AbortSignal;
  isCancelled(): boolean;
}

/** Error types for streaming operations. */
export class StreamError extends Error {
  constructor(
    public kind: "transport" | "processing" | "closed" | "rejected",
    message: string,
    public status: Status,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StreamError";
  }

  /**
   * Reading from or writing to the peer failed.
   *
   * A StreamError raised by the transport itself (e.g. a payload its decoder
   * rejected) is returned unchanged.
   */
  static transport(cause: unknown): StreamError {
    if (cause instanceof StreamError) return cause;
    return new StreamError("transport", `transport error: ${describe(cause)}`, Status.UNAVAILABLE, {
      cause,
    });
  }

  /** The message transformation raised. A StreamError passes through unchanged. */
  static processing(cause: unknown): StreamError {
    if (cause instanceof StreamError) return cause;
    return new StreamError("processing", `processing error: ${describe(cause)}`, Status.INTERNAL, {
      cause,
    });
  }

  static closed(): StreamError {
    return new StreamError("closed", "stream closed", Status.CANCELLED);
  }

  /** A middleware refused the call before it reached its handler. */
  static rejected(status: Status, message: string): StreamError {
    return new StreamError("rejected", message, status);
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
