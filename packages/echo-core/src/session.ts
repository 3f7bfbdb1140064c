// Per-call session: lifecycle state, cancellation and counters.

import { setTimeout as delay } from "node:timers/promises";
import type { Inbound, Outbound, StreamCall } from "./call.ts";
import { type Logger, silentLogger } from "./logging.ts";
import { Status } from "./status.ts";
import { type CancellationToken, type RelayItem, StreamError } from "./streaming/types.ts";

/**
 * Session lifecycle.
 *
 * created → active → draining → closed, with cancelled and errored reachable
 * from active or draining. The last three are terminal. A session enters
 * cancelled or errored as soon as the signal is raised; `settle()` then only
 * reports it to the transport.
 */
export type SessionState = "created" | "active" | "draining" | "closed" | "cancelled" | "errored";

/** Why the cancellation signal was raised. */
export type CancelReason = "peer-gone" | "inactive" | "fault" | "join-timeout";

/** How a call ended. */
export interface SessionOutcome {
  state: "closed" | "cancelled" | "errored";
  requestCount: number;
  responseCount: number;
  durationMs: number;
  cancelReason?: CancelReason;
  error?: StreamError;
}

export interface SessionOptions {
  logger?: Logger;
  /** How often a blocked receive re-checks `isActive()`. Defaults to 100. */
  pollIntervalMs?: number;
}

/**
 * State owned by the top-level handler of one call.
 *
 * Activities spawned by the handler get the session as a `CancellationToken`
 * and otherwise only touch it through `recordRequest`, `recordResponse` and
 * `fail`. The request counter is written by the reading activity only, the
 * response counter by the writing one.
 */
export class StreamSession implements CancellationToken {
  private readonly controller = new AbortController();
  private readonly log: Logger;
  private readonly pollIntervalMs: number;
  private _state: SessionState = "created";
  private _requestCount = 0;
  private _responseCount = 0;
  private _cancelReason: CancelReason | null = null;
  private _fault: StreamError | null = null;
  private startedAt = 0;
  private outcome: SessionOutcome | null = null;
  private readonly onPeerGone = (): void => {
    this.cancel("peer-gone");
  };

  constructor(
    private readonly call: StreamCall,
    options: SessionOptions = {},
  ) {
    this.log = options.logger ?? silentLogger;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  get state(): SessionState {
    return this._state;
  }

  get requestCount(): number {
    return this._requestCount;
  }

  get responseCount(): number {
    return this._responseCount;
  }

  get cancelReason(): CancelReason | null {
    return this._cancelReason;
  }

  get fault(): StreamError | null {
    return this._fault;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get settled(): boolean {
    return this.outcome !== null;
  }

  /** Enter `active` and start listening for the peer going away. */
  begin(): void {
    if (this._state !== "created") return;
    this._state = "active";
    this.startedAt = performance.now();
    if (this.call.peerGone.aborted) {
      this.cancel("peer-gone");
      return;
    }
    this.call.peerGone.addEventListener("abort", this.onPeerGone, { once: true });
  }

  /** End-of-input seen while outbound work may remain. */
  beginDraining(): void {
    if (this._state === "active") {
      this._state = "draining";
    }
  }

  /**
   * Whether the call should wind down.
   *
   * Also polls the transport: an inactive call raises the signal here.
   */
  isCancelled(): boolean {
    if (this._cancelReason !== null) return true;
    if (this.outcome === null && !this.call.isActive()) {
      this.cancel("inactive");
      return true;
    }
    return false;
  }

  /**
   * Raise the cancellation signal.
   *
   * Idempotent: returns true only for the call that raised it.
   */
  cancel(reason: CancelReason): boolean {
    if (this._cancelReason !== null || this.outcome !== null) return false;
    this._cancelReason = reason;
    this._state = this._fault !== null ? "errored" : "cancelled";
    if (reason !== "fault") {
      this.log.info("call cancelled", { method: this.call.method, reason });
    }
    this.controller.abort(StreamError.closed());
    return true;
  }

  /**
   * Record an unrecoverable fault and raise cancellation.
   *
   * Only the first terminal cause counts; a fault after cancellation is
   * logged and otherwise ignored.
   */
  fail(error: StreamError): void {
    if (this.outcome !== null || this._cancelReason !== null) {
      this.log.debug("fault after cancellation", {
        method: this.call.method,
        error: error.message,
      });
      return;
    }
    this._fault = error;
    this.log.error(error.message, { method: this.call.method, kind: error.kind });
    this.cancel("fault");
  }

  recordRequest(): void {
    this._requestCount++;
  }

  recordResponse(): void {
    this._responseCount++;
  }

  /**
   * Receive from the inbound half, giving up when the session is cancelled.
   *
   * The transport's receive keeps running if cancellation wins; a late
   * rejection from it is logged.
   */
  async receive<T>(inbound: Inbound<T>): Promise<RelayItem<T>> {
    if (this.isCancelled()) return { kind: "cancelled" };
    const item = await this.untilCancelled(inbound.receive(), "receive");
    return item ?? { kind: "cancelled" };
  }

  /**
   * Write one message, giving up when the session is cancelled.
   *
   * Resolves false if cancellation won; the transport gets the signal so a
   * write parked on flow control can stop waiting too.
   */
  async send<T>(outbound: Outbound<T>, message: T): Promise<boolean> {
    if (this.isCancelled()) return false;
    const sent = await this.untilCancelled(
      outbound.send(message, this.signal).then(() => true),
      "send",
    );
    return sent ?? false;
  }

  /** Race `pending` against cancellation; null if cancellation won. */
  private async untilCancelled<R>(pending: Promise<R>, what: string): Promise<R | null> {
    let resolveCancelled: (value: null) => void = () => {};
    const cancelled = new Promise<null>((resolve) => {
      resolveCancelled = resolve;
    });
    const onAbort = (): void => resolveCancelled(null);
    this.signal.addEventListener("abort", onAbort, { once: true });
    const timer = setInterval(() => {
      if (this.isCancelled()) onAbort();
    }, this.pollIntervalMs);

    try {
      return await Promise.race([pending, cancelled]);
    } finally {
      clearInterval(timer);
      this.signal.removeEventListener("abort", onAbort);
      if (this.signal.aborted) {
        pending.catch((error: unknown) => {
          this.log.debug(`${what} failed after cancellation`, {
            method: this.call.method,
            error: String(error),
          });
        });
      }
    }
  }

  /**
   * Wait `ms` milliseconds.
   *
   * Resolves false early if the session is cancelled meanwhile.
   */
  async sleep(ms: number): Promise<boolean> {
    if (this.isCancelled()) return false;
    if (ms <= 0) return true;
    try {
      await delay(ms, undefined, { signal: this.signal });
      return !this.isCancelled();
    } catch (error) {
      if (this.signal.aborted) return false;
      throw error;
    }
  }

  /**
   * Perform the single terminal transition.
   *
   * A recorded fault aborts the call with the fault's status; a cancellation
   * aborts it with CANCELLED; otherwise `finish` ends it normally. Settling
   * again returns the first outcome and leaves the transport alone.
   */
  settle(finish: () => void): SessionOutcome {
    if (this.outcome !== null) {
      this.log.warn("session settled twice", { method: this.call.method });
      return this.outcome;
    }

    this.call.peerGone.removeEventListener("abort", this.onPeerGone);

    let state: SessionOutcome["state"];
    let error = this._fault ?? undefined;
    if (this._fault !== null) {
      state = "errored";
      this.call.abort(this._fault.status, this._fault.message);
    } else if (this._cancelReason !== null) {
      state = "cancelled";
      this.call.abort(Status.CANCELLED, `call cancelled: ${this._cancelReason}`);
    } else {
      try {
        finish();
        state = "closed";
      } catch (e) {
        error = StreamError.transport(e);
        state = "errored";
        this.log.error(error.message, { method: this.call.method });
      }
    }

    this._state = state;
    this.outcome = {
      state,
      requestCount: this._requestCount,
      responseCount: this._responseCount,
      durationMs: this.startedAt > 0 ? performance.now() - this.startedAt : 0,
      ...(this._cancelReason !== null ? { cancelReason: this._cancelReason } : {}),
      ...(error ? { error } : {}),
    };

    // Release anything still parked on the signal.
    if (!this.controller.signal.aborted) {
      this.controller.abort(StreamError.closed());
    }
    return this.outcome;
  }
}
