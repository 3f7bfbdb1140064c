// Server-side middleware types.
//
// Middleware sees every call before its handler runs (pre) and after it has
// settled (post), enabling admission control, logging and observability.

import type { SessionOutcome } from "./session.ts";
import type { Status } from "./status.ts";

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const START = Symbol("start");
 * ctx.extensions.set(START, performance.now());
 * const started = ctx.extensions.get<number>(START);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/** Call shapes served by the echo service. */
export type CallKind = "client-stream" | "server-stream" | "bidi-sync" | "bidi-async";

/**
 * What middleware learns about an incoming call.
 */
export interface CallInfo {
  /** Fully qualified method name. */
  readonly method: string;
  readonly kind: CallKind;
  /** Peer address. */
  readonly peer: string;
}

/**
 * Context passed to middleware hooks.
 *
 * Extensions persist across pre/post hooks for a single call.
 */
export interface ServerContext {
  extensions: Extensions;
}

/**
 * Rejection returned by middleware to refuse a call.
 */
export interface Rejection {
  status: Status;
  message: string;
}

/**
 * Result of a dispatched call as seen by `post` hooks.
 */
export type CallResult =
  | { admitted: true; outcome: SessionOutcome }
  | { admitted: false; rejection: Rejection };

/**
 * Server middleware interface.
 *
 * @example
 * ```typescript
 * const tracing: ServerMiddleware = {
 *   pre(ctx, call) {
 *     ctx.extensions.set(TRACE, crypto.randomUUID());
 *   },
 *   post(ctx, call, result) {
 *     console.log(ctx.extensions.get(TRACE), call.method, result);
 *   },
 * };
 * ```
 */
export interface ServerMiddleware {
  /**
   * Called before the handler runs.
   *
   * Returning a Rejection ends the call with the rejection's status; later
   * `pre` hooks and the handler are skipped.
   */
  pre?(ctx: ServerContext, call: CallInfo): Rejection | void;

  /**
   * Called once the call has settled, or been rejected.
   *
   * Runs for every middleware whose `pre` ran, in reverse order.
   */
  post?(ctx: ServerContext, call: CallInfo, result: CallResult): void;
}
