// Call logging middleware.
//
// Logs each call's start and end with timing, message counts and the way it
// ended.

import type { Logger } from "./logging.ts";
import type { CallInfo, CallResult, ServerContext, ServerMiddleware } from "./middleware.ts";
import { statusName } from "./status.ts";

const START_TIME = Symbol("logging:start-time");

export interface LoggingMiddlewareOptions {
  /**
   * Log the peer address. Defaults to true.
   */
  logPeer?: boolean;

  /**
   * Minimum duration (ms) to log the end of a call. Calls faster than this
   * are skipped. Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

/**
 * Create a middleware that logs every call.
 *
 * Output:
 * - start: `→ method` with `{ kind, peer? }` at debug level
 * - end: `← method: ✓ 12.34ms` with `{ state, received, sent }` at info level,
 *   or `← method: ✗ …` with the error at warn level
 *
 * @example
 * ```typescript
 * const service = new EchoService({ middleware: [loggingMiddleware(log.child("rpc"))] });
 * ```
 */
export function loggingMiddleware(log: Logger, options: LoggingMiddlewareOptions = {}): ServerMiddleware {
  const logPeer = options.logPeer ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(ctx: ServerContext, call: CallInfo): void {
      ctx.extensions.set(START_TIME, performance.now());

      const logObj: Record<string, unknown> = { kind: call.kind };
      if (logPeer) logObj.peer = call.peer;
      log.debug(`→ ${call.method}`, logObj);
    },

    post(ctx: ServerContext, call: CallInfo, result: CallResult): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      const took = `${duration.toFixed(2)}ms`;

      if (!result.admitted) {
        log.warn(`← ${call.method}: ✗ ${took}`, {
          rejected: statusName(result.rejection.status),
          reason: result.rejection.message,
        });
        return;
      }

      const { outcome } = result;
      const logObj: Record<string, unknown> = {
        state: outcome.state,
        received: outcome.requestCount,
        sent: outcome.responseCount,
      };
      if (outcome.cancelReason) logObj.cancelReason = outcome.cancelReason;

      if (outcome.state === "errored") {
        if (outcome.error) {
          logObj.error = { kind: outcome.error.kind, message: outcome.error.message };
        }
        log.warn(`← ${call.method}: ✗ ${took}`, logObj);
      } else {
        log.info(`← ${call.method}: ✓ ${took}`, logObj);
      }
    },
  };
}
