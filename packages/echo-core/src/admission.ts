// Call admission: caps how many calls are in flight at once.

import type { CallInfo, CallResult, ServerContext, ServerMiddleware } from "./middleware.ts";
import { Status } from "./status.ts";

const ADMITTED = Symbol("admission:admitted");

export interface AdmissionMiddleware extends ServerMiddleware {
  /** Calls currently admitted. */
  readonly inFlight: number;
}

/**
 * Refuse calls beyond `maxConcurrentCalls` with RESOURCE_EXHAUSTED.
 *
 * Every async bidirectional call runs two extra activities for its whole
 * lifetime, so the number of admitted calls bounds that work too.
 */
export function admissionMiddleware(maxConcurrentCalls: number): AdmissionMiddleware {
  let inFlight = 0;

  return {
    get inFlight() {
      return inFlight;
    },

    pre(ctx: ServerContext, call: CallInfo) {
      if (inFlight >= maxConcurrentCalls) {
        return {
          status: Status.RESOURCE_EXHAUSTED,
          message: `too many concurrent calls (limit ${maxConcurrentCalls}), refusing ${call.method}`,
        };
      }
      inFlight++;
      ctx.extensions.set(ADMITTED, true);
    },

    post(ctx: ServerContext, _call: CallInfo, _result: CallResult) {
      if (ctx.extensions.get<boolean>(ADMITTED)) {
        ctx.extensions.delete(ADMITTED);
        inFlight--;
      }
    },
  };
}
