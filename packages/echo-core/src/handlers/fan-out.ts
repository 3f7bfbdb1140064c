// Server-streaming: one request, a fixed number of numbered echoes.

import type { ServerStreamCall } from "../call.ts";
import { type EchoRequest, type EchoResponse, fanOutEcho } from "../messages.ts";
import type { SessionOutcome } from "../session.ts";
import { StreamError } from "../streaming/types.ts";
import { type HandlerOptions, openSession } from "./types.ts";

export interface FanOutOptions extends HandlerOptions {
  /** Responses per call. */
  count: number;
  /** Pause between two responses. */
  intervalMs: number;
}

/**
 * Send `Echo #1: …` through `Echo #<count>: …`.
 *
 * The peer is checked before every response; if it has gone, fewer are sent
 * and the call ends as cancelled rather than errored.
 */
export async function echoServerStream(
  call: ServerStreamCall<EchoRequest, EchoResponse>,
  options: FanOutOptions,
): Promise<SessionOutcome> {
  const log = options.logger;
  const session = openSession(call, options);
  session.recordRequest();
  log.info(`received message: ${call.request.message}`);

  try {
    for (let ordinal = 1; ordinal <= options.count; ordinal++) {
      if (session.isCancelled()) {
        log.warn("client disconnected", { sent: session.responseCount });
        break;
      }

      const response = fanOutEcho(call.request, ordinal);
      log.info(`sending response #${ordinal}: ${response.message}`);
      if (!(await session.send(call, response))) {
        log.warn("call cancelled while writing", { sent: session.responseCount });
        break;
      }
      session.recordResponse();

      if (ordinal < options.count && !(await session.sleep(options.intervalMs))) {
        break;
      }
    }
  } catch (e) {
    session.fail(StreamError.transport(e));
  }

  session.beginDraining();
  return session.settle(() => {
    log.info("finished sending responses", { sent: session.responseCount });
    call.close();
  });
}
