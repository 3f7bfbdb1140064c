// Synchronous bidirectional streaming: read one, write one.

import type { DuplexCall } from "../call.ts";
import type { EchoRequest, EchoResponse, Transform } from "../messages.ts";
import type { SessionOutcome } from "../session.ts";
import { StreamError } from "../streaming/types.ts";
import { type HandlerOptions, openSession } from "./types.ts";

export interface BidiSyncOptions extends HandlerOptions {
  transform: Transform;
}

/**
 * For every inbound message, write exactly one transformed message before
 * reading the next one. Strict 1:1 pairing in arrival order.
 */
export async function echoBidirectionalStreamSync(
  call: DuplexCall<EchoRequest, EchoResponse>,
  options: BidiSyncOptions,
): Promise<SessionOutcome> {
  const log = options.logger;
  const session = openSession(call, options);

  log.info("starting bidirectional stream (sync)");
  try {
    while (true) {
      const item = await session.receive(call);
      if (item.kind === "cancelled") {
        log.warn("client disconnected");
        break;
      }
      if (item.kind === "end") {
        log.info("client closed its side");
        session.beginDraining();
        break;
      }

      session.recordRequest();
      log.info(`received message: ${item.value.message}`);

      let response: EchoResponse;
      try {
        response = await options.transform(item.value, session.requestCount);
      } catch (e) {
        session.fail(StreamError.processing(e));
        break;
      }

      if (!(await session.send(call, response))) {
        log.warn("call cancelled while writing", { sent: session.responseCount });
        break;
      }
      session.recordResponse();
      log.info(`sent response: ${response.message}`);
    }
  } catch (e) {
    session.fail(StreamError.transport(e));
  }

  return session.settle(() => {
    log.info("stream finished");
    call.close();
  });
}
