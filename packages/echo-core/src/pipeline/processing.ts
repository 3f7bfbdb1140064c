// Processing stage: inbound relay queue → transform → outbound relay queue.

import type { Logger } from "../logging.ts";
import type { EchoRequest, EchoResponse, Transform } from "../messages.ts";
import type { StreamSession } from "../session.ts";
import type { RelayQueue } from "../streaming/relay.ts";
import { StreamError } from "../streaming/types.ts";

export interface ProcessingOptions {
  transform: Transform;
  /** Simulated work per message, cancellable. */
  delayMs: number;
}

/**
 * Transform every inbound message in order until the sentinel or cancellation.
 *
 * Always ends `outbound` exactly once on the way out. A result refused
 * because emission has already exited is dropped and logged.
 */
export async function processMessages(
  inbound: RelayQueue<EchoRequest>,
  outbound: RelayQueue<EchoResponse>,
  session: StreamSession,
  options: ProcessingOptions,
  log: Logger,
): Promise<void> {
  let ordinal = 0;
  try {
    while (!session.isCancelled()) {
      const item = await inbound.take(session);
      if (item.kind === "end") {
        log.debug("processing reached end of input", { processed: ordinal });
        break;
      }
      if (item.kind === "cancelled") {
        log.debug("processing stopped by cancellation", { processed: ordinal });
        break;
      }

      ordinal++;
      if (!(await session.sleep(options.delayMs))) break;

      let response: EchoResponse;
      try {
        response = await options.transform(item.value, ordinal);
      } catch (e) {
        session.fail(StreamError.processing(e));
        break;
      }

      if (!(await outbound.put(response, session))) {
        log.warn(`dropping processed response: ${response.message}`, {
          reason: outbound.abandoned ? "emission exited" : "cancelled",
        });
        break;
      }
      log.info(`processed async response: ${response.message}`);
    }
  } catch (e) {
    session.fail(StreamError.processing(e));
  } finally {
    outbound.end();
  }
}
