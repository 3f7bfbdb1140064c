// Ingestion loop: inbound half of the stream → inbound relay queue.

import type { Inbound } from "../call.ts";
import type { Logger } from "../logging.ts";
import type { EchoRequest } from "../messages.ts";
import type { StreamSession } from "../session.ts";
import type { RelayQueue } from "../streaming/relay.ts";
import { StreamError } from "../streaming/types.ts";

/**
 * Relay inbound messages into `queue` until end-of-input or cancellation.
 *
 * Always ends `queue` exactly once on the way out. Never rejects: a receive
 * failure is recorded on the session, which raises cancellation.
 */
export async function ingest(
  inbound: Inbound<EchoRequest>,
  queue: RelayQueue<EchoRequest>,
  session: StreamSession,
  log: Logger,
): Promise<void> {
  try {
    while (true) {
      const item = await session.receive(inbound);
      if (item.kind === "cancelled") {
        log.debug("ingestion stopped by cancellation");
        break;
      }
      if (item.kind === "end") {
        log.debug("client closed its side", { received: session.requestCount });
        session.beginDraining();
        break;
      }

      session.recordRequest();
      log.info(`received message: ${item.value.message}`);

      if (!(await queue.put(item.value, session))) {
        log.debug("inbound queue refused message, stopping ingestion");
        break;
      }
    }
  } catch (e) {
    session.fail(StreamError.transport(e));
  } finally {
    queue.end();
  }
}
