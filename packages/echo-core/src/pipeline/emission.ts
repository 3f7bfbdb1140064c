// Emission loop: outbound relay queue → messages for the outer handler to write.

import type { Logger } from "../logging.ts";
import type { EchoResponse } from "../messages.ts";
import type { StreamSession } from "../session.ts";
import type { RelayQueue } from "../streaming/relay.ts";

/**
 * Yield processed responses until the sentinel or cancellation.
 *
 * Single pass. Checking the session goes through `isCancelled()`, so an
 * inactive peer raises cancellation here and the other activities follow.
 * When the generator finishes (or the caller stops iterating) the outbound
 * queue is abandoned, so late results are dropped instead of parked.
 */
export async function* emission(
  outbound: RelayQueue<EchoResponse>,
  session: StreamSession,
  log: Logger,
): AsyncGenerator<EchoResponse, void, undefined> {
  try {
    while (true) {
      const item = await outbound.take(session);
      if (item.kind === "end") {
        log.debug("emission reached end of processing");
        return;
      }
      if (item.kind === "cancelled") {
        log.debug("emission stopped by cancellation");
        return;
      }
      if (session.isCancelled()) return;
      yield item.value;
    }
  } finally {
    outbound.abandon();
  }
}
