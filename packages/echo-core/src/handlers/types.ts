// Options shared by the stream handlers.

import type { Logger } from "../logging.ts";
import { StreamSession } from "../session.ts";
import type { StreamCall } from "../call.ts";

export interface HandlerOptions {
  logger: Logger;
  /** Upper bound on how long a blocked wait goes without re-checking cancellation. */
  pollIntervalMs: number;
}

/** Create and start the session for one call. */
export function openSession(call: StreamCall, options: HandlerOptions): StreamSession {
  const session = new StreamSession(call, {
    logger: options.logger,
    pollIntervalMs: options.pollIntervalMs,
  });
  session.begin();
  return session;
}
