// Client-streaming: fold every inbound message into one response.

import type { ClientStreamCall } from "../call.ts";
import { type EchoRequest, type EchoResponse, summarize } from "../messages.ts";
import type { SessionOutcome } from "../session.ts";
import { StreamError } from "../streaming/types.ts";
import { type HandlerOptions, openSession } from "./types.ts";

/**
 * Collect all messages until the client half-closes, then reply once with
 * their count and content in arrival order.
 *
 * If the call is cancelled first, no reply is sent.
 */
export async function echoClientStream(
  call: ClientStreamCall<EchoRequest, EchoResponse>,
  options: HandlerOptions,
): Promise<SessionOutcome> {
  const log = options.logger;
  const session = openSession(call, options);
  const messages: string[] = [];

  log.info("starting client stream");
  try {
    while (true) {
      const item = await session.receive(call);
      if (item.kind !== "data") break;
      session.recordRequest();
      log.info(`received message: ${item.value.message}`);
      messages.push(item.value.message);
    }
  } catch (e) {
    session.fail(StreamError.transport(e));
  }

  const response = summarize(messages);
  return session.settle(() => {
    log.info(`sending response: ${response.message}`);
    call.reply(response);
    session.recordResponse();
  });
}
