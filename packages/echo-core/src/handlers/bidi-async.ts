// Asynchronous bidirectional streaming: receive, process and emit decoupled
// by two bounded relay queues.

import type { DuplexCall } from "../call.ts";
import type { EchoRequest, EchoResponse, Transform } from "../messages.ts";
import { emission } from "../pipeline/emission.ts";
import { ingest } from "../pipeline/ingestion.ts";
import { processMessages } from "../pipeline/processing.ts";
import type { SessionOutcome } from "../session.ts";
import { RelayQueue } from "../streaming/relay.ts";
import { StreamError } from "../streaming/types.ts";
import { type HandlerOptions, openSession } from "./types.ts";

export interface BidiAsyncOptions extends HandlerOptions {
  transform: Transform;
  /** Capacity of the inbound and the outbound queue. */
  queueCapacity: number;
  /** Simulated work per message. */
  processingDelayMs: number;
  /** How long to wait for ingestion and processing after emission ends. */
  joinTimeoutMs: number;
  /** Receives both queues once created; used to observe backpressure. */
  onQueues?: (inbound: RelayQueue<EchoRequest>, outbound: RelayQueue<EchoResponse>) => void;
}

/**
 * Run the three-stage pipeline for one call.
 *
 * Ingestion and processing run as independent activities; this function is
 * the emission side and writes every processed response. After emission ends
 * it joins the other two with a bounded timeout and settles the call.
 */
export async function echoBidirectionalStreamAsync(
  call: DuplexCall<EchoRequest, EchoResponse>,
  options: BidiAsyncOptions,
): Promise<SessionOutcome> {
  const log = options.logger;
  const session = openSession(call, options);
  const queueOptions = { capacity: options.queueCapacity, pollIntervalMs: options.pollIntervalMs };
  const inbound = new RelayQueue<EchoRequest>(queueOptions);
  const outbound = new RelayQueue<EchoResponse>(queueOptions);
  options.onQueues?.(inbound, outbound);

  log.info("starting bidirectional stream (async)");
  const activities = [
    ingest(call, inbound, session, log.child("ingest")),
    processMessages(
      inbound,
      outbound,
      session,
      { transform: options.transform, delayMs: options.processingDelayMs },
      log.child("process"),
    ),
  ];

  try {
    for await (const response of emission(outbound, session, log.child("emit"))) {
      if (!(await session.send(call, response))) {
        log.warn("call cancelled while writing", { sent: session.responseCount });
        break;
      }
      session.recordResponse();
      log.info(`sent async response: ${response.message}`);
    }
  } catch (e) {
    session.fail(StreamError.transport(e));
  }

  if (!(await joinWithin(activities, options.joinTimeoutMs))) {
    log.warn("activities did not finish in time", { timeoutMs: options.joinTimeoutMs });
    session.cancel("join-timeout");
  }

  return session.settle(() => {
    log.info("stream finished", {
      received: session.requestCount,
      sent: session.responseCount,
    });
    call.close();
  });
}

/** Resolves true if every activity settles within `timeoutMs`. */
async function joinWithin(activities: Promise<void>[], timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([Promise.all(activities).then(() => true as const), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}
