// Demo scenarios exercising each call shape against a running server.

import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "@stream-echo/core";
import { type CallOptions, describeError, type EchoStreams } from "./client.ts";

export type DemoKind = "client" | "server" | "sync" | "async";

export const DEMO_KINDS: readonly DemoKind[] = ["client", "server", "sync", "async"];

/** Pause between two outbound messages of one call. */
export const MESSAGE_INTERVAL_MS: Record<DemoKind, number> = {
  client: 500,
  server: 0,
  sync: 1000,
  async: 800,
};

/** Pause between two runs of the same demo in continuous mode. */
export const REPEAT_PAUSE_MS: Record<DemoKind, number> = {
  client: 5000,
  server: 4000,
  sync: 6000,
  async: 7000,
};

export interface DemoOptions {
  /** Appears in every message, so concurrent demos can be told apart. */
  clientId: number;
  /** Messages per streaming request. Defaults to 3. */
  messages?: number;
  /** Overrides `MESSAGE_INTERVAL_MS`. */
  intervalMs?: number;
  signal?: AbortSignal;
  logger: Logger;
}

/** Many messages, one summary. Resolves false if the call failed. */
export async function runClientStreamDemo(streams: EchoStreams, options: DemoOptions): Promise<boolean> {
  const log = options.logger;
  const id = options.clientId;
  log.info(`[client-${id}] starting client stream test`);
  try {
    const summary = await streams.clientStream(
      announced(numbered(options, (i) => `Hello from client-${id} message-${i}`), log, id),
      callOptions("client", options),
    );
    log.info(`[client-${id}] client stream response: ${summary}`);
    return true;
  } catch (e) {
    log.error(`[client-${id}] client stream error: ${describeError(e)}`);
    return false;
  }
}

/** One request, a numbered series of echoes. */
export async function runServerStreamDemo(streams: EchoStreams, options: DemoOptions): Promise<boolean> {
  const log = options.logger;
  const id = options.clientId;
  const request = `Hello from client-${id} for server stream`;
  log.info(`[client-${id}] starting server stream test`);
  log.info(`[client-${id}] sent request: ${request}`);
  let count = 0;
  try {
    for await (const response of streams.serverStream(request, callOptions("server", options))) {
      count++;
      log.info(`[client-${id}] server stream response #${count}: ${response}`);
    }
    log.info(`[client-${id}] server stream finished, received ${count} responses`);
    return true;
  } catch (e) {
    log.error(`[client-${id}] server stream error: ${describeError(e)}`, { received: count });
    return false;
  }
}

export function runBidiSyncDemo(streams: EchoStreams, options: DemoOptions): Promise<boolean> {
  return runBidi("sync", options, (messages, call) => streams.bidiSync(messages, call));
}

export function runBidiAsyncDemo(streams: EchoStreams, options: DemoOptions): Promise<boolean> {
  return runBidi("async", options, (messages, call) => streams.bidiAsync(messages, call));
}

/** Run the demo for `kind`. */
export function runDemo(kind: DemoKind, streams: EchoStreams, options: DemoOptions): Promise<boolean> {
  switch (kind) {
    case "client":
      return runClientStreamDemo(streams, options);
    case "server":
      return runServerStreamDemo(streams, options);
    case "sync":
      return runBidiSyncDemo(streams, options);
    case "async":
      return runBidiAsyncDemo(streams, options);
  }
}

export interface DemoLoopOptions extends DemoOptions {
  /** Run a single time instead of repeating until `signal` fires. */
  once: boolean;
  /** Overrides `REPEAT_PAUSE_MS`. */
  pauseMs?: number;
}

/**
 * Run the `kind` demo, pausing `REPEAT_PAUSE_MS[kind]` between runs, until
 * `signal` fires. Resolves false if any run failed before the signal.
 */
export async function runDemoLoop(kind: DemoKind, streams: EchoStreams, options: DemoLoopOptions): Promise<boolean> {
  const pauseMs = options.pauseMs ?? REPEAT_PAUSE_MS[kind];
  let ok = true;
  while (!options.signal?.aborted) {
    const passed = await runDemo(kind, streams, options);
    if (!passed && !options.signal?.aborted) ok = false;
    if (options.once) break;
    try {
      await delay(pauseMs, undefined, { signal: options.signal });
    } catch (e) {
      if (options.signal?.aborted) break;
      throw e;
    }
  }
  return ok;
}

async function runBidi(
  kind: "sync" | "async",
  options: DemoOptions,
  open: (messages: Iterable<string>, call: CallOptions) => AsyncIterable<string>,
): Promise<boolean> {
  const log = options.logger;
  const id = options.clientId;
  const label = kind === "sync" ? "Sync" : "Async";
  log.info(`[client-${id}] starting bidirectional stream ${kind} test`);
  let count = 0;
  try {
    const messages = announced(numbered(options, (i) => `${label} message ${i} from client-${id}`), log, id);
    for await (const response of open(messages, callOptions(kind, options))) {
      count++;
      log.info(`[client-${id}] ${kind} response #${count}: ${response}`);
    }
    log.info(`[client-${id}] bidirectional ${kind} stream finished`, { received: count });
    return true;
  } catch (e) {
    log.error(`[client-${id}] bidirectional ${kind} error: ${describeError(e)}`, { received: count });
    return false;
  }
}

function numbered(options: DemoOptions, text: (i: number) => string): string[] {
  return Array.from({ length: options.messages ?? 3 }, (_, i) => text(i + 1));
}

// Logs each message as the client pulls it for writing.
function* announced(messages: string[], log: Logger, id: number): Generator<string, void, undefined> {
  for (const message of messages) {
    log.info(`[client-${id}] sending: ${message}`);
    yield message;
  }
}

function callOptions(kind: DemoKind, options: DemoOptions): CallOptions {
  return { intervalMs: options.intervalMs ?? MESSAGE_INTERVAL_MS[kind], signal: options.signal };
}
