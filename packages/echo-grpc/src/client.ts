// gRPC client for EchoService.

import { once } from "node:events";
import { setTimeout as delay } from "node:timers/promises";
import * as grpc from "@grpc/grpc-js";
import { createLogger, defaultEchoConfig, type EchoRequest, type Logger } from "@stream-echo/core";
import { loggingInterceptor } from "./interceptor.ts";
import { decodeEchoMessage, type EchoMethodDefinition, type EchoServiceDefinition, loadEchoService } from "./proto.ts";

export type Outgoing = Iterable<string> | AsyncIterable<string>;

export interface CallOptions {
  /** Cancels the call. */
  signal?: AbortSignal;
  /** Pause between two outbound messages. */
  intervalMs?: number;
}

/** The four call shapes, as plain strings in and out. */
export interface EchoStreams {
  clientStream(messages: Outgoing, options?: CallOptions): Promise<string>;
  serverStream(message: string, options?: CallOptions): AsyncIterable<string>;
  bidiSync(messages: Outgoing, options?: CallOptions): AsyncIterable<string>;
  bidiAsync(messages: Outgoing, options?: CallOptions): AsyncIterable<string>;
}

export interface EchoClientOptions {
  logger?: Logger;
  /** Max message size in bytes, both directions. Defaults to 50 MiB. */
  maxMessageBytes?: number;
  /** Log every call through `loggingInterceptor`. Defaults to true. */
  logCalls?: boolean;
}

/**
 * Client over a plaintext channel.
 *
 * @example
 * ```typescript
 * const client = new EchoClient("localhost:8080");
 * for await (const reply of client.serverStream("ping")) {
 *   console.log(reply); // Echo #1: ping … Echo #5: ping
 * }
 * client.close();
 * ```
 */
export class EchoClient implements EchoStreams {
  private readonly client: grpc.Client;
  private readonly methods: EchoServiceDefinition;

  constructor(
    readonly address: string,
    options: EchoClientOptions = {},
  ) {
    const log = options.logger ?? createLogger("echo:client");
    const maxBytes = options.maxMessageBytes ?? defaultEchoConfig().maxMessageBytes;
    this.methods = loadEchoService();
    this.client = new grpc.Client(address, grpc.credentials.createInsecure(), {
      "grpc.max_send_message_length": maxBytes,
      "grpc.max_receive_message_length": maxBytes,
      interceptors: options.logCalls === false ? [] : [loggingInterceptor(log.child("rpc"))],
    });
  }

  /** Stream `messages`, then resolve with the single response. */
  clientStream(messages: Outgoing, options: CallOptions = {}): Promise<string> {
    const method = this.methods.clientStream;
    return new Promise((resolve, reject) => {
      const call = this.client.makeClientStreamRequest<EchoRequest, object>(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        (error, value) => {
          release();
          if (error) {
            reject(error);
            return;
          }
          try {
            resolve(decodeEchoMessage(value, "response").message);
          } catch (e) {
            reject(e);
          }
        },
      );
      const release = cancelOnAbort(call, options.signal);
      writeAll(call, messages, options).catch((error: unknown) => {
        call.cancel();
        reject(error);
      });
    });
  }

  /** Send one request and yield every response. */
  async *serverStream(message: string, options: CallOptions = {}): AsyncGenerator<string, void, undefined> {
    const method = this.methods.serverStream;
    const call = this.client.makeServerStreamRequest<EchoRequest, object>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      { message },
    );
    yield* responses(call, options.signal);
  }

  /** One response per message; the server answers each before reading the next. */
  bidiSync(messages: Outgoing, options: CallOptions = {}): AsyncGenerator<string, void, undefined> {
    return this.bidi(this.methods.bidiSync, messages, options);
  }

  /** Requests and responses flow independently; responses keep request order. */
  bidiAsync(messages: Outgoing, options: CallOptions = {}): AsyncGenerator<string, void, undefined> {
    return this.bidi(this.methods.bidiAsync, messages, options);
  }

  close(): void {
    this.client.close();
  }

  private async *bidi(
    method: EchoMethodDefinition,
    messages: Outgoing,
    options: CallOptions,
  ): AsyncGenerator<string, void, undefined> {
    const call = this.client.makeBidiStreamRequest<EchoRequest, object>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
    );
    let writeError: unknown = null;
    const writing = writeAll(call, messages, options).catch((error: unknown) => {
      writeError = error;
      call.cancel();
    });

    try {
      yield* responses(call, options.signal);
    } catch (e) {
      throw writeError ?? e;
    }
    await writing;
  }
}

/** Write every message, pacing them by `intervalMs`, then half-close. */
async function writeAll(
  call: grpc.ClientWritableStream<EchoRequest>,
  messages: Outgoing,
  options: CallOptions,
): Promise<void> {
  let index = 0;
  for await (const message of messages) {
    if (index > 0 && options.intervalMs) {
      await delay(options.intervalMs, undefined, { signal: options.signal });
    }
    options.signal?.throwIfAborted();
    if (!call.write({ message })) {
      await once(call, "drain", { signal: options.signal });
    }
    index++;
  }
  call.end();
}

async function* responses(
  call: grpc.ClientReadableStream<object>,
  signal: AbortSignal | undefined,
): AsyncGenerator<string, void, undefined> {
  const release = cancelOnAbort(call, signal);
  let finished = false;
  try {
    for await (const response of call) {
      yield decodeEchoMessage(response, "response").message;
    }
    finished = true;
  } finally {
    release();
    if (!finished) call.cancel();
  }
}

/** Cancel `call` when `signal` fires; returns the cleanup. */
function cancelOnAbort(call: { cancel(): void }, signal: AbortSignal | undefined): () => void {
  if (!signal) return () => {};
  const cancel = (): void => call.cancel();
  if (signal.aborted) {
    cancel();
    return () => {};
  }
  signal.addEventListener("abort", cancel, { once: true });
  return () => signal.removeEventListener("abort", cancel);
}

/** `UNAVAILABLE: No connection established` for a ServiceError, the message otherwise. */
export function describeError(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "number" && "details" in error) {
    const name = grpc.status[error.code] ?? String(error.code);
    return `${name}: ${String(error.details)}`;
  }
  return error instanceof Error ? error.message : String(error);
}
