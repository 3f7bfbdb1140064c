// Stand-in for a grpc-js server call, built on an in-memory object stream.

import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { EchoResponse } from "@stream-echo/core";
import type { GrpcDuplexStream, GrpcServerStreamingCall } from "../server-call.ts";

export interface FakeGrpcCallOptions {
  /** Request of a server-streaming call. */
  request?: unknown;
  /** Deserialized requests readable from the start. */
  inbound?: unknown[];
  endInput?: boolean;
}

/**
 * The test plays the client: `push`/`endInput` feed the readable side,
 * `cancel()` drops the call, and writes, `end()` and error statuses are
 * recorded.
 */
export class FakeGrpcCall extends EventEmitter implements GrpcDuplexStream, GrpcServerStreamingCall {
  cancelled = false;
  readonly request: unknown;

  readonly written: EchoResponse[] = [];
  readonly statuses: unknown[] = [];
  ended = false;
  /** `write` reports a full buffer while set. */
  full = false;

  private readonly input = new PassThrough({ objectMode: true });

  constructor(options: FakeGrpcCallOptions = {}) {
    super();
    this.request = options.request ?? { message: "" };
    this.on("error", (status: unknown) => {
      this.statuses.push(status);
    });
    for (const message of options.inbound ?? []) this.push(message);
    if (options.endInput) this.endInput();
  }

  getPeer(): string {
    return "ipv4:127.0.0.1:50000";
  }

  iterator(options: { destroyOnReturn: boolean }): AsyncIterator<unknown> {
    return this.input.iterator(options);
  }

  write(message: EchoResponse): boolean {
    this.written.push(message);
    return !this.full;
  }

  end(): void {
    this.ended = true;
  }

  // Client side

  push(message: unknown): void {
    this.input.write(message);
  }

  endInput(): void {
    this.input.end();
  }

  failInput(error: Error): void {
    this.input.destroy(error);
  }

  cancel(): void {
    this.cancelled = true;
    this.emit("cancelled");
  }

  drain(): void {
    this.full = false;
    this.emit("drain");
  }
}
