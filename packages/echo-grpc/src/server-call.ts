// Adapters from @grpc/grpc-js server calls to the core call interfaces.

import * as grpc from "@grpc/grpc-js";
import {
  type ClientStreamCall,
  type DuplexCall,
  type EchoRequest,
  type EchoResponse,
  type Received,
  type ServerStreamCall,
  Status,
  type StreamCall,
  StreamError,
} from "@stream-echo/core";
import { decodeEchoMessage } from "./proto.ts";

/**
 * The parts of a grpc-js server call the adapters rely on.
 *
 * Kept structural so tests can drive the adapters with a plain Node stream.
 */
export interface GrpcSurfaceCall {
  readonly cancelled: boolean;
  getPeer(): string;
  once(event: "cancelled" | "drain", listener: () => void): unknown;
  removeListener(event: "cancelled" | "drain", listener: () => void): unknown;
}

export interface GrpcReadableCall extends GrpcSurfaceCall {
  iterator(options: { destroyOnReturn: boolean }): AsyncIterator<unknown>;
}

export interface GrpcWritableCall extends GrpcSurfaceCall {
  write(message: EchoResponse): boolean;
  end(): void;
  emit(event: "error", status: Pick<grpc.StatusObject, "code" | "details">): boolean;
}

export interface GrpcServerStreamingCall extends GrpcWritableCall {
  readonly request: unknown;
}

export interface GrpcDuplexStream extends GrpcReadableCall, GrpcWritableCall {}

export type UnaryReply = (
  error: Pick<grpc.StatusObject, "code" | "details"> | null,
  value?: EchoResponse | null,
) => void;

/** Map a core status to the grpc-js enum. */
export function toGrpcStatus(code: Status): grpc.status {
  switch (code) {
    case Status.OK:
      return grpc.status.OK;
    case Status.CANCELLED:
      return grpc.status.CANCELLED;
    case Status.UNKNOWN:
      return grpc.status.UNKNOWN;
    case Status.INVALID_ARGUMENT:
      return grpc.status.INVALID_ARGUMENT;
    case Status.DEADLINE_EXCEEDED:
      return grpc.status.DEADLINE_EXCEEDED;
    case Status.RESOURCE_EXHAUSTED:
      return grpc.status.RESOURCE_EXHAUSTED;
    case Status.INTERNAL:
      return grpc.status.INTERNAL;
    case Status.UNAVAILABLE:
      return grpc.status.UNAVAILABLE;
  }
}

/** Liveness shared by every adapter: `cancelled` flag and event. */
class Liveness {
  private readonly gone = new AbortController();

  constructor(private readonly call: GrpcSurfaceCall) {
    if (call.cancelled) {
      this.gone.abort();
    } else {
      call.once("cancelled", () => this.gone.abort());
    }
  }

  get signal(): AbortSignal {
    return this.gone.signal;
  }

  isActive(): boolean {
    return !this.call.cancelled;
  }
}

/**
 * Pulls decoded requests off the readable side.
 *
 * The iterator must not destroy the call when the client half-closes: a
 * duplex call keeps writing after its readable side has ended.
 */
class RequestReader {
  private iterator: AsyncIterator<unknown> | null = null;
  private done = false;

  constructor(private readonly call: GrpcReadableCall) {}

  async receive(): Promise<Received<EchoRequest>> {
    if (this.done) return { kind: "end" };
    this.iterator ??= this.call.iterator({ destroyOnReturn: false });
    const next = await this.iterator.next();
    if (next.done) {
      this.done = true;
      return { kind: "end" };
    }
    return { kind: "data", value: decodeEchoMessage(next.value, "request") };
  }
}

/** Writes responses, waiting for `drain` when the transport buffer is full. */
class ResponseWriter {
  constructor(
    private readonly call: GrpcWritableCall,
    private readonly peerGone: AbortSignal,
  ) {}

  async send(message: EchoResponse, signal?: AbortSignal): Promise<void> {
    if (this.peerGone.aborted || signal?.aborted) throw StreamError.closed();
    if (!this.call.write(message)) {
      await this.drained(signal);
    }
  }

  close(): void {
    this.call.end();
  }

  abort(status: Status, detail: string): void {
    this.call.emit("error", { code: toGrpcStatus(status), details: detail });
  }

  // Waits for `drain`, or rejects once the peer goes or `signal` fires.
  private drained(signal: AbortSignal | undefined): Promise<void> {
    const stops = signal ? [this.peerGone, signal] : [this.peerGone];
    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        this.call.removeListener("drain", onDrain);
        for (const stop of stops) stop.removeEventListener("abort", onStop);
      };
      const onDrain = (): void => {
        cleanup();
        resolve();
      };
      const onStop = (): void => {
        cleanup();
        reject(StreamError.closed());
      };
      if (stops.some((stop) => stop.aborted)) {
        reject(StreamError.closed());
        return;
      }
      this.call.once("drain", onDrain);
      for (const stop of stops) stop.addEventListener("abort", onStop, { once: true });
    });
  }
}

abstract class GrpcCallAdapter implements StreamCall {
  readonly peer: string;
  protected readonly liveness: Liveness;

  constructor(
    call: GrpcSurfaceCall,
    readonly method: string,
  ) {
    this.peer = call.getPeer();
    this.liveness = new Liveness(call);
  }

  get peerGone(): AbortSignal {
    return this.liveness.signal;
  }

  isActive(): boolean {
    return this.liveness.isActive();
  }

  abstract abort(status: Status, detail: string): void;
}

/** Client-streaming call: requests from the stream, one reply through the callback. */
export class GrpcClientStreamCall
  extends GrpcCallAdapter
  implements ClientStreamCall<EchoRequest, EchoResponse>
{
  private readonly reader: RequestReader;

  constructor(
    call: GrpcReadableCall,
    private readonly callback: UnaryReply,
    method: string,
  ) {
    super(call, method);
    this.reader = new RequestReader(call);
  }

  receive(): Promise<Received<EchoRequest>> {
    return this.reader.receive();
  }

  reply(message: EchoResponse): void {
    this.callback(null, message);
  }

  abort(status: Status, detail: string): void {
    this.callback({ code: toGrpcStatus(status), details: detail });
  }
}

/** Server-streaming call. The request is decoded up front. */
export class GrpcServerStreamCall
  extends GrpcCallAdapter
  implements ServerStreamCall<EchoRequest, EchoResponse>
{
  readonly request: EchoRequest;
  private readonly writer: ResponseWriter;

  /** @throws StreamError (INVALID_ARGUMENT) for a malformed request. */
  constructor(call: GrpcServerStreamingCall, method: string) {
    super(call, method);
    this.request = decodeEchoMessage(call.request, "request");
    this.writer = new ResponseWriter(call, this.peerGone);
  }

  send(message: EchoResponse, signal?: AbortSignal): Promise<void> {
    return this.writer.send(message, signal);
  }

  close(): void {
    this.writer.close();
  }

  abort(status: Status, detail: string): void {
    this.writer.abort(status, detail);
  }
}

/** Bidirectional call. */
export class GrpcDuplexCall
  extends GrpcCallAdapter
  implements DuplexCall<EchoRequest, EchoResponse>
{
  private readonly reader: RequestReader;
  private readonly writer: ResponseWriter;

  constructor(call: GrpcDuplexStream, method: string) {
    super(call, method);
    this.reader = new RequestReader(call);
    this.writer = new ResponseWriter(call, this.peerGone);
  }

  receive(): Promise<Received<EchoRequest>> {
    return this.reader.receive();
  }

  send(message: EchoResponse, signal?: AbortSignal): Promise<void> {
    return this.writer.send(message, signal);
  }

  close(): void {
    this.writer.close();
  }

  abort(status: Status, detail: string): void {
    this.writer.abort(status, detail);
  }
}
