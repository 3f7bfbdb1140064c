/**
 * Server-side call abstraction.
 *
 * This module defines what the stream handlers need from a transport. The
 * transport owns wire encoding and connection state; handlers only see:
 *
 * - `receive()` for the next inbound message or end-of-input
 * - `send()` for one outbound message
 * - `isActive()` / `peerGone` for liveness
 * - `close()`, `reply()` and `abort()` to end the call
 *
 * Implementations:
 * - `@stream-echo/grpc` adapts `@grpc/grpc-js` server calls
 * - `test-utils/fake-call.ts` drives handlers in tests
 */

import type { Status } from "./status.ts";
import type { Received } from "./streaming/types.ts";

/** Liveness and termination shared by every call shape. */
export interface StreamCall {
  /** Fully qualified method name (e.g., "stream.v1.EchoService/EchoServerStream"). */
  readonly method: string;

  /** Peer address, for logs. */
  readonly peer: string;

  /** Aborted when the transport learns that the peer went away. */
  readonly peerGone: AbortSignal;

  /** Whether the call can still exchange messages. */
  isActive(): boolean;

  /** End the call with a non-OK status. */
  abort(status: Status, detail: string): void;
}

/** Inbound half of a stream. */
export interface Inbound<T> {
  /**
   * Receive the next message.
   *
   * Resolves `{ kind: "end" }` once the peer half-closes; rejects on a
   * transport fault.
   */
  receive(): Promise<Received<T>>;
}

/** Outbound half of a stream. */
export interface Outbound<T> {
  /**
   * Write one message, resolving once the transport accepts more.
   *
   * When `signal` fires while the write waits for flow control, rejects
   * instead of waiting on.
   */
  send(message: T, signal?: AbortSignal): Promise<void>;

  /** End the response stream with an OK status. */
  close(): void;
}

/** Client-streaming call: many in, one out. */
export interface ClientStreamCall<In, Out> extends StreamCall, Inbound<In> {
  /** Send the single response and end the call with an OK status. */
  reply(message: Out): void;
}

/** Server-streaming call: one in, many out. */
export interface ServerStreamCall<In, Out> extends StreamCall, Outbound<Out> {
  readonly request: In;
}

/** Bidirectional call. */
export interface DuplexCall<In, Out> extends StreamCall, Inbound<In>, Outbound<Out> {}
