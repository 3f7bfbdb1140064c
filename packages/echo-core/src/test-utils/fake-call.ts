// In-process stand-in for a transport call, for driving handlers in tests.

import type { ClientStreamCall, DuplexCall, ServerStreamCall } from "../call.ts";
import type { EchoRequest, EchoResponse } from "../messages.ts";
import type { Status } from "../status.ts";
import type { Received } from "../streaming/types.ts";

type Reader = {
  resolve: (item: Received<EchoRequest>) => void;
  reject: (error: Error) => void;
};

export interface FakeCallOptions {
  method?: string;
  /** Request of a server-streaming call. */
  request?: EchoRequest;
  /** Messages available to `receive()` from the start. */
  inbound?: string[];
  /** Half-close right after the initial messages. */
  endInput?: boolean;
}

/**
 * Scriptable call implementing every shape the handlers accept.
 *
 * The test plays the peer: `push`/`endInput`/`failInput` feed `receive()`,
 * `disconnect()` drops the peer, and everything the handler does to the call
 * is recorded for assertions.
 */
export class FakeCall
  implements
    DuplexCall<EchoRequest, EchoResponse>,
    ClientStreamCall<EchoRequest, EchoResponse>,
    ServerStreamCall<EchoRequest, EchoResponse>
{
  readonly method: string;
  readonly peer = "fake:0";
  readonly request: EchoRequest;

  readonly sent: EchoResponse[] = [];
  readonly replies: EchoResponse[] = [];
  readonly aborts: Array<{ status: Status; detail: string }> = [];
  closeCount = 0;

  /** Called after each successful `send`. */
  onSend: ((message: EchoResponse, index: number) => void) | null = null;
  /** Make `send` reject from this 0-based index on. */
  failSendAt: number | null = null;
  /** Make `send` never resolve, as if the peer stopped reading. */
  stallSends = false;
  /** Writes parked by `stallSends`, with the signal each was given. */
  readonly stalled: Array<{ message: EchoResponse; signal?: AbortSignal }> = [];

  private readonly gone = new AbortController();
  private active = true;
  private readonly queued: Array<Received<EchoRequest>> = [];
  private readonly readers: Reader[] = [];
  private inputError: Error | null = null;

  constructor(options: FakeCallOptions = {}) {
    this.method = options.method ?? "/test.Echo/Call";
    this.request = options.request ?? { message: "" };
    for (const message of options.inbound ?? []) this.push(message);
    if (options.endInput) this.endInput();
  }

  get peerGone(): AbortSignal {
    return this.gone.signal;
  }

  /** Total calls to `close`, `reply` and `abort`. */
  get terminations(): number {
    return this.closeCount + this.replies.length + this.aborts.length;
  }

  // Peer side

  push(message: string): void {
    this.deliver({ kind: "data", value: { message } });
  }

  endInput(): void {
    this.deliver({ kind: "end" });
  }

  failInput(error: Error): void {
    this.inputError = error;
    for (const reader of this.readers.splice(0)) reader.reject(error);
  }

  /** Peer goes away: the transport reports it and the call turns inactive. */
  disconnect(): void {
    this.active = false;
    this.gone.abort();
  }

  /** The call turns inactive without the transport raising an event. */
  goQuiet(): void {
    this.active = false;
  }

  // Call side

  isActive(): boolean {
    return this.active;
  }

  receive(): Promise<Received<EchoRequest>> {
    if (this.inputError) return Promise.reject(this.inputError);
    const next = this.queued.shift();
    if (next) {
      if (next.kind === "end") this.queued.unshift(next);
      return Promise.resolve(next);
    }
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  async send(message: EchoResponse, signal?: AbortSignal): Promise<void> {
    if (this.failSendAt !== null && this.sent.length >= this.failSendAt) {
      throw new Error("write after peer reset");
    }
    if (this.stallSends) {
      this.stalled.push(signal ? { message, signal } : { message });
      return new Promise<void>(() => {});
    }
    this.sent.push(message);
    this.onSend?.(message, this.sent.length - 1);
  }

  close(): void {
    this.closeCount++;
  }

  reply(message: EchoResponse): void {
    this.replies.push(message);
  }

  abort(status: Status, detail: string): void {
    this.aborts.push({ status, detail });
  }

  private deliver(item: Received<EchoRequest>): void {
    const reader = this.readers.shift();
    if (reader) {
      reader.resolve(item);
      if (item.kind === "end") this.queued.push(item);
      return;
    }
    this.queued.push(item);
  }
}
