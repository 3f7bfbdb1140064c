// Echo service: the four call shapes behind one middleware chain.

import type { ClientStreamCall, DuplexCall, ServerStreamCall, StreamCall } from "./call.ts";
import { defaultEchoConfig, type EchoConfig } from "./config.ts";
import { echoClientStream } from "./handlers/aggregate.ts";
import { echoBidirectionalStreamAsync, type BidiAsyncOptions } from "./handlers/bidi-async.ts";
import { echoBidirectionalStreamSync } from "./handlers/bidi-sync.ts";
import { echoServerStream } from "./handlers/fan-out.ts";
import type { HandlerOptions } from "./handlers/types.ts";
import { type Logger, silentLogger } from "./logging.ts";
import { asyncEcho, type EchoRequest, type EchoResponse, syncEcho, type Transform } from "./messages.ts";
import {
  type CallInfo,
  type CallKind,
  type CallResult,
  Extensions,
  type Rejection,
  type ServerContext,
  type ServerMiddleware,
} from "./middleware.ts";
import type { SessionOutcome } from "./session.ts";
import { Status } from "./status.ts";
import { StreamError } from "./streaming/types.ts";

/** Fully qualified method names, as they appear on the wire. */
export const METHODS = {
  clientStream: "/stream.v1.EchoService/EchoClientStream",
  serverStream: "/stream.v1.EchoService/EchoServerStream",
  bidiSync: "/stream.v1.EchoService/EchoBidirectionalStreamSync",
  bidiAsync: "/stream.v1.EchoService/EchoBidirectionalStreamAsync",
} as const;

export interface EchoServiceOptions {
  /** Handler settings; unset fields use `defaultEchoConfig()`. */
  config?: Partial<EchoConfig>;
  logger?: Logger;
  /** Replace the default per-message transformations. */
  transforms?: {
    sync?: Transform;
    async?: Transform;
  };
  /** Applied in order around every call. */
  middleware?: ServerMiddleware[];
  /** Observe the relay queues of each async bidirectional call. */
  onQueues?: BidiAsyncOptions["onQueues"];
}

/**
 * Implementation of the echo service against the transport-neutral call
 * interfaces. Transports build a call object and hand it to the matching
 * method; the returned promise settles once the call has ended.
 */
export class EchoService {
  private readonly config: EchoConfig;
  private readonly log: Logger;
  private readonly middleware: ServerMiddleware[];
  private readonly syncTransform: Transform;
  private readonly asyncTransform: Transform;
  private readonly onQueues: BidiAsyncOptions["onQueues"];

  constructor(options: EchoServiceOptions = {}) {
    this.config = { ...defaultEchoConfig(), ...options.config };
    this.log = options.logger ?? silentLogger;
    this.middleware = options.middleware ?? [];
    this.syncTransform = options.transforms?.sync ?? syncEcho;
    this.asyncTransform = options.transforms?.async ?? asyncEcho;
    this.onQueues = options.onQueues;
  }

  /** Client-streaming: many requests, one summary response. */
  clientStream(call: ClientStreamCall<EchoRequest, EchoResponse>): Promise<CallResult> {
    return this.dispatch("client-stream", call, (c) =>
      echoClientStream(c, this.handlerOptions("EchoClientStream")),
    );
  }

  /** Server-streaming: one request, `fanOutCount` responses. */
  serverStream(call: ServerStreamCall<EchoRequest, EchoResponse>): Promise<CallResult> {
    return this.dispatch("server-stream", call, (c) =>
      echoServerStream(c, {
        ...this.handlerOptions("EchoServerStream"),
        count: this.config.fanOutCount,
        intervalMs: this.config.fanOutIntervalMs,
      }),
    );
  }

  /** Bidirectional, one response written per request before the next read. */
  bidiSync(call: DuplexCall<EchoRequest, EchoResponse>): Promise<CallResult> {
    return this.dispatch("bidi-sync", call, (c) =>
      echoBidirectionalStreamSync(c, {
        ...this.handlerOptions("EchoBidirectionalStreamSync"),
        transform: this.syncTransform,
      }),
    );
  }

  /** Bidirectional, decoupled through the relay-queue pipeline. */
  bidiAsync(call: DuplexCall<EchoRequest, EchoResponse>): Promise<CallResult> {
    return this.dispatch("bidi-async", call, (c) =>
      echoBidirectionalStreamAsync(c, {
        ...this.handlerOptions("EchoBidirectionalStreamAsync"),
        transform: this.asyncTransform,
        queueCapacity: this.config.queueCapacity,
        processingDelayMs: this.config.processingDelayMs,
        joinTimeoutMs: this.config.joinTimeoutMs,
        onQueues: this.onQueues,
      }),
    );
  }

  private handlerOptions(name: string): HandlerOptions {
    return { logger: this.log.child(name), pollIntervalMs: this.config.pollIntervalMs };
  }

  private async dispatch<C extends StreamCall>(
    kind: CallKind,
    call: C,
    handler: (call: C) => Promise<SessionOutcome>,
  ): Promise<CallResult> {
    const ctx: ServerContext = { extensions: new Extensions() };
    const info: CallInfo = { method: call.method, kind, peer: call.peer };
    const entered: ServerMiddleware[] = [];
    let result: CallResult | undefined;

    for (const middleware of this.middleware) {
      entered.push(middleware);
      const rejection = this.runPre(middleware, ctx, info);
      if (rejection) {
        call.abort(rejection.status, rejection.message);
        result = { admitted: false, rejection };
        break;
      }
    }

    if (result === undefined) {
      try {
        result = { admitted: true, outcome: await handler(call) };
      } catch (e) {
        const error = StreamError.processing(e);
        this.log.error(`handler for ${call.method} threw`, { error: error.message });
        call.abort(Status.INTERNAL, error.message);
        result = {
          admitted: true,
          outcome: { state: "errored", requestCount: 0, responseCount: 0, durationMs: 0, error },
        };
      }
    }

    for (const middleware of entered.reverse()) {
      try {
        middleware.post?.(ctx, info, result);
      } catch (e) {
        this.log.error(`post hook for ${call.method} threw`, { error: describe(e) });
      }
    }
    return result;
  }

  // A throwing pre hook refuses the call with INTERNAL.
  private runPre(middleware: ServerMiddleware, ctx: ServerContext, info: CallInfo): Rejection | void {
    try {
      return middleware.pre?.(ctx, info);
    } catch (e) {
      const message = `middleware failed: ${describe(e)}`;
      this.log.error(`pre hook for ${info.method} threw`, { error: describe(e) });
      return { status: Status.INTERNAL, message };
    }
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
