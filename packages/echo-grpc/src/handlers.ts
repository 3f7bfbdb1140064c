// grpc-js handler functions for EchoService, delegating to the core service.

import type { CallResult, EchoService, Logger } from "@stream-echo/core";
import { METHODS, StreamError } from "@stream-echo/core";
import {
  type GrpcDuplexStream,
  GrpcClientStreamCall,
  GrpcDuplexCall,
  type GrpcReadableCall,
  GrpcServerStreamCall,
  type GrpcServerStreamingCall,
  toGrpcStatus,
  type UnaryReply,
} from "./server-call.ts";

/**
 * Implementation object for `Server.addService`, keyed by method name.
 *
 * Each handler resolves once the call has been dispatched and settled.
 */
export type EchoHandlers = {
  EchoClientStream(call: GrpcReadableCall, callback: UnaryReply): Promise<void>;
  EchoServerStream(call: GrpcServerStreamingCall): Promise<void>;
  EchoBidirectionalStreamSync(call: GrpcDuplexStream): Promise<void>;
  EchoBidirectionalStreamAsync(call: GrpcDuplexStream): Promise<void>;
};

export function echoHandlers(service: EchoService, log: Logger): EchoHandlers {
  const settle = async (method: string, dispatched: Promise<CallResult>): Promise<void> => {
    try {
      await dispatched;
    } catch (e) {
      // Dispatch contains handler and hook faults; anything else lands here.
      log.error(`dispatch of ${method} failed`, { error: e instanceof Error ? e.message : String(e) });
    }
  };

  return {
    EchoClientStream: (call, callback) =>
      settle(
        METHODS.clientStream,
        service.clientStream(new GrpcClientStreamCall(call, callback, METHODS.clientStream)),
      ),

    EchoServerStream: async (call) => {
      let adapted: GrpcServerStreamCall;
      try {
        adapted = new GrpcServerStreamCall(call, METHODS.serverStream);
      } catch (e) {
        const error = StreamError.transport(e);
        log.warn(`rejecting ${METHODS.serverStream}: ${error.message}`, { peer: call.getPeer() });
        call.emit("error", { code: toGrpcStatus(error.status), details: error.message });
        return;
      }
      await settle(METHODS.serverStream, service.serverStream(adapted));
    },

    EchoBidirectionalStreamSync: (call) =>
      settle(METHODS.bidiSync, service.bidiSync(new GrpcDuplexCall(call, METHODS.bidiSync))),

    EchoBidirectionalStreamAsync: (call) =>
      settle(METHODS.bidiAsync, service.bidiAsync(new GrpcDuplexCall(call, METHODS.bidiAsync))),
  };
}
