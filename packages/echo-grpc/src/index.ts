// @stream-echo/grpc - gRPC binding of the stream echo service.

// Service definition
export {
  loadEchoService,
  clearProtoCache,
  decodeEchoMessage,
  PROTO_PATH,
  SERVICE_NAME,
  type EchoMethodDefinition,
  type EchoServiceDefinition,
} from "./proto.ts";

// Server
export { EchoServer, formatAddress, type EchoServerOptions } from "./server.ts";
export { echoHandlers, type EchoHandlers } from "./handlers.ts";
export {
  GrpcClientStreamCall,
  GrpcServerStreamCall,
  GrpcDuplexCall,
  toGrpcStatus,
  type GrpcDuplexStream,
  type GrpcReadableCall,
  type GrpcServerStreamingCall,
  type GrpcSurfaceCall,
  type GrpcWritableCall,
  type UnaryReply,
} from "./server-call.ts";

// Client
export {
  EchoClient,
  describeError,
  type CallOptions,
  type EchoClientOptions,
  type EchoStreams,
  type Outgoing,
} from "./client.ts";
export { loggingInterceptor } from "./interceptor.ts";

// Demo scenarios
export {
  runDemo,
  runDemoLoop,
  runClientStreamDemo,
  runServerStreamDemo,
  runBidiSyncDemo,
  runBidiAsyncDemo,
  DEMO_KINDS,
  MESSAGE_INTERVAL_MS,
  REPEAT_PAUSE_MS,
  type DemoKind,
  type DemoLoopOptions,
  type DemoOptions,
} from "./demo.ts";
