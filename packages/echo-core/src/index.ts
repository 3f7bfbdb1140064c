// @stream-echo/core - transport-neutral core of the stream echo service.
//
// Relay queues, per-call sessions, the four stream handlers and the
// middleware chain they run behind.

// Status codes and errors
export { Status, statusName } from "./status.ts";
export {
  StreamError,
  type RelayItem,
  type Received,
  type CancellationToken,
} from "./streaming/types.ts";

// Relay queue
export { RelayQueue, type RelayQueueOptions } from "./streaming/relay.ts";

// Call abstraction consumed from transports
export type {
  StreamCall,
  Inbound,
  Outbound,
  ClientStreamCall,
  ServerStreamCall,
  DuplexCall,
} from "./call.ts";

// Session
export {
  StreamSession,
  type SessionState,
  type SessionOutcome,
  type SessionOptions,
  type CancelReason,
} from "./session.ts";

// Messages
export {
  type EchoRequest,
  type EchoResponse,
  type Transform,
  syncEcho,
  asyncEcho,
  summarize,
  fanOutEcho,
} from "./messages.ts";

// Pipeline stages
export { ingest } from "./pipeline/ingestion.ts";
export { processMessages, type ProcessingOptions } from "./pipeline/processing.ts";
export { emission } from "./pipeline/emission.ts";

// Handlers
export { type HandlerOptions, openSession } from "./handlers/types.ts";
export { echoClientStream } from "./handlers/aggregate.ts";
export { echoServerStream, type FanOutOptions } from "./handlers/fan-out.ts";
export { echoBidirectionalStreamSync, type BidiSyncOptions } from "./handlers/bidi-sync.ts";
export { echoBidirectionalStreamAsync, type BidiAsyncOptions } from "./handlers/bidi-async.ts";

// Service and middleware
export { EchoService, METHODS, type EchoServiceOptions } from "./service.ts";
export {
  Extensions,
  type CallKind,
  type CallInfo,
  type CallResult,
  type ServerContext,
  type ServerMiddleware,
  type Rejection,
} from "./middleware.ts";
export { loggingMiddleware, type LoggingMiddlewareOptions } from "./logging-middleware.ts";
export { admissionMiddleware, type AdmissionMiddleware } from "./admission.ts";

// Logging
export {
  createLogger,
  isEnabled,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./logging.ts";

// Configuration
export {
  defaultEchoConfig,
  resolveConfig,
  validateConfig,
  ConfigError,
  type EchoConfig,
} from "./config.ts";
