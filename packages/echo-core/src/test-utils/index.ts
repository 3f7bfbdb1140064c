// Test helpers, exported as `@stream-echo/core/testing`.

export { FakeCall, type FakeCallOptions } from "./fake-call.ts";
export { recordingLogger, type LogEntry, type RecordingLogger } from "./recording-logger.ts";
