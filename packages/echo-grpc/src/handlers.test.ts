// Tests for the grpc-js handler functions, driving the echo service through fake calls

import * as grpc from "@grpc/grpc-js";
import { EchoService, type ServerMiddleware, Status } from "@stream-echo/core";
import { recordingLogger } from "@stream-echo/core/testing";
import { describe, expect, it } from "vitest";
import { echoHandlers } from "./handlers.ts";
import type { UnaryReply } from "./server-call.ts";
import { FakeGrpcCall } from "./test-utils/fake-grpc-call.ts";

const fast = { pollIntervalMs: 10, fanOutIntervalMs: 0, processingDelayMs: 0 };
const malformed = "malformed request: expected a string message field";

function setup(options: { middleware?: ServerMiddleware[] } = {}) {
  const log = recordingLogger();
  const service = new EchoService({ config: fast, logger: log, middleware: options.middleware });
  return { log, handlers: echoHandlers(service, log) };
}

describe("echoHandlers", () => {
  it("answers a client stream through the callback", async () => {
    const { handlers } = setup();
    const call = new FakeGrpcCall({ inbound: [{ message: "a" }, { message: "b" }], endInput: true });
    const seen: unknown[][] = [];
    const callback: UnaryReply = (error, value) => seen.push([error, value]);

    await handlers.EchoClientStream(call, callback);

    expect(seen).toEqual([[null, { message: 'Received 2 messages: ["a","b"]' }]]);
  });

  it("streams numbered echoes for a server stream and ends the call", async () => {
    const { handlers } = setup();
    const call = new FakeGrpcCall({ request: { message: "hi" } });

    await handlers.EchoServerStream(call);

    expect(call.written.map((r) => r.message)).toEqual([
      "Echo #1: hi",
      "Echo #2: hi",
      "Echo #3: hi",
      "Echo #4: hi",
      "Echo #5: hi",
    ]);
    expect(call.ended).toBe(true);
    expect(call.statuses).toEqual([]);
  });

  it("rejects a malformed server-stream request before dispatch", async () => {
    const trace: string[] = [];
    const { handlers, log } = setup({
      middleware: [{ pre: () => void trace.push("pre") }],
    });
    const call = new FakeGrpcCall({ request: { message: 42 } });

    await handlers.EchoServerStream(call);

    expect(call.statuses).toEqual([{ code: grpc.status.INVALID_ARGUMENT, details: malformed }]);
    expect(trace).toEqual([]);
    expect(log.messages("warn")).toEqual([
      `rejecting /stream.v1.EchoService/EchoServerStream: ${malformed}`,
    ]);
  });

  it("pairs each request with one response on the sync stream", async () => {
    const { handlers } = setup();
    const call = new FakeGrpcCall({ inbound: [{ message: "x" }, { message: "y" }], endInput: true });

    await handlers.EchoBidirectionalStreamSync(call);

    expect(call.written).toEqual([{ message: "Sync Echo: x" }, { message: "Sync Echo: y" }]);
    expect(call.ended).toBe(true);
  });

  it("echoes in order on the async stream", async () => {
    const { handlers } = setup();
    const call = new FakeGrpcCall({
      inbound: [{ message: "1" }, { message: "2" }, { message: "3" }],
      endInput: true,
    });

    await handlers.EchoBidirectionalStreamAsync(call);

    expect(call.written.map((r) => r.message)).toEqual([
      "Async Echo (processed): 1",
      "Async Echo (processed): 2",
      "Async Echo (processed): 3",
    ]);
    expect(call.ended).toBe(true);
  });

  it("ends a stream with INVALID_ARGUMENT when a request is malformed", async () => {
    const { handlers } = setup();
    const call = new FakeGrpcCall({ inbound: [{ message: "ok" }, { message: null }] });

    await handlers.EchoBidirectionalStreamSync(call);

    expect(call.written).toEqual([{ message: "Sync Echo: ok" }]);
    expect(call.statuses).toEqual([{ code: grpc.status.INVALID_ARGUMENT, details: malformed }]);
    expect(call.ended).toBe(false);
  });

  it("passes a middleware rejection through as the call status", async () => {
    const { handlers } = setup({
      middleware: [{ pre: () => ({ status: Status.RESOURCE_EXHAUSTED, message: "server busy" }) }],
    });
    const call = new FakeGrpcCall({ inbound: [{ message: "x" }], endInput: true });

    await handlers.EchoBidirectionalStreamAsync(call);

    expect(call.statuses).toEqual([{ code: grpc.status.RESOURCE_EXHAUSTED, details: "server busy" }]);
    expect(call.written).toEqual([]);
  });

  it("ends the call with INTERNAL when a pre hook throws", async () => {
    const { handlers, log } = setup({
      middleware: [
        {
          pre: () => {
            throw new Error("boom");
          },
        },
      ],
    });
    const call = new FakeGrpcCall({ inbound: [{ message: "x" }], endInput: true });

    await handlers.EchoBidirectionalStreamSync(call);

    expect(call.statuses).toEqual([{ code: grpc.status.INTERNAL, details: "middleware failed: boom" }]);
    expect(call.written).toEqual([]);
    expect(log.messages("error")).toEqual(["pre hook for /stream.v1.EchoService/EchoBidirectionalStreamSync threw"]);
  });

  it("still ends the call normally when a post hook throws", async () => {
    const { handlers, log } = setup({
      middleware: [
        {
          post: () => {
            throw new Error("post hook failed");
          },
        },
      ],
    });
    const call = new FakeGrpcCall({ inbound: [], endInput: true });

    await handlers.EchoBidirectionalStreamSync(call);

    expect(call.ended).toBe(true);
    expect(call.statuses).toEqual([]);
    expect(log.entries.filter((e) => e.level === "error")).toEqual([
      {
        level: "error",
        namespace: "test",
        message: "post hook for /stream.v1.EchoService/EchoBidirectionalStreamSync threw",
        data: { error: "post hook failed" },
      },
    ]);
  });
});
