// Tests for the asynchronous bidirectional handler

import { describe, it, expect } from "vitest";
import { silentLogger } from "../logging.ts";
import { asyncEcho, type EchoRequest, type EchoResponse, type Transform } from "../messages.ts";
import { Status } from "../status.ts";
import type { RelayQueue } from "../streaming/relay.ts";
import { FakeCall } from "../test-utils/fake-call.ts";
import { recordingLogger } from "../test-utils/recording-logger.ts";
import { echoBidirectionalStreamAsync, type BidiAsyncOptions } from "./bidi-async.ts";
import { echoBidirectionalStreamSync } from "./bidi-sync.ts";

function options(overrides: Partial<BidiAsyncOptions> = {}): BidiAsyncOptions {
  return {
    logger: silentLogger,
    pollIntervalMs: 10,
    transform: asyncEcho,
    queueCapacity: 10,
    processingDelayMs: 0,
    joinTimeoutMs: 1000,
    ...overrides,
  };
}

const inputs = (n: number) => Array.from({ length: n }, (_, i) => `m${i}`);

describe("echoBidirectionalStreamAsync", () => {
  it("emits one processed response per message, in arrival order", async () => {
    const call = new FakeCall({ inbound: ["a", "b", "c"], endInput: true });

    const outcome = await echoBidirectionalStreamAsync(call, options());

    expect(call.sent.map((r) => r.message)).toEqual([
      "Async Echo (processed): a",
      "Async Echo (processed): b",
      "Async Echo (processed): c",
    ]);
    expect(call.closeCount).toBe(1);
    expect(call.terminations).toBe(1);
    expect(outcome).toMatchObject({ state: "closed", requestCount: 3, responseCount: 3 });
  });

  it("closes an empty stream without responses", async () => {
    const call = new FakeCall({ endInput: true });

    const outcome = await echoBidirectionalStreamAsync(call, options());

    expect(call.sent).toEqual([]);
    expect(call.closeCount).toBe(1);
    expect(outcome.state).toBe("closed");
  });

  it("keeps both queues within capacity when processing is slower than input", async () => {
    const call = new FakeCall({ inbound: inputs(20), endInput: true });
    const seen: { inbound?: RelayQueue<EchoRequest>; outbound?: RelayQueue<EchoResponse> } = {};

    await echoBidirectionalStreamAsync(
      call,
      options({
        queueCapacity: 2,
        processingDelayMs: 2,
        onQueues: (inbound, outbound) => {
          seen.inbound = inbound;
          seen.outbound = outbound;
        },
      }),
    );

    expect(seen.inbound?.highWaterMark).toBe(2);
    expect(seen.outbound?.highWaterMark).toBeLessThanOrEqual(2);
    expect(seen.inbound?.ended).toBe(true);
    expect(seen.outbound?.ended).toBe(true);
    expect(call.sent.map((r) => r.message)).toEqual(
      inputs(20).map((m) => `Async Echo (processed): ${m}`),
    );
  });

  it("produces the same responses as the sync handler for the same transform", async () => {
    const transform: Transform = (request, ordinal) => ({
      message: `#${ordinal} ${request.message.toUpperCase()}`,
    });
    const messages = ["x", "y", "z", "w"];
    const syncCall = new FakeCall({ inbound: messages, endInput: true });
    const asyncCall = new FakeCall({ inbound: messages, endInput: true });

    await echoBidirectionalStreamSync(syncCall, { logger: silentLogger, pollIntervalMs: 10, transform });
    await echoBidirectionalStreamAsync(asyncCall, options({ transform }));

    expect(asyncCall.sent).toEqual(syncCall.sent);
    expect(asyncCall.sent[0]).toEqual({ message: "#1 X" });
  });

  it("winds down all stages when the client disconnects", async () => {
    const call = new FakeCall({ inbound: ["first"] });
    call.onSend = () => call.disconnect();
    const began = performance.now();

    const outcome = await echoBidirectionalStreamAsync(
      call,
      options({ pollIntervalMs: 10_000, joinTimeoutMs: 10_000 }),
    );

    expect(performance.now() - began).toBeLessThan(1000);
    expect(call.sent).toEqual([{ message: "Async Echo (processed): first" }]);
    expect(call.closeCount).toBe(0);
    expect(call.aborts).toEqual([{ status: Status.CANCELLED, detail: "call cancelled: peer-gone" }]);
    expect(outcome).toMatchObject({ state: "cancelled", cancelReason: "peer-gone", responseCount: 1 });
  });

  it("notices an inactive call within the poll interval", async () => {
    const call = new FakeCall({ inbound: ["first"] });
    call.onSend = () => call.goQuiet();

    const outcome = await echoBidirectionalStreamAsync(call, options());

    expect(outcome).toMatchObject({ state: "cancelled", cancelReason: "inactive" });
  });

  it("ends with UNAVAILABLE when a write fails", async () => {
    const call = new FakeCall({ inbound: inputs(5), endInput: true });
    call.failSendAt = 1;

    const outcome = await echoBidirectionalStreamAsync(call, options());

    expect(call.sent).toHaveLength(1);
    expect(call.aborts).toEqual([
      { status: Status.UNAVAILABLE, detail: "transport error: write after peer reset" },
    ]);
    expect(outcome.state).toBe("errored");
  });

  it("ends with INTERNAL when the transform throws", async () => {
    const call = new FakeCall({ inbound: ["ok", "bad", "after"], endInput: true });
    const transform: Transform = (request) => {
      if (request.message === "bad") throw new Error("cannot echo bad");
      return { message: request.message };
    };

    const outcome = await echoBidirectionalStreamAsync(call, options({ transform }));

    expect(call.sent.length).toBeLessThanOrEqual(1);
    expect(call.aborts).toEqual([
      { status: Status.INTERNAL, detail: "processing error: cannot echo bad" },
    ]);
    expect(outcome.state).toBe("errored");
    expect(outcome.error?.kind).toBe("processing");
  });

  it("settles with the fault while a write waits on a peer that stopped reading", async () => {
    const call = new FakeCall({ inbound: ["ok", "bad"], endInput: true });
    call.stallSends = true;
    const transform: Transform = async (request) => {
      if (request.message === "bad") {
        await new Promise((resolve) => setTimeout(resolve, 20));
        throw new Error("cannot echo bad");
      }
      return { message: request.message };
    };

    const outcome = await echoBidirectionalStreamAsync(call, options({ transform }));

    expect(call.stalled.map((w) => w.message)).toEqual([{ message: "ok" }]);
    expect(call.stalled[0]?.signal?.aborted).toBe(true);
    expect(call.aborts).toEqual([
      { status: Status.INTERNAL, detail: "processing error: cannot echo bad" },
    ]);
    expect(outcome).toMatchObject({ state: "errored", responseCount: 0 });
  });

  it("settles after the join timeout when a stage never finishes", async () => {
    const log = recordingLogger();
    const call = new FakeCall({ inbound: ["stuck"], endInput: true });
    const never: Transform = () => new Promise<EchoResponse>(() => {});
    setTimeout(() => call.goQuiet(), 5);

    const outcome = await echoBidirectionalStreamAsync(
      call,
      options({ logger: log, transform: never, joinTimeoutMs: 20 }),
    );

    expect(outcome.state).toBe("cancelled");
    expect(log.entries).toContainEqual({
      level: "warn",
      namespace: "test",
      message: "activities did not finish in time",
      data: { timeoutMs: 20 },
    });
    expect(call.terminations).toBe(1);
  });
});
