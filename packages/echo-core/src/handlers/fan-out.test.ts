// Tests for the server-streaming handler

import { describe, it, expect } from "vitest";
import { silentLogger } from "../logging.ts";
import { Status } from "../status.ts";
import { FakeCall } from "../test-utils/fake-call.ts";
import { echoServerStream } from "./fan-out.ts";

function options(count: number, intervalMs: number) {
  return { logger: silentLogger, pollIntervalMs: 10, count, intervalMs };
}

describe("echoServerStream", () => {
  it("sends numbered echoes and closes the stream", async () => {
    const call = new FakeCall({ request: { message: "ping" } });

    const outcome = await echoServerStream(call, options(5, 1));

    expect(call.sent.map((r) => r.message)).toEqual([
      "Echo #1: ping",
      "Echo #2: ping",
      "Echo #3: ping",
      "Echo #4: ping",
      "Echo #5: ping",
    ]);
    expect(call.closeCount).toBe(1);
    expect(call.terminations).toBe(1);
    expect(outcome).toMatchObject({ state: "closed", requestCount: 1, responseCount: 5 });
  });

  it("waits between responses but not after the last one", async () => {
    const call = new FakeCall({ request: { message: "solo" } });
    const began = performance.now();

    await echoServerStream(call, options(1, 10_000));

    expect(call.sent).toEqual([{ message: "Echo #1: solo" }]);
    expect(performance.now() - began).toBeLessThan(1000);
  });

  it("spaces responses by the interval", async () => {
    const call = new FakeCall({ request: { message: "t" } });
    const sentAt: number[] = [];
    call.onSend = () => sentAt.push(performance.now());

    await echoServerStream(call, options(3, 30));

    expect(sentAt).toHaveLength(3);
    // Timers may fire a little early; allow a millisecond of slack.
    expect(sentAt[1] - sentAt[0]).toBeGreaterThanOrEqual(29);
    expect(sentAt[2] - sentAt[1]).toBeGreaterThanOrEqual(29);
  });

  it("stops early when the client disconnects", async () => {
    const call = new FakeCall({ request: { message: "bye" } });
    call.onSend = (_message, index) => {
      if (index === 1) call.disconnect();
    };

    const outcome = await echoServerStream(call, options(5, 5));

    expect(call.sent).toHaveLength(2);
    expect(call.closeCount).toBe(0);
    expect(call.aborts).toEqual([{ status: Status.CANCELLED, detail: "call cancelled: peer-gone" }]);
    expect(outcome).toMatchObject({ state: "cancelled", responseCount: 2, cancelReason: "peer-gone" });
  });

  it("gives up a stuck write when the client disconnects", async () => {
    const call = new FakeCall({ request: { message: "ping" } });
    call.stallSends = true;
    setTimeout(() => call.disconnect(), 5);

    const outcome = await echoServerStream(call, options(5, 0));

    expect(call.stalled).toHaveLength(1);
    expect(call.closeCount).toBe(0);
    expect(call.aborts).toEqual([{ status: Status.CANCELLED, detail: "call cancelled: peer-gone" }]);
    expect(outcome).toMatchObject({ state: "cancelled", responseCount: 0 });
  });

  it("ends with UNAVAILABLE when a write fails", async () => {
    const call = new FakeCall({ request: { message: "w" } });
    call.failSendAt = 2;

    const outcome = await echoServerStream(call, options(5, 1));

    expect(call.sent).toHaveLength(2);
    expect(call.aborts).toEqual([
      { status: Status.UNAVAILABLE, detail: "transport error: write after peer reset" },
    ]);
    expect(outcome).toMatchObject({ state: "errored", responseCount: 2 });
  });
});
