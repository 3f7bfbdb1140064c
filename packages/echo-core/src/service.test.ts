// Tests for the echo service and its middleware chain

import { describe, it, expect } from "vitest";
import { admissionMiddleware } from "./admission.ts";
import type { ServerMiddleware } from "./middleware.ts";
import { EchoService } from "./service.ts";
import { Status } from "./status.ts";
import { FakeCall } from "./test-utils/fake-call.ts";

const fast = { pollIntervalMs: 10, fanOutIntervalMs: 0, processingDelayMs: 0 };

function tracing(name: string, trace: string[]): ServerMiddleware {
  return {
    pre: () => {
      trace.push(`${name}.pre`);
    },
    post: (_ctx, _call, result) => {
      trace.push(`${name}.post:${result.admitted ? "admitted" : "rejected"}`);
    },
  };
}

describe("EchoService", () => {
  it("runs pre hooks in order and post hooks in reverse around the handler", async () => {
    const trace: string[] = [];
    const service = new EchoService({
      config: fast,
      middleware: [tracing("outer", trace), tracing("inner", trace)],
    });
    const call = new FakeCall({ inbound: ["a"], endInput: true });

    const result = await service.clientStream(call);

    expect(trace).toEqual(["outer.pre", "inner.pre", "inner.post:admitted", "outer.post:admitted"]);
    expect(call.replies).toEqual([{ message: 'Received 1 messages: ["a"]' }]);
    expect(result).toMatchObject({ admitted: true, outcome: { state: "closed" } });
  });

  it("ends a rejected call with the rejection status without running the handler", async () => {
    const trace: string[] = [];
    const refuse: ServerMiddleware = {
      pre: () => ({ status: Status.RESOURCE_EXHAUSTED, message: "busy" }),
      post: () => {
        trace.push("refuse.post");
      },
    };
    const service = new EchoService({
      config: fast,
      middleware: [tracing("outer", trace), refuse, tracing("never", trace)],
    });
    const call = new FakeCall({ request: { message: "hi" } });

    const result = await service.serverStream(call);

    expect(result).toEqual({
      admitted: false,
      rejection: { status: Status.RESOURCE_EXHAUSTED, message: "busy" },
    });
    expect(call.aborts).toEqual([{ status: Status.RESOURCE_EXHAUSTED, detail: "busy" }]);
    expect(call.sent).toEqual([]);
    expect(trace).toEqual(["outer.pre", "refuse.post", "outer.post:rejected"]);
  });

  it("applies fan-out settings from its configuration", async () => {
    const service = new EchoService({ config: { ...fast, fanOutCount: 2 } });
    const call = new FakeCall({ request: { message: "cfg" } });

    await service.serverStream(call);

    expect(call.sent).toEqual([{ message: "Echo #1: cfg" }, { message: "Echo #2: cfg" }]);
  });

  it("uses the configured transforms", async () => {
    const service = new EchoService({
      config: fast,
      transforms: {
        sync: (r) => ({ message: `s:${r.message}` }),
        async: (r) => ({ message: `a:${r.message}` }),
      },
    });
    const syncCall = new FakeCall({ inbound: ["x"], endInput: true });
    const asyncCall = new FakeCall({ inbound: ["x"], endInput: true });

    await service.bidiSync(syncCall);
    await service.bidiAsync(asyncCall);

    expect(syncCall.sent).toEqual([{ message: "s:x" }]);
    expect(asyncCall.sent).toEqual([{ message: "a:x" }]);
  });

  it("sizes the relay queues from its configuration", async () => {
    const capacities: number[] = [];
    const service = new EchoService({
      config: { ...fast, queueCapacity: 3 },
      onQueues: (inbound, outbound) => capacities.push(inbound.capacity, outbound.capacity),
    });

    await service.bidiAsync(new FakeCall({ endInput: true }));

    expect(capacities).toEqual([3, 3]);
  });

  it("ends the call with INTERNAL when a handler throws", async () => {
    const service = new EchoService({
      config: fast,
      onQueues: () => {
        throw new Error("observer failed");
      },
    });
    const call = new FakeCall({ endInput: true });

    const result = await service.bidiAsync(call);

    expect(call.aborts).toEqual([
      { status: Status.INTERNAL, detail: "processing error: observer failed" },
    ]);
    expect(result.admitted && result.outcome.state).toBe("errored");
  });

  it("refuses calls beyond the admission limit until one finishes", async () => {
    const admission = admissionMiddleware(1);
    const service = new EchoService({ config: fast, middleware: [admission] });

    const first = new FakeCall();
    const running = service.bidiSync(first);

    const second = new FakeCall({ endInput: true });
    const refused = await service.bidiSync(second);
    expect(refused.admitted).toBe(false);
    expect(second.aborts[0]?.status).toBe(Status.RESOURCE_EXHAUSTED);

    first.endInput();
    await running;
    expect(admission.inFlight).toBe(0);

    const third = new FakeCall({ inbound: ["ok"], endInput: true });
    expect((await service.bidiSync(third)).admitted).toBe(true);
    expect(third.sent).toEqual([{ message: "Sync Echo: ok" }]);
  });

  it("releases the admission slot when a later post hook throws", async () => {
    const admission = admissionMiddleware(1);
    const failing: ServerMiddleware = {
      post: () => {
        throw new Error("post failed");
      },
    };
    const service = new EchoService({ config: fast, middleware: [admission, failing] });

    const first = await service.serverStream(new FakeCall({ request: { message: "one" } }));
    expect(first.admitted).toBe(true);
    expect(admission.inFlight).toBe(0);

    const next = new FakeCall({ request: { message: "two" } });
    expect((await service.serverStream(next)).admitted).toBe(true);
    expect(next.aborts).toEqual([]);
    expect(next.sent).toHaveLength(5);
  });

  it("refuses the call with INTERNAL and unwinds entered hooks when a pre hook throws", async () => {
    const trace: string[] = [];
    const admission = admissionMiddleware(1);
    const failing: ServerMiddleware = {
      pre: () => {
        throw new Error("boom");
      },
    };
    const service = new EchoService({
      config: fast,
      middleware: [tracing("outer", trace), admission, failing, tracing("never", trace)],
    });
    const call = new FakeCall({ inbound: ["x"], endInput: true });

    const result = await service.bidiSync(call);

    expect(result).toEqual({
      admitted: false,
      rejection: { status: Status.INTERNAL, message: "middleware failed: boom" },
    });
    expect(call.aborts).toEqual([{ status: Status.INTERNAL, detail: "middleware failed: boom" }]);
    expect(call.terminations).toBe(1);
    expect(call.sent).toEqual([]);
    expect(trace).toEqual(["outer.pre", "outer.post:rejected"]);
    expect(admission.inFlight).toBe(0);
  });
});
