// Tests for the bounded relay queue

import { describe, it, expect } from "vitest";
import { RelayQueue } from "./relay.ts";
import type { CancellationToken } from "./types.ts";

function testToken(): CancellationToken & { cancel(): void } {
  const controller = new AbortController();
  return {
    signal: controller.signal,
    isCancelled: () => controller.signal.aborted,
    cancel: () => controller.abort(),
  };
}

const tick = (ms = 0) => new Promise((resolve) => setTimeout(resolve, ms));

describe("RelayQueue", () => {
  it("hands items over in FIFO order", async () => {
    const queue = new RelayQueue<string>();
    await queue.put("a");
    await queue.put("b");
    await queue.put("c");

    expect(await queue.take()).toEqual({ kind: "data", value: "a" });
    expect(await queue.take()).toEqual({ kind: "data", value: "b" });
    expect(await queue.take()).toEqual({ kind: "data", value: "c" });
    expect(queue.size).toBe(0);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new RelayQueue({ capacity: 0 })).toThrow(RangeError);
  });

  it("suspends put while full until a take makes room", async () => {
    const queue = new RelayQueue<number>({ capacity: 2 });
    expect(await queue.put(1)).toBe(true);
    expect(await queue.put(2)).toBe(true);

    let resolved = false;
    const pending = queue.put(3).then((ok) => {
      resolved = true;
      return ok;
    });

    await tick(30);
    expect(resolved).toBe(false);
    expect(queue.size).toBe(2);

    expect(await queue.take()).toEqual({ kind: "data", value: 1 });
    expect(await pending).toBe(true);
    expect(queue.size).toBe(2);
  });

  it("never holds more than its capacity under a fast producer", async () => {
    const queue = new RelayQueue<number>({ capacity: 3, pollIntervalMs: 5 });
    const producer = (async () => {
      for (let i = 0; i < 20; i++) {
        await queue.put(i);
      }
      queue.end();
    })();

    const received: number[] = [];
    while (true) {
      const item = await queue.take();
      if (item.kind !== "data") break;
      received.push(item.value);
      await tick(1);
    }
    await producer;

    expect(received).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(queue.highWaterMark).toBe(3);
  });

  it("delivers queued items before the sentinel and keeps the sentinel at the head", async () => {
    const queue = new RelayQueue<string>();
    await queue.put("last");
    expect(queue.end()).toBe(true);

    expect(await queue.take()).toEqual({ kind: "data", value: "last" });
    expect(await queue.take()).toEqual({ kind: "end" });
    expect(await queue.take()).toEqual({ kind: "end" });
  });

  it("holds only one sentinel", () => {
    const queue = new RelayQueue<string>();
    expect(queue.end()).toBe(true);
    expect(queue.end()).toBe(false);
    expect(queue.ended).toBe(true);
  });

  it("refuses puts after the sentinel", async () => {
    const queue = new RelayQueue<string>();
    queue.end();
    expect(await queue.put("late")).toBe(false);
    expect(queue.tryPut("late")).toBe(false);
    expect(queue.size).toBe(0);
  });

  it("wakes a waiting consumer when the producer ends", async () => {
    const queue = new RelayQueue<string>({ pollIntervalMs: 10_000 });
    const taking = queue.take();
    await tick(5);
    queue.end();
    expect(await taking).toEqual({ kind: "end" });
  });

  it("returns cancelled to a waiting consumer as soon as its token fires", async () => {
    const queue = new RelayQueue<string>({ pollIntervalMs: 10_000 });
    const token = testToken();
    const started = performance.now();
    const taking = queue.take(token);

    await tick(5);
    token.cancel();

    expect(await taking).toEqual({ kind: "cancelled" });
    expect(performance.now() - started).toBeLessThan(1000);
  });

  it("prefers cancellation over queued items", async () => {
    const queue = new RelayQueue<string>();
    const token = testToken();
    await queue.put("pending");
    token.cancel();
    expect(await queue.take(token)).toEqual({ kind: "cancelled" });
    expect(queue.size).toBe(1);
  });

  it("re-checks a token without an event on every poll interval", async () => {
    const queue = new RelayQueue<string>({ pollIntervalMs: 10 });
    let stopped = false;
    const token: CancellationToken = {
      signal: new AbortController().signal,
      isCancelled: () => stopped,
    };

    const taking = queue.take(token);
    await tick(25);
    stopped = true;

    expect(await taking).toEqual({ kind: "cancelled" });
  });

  it("resolves a blocked put false when the token fires", async () => {
    const queue = new RelayQueue<number>({ capacity: 1, pollIntervalMs: 10_000 });
    const token = testToken();
    await queue.put(1, token);

    const putting = queue.put(2, token);
    await tick(5);
    token.cancel();

    expect(await putting).toBe(false);
    expect(queue.size).toBe(1);
  });

  it("resolves pending and future puts false once the consumer abandons it", async () => {
    const queue = new RelayQueue<number>({ capacity: 1, pollIntervalMs: 10_000 });
    await queue.put(1);
    const putting = queue.put(2);

    await tick(5);
    queue.abandon();

    expect(await putting).toBe(false);
    expect(await queue.put(3)).toBe(false);
    expect(queue.abandoned).toBe(true);
    expect(queue.size).toBe(0);
  });

  it("tryPut refuses when full instead of waiting", () => {
    const queue = new RelayQueue<number>({ capacity: 1 });
    expect(queue.tryPut(1)).toBe(true);
    expect(queue.tryPut(2)).toBe(false);
    expect(queue.size).toBe(1);
  });
});
