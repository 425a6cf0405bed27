import { describe, expect, it } from "vitest";

import { KeyedMutex } from "../../../src/utils/keyed-mutex.js";
import { countdown } from "../../../src/utils/sleep.js";
import { FakeClock, T0 } from "../../helpers/fixtures.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs sections for the same key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("claude", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("claude", () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(mutex.isLocked("claude")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("claude")).toBe(false);
  });

  it("lets different keys proceed independently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.runExclusive("claude", async () => {
      await gate.promise;
      order.push("claude");
    });
    await mutex.runExclusive("gemini", () => {
      order.push("gemini");
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(["gemini", "claude"]);
  });

  it("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive("claude", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await mutex.runExclusive("claude", () => 42)).toBe(42);
  });
});

describe("countdown()", () => {
  it("sleeps in ticks until the deadline", async () => {
    const clock = new FakeClock();
    const remaining: number[] = [];

    const reached = await countdown(T0 + 2500, {
      tickMs: 1000,
      now: clock.now,
      sleep: clock.sleep,
      onTick: (ms) => remaining.push(ms),
    });

    expect(reached).toBe(true);
    expect(clock.sleeps).toEqual([1000, 1000, 500]);
    expect(remaining).toEqual([2500, 1500, 500]);
  });

  it("returns immediately for a past deadline", async () => {
    const clock = new FakeClock();
    expect(await countdown(T0 - 1, { tickMs: 1000, now: clock.now, sleep: clock.sleep })).toBe(true);
    expect(clock.sleeps).toEqual([]);
  });

  it("stops when aborted", async () => {
    const clock = new FakeClock();
    const controller = new AbortController();

    const reached = await countdown(T0 + 10_000, {
      tickMs: 1000,
      signal: controller.signal,
      now: clock.now,
      sleep: clock.sleep,
      onTick: (ms) => {
        if (ms < 9500) controller.abort();
      },
    });

    expect(reached).toBe(false);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });
});
