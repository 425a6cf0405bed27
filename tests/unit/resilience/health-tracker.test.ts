import { beforeEach, describe, expect, it } from "vitest";

import { EventStream } from "../../../src/monitor/event-stream.js";
import type { MonitorEvent } from "../../../src/monitor/types.js";
import { HealthTracker } from "../../../src/resilience/health-tracker.js";
import { resolveCircuitState } from "../../../src/resilience/circuit-breaker.js";
import { createEmptyState, type HarnessState } from "../../../src/state/harness-state.js";
import { FakeClock, T0, silentLogger } from "../../helpers/fixtures.js";

describe("resolveCircuitState()", () => {
  it("is closed without a record or an open breaker", () => {
    expect(resolveCircuitState(undefined, T0, 1000)).toBe("closed");
  });

  it("turns half-open once the timeout since the last failure passes", () => {
    const record = {
      successCount: 0,
      errorCount: 5,
      status: "circuit_breaker_open" as const,
      unhealthyReason: "none" as const,
      circuitBreakerOpen: true,
      circuitOpenedAt: T0,
      lastFailureAt: T0,
      lastUpdated: T0,
      lastRateLimited: null,
    };
    expect(resolveCircuitState(record, T0 + 999, 1000)).toBe("open");
    expect(resolveCircuitState(record, T0 + 1000, 1000)).toBe("half_open");
  });
});

describe("HealthTracker", () => {
  let state: HarnessState;
  let clock: FakeClock;
  let events: EventStream;
  let tracker: HealthTracker;

  beforeEach(() => {
    state = createEmptyState();
    clock = new FakeClock();
    events = new EventStream({ now: clock.now });
    tracker = new HealthTracker({
      state,
      logger: silentLogger(),
      options: { failureThreshold: 5, timeoutMs: 300_000, historyLimit: 100 },
      events,
      now: clock.now,
    });
  });

  it("treats unknown providers as healthy and closed", () => {
    expect(tracker.isHealthy("claude")).toBe(true);
    expect(tracker.circuitState("claude")).toBe("closed");
    expect(tracker.get("claude")).toBeUndefined();
  });

  it("opens the circuit at the failure threshold", async () => {
    for (let i = 0; i < 4; i++) await tracker.recordFailure("claude");
    expect(tracker.isCircuitOpen("claude")).toBe(false);
    expect(tracker.isHealthy("claude")).toBe(true);

    await tracker.recordFailure("claude");
    expect(tracker.isCircuitOpen("claude")).toBe(true);
    expect(tracker.isHealthy("claude")).toBe(false);
    expect(tracker.get("claude")).toMatchObject({
      errorCount: 5,
      status: "circuit_breaker_open",
      circuitBreakerOpen: true,
      circuitOpenedAt: T0,
    });
    expect(tracker.transitions("claude")).toEqual([
      { timestamp: T0, key: "claude", from: "closed", to: "open", reason: "failure_threshold" },
    ]);
  });

  it("publishes circuit transitions", async () => {
    const seen: MonitorEvent<"circuit_breaker">[] = [];
    events.subscribe("circuit_breaker", (event) => {
      seen.push(event);
    });

    for (let i = 0; i < 5; i++) await tracker.recordFailure("claude", "sonnet");

    expect(seen).toHaveLength(1);
    expect(seen[0]?.data).toEqual({
      key: "claude:sonnet",
      provider: "claude",
      model: "sonnet",
      from: "closed",
      to: "open",
      reason: "failure_threshold",
    });
  });

  it("goes half-open after the timeout and reopens on a failed trial", async () => {
    for (let i = 0; i < 5; i++) await tracker.recordFailure("claude");

    clock.advance(299_999);
    expect(tracker.circuitState("claude")).toBe("open");
    clock.advance(1);
    expect(tracker.circuitState("claude")).toBe("half_open");
    expect(tracker.isHealthy("claude")).toBe(true);

    await tracker.recordFailure("claude");
    expect(tracker.circuitState("claude")).toBe("open");
    expect(tracker.get("claude")?.errorCount).toBe(6);
    expect(tracker.transitions("claude").map((t) => t.reason)).toEqual([
      "failure_threshold",
      "half_open_trial_failed",
    ]);
  });

  it("closes the circuit and resets the error count on success", async () => {
    for (let i = 0; i < 5; i++) await tracker.recordFailure("claude");

    const record = await tracker.recordSuccess("claude");

    expect(record).toMatchObject({
      successCount: 1,
      errorCount: 0,
      status: "healthy",
      unhealthyReason: "none",
      circuitBreakerOpen: false,
      circuitOpenedAt: null,
    });
    expect(tracker.circuitState("claude")).toBe("closed");
  });

  it("keeps provider and model records apart", async () => {
    for (let i = 0; i < 5; i++) await tracker.recordFailure("claude", "opus");
    expect(tracker.isCircuitOpen("claude", "opus")).toBe(true);
    expect(tracker.isCircuitOpen("claude")).toBe(false);
    expect(tracker.isCircuitOpen("claude", "sonnet")).toBe(false);
  });

  it("never heals an auth failure by time", async () => {
    await tracker.markAuthFailure("claude");
    clock.advance(3_600_000);
    expect(tracker.circuitState("claude")).toBe("half_open");
    expect(tracker.isHealthy("claude")).toBe(false);
    expect(tracker.get("claude")).toMatchObject({ status: "unhealthy_auth", unhealthyReason: "auth" });
  });

  it("does not let fail_exhausted override auth", async () => {
    await tracker.markAuthFailure("claude");
    await tracker.markFailureExhausted("claude");
    expect(tracker.get("claude")).toMatchObject({ status: "unhealthy_auth", unhealthyReason: "auth" });
  });

  it("lets fail_exhausted recover through half-open", async () => {
    await tracker.markFailureExhausted("gemini");
    expect(tracker.get("gemini")).toMatchObject({
      status: "unhealthy",
      unhealthyReason: "fail_exhausted",
      circuitBreakerOpen: true,
    });
    expect(tracker.isHealthy("gemini")).toBe(false);

    clock.advance(300_000);
    expect(tracker.isHealthy("gemini")).toBe(true);
  });

  it("ranks rate_limit below the other unhealthy reasons", async () => {
    await tracker.noteRateLimited("claude");
    expect(tracker.get("claude")).toMatchObject({ unhealthyReason: "rate_limit", lastRateLimited: T0 });

    await tracker.markFailureExhausted("claude");
    await tracker.noteRateLimited("claude");
    expect(tracker.get("claude")?.unhealthyReason).toBe("fail_exhausted");
  });

  it("clears only a rate_limit reason", async () => {
    await tracker.noteRateLimited("claude");
    await tracker.clearRateLimitReason("claude");
    expect(tracker.get("claude")?.unhealthyReason).toBe("none");

    await tracker.markAuthFailure("gemini");
    await tracker.clearRateLimitReason("gemini");
    expect(tracker.get("gemini")?.unhealthyReason).toBe("auth");
  });

  it("resets the circuit manually", async () => {
    await tracker.markAuthFailure("claude");
    await tracker.resetCircuit("claude");
    expect(tracker.isHealthy("claude")).toBe(true);
    expect(tracker.transitions("claude").at(-1)?.reason).toBe("manual_reset");
  });

  it("drops the records of one provider and its models", async () => {
    await tracker.recordFailure("claude");
    await tracker.recordFailure("claude", "sonnet");
    await tracker.recordFailure("gemini");

    await tracker.reset("claude");

    expect(Object.keys(state.health)).toEqual(["gemini"]);
  });

  it("summarizes circuit statistics", async () => {
    for (let i = 0; i < 5; i++) await tracker.recordFailure("claude");
    await tracker.recordSuccess("gemini");

    expect(tracker.statistics()).toEqual({
      open: 1,
      halfOpen: 0,
      closed: 1,
      totalFailures: 5,
      transitions: 1,
      lastTransitionAt: T0,
    });
  });

  it("caps the transition history", async () => {
    const small = new HealthTracker({
      state,
      logger: silentLogger(),
      options: { failureThreshold: 1, timeoutMs: 300_000, historyLimit: 2 },
      now: clock.now,
    });
    await small.recordFailure("a");
    await small.recordFailure("b");
    await small.recordFailure("c");
    expect(state.circuitHistory.map((t) => t.key)).toEqual(["b", "c"]);
  });
});
