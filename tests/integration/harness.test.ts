import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { HarnessConfig } from "../../src/config.js";
import { ProviderError } from "../../src/errors.js";
import { createHarness, type ProviderInvoker } from "../../src/harness.js";
import type { SwitchEventData } from "../../src/monitor/types.js";
import type { AttemptContext } from "../../src/resilience/error-handler.js";
import type { ProviderResponse } from "../../src/resilience/rate-limit-detector.js";
import { FakeClock, T0, makeTempDir, removeTempDir, silentLogger, threeProviderConfig } from "../helpers/fixtures.js";

interface CliResponse extends ProviderResponse {
  output: string;
}

type Script = (provider: string, model: string) => CliResponse | Error;

/**
 * Stand-in for a provider CLI: answers from a script and records every call
 */
class ScriptedInvoker implements ProviderInvoker<string, CliResponse> {
  readonly calls: string[] = [];

  constructor(private readonly script: Script) {}

  async invoke(provider: string, model: string, request: string, context: AttemptContext): Promise<CliResponse> {
    this.calls.push(`${context.attempt}:${provider}:${model}:${request}`);
    const outcome = this.script(provider, model);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

const claudeRateLimited: Script = (provider) =>
  provider === "claude"
    ? { status: 429, output: "Rate limit exceeded. Resets in 2 minutes" }
    : { status: 200, output: `answer from ${provider}` };

describe("Harness", () => {
  let dir: string;
  let config: HarnessConfig;

  beforeEach(async () => {
    dir = await makeTempDir("harness-int-");
    config = threeProviderConfig({}, dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function build(script: Script, clock = new FakeClock(), store?: false) {
    const invoker = new ScriptedInvoker(script);
    const harness = createHarness({
      config,
      invoker,
      logger: silentLogger(),
      now: clock.now,
      sleep: clock.sleep,
      store,
    });
    return { harness, invoker, clock };
  }

  it("returns the first successful response", async () => {
    const { harness, invoker } = build((provider) => ({ status: 200, output: `answer from ${provider}` }));

    const result = await harness.run("hello");

    expect(result).toEqual({
      status: "completed",
      value: { status: 200, output: "answer from claude" },
      provider: "claude",
      model: "sonnet",
      providersTried: ["claude"],
      attempts: 1,
    });
    expect(invoker.calls).toEqual(["1:claude:sonnet:hello"]);
  });

  it("accepts a successful answer that discusses rate limits", async () => {
    const answer = "Here is a token-bucket rate limiter. It replies 429 Too Many Requests once the bucket is empty.";
    const { harness, invoker } = build(() => ({ status: 200, output: answer }));

    const result = await harness.run("write a rate limiter");

    expect(result).toMatchObject({ status: "completed", provider: "claude", model: "sonnet", attempts: 1 });
    expect(invoker.calls).toEqual(["1:claude:sonnet:write a rate limiter"]);
    expect(harness.manager.isRateLimited("claude")).toBe(false);
    expect(harness.manager.statusSummary().counters.rateLimitEvents).toBe(0);
  });

  it("rotates away from a provider whose response reports a rate limit", async () => {
    const { harness, invoker, clock } = build(claudeRateLimited);
    const switches: SwitchEventData[] = [];
    harness.events.subscribe("switch", (event) => {
      switches.push(event.data);
    });

    const result = await harness.run("hello");

    expect(result).toMatchObject({
      status: "completed",
      value: { output: "answer from gemini" },
      provider: "gemini",
      model: "pro",
      providersTried: ["claude", "gemini"],
      attempts: 2,
    });
    expect(invoker.calls).toEqual(["1:claude:sonnet:hello", "2:gemini:pro:hello"]);
    expect(clock.sleeps).toEqual([]);
    expect(harness.manager.rateLimits.get("claude")?.resetTime).toBe(T0 + 120_000);
    expect(switches).toEqual([
      {
        scope: "provider",
        fromProvider: "claude",
        fromModel: "sonnet",
        toProvider: "gemini",
        toModel: "pro",
        reason: "rate_limit",
        strategy: "provider_first",
      },
    ]);
  });

  it("persists state for the next process", async () => {
    const first = build(claudeRateLimited);
    await first.harness.run("hello");

    const statePath = path.join(dir, ".harness", "default_state.json");
    await expect(fs.access(statePath)).resolves.toBeUndefined();

    const second = build(claudeRateLimited);
    await second.harness.initialize();
    expect(second.harness.manager.currentCombination()).toEqual({ provider: "gemini", model: "pro" });
    expect(second.harness.manager.isRateLimited("claude")).toBe(true);

    const result = await second.harness.run("again");
    expect(result).toMatchObject({ status: "completed", provider: "gemini", attempts: 1 });
    expect(second.invoker.calls).toEqual(["1:gemini:pro:again"]);
  });

  it("uses the provider again once its reset time has passed", async () => {
    await build(claudeRateLimited).harness.run("hello");

    const later = build(
      (provider) => ({ status: 200, output: `answer from ${provider}` }),
      new FakeClock(T0 + 120_001),
    );
    await later.harness.initialize();

    expect(later.harness.manager.isRateLimited("claude")).toBe(false);
    expect(later.harness.manager.availableProviders()).toEqual(["claude", "gemini", "cursor"]);
  });

  it("stops on authentication failures", async () => {
    const { harness, invoker } = build(() => new ProviderError("Invalid API key", { status: 401 }));

    const result = await harness.run("hello");

    expect(result).toMatchObject({
      status: "failed",
      message: "Invalid API key",
      errorType: "authentication",
      attempts: 1,
      cancelled: false,
    });
    expect(invoker.calls).toHaveLength(1);
    expect(harness.manager.health.get("claude")?.status).toBe("unhealthy_auth");
  });

  it("keeps state in memory when the store is disabled", async () => {
    const { harness } = build(claudeRateLimited, new FakeClock(), false);

    await harness.run("hello");

    expect(harness.store).toBeUndefined();
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("initializes once", async () => {
    const { harness } = build(claudeRateLimited);
    await Promise.all([harness.initialize(), harness.initialize()]);
    await harness.initialize();
    expect(harness.manager.currentCombination()).toEqual({ provider: "claude", model: "sonnet" });
  });
});
