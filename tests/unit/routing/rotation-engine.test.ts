import { beforeEach, describe, expect, it } from "vitest";

import {
  RotationEngine,
  type PerformanceSample,
  type RotationCandidateSource,
} from "../../../src/routing/rotation-engine.js";
import { silentLogger } from "../../helpers/fixtures.js";

class FakeSource implements RotationCandidateSource {
  readonly unusable = new Set<string>();
  costs: Record<string, number> = {};
  performance: Record<string, PerformanceSample> = {};
  headroom: Record<string, number> = {};

  private readonly models: Record<string, string[]> = {
    claude: ["sonnet", "opus"],
    gemini: ["pro", "flash"],
    cursor: ["auto"],
  };

  fallbackChain(): string[] {
    return ["claude", "gemini", "cursor"];
  }

  modelChain(provider: string): string[] {
    return this.models[provider] ?? [];
  }

  isUsable(provider: string, model: string): boolean {
    return !this.unusable.has(provider) && !this.unusable.has(`${provider}:${model}`);
  }

  costOf(provider: string, model: string): number | undefined {
    return this.costs[`${provider}:${model}`];
  }

  performanceOf(provider: string, model: string): PerformanceSample {
    return this.performance[`${provider}:${model}`] ?? { successRate: 0, avgResponseTimeMs: 0, requests: 0 };
  }

  quotaHeadroom(provider: string, model: string): number {
    return this.headroom[`${provider}:${model}`] ?? 0;
  }
}

describe("RotationEngine", () => {
  let source: FakeSource;
  let engine: RotationEngine;

  beforeEach(() => {
    source = new FakeSource();
    engine = new RotationEngine(source, silentLogger());
  });

  describe("provider_first", () => {
    it("moves to the next provider in the chain", () => {
      expect(engine.next({ provider: "claude", model: "sonnet" }, "provider_first")).toEqual({
        action: "switch_provider",
        provider: "gemini",
        model: "pro",
        strategy: "provider_first",
      });
    });

    it("wraps around the chain", () => {
      expect(engine.next({ provider: "cursor", model: "auto" }, "provider_first")).toMatchObject({
        provider: "claude",
        model: "sonnet",
      });
    });

    it("skips unusable providers and models", () => {
      source.unusable.add("gemini");
      expect(engine.next({ provider: "claude", model: "sonnet" }, "provider_first")).toMatchObject({
        provider: "cursor",
        model: "auto",
      });

      source.unusable.delete("gemini");
      source.unusable.add("gemini:pro");
      expect(engine.next({ provider: "claude", model: "sonnet" }, "provider_first")).toMatchObject({
        provider: "gemini",
        model: "flash",
      });
    });

    it("starts at the head of the chain without a current combination", () => {
      expect(engine.next(null, "provider_first")).toEqual({
        action: "switch_provider",
        provider: "claude",
        model: "sonnet",
        strategy: "provider_first",
      });
    });
  });

  describe("model_first", () => {
    it("tries the current provider's other models first", () => {
      expect(engine.next({ provider: "claude", model: "sonnet" }, "model_first")).toEqual({
        action: "switch_model",
        provider: "claude",
        model: "opus",
        strategy: "model_first",
      });
    });

    it("falls back to the next provider", () => {
      source.unusable.add("claude:opus");
      expect(engine.next({ provider: "claude", model: "sonnet" }, "model_first")).toEqual({
        action: "switch_provider",
        provider: "gemini",
        model: "pro",
        strategy: "model_first",
      });
    });
  });

  it("picks the cheapest combination for cost_optimized", () => {
    source.costs = { "claude:sonnet": 3, "claude:opus": 15, "gemini:pro": 1.25, "gemini:flash": 0.1 };
    expect(engine.next({ provider: "claude", model: "sonnet" }, "cost_optimized")).toMatchObject({
      provider: "gemini",
      model: "flash",
    });
  });

  it("ranks untried combinations first for performance_optimized", () => {
    source.performance = {
      "claude:opus": { successRate: 0.5, avgResponseTimeMs: 100, requests: 100 },
      "gemini:pro": { successRate: 0.9, avgResponseTimeMs: 2000, requests: 10 },
      "gemini:flash": { successRate: 0.9, avgResponseTimeMs: 500, requests: 10 },
    };
    expect(engine.next({ provider: "claude", model: "sonnet" }, "performance_optimized")).toMatchObject({
      provider: "cursor",
      model: "auto",
    });

    source.unusable.add("cursor");
    expect(engine.next({ provider: "claude", model: "sonnet" }, "performance_optimized")).toMatchObject({
      provider: "gemini",
      model: "flash",
    });
  });

  it("prefers the most headroom for quota_aware", () => {
    source.headroom = { "claude:opus": 10, "gemini:pro": 500, "gemini:flash": 900, "cursor:auto": 100 };
    expect(engine.next({ provider: "claude", model: "sonnet" }, "quota_aware")).toMatchObject({
      provider: "gemini",
      model: "flash",
    });
  });

  it("returns none when nothing is usable", () => {
    source.unusable.add("claude:opus");
    source.unusable.add("gemini");
    source.unusable.add("cursor");
    for (const strategy of ["provider_first", "model_first", "cost_optimized"] as const) {
      expect(engine.next({ provider: "claude", model: "sonnet" }, strategy)).toEqual({ action: "none", strategy });
    }
  });

  it("lists candidates without the current combination", () => {
    source.unusable.add("gemini:flash");
    expect(engine.candidates({ provider: "claude", model: "sonnet" })).toEqual([
      { provider: "claude", model: "opus" },
      { provider: "gemini", model: "pro" },
      { provider: "cursor", model: "auto" },
    ]);
  });

  it("finds the first usable model", () => {
    expect(engine.firstUsableModel("claude")).toBe("sonnet");
    expect(engine.firstUsableModel("claude", "sonnet")).toBe("opus");
    source.unusable.add("cursor:auto");
    expect(engine.firstUsableModel("cursor")).toBeUndefined();
  });
});
