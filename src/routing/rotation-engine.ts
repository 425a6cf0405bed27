/**
 * Rotation Engine
 *
 * Proposes the next provider/model combination after a failure or rate
 * limit. Every strategy skips the current combination and anything the
 * candidate source reports unusable (open circuit, unhealthy, rate limited).
 */

import type { RotationStrategy } from "../config.js";
import type { Logger } from "../log.js";

export interface Combination {
  provider: string;
  model: string;
}

export type RotationDecision =
  | { action: "switch_provider" | "switch_model"; provider: string; model: string; strategy: RotationStrategy }
  | { action: "none"; strategy: RotationStrategy };

export interface PerformanceSample {
  /** 0-1 */
  successRate: number;
  avgResponseTimeMs: number;
  requests: number;
}

/**
 * Read-only view of providers, models and their usability
 */
export interface RotationCandidateSource {
  fallbackChain(): string[];
  modelChain(provider: string): string[];
  isUsable(provider: string, model: string): boolean;
  costOf(provider: string, model: string): number | undefined;
  performanceOf(provider: string, model: string): PerformanceSample;
  quotaHeadroom(provider: string, model: string): number;
}

function rotateAfter<T>(list: readonly T[], current: T | undefined): T[] {
  const idx = current === undefined ? -1 : list.indexOf(current);
  if (idx === -1) return [...list];
  return [...list.slice(idx + 1), ...list.slice(0, idx)];
}

export class RotationEngine {
  private readonly logger: Logger;

  constructor(
    private readonly source: RotationCandidateSource,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "rotation-engine" });
  }

  /**
   * Propose the next combination, or `none` when nothing qualifies
   */
  next(current: Partial<Combination> | null, strategy: RotationStrategy): RotationDecision {
    const picked = this.pick(current, strategy);
    if (!picked) {
      this.logger.debug({ current, strategy }, "No usable combination for rotation");
      return { action: "none", strategy };
    }
    const action = picked.provider === current?.provider ? "switch_model" : "switch_provider";
    return { action, provider: picked.provider, model: picked.model, strategy };
  }

  /**
   * All usable combinations except the current one, in fallback-chain order
   */
  candidates(current: Partial<Combination> | null): Combination[] {
    const result: Combination[] = [];
    for (const provider of this.source.fallbackChain()) {
      for (const model of this.source.modelChain(provider)) {
        if (provider === current?.provider && model === current.model) continue;
        if (this.source.isUsable(provider, model)) result.push({ provider, model });
      }
    }
    return result;
  }

  /**
   * First usable model of a provider in its declared order
   */
  firstUsableModel(provider: string, exclude?: string): string | undefined {
    return this.source.modelChain(provider).find((model) => model !== exclude && this.source.isUsable(provider, model));
  }

  private pick(current: Partial<Combination> | null, strategy: RotationStrategy): Combination | undefined {
    switch (strategy) {
      case "provider_first":
        return this.nextProvider(current);
      case "model_first":
        return this.nextModel(current) ?? this.nextProvider(current);
      case "cost_optimized":
        return this.rank(current, (a, b) => this.cost(a) - this.cost(b));
      case "performance_optimized":
        return this.rank(current, (a, b) => {
          const pa = this.source.performanceOf(a.provider, a.model);
          const pb = this.source.performanceOf(b.provider, b.model);
          const rateA = pa.requests > 0 ? pa.successRate : 1;
          const rateB = pb.requests > 0 ? pb.successRate : 1;
          if (rateA !== rateB) return rateB - rateA;
          return (pa.requests > 0 ? pa.avgResponseTimeMs : 0) - (pb.requests > 0 ? pb.avgResponseTimeMs : 0);
        });
      case "quota_aware":
        return this.rank(
          current,
          (a, b) =>
            this.source.quotaHeadroom(b.provider, b.model) - this.source.quotaHeadroom(a.provider, a.model),
        );
    }
  }

  private nextProvider(current: Partial<Combination> | null): Combination | undefined {
    for (const provider of rotateAfter(this.source.fallbackChain(), current?.provider)) {
      if (provider === current?.provider) continue;
      const model = this.firstUsableModel(provider);
      if (model) return { provider, model };
    }
    return undefined;
  }

  private nextModel(current: Partial<Combination> | null): Combination | undefined {
    const provider = current?.provider;
    if (!provider) return undefined;
    for (const model of rotateAfter(this.source.modelChain(provider), current.model)) {
      if (model === current.model) continue;
      if (this.source.isUsable(provider, model)) return { provider, model };
    }
    return undefined;
  }

  private rank(
    current: Partial<Combination> | null,
    compare: (a: Combination, b: Combination) => number,
  ): Combination | undefined {
    const candidates = this.candidates(current);
    candidates.sort(compare);
    return candidates[0];
  }

  private cost(combination: Combination): number {
    return this.source.costOf(combination.provider, combination.model) ?? Number.POSITIVE_INFINITY;
  }
}
