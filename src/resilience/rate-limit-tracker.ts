/**
 * Rate-limit records per provider and provider+model
 */

import type { Logger } from "../log.js";
import type { EventPublisher } from "../monitor/types.js";
import {
  combinationKey,
  splitCombinationKey,
  type HarnessState,
  type RateLimitRecord,
} from "../state/harness-state.js";
import type { QuotaTracker } from "./quota-tracker.js";

export interface RateLimitEntry {
  key: string;
  provider: string;
  model?: string;
  record: RateLimitRecord;
}

export class RateLimitTracker {
  private readonly logger: Logger;

  constructor(
    private readonly params: {
      state: HarnessState;
      logger: Logger;
      quota: QuotaTracker;
      defaultResetMs: number;
      events?: EventPublisher;
      now?: () => number;
    },
  ) {
    this.logger = params.logger.child({ component: "rate-limit-tracker" });
  }

  /**
   * Mark a provider (or one of its models) rate limited until `resetTime`.
   * Without a reset time the default window applies.
   */
  async mark(provider: string, model?: string | null, resetTime?: number | null): Promise<RateLimitRecord> {
    const key = combinationKey(provider, model);
    const now = this.now();
    const until = resetTime && resetTime > now ? resetTime : now + this.params.defaultResetMs;

    const snapshot = await this.params.quota.mutex.runExclusive(key, () => {
      const record = this.params.quota.ensure(provider, key);
      record.rateLimited = true;
      record.rateLimitedAt = now;
      record.resetTime = until;
      record.eventCount += 1;
      this.params.quota.incrementRecord(record);
      return { ...record };
    });

    this.logger.warn(
      { providerId: provider, model: model ?? undefined, resetTime: new Date(until).toISOString() },
      "Rate limit recorded",
    );
    await this.params.events?.publish("rate_limit", {
      provider,
      model: model ?? undefined,
      resetTime: until,
      quotaUsed: snapshot.quotaUsed,
    });
    return snapshot;
  }

  /**
   * True while the reset time lies in the future
   */
  isRateLimited(provider: string, model?: string | null): boolean {
    const record = this.params.state.rateLimits[combinationKey(provider, model)];
    return this.isActive(record);
  }

  get(provider: string, model?: string | null): RateLimitRecord | undefined {
    const record = this.params.state.rateLimits[combinationKey(provider, model)];
    return record ? { ...record } : undefined;
  }

  async clear(provider: string, model?: string | null): Promise<void> {
    const key = combinationKey(provider, model);
    await this.params.quota.mutex.runExclusive(key, () => {
      const record = this.params.state.rateLimits[key];
      if (!record) return;
      record.rateLimited = false;
      record.resetTime = null;
    });
    this.logger.info({ providerId: provider, model: model ?? undefined }, "Rate limit cleared");
  }

  /**
   * Clear every record whose reset time has passed. Returns the cleared keys.
   */
  async sweepExpired(): Promise<string[]> {
    const cleared: string[] = [];
    for (const [key, record] of Object.entries(this.params.state.rateLimits)) {
      if (!record.rateLimited || this.isActive(record)) continue;
      await this.params.quota.mutex.runExclusive(key, () => {
        record.rateLimited = false;
        record.resetTime = null;
      });
      cleared.push(key);
    }
    return cleared;
  }

  /**
   * Earliest pending reset, or null when nothing is rate limited
   */
  nextResetTime(filter?: (entry: RateLimitEntry) => boolean): number | null {
    let earliest: number | null = null;
    for (const entry of this.list()) {
      if (!this.isActive(entry.record)) continue;
      if (filter && !filter(entry)) continue;
      const reset = entry.record.resetTime;
      if (reset !== null && (earliest === null || reset < earliest)) {
        earliest = reset;
      }
    }
    return earliest;
  }

  list(): RateLimitEntry[] {
    return Object.entries(this.params.state.rateLimits).map(([key, record]) => ({
      key,
      ...splitCombinationKey(key),
      record: { ...record },
    }));
  }

  private isActive(record: RateLimitRecord | undefined): boolean {
    if (!record || !record.rateLimited || record.resetTime === null) return false;
    return this.now() < record.resetTime;
  }

  private now(): number {
    return (this.params.now ?? Date.now)();
  }
}
