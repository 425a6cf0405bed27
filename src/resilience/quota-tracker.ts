/**
 * Quota usage per provider and provider+model.
 *
 * Each recorded rate-limit event counts against the quota. The numbers feed
 * rotation and status display only.
 */

import type { Logger } from "../log.js";
import {
  combinationKey,
  type HarnessState,
  type RateLimitRecord,
} from "../state/harness-state.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";

export interface QuotaUsage {
  used: number;
  limit: number;
  remaining: number;
  /** 0-100 */
  percentage: number;
}

export function emptyRateLimitRecord(quotaLimit: number): RateLimitRecord {
  return {
    rateLimited: false,
    rateLimitedAt: null,
    resetTime: null,
    eventCount: 0,
    quotaUsed: 0,
    quotaLimit,
  };
}

export class QuotaTracker {
  private readonly logger: Logger;
  readonly mutex: KeyedMutex;

  constructor(
    private readonly params: {
      state: HarnessState;
      logger: Logger;
      limitFor: (provider: string) => number;
      mutex?: KeyedMutex;
    },
  ) {
    this.logger = params.logger.child({ component: "quota-tracker" });
    this.mutex = params.mutex ?? new KeyedMutex();
  }

  async increment(provider: string, model?: string | null, amount = 1): Promise<QuotaUsage> {
    const key = combinationKey(provider, model);
    return this.mutex.runExclusive(key, () => {
      const record = this.ensure(provider, key);
      this.incrementRecord(record, amount);
      return this.toUsage(record);
    });
  }

  /**
   * Bump a record the caller already holds the lock for
   */
  incrementRecord(record: RateLimitRecord, amount = 1): void {
    record.quotaUsed += amount;
    if (record.quotaUsed >= record.quotaLimit) {
      this.logger.warn({ used: record.quotaUsed, limit: record.quotaLimit }, "Quota limit reached");
    }
  }

  usage(provider: string, model?: string | null): QuotaUsage {
    const record = this.params.state.rateLimits[combinationKey(provider, model)];
    if (!record) {
      const limit = this.params.limitFor(provider);
      return { used: 0, limit, remaining: limit, percentage: 0 };
    }
    return this.toUsage(record);
  }

  /**
   * Remaining quota for a combination: the tighter of the provider and model budgets
   */
  headroom(provider: string, model?: string | null): number {
    const providerRemaining = this.usage(provider).remaining;
    if (!model) return providerRemaining;
    return Math.min(providerRemaining, this.usage(provider, model).remaining);
  }

  async clear(provider: string, model?: string | null): Promise<void> {
    const key = combinationKey(provider, model);
    await this.mutex.runExclusive(key, () => {
      const record = this.params.state.rateLimits[key];
      if (record) record.quotaUsed = 0;
    });
  }

  async clearAll(): Promise<void> {
    for (const key of Object.keys(this.params.state.rateLimits)) {
      await this.mutex.runExclusive(key, () => {
        const record = this.params.state.rateLimits[key];
        if (record) record.quotaUsed = 0;
      });
    }
  }

  ensure(provider: string, key: string): RateLimitRecord {
    let record = this.params.state.rateLimits[key];
    if (!record) {
      record = emptyRateLimitRecord(this.params.limitFor(provider));
      this.params.state.rateLimits[key] = record;
    }
    return record;
  }

  private toUsage(record: RateLimitRecord): QuotaUsage {
    const remaining = Math.max(0, record.quotaLimit - record.quotaUsed);
    const percentage = record.quotaLimit > 0 ? Math.min(100, (record.quotaUsed / record.quotaLimit) * 100) : 100;
    return { used: record.quotaUsed, limit: record.quotaLimit, remaining, percentage };
  }
}
