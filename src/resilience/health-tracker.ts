/**
 * Provider Health Tracking
 *
 * Per provider and per provider+model health records with a circuit breaker.
 * Records live in the injected HarnessState; mutations for one key are
 * serialized through a KeyedMutex.
 */

import type { Logger } from "../log.js";
import type { EventPublisher } from "../monitor/types.js";
import {
  combinationKey,
  splitCombinationKey,
  type HarnessState,
  type HealthRecord,
  type UnhealthyReason,
} from "../state/harness-state.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import {
  CircuitBreakerLog,
  closeCircuit,
  openCircuit,
  resolveCircuitState,
  shouldOpen,
  type CircuitBreakerOptions,
  type CircuitState,
  type CircuitStatistics,
} from "./circuit-breaker.js";

const REASON_PRIORITY: Record<UnhealthyReason, number> = {
  none: 0,
  rate_limit: 1,
  fail_exhausted: 2,
  auth: 3,
};

export interface HealthTrackerOptions extends CircuitBreakerOptions {
  historyLimit: number;
}

function createRecord(now: number): HealthRecord {
  return {
    successCount: 0,
    errorCount: 0,
    status: "healthy",
    unhealthyReason: "none",
    circuitBreakerOpen: false,
    circuitOpenedAt: null,
    lastFailureAt: null,
    lastUpdated: now,
    lastRateLimited: null,
  };
}

export class HealthTracker {
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();
  private readonly log: CircuitBreakerLog;

  constructor(
    private readonly params: {
      state: HarnessState;
      logger: Logger;
      options: HealthTrackerOptions;
      events?: EventPublisher;
      now?: () => number;
    },
  ) {
    this.logger = params.logger.child({ component: "health-tracker" });
    this.log = new CircuitBreakerLog(() => this.params.state.circuitHistory, params.options.historyLimit);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get(provider: string, model?: string | null): HealthRecord | undefined {
    const record = this.records[combinationKey(provider, model)];
    return record ? { ...record } : undefined;
  }

  /**
   * Healthy, or past its cool-down and eligible for a half-open trial.
   * Auth failures never recover by time alone.
   */
  isHealthy(provider: string, model?: string | null): boolean {
    const record = this.records[combinationKey(provider, model)];
    if (!record) return true;
    if (record.status === "unhealthy_auth") return false;
    if (record.status === "healthy") return true;
    return this.stateOf(record) === "half_open";
  }

  isCircuitOpen(provider: string, model?: string | null): boolean {
    return this.circuitState(provider, model) === "open";
  }

  circuitState(provider: string, model?: string | null): CircuitState {
    return this.stateOf(this.records[combinationKey(provider, model)]);
  }

  statistics(): CircuitStatistics {
    return this.log.statistics(this.records, this.now(), this.params.options.timeoutMs);
  }

  transitions(provider?: string, model?: string | null) {
    return this.log.entries(provider ? combinationKey(provider, model) : undefined);
  }

  // ==========================================================================
  // Outcome recording
  // ==========================================================================

  async recordSuccess(provider: string, model?: string | null): Promise<HealthRecord> {
    const key = combinationKey(provider, model);
    return this.mutate(key, (record, now) => {
      const before = this.stateOf(record);
      record.successCount += 1;
      record.status = "healthy";
      record.unhealthyReason = "none";
      closeCircuit(record, now);
      return before !== "closed" ? { from: before, to: "closed", reason: "success" } : null;
    });
  }

  async recordFailure(provider: string, model?: string | null): Promise<HealthRecord> {
    const key = combinationKey(provider, model);
    return this.mutate(key, (record, now) => {
      const before = this.stateOf(record);
      record.errorCount += 1;
      record.lastFailureAt = now;
      record.lastUpdated = now;

      if (before === "half_open") {
        record.circuitOpenedAt = now;
        if (record.status === "healthy") record.status = "circuit_breaker_open";
        return { from: before, to: "open", reason: "half_open_trial_failed" };
      }

      if (before === "closed" && shouldOpen(record, this.params.options)) {
        openCircuit(record, now);
        if (record.status === "healthy") record.status = "circuit_breaker_open";
        return { from: before, to: "open", reason: "failure_threshold" };
      }
      return null;
    });
  }

  async markAuthFailure(provider: string, model?: string | null): Promise<HealthRecord> {
    return this.markUnhealthy(provider, model, "auth", true);
  }

  /**
   * Retries ran out. Does not override an auth failure.
   */
  async markFailureExhausted(provider: string, model?: string | null): Promise<HealthRecord> {
    return this.markUnhealthy(provider, model, "fail_exhausted", true);
  }

  async markUnhealthy(
    provider: string,
    model: string | null | undefined,
    reason: "auth" | "fail_exhausted",
    openBreaker: boolean,
  ): Promise<HealthRecord> {
    const key = combinationKey(provider, model);
    return this.mutate(key, (record, now) => {
      if (REASON_PRIORITY[reason] < REASON_PRIORITY[record.unhealthyReason]) {
        this.logger.debug(
          { key, reason, current: record.unhealthyReason },
          "Ignoring lower-priority unhealthy mark",
        );
        return null;
      }

      const before = this.stateOf(record);
      record.status = reason === "auth" ? "unhealthy_auth" : "unhealthy";
      record.unhealthyReason = reason;
      record.lastUpdated = now;
      this.logger.warn({ key, reason }, "Marked unhealthy");

      if (!openBreaker) return null;
      openCircuit(record, now);
      record.lastFailureAt = now;
      return before !== "open" ? { from: before, to: "open", reason } : null;
    });
  }

  async noteRateLimited(provider: string, model?: string | null): Promise<HealthRecord> {
    return this.mutate(combinationKey(provider, model), (record, now) => {
      record.lastRateLimited = now;
      record.lastUpdated = now;
      if (REASON_PRIORITY.rate_limit > REASON_PRIORITY[record.unhealthyReason]) {
        record.unhealthyReason = "rate_limit";
      }
      return null;
    });
  }

  async clearRateLimitReason(provider: string, model?: string | null): Promise<void> {
    const key = combinationKey(provider, model);
    if (!this.records[key]) return;
    await this.mutate(key, (record, now) => {
      if (record.unhealthyReason === "rate_limit") {
        record.unhealthyReason = "none";
        record.lastUpdated = now;
      }
      return null;
    });
  }

  async resetCircuit(provider: string, model?: string | null): Promise<HealthRecord> {
    return this.mutate(combinationKey(provider, model), (record, now) => {
      const before = this.stateOf(record);
      record.status = "healthy";
      record.unhealthyReason = "none";
      closeCircuit(record, now);
      return before !== "closed" ? { from: before, to: "closed", reason: "manual_reset" } : null;
    });
  }

  /**
   * Drop health records for one provider (all its models too), or everything
   */
  async reset(provider?: string): Promise<void> {
    for (const key of Object.keys(this.records)) {
      if (provider && splitCombinationKey(key).provider !== provider) continue;
      await this.mutex.runExclusive(key, () => {
        delete this.records[key];
      });
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get records(): Record<string, HealthRecord> {
    return this.params.state.health;
  }

  private now(): number {
    return (this.params.now ?? Date.now)();
  }

  private stateOf(record: HealthRecord | undefined): CircuitState {
    return resolveCircuitState(record, this.now(), this.params.options.timeoutMs);
  }

  private async mutate(
    key: string,
    fn: (record: HealthRecord, now: number) => { from: CircuitState; to: CircuitState; reason: string } | null,
  ): Promise<HealthRecord> {
    const { record, transition } = await this.mutex.runExclusive(key, () => {
      const now = this.now();
      let current = this.records[key];
      if (!current) {
        current = createRecord(now);
        this.records[key] = current;
      }
      const change = fn(current, now);
      if (change) {
        this.log.record({ timestamp: now, key, ...change });
      }
      return { record: { ...current }, transition: change };
    });

    if (transition) {
      const { provider, model } = splitCombinationKey(key);
      this.logger.info({ key, from: transition.from, to: transition.to, reason: transition.reason }, "Circuit breaker transition");
      await this.params.events?.publish("circuit_breaker", {
        key,
        provider,
        model,
        from: transition.from,
        to: transition.to,
        reason: transition.reason,
      });
    }
    return record;
  }
}
