/**
 * Circuit breaker state machine over a HealthRecord.
 *
 *   closed --(failureThreshold failures)--> open
 *   open   --(timeoutMs since last failure)--> half_open
 *   half_open --success--> closed
 *   half_open --failure--> open
 *
 * Any success closes the breaker from any state.
 */

import type { CircuitTransition, HealthRecord } from "../state/harness-state.js";
import { pushBounded } from "../state/harness-state.js";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  failureThreshold: number;
  timeoutMs: number;
}

export const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  timeoutMs: 300_000,
};

export function resolveCircuitState(
  record: HealthRecord | undefined,
  now: number,
  timeoutMs: number,
): CircuitState {
  if (!record || !record.circuitBreakerOpen) return "closed";
  const since = record.lastFailureAt ?? record.circuitOpenedAt;
  if (since === null) return "half_open";
  return now - since >= timeoutMs ? "half_open" : "open";
}

export function shouldOpen(record: HealthRecord, options: CircuitBreakerOptions): boolean {
  return !record.circuitBreakerOpen && record.errorCount >= options.failureThreshold;
}

export function openCircuit(record: HealthRecord, now: number): void {
  record.circuitBreakerOpen = true;
  record.circuitOpenedAt = now;
  record.lastFailureAt = record.lastFailureAt ?? now;
  record.lastUpdated = now;
}

export function closeCircuit(record: HealthRecord, now: number): void {
  record.circuitBreakerOpen = false;
  record.circuitOpenedAt = null;
  record.errorCount = 0;
  record.lastUpdated = now;
}

export interface CircuitStatistics {
  open: number;
  halfOpen: number;
  closed: number;
  totalFailures: number;
  transitions: number;
  lastTransitionAt: number | null;
}

/**
 * Bounded log of circuit transitions, stored in the harness state
 */
export class CircuitBreakerLog {
  constructor(
    private readonly history: () => CircuitTransition[],
    private readonly limit: number,
  ) {}

  record(transition: CircuitTransition): void {
    pushBounded(this.history(), transition, this.limit);
  }

  entries(key?: string): CircuitTransition[] {
    const all = this.history();
    return key ? all.filter((entry) => entry.key === key) : [...all];
  }

  statistics(
    records: Record<string, HealthRecord>,
    now: number,
    timeoutMs: number,
  ): CircuitStatistics {
    const stats: CircuitStatistics = {
      open: 0,
      halfOpen: 0,
      closed: 0,
      totalFailures: 0,
      transitions: this.history().length,
      lastTransitionAt: null,
    };

    for (const record of Object.values(records)) {
      const state = resolveCircuitState(record, now, timeoutMs);
      if (state === "open") stats.open += 1;
      else if (state === "half_open") stats.halfOpen += 1;
      else stats.closed += 1;
      stats.totalFailures += record.errorCount;
    }

    const last = this.history().at(-1);
    stats.lastTransitionAt = last?.timestamp ?? null;
    return stats;
  }
}
