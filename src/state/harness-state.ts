/**
 * Coordination state shared by the trackers and persisted between runs.
 *
 * One HarnessState object is owned by the ProviderManager and handed to every
 * tracker that reads or writes part of it.
 */

import { z } from "zod";

import type { Logger } from "../log.js";

const timestamp = z.number().finite();

export const HealthStatusSchema = z.enum(["healthy", "unhealthy", "unhealthy_auth", "circuit_breaker_open"]);
export const UnhealthyReasonSchema = z.enum(["none", "auth", "fail_exhausted", "rate_limit"]);
export const CircuitStateSchema = z.enum(["closed", "open", "half_open"]);

export const HealthRecordSchema = z.object({
  successCount: z.number().int().min(0).default(0),
  errorCount: z.number().int().min(0).default(0),
  status: HealthStatusSchema.default("healthy"),
  unhealthyReason: UnhealthyReasonSchema.default("none"),
  circuitBreakerOpen: z.boolean().default(false),
  circuitOpenedAt: timestamp.nullable().default(null),
  lastFailureAt: timestamp.nullable().default(null),
  lastUpdated: timestamp,
  lastRateLimited: timestamp.nullable().default(null),
});

export const RateLimitRecordSchema = z.object({
  rateLimited: z.boolean().default(false),
  rateLimitedAt: timestamp.nullable().default(null),
  resetTime: timestamp.nullable().default(null),
  eventCount: z.number().int().min(0).default(0),
  quotaUsed: z.number().int().min(0).default(0),
  quotaLimit: z.number().int().positive(),
});

export const MetricsRecordSchema = z.object({
  requests: z.number().int().min(0).default(0),
  successes: z.number().int().min(0).default(0),
  failures: z.number().int().min(0).default(0),
  totalResponseTimeMs: z.number().min(0).default(0),
  lastUsedAt: timestamp.nullable().default(null),
  lastSuccessAt: timestamp.nullable().default(null),
  lastErrorAt: timestamp.nullable().default(null),
  errorsByKind: z.record(z.number().int().min(0)).default({}),
});

export const RotationHistoryEntrySchema = z.object({
  timestamp,
  type: z.enum(["rotation", "retry"]),
  fromProvider: z.string().nullable(),
  fromModel: z.string().nullable(),
  toProvider: z.string().nullable(),
  toModel: z.string().nullable(),
  strategy: z.string(),
  success: z.boolean(),
  durationMs: z.number().min(0),
  reason: z.string(),
});

export const CircuitTransitionSchema = z.object({
  timestamp,
  key: z.string(),
  from: CircuitStateSchema,
  to: CircuitStateSchema,
  reason: z.string(),
});

export const CountersSchema = z.object({
  providerSwitches: z.number().int().min(0).default(0),
  modelSwitches: z.number().int().min(0).default(0),
  rateLimitEvents: z.number().int().min(0).default(0),
  errorEvents: z.number().int().min(0).default(0),
  retryAttempts: z.number().int().min(0).default(0),
  successes: z.number().int().min(0).default(0),
});

export const HarnessStateSchema = z.object({
  currentProvider: z.string().nullable().default(null),
  currentModel: z.string().nullable().default(null),
  health: z.record(HealthRecordSchema).default({}),
  rateLimits: z.record(RateLimitRecordSchema).default({}),
  metrics: z.record(MetricsRecordSchema).default({}),
  rotationHistory: z.array(RotationHistoryEntrySchema).default([]),
  circuitHistory: z.array(CircuitTransitionSchema).default([]),
  counters: CountersSchema.default({}),
  weights: z
    .object({
      providers: z.record(z.number().min(0)).default({}),
      models: z.record(z.record(z.number().min(0))).default({}),
    })
    .default({}),
  settings: z
    .object({
      loadBalancing: z.boolean().optional(),
      modelSwitching: z.boolean().optional(),
    })
    .default({}),
  lastUpdated: timestamp.nullable().default(null),
});

export type HealthStatus = z.infer<typeof HealthStatusSchema>;
export type UnhealthyReason = z.infer<typeof UnhealthyReasonSchema>;
export type HealthRecord = z.infer<typeof HealthRecordSchema>;
export type RateLimitRecord = z.infer<typeof RateLimitRecordSchema>;
export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;
export type RotationHistoryEntry = z.infer<typeof RotationHistoryEntrySchema>;
export type CircuitTransition = z.infer<typeof CircuitTransitionSchema>;
export type HarnessCounters = z.infer<typeof CountersSchema>;
export type HarnessState = z.infer<typeof HarnessStateSchema>;

/**
 * Key for a provider, or a provider+model combination
 */
export function combinationKey(provider: string, model?: string | null): string {
  return model ? `${provider}:${model}` : provider;
}

export function splitCombinationKey(key: string): { provider: string; model?: string } {
  const idx = key.indexOf(":");
  if (idx === -1) return { provider: key };
  return { provider: key.slice(0, idx), model: key.slice(idx + 1) };
}

export function createEmptyState(): HarnessState {
  return HarnessStateSchema.parse({});
}

/**
 * Validate a loaded blob. Anything that does not match the schema yields an
 * empty state; the harness must keep running on a damaged file.
 */
export function parseHarnessState(blob: unknown, logger?: Logger): HarnessState {
  if (!blob || typeof blob !== "object" || Object.keys(blob).length === 0) {
    return createEmptyState();
  }
  const result = HarnessStateSchema.safeParse(blob);
  if (!result.success) {
    logger?.warn(
      { issues: result.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`) },
      "Persisted harness state is invalid, starting fresh",
    );
    return createEmptyState();
  }
  return result.data;
}

/**
 * Copy every field of `source` into `target`, keeping the target object
 * identity so trackers holding a reference see the new values.
 */
export function replaceState(target: HarnessState, source: HarnessState): void {
  target.currentProvider = source.currentProvider;
  target.currentModel = source.currentModel;
  target.health = source.health;
  target.rateLimits = source.rateLimits;
  target.metrics = source.metrics;
  target.rotationHistory = source.rotationHistory;
  target.circuitHistory = source.circuitHistory;
  target.counters = source.counters;
  target.weights = source.weights;
  target.settings = source.settings;
  target.lastUpdated = source.lastUpdated;
}

/**
 * Push onto a bounded list, evicting the oldest entries
 */
export function pushBounded<T>(list: T[], entry: T, limit: number): void {
  list.push(entry);
  if (list.length > limit) {
    list.splice(0, list.length - limit);
  }
}
