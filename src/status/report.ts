import type { HealthDashboardRow, ProviderManager, StatusSummary } from "../providers/provider-manager.js";
import type { RotationHistoryEntry } from "../state/harness-state.js";

export interface RateLimitRow {
  key: string;
  provider: string;
  model?: string;
  resetTime: number | null;
  eventCount: number;
  quotaUsed: number;
  quotaLimit: number;
}

export interface StatusReport {
  generatedAt: number;
  mode: string;
  projectDir: string;
  summary: StatusSummary;
  health: HealthDashboardRow[];
  rateLimits: RateLimitRow[];
  recentRotations: RotationHistoryEntry[];
}

const RECENT_ROTATIONS = 20;

/**
 * Snapshot of the manager's state for display or export
 */
export function buildStatusReport(
  manager: ProviderManager,
  params: { mode: string; projectDir: string; now?: number },
): StatusReport {
  const rateLimits = manager.rateLimits
    .list()
    .filter((entry) => manager.isRateLimited(entry.provider, entry.model))
    .map((entry) => ({
      key: entry.key,
      provider: entry.provider,
      model: entry.model,
      resetTime: entry.record.resetTime,
      eventCount: entry.record.eventCount,
      quotaUsed: entry.record.quotaUsed,
      quotaLimit: entry.record.quotaLimit,
    }));

  return {
    generatedAt: params.now ?? Date.now(),
    mode: params.mode,
    projectDir: params.projectDir,
    summary: manager.statusSummary(),
    health: manager.healthDashboard(),
    rateLimits,
    recentRotations: manager.rotationHistory(RECENT_ROTATIONS),
  };
}
