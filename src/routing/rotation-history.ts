import type { HarnessState, RotationHistoryEntry } from "../state/harness-state.js";
import { pushBounded } from "../state/harness-state.js";

export interface RotationStatistics {
  total: number;
  rotations: number;
  retries: number;
  successful: number;
  /** 0-1, or null with no entries */
  successRate: number | null;
  averageDurationMs: number | null;
  byStrategy: Record<string, number>;
  byReason: Record<string, number>;
}

/**
 * Append-only bounded record of rotations and retries. Read for statistics
 * only; routing never consults it.
 */
export class RotationHistory {
  constructor(
    private readonly state: HarnessState,
    private readonly limit: number,
  ) {}

  record(entry: RotationHistoryEntry): void {
    pushBounded(this.state.rotationHistory, entry, this.limit);
  }

  entries(limit?: number): RotationHistoryEntry[] {
    const all = this.state.rotationHistory;
    return limit === undefined ? [...all] : all.slice(-limit);
  }

  statistics(): RotationStatistics {
    const entries = this.state.rotationHistory;
    const stats: RotationStatistics = {
      total: entries.length,
      rotations: 0,
      retries: 0,
      successful: 0,
      successRate: null,
      averageDurationMs: null,
      byStrategy: {},
      byReason: {},
    };
    if (entries.length === 0) return stats;

    let totalDuration = 0;
    for (const entry of entries) {
      if (entry.type === "rotation") stats.rotations += 1;
      else stats.retries += 1;
      if (entry.success) stats.successful += 1;
      totalDuration += entry.durationMs;
      stats.byStrategy[entry.strategy] = (stats.byStrategy[entry.strategy] ?? 0) + 1;
      stats.byReason[entry.reason] = (stats.byReason[entry.reason] ?? 0) + 1;
    }
    stats.successRate = stats.successful / entries.length;
    stats.averageDurationMs = totalDuration / entries.length;
    return stats;
  }

  clear(): void {
    this.state.rotationHistory.length = 0;
  }
}
