/**
 * status / health commands
 */

import { buildStatusReport } from "../../../status/report.js";
import type { CommandContext } from "../../context.js";

export interface ViewOptions {
  json?: boolean;
}

export async function status(ctx: CommandContext, options: ViewOptions = {}): Promise<void> {
  const { manager, out, config } = ctx;
  const summary = manager.statusSummary();

  if (options.json) {
    out.json(summary);
    return;
  }

  out.header(`Harness Status (${config.mode})`);
  out.keyValue("Current", `${summary.currentProvider} / ${summary.currentModel}`);
  out.keyValue("Strategy", manager.strategy);
  out.keyValue("Load balancing", summary.loadBalancing);
  out.keyValue("Model switching", summary.modelSwitching);
  out.keyValue("State file", ctx.store.statePath);
  if (summary.lastUpdated !== null) out.keyValue("Last updated", out.formatTime(summary.lastUpdated));

  out.section("Providers");
  out.keyValue("Available", summary.availableProviders.join(", ") || "none");
  out.keyValue("Rate limited", summary.rateLimitedProviders.join(", ") || "none");
  out.keyValue("Unhealthy", summary.unhealthyProviders.join(", ") || "none");
  if (summary.nextResetTime !== null) {
    out.keyValue("Next reset", `${out.formatTime(summary.nextResetTime)} (in ${out.formatDuration(Math.max(0, summary.nextResetTime - Date.now()))})`);
  }

  out.section("Counters");
  for (const [name, value] of Object.entries(summary.counters)) {
    out.keyValue(name, value);
  }

  const rotation = summary.rotation;
  if (rotation.total > 0) {
    out.section("Rotation");
    out.keyValue("Entries", rotation.total);
    out.keyValue("Success rate", `${Math.round((rotation.successRate ?? 0) * 100)}%`);
  }
}

export async function health(ctx: CommandContext, options: ViewOptions = {}): Promise<void> {
  const { manager, out, config } = ctx;
  const report = buildStatusReport(manager, { mode: config.mode, projectDir: config.resolved.projectDir });

  if (options.json) {
    out.json(report.health);
    return;
  }

  out.header("Provider Health");
  out.table(
    report.health.map((row) => ({
      name: row.model ? `  ${row.model}` : row.provider,
      status: out.healthBadge(row.status, row.circuitState),
      reason: row.unhealthyReason === "none" ? "" : row.unhealthyReason,
      errors: String(row.errorCount),
      success: row.successRate === null ? "-" : `${Math.round(row.successRate * 100)}%`,
      quota: `${row.quotaUsed}/${row.quotaLimit}`,
      limited: row.rateLimited && row.resetTime !== null ? `until ${out.formatTime(row.resetTime)}` : "",
      current: row.current ? "*" : "",
    })),
    [
      { key: "current", header: "" },
      { key: "name", header: "Provider/Model" },
      { key: "status", header: "Status" },
      { key: "reason", header: "Reason" },
      { key: "errors", header: "Errors", align: "right" },
      { key: "success", header: "Success", align: "right" },
      { key: "quota", header: "Quota", align: "right" },
      { key: "limited", header: "Rate limit" },
    ],
  );
}
