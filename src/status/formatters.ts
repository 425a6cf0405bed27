/**
 * Report formatters, one per output format
 */

import { stringify as toYaml } from "yaml";

import type { HealthDashboardRow } from "../providers/provider-manager.js";
import type { StatusReport } from "./report.js";

export const REPORT_FORMATS = ["json", "yaml", "csv", "text"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportFormatter {
  readonly format: ReportFormat;
  readonly extension: string;
  render(report: StatusReport): string;
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

function isoOrEmpty(timestamp: number | null | undefined): string {
  return timestamp === null || timestamp === undefined ? "" : new Date(timestamp).toISOString();
}

function percent(rate: number | null): string {
  return rate === null ? "-" : `${Math.round(rate * 100)}%`;
}

// ============================================================================
// CSV
// ============================================================================

const CSV_COLUMNS: ReadonlyArray<{ header: string; value: (row: HealthDashboardRow) => string | number | boolean }> = [
  { header: "provider", value: (row) => row.provider },
  { header: "model", value: (row) => row.model ?? "" },
  { header: "status", value: (row) => row.status },
  { header: "unhealthy_reason", value: (row) => row.unhealthyReason },
  { header: "circuit_state", value: (row) => row.circuitState },
  { header: "available", value: (row) => row.available },
  { header: "current", value: (row) => row.current },
  { header: "rate_limited", value: (row) => row.rateLimited },
  { header: "reset_time", value: (row) => isoOrEmpty(row.resetTime) },
  { header: "success_count", value: (row) => row.successCount },
  { header: "error_count", value: (row) => row.errorCount },
  { header: "success_rate", value: (row) => (row.successRate === null ? "" : row.successRate) },
  { header: "avg_response_ms", value: (row) => (row.avgResponseTimeMs === null ? "" : Math.round(row.avgResponseTimeMs)) },
  { header: "quota_used", value: (row) => row.quotaUsed },
  { header: "quota_limit", value: (row) => row.quotaLimit },
];

export function escapeCsv(value: string | number | boolean): string {
  const text = String(value);
  if (!/[",\r\n]/.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

const csvFormatter: ReportFormatter = {
  format: "csv",
  extension: "csv",
  render(report) {
    const lines = [CSV_COLUMNS.map((c) => c.header).join(",")];
    for (const row of report.health) {
      lines.push(CSV_COLUMNS.map((c) => escapeCsv(c.value(row))).join(","));
    }
    return `${lines.join("\n")}\n`;
  },
};

// ============================================================================
// Text
// ============================================================================

function listOrNone(values: string[]): string {
  return values.length > 0 ? values.join(", ") : "none";
}

const textFormatter: ReportFormatter = {
  format: "text",
  extension: "txt",
  render(report) {
    const { summary } = report;
    const { counters } = summary;
    const lines = [
      `Harness status (mode ${report.mode})`,
      `Generated: ${isoOrEmpty(report.generatedAt)}`,
      `Current: ${summary.currentProvider} / ${summary.currentModel}`,
      `Available providers: ${listOrNone(summary.availableProviders)}`,
      `Rate limited: ${listOrNone(summary.rateLimitedProviders)}`,
      `Unhealthy: ${listOrNone(summary.unhealthyProviders)}`,
      `Next reset: ${summary.nextResetTime === null ? "none" : isoOrEmpty(summary.nextResetTime)}`,
      `Counters: providerSwitches=${counters.providerSwitches} modelSwitches=${counters.modelSwitches} ` +
        `rateLimitEvents=${counters.rateLimitEvents} errorEvents=${counters.errorEvents} ` +
        `retryAttempts=${counters.retryAttempts} successes=${counters.successes}`,
      "",
      "Health:",
    ];
    for (const row of report.health) {
      const name = row.model ? `${row.provider}:${row.model}` : row.provider;
      const flags = [row.available ? "available" : "unavailable"];
      if (row.current) flags.push("current");
      if (row.rateLimited) flags.push(`rate limited until ${isoOrEmpty(row.resetTime)}`);
      lines.push(
        `  ${name} ${row.status} circuit=${row.circuitState} success=${percent(row.successRate)} ${flags.join(" ")}`,
      );
    }
    return `${lines.join("\n")}\n`;
  },
};

// ============================================================================
// JSON / YAML
// ============================================================================

const jsonFormatter: ReportFormatter = {
  format: "json",
  extension: "json",
  render: (report) => `${JSON.stringify(report, null, 2)}\n`,
};

const yamlFormatter: ReportFormatter = {
  format: "yaml",
  extension: "yaml",
  render: (report) => toYaml(report),
};

const FORMATTERS: Record<ReportFormat, ReportFormatter> = {
  json: jsonFormatter,
  yaml: yamlFormatter,
  csv: csvFormatter,
  text: textFormatter,
};

export function getFormatter(format: ReportFormat): ReportFormatter {
  return FORMATTERS[format];
}

export function formatReport(report: StatusReport, format: ReportFormat): string {
  return getFormatter(format).render(report);
}
