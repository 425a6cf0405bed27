/**
 * Output Formatter - colored terminal output for harness commands
 */

import { stripVTControlCharacters } from "node:util";

import chalk from "chalk";

import type { HealthStatus } from "../state/harness-state.js";
import type { CircuitState } from "../resilience/circuit-breaker.js";

export type MessageLevel = "info" | "success" | "warning" | "error";

export interface TableColumn {
  key: string;
  header: string;
  align?: "left" | "right";
}

export interface OutputWriter {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processWriter: OutputWriter = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;
  private readonly writer: OutputWriter;

  constructor(options: { quiet?: boolean; noColor?: boolean; writer?: OutputWriter } = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
    this.writer = options.writer ?? processWriter;
  }

  print(message: string, level: MessageLevel = "info"): void {
    if (this.quiet && level !== "error") return;
    const styled = this.noColor ? message : this.styleMessage(message, level);
    if (level === "error") this.writer.stderr(`${styled}\n`);
    else this.writer.stdout(`${styled}\n`);
  }

  success(message: string): void {
    this.print(message, "success");
  }

  info(message: string): void {
    this.print(message, "info");
  }

  warn(message: string): void {
    this.print(message, "warning");
  }

  error(message: string): void {
    this.print(message, "error");
  }

  header(title: string): void {
    if (this.quiet) return;
    const underline = "=".repeat(title.length);
    this.line(this.noColor ? `\n${title}\n${underline}` : `\n${chalk.bold.cyan(title)}\n${chalk.dim(underline)}`);
  }

  section(title: string): void {
    if (this.quiet) return;
    this.line(this.noColor ? `\n${title}:` : `\n${chalk.bold(title)}:`);
  }

  keyValue(key: string, value: string | number | boolean): void {
    if (this.quiet) return;
    const formattedKey = this.noColor ? `  ${key}:` : chalk.dim(`  ${key}:`);
    this.line(`${formattedKey} ${value}`);
  }

  /**
   * Aligned table. Widths are measured without color codes.
   */
  table(rows: Array<Record<string, string>>, columns: TableColumn[]): void {
    if (this.quiet || rows.length === 0) return;

    const visible = (cell: string) => stripVTControlCharacters(cell).length;
    const widths = columns.map((col) => Math.max(col.header.length, ...rows.map((row) => visible(row[col.key] ?? ""))));
    const render = (cells: string[]) =>
      cells
        .map((cell, i) => {
          const pad = " ".repeat(Math.max(0, (widths[i] ?? 0) - visible(cell)));
          return columns[i]?.align === "right" ? pad + cell : cell + pad;
        })
        .join("  ")
        .trimEnd();

    const headerRow = render(columns.map((col) => col.header));
    const separator = widths.map((w) => "-".repeat(w)).join("  ");
    this.line(this.noColor ? headerRow : chalk.bold(headerRow));
    this.line(this.noColor ? separator : chalk.dim(separator));
    for (const row of rows) {
      this.line(render(columns.map((col) => row[col.key] ?? "")));
    }
  }

  json(data: unknown): void {
    this.writer.stdout(`${JSON.stringify(data, null, 2)}\n`);
  }

  raw(text: string): void {
    this.writer.stdout(text);
  }

  healthBadge(status: HealthStatus, circuit: CircuitState): string {
    const label = circuit === "closed" ? status : `${status} (${circuit})`;
    if (this.noColor) return label;
    if (status === "healthy" && circuit === "closed") return chalk.green(label);
    if (status === "unhealthy_auth") return chalk.red(label);
    return circuit === "half_open" ? chalk.yellow(label) : chalk.red(label);
  }

  formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
    if (ms < 3_600_000) return `${Math.floor(ms / 60_000)}m ${Math.floor((ms % 60_000) / 1000)}s`;
    const hours = Math.floor(ms / 3_600_000);
    const mins = Math.floor((ms % 3_600_000) / 60_000);
    return `${hours}h ${mins}m`;
  }

  formatTime(timestamp: number): string {
    return new Date(timestamp).toISOString();
  }

  private line(text: string): void {
    this.writer.stdout(`${text}\n`);
  }

  private styleMessage(message: string, level: MessageLevel): string {
    switch (level) {
      case "success":
        return chalk.green("✓ ") + message;
      case "warning":
        return chalk.yellow("⚠ ") + message;
      case "error":
        return chalk.red("✗ ") + message;
      default:
        return chalk.blue("ℹ ") + message;
    }
  }
}
