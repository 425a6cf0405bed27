import fs from "node:fs/promises";
import path from "node:path";

import { formatReport, isReportFormat, REPORT_FORMATS } from "../../../status/formatters.js";
import { buildStatusReport } from "../../../status/report.js";
import type { CommandContext } from "../../context.js";
import { ValidationError } from "../../error-handler.js";

export interface ExportOptions {
  format?: string;
  output?: string;
}

/**
 * Write a status report to stdout or a file
 */
export async function exportReport(ctx: CommandContext, options: ExportOptions = {}): Promise<void> {
  const format = options.format ?? "json";
  if (!isReportFormat(format)) {
    throw new ValidationError(`Unknown export format: ${format}`, `Use one of: ${REPORT_FORMATS.join(", ")}`);
  }

  const report = buildStatusReport(ctx.manager, {
    mode: ctx.config.mode,
    projectDir: ctx.config.resolved.projectDir,
  });
  const rendered = formatReport(report, format);

  if (!options.output) {
    ctx.out.raw(rendered);
    return;
  }
  const target = path.resolve(options.output);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, rendered, "utf-8");
  ctx.out.success(`Exported ${format} report to ${target}`);
}
