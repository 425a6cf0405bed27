#!/usr/bin/env node
/**
 * harness CLI - inspect and maintain persisted provider state
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command } from "commander";

import { cleanup, clearRateLimit, resetState } from "./cli/commands/state/maintenance.js";
import { exportReport } from "./cli/commands/state/export.js";
import { health, status } from "./cli/commands/state/status.js";
import { openContext, type CommandContext, type GlobalOptions } from "./cli/context.js";
import { parseNonNegativeInt, withErrorHandling } from "./cli/error-handler.js";

export const program = new Command();

program
  .name("harness")
  .description("Provider rotation, health and rate-limit state")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to harness.config.json")
  .option("-q, --quiet", "Quiet mode - minimal output")
  .option("--no-color", "Disable colored output")
  .option("-v, --verbose", "Show error details");

/**
 * Open config and state, run the command, and always flush the logger
 */
async function execute(cmd: Command, run: (ctx: CommandContext) => Promise<void>): Promise<void> {
  const opts = cmd.optsWithGlobals<GlobalOptions & { verbose?: boolean }>();
  await withErrorHandling(
    async () => {
      const { ctx, close } = await openContext(opts);
      try {
        await run(ctx);
      } finally {
        await close();
      }
    },
    { verbose: opts.verbose },
  )();
}

program
  .command("status")
  .description("Show the current provider/model and state summary")
  .option("--json", "Output as JSON")
  .action((options: { json?: boolean }, cmd: Command) => execute(cmd, (ctx) => status(ctx, options)));

program
  .command("health")
  .description("Show health, circuit and quota per provider and model")
  .option("--json", "Output as JSON")
  .action((options: { json?: boolean }, cmd: Command) => execute(cmd, (ctx) => health(ctx, options)));

program
  .command("export")
  .description("Export a status report")
  .option("-f, --format <format>", "json, yaml, csv or text", "json")
  .option("-o, --output <path>", "Write to a file instead of stdout")
  .action((options: { format?: string; output?: string }, cmd: Command) =>
    execute(cmd, (ctx) => exportReport(ctx, options)),
  );

program
  .command("clear-rate-limit <provider> [model]")
  .description("Clear a provider's (or model's) rate limit")
  .action((provider: string, model: string | undefined, _options: object, cmd: Command) =>
    execute(cmd, (ctx) => clearRateLimit(ctx, provider, model)),
  );

program
  .command("reset")
  .description("Reset health, rate limits, metrics and history")
  .action((_options: object, cmd: Command) => execute(cmd, (ctx) => resetState(ctx)));

program
  .command("cleanup")
  .description("Remove the state file when it is older than the retention period")
  .option("-d, --days <n>", "Retention in days")
  .action((options: { days?: string }, cmd: Command) =>
    execute(cmd, (ctx) =>
      cleanup(ctx, { days: options.days === undefined ? undefined : parseNonNegativeInt(options.days, "--days") }),
    ),
  );

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  runCli().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
