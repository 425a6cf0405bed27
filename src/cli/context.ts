import { loadConfig, type HarnessConfig } from "../config.js";
import { createStateStore } from "../harness.js";
import { createLoggerWithCleanup, type Logger } from "../log.js";
import { ProviderManager } from "../providers/provider-manager.js";
import type { StateStore } from "../state/state-store.js";
import { OutputFormatter } from "./output-formatter.js";

export interface CommandContext {
  config: HarnessConfig;
  logger: Logger;
  store: StateStore;
  manager: ProviderManager;
  out: OutputFormatter;
}

export interface GlobalOptions {
  config?: string;
  quiet?: boolean;
  color?: boolean;
}

/**
 * Load configuration and persisted state for one CLI command. Logs go to the
 * configured file only, so command output stays clean.
 */
export async function openContext(options: GlobalOptions): Promise<{ ctx: CommandContext; close: () => Promise<void> }> {
  const config = await loadConfig(options.config);
  const { logger, close } = createLoggerWithCleanup(
    config.logging.level,
    config.resolved.logFilePath,
    config.logging.fileLevel,
    { console: false },
  );
  const store = createStateStore(config, logger);
  const manager = new ProviderManager({ config, logger, store });
  await manager.initialize();
  const out = new OutputFormatter({ quiet: options.quiet, noColor: options.color === false ? true : undefined });
  return { ctx: { config, logger, store, manager, out }, close };
}
