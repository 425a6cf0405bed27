import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { parseConfig, type ConfigInput, type HarnessConfig } from "../../src/config.js";
import { createLogger, type Logger } from "../../src/log.js";

export const T0 = Date.UTC(2025, 0, 15, 12, 0, 0);

/**
 * Manually advanced clock; sleep() moves time forward instead of waiting
 */
export class FakeClock {
  readonly sleeps: number[] = [];

  constructor(public current: number = T0) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };
}

export function silentLogger(): Logger {
  return createLogger("silent");
}

export async function makeTempDir(prefix = "harness-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string | undefined): Promise<void> {
  if (dir) await fs.rm(dir, { recursive: true, force: true });
}

/**
 * claude (sonnet, opus), gemini (pro, flash), cursor (auto); chain claude → gemini → cursor
 */
export function threeProviderConfig(overrides: Partial<ConfigInput> = {}, baseDir?: string): HarnessConfig {
  return parseConfig(
    {
      providers: {
        default: "claude",
        fallback: ["claude", "gemini", "cursor"],
        items: {
          claude: { type: "subscription", priority: 1, models: ["sonnet", "opus"] },
          gemini: { priority: 2, models: ["pro", "flash"] },
          cursor: { type: "passthrough", priority: 3, models: ["auto"] },
        },
      },
      ...overrides,
    },
    baseDir,
  );
}

export function singleProviderConfig(overrides: Partial<ConfigInput> = {}, baseDir?: string): HarnessConfig {
  return parseConfig(
    {
      providers: {
        items: {
          claude: { models: ["sonnet"] },
        },
      },
      ...overrides,
    },
    baseDir,
  );
}
