/**
 * State Store - durable coordination state per (project, mode)
 *
 * Persists to <stateDir>/<mode>_state.json with an exclusive lock file
 * beside it. Writes go to a temp file and are renamed into place, so readers
 * always see the last complete snapshot.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { Logger } from "../log.js";
import { StatePersistenceError, isErrnoException } from "../errors.js";
import type { Sleeper } from "../utils/sleep.js";
import { acquireFileLock } from "./file-lock.js";

const CURRENT_VERSION = 1;
const DAY_MS = 24 * 60 * 60 * 1000;

export type StateBlob = Record<string, unknown>;

const StateMetadataSchema = z.object({
  mode: z.string(),
  projectDir: z.string(),
  savedAt: z.number(),
});

const StateFileSchema = z.object({
  version: z.number().int(),
  metadata: StateMetadataSchema,
  state: z.record(z.unknown()),
});

export type StateMetadata = z.infer<typeof StateMetadataSchema>;
type StateFile = z.infer<typeof StateFileSchema>;

export interface StateStoreOptions {
  stateDir: string;
  projectDir: string;
  mode: string;
  logger: Logger;
  lockTimeoutMs?: number;
  lockPollMs?: number;
  staleLockMs?: number;
  now?: () => number;
  sleep?: Sleeper;
}

function isPermissionError(err: unknown): boolean {
  return isErrnoException(err) && (err.code === "EACCES" || err.code === "EPERM");
}

export class StateStore {
  readonly statePath: string;
  readonly lockPath: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: StateStoreOptions) {
    this.statePath = path.join(options.stateDir, `${options.mode}_state.json`);
    this.lockPath = path.join(options.stateDir, `${options.mode}_state.lock`);
    this.logger = options.logger.child({ component: "state-store" });
    this.now = options.now ?? Date.now;
  }

  /**
   * Load the persisted state; missing or corrupt files yield {}
   */
  async loadState(): Promise<StateBlob> {
    const file = await this.readFile();
    return file?.state ?? {};
  }

  async saveState(state: StateBlob): Promise<void> {
    await this.withLock(() => this.write(state));
  }

  async hasState(): Promise<boolean> {
    try {
      await fs.access(this.statePath);
      return true;
    } catch (err) {
      if (isPermissionError(err)) {
        throw new StatePersistenceError(`Cannot access state file: ${this.statePath}`, { path: this.statePath, cause: err });
      }
      return false;
    }
  }

  async clearState(): Promise<void> {
    await this.withLock(async () => {
      try {
        await fs.rm(this.statePath, { force: true });
      } catch (err) {
        throw new StatePersistenceError(`Cannot remove state file: ${this.statePath}`, { path: this.statePath, cause: err });
      }
    });
    this.logger.info({ path: this.statePath }, "State cleared");
  }

  /**
   * Read-modify-write under the lock
   */
  async updateState(mutator: (current: StateBlob) => StateBlob | Promise<StateBlob>): Promise<StateBlob> {
    return this.transact(async (current) => {
      const next = await mutator(current);
      return { next, result: next };
    });
  }

  /**
   * Read-modify-write under the lock, handing back a result alongside the
   * state to write
   */
  async transact<T>(fn: (current: StateBlob) => Promise<{ next: StateBlob; result: T }>): Promise<T> {
    return this.withLock(async () => {
      const current = (await this.readFile())?.state ?? {};
      const { next, result } = await fn(current);
      await this.write(next);
      return result;
    });
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const release = await acquireFileLock(this.lockPath, {
      timeoutMs: this.options.lockTimeoutMs ?? 30_000,
      pollMs: this.options.lockPollMs ?? 100,
      staleMs: this.options.staleLockMs,
      sleep: this.options.sleep,
    });
    try {
      return await fn();
    } finally {
      await release();
    }
  }

  async stateMetadata(): Promise<StateMetadata | null> {
    return (await this.readFile())?.metadata ?? null;
  }

  async exportState(): Promise<{ metadata: StateMetadata | null; state: StateBlob }> {
    const file = await this.readFile();
    return { metadata: file?.metadata ?? null, state: file?.state ?? {} };
  }

  /**
   * Remove the state file when it was last saved more than `retentionDays` ago
   */
  async cleanupOldState(retentionDays = 7): Promise<boolean> {
    const metadata = await this.stateMetadata();
    if (!metadata) return false;
    if (this.now() - metadata.savedAt <= retentionDays * DAY_MS) return false;
    await this.clearState();
    this.logger.info({ savedAt: metadata.savedAt, retentionDays }, "Removed stale state");
    return true;
  }

  private async readFile(): Promise<StateFile | null> {
    let content: string;
    try {
      content = await fs.readFile(this.statePath, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      if (isPermissionError(err)) {
        throw new StatePersistenceError(`Cannot read state file: ${this.statePath}`, { path: this.statePath, cause: err });
      }
      this.logger.warn(
        { path: this.statePath, error: err instanceof Error ? err.message : String(err) },
        "State file unreadable, treating as empty",
      );
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      this.logger.warn(
        { path: this.statePath, error: err instanceof Error ? err.message : String(err) },
        "State file is corrupt, treating as empty",
      );
      return null;
    }

    const parsed = StateFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ path: this.statePath }, "State file has an unexpected shape, treating as empty");
      return null;
    }
    if (parsed.data.version !== CURRENT_VERSION) {
      this.logger.warn(
        { fileVersion: parsed.data.version, currentVersion: CURRENT_VERSION },
        "State file version mismatch",
      );
    }
    return parsed.data;
  }

  private async write(state: StateBlob): Promise<void> {
    const file: StateFile = {
      version: CURRENT_VERSION,
      metadata: {
        mode: this.options.mode,
        projectDir: this.options.projectDir,
        savedAt: this.now(),
      },
      state,
    };

    const tempPath = `${this.statePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.statePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(file, null, 2), "utf-8");
      await fs.rename(tempPath, this.statePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw new StatePersistenceError(`Cannot write state file: ${this.statePath}`, { path: this.statePath, cause: err });
    }
    this.logger.debug({ path: this.statePath }, "State saved");
  }
}
