/**
 * Advisory lock file created with O_EXCL ("wx"). The holder's pid and
 * acquisition time are written into the file for diagnosis.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { LockTimeoutError, StatePersistenceError, isErrnoException } from "../errors.js";
import { sleep as defaultSleep, type Sleeper } from "../utils/sleep.js";

export interface FileLockOptions {
  timeoutMs: number;
  pollMs: number;
  /** Lock files older than this are treated as abandoned */
  staleMs?: number;
  now?: () => number;
  sleep?: Sleeper;
}

export type ReleaseLock = () => Promise<void>;

export async function acquireFileLock(lockPath: string, options: FileLockOptions): Promise<ReleaseLock> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? defaultSleep;
  const deadline = now() + options.timeoutMs;

  try {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
  } catch (err) {
    throw new StatePersistenceError(`Cannot create state directory for lock: ${lockPath}`, { path: lockPath, cause: err });
  }

  for (;;) {
    try {
      const handle = await fs.open(lockPath, "wx");
      try {
        await handle.writeFile(JSON.stringify({ pid: process.pid, acquiredAt: Date.now() }), "utf-8");
      } finally {
        await handle.close();
      }
      return async () => {
        await fs.rm(lockPath, { force: true });
      };
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") {
        throw new StatePersistenceError(`Cannot create lock file: ${lockPath}`, { path: lockPath, cause: err });
      }
    }

    if (options.staleMs !== undefined && (await removeIfStale(lockPath, options.staleMs))) {
      continue;
    }
    if (now() >= deadline) {
      throw new LockTimeoutError(lockPath, options.timeoutMs);
    }
    await wait(options.pollMs);
  }
}

async function removeIfStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.stat(lockPath);
    if (Date.now() - stat.mtimeMs <= staleMs) return false;
    await fs.rm(lockPath, { force: true });
    return true;
  } catch (err) {
    // Released between our open and stat: try again.
    if (isErrnoException(err) && err.code === "ENOENT") return true;
    throw new StatePersistenceError(`Cannot inspect lock file: ${lockPath}`, { path: lockPath, cause: err });
  }
}
