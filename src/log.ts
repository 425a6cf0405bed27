import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

function ensureLogDir(filePath: string): void {
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }
}

export function createLogger(
  level: LogLevel | string,
  filePath?: string,
  fileLevel?: string,
  opts?: { console?: boolean },
): Logger {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    if (!consoleEnabled) {
      return pino({ level: "silent" });
    }
    return pino({ level });
  }
  ensureLogDir(filePath);
  const streams = [
    ...(consoleEnabled ? [{ level, stream: process.stdout }] : []),
    {
      level: fileLevel ?? level,
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ];
  return pino({ level: "trace" }, multistream(streams));
}

/**
 * Like createLogger, but hands back a close() that flushes the file
 * destination. CLI commands call it before exiting.
 */
export function createLoggerWithCleanup(
  level: LogLevel | string,
  filePath?: string,
  fileLevel?: string,
  opts?: { console?: boolean },
): { logger: Logger; close: () => Promise<void> } {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    const logger = consoleEnabled ? pino({ level }) : pino({ level: "silent" });
    return { logger, close: async () => {} };
  }

  ensureLogDir(filePath);

  const dest = pino.destination({ dest: filePath, sync: true });
  const logger = consoleEnabled
    ? pino(
        { level: "trace" },
        multistream([
          { level, stream: process.stdout },
          { level: fileLevel ?? level, stream: dest },
        ]),
      )
    : pino({ level: fileLevel ?? level }, dest);

  return {
    logger,
    close: async () => {
      dest.flushSync();
      await new Promise<void>((resolve) => {
        let settled = false;
        const done = () => {
          if (settled) return;
          settled = true;
          resolve();
        };

        dest.once("close", done);
        dest.once("finish", done);
        dest.end();

        const timeout = setTimeout(done, 2000);
        timeout.unref();
      });
    },
  };
}
