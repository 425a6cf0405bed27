/**
 * Error Handler - consistent error reporting for CLI commands
 */

import chalk from "chalk";

import { HarnessError, type HarnessErrorCode } from "../errors.js";

/**
 * Bad command-line input
 */
export class ValidationError extends HarnessError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "INVALID_ARGUMENT", suggestion });
    this.name = "ValidationError";
  }
}

const ERROR_TITLES: Record<HarnessErrorCode, { title: string; help: string }> = {
  HARNESS_ERROR: { title: "Error", help: "Run 'harness --help' for usage information." },
  CONFIG_ERROR: { title: "Configuration Error", help: "Check your harness.config.json file for issues." },
  LOCK_NOT_ACQUIRED: { title: "State Locked", help: "Another harness process is updating the state." },
  STATE_IO_ERROR: { title: "State Error", help: "Check permissions on the state directory." },
  PROVIDER_ERROR: { title: "Provider Error", help: "Check the provider's own output for details." },
  INVALID_ARGUMENT: { title: "Invalid Argument", help: "Check the command arguments and try again." },
};

export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof HarnessError) {
    const meta = ERROR_TITLES[err.code];
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    lines.push(err.suggestion ? chalk.yellow("Suggestion: ") + err.suggestion : chalk.dim(`Hint: ${meta.help}`));
    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);
    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler: errors are printed and set a failing exit code
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: boolean; report?: (text: string) => void } = {},
): (...args: T) => Promise<R | undefined> {
  const report = options.report ?? ((text: string) => console.error(text));
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      report(formatError(err, options.verbose));
      process.exitCode = 1;
      return undefined;
    }
  };
}

export function parseNonNegativeInt(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}
