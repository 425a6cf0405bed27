/**
 * Error types shared across the harness core.
 */

import type { ErrorKind } from "./resilience/error-classifier.js";

export type HarnessErrorCode =
  | "HARNESS_ERROR"
  | "CONFIG_ERROR"
  | "LOCK_NOT_ACQUIRED"
  | "STATE_IO_ERROR"
  | "PROVIDER_ERROR"
  | "INVALID_ARGUMENT";

/**
 * Base error class
 */
export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: HarnessErrorCode;
      details?: Record<string, unknown>;
      suggestion?: string;
      cause?: unknown;
    } = { code: "HARNESS_ERROR" },
  ) {
    super(message, { cause: options.cause });
    this.name = "HarnessError";
    this.code = options.code;
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

/**
 * Invalid configuration, or a lookup of a provider/model that is not configured.
 * Never retried.
 */
export class ConfigurationError extends HarnessError {
  constructor(message: string, options: { details?: Record<string, unknown>; suggestion?: string } = {}) {
    super(message, { code: "CONFIG_ERROR", ...options });
    this.name = "ConfigurationError";
  }
}

export class LockTimeoutError extends HarnessError {
  readonly lockPath: string;
  readonly timeoutMs: number;

  constructor(lockPath: string, timeoutMs: number) {
    super(`Could not acquire state lock within ${timeoutMs}ms: ${lockPath}`, {
      code: "LOCK_NOT_ACQUIRED",
      details: { lockPath, timeoutMs },
      suggestion: "Another harness process may be holding the lock. Remove the lock file if no other process is running.",
    });
    this.name = "LockTimeoutError";
    this.lockPath = lockPath;
    this.timeoutMs = timeoutMs;
  }
}

export class StatePersistenceError extends HarnessError {
  readonly path: string;

  constructor(message: string, params: { path: string; cause?: unknown }) {
    super(message, {
      code: "STATE_IO_ERROR",
      details: { path: params.path, errno: getErrorCode(params.cause) },
      cause: params.cause,
    });
    this.name = "StatePersistenceError";
    this.path = params.path;
  }
}

/**
 * Error thrown by a provider invocation. `kind` pins the classification when
 * the invoker already knows it.
 */
export class ProviderError extends HarnessError {
  readonly providerId?: string;
  readonly model?: string;
  readonly status?: number;
  readonly errorCode?: string;
  readonly kind?: ErrorKind;
  readonly output?: string;
  readonly headers?: Record<string, string | undefined>;

  constructor(
    message: string,
    params: {
      providerId?: string;
      model?: string;
      status?: number;
      errorCode?: string;
      kind?: ErrorKind;
      output?: string;
      headers?: Record<string, string | undefined>;
      cause?: unknown;
    } = {},
  ) {
    super(message, {
      code: "PROVIDER_ERROR",
      details: { providerId: params.providerId, model: params.model, status: params.status },
      cause: params.cause,
    });
    this.name = "ProviderError";
    this.providerId = params.providerId;
    this.model = params.model;
    this.status = params.status;
    this.errorCode = params.errorCode;
    this.kind = params.kind;
    this.output = params.output;
    this.headers = params.headers;
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

// ============================================================================
// Field extraction
// ============================================================================

function readField(err: unknown, key: string): unknown {
  if (!err || typeof err !== "object") return undefined;
  return Reflect.get(err, key);
}

export function getStatusCode(err: unknown): number | undefined {
  const candidate = readField(err, "status") ?? readField(err, "statusCode");
  if (typeof candidate === "number") return candidate;
  if (typeof candidate === "string" && /^\d+$/.test(candidate)) {
    return Number(candidate);
  }
  return undefined;
}

export function getErrorCode(err: unknown): string | undefined {
  if (err instanceof ProviderError) return err.errorCode;
  const candidate = readField(err, "code");
  if (typeof candidate !== "string") return undefined;
  const trimmed = candidate.trim();
  return trimmed ? trimmed : undefined;
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  if (typeof err === "symbol") return err.description ?? "";
  const message = readField(err, "message");
  if (typeof message === "string") return message;
  return "";
}

export function getErrorName(err: unknown): string | undefined {
  const name = readField(err, "name");
  return typeof name === "string" ? name : undefined;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && typeof readField(err, "code") === "string";
}
