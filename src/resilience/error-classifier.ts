/**
 * Error Classification
 *
 * Maps anything a provider invocation can throw onto a closed set of error
 * kinds, and attaches the severity and retry policy for that kind.
 *
 * Text rules are evaluated in table order and the first match wins, so a
 * message mentioning both "timeout" and "connection" is a timeout.
 */

import guidanceData from "./data/recovery-guidance.json" with { type: "json" };
import { computeDelay, type RetryPolicy } from "./backoff.js";
import {
  getErrorCode,
  getErrorMessage,
  getErrorName,
  getStatusCode,
  isProviderError,
} from "../errors.js";

export const ERROR_KINDS = [
  "timeout",
  "network",
  "dns_resolution",
  "ssl_tls",
  "authentication",
  "permission",
  "access_denied",
  "not_found",
  "server_error",
  "bad_request",
  "rate_limit",
  "quota_exceeded",
  "file_not_found",
  "disk_full",
  "memory_error",
  "configuration",
  "missing_dependency",
  "provider_specific",
  "parsing_error",
  "validation_error",
  "system_error",
  "interrupted",
  "unknown",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export type ErrorSeverity = "critical" | "high" | "medium" | "low";

interface ClassificationBase {
  kind: ErrorKind;
  severity: ErrorSeverity;
  policy: RetryPolicy;
  message: string;
}

/**
 * Tagged classification result. Terminal kinds never retry or rotate.
 */
export type Classification =
  | (ClassificationBase & { outcome: "recoverable" })
  | (ClassificationBase & { outcome: "terminal" });

export type RetryPolicyOverrides = Partial<Record<ErrorKind, Partial<RetryPolicy>>>;

// ============================================================================
// Rule tables
// ============================================================================

const TEXT_RULES: ReadonlyArray<{ kind: ErrorKind; patterns: RegExp[] }> = [
  { kind: "timeout", patterns: [/timeout/, /timed out/, /deadline exceeded/] },
  { kind: "network", patterns: [/connection/, /network/, /econnreset/, /socket hang up/] },
  { kind: "dns_resolution", patterns: [/\bdns\b/, /getaddrinfo/, /resolve host/, /name resolution/] },
  { kind: "ssl_tls", patterns: [/\bssl\b/, /\btls\b/, /certificate/] },
  {
    kind: "authentication",
    patterns: [/authentication/, /unauthori[sz]ed/, /\b401\b/, /invalid.{0,10}api.?key/, /not logged in/],
  },
  { kind: "permission", patterns: [/permission/, /forbidden/, /\b403\b/] },
  { kind: "access_denied", patterns: [/access.{0,20}denied/, /insufficient privileges/] },
  { kind: "file_not_found", patterns: [/file.{0,20}not.{0,20}found/, /no such file/] },
  { kind: "not_found", patterns: [/not found/, /\b404\b/] },
  {
    kind: "server_error",
    patterns: [/server error/, /\b50[0234]\b/, /internal.{0,20}error/, /service unavailable/, /bad gateway/],
  },
  { kind: "bad_request", patterns: [/bad request/, /\b400\b/, /invalid.{0,20}request/] },
  { kind: "rate_limit", patterns: [/rate.?limit/, /\b429\b/, /too many requests/, /throttl/] },
  {
    kind: "quota_exceeded",
    patterns: [/quota.{0,20}(exceeded|exhausted)/, /usage.{0,20}limit/, /insufficient.?quota/],
  },
  { kind: "disk_full", patterns: [/disk.{0,20}full/, /no.{0,20}space/] },
  { kind: "memory_error", patterns: [/memory/] },
  { kind: "configuration", patterns: [/configuration/, /\bconfig\b/] },
  {
    kind: "missing_dependency",
    patterns: [/missing dependency/, /not installed/, /cannot find module/, /dependency.{0,20}missing/],
  },
  {
    kind: "provider_specific",
    patterns: [/anthropic/, /claude/, /openai/, /\bgpt/, /gemini/, /google/, /cursor/],
  },
  { kind: "parsing_error", patterns: [/pars(e|ing)/, /\bjson\b/, /syntax/] },
  {
    kind: "validation_error",
    patterns: [/validation/, /invalid.{0,20}input/, /argument/, /parameter/],
  },
  { kind: "system_error", patterns: [/\bsystem\b/] },
  { kind: "interrupted", patterns: [/interrupt/, /sigint/, /sigterm/] },
];

const ERRNO_KINDS: Record<string, ErrorKind> = {
  ETIMEDOUT: "timeout",
  ESOCKETTIMEDOUT: "timeout",
  ECONNREFUSED: "network",
  ECONNRESET: "network",
  EPIPE: "network",
  ENOTFOUND: "dns_resolution",
  EAI_AGAIN: "dns_resolution",
  ENOENT: "file_not_found",
  EACCES: "permission",
  EPERM: "permission",
  ENOSPC: "disk_full",
  ENOMEM: "memory_error",
};

function kindFromStatus(status: number): ErrorKind | null {
  if (status === 401) return "authentication";
  if (status === 403) return "permission";
  if (status === 404) return "not_found";
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limit";
  if (status === 400) return "bad_request";
  if (status >= 500 && status < 600) return "server_error";
  return null;
}

const SEVERITY: Partial<Record<ErrorKind, ErrorSeverity>> = {
  authentication: "critical",
  permission: "critical",
  access_denied: "critical",
  configuration: "critical",
  missing_dependency: "critical",
  rate_limit: "high",
  quota_exceeded: "high",
  disk_full: "high",
  memory_error: "high",
  interrupted: "high",
  system_error: "high",
  parsing_error: "low",
  validation_error: "low",
};

function exponential(maxRetries: number, baseDelayMs: number): RetryPolicy {
  return { strategy: "exponential_backoff", maxRetries, baseDelayMs, maxDelayMs: 300_000, exponentialBase: 2 };
}

const FIXED_MINUTE: RetryPolicy = {
  strategy: "fixed_delay",
  maxRetries: 2,
  baseDelayMs: 60_000,
  maxDelayMs: 60_000,
  exponentialBase: 1,
};

const NO_RETRY: RetryPolicy = {
  strategy: "immediate_fail",
  maxRetries: 0,
  baseDelayMs: 0,
  maxDelayMs: 0,
  exponentialBase: 1,
};

const DEFAULT_POLICIES: Partial<Record<ErrorKind, RetryPolicy>> = {
  timeout: exponential(3, 5_000),
  network: exponential(3, 5_000),
  dns_resolution: exponential(3, 5_000),
  ssl_tls: exponential(3, 5_000),
  server_error: exponential(2, 10_000),
  rate_limit: FIXED_MINUTE,
  quota_exceeded: FIXED_MINUTE,
  provider_specific: exponential(1, 5_000),
  unknown: exponential(1, 5_000),
};

interface Guidance {
  description: string;
  suggestions: string[];
}

const GUIDANCE: Partial<Record<ErrorKind, Guidance>> = guidanceData;

// ============================================================================
// Classification
// ============================================================================

function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

function classificationText(input: unknown): string {
  const parts = [getErrorMessage(input)];
  if (input && typeof input === "object") {
    const category = Reflect.get(input, "category");
    if (typeof category === "string") parts.push(category);
  }
  return parts.join(" ").toLowerCase();
}

/**
 * Classify a thrown value. Absent or unrecognized input is `unknown`.
 */
export function classifyErrorKind(input: unknown): ErrorKind {
  if (input === undefined || input === null) return "unknown";

  if (isProviderError(input) && input.kind) return input.kind;

  const status = getStatusCode(input);
  if (status !== undefined) {
    const fromStatus = kindFromStatus(status);
    if (fromStatus) return fromStatus;
  }

  const code = getErrorCode(input)?.toUpperCase();
  if (code) {
    const fromCode = ERRNO_KINDS[code];
    if (fromCode) return fromCode;
    const lowered = code.toLowerCase();
    if (isErrorKind(lowered)) return lowered;
  }

  const name = getErrorName(input);
  if (name === "TimeoutError") return "timeout";
  if (name === "AbortError") return "interrupted";

  const text = classificationText(input);
  if (!text.trim()) return "unknown";

  for (const rule of TEXT_RULES) {
    if (rule.patterns.some((pattern) => pattern.test(text))) {
      return rule.kind;
    }
  }
  return "unknown";
}

export class ErrorClassifier {
  private readonly policies: Partial<Record<ErrorKind, RetryPolicy>>;

  constructor(options: { policies?: RetryPolicyOverrides } = {}) {
    const merged: Partial<Record<ErrorKind, RetryPolicy>> = {};
    for (const kind of ERROR_KINDS) {
      const override = options.policies?.[kind];
      if (override) {
        merged[kind] = { ...this.basePolicy(kind), ...override };
      }
    }
    this.policies = merged;
  }

  /**
   * Classify a thrown value into a tagged recoverable/terminal result
   */
  classify(input: unknown): Classification {
    return this.forKind(classifyErrorKind(input), getErrorMessage(input));
  }

  /**
   * Classification for a kind already known, e.g. from rate-limit detection
   */
  forKind(kind: ErrorKind, message?: string): Classification {
    const base: ClassificationBase = {
      kind,
      severity: this.severity(kind),
      policy: this.retryPolicy(kind),
      message: message || kind,
    };
    return this.isRecoverable(kind) ? { ...base, outcome: "recoverable" } : { ...base, outcome: "terminal" };
  }

  severity(kind: ErrorKind): ErrorSeverity {
    return SEVERITY[kind] ?? "medium";
  }

  isRecoverable(kind: ErrorKind): boolean {
    const policy = this.retryPolicy(kind);
    return policy.strategy !== "immediate_fail" && policy.maxRetries > 0;
  }

  maxRetries(kind: ErrorKind): number {
    return this.isRecoverable(kind) ? this.retryPolicy(kind).maxRetries : 0;
  }

  retryPolicy(kind: ErrorKind): RetryPolicy {
    return this.policies[kind] ?? this.basePolicy(kind);
  }

  /**
   * Delay before retry `attempt` (zero-based), without jitter
   */
  retryDelay(kind: ErrorKind, attempt: number): number {
    if (!this.isRecoverable(kind)) return 0;
    return computeDelay(this.retryPolicy(kind), attempt);
  }

  recoverySuggestions(kind: ErrorKind): string[] {
    return [...(GUIDANCE[kind]?.suggestions ?? [])];
  }

  describe(kind: ErrorKind): string {
    return GUIDANCE[kind]?.description ?? "Unclassified error";
  }

  private basePolicy(kind: ErrorKind): RetryPolicy {
    return { ...(DEFAULT_POLICIES[kind] ?? NO_RETRY) };
  }
}
