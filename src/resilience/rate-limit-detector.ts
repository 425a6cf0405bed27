/**
 * Rate Limit Detection
 *
 * Inspects a provider response and/or error for throttling or quota
 * exhaustion, and extracts an absolute reset time when the text or headers
 * carry one.
 */

import { getErrorMessage, getStatusCode, isProviderError } from "../errors.js";

export type RateLimitType = "rate_limit" | "quota_exceeded";

/**
 * What a provider invocation handed back, when it did not throw
 */
export interface ProviderResponse {
  status?: number;
  exitCode?: number;
  output?: string;
  headers?: Record<string, string | undefined>;
}

export interface RateLimitDetection {
  isRateLimited: boolean;
  type: RateLimitType | null;
  /** Absolute epoch ms, when derivable */
  resetTime: number | null;
  /** Suggested wait: derived from resetTime, else a per-type hint */
  retryAfterMs: number | null;
  message?: string;
}

const NOT_LIMITED: RateLimitDetection = {
  isRateLimited: false,
  type: null,
  resetTime: null,
  retryAfterMs: null,
};

const QUOTA_PATTERNS = [/quota.{0,20}(exceeded|exhausted)/, /usage.{0,20}limit/, /insufficient.?quota/];

const RATE_LIMIT_PATTERNS = [
  /rate.?limit/,
  /too many requests/,
  /\b429\b/,
  /throttl/,
  /limit.{0,20}exceeded/,
  /session limit/,
];

const RETRY_HINT_MS: Record<RateLimitType, number> = {
  rate_limit: 60_000,
  quota_exceeded: 3_600_000,
};

const UNIT = "(seconds?|secs?|s|minutes?|mins?|m|hours?|hrs?|h)";

const RELATIVE_PATTERNS = [
  new RegExp(`resets?\\s+in\\s+(\\d+)\\s*${UNIT}\\b`),
  new RegExp(`retry\\s+after\\s+(\\d+)\\s*${UNIT}?\\b`),
  new RegExp(`wait\\s+(?:for\\s+)?(\\d+)\\s*${UNIT}\\b`),
  new RegExp(`(\\d+)\\s*${UNIT}\\s+until\\s+reset`),
];

const ABSOLUTE_PATTERN =
  /resets?\s+at\s+(\d{4}-\d{2}-\d{2}[ t]\d{2}:\d{2}(?::\d{2})?(?:\.\d+)?(z|[+-]\d{2}:?\d{2})?)/;

const CLOCK_PATTERN = /resets?\s+(?:at\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/;

function unitToMs(unit: string | undefined): number {
  if (!unit) return 1000;
  if (unit.startsWith("h")) return 3_600_000;
  if (unit.startsWith("m")) return 60_000;
  return 1000;
}

function headerValue(headers: ProviderResponse["headers"], name: string): string | undefined {
  if (!headers) return undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && value !== undefined) return value.trim();
  }
  return undefined;
}

export class RateLimitDetector {
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Check a response and/or error for rate limiting
   */
  detect(response?: ProviderResponse | null, error?: unknown): RateLimitDetection {
    // a successful answer may well talk about rate limits
    if (error === undefined && !this.reportsFailure(response)) return { ...NOT_LIMITED };

    const status = response?.status ?? getStatusCode(error);
    const text = this.collectText(response, error);

    let type: RateLimitType | null = null;
    if (error !== undefined && isProviderError(error) && error.kind) {
      if (error.kind === "rate_limit" || error.kind === "quota_exceeded") type = error.kind;
    }
    if (!type && QUOTA_PATTERNS.some((p) => p.test(text))) type = "quota_exceeded";
    if (!type && (status === 429 || RATE_LIMIT_PATTERNS.some((p) => p.test(text)))) type = "rate_limit";
    if (!type) return { ...NOT_LIMITED };

    const headers = response?.headers ?? (isProviderError(error) ? error.headers : undefined);
    const resetTime = this.resetTimeFromHeaders(headers) ?? this.extractResetTime(text);
    const retryAfterMs = resetTime !== null ? Math.max(0, resetTime - this.now()) : RETRY_HINT_MS[type];

    return {
      isRateLimited: true,
      type,
      resetTime,
      retryAfterMs,
      message: getErrorMessage(error) || response?.output?.slice(0, 200),
    };
  }

  /**
   * Absolute reset time mentioned in free text, or null
   */
  extractResetTime(rawText: string): number | null {
    const text = rawText.toLowerCase();
    const now = this.now();

    for (const pattern of RELATIVE_PATTERNS) {
      const match = text.match(pattern);
      if (match?.[1]) {
        return now + Number(match[1]) * unitToMs(match[2]);
      }
    }

    const absolute = text.match(ABSOLUTE_PATTERN);
    if (absolute?.[1]) {
      const iso = absolute[1].replace(" ", "T").toUpperCase();
      const parsed = Date.parse(absolute[2] ? iso : `${iso}Z`);
      if (!Number.isNaN(parsed)) return parsed;
    }

    const clock = text.match(CLOCK_PATTERN);
    if (clock?.[1] && clock[3]) {
      return this.nextClockTime(Number(clock[1]), Number(clock[2] ?? 0), clock[3], now);
    }

    return null;
  }

  /**
   * Whether a returned response signals a failure: an error status, a
   * non-zero exit code or a throttling header
   */
  reportsFailure(response?: ProviderResponse | null): boolean {
    if (!response) return false;
    if (response.status !== undefined && response.status >= 400) return true;
    if (response.exitCode !== undefined && response.exitCode !== 0) return true;
    return (
      headerValue(response.headers, "retry-after") !== undefined ||
      headerValue(response.headers, "x-ratelimit-remaining") === "0"
    );
  }

  private resetTimeFromHeaders(headers: ProviderResponse["headers"]): number | null {
    const retryAfter = headerValue(headers, "retry-after");
    if (retryAfter) {
      if (/^\d+$/.test(retryAfter)) return this.now() + Number(retryAfter) * 1000;
      const date = Date.parse(retryAfter);
      if (!Number.isNaN(date)) return date;
    }
    const reset = headerValue(headers, "x-ratelimit-reset");
    if (reset && /^\d+$/.test(reset)) {
      return Number(reset) * 1000;
    }
    return null;
  }

  /**
   * Next local occurrence of an "h[:mm] am/pm" wall-clock time
   */
  private nextClockTime(hour12: number, minute: number, meridiem: string, now: number): number | null {
    if (hour12 < 1 || hour12 > 12 || minute > 59) return null;
    const hour = (hour12 % 12) + (meridiem === "pm" ? 12 : 0);
    const target = new Date(now);
    target.setHours(hour, minute, 0, 0);
    if (target.getTime() <= now) {
      target.setDate(target.getDate() + 1);
    }
    return target.getTime();
  }

  private collectText(response: ProviderResponse | null | undefined, error: unknown): string {
    const parts: string[] = [];
    if (response?.output) parts.push(response.output);
    if (error !== undefined && error !== null) {
      parts.push(getErrorMessage(error));
      if (isProviderError(error) && error.output) parts.push(error.output);
    }
    return parts.join("\n").toLowerCase();
  }
}
