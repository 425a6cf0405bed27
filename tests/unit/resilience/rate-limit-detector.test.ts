import { describe, expect, it } from "vitest";

import { ProviderError } from "../../../src/errors.js";
import { RateLimitDetector } from "../../../src/resilience/rate-limit-detector.js";
import { T0 } from "../../helpers/fixtures.js";

const detector = new RateLimitDetector({ now: () => T0 });

describe("RateLimitDetector.detect()", () => {
  it("reports nothing for a normal response", () => {
    expect(detector.detect({ status: 200, output: "all good" })).toEqual({
      isRateLimited: false,
      type: null,
      resetTime: null,
      retryAfterMs: null,
    });
  });

  it("ignores rate-limit wording in a successful answer", () => {
    const answer = "Here is a token-bucket rate limiter that returns 429 Too Many Requests.";
    expect(detector.detect({ status: 200, output: answer }).isRateLimited).toBe(false);
    expect(detector.detect({ exitCode: 0, output: answer }).isRateLimited).toBe(false);
    expect(detector.detect({ output: answer }).isRateLimited).toBe(false);
  });

  it("reads the wording once the response reports a failure", () => {
    expect(detector.detect({ exitCode: 1, output: "Session limit reached" }).type).toBe("rate_limit");
    expect(detector.detect({ status: 503, output: "quota exceeded" }).type).toBe("quota_exceeded");
    expect(
      detector.detect({ status: 200, output: "rate limit exceeded", headers: { "X-RateLimit-Remaining": "0" } }).type,
    ).toBe("rate_limit");
  });

  it("flags HTTP 429 with the default hint", () => {
    expect(detector.detect({ status: 429 })).toEqual({
      isRateLimited: true,
      type: "rate_limit",
      resetTime: null,
      retryAfterMs: 60_000,
      message: undefined,
    });
  });

  it("checks quota phrasing before rate-limit phrasing", () => {
    const result = detector.detect(null, new Error("Rate limit: monthly quota exceeded"));
    expect(result.type).toBe("quota_exceeded");
    expect(result.retryAfterMs).toBe(3_600_000);
    expect(result.message).toBe("Rate limit: monthly quota exceeded");
  });

  it("trusts an explicit ProviderError kind", () => {
    const result = detector.detect(null, new ProviderError("provider said no", { kind: "rate_limit" }));
    expect(result.isRateLimited).toBe(true);
    expect(result.type).toBe("rate_limit");
  });

  it("reads Retry-After seconds", () => {
    const result = detector.detect({ status: 429, headers: { "Retry-After": "120" } });
    expect(result.resetTime).toBe(T0 + 120_000);
    expect(result.retryAfterMs).toBe(120_000);
  });

  it("reads Retry-After as an HTTP date", () => {
    const result = detector.detect({ status: 429, headers: { "retry-after": "Wed, 15 Jan 2025 13:00:00 GMT" } });
    expect(result.resetTime).toBe(T0 + 3_600_000);
  });

  it("reads x-ratelimit-reset epoch seconds", () => {
    const result = detector.detect({ status: 429, headers: { "x-ratelimit-reset": "1736946000" } });
    expect(result.resetTime).toBe(T0 + 3_600_000);
  });

  it("reads headers carried on a ProviderError", () => {
    const err = new ProviderError("too many requests", { status: 429, headers: { "retry-after": "10" } });
    expect(detector.detect(undefined, err).resetTime).toBe(T0 + 10_000);
  });

  it("lets headers win over text", () => {
    const result = detector.detect({
      status: 429,
      output: "rate limited, resets in 5 minutes",
      headers: { "retry-after": "30" },
    });
    expect(result.resetTime).toBe(T0 + 30_000);
  });
});

describe("RateLimitDetector.extractResetTime()", () => {
  it.each([
    ["Rate limit reached. Resets in 5 minutes", T0 + 300_000],
    ["Too many requests, retry after 30", T0 + 30_000],
    ["Please wait 45 seconds", T0 + 45_000],
    ["Rate limited; 2 hours until reset", T0 + 7_200_000],
    ["Limit exceeded, resets at 2025-01-15 18:30", Date.UTC(2025, 0, 15, 18, 30)],
    ["Limit exceeded, resets at 2025-01-15T18:30:00+02:00", Date.UTC(2025, 0, 15, 16, 30)],
    ["Limit exceeded, resets at 2025-01-15T18:30:00Z", Date.UTC(2025, 0, 15, 18, 30)],
  ])("reads %j", (text, expected) => {
    expect(detector.extractResetTime(text)).toBe(expected);
  });

  it("reads a wall-clock time as the next local occurrence", () => {
    const reset = detector.extractResetTime("Session limit reached, resets 3pm");
    expect(reset).not.toBeNull();
    const date = new Date(reset ?? 0);
    expect(date.getHours()).toBe(15);
    expect(date.getMinutes()).toBe(0);
    expect((reset ?? 0) - T0).toBeGreaterThan(0);
    expect((reset ?? 0) - T0).toBeLessThanOrEqual(86_400_000);
  });

  it("returns null when no time is mentioned", () => {
    expect(detector.extractResetTime("rate limit exceeded")).toBeNull();
    expect(detector.extractResetTime("resets 13pm")).toBeNull();
  });
});
