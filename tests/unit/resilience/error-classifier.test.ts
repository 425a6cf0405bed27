import { describe, expect, it } from "vitest";

import { ProviderError } from "../../../src/errors.js";
import { ERROR_KINDS, ErrorClassifier, classifyErrorKind } from "../../../src/resilience/error-classifier.js";

function errnoError(code: string, message = "syscall failed"): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message);
  err.code = code;
  return err;
}

describe("classifyErrorKind()", () => {
  it("returns unknown for absent or unrecognized input", () => {
    expect(classifyErrorKind(undefined)).toBe("unknown");
    expect(classifyErrorKind(null)).toBe("unknown");
    expect(classifyErrorKind(new Error(""))).toBe("unknown");
    expect(classifyErrorKind(new Error("something broke unexpectedly"))).toBe("unknown");
  });

  it("honors an explicit ProviderError kind before anything else", () => {
    const err = new ProviderError("request timed out", { kind: "quota_exceeded", status: 500 });
    expect(classifyErrorKind(err)).toBe("quota_exceeded");
  });

  it("maps HTTP status codes", () => {
    expect(classifyErrorKind(new ProviderError("nope", { status: 401 }))).toBe("authentication");
    expect(classifyErrorKind(new ProviderError("nope", { status: 403 }))).toBe("permission");
    expect(classifyErrorKind(new ProviderError("nope", { status: 404 }))).toBe("not_found");
    expect(classifyErrorKind(new ProviderError("nope", { status: 408 }))).toBe("timeout");
    expect(classifyErrorKind(new ProviderError("nope", { status: 429 }))).toBe("rate_limit");
    expect(classifyErrorKind(new ProviderError("nope", { status: 400 }))).toBe("bad_request");
    expect(classifyErrorKind(new ProviderError("nope", { status: 503 }))).toBe("server_error");
    expect(classifyErrorKind({ statusCode: "502", message: "x" })).toBe("server_error");
  });

  it("maps Node error codes", () => {
    expect(classifyErrorKind(errnoError("ETIMEDOUT"))).toBe("timeout");
    expect(classifyErrorKind(errnoError("ECONNREFUSED"))).toBe("network");
    expect(classifyErrorKind(errnoError("ENOTFOUND"))).toBe("dns_resolution");
    expect(classifyErrorKind(errnoError("ENOENT"))).toBe("file_not_found");
    expect(classifyErrorKind(errnoError("EACCES"))).toBe("permission");
    expect(classifyErrorKind(errnoError("ENOSPC"))).toBe("disk_full");
    expect(classifyErrorKind(errnoError("ENOMEM"))).toBe("memory_error");
  });

  it("accepts a code that names a kind", () => {
    expect(classifyErrorKind(new ProviderError("odd", { errorCode: "validation_error" }))).toBe("validation_error");
  });

  it("maps TimeoutError and AbortError by name", () => {
    const timeout = new Error("operation did not finish");
    timeout.name = "TimeoutError";
    const abort = new Error("stopped");
    abort.name = "AbortError";
    expect(classifyErrorKind(timeout)).toBe("timeout");
    expect(classifyErrorKind(abort)).toBe("interrupted");
  });

  it.each([
    ["Request timed out after 30s", "timeout"],
    ["socket hang up", "network"],
    ["getaddrinfo failed for api.example.test", "dns_resolution"],
    ["self-signed certificate in chain", "ssl_tls"],
    ["Invalid API key provided", "authentication"],
    ["Forbidden", "permission"],
    ["Access is denied", "access_denied"],
    ["no such file or directory", "file_not_found"],
    ["command not found", "not_found"],
    ["Internal server error", "server_error"],
    ["Bad Request: missing field", "bad_request"],
    ["Rate limit reached", "rate_limit"],
    ["Quota exceeded for this month", "quota_exceeded"],
    ["disk is full", "disk_full"],
    ["JavaScript heap out of memory", "memory_error"],
    ["missing configuration value", "configuration"],
    ["Cannot find module 'left-pad'", "missing_dependency"],
    ["anthropic overloaded", "provider_specific"],
    ["Unexpected token in JSON", "parsing_error"],
    ["validation failed", "validation_error"],
    ["system call failed", "system_error"],
    ["received SIGINT", "interrupted"],
  ])("classifies %j as %s", (message, kind) => {
    expect(classifyErrorKind(new Error(message))).toBe(kind);
  });

  it("prefers timeout over network when both appear", () => {
    expect(classifyErrorKind(new Error("network timeout while reading"))).toBe("timeout");
  });

  it("reads the category field together with the message", () => {
    expect(classifyErrorKind({ message: "request failed", category: "throttled" })).toBe("rate_limit");
  });

  it("classifies plain strings", () => {
    expect(classifyErrorKind("Too Many Requests")).toBe("rate_limit");
  });
});

describe("ErrorClassifier", () => {
  const classifier = new ErrorClassifier();

  it("tags authentication as terminal and critical", () => {
    const result = classifier.classify(new Error("401 Unauthorized"));
    expect(result).toMatchObject({ outcome: "terminal", kind: "authentication", severity: "critical" });
  });

  it("tags timeouts as recoverable with an exponential policy", () => {
    const result = classifier.classify(new Error("deadline exceeded"));
    expect(result.outcome).toBe("recoverable");
    expect(result.kind).toBe("timeout");
    expect(result.severity).toBe("medium");
    expect(result.policy).toEqual({
      strategy: "exponential_backoff",
      maxRetries: 3,
      baseDelayMs: 5000,
      maxDelayMs: 300_000,
      exponentialBase: 2,
    });
  });

  it("builds a classification for a known kind", () => {
    const result = classifier.forKind("quota_exceeded", "monthly quota used");
    expect(result).toMatchObject({ outcome: "recoverable", kind: "quota_exceeded", message: "monthly quota used" });
  });

  it("assigns severities", () => {
    expect(classifier.severity("rate_limit")).toBe("high");
    expect(classifier.severity("timeout")).toBe("medium");
    expect(classifier.severity("validation_error")).toBe("low");
    expect(classifier.severity("server_error")).toBe("medium");
  });

  it("knows which kinds are recoverable", () => {
    const recoverable = ERROR_KINDS.filter((kind) => classifier.isRecoverable(kind));
    expect(recoverable).toEqual([
      "timeout",
      "network",
      "dns_resolution",
      "ssl_tls",
      "server_error",
      "rate_limit",
      "quota_exceeded",
      "provider_specific",
      "unknown",
    ]);
  });

  it("reports max retries per kind", () => {
    expect(classifier.maxRetries("timeout")).toBe(3);
    expect(classifier.maxRetries("server_error")).toBe(2);
    expect(classifier.maxRetries("rate_limit")).toBe(2);
    expect(classifier.maxRetries("unknown")).toBe(1);
    expect(classifier.maxRetries("authentication")).toBe(0);
  });

  it("computes retry delays without jitter", () => {
    expect(classifier.retryDelay("timeout", 0)).toBe(5000);
    expect(classifier.retryDelay("timeout", 2)).toBe(20_000);
    expect(classifier.retryDelay("rate_limit", 0)).toBe(60_000);
    expect(classifier.retryDelay("rate_limit", 5)).toBe(60_000);
    expect(classifier.retryDelay("authentication", 1)).toBe(0);
  });

  it("merges policy overrides over the defaults", () => {
    const custom = new ErrorClassifier({ policies: { unknown: { maxRetries: 4 }, bad_request: { strategy: "fixed_delay", maxRetries: 1, baseDelayMs: 100, maxDelayMs: 100 } } });
    expect(custom.retryPolicy("unknown")).toEqual({
      strategy: "exponential_backoff",
      maxRetries: 4,
      baseDelayMs: 5000,
      maxDelayMs: 300_000,
      exponentialBase: 2,
    });
    expect(custom.isRecoverable("bad_request")).toBe(true);
    expect(custom.retryDelay("bad_request", 3)).toBe(100);
  });

  it("returns static recovery guidance", () => {
    expect(classifier.recoverySuggestions("authentication").length).toBeGreaterThan(0);
    expect(classifier.describe("rate_limit")).toBeTypeOf("string");
  });
});
