/**
 * Retry Orchestrator
 *
 * Runs a unit of work against the current provider/model, and on failure
 * decides between retrying the same combination after a backoff, rotating
 * to another combination, waiting for a rate-limit reset, or failing.
 */

import { ConfigurationError, getErrorMessage } from "../errors.js";
import type { Logger } from "../log.js";
import type { EventStream } from "../monitor/event-stream.js";
import type { ProviderManager } from "../providers/provider-manager.js";
import type { Combination } from "../routing/rotation-engine.js";
import { countdown, sleep as defaultSleep, type Sleeper } from "../utils/sleep.js";
import type { BackoffCalculator } from "./backoff.js";
import type { Classification, ErrorClassifier, ErrorKind } from "./error-classifier.js";
import type { RateLimitDetector } from "./rate-limit-detector.js";

export interface AttemptContext {
  provider: string;
  model: string;
  /** 1-based count of invocations in this execution */
  attempt: number;
  signal?: AbortSignal;
}

export type Work<T> = (context: AttemptContext) => Promise<T>;

export interface CompletedResult<T> {
  status: "completed";
  value: T;
  provider: string;
  model: string;
  providersTried: string[];
  attempts: number;
}

export interface FailedResult {
  status: "failed";
  error: unknown;
  message: string;
  provider: string;
  model: string;
  /** null when no attempt produced an error (nothing usable, or cancelled first) */
  errorType: ErrorKind | null;
  providersTried: string[];
  modelsTried: string[];
  attempts: number;
  cancelled: boolean;
}

export type ExecutionResult<T> = CompletedResult<T> | FailedResult;

export interface RateLimitWaitOptions {
  waitForReset: boolean;
  maxWaitMs: number;
  tickMs: number;
}

export interface RetryOrchestratorOptions {
  manager: ProviderManager;
  classifier: ErrorClassifier;
  backoff: BackoffCalculator;
  detector: RateLimitDetector;
  logger: Logger;
  rateLimit: RateLimitWaitOptions;
  events?: EventStream;
  now?: () => number;
  sleep?: Sleeper;
}

const AUTH_KINDS: ReadonlySet<ErrorKind> = new Set(["authentication", "permission", "access_denied"]);
const RATE_LIMIT_KINDS: ReadonlySet<ErrorKind> = new Set(["rate_limit", "quota_exceeded"]);

/**
 * Per-execution bookkeeping
 */
class RetryContext {
  retryCount = 0;
  attempts = 0;
  rotations = 0;
  lastError: unknown = undefined;
  lastKind: ErrorKind | null = null;
  readonly providersTried: string[] = [];
  readonly modelsTried: string[] = [];

  constructor(public combination: Combination) {}

  noteAttempt(): void {
    this.attempts += 1;
    const { provider, model } = this.combination;
    if (!this.providersTried.includes(provider)) this.providersTried.push(provider);
    const key = `${provider}:${model}`;
    if (!this.modelsTried.includes(key)) this.modelsTried.push(key);
  }

  moveTo(next: Combination): void {
    this.combination = next;
    this.retryCount = 0;
    this.rotations += 1;
  }
}

type Advance = { outcome: "moved" } | { outcome: "exhausted" } | { outcome: "cancelled" };

export class RetryOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: Sleeper;

  constructor(private readonly options: RetryOrchestratorOptions) {
    this.logger = options.logger.child({ component: "retry-orchestrator" });
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Run `work` until it succeeds, or retries and rotations are used up.
   * Configuration errors propagate; everything else ends in a result.
   */
  async executeWithRetry<T>(work: Work<T>, opts: { signal?: AbortSignal } = {}): Promise<ExecutionResult<T>> {
    const { manager } = this.options;
    const signal = opts.signal;
    const ctx = new RetryContext(manager.currentCombination());

    const start = await this.ensureUsable(ctx, signal);
    if (start.outcome === "cancelled") return this.failed(ctx, "Execution cancelled", true);
    if (start.outcome === "exhausted") return this.failed(ctx, "No usable provider or model", false);

    for (;;) {
      if (signal?.aborted) return this.failed(ctx, "Execution cancelled", true);

      ctx.noteAttempt();
      const { provider, model } = ctx.combination;
      const started = this.now();

      let value: T;
      try {
        value = await work({ provider, model, attempt: ctx.attempts, signal });
      } catch (err) {
        if (err instanceof ConfigurationError) throw err;

        const next = await this.handleFailure(ctx, err, this.now() - started, signal);
        if (next === "retry") continue;
        return this.failed(ctx, getErrorMessage(err) || "Provider invocation failed", next === "cancelled");
      }

      await manager.recordSuccess(provider, model, this.now() - started);
      if (ctx.attempts > 1) {
        this.logger.info({ providerId: provider, model, attempts: ctx.attempts }, "Recovered after failures");
        await this.options.events?.publish("recovery", {
          provider,
          model,
          attempts: ctx.attempts,
          providersTried: [...ctx.providersTried],
        });
      }
      return {
        status: "completed",
        value,
        provider,
        model,
        providersTried: [...ctx.providersTried],
        attempts: ctx.attempts,
      };
    }
  }

  /**
   * Decide what follows a failed attempt: "retry" (same or new combination),
   * "fail", or "cancelled"
   */
  private async handleFailure(
    ctx: RetryContext,
    err: unknown,
    durationMs: number,
    signal: AbortSignal | undefined,
  ): Promise<"retry" | "fail" | "cancelled"> {
    const { manager, events } = this.options;
    const { provider, model } = ctx.combination;
    const detection = this.options.detector.detect(null, err);
    const classification = this.classify(err, detection.type);
    const { kind } = classification;
    const rateLimited = detection.isRateLimited || RATE_LIMIT_KINDS.has(kind);

    ctx.lastError = err;
    ctx.lastKind = kind;
    await manager.recordFailure(provider, model, { kind, durationMs });

    this.logger.warn(
      {
        providerId: provider,
        model,
        kind,
        severity: classification.severity,
        attempt: ctx.attempts,
        retryCount: ctx.retryCount,
        error: classification.message,
      },
      "Provider invocation failed",
    );
    await events?.publish("error", {
      provider,
      model,
      kind,
      severity: classification.severity,
      message: classification.message,
      attempt: ctx.attempts,
      recoverable: classification.outcome === "recoverable",
    });

    if (rateLimited) {
      const limited = await manager.markCombinationRateLimited(provider, model, detection.resetTime);
      // the manager's own switch already found nothing usable
      const moved: Advance =
        limited.decision?.action === "none" ? { outcome: "exhausted" } : await this.advance(ctx, "rate_limit", signal);
      if (moved.outcome !== "exhausted") return moved.outcome === "moved" ? "retry" : "cancelled";

      if (this.options.rateLimit.waitForReset) {
        const waited = await this.waitForReset(signal);
        if (!waited) return "cancelled";
        const resumed = await this.ensureUsable(ctx, signal);
        if (resumed.outcome === "moved") return "retry";
        if (resumed.outcome === "cancelled") return "cancelled";
      }
      // nothing else usable: fall back to the kind's own retry policy
    }

    if (classification.outcome === "terminal") {
      if (AUTH_KINDS.has(kind)) {
        await manager.markProviderAuthFailure(provider, model);
      }
      this.logger.error({ providerId: provider, model, kind }, "Terminal failure, not retrying");
      return "fail";
    }

    ctx.retryCount += 1;
    if (!this.options.backoff.shouldRetry(classification.policy, ctx.retryCount - 1)) {
      await manager.markProviderFailureExhausted(provider, model);
      this.logger.warn(
        { providerId: provider, model, kind, retries: ctx.retryCount - 1 },
        "Retries exhausted, rotating",
      );
      const moved = await this.advance(ctx, "retries_exhausted", signal);
      if (moved.outcome === "moved") return "retry";
      return moved.outcome === "cancelled" ? "cancelled" : "fail";
    }

    if (signal?.aborted) return "cancelled";
    const delayMs = this.options.backoff.delay(classification.policy, ctx.retryCount - 1);
    await manager.recordRetry({ provider, model, reason: kind, durationMs, success: false });
    this.logger.info({ providerId: provider, model, kind, retryCount: ctx.retryCount, delayMs }, "Retrying after backoff");
    await events?.publish("retry", { provider, model, kind, attempt: ctx.retryCount, delayMs });
    await this.sleep(delayMs);
    return "retry";
  }

  private classify(err: unknown, detected: ErrorKind | null): Classification {
    const { classifier } = this.options;
    const classification = classifier.classify(err);
    if (detected && !RATE_LIMIT_KINDS.has(classification.kind)) {
      return classifier.forKind(detected, classification.message);
    }
    return classification;
  }

  /**
   * Move to another usable combination, bounded by the number of configured
   * combinations. An automatic switch the manager already made is taken as is.
   */
  private async advance(ctx: RetryContext, reason: string, signal: AbortSignal | undefined): Promise<Advance> {
    const { manager } = this.options;
    if (signal?.aborted) return { outcome: "cancelled" };
    if (ctx.rotations >= manager.combinationCount()) {
      this.logger.warn({ rotations: ctx.rotations }, "Rotation limit reached");
      return { outcome: "exhausted" };
    }

    const from = ctx.combination;
    const current = manager.currentCombination();
    const switched = current.provider !== from.provider || current.model !== from.model;
    if (switched && manager.isModelAvailable(current.provider, current.model)) {
      ctx.moveTo(current);
      return { outcome: "moved" };
    }

    const decision = await manager.rotate(reason, { from });
    if (decision.action === "none") return { outcome: "exhausted" };
    ctx.moveTo({ provider: decision.provider, model: decision.model });
    return { outcome: "moved" };
  }

  /**
   * Make sure the context points at a usable combination before invoking
   */
  private async ensureUsable(ctx: RetryContext, signal: AbortSignal | undefined): Promise<Advance> {
    const { manager } = this.options;
    const usable = (c: Combination) => manager.isModelAvailable(c.provider, c.model);

    const current = manager.currentCombination();
    if (usable(current)) {
      ctx.combination = current;
      return { outcome: "moved" };
    }
    const moved = await this.advance(ctx, "unavailable", signal);
    if (moved.outcome !== "exhausted" || !this.options.rateLimit.waitForReset) return moved;

    if (!(await this.waitForReset(signal))) return { outcome: "cancelled" };
    const after = manager.currentCombination();
    if (usable(after)) {
      ctx.combination = after;
      return { outcome: "moved" };
    }
    return this.advance(ctx, "unavailable", signal);
  }

  /**
   * Wait, in ticks that observe the abort signal, until the earliest
   * rate-limit reset (capped at maxWaitMs). Resolves false when aborted.
   */
  private async waitForReset(signal: AbortSignal | undefined): Promise<boolean> {
    const reset = this.options.manager.nextResetTime();
    if (reset === null) return true;
    const deadline = Math.min(reset, this.now() + this.options.rateLimit.maxWaitMs);
    this.logger.info(
      { resetTime: new Date(reset).toISOString(), waitMs: Math.max(0, deadline - this.now()) },
      "Waiting for rate limit reset",
    );
    return countdown(deadline, {
      tickMs: this.options.rateLimit.tickMs,
      signal,
      now: this.now,
      sleep: this.sleep,
    });
  }

  private failed(ctx: RetryContext, message: string, cancelled: boolean): FailedResult {
    const { provider, model } = ctx.combination;
    if (!cancelled) {
      this.logger.error(
        { providerId: provider, model, kind: ctx.lastKind, attempts: ctx.attempts, providersTried: ctx.providersTried },
        "Execution failed",
      );
    }
    return {
      status: "failed",
      error: ctx.lastError,
      message,
      provider,
      model,
      errorType: ctx.lastKind,
      providersTried: [...ctx.providersTried],
      modelsTried: [...ctx.modelsTried],
      attempts: ctx.attempts,
      cancelled,
    };
  }
}
