/**
 * Harness facade: wires configuration, state store, provider manager and
 * retry orchestrator around a provider invoker.
 */

import type { HarnessConfig } from "./config.js";
import { ProviderError } from "./errors.js";
import { createLogger, type Logger } from "./log.js";
import { EventStream } from "./monitor/event-stream.js";
import { ProviderManager } from "./providers/provider-manager.js";
import { BackoffCalculator } from "./resilience/backoff.js";
import { ErrorClassifier } from "./resilience/error-classifier.js";
import { RetryOrchestrator, type AttemptContext, type ExecutionResult } from "./resilience/error-handler.js";
import { RateLimitDetector, type ProviderResponse } from "./resilience/rate-limit-detector.js";
import { StateStore } from "./state/state-store.js";
import type { Sleeper } from "./utils/sleep.js";

/**
 * The invocation collaborator: a subprocess, HTTP call or SDK call behind
 * one method. Throws on failure.
 */
export interface ProviderInvoker<TRequest, TResponse extends ProviderResponse> {
  invoke(provider: string, model: string, request: TRequest, context: AttemptContext): Promise<TResponse>;
}

export interface CreateHarnessOptions<TRequest, TResponse extends ProviderResponse> {
  config: HarnessConfig;
  invoker: ProviderInvoker<TRequest, TResponse>;
  logger?: Logger;
  events?: EventStream;
  /** `false` keeps state in memory only */
  store?: StateStore | false;
  now?: () => number;
  sleep?: Sleeper;
  random?: () => number;
}

export function createStateStore(config: HarnessConfig, logger: Logger, now?: () => number): StateStore {
  return new StateStore({
    stateDir: config.resolved.stateDir,
    projectDir: config.resolved.projectDir,
    mode: config.mode,
    logger,
    lockTimeoutMs: config.state.lockTimeoutMs,
    lockPollMs: config.state.lockPollMs,
    staleLockMs: config.state.staleLockMs,
    now,
  });
}

export class Harness<TRequest, TResponse extends ProviderResponse> {
  readonly config: HarnessConfig;
  readonly logger: Logger;
  readonly events: EventStream;
  readonly store?: StateStore;
  readonly manager: ProviderManager;
  readonly classifier: ErrorClassifier;
  readonly detector: RateLimitDetector;
  readonly orchestrator: RetryOrchestrator;
  private readonly invoker: ProviderInvoker<TRequest, TResponse>;
  private initializing?: Promise<void>;

  constructor(options: CreateHarnessOptions<TRequest, TResponse>) {
    const { config } = options;
    this.config = config;
    this.invoker = options.invoker;
    this.logger =
      options.logger ?? createLogger(config.logging.level, config.resolved.logFilePath, config.logging.fileLevel);
    this.events = options.events ?? new EventStream({ logger: this.logger, now: options.now });
    this.store = options.store === false ? undefined : options.store ?? createStateStore(config, this.logger, options.now);

    this.manager = new ProviderManager({
      config,
      logger: this.logger,
      store: this.store,
      events: this.events,
      now: options.now,
      random: options.random,
    });
    this.classifier = new ErrorClassifier({ policies: config.retry.policies });
    this.detector = new RateLimitDetector({ now: options.now });
    this.orchestrator = new RetryOrchestrator({
      manager: this.manager,
      classifier: this.classifier,
      backoff: new BackoffCalculator({
        jitter: config.retry.jitter,
        jitterFraction: config.retry.jitterFraction,
        random: options.random,
      }),
      detector: this.detector,
      logger: this.logger,
      rateLimit: {
        waitForReset: config.rateLimit.waitForReset,
        maxWaitMs: config.rateLimit.maxWaitMs,
        tickMs: config.rateLimit.tickMs,
      },
      events: this.events,
      now: options.now,
      sleep: options.sleep,
    });
  }

  async initialize(): Promise<void> {
    this.initializing ??= this.manager.initialize();
    await this.initializing;
  }

  /**
   * Invoke the current provider/model with retry, rotation and state tracking
   */
  async run(request: TRequest, opts: { signal?: AbortSignal } = {}): Promise<ExecutionResult<TResponse>> {
    await this.initialize();
    return this.orchestrator.executeWithRetry(async (context) => {
      const response = await this.invoker.invoke(context.provider, context.model, request, context);
      const detection = this.detector.detect(response);
      if (detection.isRateLimited && detection.type) {
        throw new ProviderError(detection.message ?? "Provider response reports a rate limit", {
          providerId: context.provider,
          model: context.model,
          status: response.status,
          kind: detection.type,
          output: response.output,
          headers: response.headers,
        });
      }
      return response;
    }, opts);
  }
}

export function createHarness<TRequest, TResponse extends ProviderResponse>(
  options: CreateHarnessOptions<TRequest, TResponse>,
): Harness<TRequest, TResponse> {
  return new Harness(options);
}
