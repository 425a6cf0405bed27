/**
 * Provider Manager
 *
 * Owns the current provider/model pointer and the coordination state, wires
 * the health, quota and rate-limit trackers over that state, and persists
 * every mutation through the StateStore before returning. Each mutation
 * starts from the persisted state, so edits from other processes survive.
 */

import type { HarnessConfig, ModelDefinition, ProviderDefinition, RotationStrategy } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { Logger } from "../log.js";
import { EventOutbox } from "../monitor/event-outbox.js";
import type { EventPublisher } from "../monitor/types.js";
import type { ErrorKind } from "../resilience/error-classifier.js";
import type { CircuitState, CircuitStatistics } from "../resilience/circuit-breaker.js";
import { HealthTracker } from "../resilience/health-tracker.js";
import { QuotaTracker, type QuotaUsage } from "../resilience/quota-tracker.js";
import { RateLimitTracker } from "../resilience/rate-limit-tracker.js";
import { prioritizeProviderCandidates } from "../routing/provider-priority.js";
import {
  RotationEngine,
  type Combination,
  type PerformanceSample,
  type RotationCandidateSource,
  type RotationDecision,
} from "../routing/rotation-engine.js";
import { RotationHistory, type RotationStatistics } from "../routing/rotation-history.js";
import { leastLoaded, weightedSelect, type LoadSample } from "../routing/weighted-select.js";
import {
  combinationKey,
  createEmptyState,
  parseHarnessState,
  replaceState,
  splitCombinationKey,
  type HarnessCounters,
  type HarnessState,
  type HealthRecord,
  type MetricsRecord,
  type RateLimitRecord,
  type RotationHistoryEntry,
} from "../state/harness-state.js";
import type { StateStore } from "../state/state-store.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";

export interface ProviderManagerOptions {
  config: HarnessConfig;
  logger: Logger;
  store?: StateStore;
  events?: EventPublisher;
  now?: () => number;
  random?: () => number;
}

export interface MetricsView {
  requests: number;
  successes: number;
  failures: number;
  /** 0-1, null before the first request */
  successRate: number | null;
  avgResponseTimeMs: number | null;
  lastUsedAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  errorsByKind: Record<string, number>;
}

export interface HealthDashboardRow {
  provider: string;
  model?: string;
  status: HealthRecord["status"];
  unhealthyReason: HealthRecord["unhealthyReason"];
  circuitState: CircuitState;
  available: boolean;
  current: boolean;
  rateLimited: boolean;
  resetTime: number | null;
  successCount: number;
  errorCount: number;
  successRate: number | null;
  avgResponseTimeMs: number | null;
  quotaUsed: number;
  quotaLimit: number;
}

export interface StatusSummary {
  currentProvider: string;
  currentModel: string;
  availableProviders: string[];
  rateLimitedProviders: string[];
  unhealthyProviders: string[];
  nextResetTime: number | null;
  counters: HarnessCounters;
  rotation: RotationStatistics;
  circuits: CircuitStatistics;
  loadBalancing: boolean;
  modelSwitching: boolean;
  lastUpdated: number | null;
}

export interface FailureRecord {
  kind: ErrorKind;
  durationMs: number;
}

export interface CombinationRateLimit {
  record: RateLimitRecord;
  /** The automatic switch away from the provider; null when it was not current */
  decision: RotationDecision | null;
}

const MANAGER_LOCK = "manager";

function emptyMetrics(): MetricsRecord {
  return {
    requests: 0,
    successes: 0,
    failures: 0,
    totalResponseTimeMs: 0,
    lastUsedAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    errorsByKind: {},
  };
}

function isRateLimitKind(kind: ErrorKind): boolean {
  return kind === "rate_limit" || kind === "quota_exceeded";
}

export class ProviderManager {
  readonly state: HarnessState = createEmptyState();
  readonly health: HealthTracker;
  readonly quota: QuotaTracker;
  readonly rateLimits: RateLimitTracker;

  private config: HarnessConfig;
  private readonly logger: Logger;
  private readonly store?: StateStore;
  private readonly outbox: EventOutbox;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly rotation: RotationEngine;
  private readonly history: RotationHistory;
  private readonly mutex = new KeyedMutex();
  private initialized = false;

  constructor(options: ProviderManagerOptions) {
    this.config = options.config;
    this.logger = options.logger.child({ component: "provider-manager" });
    this.store = options.store;
    this.outbox = new EventOutbox(options.events);
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;

    this.health = new HealthTracker({
      state: this.state,
      logger: options.logger,
      events: this.outbox,
      now: this.now,
      options: {
        failureThreshold: this.config.circuitBreaker.failureThreshold,
        timeoutMs: this.config.circuitBreaker.timeoutMs,
        historyLimit: this.config.circuitBreaker.historyLimit,
      },
    });
    this.quota = new QuotaTracker({
      state: this.state,
      logger: options.logger,
      limitFor: (provider) => this.config.resolved.providers[provider]?.quotaLimit ?? this.config.quota.defaultLimit,
    });
    this.rateLimits = new RateLimitTracker({
      state: this.state,
      logger: options.logger,
      quota: this.quota,
      defaultResetMs: this.config.rateLimit.defaultResetMs,
      events: this.outbox,
      now: this.now,
    });
    this.rotation = new RotationEngine(this.candidateSource(), options.logger);
    this.history = new RotationHistory(this.state, this.config.rotation.historyLimit);
    this.resetPointer();
  }

  /**
   * Load persisted state. Entries for providers or models no longer
   * configured are dropped.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.mutex.runExclusive(MANAGER_LOCK, async () => {
      if (this.store) {
        this.adopt(await this.store.loadState());
      } else {
        this.resetPointer();
      }
      this.initialized = true;
      this.logger.info(
        { provider: this.state.currentProvider, model: this.state.currentModel },
        "Provider manager initialized",
      );
    });
  }

  // ==========================================================================
  // Pointer & chains
  // ==========================================================================

  get currentProvider(): string {
    return this.state.currentProvider ?? this.config.resolved.defaultProvider;
  }

  get currentModel(): string {
    return this.state.currentModel ?? this.defaultModel(this.currentProvider);
  }

  currentCombination(): Combination {
    return { provider: this.currentProvider, model: this.currentModel };
  }

  providerNames(): string[] {
    return [...this.config.resolved.providerOrder];
  }

  getProvider(name: string): ProviderDefinition {
    const provider = this.config.resolved.providers[name];
    if (!provider) {
      throw new ConfigurationError(`Unknown provider: ${name}`, {
        suggestion: `Configured providers: ${this.config.resolved.providerOrder.join(", ")}`,
      });
    }
    return provider;
  }

  getModel(providerName: string, modelId: string): ModelDefinition {
    const model = this.getProvider(providerName).models.find((m) => m.id === modelId);
    if (!model) {
      throw new ConfigurationError(`Unknown model ${modelId} for provider ${providerName}`);
    }
    return model;
  }

  defaultModel(providerName: string): string {
    const first = this.getProvider(providerName).models[0];
    if (!first) throw new ConfigurationError(`Provider ${providerName} has no models`);
    return first.id;
  }

  /**
   * The given provider (default: current) first, then the configured chain
   */
  fallbackChain(provider: string = this.currentProvider): string[] {
    return [provider, ...this.config.resolved.fallbackChain.filter((name) => name !== provider)];
  }

  modelChain(provider: string): string[] {
    return this.getProvider(provider).models.map((m) => m.id);
  }

  get strategy(): RotationStrategy {
    return this.config.rotation.strategy;
  }

  get loadBalancing(): boolean {
    return this.state.settings.loadBalancing ?? this.config.rotation.loadBalancing;
  }

  get modelSwitching(): boolean {
    return this.state.settings.modelSwitching ?? this.config.rotation.modelSwitching;
  }

  combinationCount(): number {
    return Object.values(this.config.resolved.providers).reduce((sum, p) => sum + p.models.length, 0);
  }

  // ==========================================================================
  // Availability
  // ==========================================================================

  isRateLimited(provider: string, model?: string | null): boolean {
    return this.rateLimits.isRateLimited(provider, model);
  }

  isProviderAvailable(provider: string): boolean {
    if (!this.config.resolved.providers[provider]) return false;
    if (this.rateLimits.isRateLimited(provider)) return false;
    if (!this.health.isHealthy(provider)) return false;
    return !this.health.isCircuitOpen(provider);
  }

  isModelAvailable(provider: string, model: string): boolean {
    if (!this.isProviderAvailable(provider)) return false;
    if (!this.getProvider(provider).models.some((m) => m.id === model)) return false;
    if (this.rateLimits.isRateLimited(provider, model)) return false;
    if (!this.health.isHealthy(provider, model)) return false;
    return !this.health.isCircuitOpen(provider, model);
  }

  availableProviders(): string[] {
    const candidates = this.config.resolved.providerOrder.map((id) => ({
      id,
      priority: this.getProvider(id).priority,
      coolingDown: !this.isProviderAvailable(id),
      failures: this.state.health[id]?.errorCount ?? 0,
    }));
    return prioritizeProviderCandidates(candidates).filter((id) => this.isProviderAvailable(id));
  }

  availableModels(provider: string): string[] {
    return this.modelChain(provider).filter((model) => this.isModelAvailable(provider, model));
  }

  nextResetTime(): number | null {
    return this.rateLimits.nextResetTime();
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  /**
   * Pick a provider: least loaded when load balancing is on, weighted when
   * weights are configured, else the highest-priority available one.
   */
  selectProvider(exclude?: string): string | null {
    const candidates = this.availableProviders().filter((p) => p !== exclude);
    if (candidates.length === 0) return null;
    if (this.loadBalancing) {
      return leastLoaded(candidates, (p) => this.loadSample(p), this.now()) ?? null;
    }
    if (this.hasProviderWeights()) {
      return weightedSelect(candidates, (p) => this.providerWeight(p), this.random) ?? null;
    }
    return candidates[0] ?? null;
  }

  selectModel(provider: string, exclude?: string): string | null {
    const candidates = this.availableModels(provider).filter((m) => m !== exclude);
    if (candidates.length === 0) return null;
    if (this.hasModelWeights(provider)) {
      return weightedSelect(candidates, (m) => this.modelWeight(provider, m), this.random) ?? null;
    }
    return candidates[0] ?? null;
  }

  async configureProviderWeights(weights: Record<string, number>): Promise<void> {
    for (const [name, weight] of Object.entries(weights)) {
      this.getProvider(name);
      if (!(weight >= 0)) throw new ConfigurationError(`Invalid weight for ${name}: ${weight}`);
    }
    await this.exclusive(async () => {
      this.state.weights.providers = { ...weights };
    });
  }

  async configureModelWeights(provider: string, weights: Record<string, number>): Promise<void> {
    for (const [model, weight] of Object.entries(weights)) {
      this.getModel(provider, model);
      if (!(weight >= 0)) throw new ConfigurationError(`Invalid weight for ${provider}:${model}: ${weight}`);
    }
    await this.exclusive(async () => {
      this.state.weights.models[provider] = { ...weights };
    });
  }

  async setLoadBalancing(enabled: boolean): Promise<void> {
    await this.exclusive(async () => {
      this.state.settings.loadBalancing = enabled;
    });
  }

  async setModelSwitching(enabled: boolean): Promise<void> {
    await this.exclusive(async () => {
      this.state.settings.modelSwitching = enabled;
    });
  }

  // ==========================================================================
  // Switching
  // ==========================================================================

  /**
   * Move to the next usable provider. Returns the new provider, or null when
   * none qualifies (the pointer is left unchanged).
   */
  async switchProvider(reason: string): Promise<string | null> {
    return this.exclusive(async () => {
      const from = this.currentCombination();
      const decision = this.decideProviderSwitch(from);
      await this.applyDecision(from, decision, reason);
      return decision.action === "none" ? null : decision.provider;
    });
  }

  /**
   * Move to another usable model of the current provider
   */
  async switchModel(reason: string): Promise<string | null> {
    return this.exclusive(async () => {
      if (!this.modelSwitching) return null;
      const from = this.currentCombination();
      const model = this.selectModel(from.provider, from.model);
      if (!model) {
        this.recordRotation(from, null, "model_first", false, reason, 0);
        return null;
      }
      await this.applyDecision(from, { action: "switch_model", provider: from.provider, model, strategy: "model_first" }, reason);
      return model;
    });
  }

  /**
   * Rotate away from `from` (default: current) using a strategy
   */
  async rotate(
    reason: string,
    options: { from?: Combination; strategy?: RotationStrategy } = {},
  ): Promise<RotationDecision> {
    return this.exclusive(async () => {
      const from = options.from ?? this.currentCombination();
      let strategy = options.strategy ?? this.strategy;
      if (strategy === "model_first" && !this.modelSwitching) strategy = "provider_first";
      const decision =
        strategy === "provider_first" ? this.decideProviderSwitch(from) : this.rotation.next(from, strategy);
      await this.applyDecision(from, decision, reason);
      return decision;
    });
  }

  async setCurrent(provider: string, model?: string): Promise<void> {
    const target = model ?? this.defaultModel(provider);
    this.getModel(provider, target);
    await this.exclusive(async () => {
      const from = this.currentCombination();
      if (from.provider === provider && from.model === target) return;
      await this.applyDecision(
        from,
        {
          action: from.provider === provider ? "switch_model" : "switch_provider",
          provider,
          model: target,
          strategy: this.strategy,
        },
        "manual",
      );
    });
  }

  // ==========================================================================
  // Rate limits & health marks
  // ==========================================================================

  /**
   * Mark a provider rate limited. When it is the current provider, switch to
   * the next usable one if there is any.
   */
  async markRateLimited(provider: string, resetTime?: number | null): Promise<RateLimitRecord> {
    this.getProvider(provider);
    return this.exclusive(async () => {
      const record = await this.rateLimits.mark(provider, null, resetTime);
      await this.health.noteRateLimited(provider);
      this.state.counters.rateLimitEvents += 1;

      if (provider === this.currentProvider) {
        const from = this.currentCombination();
        await this.applyDecision(from, this.decideProviderSwitch(from), "rate_limit");
      }
      return record;
    });
  }

  /**
   * Mark one model rate limited. When it is the current combination, move to
   * another model of the same provider, or another provider.
   */
  async markModelRateLimited(provider: string, model: string, resetTime?: number | null): Promise<RateLimitRecord> {
    this.getModel(provider, model);
    return this.exclusive(async () => {
      const record = await this.rateLimits.mark(provider, model, resetTime);
      await this.health.noteRateLimited(provider, model);
      this.state.counters.rateLimitEvents += 1;

      const from = this.currentCombination();
      if (from.provider === provider && from.model === model) {
        const strategy = this.modelSwitching ? "model_first" : "provider_first";
        const decision =
          strategy === "model_first" ? this.rotation.next(from, strategy) : this.decideProviderSwitch(from);
        await this.applyDecision(from, decision, "rate_limit");
      }
      return record;
    });
  }

  /**
   * Mark both the provider and the model rate limited after a throttled
   * invocation, switching provider at most once.
   */
  async markCombinationRateLimited(
    provider: string,
    model: string,
    resetTime?: number | null,
  ): Promise<CombinationRateLimit> {
    this.getModel(provider, model);
    return this.exclusive(async () => {
      const record = await this.rateLimits.mark(provider, null, resetTime);
      await this.rateLimits.mark(provider, model, record.resetTime);
      await this.health.noteRateLimited(provider);
      await this.health.noteRateLimited(provider, model);
      this.state.counters.rateLimitEvents += 1;

      let decision: RotationDecision | null = null;
      if (provider === this.currentProvider) {
        const from = this.currentCombination();
        decision = this.decideProviderSwitch(from);
        await this.applyDecision(from, decision, "rate_limit");
      }
      return { record, decision };
    });
  }

  async clearRateLimit(provider: string, model?: string | null): Promise<void> {
    this.getProvider(provider);
    await this.exclusive(async () => {
      await this.rateLimits.clear(provider, model);
      await this.health.clearRateLimitReason(provider, model);
    });
  }

  async markProviderAuthFailure(provider: string, model?: string | null): Promise<HealthRecord> {
    this.getProvider(provider);
    return this.exclusive(async () => {
      const record = await this.health.markAuthFailure(provider);
      if (model) await this.health.markAuthFailure(provider, model);
      return record;
    });
  }

  /**
   * Retries ran out on this provider. An auth failure already recorded stays.
   */
  async markProviderFailureExhausted(provider: string, model?: string | null): Promise<HealthRecord> {
    this.getProvider(provider);
    return this.exclusive(async () => {
      const record = await this.health.markFailureExhausted(provider);
      if (model) await this.health.markFailureExhausted(provider, model);
      return record;
    });
  }

  // ==========================================================================
  // Outcomes & metrics
  // ==========================================================================

  async recordSuccess(provider: string, model: string, durationMs: number): Promise<void> {
    await this.exclusive(async () => {
      await this.health.recordSuccess(provider);
      await this.health.recordSuccess(provider, model);
      const now = this.now();
      for (const key of [combinationKey(provider), combinationKey(provider, model)]) {
        const metrics = this.ensureMetrics(key);
        metrics.requests += 1;
        metrics.successes += 1;
        metrics.totalResponseTimeMs += Math.max(0, durationMs);
        metrics.lastUsedAt = now;
        metrics.lastSuccessAt = now;
      }
      this.state.counters.successes += 1;
    });
  }

  /**
   * Count a failed attempt. Rate-limit failures update metrics but not the
   * circuit breaker; they are tracked through markRateLimited instead.
   */
  async recordFailure(provider: string, model: string, failure: FailureRecord): Promise<void> {
    await this.exclusive(async () => {
      if (!isRateLimitKind(failure.kind)) {
        await this.health.recordFailure(provider);
        await this.health.recordFailure(provider, model);
      }
      const now = this.now();
      for (const key of [combinationKey(provider), combinationKey(provider, model)]) {
        const metrics = this.ensureMetrics(key);
        metrics.requests += 1;
        metrics.failures += 1;
        metrics.totalResponseTimeMs += Math.max(0, failure.durationMs);
        metrics.lastUsedAt = now;
        metrics.lastErrorAt = now;
        metrics.errorsByKind[failure.kind] = (metrics.errorsByKind[failure.kind] ?? 0) + 1;
      }
      this.state.counters.errorEvents += 1;
    });
  }

  /**
   * Count a retry of the same combination and add it to the rotation history
   */
  async recordRetry(entry: { provider: string; model: string; reason: string; durationMs: number; success: boolean }): Promise<void> {
    await this.exclusive(async () => {
      this.state.counters.retryAttempts += 1;
      this.history.record({
        timestamp: this.now(),
        type: "retry",
        fromProvider: entry.provider,
        fromModel: entry.model,
        toProvider: entry.provider,
        toModel: entry.model,
        strategy: this.strategy,
        success: entry.success,
        durationMs: entry.durationMs,
        reason: entry.reason,
      });
    });
  }

  metrics(provider: string, model?: string | null): MetricsView {
    const record = this.state.metrics[combinationKey(provider, model)] ?? emptyMetrics();
    return {
      requests: record.requests,
      successes: record.successes,
      failures: record.failures,
      successRate: record.requests > 0 ? record.successes / record.requests : null,
      avgResponseTimeMs: record.requests > 0 ? record.totalResponseTimeMs / record.requests : null,
      lastUsedAt: record.lastUsedAt,
      lastSuccessAt: record.lastSuccessAt,
      lastErrorAt: record.lastErrorAt,
      errorsByKind: { ...record.errorsByKind },
    };
  }

  quotaUsage(provider: string, model?: string | null): QuotaUsage {
    return this.quota.usage(provider, model);
  }

  rotationHistory(limit?: number): RotationHistoryEntry[] {
    return this.history.entries(limit);
  }

  rotationStatistics(): RotationStatistics {
    return this.history.statistics();
  }

  healthDashboard(): HealthDashboardRow[] {
    const rows: HealthDashboardRow[] = [];
    const current = this.currentCombination();
    for (const provider of this.config.resolved.providerOrder) {
      rows.push(this.dashboardRow(provider, undefined, provider === current.provider));
      for (const model of this.modelChain(provider)) {
        rows.push(
          this.dashboardRow(provider, model, provider === current.provider && model === current.model),
        );
      }
    }
    return rows;
  }

  statusSummary(): StatusSummary {
    const providers = this.config.resolved.providerOrder;
    return {
      currentProvider: this.currentProvider,
      currentModel: this.currentModel,
      availableProviders: this.availableProviders(),
      rateLimitedProviders: providers.filter((p) => this.rateLimits.isRateLimited(p)),
      unhealthyProviders: providers.filter((p) => !this.health.isHealthy(p) || this.health.isCircuitOpen(p)),
      nextResetTime: this.nextResetTime(),
      counters: { ...this.state.counters },
      rotation: this.history.statistics(),
      circuits: this.health.statistics(),
      loadBalancing: this.loadBalancing,
      modelSwitching: this.modelSwitching,
      lastUpdated: this.state.lastUpdated,
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Clear health, rate-limit, metrics and history back to defaults
   */
  async reset(): Promise<void> {
    await this.exclusive(async () => {
      replaceState(this.state, createEmptyState());
      this.resetPointer();
      this.logger.info("Provider state reset");
    });
  }

  /**
   * Swap in a reloaded configuration, keeping state for providers that remain
   */
  async applyConfig(config: HarnessConfig): Promise<void> {
    await this.exclusive(async () => {
      this.config = config;
      this.pruneUnknownEntries();
      this.resetPointer();
      this.logger.info({ providers: config.resolved.providerOrder }, "Configuration applied");
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Run a mutation under the manager lock and, with a store, under the file
   * lock: the persisted state is re-read first and written back after, so
   * edits made by other processes are kept. Events raised meanwhile are
   * delivered once both locks are released.
   */
  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    let batch: Array<() => Promise<unknown>> = [];
    try {
      return await this.mutex.runExclusive(MANAGER_LOCK, async () => {
        try {
          return await this.transaction(fn);
        } finally {
          batch = this.outbox.take();
        }
      });
    } finally {
      await EventOutbox.deliver(batch);
    }
  }

  private async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const store = this.store;
    if (!store) {
      await this.sweepExpiredRateLimits();
      const result = await fn();
      this.state.lastUpdated = this.now();
      return result;
    }
    return store.transact(async (current) => {
      this.adopt(current);
      await this.sweepExpiredRateLimits();
      const result = await fn();
      this.state.lastUpdated = this.now();
      return { next: structuredClone(this.state), result };
    });
  }

  /**
   * Replace the in-memory state with a persisted blob
   */
  private adopt(blob: Record<string, unknown>): void {
    replaceState(this.state, parseHarnessState(blob, this.logger));
    this.pruneUnknownEntries();
    this.resetPointer();
  }

  private async sweepExpiredRateLimits(): Promise<void> {
    for (const key of await this.rateLimits.sweepExpired()) {
      const { provider, model } = splitCombinationKey(key);
      await this.health.clearRateLimitReason(provider, model);
    }
  }

  /**
   * Next provider for provider-level switches: weighted/least-loaded when
   * load balancing is on, else the fallback chain
   */
  private decideProviderSwitch(from: Combination): RotationDecision {
    if (this.loadBalancing) {
      const provider = this.selectProvider(from.provider);
      const model = provider ? this.selectModel(provider) : null;
      if (provider && model) {
        return { action: "switch_provider", provider, model, strategy: "provider_first" };
      }
    }
    return this.rotation.next(from, "provider_first");
  }

  private async applyDecision(from: Combination, decision: RotationDecision, reason: string): Promise<boolean> {
    if (decision.action === "none") {
      this.logger.warn({ from, reason, strategy: decision.strategy }, "No usable provider/model to switch to");
      this.recordRotation(from, null, decision.strategy, false, reason, 0);
      return false;
    }

    const started = this.now();
    this.state.currentProvider = decision.provider;
    this.state.currentModel = decision.model;
    if (decision.action === "switch_provider") this.state.counters.providerSwitches += 1;
    else this.state.counters.modelSwitches += 1;

    this.recordRotation(
      from,
      { provider: decision.provider, model: decision.model },
      decision.strategy,
      true,
      reason,
      this.now() - started,
    );
    this.logger.info(
      {
        fromProvider: from.provider,
        fromModel: from.model,
        toProvider: decision.provider,
        toModel: decision.model,
        reason,
        strategy: decision.strategy,
      },
      decision.action === "switch_provider" ? "Switched provider" : "Switched model",
    );
    await this.outbox.publish("switch", {
      scope: decision.action === "switch_provider" ? "provider" : "model",
      fromProvider: from.provider,
      fromModel: from.model,
      toProvider: decision.provider,
      toModel: decision.model,
      reason,
      strategy: decision.strategy,
    });
    return true;
  }

  private recordRotation(
    from: Combination,
    to: Combination | null,
    strategy: string,
    success: boolean,
    reason: string,
    durationMs: number,
  ): void {
    this.history.record({
      timestamp: this.now(),
      type: "rotation",
      fromProvider: from.provider,
      fromModel: from.model,
      toProvider: to?.provider ?? null,
      toModel: to?.model ?? null,
      strategy,
      success,
      durationMs,
      reason,
    });
  }

  private resetPointer(): void {
    const providers = this.config.resolved.providers;
    const provider =
      this.state.currentProvider && providers[this.state.currentProvider]
        ? this.state.currentProvider
        : this.config.resolved.defaultProvider;
    const models = this.modelChain(provider);
    const model =
      this.state.currentModel && models.includes(this.state.currentModel)
        ? this.state.currentModel
        : this.defaultModel(provider);
    this.state.currentProvider = provider;
    this.state.currentModel = model;
  }

  private pruneUnknownEntries(): void {
    const known = (key: string): boolean => {
      const { provider, model } = splitCombinationKey(key);
      const definition = this.config.resolved.providers[provider];
      if (!definition) return false;
      return model === undefined || definition.models.some((m) => m.id === model);
    };
    for (const map of [this.state.health, this.state.rateLimits, this.state.metrics]) {
      for (const key of Object.keys(map)) {
        if (!known(key)) delete map[key];
      }
    }
    for (const name of Object.keys(this.state.weights.providers)) {
      if (!this.config.resolved.providers[name]) delete this.state.weights.providers[name];
    }
    for (const name of Object.keys(this.state.weights.models)) {
      if (!this.config.resolved.providers[name]) delete this.state.weights.models[name];
    }
  }

  private ensureMetrics(key: string): MetricsRecord {
    let metrics = this.state.metrics[key];
    if (!metrics) {
      metrics = emptyMetrics();
      this.state.metrics[key] = metrics;
    }
    return metrics;
  }

  private providerWeight(provider: string): number {
    return this.state.weights.providers[provider] ?? this.getProvider(provider).weight;
  }

  private modelWeight(provider: string, model: string): number {
    return this.state.weights.models[provider]?.[model] ?? this.getModel(provider, model).weight;
  }

  private hasProviderWeights(): boolean {
    if (Object.keys(this.state.weights.providers).length > 0) return true;
    return Object.values(this.config.resolved.providers).some((p) => p.weight !== 1);
  }

  private hasModelWeights(provider: string): boolean {
    if (Object.keys(this.state.weights.models[provider] ?? {}).length > 0) return true;
    return this.getProvider(provider).models.some((m) => m.weight !== 1);
  }

  private loadSample(provider: string, model?: string): LoadSample {
    const metrics = this.metrics(provider, model);
    return {
      successRate: metrics.successRate ?? 1,
      avgResponseTimeMs: metrics.avgResponseTimeMs ?? 0,
      lastUsedAt: metrics.lastUsedAt,
    };
  }

  private performanceSample(provider: string, model: string): PerformanceSample {
    const metrics = this.metrics(provider, model);
    return {
      successRate: metrics.successRate ?? 1,
      avgResponseTimeMs: metrics.avgResponseTimeMs ?? 0,
      requests: metrics.requests,
    };
  }

  private dashboardRow(provider: string, model: string | undefined, current: boolean): HealthDashboardRow {
    const record = this.state.health[combinationKey(provider, model)];
    const rateLimit = this.rateLimits.get(provider, model);
    const metrics = this.metrics(provider, model);
    const quota = this.quota.usage(provider, model);
    const rateLimited = this.rateLimits.isRateLimited(provider, model);
    return {
      provider,
      model,
      status: record?.status ?? "healthy",
      unhealthyReason: this.displayedReason(record, rateLimited),
      circuitState: this.health.circuitState(provider, model),
      available: model ? this.isModelAvailable(provider, model) : this.isProviderAvailable(provider),
      current,
      rateLimited,
      resetTime: rateLimited ? rateLimit?.resetTime ?? null : null,
      successCount: record?.successCount ?? 0,
      errorCount: record?.errorCount ?? 0,
      successRate: metrics.successRate,
      avgResponseTimeMs: metrics.avgResponseTimeMs,
      quotaUsed: quota.used,
      quotaLimit: quota.limit,
    };
  }

  /**
   * A rate_limit reason outlives the limit until the next mutation sweeps it
   */
  private displayedReason(record: HealthRecord | undefined, rateLimited: boolean): HealthRecord["unhealthyReason"] {
    const reason = record?.unhealthyReason ?? "none";
    return reason === "rate_limit" && !rateLimited ? "none" : reason;
  }

  private candidateSource(): RotationCandidateSource {
    return {
      fallbackChain: () => this.config.resolved.fallbackChain,
      modelChain: (provider) => this.modelChain(provider),
      isUsable: (provider, model) => this.isModelAvailable(provider, model),
      costOf: (provider, model) => {
        const definition = this.config.resolved.providers[provider];
        const modelDef = definition?.models.find((m) => m.id === model);
        return modelDef?.costPerToken ?? definition?.costPerToken;
      },
      performanceOf: (provider, model) => this.performanceSample(provider, model),
      quotaHeadroom: (provider, model) => this.quota.headroom(provider, model),
    };
  }
}
