export { createHarness, createStateStore, Harness } from "./harness.js";
export type { CreateHarnessOptions, ProviderInvoker } from "./harness.js";

export { loadConfig, parseConfig, resolveConfigPath, ROTATION_STRATEGIES } from "./config.js";
export type { ConfigInput, HarnessConfig, ModelDefinition, ProviderDefinition, RotationStrategy } from "./config.js";

export {
  ConfigurationError,
  HarnessError,
  LockTimeoutError,
  ProviderError,
  StatePersistenceError,
  getErrorCode,
  getErrorMessage,
  getStatusCode,
  isProviderError,
} from "./errors.js";
export type { HarnessErrorCode } from "./errors.js";

export { createLogger, createLoggerWithCleanup } from "./log.js";
export type { Logger, LogLevel } from "./log.js";

export * from "./monitor/index.js";

export { BackoffCalculator, computeDelay, exponentialDelay, linearDelay } from "./resilience/backoff.js";
export type { BackoffStrategy, RetryPolicy } from "./resilience/backoff.js";
export { resolveCircuitState } from "./resilience/circuit-breaker.js";
export type { CircuitState, CircuitStatistics } from "./resilience/circuit-breaker.js";
export { ERROR_KINDS, ErrorClassifier, classifyErrorKind } from "./resilience/error-classifier.js";
export type { Classification, ErrorKind, ErrorSeverity } from "./resilience/error-classifier.js";
export { RetryOrchestrator } from "./resilience/error-handler.js";
export type { AttemptContext, CompletedResult, ExecutionResult, FailedResult, Work } from "./resilience/error-handler.js";
export { HealthTracker } from "./resilience/health-tracker.js";
export { QuotaTracker } from "./resilience/quota-tracker.js";
export type { QuotaUsage } from "./resilience/quota-tracker.js";
export { RateLimitDetector } from "./resilience/rate-limit-detector.js";
export type { ProviderResponse, RateLimitDetection, RateLimitType } from "./resilience/rate-limit-detector.js";
export { RateLimitTracker } from "./resilience/rate-limit-tracker.js";

export { ProviderManager } from "./providers/provider-manager.js";
export type { CombinationRateLimit, HealthDashboardRow, MetricsView, StatusSummary } from "./providers/provider-manager.js";

export { RotationEngine } from "./routing/rotation-engine.js";
export type { Combination, RotationDecision } from "./routing/rotation-engine.js";
export { RotationHistory } from "./routing/rotation-history.js";
export type { RotationStatistics } from "./routing/rotation-history.js";
export { leastLoaded, weightedSelect } from "./routing/weighted-select.js";

export { createEmptyState, parseHarnessState } from "./state/harness-state.js";
export type { HarnessState, HealthRecord, RateLimitRecord } from "./state/harness-state.js";
export { StateStore } from "./state/state-store.js";

export { buildStatusReport } from "./status/report.js";
export type { StatusReport } from "./status/report.js";
export { formatReport, getFormatter, isReportFormat, REPORT_FORMATS } from "./status/formatters.js";
export type { ReportFormat, ReportFormatter } from "./status/formatters.js";
