/**
 * Types for harness observability events
 */

import type { ErrorKind, ErrorSeverity } from "../resilience/error-classifier.js";
import type { CircuitState } from "../resilience/circuit-breaker.js";

// ============================================================================
// Event Types
// ============================================================================

export type EventType = "error" | "recovery" | "switch" | "retry" | "circuit_breaker" | "rate_limit";

export interface ErrorEventData {
  provider: string;
  model: string;
  kind: ErrorKind;
  severity: ErrorSeverity;
  message: string;
  attempt: number;
  recoverable: boolean;
}

export interface RecoveryEventData {
  provider: string;
  model: string;
  attempts: number;
  providersTried: string[];
}

export interface SwitchEventData {
  scope: "provider" | "model";
  fromProvider: string | null;
  fromModel: string | null;
  toProvider: string;
  toModel: string;
  reason: string;
  strategy: string;
}

export interface RetryEventData {
  provider: string;
  model: string;
  kind: ErrorKind;
  attempt: number;
  delayMs: number;
}

export interface CircuitBreakerEventData {
  key: string;
  provider: string;
  model?: string;
  from: CircuitState;
  to: CircuitState;
  reason: string;
}

export interface RateLimitEventData {
  provider: string;
  model?: string;
  resetTime: number;
  quotaUsed: number;
}

export interface EventDataMap {
  error: ErrorEventData;
  recovery: RecoveryEventData;
  switch: SwitchEventData;
  retry: RetryEventData;
  circuit_breaker: CircuitBreakerEventData;
  rate_limit: RateLimitEventData;
}

export interface MonitorEvent<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  data: EventDataMap[K];
}

export type EventListener<K extends EventType = EventType> = (
  event: MonitorEvent<K>,
) => void | Promise<void>;

export type EventFilter<K extends EventType = EventType> = (event: MonitorEvent<K>) => boolean;

export type Unsubscribe = () => void;

/**
 * Anything components can publish events through
 */
export interface EventPublisher {
  publish<K extends EventType>(type: K, data: EventDataMap[K]): Promise<unknown>;
}
