export { EventOutbox } from "./event-outbox.js";
export { EventStream } from "./event-stream.js";
export type {
  CircuitBreakerEventData,
  ErrorEventData,
  EventDataMap,
  EventFilter,
  EventListener,
  EventPublisher,
  EventType,
  MonitorEvent,
  RateLimitEventData,
  RecoveryEventData,
  RetryEventData,
  SwitchEventData,
  Unsubscribe,
} from "./types.js";
