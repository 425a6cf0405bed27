/**
 * Event Pub/Sub for harness observability
 *
 * Components publish error, recovery, switch, retry, circuit_breaker and
 * rate_limit events here; external sinks subscribe.
 */

import crypto from "node:crypto";

import type { Logger } from "../log.js";
import type {
  EventDataMap,
  EventFilter,
  EventListener,
  EventType,
  MonitorEvent,
  Unsubscribe,
} from "./types.js";

function isEventOfType<K extends EventType>(event: MonitorEvent, type: K): event is MonitorEvent<K> {
  return event.type === type;
}

/**
 * Type-safe event emitter for monitoring events
 */
export class EventStream {
  private readonly listeners = new Map<EventType | "*", Set<EventListener>>();
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(options: { logger?: Logger; now?: () => number } = {}) {
    this.logger = options.logger?.child({ component: "event-stream" });
    this.now = options.now ?? Date.now;
  }

  /**
   * Subscribe to events of a specific type
   */
  subscribe<K extends EventType>(type: K, listener: EventListener<K>, filter?: EventFilter<K>): Unsubscribe {
    const wrapped: EventListener = (event) => {
      if (!isEventOfType(event, type)) return;
      if (filter && !filter(event)) return;
      return listener(event);
    };
    return this.addListener(type, wrapped);
  }

  /**
   * Subscribe to all events
   */
  subscribeAll(listener: EventListener, filter?: EventFilter): Unsubscribe {
    const wrapped: EventListener = (event) => {
      if (filter && !filter(event)) return;
      return listener(event);
    };
    return this.addListener("*", wrapped);
  }

  /**
   * Publish an event to all subscribers. Resolves once async listeners settle.
   */
  async publish<K extends EventType>(type: K, data: EventDataMap[K]): Promise<MonitorEvent<K>> {
    const event: MonitorEvent<K> = {
      id: crypto.randomUUID(),
      type,
      timestamp: this.now(),
      data,
    };

    await this.dispatch(event);
    return event;
  }

  /**
   * Clear all listeners
   */
  clear(): void {
    this.listeners.clear();
  }

  /**
   * Get listener count for a specific type (or all)
   */
  listenerCount(type?: EventType | "*"): number {
    if (type) {
      return this.listeners.get(type)?.size ?? 0;
    }
    let count = 0;
    for (const set of this.listeners.values()) {
      count += set.size;
    }
    return count;
  }

  private addListener(type: EventType | "*", listener: EventListener): Unsubscribe {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);

    return () => {
      set?.delete(listener);
      if (set?.size === 0) {
        this.listeners.delete(type);
      }
    };
  }

  private async dispatch(event: MonitorEvent): Promise<void> {
    const listeners = [
      ...(this.listeners.get(event.type) ?? []),
      ...(this.listeners.get("*") ?? []),
    ];

    const promises: Promise<void>[] = [];

    for (const listener of listeners) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          promises.push(result.catch((err: unknown) => this.reportListenerError(event, err)));
        }
      } catch (err) {
        this.reportListenerError(event, err);
      }
    }

    await Promise.all(promises);
  }

  private reportListenerError(event: MonitorEvent, err: unknown): void {
    this.logger?.warn(
      { eventType: event.type, error: err instanceof Error ? err.message : String(err) },
      "Event listener failed",
    );
  }
}
