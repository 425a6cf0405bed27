import type { EventDataMap, EventPublisher, EventType } from "./types.js";

type Delivery = () => Promise<unknown>;

/**
 * Holds events raised inside a critical section. The owner takes the batch
 * while still holding its lock and delivers it after releasing, so listeners
 * may call back into the owner.
 */
export class EventOutbox implements EventPublisher {
  private queue: Delivery[] = [];

  constructor(private readonly target?: EventPublisher) {}

  async publish<K extends EventType>(type: K, data: EventDataMap[K]): Promise<void> {
    const target = this.target;
    if (!target) return;
    this.queue.push(() => target.publish(type, data));
  }

  take(): Delivery[] {
    return this.queue.splice(0);
  }

  static async deliver(batch: Delivery[]): Promise<void> {
    for (const send of batch) {
      await send();
    }
  }
}
