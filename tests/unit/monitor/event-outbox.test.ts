import { describe, expect, it } from "vitest";

import { EventOutbox } from "../../../src/monitor/event-outbox.js";
import { EventStream } from "../../../src/monitor/event-stream.js";
import type { EventType } from "../../../src/monitor/types.js";
import { T0 } from "../../helpers/fixtures.js";

describe("EventOutbox", () => {
  it("holds events until the batch is delivered, in order", async () => {
    const stream = new EventStream({ now: () => T0 });
    const seen: EventType[] = [];
    stream.subscribeAll((event) => {
      seen.push(event.type);
    });
    const outbox = new EventOutbox(stream);

    await outbox.publish("rate_limit", { provider: "claude", resetTime: T0 + 1000, quotaUsed: 1 });
    await outbox.publish("recovery", { provider: "gemini", model: "pro", attempts: 2, providersTried: ["claude", "gemini"] });
    expect(seen).toEqual([]);

    const batch = outbox.take();
    expect(outbox.take()).toEqual([]);
    await EventOutbox.deliver(batch);

    expect(seen).toEqual(["rate_limit", "recovery"]);
  });

  it("queues nothing without a target", async () => {
    const outbox = new EventOutbox();
    await outbox.publish("rate_limit", { provider: "claude", resetTime: T0, quotaUsed: 0 });
    expect(outbox.take()).toEqual([]);
  });
});
