import { describe, expect, it, vi } from "vitest";
import { InMemoryEventTransport } from "../src/adapters/inmemory/event-transport.js";
import { BackgroundEventEmitter, type BackgroundEventEmitterOptions } from "../src/application/event-emitter.js";
import { ServiceMetricsRegistry } from "../src/infra/metrics.js";
import type { EventTransportPort, TransportMessage } from "../src/ports/event-transport.js";
import { ManualClock, silentLogger } from "./helpers.js";

const OPTIONS: BackgroundEventEmitterOptions = {
  serviceName: "ai-ml-service",
  capacity: 10,
  workers: 2,
  maxAttempts: 2,
  sendTimeoutMs: 1000,
  overflowPolicy: "drop_oldest",
};

/** Holds every send until `release()` is called. */
class GatedTransport implements EventTransportPort {
  readonly name = "gated";
  readonly sent: TransportMessage[] = [];
  private open = false;
  private readonly waiting: Array<() => void> = [];

  async send(message: TransportMessage): Promise<void> {
    if (!this.open) {
      await new Promise<void>((resolve) => {
        this.waiting.push(resolve);
      });
    }
    this.sent.push(message);
  }

  release(): void {
    this.open = true;
    for (const resolve of this.waiting.splice(0)) {
      resolve();
    }
  }
}

function eventTypes(messages: TransportMessage[]): unknown[] {
  return messages.map((message) => message.value.event_type);
}

describe("BackgroundEventEmitter", () => {
  it("publishes events to the default topic keyed by type", async () => {
    const transport = new InMemoryEventTransport();
    const metrics = new ServiceMetricsRegistry();
    const clock = new ManualClock(Date.UTC(2026, 0, 15));
    const emitter = new BackgroundEventEmitter(transport, clock, metrics, silentLogger(), OPTIONS);

    emitter.publish("prediction_made", { model_name: "regression", prediction: 2.5 });
    await emitter.drain();

    const [message] = transport.getSentMessages("ml-events");
    expect(message?.key).toBe("prediction_made");
    expect(message?.value).toMatchObject({
      event_type: "prediction_made",
      timestamp: "2026-01-15T00:00:00.000Z",
      service: "ai-ml-service",
      data: { model_name: "regression", prediction: 2.5 },
    });
    expect(String(message?.value.id)).toMatch(/^evt_/);
    expect(metrics.eventCount("published")).toBe(1);
  });

  it("retries and then gives up without surfacing the failure", async () => {
    const send = vi.fn(async () => {
      throw new Error("broker down");
    });
    const transport: EventTransportPort = { name: "failing", send };
    const metrics = new ServiceMetricsRegistry();
    const logger = silentLogger();
    const emitter = new BackgroundEventEmitter(transport, new ManualClock(0), metrics, logger, OPTIONS);

    expect(() => emitter.publish("recommendations_generated", { user_id: "u1" })).not.toThrow();
    await emitter.drain();

    expect(send).toHaveBeenCalledTimes(2);
    expect(metrics.eventCount("failed")).toBe(1);
    expect(metrics.eventCount("published")).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("drops the oldest queued event when the queue is full", async () => {
    const transport = new GatedTransport();
    const metrics = new ServiceMetricsRegistry();
    const emitter = new BackgroundEventEmitter(transport, new ManualClock(0), metrics, silentLogger(), {
      ...OPTIONS,
      capacity: 2,
      workers: 1,
    });

    emitter.publish("e1", {});
    emitter.publish("e2", {});
    emitter.publish("e3", {});
    emitter.publish("e4", {});
    expect(emitter.pendingCount()).toBe(3);

    transport.release();
    await emitter.drain();

    expect(eventTypes(transport.sent)).toEqual(["e1", "e3", "e4"]);
    expect(metrics.eventCount("dropped")).toBe(1);
  });

  it("rejects new events when configured to", async () => {
    const transport = new GatedTransport();
    const metrics = new ServiceMetricsRegistry();
    const emitter = new BackgroundEventEmitter(transport, new ManualClock(0), metrics, silentLogger(), {
      ...OPTIONS,
      capacity: 1,
      workers: 1,
      overflowPolicy: "reject_new",
    });

    emitter.publish("e1", {});
    emitter.publish("e2", {});
    emitter.publish("e3", {});

    transport.release();
    await emitter.drain();

    expect(eventTypes(transport.sent)).toEqual(["e1", "e2"]);
    expect(metrics.eventCount("dropped")).toBe(1);
  });

  it("drains pending events on close and then refuses new ones", async () => {
    const transport = new InMemoryEventTransport();
    const metrics = new ServiceMetricsRegistry();
    const emitter = new BackgroundEventEmitter(transport, new ManualClock(0), metrics, silentLogger(), OPTIONS);

    emitter.publish("e1", {});
    emitter.publish("e2", {});
    await emitter.close();

    expect(eventTypes(transport.getSentMessages())).toEqual(["e1", "e2"]);
    emitter.publish("e3", {});
    expect(metrics.eventCount("dropped")).toBe(1);
    await expect(transport.send({ topic: "ml-events", value: {} })).rejects.toThrowError(
      "Event transport is closed.",
    );
  });
});
