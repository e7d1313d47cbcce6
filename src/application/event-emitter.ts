import { randomUUID } from "node:crypto";
import type { JsonObject, ServiceEvent } from "../domain/types.js";
import { UpstreamUnavailableError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { ServiceMetricsRegistry } from "../infra/metrics.js";
import { withTimeout } from "../infra/timeout.js";
import type { EventTransportPort } from "../ports/event-transport.js";

export type OverflowPolicy = "drop_oldest" | "reject_new";

export const DEFAULT_EVENT_TOPIC = "ml-events";

export interface BackgroundEventEmitterOptions {
  serviceName: string;
  capacity: number;
  workers: number;
  maxAttempts: number;
  sendTimeoutMs: number;
  overflowPolicy: OverflowPolicy;
  defaultTopic?: string;
}

interface QueuedEvent {
  topic: string;
  key: string;
  event: ServiceEvent;
}

export interface PublishOptions {
  topic?: string;
  key?: string;
}

export function buildServiceEvent(
  eventType: string,
  data: JsonObject,
  clock: ClockPort,
  serviceName: string,
): ServiceEvent {
  return Object.freeze({
    id: `evt_${randomUUID()}`,
    event_type: eventType,
    timestamp: clock.nowIso(),
    service: serviceName,
    data: Object.freeze({ ...data }),
  });
}

/**
 * Fire-and-forget telemetry. Events sit on a bounded queue drained by a fixed
 * worker pool; delivery is best effort and never reported to the publisher.
 */
export class BackgroundEventEmitter {
  private readonly queue: QueuedEvent[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly idleWaiters: Array<() => void> = [];
  private accepting = true;

  constructor(
    private readonly transport: EventTransportPort,
    private readonly clock: ClockPort,
    private readonly metrics: ServiceMetricsRegistry,
    private readonly logger: Logger,
    private readonly options: BackgroundEventEmitterOptions,
  ) {}

  publish(eventType: string, data: JsonObject, options: PublishOptions = {}): void {
    if (!this.accepting) {
      this.metrics.recordEventOutcome(eventType, "dropped");
      this.logger.warn({ eventType }, "Event emitter closed; dropping event");
      return;
    }

    const entry: QueuedEvent = {
      topic: options.topic ?? this.options.defaultTopic ?? DEFAULT_EVENT_TOPIC,
      key: options.key ?? eventType,
      event: buildServiceEvent(eventType, data, this.clock, this.options.serviceName),
    };

    if (this.queue.length >= this.options.capacity) {
      if (this.options.overflowPolicy === "reject_new") {
        this.metrics.recordEventOutcome(eventType, "dropped");
        this.logger.warn({ eventType, capacity: this.options.capacity }, "Event queue full; dropping new event");
        return;
      }
      const evicted = this.queue.shift();
      if (evicted) {
        this.metrics.recordEventOutcome(evicted.event.event_type, "dropped");
        this.logger.warn(
          { eventType: evicted.event.event_type, eventId: evicted.event.id, capacity: this.options.capacity },
          "Event queue full; dropping oldest event",
        );
      }
    }

    this.queue.push(entry);
    this.pump();
  }

  pendingCount(): number {
    return this.queue.length + this.inFlight.size;
  }

  /** Resolves once the queue is empty and every worker is idle. */
  drain(): Promise<void> {
    if (this.pendingCount() === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(drainTimeoutMs = 5000): Promise<void> {
    this.accepting = false;
    try {
      await withTimeout(this.drain(), drainTimeoutMs, () => new Error("Event drain timed out."));
    } catch (error) {
      this.logger.warn({ err: error, pending: this.pendingCount() }, "Closing event emitter with undelivered events");
    }
    if (this.transport.close) {
      await this.transport.close();
    }
  }

  private pump(): void {
    while (this.inFlight.size < this.options.workers) {
      const entry = this.queue.shift();
      if (!entry) {
        break;
      }
      const task: Promise<void> = this.deliver(entry).finally(() => {
        this.inFlight.delete(task);
        this.pump();
        this.notifyIfIdle();
      });
      this.inFlight.add(task);
    }
  }

  private async deliver(entry: QueuedEvent): Promise<void> {
    const { event } = entry;
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      try {
        await withTimeout(
          this.transport.send({ topic: entry.topic, key: entry.key, value: { ...event } }),
          this.options.sendTimeoutMs,
          () => new UpstreamUnavailableError("event_transport_timeout", `Publishing ${event.event_type} timed out.`),
        );
        this.metrics.recordEventOutcome(event.event_type, "published");
        this.logger.debug({ eventId: event.id, topic: entry.topic }, "Event published");
        return;
      } catch (error) {
        const exhausted = attempt >= this.options.maxAttempts;
        this.logger.warn(
          { err: error, eventId: event.id, eventType: event.event_type, attempt },
          exhausted ? "Event publish failed; giving up" : "Event publish failed; retrying",
        );
      }
    }
    this.metrics.recordEventOutcome(event.event_type, "failed");
  }

  private notifyIfIdle(): void {
    if (this.pendingCount() !== 0) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
