import type { Kafka, Producer } from "kafkajs";
import { UpstreamUnavailableError } from "../../infra/app-error.js";
import { withTimeout } from "../../infra/timeout.js";
import type { EventTransportPort, TransportMessage } from "../../ports/event-transport.js";

interface KafkaEventTransportOptions {
  sendTimeoutMs: number;
}

export class KafkaEventTransport implements EventTransportPort {
  public readonly name = "kafka";
  private connecting: Promise<Producer> | null = null;

  constructor(
    private readonly kafka: Kafka,
    private readonly options: KafkaEventTransportOptions,
  ) {}

  async send(message: TransportMessage): Promise<void> {
    const producer = await this.connectedProducer();
    await withTimeout(
      producer.send({
        topic: message.topic,
        acks: -1,
        timeout: this.options.sendTimeoutMs,
        messages: [
          {
            value: JSON.stringify(message.value),
            ...(message.key ? { key: message.key } : {}),
          },
        ],
      }),
      this.options.sendTimeoutMs,
      () => new UpstreamUnavailableError("event_transport_timeout", `Kafka send to '${message.topic}' timed out.`),
    );
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    this.connecting = null;
    if (!pending) {
      return;
    }
    const producer = await pending.catch(() => null);
    if (producer) {
      await producer.disconnect();
    }
  }

  // One producer per process, connected on first use.
  private connectedProducer(): Promise<Producer> {
    if (!this.connecting) {
      const producer = this.kafka.producer({ allowAutoTopicCreation: true });
      const connecting = withTimeout(
        producer.connect(),
        this.options.sendTimeoutMs,
        () => new UpstreamUnavailableError("event_transport_unavailable", "Kafka connection timed out."),
      ).then(() => producer);
      connecting.catch(() => {
        if (this.connecting === connecting) {
          this.connecting = null;
        }
      });
      this.connecting = connecting;
    }
    return this.connecting;
  }
}
