import type { EventTransportPort, TransportMessage } from "../../ports/event-transport.js";

export class InMemoryEventTransport implements EventTransportPort {
  public readonly name = "memory";
  private readonly sent: TransportMessage[] = [];
  private failure: Error | null = null;
  private closed = false;

  async send(message: TransportMessage): Promise<void> {
    if (this.closed) {
      throw new Error("Event transport is closed.");
    }
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push(message);
  }

  /** Makes every following `send` reject with `error` until cleared with `null`. */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  getSentMessages(topic?: string): TransportMessage[] {
    return this.sent.filter((message) => topic === undefined || message.topic === topic);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
