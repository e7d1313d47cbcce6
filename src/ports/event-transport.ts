export interface TransportMessage {
  topic: string;
  key?: string;
  value: Record<string, unknown>;
}

export interface EventTransportPort {
  readonly name: string;
  send(message: TransportMessage): Promise<void>;
  close?(): Promise<void>;
}
