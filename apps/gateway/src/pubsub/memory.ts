import { AsyncInbox } from "./inbox";
import type { BrokerClient, BrokerMessage } from "./types";

export type LoggedMessage = {
  channel: string;
  data: string;
  publishedAtMs: number;
};

/**
 * In-process stand-in for the shared broker. Several gateway instances in one
 * process each get their own client and see each other's publishes.
 *
 * The last `maxLog` publishes are kept for inspection; tests read them through
 * `getLog()` to see exactly what went over the wire.
 */
export class MemoryBroker {
  private clients = new Set<MemoryBrokerClient>();
  private messageLog: LoggedMessage[] = [];

  constructor(private maxLog = 200) {}

  connect(): MemoryBrokerClient {
    const client = new MemoryBrokerClient(this);
    this.clients.add(client);
    return client;
  }

  detach(client: MemoryBrokerClient): void {
    this.clients.delete(client);
  }

  publish(channel: string, data: string): number {
    this.messageLog.push({ channel, data, publishedAtMs: Date.now() });
    if (this.messageLog.length > this.maxLog) this.messageLog.shift();

    let receivers = 0;
    for (const client of this.clients) {
      if (client.isSubscribed(channel)) {
        client.deliver({ kind: "message", channel, data });
        receivers++;
      }
    }
    return receivers;
  }

  getLog(): LoggedMessage[] {
    return [...this.messageLog];
  }
}

export class MemoryBrokerClient implements BrokerClient {
  private channels = new Set<string>();
  private inbox = new AsyncInbox();
  private open = true;

  constructor(private broker: MemoryBroker) {}

  isSubscribed(channel: string): boolean {
    return this.channels.has(channel);
  }

  deliver(msg: BrokerMessage): void {
    this.inbox.push(msg);
  }

  async publish(channel: string, payload: string): Promise<void> {
    this.assertOpen();
    this.broker.publish(channel, payload);
  }

  async subscribe(channel: string): Promise<void> {
    this.assertOpen();
    this.channels.add(channel);
    this.inbox.push({ kind: "subscribe", channel });
  }

  async unsubscribe(channel: string): Promise<void> {
    this.assertOpen();
    this.channels.delete(channel);
    this.inbox.push({ kind: "unsubscribe", channel });
  }

  nextMessage(signal?: AbortSignal): Promise<BrokerMessage> {
    return this.inbox.next(signal);
  }

  async quit(): Promise<void> {
    if (!this.open) return;
    this.open = false;
    this.channels.clear();
    this.broker.detach(this);
    this.inbox.close(new Error("Broker client closed"));
  }

  private assertOpen(): void {
    if (!this.open) throw new Error("Broker client closed");
  }
}
