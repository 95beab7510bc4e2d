import { createClient } from "redis";
import { AsyncInbox } from "./inbox";
import type { BrokerClient, BrokerMessage } from "./types";

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis pub/sub. Redis forbids publishing on a connection in subscriber mode,
 * so there is one connection for each direction.
 */
export class RedisBrokerClient implements BrokerClient {
  private publisher: RedisClient;
  private subscriber: RedisClient;
  private inbox = new AsyncInbox();
  private connected = false;

  constructor(url: string) {
    this.publisher = createClient({ url });
    this.subscriber = createClient({ url });
    this.publisher.on("error", (err) => console.error("[redis] publisher error:", err));
    this.subscriber.on("error", (err) => console.error("[redis] subscriber error:", err));
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await Promise.all([this.publisher.connect(), this.subscriber.connect()]);
    this.connected = true;
    console.log("[redis] connected");
  }

  async publish(channel: string, payload: string): Promise<void> {
    await this.publisher.publish(channel, payload);
  }

  async subscribe(channel: string): Promise<void> {
    await this.subscriber.subscribe(channel, (message, from) => {
      this.inbox.push({ kind: "message", channel: from, data: message });
    });
    this.inbox.push({ kind: "subscribe", channel });
  }

  async unsubscribe(channel: string): Promise<void> {
    await this.subscriber.unsubscribe(channel);
    this.inbox.push({ kind: "unsubscribe", channel });
  }

  nextMessage(signal?: AbortSignal): Promise<BrokerMessage> {
    return this.inbox.next(signal);
  }

  async quit(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    this.inbox.close(new Error("Broker client closed"));
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    console.log("[redis] disconnected");
  }
}
