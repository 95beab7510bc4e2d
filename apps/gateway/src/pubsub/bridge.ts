import { setTimeout as sleep } from "node:timers/promises";
import type { BridgeState, Payload, RoutingMode } from "@topicgate/common";
import { CloseCode } from "@topicgate/common";
import { BridgeStateError, GatewayError, errorMessage } from "../errors";
import { untagBrokerMessage } from "../protocol/envelope";
import type { Broadcaster, Dispatch } from "../ws/broadcaster";
import type { Connection, ConnectionRegistry } from "../ws/registry";
import { isAbortError } from "./inbox";
import type { BrokerClient, BrokerMessage } from "./types";

export type BrokerBridgeOptions = {
  channel: string;
  /**
   * `channel`: the broker channel name is the topic for every message.
   * `envelope`: messages carry their own `type`/`topic` header.
   */
  routing: RoutingMode;
  /** Pause after a failed broker read before trying again. */
  retryDelayMs?: number;
};

function decodeData(data: string): Payload {
  try {
    const value: unknown = JSON.parse(data);
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return { data: value };
  } catch {
    return { data };
  }
}

/**
 * Joins the local registry to the shared broker channel. Local publishes go
 * out to the channel; everything that arrives on it is fanned out to matching
 * local connections, including this instance's own publishes.
 */
export class BrokerBridge {
  private state: BridgeState = "idle";
  private loop: Promise<void> | null = null;
  private loopAbort = new AbortController();
  private stopping: Promise<void> | null = null;

  constructor(
    private registry: ConnectionRegistry,
    private broadcaster: Broadcaster,
    private broker: BrokerClient,
    private options: BrokerBridgeOptions
  ) {}

  get currentState(): BridgeState {
    return this.state;
  }

  async startup(): Promise<void> {
    if (this.state !== "idle") throw new BridgeStateError(`Cannot start bridge in state ${this.state}`);
    await this.broker.subscribe(this.options.channel);
    this.state = "active";
    this.loop = this.receiveLoop(this.loopAbort.signal);
    console.log(`[bridge] subscribed to ${this.options.channel} (routing: ${this.options.routing})`);
  }

  async publish(payload: Payload): Promise<void> {
    if (this.state !== "active") throw new BridgeStateError(`Cannot publish in state ${this.state}`);
    await this.broker.publish(this.options.channel, JSON.stringify(payload));
  }

  /**
   * Cancel in-flight deliveries, close every connection with the
   * service-restart code, then stop the receive loop. Safe to call twice.
   */
  shutdown(): Promise<void> {
    if (!this.stopping) this.stopping = this.stop();
    return this.stopping;
  }

  private async stop(): Promise<void> {
    const wasActive = this.state === "active";
    this.state = "shutting-down";
    console.log(`[bridge] shutting down (${this.broadcaster.pending} deliveries, ${this.registry.size} connections)`);

    this.registry.close();
    this.broadcaster.close();
    await Promise.all(this.registry.list().map((c) => this.evict(c)));

    this.loopAbort.abort();
    await this.loop;

    if (wasActive) {
      try {
        await this.broker.unsubscribe(this.options.channel);
      } catch (e) {
        console.warn(`[bridge] unsubscribe failed: ${errorMessage(e)}`);
      }
    }
    this.state = "stopped";
    console.log("[bridge] stopped");
  }

  private async evict(connection: Connection): Promise<void> {
    try {
      if (connection.transport.closed) this.registry.rawRemoveConnection(connection);
      else await this.registry.removeConnection(connection, CloseCode.SERVICE_RESTART);
    } catch (e) {
      console.warn(`[bridge] closing ${connection.id} failed: ${errorMessage(e)}`);
      if (this.registry.get(connection.id) === connection) this.registry.rawRemoveConnection(connection);
    }
  }

  private async receiveLoop(signal: AbortSignal): Promise<void> {
    while (this.state === "active") {
      let msg: BrokerMessage;
      try {
        msg = await this.broker.nextMessage(signal);
      } catch (e) {
        if (signal.aborted || this.state !== "active") return;
        console.error(`[bridge] broker read failed: ${errorMessage(e)}`);
        try {
          await sleep(this.options.retryDelayMs ?? 1000, undefined, { signal });
        } catch (err) {
          if (isAbortError(err)) return;
          throw err;
        }
        continue;
      }

      if (msg.kind !== "message") continue;
      // Shutdown may have begun while we were waiting.
      if (this.state !== "active") return;
      this.route(msg.channel, msg.data);
    }
  }

  private route(channel: string, data: string): Dispatch | null {
    if (this.options.routing === "channel") {
      return this.broadcaster.send(channel, decodeData(data));
    }

    try {
      const msg = untagBrokerMessage(data);
      if (msg.type === "send") return this.broadcaster.send(msg.topic, msg.remainder);
      return this.broadcaster.broadcast(msg.remainder);
    } catch (e) {
      if (!(e instanceof GatewayError)) throw e;
      console.warn(`[bridge] dropped message on ${channel}: ${e.message}`);
      return null;
    }
  }
}
