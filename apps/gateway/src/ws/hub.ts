import crypto from "node:crypto";
import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import type { Payload, ServerFrame } from "@topicgate/common";
import { ClientMessageSchema } from "@topicgate/common";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { errorMessage } from "../errors";
import { tagClientMessage } from "../protocol/envelope";
import type { BrokerBridge } from "../pubsub/bridge";
import type { Connection, ConnectionRegistry } from "./registry";
import type { ConnectionTransport } from "./types";

export const WS_PATH = "/ws";

/** A pending upgrade request that becomes a WebSocket once accepted. */
export class WsTransport implements ConnectionTransport {
  private socket: WebSocket | null = null;

  constructor(
    readonly id: string,
    private wss: WebSocketServer,
    private req: IncomingMessage,
    private raw: Duplex,
    private head: Buffer
  ) {}

  get accepted(): boolean {
    return this.socket !== null;
  }

  get closed(): boolean {
    if (!this.socket) return this.raw.destroyed;
    return this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED;
  }

  accept(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.raw.destroyed) {
        reject(new Error("socket closed before upgrade"));
        return;
      }
      // ws destroys the socket without calling back when the handshake is invalid.
      const onClose = () => reject(new Error("socket closed during upgrade"));
      this.raw.once("close", onClose);
      this.wss.handleUpgrade(this.req, this.raw, this.head, (socket) => {
        this.raw.off("close", onClose);
        // Bad frames surface as socket errors; the close that follows deregisters.
        socket.on("error", (err) => console.warn(`[ws] ${this.id} error: ${err.message}`));
        this.socket = socket;
        resolve();
      });
    });
  }

  send(payload: Payload): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("socket is not open"));
    }
    return new Promise((resolve, reject) => {
      socket.send(JSON.stringify(payload), (err) => (err ? reject(err) : resolve()));
    });
  }

  async close(code: number, reason?: string): Promise<void> {
    if (!this.socket) {
      this.raw.destroy();
      return;
    }
    this.socket.close(code, reason);
  }

  onMessage(listener: (data: RawData) => void): void {
    this.socket?.on("message", listener);
  }

  onClose(listener: () => void): void {
    this.socket?.on("close", listener);
  }
}

export type WsHubDeps = {
  registry: ConnectionRegistry;
  bridge: Pick<BrokerBridge, "publish">;
  generateId?: () => string;
};

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Accepts client sockets on `/ws?id=<id>&topic=<pattern>`, registers them,
 * and publishes what they send through the bridge.
 */
export class WsHub {
  private wss = new WebSocketServer({ noServer: true });

  constructor(
    server: HttpServer,
    private deps: WsHubDeps
  ) {
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head).catch((e: unknown) => {
        console.error(`[ws] upgrade failed: ${errorMessage(e)}`);
        socket.destroy();
      });
    });
  }

  async handleUpgrade(req: IncomingMessage, raw: Duplex, head: Buffer): Promise<Connection | null> {
    let url: URL;
    try {
      url = new URL(req.url ?? "/", "http://localhost");
    } catch {
      console.warn(`[ws] rejected upgrade with bad target ${JSON.stringify(req.url)}`);
      raw.destroy();
      return null;
    }
    if (url.pathname !== WS_PATH) {
      raw.destroy();
      return null;
    }

    const id = url.searchParams.get("id") || (this.deps.generateId ? this.deps.generateId() : crypto.randomUUID());
    const pattern = url.searchParams.get("topic") || undefined;
    const transport = new WsTransport(id, this.wss, req, raw, head);

    let connection: Connection;
    try {
      connection = await this.deps.registry.newConnection(transport, id, pattern);
    } catch (e) {
      console.warn(`[ws] rejected ${id}: ${errorMessage(e)}`);
      if (!transport.accepted) raw.destroy();
      return null;
    }

    transport.onMessage((data) => {
      void this.handleMessage(connection, rawToString(data));
    });
    transport.onClose(() => this.handleClose(connection));
    return connection;
  }

  close(): void {
    this.wss.close();
  }

  private async handleMessage(connection: Connection, text: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      await this.reply(connection, { type: "error", error: "bad_json" });
      return;
    }

    const msg = ClientMessageSchema.safeParse(parsed);
    if (!msg.success) {
      await this.reply(connection, { type: "error", error: "bad_message", detail: msg.error.issues[0]?.message });
      return;
    }

    // The gateway decides `type` from `topic`; whatever the client sent is dropped.
    const { topic, type: _type, ...fields } = msg.data;
    try {
      await this.deps.bridge.publish(tagClientMessage(fields, topic));
    } catch (e) {
      console.warn(`[ws] publish from ${connection.id} failed: ${errorMessage(e)}`);
      await this.reply(connection, { type: "error", error: "publish_failed", detail: errorMessage(e) });
    }
  }

  private handleClose(connection: Connection): void {
    // A gateway-initiated close has already deregistered the connection.
    if (connection.state !== "open" || this.deps.registry.get(connection.id) !== connection) return;
    this.deps.registry.rawRemoveConnection(connection);
  }

  private async reply(connection: Connection, frame: ServerFrame): Promise<void> {
    if (connection.state !== "open") return;
    try {
      await connection.send(frame);
    } catch (e) {
      console.warn(`[ws] reply to ${connection.id} failed: ${errorMessage(e)}`);
    }
  }
}
