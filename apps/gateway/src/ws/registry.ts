import type { CloseCodeValue, ConnectionInfo, ConnectionState, Payload } from "@topicgate/common";
import { CloseCode } from "@topicgate/common";
import { ConnectionNotFoundError, HandshakeError, TransportAlreadyClosedError, errorMessage } from "../errors";
import type { ConnectionTransport } from "./types";

export class Connection {
  state: ConnectionState = "open";
  connectedAtMs = 0;

  constructor(
    readonly transport: ConnectionTransport,
    readonly id: string,
    readonly pattern?: string
  ) {}

  send(payload: Payload): Promise<void> {
    return this.transport.send(payload);
  }

  info(): ConnectionInfo {
    return { id: this.id, pattern: this.pattern, state: this.state, connectedAtMs: this.connectedAtMs };
  }
}

export type RegistryDeps = {
  nowMs: () => number;
};

/**
 * Active connections keyed by id, in insertion order.
 *
 * Mutations never straddle a suspension point: an id is reserved before the
 * handshake is awaited and inserted right after it, so two accepts racing on
 * the same id cannot both land.
 */
export class ConnectionRegistry {
  private connections = new Map<string, Connection>();
  private pending = new Set<string>();
  private closed = false;

  constructor(private deps: RegistryDeps = { nowMs: () => Date.now() }) {}

  get size(): number {
    return this.connections.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get(id: string): Connection | undefined {
    return this.connections.get(id);
  }

  has(id: string): boolean {
    return this.connections.has(id);
  }

  list(): Connection[] {
    return Array.from(this.connections.values());
  }

  async connect(connection: Connection): Promise<void> {
    const { id } = connection;
    if (this.closed) throw new HandshakeError(`Registry closed, refusing ${id}`, id);
    if (this.connections.has(id) || this.pending.has(id)) {
      throw new HandshakeError(`Connection id already in use: ${id}`, id);
    }

    this.pending.add(id);
    try {
      await connection.transport.accept();
    } catch (e) {
      connection.state = "closed";
      throw new HandshakeError(`Handshake failed for ${id}: ${errorMessage(e)}`, id, { cause: e });
    } finally {
      this.pending.delete(id);
    }

    // Shutdown may have started while the handshake was in flight.
    if (this.closed) {
      connection.state = "closed";
      try {
        await connection.transport.close(CloseCode.SERVICE_RESTART, "Service restarting");
      } catch (e) {
        throw new HandshakeError(`Registry closed during handshake for ${id}; close failed: ${errorMessage(e)}`, id, {
          cause: e,
        });
      }
      throw new HandshakeError(`Registry closed during handshake for ${id}`, id);
    }

    connection.connectedAtMs = this.deps.nowMs();
    this.connections.set(id, connection);
    console.log(`[registry] connected ${id}${connection.pattern ? ` (${connection.pattern})` : ""}`);
  }

  disconnect(connection: Connection): void {
    if (this.connections.get(connection.id) !== connection) {
      throw new ConnectionNotFoundError(connection.id);
    }
    this.connections.delete(connection.id);
    connection.state = "closed";
    console.log(`[registry] disconnected ${connection.id}`);
  }

  async newConnection(transport: ConnectionTransport, id: string, pattern?: string): Promise<Connection> {
    const connection = new Connection(transport, id, pattern);
    await this.connect(connection);
    return connection;
  }

  /** Close the transport, then deregister. The transport must still be usable. */
  async removeConnection(connection: Connection, code: CloseCodeValue = CloseCode.NORMAL_CLOSURE): Promise<void> {
    if (connection.transport.closed) throw new TransportAlreadyClosedError(connection.id);
    if (!this.connections.has(connection.id)) throw new ConnectionNotFoundError(connection.id);
    // Mark closed before the suspension so the transport's own close event
    // does not take the raw removal path as well.
    connection.state = "closed";
    try {
      await connection.transport.close(code);
    } finally {
      this.disconnect(connection);
    }
  }

  /** Deregister without closing. Use once the peer has already disconnected. */
  rawRemoveConnection(connection: Connection): void {
    this.disconnect(connection);
  }

  /** Stop admitting connections. Existing ones stay until removed. */
  close(): void {
    this.closed = true;
  }
}
