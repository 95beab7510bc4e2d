import type { Payload } from "@topicgate/common";

/**
 * One client socket as the gateway sees it. Framing and the upgrade
 * handshake live behind this interface.
 */
export interface ConnectionTransport {
  /** Completes the handshake. Rejects if the client cannot be accepted. */
  accept(): Promise<void>;
  send(payload: Payload): Promise<void>;
  close(code: number, reason?: string): Promise<void>;
  /** True once the peer or the gateway has closed the socket. */
  readonly closed: boolean;
}
