export type GatewayErrorCode =
  | "HANDSHAKE_FAILED"
  | "DESERIALIZATION_ERROR"
  | "PROTOCOL_ERROR"
  | "DELIVERY_FAILED"
  | "TRANSPORT_ALREADY_CLOSED"
  | "CONNECTION_NOT_FOUND"
  | "BRIDGE_STATE";

/**
 * Base error for the gateway. Check `code` for programmatic handling.
 */
export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(message: string, code: GatewayErrorCode, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GatewayError";
    this.code = code;
  }
}

/** Accepting the socket failed; the connection was never registered. */
export class HandshakeError extends GatewayError {
  constructor(
    message: string,
    readonly connectionId: string,
    options?: { cause?: unknown }
  ) {
    super(message, "HANDSHAKE_FAILED", options);
    this.name = "HandshakeError";
  }
}

/** Envelope payload is not valid JSON. */
export class DeserializationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "DESERIALIZATION_ERROR", options);
    this.name = "DeserializationError";
  }
}

/** Envelope is missing `type`/`topic`, or carries values outside the protocol. */
export class ProtocolError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PROTOCOL_ERROR", options);
    this.name = "ProtocolError";
  }
}

/** A single connection's send failed during fan-out. */
export class DeliveryError extends GatewayError {
  constructor(
    message: string,
    readonly connectionId: string,
    options?: { cause?: unknown }
  ) {
    super(message, "DELIVERY_FAILED", options);
    this.name = "DeliveryError";
  }
}

/**
 * Graceful close was requested on a transport that already reported itself
 * disconnected. Use `rawRemoveConnection` for that case.
 */
export class TransportAlreadyClosedError extends GatewayError {
  constructor(readonly connectionId: string) {
    super(`Transport for connection ${connectionId} is already closed`, "TRANSPORT_ALREADY_CLOSED");
    this.name = "TransportAlreadyClosedError";
  }
}

export class ConnectionNotFoundError extends GatewayError {
  constructor(readonly connectionId: string) {
    super(`Connection not registered: ${connectionId}`, "CONNECTION_NOT_FOUND");
    this.name = "ConnectionNotFoundError";
  }
}

export class BridgeStateError extends GatewayError {
  constructor(message: string) {
    super(message, "BRIDGE_STATE");
    this.name = "BridgeStateError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
