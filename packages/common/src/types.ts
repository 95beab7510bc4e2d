// ── Envelope ──

export type EnvelopeType = "send" | "broadcast";

export type EnvelopeHeader =
  | { type: "send"; topic: string }
  | { type: "broadcast"; topic: null };

export type Payload = Record<string, unknown>;

export type TaggedMessage = Payload & EnvelopeHeader;

// ── Close codes ──

export const CloseCode = {
  NORMAL_CLOSURE: 1000,
  SERVICE_RESTART: 1012,
} as const;

export type CloseCodeValue = (typeof CloseCode)[keyof typeof CloseCode];

// ── Gateway views ──

export type ConnectionState = "open" | "closed";

export type ConnectionInfo = {
  id: string;
  pattern?: string;
  state: ConnectionState;
  connectedAtMs: number;
};

export type BridgeState = "idle" | "active" | "shutting-down" | "stopped";

export type RoutingMode = "channel" | "envelope";

export type OverflowPolicy = "drop-oldest" | "drop-newest";

// ── Server → client frames ──

export type ServerFrame = { type: "error"; error: string; detail?: string };
