export type BrokerMessage =
  | { kind: "message"; channel: string; data: string }
  | { kind: "subscribe" | "unsubscribe"; channel: string };

/**
 * Pub/sub client the bridge talks to. Connection setup, auth and reconnects
 * belong to the implementation.
 */
export interface BrokerClient {
  publish(channel: string, payload: string): Promise<void>;
  subscribe(channel: string): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  /**
   * Resolves with the next delivered message or acknowledgement. Rejects with
   * an `AbortError` once `signal` aborts.
   */
  nextMessage(signal?: AbortSignal): Promise<BrokerMessage>;
  quit(): Promise<void>;
}
