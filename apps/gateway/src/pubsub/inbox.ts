import type { BrokerMessage } from "./types";

type Waiter = {
  resolve: (msg: BrokerMessage) => void;
  reject: (e: unknown) => void;
};

export function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError";
}

/**
 * FIFO between a broker connection's callbacks and a single reading loop.
 */
export class AsyncInbox {
  private items: BrokerMessage[] = [];
  private waiters: Waiter[] = [];

  get size(): number {
    return this.items.length;
  }

  push(msg: BrokerMessage): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(msg);
    else this.items.push(msg);
  }

  next(signal?: AbortSignal): Promise<BrokerMessage> {
    if (signal?.aborted) return Promise.reject(abortError());
    const head = this.items.shift();
    if (head) return Promise.resolve(head);

    return new Promise<BrokerMessage>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: (msg) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(msg);
        },
        reject,
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(abortError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Reject every pending reader and drop buffered messages. */
  close(reason: unknown): void {
    for (const w of this.waiters.splice(0)) w.reject(reason);
    this.items = [];
  }
}
