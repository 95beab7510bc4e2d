import type { Payload } from "@topicgate/common";
import type { DeliveryError } from "../errors";
import { matches } from "../topics/matcher";
import { DeliveryQueue, type DeliveryHandle, type DeliveryQueueOptions } from "./delivery-queue";
import type { Connection, ConnectionRegistry } from "./registry";

export type DeliveryReport = {
  delivered: string[];
  failed: { id: string; error: DeliveryError }[];
  dropped: string[];
  cancelled: string[];
};

export type Dispatch = {
  /** Connection ids the payload was scheduled for, in registry order. */
  targets: string[];
  done: Promise<DeliveryReport>;
  cancel(): void;
};

const EMPTY_DISPATCH: Dispatch = {
  targets: [],
  done: Promise.resolve({ delivered: [], failed: [], dropped: [], cancelled: [] }),
  cancel: () => {},
};

/**
 * Fans payloads out to registered connections. Scheduling is synchronous;
 * sends run on a bounded queue and each connection succeeds or fails on its
 * own.
 */
export class Broadcaster {
  private queue: DeliveryQueue;
  private closed = false;

  constructor(
    private registry: ConnectionRegistry,
    options: DeliveryQueueOptions
  ) {
    this.queue = new DeliveryQueue(options);
  }

  /** Deliveries scheduled and not yet settled. */
  get pending(): number {
    return this.queue.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Deliver to every connection whose pattern matches `topic`. */
  send(topic: string, payload: Payload): Dispatch {
    return this.dispatch(
      this.registry.list().filter((c) => c.pattern !== undefined && matches(topic, c.pattern)),
      payload,
      topic
    );
  }

  /** Deliver to every connection, pattern or not. */
  broadcast(payload: Payload): Dispatch {
    return this.dispatch(this.registry.list(), payload, null);
  }

  cancelAll(): void {
    this.queue.cancelAll();
  }

  /** Cancel outstanding deliveries and refuse new ones. */
  close(): void {
    this.closed = true;
    this.queue.cancelAll();
  }

  private dispatch(targets: Connection[], payload: Payload, topic: string | null): Dispatch {
    if (this.closed || targets.length === 0) return EMPTY_DISPATCH;

    const handles: DeliveryHandle[] = targets.map((c) => this.queue.schedule(c, payload));
    const done = Promise.all(handles.map((h) => h.outcome)).then((outcomes) => {
      const report: DeliveryReport = { delivered: [], failed: [], dropped: [], cancelled: [] };
      for (const o of outcomes) {
        if (o.status === "failed") report.failed.push({ id: o.connectionId, error: o.error });
        else report[o.status].push(o.connectionId);
      }
      if (report.failed.length > 0 || report.dropped.length > 0) {
        console.warn(
          `[broadcaster] ${topic ?? "<broadcast>"}: ${report.failed.length} failed, ${report.dropped.length} dropped`
        );
        for (const f of report.failed) console.warn(`[broadcaster] ${f.error.message}`);
      }
      return report;
    });

    return {
      targets: targets.map((c) => c.id),
      done,
      cancel: () => handles.forEach((h) => h.cancel()),
    };
  }
}
