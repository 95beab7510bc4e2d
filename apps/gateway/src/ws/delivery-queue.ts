import type { OverflowPolicy, Payload } from "@topicgate/common";
import { DeliveryError, errorMessage } from "../errors";
import type { Connection } from "./registry";

export type DeliveryOutcome =
  | { status: "delivered"; connectionId: string }
  | { status: "failed"; connectionId: string; error: DeliveryError }
  | { status: "dropped"; connectionId: string }
  | { status: "cancelled"; connectionId: string };

export type DeliveryQueueOptions = {
  /** Sends allowed in flight at once. */
  concurrency: number;
  /** Deliveries allowed to wait for a free slot. */
  maxQueued: number;
  overflow: OverflowPolicy;
};

export type DeliveryHandle = {
  outcome: Promise<DeliveryOutcome>;
  cancel(): void;
};

type Job = {
  connection: Connection;
  payload: Payload;
  started: boolean;
  settled: boolean;
  resolve: (outcome: DeliveryOutcome) => void;
};

/**
 * Bounded pool for outbound sends. At most `concurrency` sends run at once,
 * at most `maxQueued` wait behind them, and the overflow policy picks which
 * delivery is dropped when the backlog is full.
 *
 * Cancelling settles a delivery as cancelled at once. One still in the
 * backlog never reaches the transport; one already sending is left to finish
 * its frame and its result is discarded.
 */
export class DeliveryQueue {
  private backlog: Job[] = [];
  private tracked = new Set<Job>();
  private running = 0;

  constructor(private options: DeliveryQueueOptions) {
    if (options.concurrency < 1) throw new RangeError("concurrency must be at least 1");
    if (options.maxQueued < 0) throw new RangeError("maxQueued must not be negative");
  }

  /** Deliveries scheduled and not yet settled, running or waiting. */
  get pending(): number {
    return this.tracked.size;
  }

  get queued(): number {
    return this.backlog.length;
  }

  schedule(connection: Connection, payload: Payload): DeliveryHandle {
    let resolve: (outcome: DeliveryOutcome) => void = () => {};
    const outcome = new Promise<DeliveryOutcome>((r) => {
      resolve = r;
    });
    const job: Job = { connection, payload, started: false, settled: false, resolve };
    this.tracked.add(job);

    if (this.running < this.options.concurrency) {
      this.start(job);
    } else if (this.backlog.length < this.options.maxQueued) {
      this.backlog.push(job);
    } else if (this.options.overflow === "drop-oldest" && this.backlog.length > 0) {
      const oldest = this.backlog.shift();
      if (oldest) this.settle(oldest, { status: "dropped", connectionId: oldest.connection.id });
      this.backlog.push(job);
    } else {
      this.settle(job, { status: "dropped", connectionId: connection.id });
    }

    return { outcome, cancel: () => this.cancel(job) };
  }

  cancelAll(): void {
    for (const job of Array.from(this.tracked)) this.cancel(job);
  }

  private cancel(job: Job): void {
    if (job.settled) return;
    if (!job.started) {
      const idx = this.backlog.indexOf(job);
      if (idx !== -1) this.backlog.splice(idx, 1);
    }
    // A running send keeps its slot until it finishes writing.
    this.settle(job, { status: "cancelled", connectionId: job.connection.id });
  }

  private start(job: Job): void {
    job.started = true;
    this.running++;
    const { connection } = job;

    let sending: Promise<void>;
    if (connection.state !== "open") {
      sending = Promise.reject(new Error("connection closed"));
    } else {
      try {
        sending = connection.send(job.payload);
      } catch (e) {
        sending = Promise.reject(e);
      }
    }

    void sending
      .then(
        () => this.settle(job, { status: "delivered", connectionId: connection.id }),
        (e: unknown) => {
          const error = new DeliveryError(`Delivery to ${connection.id} failed: ${errorMessage(e)}`, connection.id, {
            cause: e,
          });
          this.settle(job, { status: "failed", connectionId: connection.id, error });
        }
      )
      .finally(() => {
        this.running--;
        this.pump();
      });
  }

  private pump(): void {
    while (this.running < this.options.concurrency) {
      const next = this.backlog.shift();
      if (!next) return;
      if (next.settled) continue;
      this.start(next);
    }
  }

  private settle(job: Job, outcome: DeliveryOutcome): void {
    if (job.settled) return;
    job.settled = true;
    this.tracked.delete(job);
    job.resolve(outcome);
  }
}
