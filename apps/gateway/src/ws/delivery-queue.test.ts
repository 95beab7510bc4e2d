import { describe, it, expect } from "vitest";
import { FakeTransport, flush } from "../testing/fakes";
import { DeliveryQueue } from "./delivery-queue";
import { Connection } from "./registry";

function conn(id: string, transport = new FakeTransport()): Connection {
  return new Connection(transport, id);
}

describe("DeliveryQueue", () => {
  it("delivers to the transport", async () => {
    const q = new DeliveryQueue({ concurrency: 2, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();

    const h = q.schedule(conn("c1", t), { x: 1 });

    await expect(h.outcome).resolves.toEqual({ status: "delivered", connectionId: "c1" });
    expect(t.sent).toEqual([{ x: 1 }]);
    expect(q.pending).toBe(0);
  });

  it("runs at most `concurrency` sends at once", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();
    const held = t.holdSends();

    const a = q.schedule(conn("a", t), { n: 1 });
    const b = q.schedule(conn("b", t), { n: 2 });

    expect(t.send).toHaveBeenCalledTimes(1);
    expect(q.queued).toBe(1);
    expect(q.pending).toBe(2);

    held[0]?.resolve();
    await expect(a.outcome).resolves.toEqual({ status: "delivered", connectionId: "a" });
    await flush();
    expect(t.send).toHaveBeenCalledTimes(2);

    held[1]?.resolve();
    await expect(b.outcome).resolves.toEqual({ status: "delivered", connectionId: "b" });
    expect(t.sent).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it("reports a failed send as a DeliveryError", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();
    t.send.mockRejectedValueOnce(new Error("broken pipe"));

    const outcome = await q.schedule(conn("c1", t), {}).outcome;

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error.connectionId).toBe("c1");
      expect(outcome.error.message).toBe("Delivery to c1 failed: broken pipe");
    }
  });

  it("treats a synchronous throw from send as a failure", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();
    t.send.mockImplementationOnce(() => {
      throw new Error("boom");
    });

    const outcome = await q.schedule(conn("c1", t), {}).outcome;
    expect(outcome.status).toBe("failed");
  });

  it("drops the newest delivery when the backlog is full", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 1, overflow: "drop-newest" });
    const t = new FakeTransport();
    const held = t.holdSends();

    q.schedule(conn("a", t), {});
    const b = q.schedule(conn("b", t), {});
    const c = q.schedule(conn("c", t), {});

    await expect(c.outcome).resolves.toEqual({ status: "dropped", connectionId: "c" });
    held[0]?.resolve();
    await flush();
    held[1]?.resolve();
    await expect(b.outcome).resolves.toEqual({ status: "delivered", connectionId: "b" });
  });

  it("drops the oldest waiting delivery when the backlog is full", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 1, overflow: "drop-oldest" });
    const t = new FakeTransport();
    const held = t.holdSends();

    q.schedule(conn("a", t), {});
    const b = q.schedule(conn("b", t), {});
    const c = q.schedule(conn("c", t), {});

    await expect(b.outcome).resolves.toEqual({ status: "dropped", connectionId: "b" });
    held[0]?.resolve();
    await flush();
    held[1]?.resolve();
    await expect(c.outcome).resolves.toEqual({ status: "delivered", connectionId: "c" });
  });

  it("cancels a waiting delivery before it reaches the transport", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();
    const held = t.holdSends();

    q.schedule(conn("a", t), {});
    const b = q.schedule(conn("b", t), {});
    b.cancel();

    await expect(b.outcome).resolves.toEqual({ status: "cancelled", connectionId: "b" });
    held[0]?.resolve();
    await flush();
    expect(t.send).toHaveBeenCalledTimes(1);
  });

  it("cancelAll settles running and waiting deliveries", async () => {
    const q = new DeliveryQueue({ concurrency: 2, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();
    t.holdSends();

    const handles = ["a", "b", "c", "d"].map((id) => q.schedule(conn(id, t), {}));
    expect(q.pending).toBe(4);

    q.cancelAll();

    const outcomes = await Promise.all(handles.map((h) => h.outcome));
    expect(outcomes.map((o) => o.status)).toEqual(["cancelled", "cancelled", "cancelled", "cancelled"]);
    expect(q.pending).toBe(0);
    expect(q.queued).toBe(0);
    // Only the two already running ever reached the transport.
    expect(t.send).toHaveBeenCalledTimes(2);
  });

  it("does not send to a connection that closed while waiting", async () => {
    const q = new DeliveryQueue({ concurrency: 1, maxQueued: 10, overflow: "drop-oldest" });
    const t = new FakeTransport();
    const held = t.holdSends();
    const late = conn("late", t);

    q.schedule(conn("a", t), {});
    const h = q.schedule(late, {});
    late.state = "closed";
    held[0]?.resolve();

    const outcome = await h.outcome;
    expect(outcome.status).toBe("failed");
    expect(t.send).toHaveBeenCalledTimes(1);
  });

  it("rejects invalid limits", () => {
    expect(() => new DeliveryQueue({ concurrency: 0, maxQueued: 1, overflow: "drop-oldest" })).toThrow(RangeError);
  });
});
