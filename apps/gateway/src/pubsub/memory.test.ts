import { describe, it, expect } from "vitest";
import { AsyncInbox, isAbortError } from "./inbox";
import { MemoryBroker } from "./memory";

describe("AsyncInbox", () => {
  it("hands buffered messages out in order", async () => {
    const inbox = new AsyncInbox();
    inbox.push({ kind: "message", channel: "c", data: "1" });
    inbox.push({ kind: "message", channel: "c", data: "2" });

    expect(await inbox.next()).toEqual({ kind: "message", channel: "c", data: "1" });
    expect(await inbox.next()).toEqual({ kind: "message", channel: "c", data: "2" });
    expect(inbox.size).toBe(0);
  });

  it("wakes a waiting reader", async () => {
    const inbox = new AsyncInbox();
    const pending = inbox.next();
    inbox.push({ kind: "subscribe", channel: "c" });
    await expect(pending).resolves.toEqual({ kind: "subscribe", channel: "c" });
  });

  it("rejects a waiting reader when its signal aborts", async () => {
    const inbox = new AsyncInbox();
    const ac = new AbortController();
    const pending = inbox.next(ac.signal);
    ac.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);

    // The aborted reader no longer swallows messages.
    inbox.push({ kind: "message", channel: "c", data: "x" });
    expect(await inbox.next()).toEqual({ kind: "message", channel: "c", data: "x" });
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const inbox = new AsyncInbox();
    const ac = new AbortController();
    ac.abort();
    await expect(inbox.next(ac.signal)).rejects.toThrow("The operation was aborted");
  });

  it("rejects pending readers on close", async () => {
    const inbox = new AsyncInbox();
    const pending = inbox.next();
    inbox.close(new Error("closed"));
    await expect(pending).rejects.toThrow("closed");
  });
});

describe("MemoryBroker", () => {
  it("acknowledges a subscription", async () => {
    const client = new MemoryBroker().connect();
    await client.subscribe("gw");
    expect(await client.nextMessage()).toEqual({ kind: "subscribe", channel: "gw" });
  });

  it("delivers a publish to every subscribed client, publisher included", async () => {
    const broker = new MemoryBroker();
    const a = broker.connect();
    const b = broker.connect();
    const idle = broker.connect();
    await a.subscribe("gw");
    await b.subscribe("gw");
    await a.nextMessage();
    await b.nextMessage();

    await a.publish("gw", '{"x":1}');

    expect(await a.nextMessage()).toEqual({ kind: "message", channel: "gw", data: '{"x":1}' });
    expect(await b.nextMessage()).toEqual({ kind: "message", channel: "gw", data: '{"x":1}' });
    expect(idle.isSubscribed("gw")).toBe(false);
  });

  it("ignores other channels", () => {
    const broker = new MemoryBroker();
    const a = broker.connect();
    expect(broker.publish("elsewhere", "x")).toBe(0);
    expect(a.isSubscribed("elsewhere")).toBe(false);
  });

  it("stops delivering after unsubscribe", async () => {
    const broker = new MemoryBroker();
    const a = broker.connect();
    await a.subscribe("gw");
    await a.unsubscribe("gw");

    expect(broker.publish("gw", "x")).toBe(0);
    expect(await a.nextMessage()).toEqual({ kind: "subscribe", channel: "gw" });
    expect(await a.nextMessage()).toEqual({ kind: "unsubscribe", channel: "gw" });
  });

  it("keeps a bounded log", () => {
    const broker = new MemoryBroker();
    for (let i = 0; i < 250; i++) broker.publish("gw", String(i));
    const log = broker.getLog();
    expect(log).toHaveLength(200);
    expect(log[0]?.data).toBe("50");
  });

  it("honours a custom log size", () => {
    const broker = new MemoryBroker(2);
    for (const data of ["a", "b", "c"]) broker.publish("gw", data);
    expect(broker.getLog().map((m) => m.data)).toEqual(["b", "c"]);
  });

  it("refuses to publish after quit", async () => {
    const broker = new MemoryBroker();
    const a = broker.connect();
    await a.quit();
    await expect(a.publish("gw", "x")).rejects.toThrow("Broker client closed");
  });
});
