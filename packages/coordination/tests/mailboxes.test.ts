import { describe, it, expect } from "vitest";
import { DeviceDirectory, MailboxStore } from "../src/index.js";
import { FakeDriver } from "../testing/index.js";

function setup(serials = ["emu-1", "emu-2"]) {
  const driver = new FakeDriver(serials, [{ serial: "emu-off", status: "offline" }]);
  let clock = 1_000;
  const store = new MailboxStore(new DeviceDirectory(driver), { defaultSender: "host", now: () => clock++ });
  return { driver, store };
}

describe("MailboxStore", () => {
  it("delivers messages in send order and drains on receive", async () => {
    const { store } = setup();
    await store.send("emu-1", "first", "emu-2");
    await store.send("emu-1", "second");

    expect(await store.receive("emu-1", 0)).toEqual([
      { timestamp: 1000, sender: "emu-2", content: "first" },
      { timestamp: 1001, sender: "host", content: "second" },
    ]);
    expect(await store.receive("emu-1", 0)).toEqual([]);
  });

  it("refuses devices that are not connected and creates no mailbox for them", async () => {
    const { store } = setup();
    const r = await store.send("emu-off", "hi");
    expect(r).toEqual({ ok: false, error: { kind: "device_unavailable", message: "Device emu-off is not connected" } });
    expect(store.devices()).toEqual([]);
  });

  it("rejects empty content and an empty target", async () => {
    const { store } = setup();
    expect(await store.send("emu-1", "")).toEqual({
      ok: false,
      error: { kind: "invalid_argument", message: "message content must not be empty" },
    });
    expect(await store.send("", "hi")).toEqual({
      ok: false,
      error: { kind: "invalid_argument", message: "target device id is required" },
    });
  });

  it("waits on a device nobody has sent to yet", async () => {
    const { store } = setup();
    const pending = store.receive("emu-2", 2_000);
    expect(store.devices()).toEqual(["emu-2"]);
    setTimeout(() => void store.send("emu-2", "first contact"), 30);
    expect((await pending).map((m) => m.content)).toEqual(["first contact"]);
    expect(store.pending("emu-2")).toBe(0);
  });

  it("returns at once for a zero timeout", async () => {
    const { store } = setup();
    expect(await store.receive("emu-2", 0)).toEqual([]);
  });

  it("waits on an empty mailbox until the timeout", async () => {
    const { store } = setup();
    await store.receive("emu-1", 0);
    const started = Date.now();
    expect(await store.receive("emu-1", 60)).toEqual([]);
    expect(Date.now() - started).toBeGreaterThanOrEqual(50);
  });

  it("wakes a parked receiver on the first arrival", async () => {
    const { store } = setup();
    await store.receive("emu-1", 0);
    const pending = store.receive("emu-1", 5_000);
    setTimeout(() => void store.send("emu-1", "ping"), 20);
    const got = await pending;
    expect(got.map((m) => m.content)).toEqual(["ping"]);
  });

  it("keeps a receiver waiting when another one drained the arrival", async () => {
    const { store } = setup();
    const first = store.receive("emu-1", 2_000);
    const second = store.receive("emu-1", 2_000);
    setTimeout(() => void store.send("emu-1", "a"), 20);
    setTimeout(() => void store.send("emu-1", "b"), 80);
    expect((await first).map((m) => m.content)).toEqual(["a"]);
    expect((await second).map((m) => m.content)).toEqual(["b"]);
  });

  it("gives up at the deadline when another receiver took the only message", async () => {
    const { store } = setup();
    const started = Date.now();
    const first = store.receive("emu-1", 2_000);
    const second = store.receive("emu-1", 150);
    setTimeout(() => void store.send("emu-1", "only"), 20);
    expect((await first).map((m) => m.content)).toEqual(["only"]);
    expect(await second).toEqual([]);
    expect(Date.now() - started).toBeGreaterThanOrEqual(140);
  });

  it("clear drops queued messages and reports how many", async () => {
    const { store } = setup();
    await store.send("emu-2", "a");
    await store.send("emu-2", "b");
    expect(store.pending("emu-2")).toBe(2);
    expect(store.clear("emu-2")).toBe(2);
    expect(store.clear("emu-2")).toBe(0);
    expect(store.clear("never-seen")).toBe(0);
  });

  it("checks connectivity on every send", async () => {
    const { driver, store } = setup();
    await store.send("emu-1", "a");
    driver.devices = [];
    const r = await store.send("emu-1", "b");
    expect(r.ok).toBe(false);
    expect(driver.listCalls).toBe(2);
  });
});
