import { describe, it, expect } from "vitest";
import { DeviceDirectory, DeviceGroupStore } from "../src/index.js";
import { FakeDriver } from "../testing/index.js";

function setup() {
  const driver = new FakeDriver(["emu-1", "emu-2", "emu-3"]);
  return { driver, groups: new DeviceGroupStore(new DeviceDirectory(driver), driver) };
}

describe("DeviceGroupStore", () => {
  it("stores a copy of the member list", async () => {
    const { groups } = setup();
    const ids = ["emu-1", "emu-2"];
    expect(await groups.create("pair", ids)).toEqual({ ok: true, value: { name: "pair", deviceIds: ["emu-1", "emu-2"] } });
    ids.push("emu-3");
    expect(groups.get("pair")).toEqual({ name: "pair", deviceIds: ["emu-1", "emu-2"] });
  });

  it("stores nothing when a member is not connected", async () => {
    const { groups } = setup();
    const r = await groups.create("bad", ["emu-1", "ghost", "gone"]);
    expect(r).toEqual({ ok: false, error: { kind: "device_unavailable", message: "Device ghost, gone is not connected" } });
    expect(groups.list()).toEqual([]);
  });

  it("rejects an empty name or member list", async () => {
    const { groups } = setup();
    expect(await groups.create("", ["emu-1"])).toEqual({
      ok: false,
      error: { kind: "invalid_argument", message: "group name is required" },
    });
    expect(await groups.create("empty", [])).toEqual({
      ok: false,
      error: { kind: "invalid_argument", message: "device id list must not be empty" },
    });
  });

  it("runs a command on each member in order and keeps going after a failure", async () => {
    const { driver, groups } = setup();
    driver.onCommand = (deviceId, command) => {
      if (deviceId === "emu-2") return new Error("usb reset");
      if (deviceId === "emu-3") return { stdout: "", stderr: "not found", exitCode: 127 };
      return { stdout: `ran ${command}`, stderr: "", exitCode: 0 };
    };
    await groups.create("all", ["emu-1", "emu-2", "emu-3"]);

    const r = await groups.execute("all", "uptime", 2_000);
    if (!r.ok) throw new Error(r.error.message);
    expect(r.value.map((x) => x.deviceId)).toEqual(["emu-1", "emu-2", "emu-3"]);
    expect(r.value[0]).toEqual({ deviceId: "emu-1", success: true, output: "ran uptime", error: "" });
    expect(r.value[1]).toMatchObject({ deviceId: "emu-2", success: false, output: "" });
    expect(r.value[1]?.error).toContain("usb reset");
    expect(r.value[2]).toEqual({ deviceId: "emu-3", success: false, output: "", error: "not found" });
    expect(driver.commands.map((c) => c.timeoutMs)).toEqual([2_000, 2_000, 2_000]);
  });

  it("does not recheck connectivity when executing", async () => {
    const { driver, groups } = setup();
    await groups.create("one", ["emu-1"]);
    driver.devices = [];
    const r = await groups.execute("one", "id");
    expect(r.ok).toBe(true);
  });

  it("execute and delete report unknown groups", async () => {
    const { groups } = setup();
    const missing = { ok: false, error: { kind: "not_found", message: "Device group nope does not exist" } };
    expect(await groups.execute("nope", "id")).toEqual(missing);
    expect(groups.delete("nope")).toEqual(missing);
  });

  it("create replaces an existing group and delete removes it", async () => {
    const { groups } = setup();
    await groups.create("g", ["emu-1"]);
    await groups.create("g", ["emu-2", "emu-3"]);
    expect(groups.list()).toEqual([{ name: "g", deviceIds: ["emu-2", "emu-3"] }]);
    expect(groups.delete("g").ok).toBe(true);
    expect(groups.get("g")).toBeUndefined();
  });
});
