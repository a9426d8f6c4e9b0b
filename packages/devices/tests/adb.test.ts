import { beforeEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "@fleet/mcp-http";
import { AdbDriver, parseDevicesOutput } from "../src/index.js";

interface FakeRun {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  failed: boolean;
}

const state = vi.hoisted(() => {
  const calls: Array<{ file: string; args: string[]; timeout: unknown }> = [];
  const queue: FakeRun[] = [];
  return { calls, queue, killed: 0 };
});

vi.mock("execa", () => ({
  execa: (file: string, args: string[], opts: { timeout?: number }) => {
    state.calls.push({ file, args, timeout: opts.timeout });
    const run = state.queue.shift() ?? { stdout: "", stderr: "", exitCode: 0, timedOut: false, failed: false };
    return Object.assign(Promise.resolve(run), {
      pid: 4242,
      kill: () => {
        state.killed++;
        return true;
      },
    });
  },
}));

const done = (stdout: string, exitCode = 0, stderr = ""): FakeRun => ({
  stdout,
  stderr,
  exitCode,
  timedOut: false,
  failed: exitCode !== 0,
});

const driver = (timeoutMs?: number) =>
  new AdbDriver({ adbPath: "/opt/sdk/adb", timeoutMs, logger: createLogger("adb", { sink: () => {} }) });

beforeEach(() => {
  state.calls.length = 0;
  state.queue.length = 0;
});

describe("parseDevicesOutput", () => {
  it("skips the header and blank lines", () => {
    const out = "List of devices attached\nemulator-5554\tdevice\nR58M123\tunauthorized\n\n";
    expect(parseDevicesOutput(out)).toEqual([
      { serial: "emulator-5554", status: "device" },
      { serial: "R58M123", status: "unauthorized" },
    ]);
  });

  it("returns nothing for an empty listing", () => {
    expect(parseDevicesOutput("List of devices attached\n")).toEqual([]);
  });
});

describe("AdbDriver", () => {
  it("lists devices with every status", async () => {
    state.queue.push(done("List of devices attached\nemu-1\tdevice\nemu-2\toffline\n"));
    expect(await driver().listDevices()).toEqual([
      { serial: "emu-1", status: "device" },
      { serial: "emu-2", status: "offline" },
    ]);
    expect(state.calls[0]).toEqual({ file: "/opt/sdk/adb", args: ["devices"], timeout: 30_000 });
  });

  it("treats a failing listing as no devices", async () => {
    state.queue.push(done("", 1, "daemon not running"));
    expect(await driver().listDevices()).toEqual([]);
  });

  it("runs shell commands on the chosen device with the given timeout", async () => {
    state.queue.push(done("hello\n"));
    const r = await driver(5_000).runCommand("emu-1", "echo hello", 1_500);
    expect(r).toEqual({ stdout: "hello\n", stderr: "", exitCode: 0 });
    expect(state.calls[0]).toEqual({
      file: "/opt/sdk/adb",
      args: ["-s", "emu-1", "shell", "echo hello"],
      timeout: 1_500,
    });
  });

  it("falls back to its default timeout", async () => {
    await driver(5_000).runCommand("emu-1", "id");
    expect(state.calls[0]?.timeout).toBe(5_000);
  });

  it("reports a timeout as exit code -1", async () => {
    state.queue.push({ stdout: "partial", stderr: "", exitCode: 0, timedOut: true, failed: true });
    expect(await driver().runCommand("emu-1", "sleep 99", 500)).toEqual({
      stdout: "partial",
      stderr: "Command timed out after 500 ms",
      exitCode: -1,
    });
  });

  it("passes the device exit code through", async () => {
    state.queue.push(done("", 127, "sh: nope: not found"));
    expect(await driver().runCommand("emu-1", "nope")).toEqual({
      stdout: "",
      stderr: "sh: nope: not found",
      exitCode: 127,
    });
  });

  it("builds pull and push invocations", async () => {
    const d = driver();
    await d.pullFile("emu-1", "/sdcard/a.txt", "/tmp/a.txt");
    await d.pushFile("emu-2", "/tmp/a.txt", "/sdcard/a.txt");
    expect(state.calls.map((c) => c.args)).toEqual([
      ["-s", "emu-1", "pull", "/sdcard/a.txt", "/tmp/a.txt"],
      ["-s", "emu-2", "push", "/tmp/a.txt", "/sdcard/a.txt"],
    ]);
  });
});
