import { execa, type ExecaChildProcess } from "execa";
import type { CommandResult, ConnectedDevice, DeviceDriver } from "@fleet/coordination";
import { createLogger, type Logger } from "@fleet/mcp-http";

export interface AdbDriverOptions {
  adbPath?: string;
  /** Per-command timeout when the caller does not give one. */
  timeoutMs?: number;
  logger?: Logger;
}

/** Parses the output of `adb devices` (header line, then `serial<TAB>status`). */
export function parseDevicesOutput(stdout: string): ConnectedDevice[] {
  const devices: ConnectedDevice[] = [];
  for (const raw of stdout.split("\n").slice(1)) {
    const line = raw.trim();
    if (!line) continue;
    const [serial, status] = line.split(/\s+/);
    if (serial && status) devices.push({ serial, status });
  }
  return devices;
}

/** Driver that shells out to the adb binary. */
export class AdbDriver implements DeviceDriver {
  readonly name = "AdbDriver";
  private readonly adbPath: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly running = new Set<ExecaChildProcess>();

  constructor(opts: AdbDriverOptions = {}) {
    this.adbPath = opts.adbPath ?? "adb";
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.log = opts.logger ?? createLogger("adb");
  }

  /** Runs `adb <args>`; failures come back as a non-zero exit code, never thrown. */
  async adb(args: string[], timeoutMs = this.timeoutMs): Promise<CommandResult> {
    this.log.debug(`exec: ${this.adbPath} ${args.join(" ")}`);
    const child = execa(this.adbPath, args, { timeout: timeoutMs, reject: false });
    this.running.add(child);
    try {
      const r = await child;
      if (r.timedOut) {
        this.log.warn(`timed out after ${timeoutMs} ms: ${args.join(" ")}`);
        return { stdout: r.stdout, stderr: `Command timed out after ${timeoutMs} ms`, exitCode: -1 };
      }
      if (r.failed && typeof r.exitCode !== "number") {
        return { stdout: "", stderr: r.stderr || `failed to start ${this.adbPath}`, exitCode: -2 };
      }
      return { stdout: r.stdout, stderr: r.stderr, exitCode: r.exitCode };
    } finally {
      this.running.delete(child);
    }
  }

  async version(): Promise<CommandResult> {
    return this.adb(["version"]);
  }

  async listDevices(): Promise<ConnectedDevice[]> {
    const r = await this.adb(["devices"]);
    if (r.exitCode !== 0) {
      this.log.warn(`adb devices failed: ${r.stderr.trim()}`);
      return [];
    }
    return parseDevicesOutput(r.stdout);
  }

  runCommand(deviceId: string, command: string, timeoutMs?: number): Promise<CommandResult> {
    return this.adb(["-s", deviceId, "shell", command], timeoutMs);
  }

  pullFile(deviceId: string, remotePath: string, localPath: string): Promise<CommandResult> {
    return this.adb(["-s", deviceId, "pull", remotePath, localPath]);
  }

  pushFile(deviceId: string, localPath: string, remotePath: string): Promise<CommandResult> {
    return this.adb(["-s", deviceId, "push", localPath, remotePath]);
  }

  /** Kills adb processes still in flight. */
  cleanup(): void {
    for (const child of this.running) {
      this.log.debug(`killing pid ${child.pid ?? "?"}`);
      child.kill();
    }
    this.running.clear();
  }
}
