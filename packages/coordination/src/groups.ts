import { describeError, err, ok, type Result } from "@fleet/mcp-http";
import type { DeviceDirectory } from "./directory.js";
import {
  deviceUnavailable,
  invalidArgument,
  notFound,
  type CoordinationError,
  type DeviceDriver,
} from "./types.js";

export interface DeviceGroup {
  name: string;
  deviceIds: string[];
}

export interface GroupCommandResult {
  deviceId: string;
  success: boolean;
  output: string;
  error: string;
}

export type CommandRunner = Pick<DeviceDriver, "runCommand">;

export class DeviceGroupStore {
  private readonly groups = new Map<string, string[]>();

  constructor(
    private readonly directory: DeviceDirectory,
    private readonly runner: CommandRunner
  ) {}

  /**
   * Creates (or replaces) a group. Every member must be connected now; if one
   * is missing nothing is stored.
   */
  async create(name: string, deviceIds: readonly string[]): Promise<Result<DeviceGroup, CoordinationError>> {
    if (!name) return err(invalidArgument("group name is required"));
    if (deviceIds.length === 0) return err(invalidArgument("device id list must not be empty"));

    const missing = await this.directory.missing(deviceIds);
    if (missing.length > 0) {
      return err(deviceUnavailable(`Device ${missing.join(", ")} is not connected`));
    }

    const members = [...deviceIds];
    this.groups.set(name, members);
    return ok({ name, deviceIds: [...members] });
  }

  list(): DeviceGroup[] {
    return [...this.groups.entries()].map(([name, ids]) => ({ name, deviceIds: [...ids] }));
  }

  get(name: string): DeviceGroup | undefined {
    const ids = this.groups.get(name);
    return ids ? { name, deviceIds: [...ids] } : undefined;
  }

  /**
   * Runs `command` on each member in order. A failing device is recorded and
   * the rest still run.
   */
  async execute(
    name: string,
    command: string,
    timeoutMs?: number
  ): Promise<Result<GroupCommandResult[], CoordinationError>> {
    if (!command) return err(invalidArgument("command is required"));
    const members = this.groups.get(name);
    if (!members) return err(notFound(`Device group ${name} does not exist`));

    const snapshot = [...members];
    const results: GroupCommandResult[] = [];
    for (const deviceId of snapshot) {
      try {
        const r = await this.runner.runCommand(deviceId, command, timeoutMs);
        results.push({ deviceId, success: r.exitCode === 0, output: r.stdout, error: r.stderr });
      } catch (e) {
        results.push({ deviceId, success: false, output: "", error: describeError(e) });
      }
    }
    return ok(results);
  }

  delete(name: string): Result<DeviceGroup, CoordinationError> {
    const ids = this.groups.get(name);
    if (!ids) return err(notFound(`Device group ${name} does not exist`));
    this.groups.delete(name);
    return ok({ name, deviceIds: ids });
  }
}
