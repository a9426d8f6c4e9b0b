import type { DeviceDriver } from "@fleet/coordination";
import { defineTool, num, ok, optStr, RpcErrorCode, rpcError, str, type ToolDef } from "@fleet/mcp-http";
import { invalidParams, seconds } from "./lib/results.js";

export interface DeviceToolDeps {
  driver: DeviceDriver;
  localDeviceId?: string;
}

const INFO_PROPS = {
  model: "ro.product.model",
  manufacturer: "ro.product.manufacturer",
  androidVersion: "ro.build.version.release",
  sdk: "ro.build.version.sdk",
} as const;

export function makeDeviceTools({ driver, localDeviceId }: DeviceToolDeps): ToolDef[] {
  const target = (p: Record<string, unknown>) => optStr(p, "device_id") ?? localDeviceId;

  return [
    defineTool({
      name: "list_devices",
      doc: "List connected devices",
      handler: async () => ok({ devices: await driver.listDevices() }),
    }),

    defineTool({
      name: "execute_shell",
      doc: `Execute a shell command on a device
command: Shell command
device_id: Device to run on, defaults to the configured device
timeout: Seconds before the command is abandoned`,
      params: [
        { name: "command" },
        { name: "device_id", optional: true },
        { name: "timeout", type: "integer", default: 30 },
      ],
      handler: async (p) => {
        const deviceId = target(p);
        if (!deviceId) return invalidParams("device_id is required");
        const r = await driver.runCommand(deviceId, str(p, "command"), seconds(num(p, "timeout", 30)));
        return ok({ success: r.exitCode === 0, output: r.stdout, error: r.stderr, exitCode: r.exitCode });
      },
    }),

    defineTool({
      name: "get_device_info",
      doc: `Get model and OS version of a device
device_id: Device to inspect, defaults to the configured device`,
      params: [{ name: "device_id", optional: true }],
      handler: async (p) => {
        const deviceId = target(p);
        if (!deviceId) return invalidParams("device_id is required");
        const info: Record<string, string> = { serial: deviceId };
        for (const [field, prop] of Object.entries(INFO_PROPS)) {
          const r = await driver.runCommand(deviceId, `getprop ${prop}`);
          if (r.exitCode !== 0) {
            return rpcError(RpcErrorCode.ToolFailure, `Reading ${prop} failed: ${r.stderr.trim()}`);
          }
          info[field] = r.stdout.trim();
        }
        return ok(info);
      },
    }),
  ];
}
