import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { DeviceDriver, MultiDeviceCoordinator } from "@fleet/coordination";
import { defineTool, num, ok, optStr, RpcErrorCode, rpcError, str, strList, type ToolDef } from "@fleet/mcp-http";
import { fromCoordination, invalidParams, seconds } from "./lib/results.js";

export interface CoordinationToolDeps {
  coordinator: MultiDeviceCoordinator;
  driver: Pick<DeviceDriver, "pullFile" | "pushFile">;
  /** Fallback device id when a call leaves `device_id` out. */
  localDeviceId?: string;
}

export function makeCoordinationTools({ coordinator: c, driver, localDeviceId }: CoordinationToolDeps): ToolDef[] {
  const messaging = defineTool({
    name: "device_messaging",
    doc: `Send, receive or clear messages between devices
action: send puts a message in a device mailbox, receive drains it, clear empties it
device_id: Target device for send, mailbox owner for receive and clear
message: Message content, required for send
sender: Sender id recorded with the message
timeout: Seconds receive waits for a first message when the mailbox is empty`,
    params: [
      { name: "action", enum: ["send", "receive", "clear"] },
      { name: "device_id", optional: true },
      { name: "message", optional: true },
      { name: "sender", optional: true },
      { name: "timeout", type: "number", default: 5 },
    ],
    handler: async (p) => {
      const deviceId = optStr(p, "device_id") ?? localDeviceId;
      if (!deviceId) return invalidParams("device_id is required");

      switch (str(p, "action")) {
        case "send": {
          const r = await c.mailboxes.send(deviceId, str(p, "message"), optStr(p, "sender"));
          return fromCoordination(r, (sent) => ({ success: true, message: "Message sent", sent }));
        }
        case "receive": {
          const messages = await c.mailboxes.receive(deviceId, seconds(num(p, "timeout", 5)));
          return ok({ success: true, messages });
        }
        case "clear": {
          const cleared = c.mailboxes.clear(deviceId);
          return ok({ success: true, cleared, message: cleared ? "Messages cleared" : "No messages to clear" });
        }
        default:
          return invalidParams(`Unsupported action: ${str(p, "action")}`);
      }
    },
  });

  const sync = defineTool({
    name: "sync_operations",
    doc: `Synchronize work across devices with named one-shot signals
action: create makes a signal, wait blocks until it is set, set fires it, release resets it
lock_name: Signal name
timeout: Seconds wait blocks before giving up`,
    params: [
      { name: "action", enum: ["create", "wait", "set", "release"] },
      { name: "lock_name" },
      { name: "timeout", type: "number", default: 30 },
    ],
    handler: async (p) => {
      const name = str(p, "lock_name");
      if (!name) return invalidParams("lock_name is required");

      switch (str(p, "action")) {
        case "create": {
          const { created } = c.signals.create(name);
          return ok({ success: true, created, message: created ? `Signal ${name} created` : `Signal ${name} already exists` });
        }
        case "wait": {
          const fired = await c.signals.wait(name, seconds(num(p, "timeout", 30)));
          return ok({
            success: fired,
            message: fired ? `Signal ${name} fired` : `Timed out waiting for signal ${name}`,
          });
        }
        case "set": {
          const released = c.signals.set(name);
          return ok({ success: true, released, message: `Signal ${name} set` });
        }
        case "release":
          return fromCoordination(c.signals.release(name), () => ({ success: true, message: `Signal ${name} released` }));
        default:
          return invalidParams(`Unsupported action: ${str(p, "action")}`);
      }
    },
  });

  const groups = defineTool({
    name: "device_group_actions",
    doc: `Manage device groups and run a shell command on every member
action: create, list, execute or delete
group_name: Group name, required except for list
device_ids: Member device ids for create
command: Shell command for execute`,
    params: [
      { name: "action", enum: ["create", "list", "execute", "delete"] },
      { name: "group_name", optional: true },
      { name: "device_ids", type: "array", items: "string", optional: true },
      { name: "command", optional: true },
    ],
    handler: async (p) => {
      const action = str(p, "action");
      if (action === "list") return ok({ success: true, groups: c.groups.list() });

      const name = str(p, "group_name");
      if (!name) return invalidParams("group_name is required");

      switch (action) {
        case "create": {
          const r = await c.groups.create(name, strList(p, "device_ids"));
          return fromCoordination(r, (group) => ({ success: true, message: `Device group ${name} created`, group }));
        }
        case "execute": {
          const r = await c.groups.execute(name, str(p, "command"));
          return fromCoordination(r, (results) => ({ success: true, results }));
        }
        case "delete":
          return fromCoordination(c.groups.delete(name), () => ({ success: true, message: `Device group ${name} deleted` }));
        default:
          return invalidParams(`Unsupported action: ${action}`);
      }
    },
  });

  const share = defineTool({
    name: "share_between_devices",
    doc: `Share data or files between devices
action: share_data stores a value, get_data reads it back, copy_file copies a file from one device to another
data_key: Blackboard key for share_data and get_data
data_value: Value stored by share_data
source_device: Device the file is copied from
target_device: Device the file is copied to
device_path: File path on both devices`,
    params: [
      { name: "action", enum: ["share_data", "get_data", "copy_file"] },
      { name: "data_key", optional: true },
      { name: "data_value", type: "json", optional: true },
      { name: "source_device", optional: true },
      { name: "target_device", optional: true },
      { name: "device_path", optional: true },
    ],
    handler: async (p) => {
      switch (str(p, "action")) {
        case "share_data": {
          const key = str(p, "data_key");
          if (!key) return invalidParams("data_key is required");
          if (p.data_value === undefined || p.data_value === null) return invalidParams("data_value is required");
          c.blackboard.share(key, p.data_value);
          return ok({ success: true, message: `Data shared under key ${key}` });
        }
        case "get_data": {
          const key = str(p, "data_key");
          if (!key) return invalidParams("data_key is required");
          return fromCoordination(c.blackboard.get(key), (data) => ({ success: true, data }));
        }
        case "copy_file":
          return copyFile(str(p, "source_device"), str(p, "target_device"), str(p, "device_path"));
        default:
          return invalidParams(`Unsupported action: ${str(p, "action")}`);
      }
    },
  });

  async function copyFile(source: string, target: string, devicePath: string) {
    if (!source || !target || !devicePath) {
      return invalidParams("source_device, target_device and device_path are required");
    }
    const missing = await c.devices.missing([source, target]);
    if (missing.length > 0) {
      return rpcError(RpcErrorCode.DeviceUnavailable, `Device ${missing.join(", ")} is not connected`);
    }

    const dir = await mkdtemp(path.join(tmpdir(), "fleet-copy-"));
    try {
      const local = path.join(dir, path.posix.basename(devicePath) || "file");
      const pulled = await driver.pullFile(source, devicePath, local);
      if (pulled.exitCode !== 0) {
        return rpcError(RpcErrorCode.ToolFailure, `Pulling from source device failed: ${pulled.stderr.trim()}`);
      }
      const pushed = await driver.pushFile(target, local, devicePath);
      if (pushed.exitCode !== 0) {
        return rpcError(RpcErrorCode.ToolFailure, `Pushing to target device failed: ${pushed.stderr.trim()}`);
      }
      return ok({ success: true, message: "File copied to target device" });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  return [messaging, sync, groups, share];
}
