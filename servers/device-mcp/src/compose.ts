import { MultiDeviceCoordinator, type DeviceDriver } from "@fleet/coordination";
import { AdbDriver } from "@fleet/devices";
import { createLogger, ResourceLifecycleManager, ToolRegistry, type Logger, type ToolDef } from "@fleet/mcp-http";
import type { ServerConfig } from "./config.js";
import { makeCoordinationTools } from "./tools.coordination.js";
import { makeDeviceTools } from "./tools.device.js";

/** Everything the server owns, handed around explicitly. */
export interface ServerContext {
  config: ServerConfig;
  log: Logger;
  driver: DeviceDriver;
  registry: ToolRegistry;
  coordinator: MultiDeviceCoordinator;
  lifecycle: ResourceLifecycleManager;
}

export interface ContextOverrides {
  driver?: DeviceDriver;
  logger?: Logger;
}

export function composeTools(driver: DeviceDriver, coordinator: MultiDeviceCoordinator, localDeviceId?: string): ToolDef[] {
  return [
    ...makeDeviceTools({ driver, localDeviceId }),
    ...makeCoordinationTools({ coordinator, driver, localDeviceId }),
  ];
}

export function createServerContext(config: ServerConfig, overrides: ContextOverrides = {}): ServerContext {
  const log = overrides.logger ?? createLogger("device-mcp", { level: config.logLevel });
  const driver =
    overrides.driver ?? new AdbDriver({ adbPath: config.adbPath, timeoutMs: config.adbTimeoutMs, logger: log.child("adb") });

  const registry = new ToolRegistry(log.child("registry"));
  const coordinator = new MultiDeviceCoordinator({ driver, logger: log.child("coord"), localDeviceId: config.deviceId });
  const lifecycle = new ResourceLifecycleManager(log.child("lifecycle"));

  lifecycle.registerResource(driver);
  lifecycle.registerResource(coordinator);
  registry.registerAll(composeTools(driver, coordinator, config.deviceId));

  return { config, log, driver, registry, coordinator, lifecycle };
}
