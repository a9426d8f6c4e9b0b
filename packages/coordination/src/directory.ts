import type { ConnectedDevice, DeviceDriver } from "./types.js";

export const CONNECTED = "device";

/**
 * Answers "is this device connected right now". Every call asks the driver
 * again; nothing is cached.
 */
export class DeviceDirectory {
  constructor(private readonly driver: Pick<DeviceDriver, "listDevices">) {}

  async connected(): Promise<ConnectedDevice[]> {
    const all = await this.driver.listDevices();
    return all.filter((d) => d.status === CONNECTED);
  }

  async isConnected(deviceId: string): Promise<boolean> {
    return (await this.connected()).some((d) => d.serial === deviceId);
  }

  /** Ids from `ids` that are not currently connected, in input order. */
  async missing(ids: readonly string[]): Promise<string[]> {
    const serials = new Set((await this.connected()).map((d) => d.serial));
    return ids.filter((id) => !serials.has(id));
  }
}
