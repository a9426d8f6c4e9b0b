import type { Controller, Logger } from "@fleet/mcp-http";
import { Blackboard } from "./blackboard.js";
import { DeviceDirectory } from "./directory.js";
import { DeviceGroupStore } from "./groups.js";
import { MailboxStore } from "./mailboxes.js";
import { SignalStore } from "./signals.js";
import type { DeviceDriver } from "./types.js";

export interface CoordinatorOptions {
  driver: Pick<DeviceDriver, "listDevices" | "runCommand">;
  logger: Logger;
  /** Sender id stamped on messages sent without one. */
  localDeviceId?: string;
  now?: () => number;
}

/**
 * Shared state for cross-device work. Each of the four stores owns its own
 * maps and only mutates them synchronously, so a mutation never interleaves
 * with another on the same store; timed waits and device calls run outside
 * those mutations and never hold up unrelated callers.
 */
export class MultiDeviceCoordinator implements Controller {
  readonly name = "MultiDeviceCoordinator";
  readonly devices: DeviceDirectory;
  readonly mailboxes: MailboxStore;
  readonly signals: SignalStore;
  readonly groups: DeviceGroupStore;
  readonly blackboard: Blackboard;
  private readonly log: Logger;

  constructor(opts: CoordinatorOptions) {
    this.log = opts.logger;
    this.devices = new DeviceDirectory(opts.driver);
    this.mailboxes = new MailboxStore(this.devices, { defaultSender: opts.localDeviceId, now: opts.now });
    this.signals = new SignalStore();
    this.groups = new DeviceGroupStore(this.devices, opts.driver);
    this.blackboard = new Blackboard(opts.now);
  }

  cleanup(): void {
    this.log.info("releasing signals and mailboxes...");
    this.signals.cleanup();
    this.mailboxes.cleanup();
    this.log.info("coordinator cleanup complete");
  }
}
