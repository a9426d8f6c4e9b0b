export { MultiDeviceCoordinator, type CoordinatorOptions } from "./coordinator.js";
export { MailboxStore, type MailboxMessage, type MailboxOptions } from "./mailboxes.js";
export { SignalStore, type SignalInfo, type SignalState } from "./signals.js";
export { DeviceGroupStore, type CommandRunner, type DeviceGroup, type GroupCommandResult } from "./groups.js";
export { Blackboard, type BlackboardEntry } from "./blackboard.js";
export { DeviceDirectory, CONNECTED } from "./directory.js";
export { WaitQueue, MAX_TIMER_MS } from "./waitQueue.js";
export * from "./types.js";
