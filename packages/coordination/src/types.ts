/** A device as reported by the driver's listing. */
export interface ConnectedDevice {
  serial: string;
  /** "device" when usable; adb also reports "offline", "unauthorized", ... */
  status: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Collaborator contract for whatever talks to physical devices. The core only
 * looks at return values and thrown errors.
 */
export interface DeviceDriver {
  readonly name?: string;
  listDevices(): Promise<ConnectedDevice[]>;
  runCommand(deviceId: string, command: string, timeoutMs?: number): Promise<CommandResult>;
  pullFile(deviceId: string, remotePath: string, localPath: string): Promise<CommandResult>;
  pushFile(deviceId: string, localPath: string, remotePath: string): Promise<CommandResult>;
  cleanup?(): void | Promise<void>;
}

export type CoordinationErrorKind = "not_found" | "device_unavailable" | "invalid_argument";

export interface CoordinationError {
  kind: CoordinationErrorKind;
  message: string;
}

export const notFound = (message: string): CoordinationError => ({ kind: "not_found", message });
export const deviceUnavailable = (message: string): CoordinationError => ({ kind: "device_unavailable", message });
export const invalidArgument = (message: string): CoordinationError => ({ kind: "invalid_argument", message });
