import { err, ok, type Result } from "@fleet/mcp-http";
import type { DeviceDirectory } from "./directory.js";
import { deviceUnavailable, invalidArgument, type CoordinationError } from "./types.js";
import { WaitQueue } from "./waitQueue.js";

export interface MailboxMessage {
  /** Epoch milliseconds. */
  timestamp: number;
  sender: string;
  content: string;
}

interface Mailbox {
  queue: MailboxMessage[];
  arrivals: WaitQueue;
}

export interface MailboxOptions {
  /** Sender recorded when `send` is not given one. */
  defaultSender?: string;
  now?: () => number;
}

/**
 * Per-device FIFO queues. Mailboxes are created on first use and live until
 * the process exits; only `clear` empties one.
 */
export class MailboxStore {
  private readonly boxes = new Map<string, Mailbox>();
  private readonly defaultSender: string;
  private readonly now: () => number;
  private closed = false;

  constructor(private readonly directory: DeviceDirectory, opts: MailboxOptions = {}) {
    this.defaultSender = opts.defaultSender ?? "unknown";
    this.now = opts.now ?? (() => Date.now());
  }

  async send(deviceId: string, content: string, sender?: string): Promise<Result<MailboxMessage, CoordinationError>> {
    if (!deviceId) return err(invalidArgument("target device id is required"));
    if (!content) return err(invalidArgument("message content must not be empty"));

    if (!(await this.directory.isConnected(deviceId))) {
      return err(deviceUnavailable(`Device ${deviceId} is not connected`));
    }

    const message: MailboxMessage = { timestamp: this.now(), sender: sender || this.defaultSender, content };
    const box = this.open(deviceId);
    box.queue.push(message);
    box.arrivals.wakeAll();
    return ok(message);
  }

  /**
   * Drains the mailbox. When it is empty, waits until a message arrives or
   * `timeoutMs` elapses (one deadline for the whole call), then returns
   * everything queued at that moment. A device never seen before gets its
   * mailbox created and is waited on like any other.
   */
  async receive(deviceId: string, timeoutMs: number): Promise<MailboxMessage[]> {
    const box = this.open(deviceId);
    const deadline = Date.now() + (timeoutMs > 0 ? timeoutMs : 0);
    // Another receiver may drain the arrival that woke us; wait again until the deadline.
    while (box.queue.length === 0 && !this.closed) {
      const left = deadline - Date.now();
      if (left <= 0) break;
      await box.arrivals.wait(left);
    }
    return box.queue.splice(0);
  }

  /** Empties the mailbox; returns how many messages were dropped. */
  clear(deviceId: string): number {
    return this.boxes.get(deviceId)?.queue.splice(0).length ?? 0;
  }

  pending(deviceId: string): number {
    return this.boxes.get(deviceId)?.queue.length ?? 0;
  }

  devices(): string[] {
    return [...this.boxes.keys()];
  }

  /** Drops every queued message and releases parked receivers. */
  cleanup(): void {
    this.closed = true;
    for (const box of this.boxes.values()) {
      box.queue.length = 0;
      box.arrivals.wakeAll();
    }
  }

  private open(deviceId: string): Mailbox {
    let box = this.boxes.get(deviceId);
    if (!box) {
      box = { queue: [], arrivals: new WaitQueue() };
      this.boxes.set(deviceId, box);
    }
    return box;
  }
}
