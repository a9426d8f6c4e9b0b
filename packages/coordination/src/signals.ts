import { err, ok, type Result } from "@fleet/mcp-http";
import { notFound, type CoordinationError } from "./types.js";
import { WaitQueue } from "./waitQueue.js";

export type SignalState = "unset" | "set";

interface Latch {
  state: SignalState;
  waiters: WaitQueue;
}

export interface SignalInfo {
  name: string;
  state: SignalState;
  waiting: number;
}

/**
 * Named one-shot latches. `set` wakes every waiter and stays set until
 * `release`; `wait` and `set` create the latch when it does not exist yet.
 */
export class SignalStore {
  private readonly latches = new Map<string, Latch>();

  /** Leaves an existing latch (and its waiters) untouched. */
  create(name: string): { created: boolean } {
    const existed = this.latches.has(name);
    this.latch(name);
    return { created: !existed };
  }

  async wait(name: string, timeoutMs: number): Promise<boolean> {
    const latch = this.latch(name);
    if (latch.state === "set") return true;
    if (timeoutMs <= 0) return false;
    return latch.waiters.wait(timeoutMs);
  }

  /** Returns the number of waiters released. */
  set(name: string): number {
    const latch = this.latch(name);
    latch.state = "set";
    return latch.waiters.wakeAll();
  }

  release(name: string): Result<SignalInfo, CoordinationError> {
    const latch = this.latches.get(name);
    if (!latch) return err(notFound(`Signal ${name} does not exist`));
    latch.state = "unset";
    return ok({ name, state: latch.state, waiting: latch.waiters.size });
  }

  state(name: string): SignalState | undefined {
    return this.latches.get(name)?.state;
  }

  list(): SignalInfo[] {
    return [...this.latches.entries()].map(([name, l]) => ({ name, state: l.state, waiting: l.waiters.size }));
  }

  /** Sets every latch so nobody stays parked through shutdown. */
  cleanup(): void {
    for (const name of this.latches.keys()) this.set(name);
  }

  private latch(name: string): Latch {
    let latch = this.latches.get(name);
    if (!latch) {
      latch = { state: "unset", waiters: new WaitQueue() };
      this.latches.set(name, latch);
    }
    return latch;
  }
}
