import { describeError, type Logger } from "./logger.js";

/** Anything holding resources; `cleanup` runs once at shutdown. */
export interface Controller {
  readonly name?: string;
  cleanup?(): void | Promise<void>;
}

/**
 * A background loop. `stop` only asks it to finish; a worker that ignores the
 * request keeps running, there is no way to kill it from here.
 */
export interface BackgroundWorker {
  readonly name?: string;
  stop(): void | Promise<void>;
  isRunning(): boolean;
}

export type TrackedResource = Controller | BackgroundWorker;

export function isWorker(ref: TrackedResource): ref is BackgroundWorker {
  return "stop" in ref && typeof ref.stop === "function";
}

type ShutdownSignal = "SIGTERM" | "SIGINT";

export interface SignalOptions {
  /** Runs after cleanup on SIGTERM/SIGINT. Defaults to exiting the process. */
  onSignal?: (signal: ShutdownSignal) => void;
}

export interface LifecycleOptions {
  /** How long cleanup waits for one worker's `stop` before moving on. */
  stopTimeoutMs?: number;
}

const labelOf = (ref: TrackedResource) => ref.name ?? ref.constructor.name;

export class ResourceLifecycleManager {
  private readonly controllers: Controller[] = [];
  private readonly workers: BackgroundWorker[] = [];
  private pending: Promise<void> | null = null;
  private readonly stopTimeoutMs: number;

  constructor(
    private readonly log: Logger,
    opts: LifecycleOptions = {}
  ) {
    this.stopTimeoutMs = opts.stopTimeoutMs ?? 2_000;
  }

  /** Returns false when the reference was already tracked. */
  registerResource(ref: TrackedResource): boolean {
    if (isWorker(ref)) {
      if (this.workers.includes(ref)) return false;
      this.workers.push(ref);
    } else {
      if (this.controllers.includes(ref)) return false;
      this.controllers.push(ref);
    }
    this.log.debug(`tracking ${labelOf(ref)}`);
    return true;
  }

  get tracked(): { controllers: number; workers: number } {
    return { controllers: this.controllers.length, workers: this.workers.length };
  }

  get cleanedUp(): boolean {
    return this.pending !== null;
  }

  /** Safe to call any number of times; every caller gets the same run. */
  cleanup(): Promise<void> {
    if (!this.pending) this.pending = this.run();
    return this.pending;
  }

  /**
   * Routes SIGTERM, SIGINT and a draining event loop (`beforeExit`) into
   * {@link cleanup}. Returns a function removing the handlers again.
   */
  installSignalHandlers(opts: SignalOptions = {}): () => void {
    const after = opts.onSignal ?? (() => process.exit(0));
    const onSignal = (signal: ShutdownSignal) => {
      this.log.info(`received ${signal}, cleaning up`);
      this.cleanup().then(
        () => after(signal),
        (e: unknown) => {
          this.log.error(`cleanup failed: ${describeError(e)}`);
          after(signal);
        }
      );
    };
    const onBeforeExit = () => {
      this.cleanup().catch((e: unknown) => this.log.error(`cleanup failed: ${describeError(e)}`));
    };

    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
    process.once("beforeExit", onBeforeExit);
    return () => {
      process.off("SIGTERM", onSignal);
      process.off("SIGINT", onSignal);
      process.off("beforeExit", onBeforeExit);
    };
  }

  private async run(): Promise<void> {
    this.log.info("cleaning up resources...");

    for (const w of this.workers) {
      try {
        if (!w.isRunning()) continue;
        this.log.debug(`stopping ${labelOf(w)}`);
        await this.stopWorker(w);
      } catch (e) {
        this.log.error(`failed to stop ${labelOf(w)}: ${describeError(e)}`);
      }
    }

    for (const c of this.controllers) {
      if (typeof c.cleanup !== "function") continue;
      try {
        this.log.debug(`cleaning up ${labelOf(c)}`);
        await c.cleanup();
      } catch (e) {
        this.log.error(`failed to clean up ${labelOf(c)}: ${describeError(e)}`);
      }
    }

    this.log.info("resource cleanup complete");
  }

  /** Waits at most `stopTimeoutMs`; a later rejection is still logged. */
  private async stopWorker(w: BackgroundWorker): Promise<void> {
    const stopped = Promise.resolve()
      .then(() => w.stop())
      .then(
        () => true,
        (e: unknown) => {
          this.log.error(`failed to stop ${labelOf(w)}: ${describeError(e)}`);
          return true;
        }
      );
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.stopTimeoutMs);
    });
    try {
      if (!(await Promise.race([stopped, expired]))) {
        this.log.warn(`${labelOf(w)} did not stop within ${this.stopTimeoutMs} ms, continuing`);
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
