/** Longest delay a single Node timer accepts. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Parked callers of a timed wait. `wakeAll` resolves every current waiter with
 * true; a waiter whose timeout runs out first resolves with false. Timeouts
 * longer than one timer can hold are re-armed until they are used up.
 */
export class WaitQueue {
  private readonly waiters = new Set<(woken: boolean) => void>();

  wait(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const deadline = Date.now() + (timeoutMs > 0 ? timeoutMs : 0);
      let timer: NodeJS.Timeout | undefined;
      const done = (woken: boolean) => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve(woken);
      };
      const arm = () => {
        const left = deadline - Date.now();
        if (left <= 0) return done(false);
        timer = setTimeout(arm, Math.min(left, MAX_TIMER_MS));
      };
      this.waiters.add(done);
      arm();
    });
  }

  wakeAll(): number {
    const parked = [...this.waiters];
    for (const w of parked) w(true);
    return parked.length;
  }

  get size(): number {
    return this.waiters.size;
  }
}
