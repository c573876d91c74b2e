// Node clamps longer timer delays to 1 ms
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface WaitOptions {
  /** Let the process exit while this wait's timer is pending. */
  unref?: boolean;
}

/**
 * Promise-based wait/notify primitive. Waiters park until `notifyAll()` is
 * called or their timeout elapses; nothing spins.
 */
export class Condition {
  private waiters = new Set<() => void>();

  notifyAll(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Resolves `true` when notified, `false` when `timeoutMs` elapses first.
   * Timeouts above `MAX_TIMER_DELAY_MS` are cut to it; `waitFor` re-arms
   * until its own deadline.
   */
  wait(timeoutMs?: number, options: WaitOptions = {}): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const wake = (): void => {
        if (timer) clearTimeout(timer);
        resolve(true);
      };
      this.waiters.add(wake);

      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () => {
            this.waiters.delete(wake);
            resolve(false);
          },
          Math.min(Math.max(0, timeoutMs), MAX_TIMER_DELAY_MS),
        );
        if (options.unref) timer.unref();
      }
    });
  }

  /**
   * Waits until `predicate` holds, re-checking after every notification.
   * Resolves `false` if the deadline passes first.
   */
  async waitFor(predicate: () => boolean, timeoutMs?: number, options: WaitOptions = {}): Promise<boolean> {
    const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;

    while (!predicate()) {
      const remaining = deadline === undefined ? undefined : deadline - Date.now();
      if (remaining !== undefined && remaining <= 0) {
        return false;
      }
      await this.wait(remaining, options);
    }

    return true;
  }
}
