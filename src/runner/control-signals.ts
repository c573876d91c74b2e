import { Condition, type WaitOptions } from './condition';

/**
 * The only state shared between a runner's controller and its execution loop.
 * The controller writes the requests, the loop writes the observed flags, and
 * every write wakes whoever is waiting on the condition.
 */
export class ControlSignals {
  private pauseRequestedFlag = false;
  private killRequestedFlag = false;
  private pausedFlag = false;
  private terminatedFlag = false;
  private readonly condition = new Condition();

  get pauseRequested(): boolean {
    return this.pauseRequestedFlag;
  }

  get killRequested(): boolean {
    return this.killRequestedFlag;
  }

  get paused(): boolean {
    return this.pausedFlag;
  }

  get terminated(): boolean {
    return this.terminatedFlag;
  }

  // ── Controller side ─────────────────────────────────────────────────

  requestPause(): void {
    this.set(() => (this.pauseRequestedFlag = true));
  }

  clearPause(): void {
    this.set(() => (this.pauseRequestedFlag = false));
  }

  requestKill(): void {
    this.set(() => (this.killRequestedFlag = true));
  }

  // ── Loop side ───────────────────────────────────────────────────────

  markPaused(paused: boolean): void {
    this.set(() => (this.pausedFlag = paused));
  }

  markTerminated(): void {
    this.set(() => {
      this.pausedFlag = false;
      this.terminatedFlag = true;
    });
  }

  // ── Waiting ─────────────────────────────────────────────────────────

  waitUntil(predicate: (signals: ControlSignals) => boolean, timeoutMs?: number, options?: WaitOptions): Promise<boolean> {
    return this.condition.waitFor(() => predicate(this), timeoutMs, options);
  }

  private set(write: () => void): void {
    write();
    this.condition.notifyAll();
  }
}
