import type { StorageRecord } from '../storage/storage-context';
import type { RunnerLogger } from '../logging/logger';
import { ControlSignals } from './control-signals';
import { LifecycleMachine } from './lifecycle-machine';
import { TaskFailure } from './errors';
import { invokeTask, type Task } from './outcome';
import type { StopReason } from './states';

export type TraceFn = (message: string, data?: Record<string, unknown>) => void;

export interface ExecutionLoopOptions<S extends StorageRecord> {
  runnerName: string;
  task: Task<S>;
  storage: S;
  signals: ControlSignals;
  machine: LifecycleMachine;
  logger: RunnerLogger;
  trace: TraceFn;
  ignoreTaskFailures: boolean;
  intervalMs: number;
  /** Unref the loop's own timers so they never hold the process open. */
  daemon: boolean;
}

/**
 * The invoke-task / check-signals cycle of one runner.
 *
 * Signals are only looked at between invocations: a task that is in progress
 * is never interrupted, so pause and kill latency is bounded below by the
 * task's own per-call duration, and at most one invocation completes after a
 * request is made.
 */
export class ExecutionLoop<S extends StorageRecord> {
  private cycles = 0;
  private failure?: TaskFailure;
  private stopReason?: StopReason;

  constructor(private readonly options: ExecutionLoopOptions<S>) {}

  getCycleCount(): number {
    return this.cycles;
  }

  getFailure(): TaskFailure | undefined {
    return this.failure;
  }

  getStopReason(): StopReason | undefined {
    return this.stopReason;
  }

  /** Never rejects: whatever happens, the loop ends with `terminated` set. */
  async run(): Promise<void> {
    const { machine, logger } = this.options;

    try {
      machine.transition('START');
      await this.cycle();
    } catch (error) {
      // Only reachable through a bug in the loop itself, not through the task
      logger.error('Execution loop crashed', { error: error instanceof Error ? error.message : String(error) });
      this.failure ??= new TaskFailure(error, this.cycles, this.options.runnerName);
      this.stopReason ??= 'failed';
    } finally {
      this.finish();
    }

    logger.info('Runner exited', { reason: this.stopReason, cycles: this.cycles });
    machine.events.emitExit({
      runner: this.options.runnerName,
      reason: this.stopReason ?? 'failed',
      cycles: this.cycles,
      failure: this.failure,
    });
  }

  private async cycle(): Promise<void> {
    const { signals, trace } = this.options;

    for (;;) {
      // 1. Kill
      if (signals.killRequested) {
        trace('Kill request observed', { cycles: this.cycles });
        this.stop('killed');
        return;
      }

      // 2. Pause
      if (signals.pauseRequested) {
        trace('Pause request observed', { cycles: this.cycles });
        await this.parkWhilePaused();
        continue;
      }

      // 3. Task
      const outcome = await invokeTask(this.options.task, this.options.storage);
      this.cycles++;

      if (outcome.kind === 'stop') {
        trace('Task asked to stop', { cycles: this.cycles });
        this.stop('completed');
        return;
      }

      if (outcome.kind === 'failed' && !this.handleFailure(outcome.error)) {
        return;
      }

      await this.betweenCycles();
    }
  }

  private async parkWhilePaused(): Promise<void> {
    const { machine, signals, trace } = this.options;

    machine.transition('PAUSE');
    signals.markPaused(true);

    await signals.waitUntil((s) => !s.pauseRequested || s.killRequested);

    if (signals.killRequested) {
      // `paused` stays set until markTerminated() in finish()
      return;
    }

    trace('Resume observed', { cycles: this.cycles });
    signals.markPaused(false);
    machine.transition('RESUME');
  }

  /** Returns whether the loop keeps going. */
  private handleFailure(error: unknown): boolean {
    const { logger, runnerName, ignoreTaskFailures, machine } = this.options;
    const failure = new TaskFailure(error, this.cycles, runnerName);
    machine.events.emitTaskError(failure);

    if (ignoreTaskFailures) {
      logger.warn(`Ignoring task failure on cycle ${failure.cycle}`, { error: describe(error) });
      return true;
    }

    logger.error(`Task failed on cycle ${failure.cycle}; stopping`, { error: describe(error) });
    this.failure = failure;
    this.stop('failed');
    return false;
  }

  private async betweenCycles(): Promise<void> {
    const { signals, intervalMs, daemon } = this.options;

    if (intervalMs > 0) {
      // Cut short by a pause or kill request so it is seen without waiting out the interval
      await signals.waitUntil((s) => s.killRequested || s.pauseRequested, intervalMs, { unref: daemon });
      return;
    }

    await new Promise<void>((resolve) => {
      const handle = setImmediate(resolve);
      if (daemon) handle.unref();
    });
  }

  private stop(reason: StopReason): void {
    this.stopReason = reason;
    this.options.machine.transition('STOP');
  }

  private finish(): void {
    const { machine, signals } = this.options;

    try {
      const state = machine.getState();
      if (state === 'Running' || state === 'PausedWaiting') {
        machine.transition('STOP');
      }
      if (machine.getState() === 'Stopping') {
        machine.transition('FINISH');
      }
    } finally {
      signals.markTerminated();
      this.options.trace('Terminated', { reason: this.stopReason, cycles: this.cycles });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
