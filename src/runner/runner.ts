import { prepareStorage, type StorageRecord } from '../storage/storage-context';
import { ConsoleRunnerLogger, type RunnerLogger } from '../logging/logger';
import { defaults } from '../config/defaults';
import { RunnerOptionsSchema, formatIssues } from '../config/validator';
import { ControlSignals } from './control-signals';
import { ExecutionLoop } from './execution-loop';
import { LifecycleMachine } from './lifecycle-machine';
import { RunnerEvents, type StateChangeEvent } from './events';
import { AlreadyStartedError, ConfigurationError, TaskFailure } from './errors';
import { isDebugOutputEnabled } from './debug';
import type { Task } from './outcome';
import { createPrintTask } from '../tasks/builtin';
import type { LifecycleState, StopReason } from './states';

// ── Options ─────────────────────────────────────────────────────────────

/** Construction options for a Runner */
export interface RunnerOptions {
  /** Start the execution loop from the constructor (default: false) */
  autoStart?: boolean;
  /** Let the process exit while this runner is alive (default: true) */
  daemon?: boolean;
  /** Deep-copy the initial storage before use (default: true) */
  copyStorage?: boolean;
  /** Log task failures and keep looping instead of stopping (default: false) */
  ignoreTaskFailures?: boolean;
  /** Wait between two task invocations, cut short by pause or kill (default: 0) */
  intervalMs?: number;
  /** Label used in logs and events (default: runner-<n>) */
  name?: string;
  /** Overrides the process-wide debug flag for this runner */
  debug?: boolean;
  /** Logger implementation (defaults to ConsoleRunnerLogger) */
  logger?: RunnerLogger;
}

export interface JoinResult {
  /** True when the timeout elapsed before the runner died */
  timedOut: boolean;
  state: LifecycleState;
  stopReason?: StopReason;
  /** The task failure that stopped the runner, if any */
  failure?: TaskFailure;
}

// Holds a non-daemon runner's process open; the callback never does anything.
const KEEP_ALIVE_INTERVAL_MS = 60_000;

let runnerCount = 0;

// ── Runner ──────────────────────────────────────────────────────────────

/**
 * Repeatedly invokes a task against a persistent Storage Context on its own
 * execution loop, until the task returns false, fails, or is killed.
 *
 * All controller methods may be called at any time and from any async
 * context. Pause and kill only take effect between two task invocations, so
 * their latency is at least the duration of the invocation in flight.
 */
export class Runner<S extends StorageRecord = StorageRecord> {
  readonly name: string;
  readonly events = new RunnerEvents();

  private readonly signals = new ControlSignals();
  private readonly machine: LifecycleMachine;
  private readonly loop: ExecutionLoop<S>;
  private readonly logger: RunnerLogger;
  private readonly daemon: boolean;
  private readonly debugOverride?: boolean;
  private readonly storageContext: S;
  private started = false;
  private keepAlive?: NodeJS.Timeout;
  private completion?: Promise<void>;

  /**
   * @param task Defaults to the built-in print task, which writes one `.` per cycle.
   * @param initialStorage Defaults to a fresh empty Storage Context.
   * @throws ConfigurationError when the options are invalid, or when the storage
   *   cannot be deep-copied and `copyStorage` is not false.
   */
  constructor(task: Task<S> = createPrintTask(), initialStorage?: S, options: RunnerOptions = {}) {
    const { logger, ...rest } = options;
    const parsed = RunnerOptionsSchema.safeParse(rest);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigurationError(`Invalid runner options: ${issues.join('; ')}`, undefined, issues);
    }

    const { name, debug, ...given } = parsed.data;
    const settings = {
      autoStart: given.autoStart ?? defaults.runner.autoStart,
      daemon: given.daemon ?? defaults.runner.daemon,
      copyStorage: given.copyStorage ?? defaults.runner.copyStorage,
      ignoreTaskFailures: given.ignoreTaskFailures ?? defaults.runner.ignoreTaskFailures,
      intervalMs: given.intervalMs ?? defaults.runner.intervalMs,
    };
    runnerCount++;
    this.name = name ?? `runner-${runnerCount}`;
    this.daemon = settings.daemon;
    this.debugOverride = debug;
    this.logger = logger ?? new ConsoleRunnerLogger(this.name);
    // An omitted storage is only well-typed for the default S; callers with their own S pass one
    this.storageContext = prepareStorage(initialStorage ?? ({} as S), settings.copyStorage);

    this.machine = new LifecycleMachine(this.name, this.events);
    this.events.on('stateChange', (event: StateChangeEvent) => {
      this.trace('State transition', { from: event.from, to: event.to, trigger: event.trigger });
    });

    this.loop = new ExecutionLoop<S>({
      runnerName: this.name,
      task,
      storage: this.storageContext,
      signals: this.signals,
      machine: this.machine,
      logger: this.logger,
      trace: (message, data) => this.trace(message, data),
      ignoreTaskFailures: settings.ignoreTaskFailures,
      intervalMs: settings.intervalMs,
      daemon: settings.daemon,
    });

    if (settings.autoStart) {
      this.start();
    }
  }

  // ── Public API ──────────────────────────────────────────────────────

  /** Spawn the execution loop: NotStarted → Running. */
  start(): void {
    if (this.started) {
      throw new AlreadyStartedError(this.name);
    }
    this.started = true;

    if (!this.daemon) {
      this.keepAlive = setInterval(() => undefined, KEEP_ALIVE_INTERVAL_MS);
    }

    this.logger.info('Starting runner', { daemon: this.daemon });
    this.completion = this.loop
      .run()
      .catch((error: unknown) => {
        this.logger.error('Runner exit handling failed', { error: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => {
        clearInterval(this.keepAlive);
        this.keepAlive = undefined;
      });
  }

  /**
   * Ask the loop to pause before its next task invocation. With
   * `waitUntilPaused`, settles once the loop is parked or has already died.
   * Before `start()` the request is only recorded.
   */
  async pause(waitUntilPaused = false): Promise<void> {
    if (this.signals.terminated) return;

    if (!this.signals.pauseRequested) {
      this.trace('Pause requested');
      this.signals.requestPause();
    }

    if (waitUntilPaused && this.started) {
      await this.signals.waitUntil((s) => s.paused || s.terminated);
    }
  }

  /** Withdraw a pause request; the loop resumes on its next check. */
  unpause(): void {
    if (!this.signals.pauseRequested) return;

    this.trace('Unpause requested');
    this.signals.clearPause();
  }

  /**
   * Ask the loop to die before its next task invocation. With
   * `waitUntilDead`, settles once it has. A no-op on a dead runner.
   */
  async kill(waitUntilDead = false): Promise<void> {
    if (this.signals.terminated) return;

    if (!this.signals.killRequested) {
      this.trace('Kill requested');
      this.signals.requestKill();
    }

    if (waitUntilDead && this.started) {
      await this.signals.waitUntil((s) => s.terminated);
    }
  }

  /** Wait for the runner to die. Never rejects; check `timedOut` and `failure`. */
  async join(timeoutMs?: number): Promise<JoinResult> {
    const dead = await this.signals.waitUntil((s) => s.terminated, timeoutMs);
    if (dead) {
      await this.completion;
    }

    return {
      timedOut: !dead,
      state: this.machine.getState(),
      stopReason: this.loop.getStopReason(),
      failure: this.loop.getFailure(),
    };
  }

  isAlive(): boolean {
    return this.started && !this.signals.terminated;
  }

  isPaused(): boolean {
    return this.signals.paused && this.signals.pauseRequested;
  }

  getState(): LifecycleState {
    return this.machine.getState();
  }

  /** Number of task invocations completed so far, failed ones included. */
  getCycleCount(): number {
    return this.loop.getCycleCount();
  }

  getFailure(): TaskFailure | undefined {
    return this.loop.getFailure();
  }

  getStopReason(): StopReason | undefined {
    return this.loop.getStopReason();
  }

  /**
   * The live Storage Context. Only the task writes it; read it while the
   * runner is paused or dead.
   */
  get storage(): S {
    return this.storageContext;
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private trace(message: string, data?: Record<string, unknown>): void {
    if (this.debugOverride ?? isDebugOutputEnabled()) {
      this.logger.debug(message, data);
    }
  }
}
