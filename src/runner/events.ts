import { EventEmitter } from 'events';
import type { Trigger } from './transitions';
import type { LifecycleState, StopReason } from './states';
import type { TaskFailure } from './errors';

export interface StateChangeEvent {
  from: LifecycleState;
  to: LifecycleState;
  trigger: Trigger;
  runner: string;
  timestamp: string;
}

export interface ExitEvent {
  runner: string;
  reason: StopReason;
  cycles: number;
  failure?: TaskFailure;
}

/**
 * Emits `stateChange` on every lifecycle transition, `taskError` for each task
 * failure (ignored or not) and `exit` once the loop is dead.
 */
export class RunnerEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('stateChange', event);
  }

  emitTaskError(failure: TaskFailure): void {
    this.emit('taskError', failure);
  }

  emitExit(event: ExitEvent): void {
    this.emit('exit', event);
  }
}
