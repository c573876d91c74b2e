import type { LifecycleState } from './states';
import { Trigger, transitions } from './transitions';
import { RunnerEvents } from './events';

/**
 * Tracks the lifecycle of a single runner. Only the execution loop fires
 * triggers; the controller reads the state.
 */
export class LifecycleMachine {
  private state: LifecycleState = 'NotStarted';

  constructor(
    private runnerName: string,
    public events: RunnerEvents = new RunnerEvents(),
  ) {}

  getState(): LifecycleState {
    return this.state;
  }

  transition(trigger: Trigger): LifecycleState {
    const fromState = this.state;
    const nextState = transitions[fromState][trigger];

    if (!nextState) {
      throw new Error(`Invalid transition: Trigger [${trigger}] is not valid from state [${fromState}]`);
    }

    this.state = nextState;

    this.events.emitTransition({
      from: fromState,
      to: nextState,
      trigger,
      runner: this.runnerName,
      timestamp: new Date().toISOString(),
    });

    return nextState;
  }
}
