import type { LifecycleState } from './states';

export type Trigger = 'START' | 'PAUSE' | 'RESUME' | 'STOP' | 'FINISH';

export const transitions: Record<LifecycleState, Partial<Record<Trigger, LifecycleState>>> = {
  NotStarted: { START: 'Running' },
  Running: { PAUSE: 'PausedWaiting', STOP: 'Stopping' },
  PausedWaiting: { RESUME: 'Running', STOP: 'Stopping' },
  Stopping: { FINISH: 'Dead' },
  Dead: {},
};
