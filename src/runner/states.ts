export type ActiveState = 'Running' | 'PausedWaiting' | 'Stopping';

export type LifecycleState = 'NotStarted' | ActiveState | 'Dead';

/** Why the execution loop left `Running` for good. */
export type StopReason = 'killed' | 'completed' | 'failed';
