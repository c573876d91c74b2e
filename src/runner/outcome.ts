import type { StorageRecord } from '../storage/storage-context';

/**
 * A task receives the runner's Storage Context and returns `true` to keep
 * running or `false` to stop. Throwing (or rejecting) is a task failure.
 */
export type Task<S extends StorageRecord = StorageRecord> = (storage: S) => boolean | Promise<boolean>;

export type CycleOutcome = { kind: 'continue' } | { kind: 'stop' } | { kind: 'failed'; error: unknown };

const CONTINUE: CycleOutcome = { kind: 'continue' };
const STOP: CycleOutcome = { kind: 'stop' };

/** Runs one task invocation and folds its result or exception into a `CycleOutcome`. */
export async function invokeTask<S extends StorageRecord>(task: Task<S>, storage: S): Promise<CycleOutcome> {
  try {
    const keepRunning = await task(storage);
    return keepRunning ? CONTINUE : STOP;
  } catch (error) {
    return { kind: 'failed', error };
  }
}
