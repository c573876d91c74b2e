export { Runner } from './runner/runner';
export type { RunnerOptions, JoinResult } from './runner/runner';
export type { Task, CycleOutcome } from './runner/outcome';
export type { LifecycleState, StopReason } from './runner/states';
export type { Trigger } from './runner/transitions';
export { RunnerEvents } from './runner/events';
export type { StateChangeEvent, ExitEvent } from './runner/events';
export { RunnerError, ConfigurationError, AlreadyStartedError, TaskFailure } from './runner/errors';
export { isDebugOutputEnabled, setDebugOutputEnabled } from './runner/debug';
export { assertCopyable, prepareStorage } from './storage/storage-context';
export type { StorageRecord } from './storage/storage-context';
export { MessageQueue } from './storage/message-queue';
export { ConsoleRunnerLogger } from './logging/logger';
export type { RunnerLogger } from './logging/logger';
export { loadConfig, applyConfig } from './config/loader';
export type { LoadConfigOptions, DeepPartial } from './config/loader';
export type { Config, RunnerSettings } from './config/validator';
export { createPrintTask } from './tasks/builtin';
