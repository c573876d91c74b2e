export class RunnerError extends Error {
  constructor(
    message: string,
    public runnerName?: string,
  ) {
    super(message);
    this.name = 'RunnerError';
  }
}

export class ConfigurationError extends RunnerError {
  constructor(
    message: string,
    public path?: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class AlreadyStartedError extends RunnerError {
  constructor(runnerName: string) {
    super(`Runner ${runnerName} has already been started`, runnerName);
    this.name = 'AlreadyStartedError';
  }
}

/** Wraps whatever a task threw (or rejected with) together with the cycle it happened on. */
export class TaskFailure extends RunnerError {
  constructor(
    public error: unknown,
    public cycle: number,
    runnerName?: string,
  ) {
    super(`Task failed on cycle ${cycle}: ${error instanceof Error ? error.message : String(error)}`, runnerName);
    this.name = 'TaskFailure';
  }
}
