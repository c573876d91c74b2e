import chalk from 'chalk';

/** Logger interface for runner observability */
export interface RunnerLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const LEVEL_COLORS: Record<Level, (text: string) => string> = {
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  DEBUG: chalk.gray,
};

/** Default console-based logger with runner-name prefix */
export class ConsoleRunnerLogger implements RunnerLogger {
  private prefix: string;

  constructor(runnerName?: string) {
    this.prefix = runnerName ? `[looprunner:${runnerName}]` : '[looprunner]';
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(this.format('DEBUG', message, data));
  }

  format(level: Level, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${LEVEL_COLORS[level](level.padEnd(5))} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}
