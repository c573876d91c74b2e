import type { Config } from './validator';

export const defaults: Config = {
  debug: false,
  runner: {
    autoStart: false,
    daemon: true,
    copyStorage: true,
    ignoreTaskFailures: false,
    intervalMs: 0,
  },
};
