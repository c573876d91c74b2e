// Process-wide: every runner, active or future, reads this on each trace.
let debugOutputEnabled = false;

export function isDebugOutputEnabled(): boolean {
  return debugOutputEnabled;
}

export function setDebugOutputEnabled(enabled: boolean): void {
  debugOutputEnabled = enabled;
}
