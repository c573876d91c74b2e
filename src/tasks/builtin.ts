import type { Task } from '../runner/outcome';
import type { StorageRecord } from '../storage/storage-context';

export interface PrintTaskOptions {
  /** Storage key whose first character is printed (default: "symbol") */
  key?: string;
  /** Printed when the key is missing or not a non-empty string (default: ".") */
  fallback?: string;
  write?: (text: string) => void;
}

/** A task that prints one character per cycle and never stops on its own. */
export function createPrintTask(options: PrintTaskOptions = {}): Task<StorageRecord> {
  const key = options.key ?? 'symbol';
  const fallback = options.fallback ?? '.';
  const write = options.write ?? ((text: string) => void process.stdout.write(text));

  return (storage) => {
    const value = storage[key];
    write(typeof value === 'string' && value.length > 0 ? value[0] : fallback);
    return true;
  };
}
