import { Condition } from '../runner/condition';

/**
 * In-process FIFO for handing messages to a running task. Share it through a
 * Storage Context created with `copyStorage: false`; as a class instance it
 * cannot be copied.
 */
export class MessageQueue<T> {
  private items: T[] = [];
  private readonly condition = new Condition();

  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    this.items.push(item);
    this.condition.notifyAll();
  }

  /**
   * Next item in FIFO order, waiting up to `timeoutMs` for one to arrive
   * (forever when omitted). Resolves `undefined` on timeout.
   */
  async get(timeoutMs?: number): Promise<T | undefined> {
    const available = await this.condition.waitFor(() => this.items.length > 0, timeoutMs, { unref: true });
    return available ? this.items.shift() : undefined;
  }
}
