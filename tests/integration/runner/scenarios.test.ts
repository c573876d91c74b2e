import { Runner } from '../../../src/runner/runner';
import { MessageQueue } from '../../../src/storage/message-queue';
import { createPrintTask } from '../../../src/tasks/builtin';
import { createSilentLogger, sleep, waitFor } from '../../helpers';

type Counter = { count: number };

describe('Runner scenarios', () => {
  it('should stay alive while the task keeps returning true', async () => {
    const runner = new Runner<Counter>((s) => ++s.count > 0, { count: 0 }, { logger: createSilentLogger(), intervalMs: 1, autoStart: true });

    await waitFor(() => runner.getCycleCount() >= 10);
    expect(runner.isAlive()).toBe(true);

    await runner.kill(true);
    expect(runner.isAlive()).toBe(false);
  });

  it('should count exactly five cycles when killed during the fifth', async () => {
    const runner: Runner<Counter> = new Runner<Counter>(
      (storage) => {
        storage.count++;
        if (storage.count === 5) {
          void runner.kill();
        }
        return true;
      },
      { count: 0 },
      { logger: createSilentLogger(), intervalMs: 5 },
    );

    runner.start();
    await runner.join();

    expect(runner.storage.count).toBe(5);
    expect(runner.isAlive()).toBe(false);
    expect(runner.getStopReason()).toBe('killed');
  });

  it('should not let one runner pause another', async () => {
    const logger = createSilentLogger();
    const first = new Runner<Counter>((s) => ++s.count > 0, { count: 0 }, { logger, intervalMs: 2, autoStart: true });
    const second = new Runner<Counter>((s) => ++s.count > 0, { count: 0 }, { logger, intervalMs: 2, autoStart: true });

    try {
      await waitFor(() => first.storage.count >= 2 && second.storage.count >= 2);
      await first.pause(true);
      const firstFrozen = first.storage.count;
      const secondBefore = second.storage.count;

      await sleep(50);

      expect(first.storage.count).toBe(firstFrozen);
      expect(second.storage.count).toBeGreaterThan(secondBefore);
      expect(second.isPaused()).toBe(false);
    } finally {
      await Promise.all([first.kill(true), second.kill(true)]);
    }
  });

  it('should isolate a copied storage from later changes to the original', async () => {
    type Tagged = { count: number; nested: { tags: string[] }; observed?: string };
    const original: Tagged = { count: 0, nested: { tags: ['a'] } };
    const runner = new Runner<Tagged>(
      (storage) => {
        storage.observed = `${storage.nested.tags.join(',')}:${storage.count}`;
        return false;
      },
      original,
      { logger: createSilentLogger() },
    );

    original.count = 100;
    original.nested.tags.push('b');
    runner.start();
    await runner.join();

    expect(runner.storage.observed).toBe('a:0');
    expect(original.observed).toBeUndefined();
  });

  it('should stay alive past a failing cycle only when failures are ignored', async () => {
    const failOnThird = (storage: Counter): boolean => {
      storage.count++;
      if (storage.count === 3) throw new Error('third cycle');
      return true;
    };
    const tolerant = new Runner<Counter>(failOnThird, { count: 0 }, { logger: createSilentLogger(), intervalMs: 1, ignoreTaskFailures: true, autoStart: true });
    const strict = new Runner<Counter>(failOnThird, { count: 0 }, { logger: createSilentLogger(), intervalMs: 1, autoStart: true });

    try {
      const strictResult = await strict.join(2000);
      await waitFor(() => tolerant.getCycleCount() > 5);

      expect(strictResult.timedOut).toBe(false);
      expect(strictResult.failure?.cycle).toBe(3);
      expect(strict.storage.count).toBe(3);
      expect(tolerant.isAlive()).toBe(true);
    } finally {
      await tolerant.kill(true);
    }
  });

  it('should deliver queued messages to a task sharing its storage', async () => {
    type Inbox = { queue: MessageQueue<string>; received: string[] };
    const storage: Inbox = { queue: new MessageQueue<string>(), received: [] };
    const runner = new Runner<Inbox>(
      async (s) => {
        const message = await s.queue.get(5);
        if (message === 'QUIT') return false;
        if (message !== undefined) s.received.push(message);
        return true;
      },
      storage,
      { logger: createSilentLogger(), copyStorage: false, autoStart: true },
    );

    storage.queue.put('HE');
    storage.queue.put('LLO');
    await sleep(20);
    storage.queue.put(' WORLD');
    storage.queue.put('QUIT');
    const result = await runner.join(2000);

    expect(result.stopReason).toBe('completed');
    expect(storage.received).toEqual(['HE', 'LLO', ' WORLD']);
  });

  it('should run the print task until killed', async () => {
    const written: string[] = [];
    const runner = new Runner(createPrintTask({ write: (text) => written.push(text) }), { symbol: 'X' }, { logger: createSilentLogger(), intervalMs: 1, autoStart: true });

    await waitFor(() => written.length >= 3);
    await runner.kill(true);

    expect(new Set(written)).toEqual(new Set(['X']));
  });

  it('should print a dot per cycle when no task is given', async () => {
    const writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    try {
      const runner = new Runner(undefined, {}, { logger: createSilentLogger(), intervalMs: 1, autoStart: true });
      const dots = (): number => writeSpy.mock.calls.filter(([chunk]) => chunk === '.').length;

      await waitFor(() => dots() >= 3);
      expect(runner.isAlive()).toBe(true);

      await runner.kill(true);
      expect(runner.isAlive()).toBe(false);
      expect(dots()).toBe(runner.getCycleCount());
    } finally {
      writeSpy.mockRestore();
    }
  });
});
