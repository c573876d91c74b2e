import { assertCopyable, prepareStorage } from '../../../src/storage/storage-context';
import { ConfigurationError } from '../../../src/runner/errors';
import { MessageQueue } from '../../../src/storage/message-queue';

describe('prepareStorage', () => {
  it('should hand back the same object when copying is off', () => {
    const storage = { queue: new MessageQueue<string>() };

    expect(prepareStorage(storage, false)).toBe(storage);
  });

  it('should deep-copy nested structures', () => {
    const storage = {
      tags: ['a'],
      lookup: new Map([['k', { hits: 1 }]]),
      when: new Date('2024-01-01T00:00:00Z'),
    };

    const copy = prepareStorage(storage, true);
    storage.tags.push('b');
    const original = storage.lookup.get('k');
    if (original) original.hits = 99;

    expect(copy.tags).toEqual(['a']);
    expect(copy.lookup.get('k')).toEqual({ hits: 1 });
    expect(copy.when).toBeInstanceOf(Date);
    expect(copy.when.getTime()).toBe(Date.parse('2024-01-01T00:00:00Z'));
  });

  it('should keep the key order', () => {
    const copy = prepareStorage({ b: 1, a: 2, c: 3 }, true);

    expect(Object.keys(copy)).toEqual(['b', 'a', 'c']);
  });

  it('should preserve reference cycles', () => {
    type Link = { name: string; self?: Link };
    const node: Link = { name: 'loop' };
    node.self = node;

    const copy = prepareStorage({ node }, true);

    expect(copy.node).not.toBe(node);
    expect(copy.node.self).toBe(copy.node);
  });
});

describe('assertCopyable', () => {
  it('should accept plain data', () => {
    expect(() =>
      assertCopyable({
        count: 1,
        label: 'x',
        big: BigInt(2),
        missing: undefined,
        nothing: null,
        set: new Set([1, 2]),
        pattern: /ab+c/i,
        bytes: new Uint8Array([1, 2, 3]),
        bare: Object.create(null),
      }),
    ).not.toThrow();
  });

  it('should name a top-level function', () => {
    expect(() => assertCopyable({ callback: () => 1 })).toThrow(ConfigurationError);
    expect(() => assertCopyable({ callback: () => 1 })).toThrow('Storage value at "callback" is a function and cannot be copied; pass copyStorage: false to share it as-is');
  });

  it('should report the path of a nested value', () => {
    try {
      assertCopyable({ items: [1, { handler: () => 1 }] });
      throw new Error('expected assertCopyable to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.path : undefined).toBe('items[1].handler');
    }
  });

  it('should reject symbols', () => {
    expect(() => assertCopyable({ tag: Symbol('tag') })).toThrow('Storage value at "tag" is a symbol');
  });

  it('should reject class instances', () => {
    expect(() => assertCopyable({ nested: { queue: new MessageQueue<number>() } })).toThrow('Storage value at "nested.queue" is an instance of MessageQueue');
  });

  it('should reject subclasses of Map and Array', () => {
    class Registry extends Map<string, number> {}
    class Stack extends Array<number> {}

    expect(() => assertCopyable({ registry: new Registry([['a', 1]]) })).toThrow('Storage value at "registry" is an instance of Registry');
    expect(() => assertCopyable({ stack: Stack.from([1, 2]) })).toThrow('Storage value at "stack" is an instance of Stack');
  });

  it('should reject a subclass of a typed array', () => {
    class Pixels extends Uint8Array {}

    expect(() => assertCopyable({ frame: { pixels: new Pixels(4) } })).toThrow('Storage value at "frame.pixels" is an instance of Pixels');
  });

  it('should reject promises', () => {
    expect(() => assertCopyable({ pending: Promise.resolve(1) })).toThrow('is an instance of Promise');
  });
});
