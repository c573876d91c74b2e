import { ConfigurationError } from '../runner/errors';

/** String-keyed, insertion-ordered state handed to every task invocation. */
export type StorageRecord = Record<string, unknown>;

// Copied whole; subclasses are not, since a copy comes back as the base class
const LEAF_PROTOTYPES = new Set<unknown>(
  [
    Date,
    RegExp,
    ArrayBuffer,
    DataView,
    Int8Array,
    Uint8Array,
    Uint8ClampedArray,
    Int16Array,
    Uint16Array,
    Int32Array,
    Uint32Array,
    Float32Array,
    Float64Array,
    BigInt64Array,
    BigUint64Array,
  ].map((type) => type.prototype),
);

/**
 * Throws `ConfigurationError` naming the first value that cannot be deep-copied.
 *
 * Accepted: primitives other than symbols, plain objects, arrays, Map, Set,
 * Date, RegExp, ArrayBuffer and its views. Anything else (functions, class
 * instances, subclasses of the accepted built-ins, promises, weak
 * collections) has identity or behaviour a copy would lose.
 */
export function assertCopyable(storage: StorageRecord): void {
  const seen = new Set<object>();

  const visit = (value: unknown, path: string): void => {
    if (value === null || value === undefined) return;

    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return;
      case 'symbol':
        throw uncopyable(path, 'a symbol');
      case 'function':
        throw uncopyable(path, 'a function');
    }

    if (typeof value !== 'object' || seen.has(value)) return;
    seen.add(value);
    const proto: unknown = Object.getPrototypeOf(value);

    if (Array.isArray(value) && proto === Array.prototype) {
      value.forEach((item, index) => visit(item, `${path}[${index}]`));
      return;
    }
    if (value instanceof Map && proto === Map.prototype) {
      for (const [key, item] of value) {
        visit(key, `${path}<key>`);
        visit(item, `${path}.get(${String(key)})`);
      }
      return;
    }
    if (value instanceof Set && proto === Set.prototype) {
      for (const item of value) visit(item, `${path}<item>`);
      return;
    }
    if (LEAF_PROTOTYPES.has(proto)) {
      return;
    }
    if (proto === Object.prototype || proto === null) {
      for (const [key, item] of Object.entries(value)) visit(item, `${path}.${key}`);
      return;
    }

    throw uncopyable(path, `an instance of ${value.constructor?.name ?? 'an unknown class'}`);
  };

  for (const [key, value] of Object.entries(storage)) {
    visit(value, key);
  }
}

/** Deep-copies `storage` after checking it can be copied; returns it untouched when `copy` is false. */
export function prepareStorage<S extends StorageRecord>(storage: S, copy: boolean): S {
  if (!copy) return storage;

  assertCopyable(storage);
  return structuredClone(storage);
}

function uncopyable(path: string, what: string): ConfigurationError {
  return new ConfigurationError(`Storage value at "${path}" is ${what} and cannot be copied; pass copyStorage: false to share it as-is`, path);
}
