/**
 * Recursively freezes an object graph and returns it with a readonly view.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Read-only view over a map. Exposes no mutators, so callers holding a
 * `ReadonlyMap` cannot reach `set`, `delete` or `clear` at run time.
 */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly entriesByKey: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.entriesByKey = new Map(entries);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(key);
  }

  has(key: K): boolean {
    return this.entriesByKey.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.entriesByKey.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.entriesByKey.entries();
  }

  keys() {
    return this.entriesByKey.keys();
  }

  values() {
    return this.entriesByKey.values();
  }

  [Symbol.iterator]() {
    return this.entriesByKey[Symbol.iterator]();
  }
}

/**
 * Copies a map into a frozen read-only view, deep-freezing its values.
 */
export function freezeMap<K, V>(map: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
  for (const value of map.values()) {
    deepFreeze(value);
  }
  return Object.freeze(new FrozenMap(map));
}
