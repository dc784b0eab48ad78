/**
 * Adds every item of `items` to `target`.
 * @returns whether `target` grew
 */
export function addAll<T>(target: Set<T>, items: Iterable<T>): boolean {
  const before = target.size;
  for (const item of items) {
    target.add(item);
  }
  return target.size > before;
}

/**
 * A map whose keys are compared by the string the hasher produces for them,
 * so that structurally equal keys (like a pair of symbols) land in the same
 * slot. Keys and values are kept in insertion order.
 */
export class HashMap<K, V> {
  private hasher: (key: K) => string;
  private data: Map<string, [K, V]> = new Map();
  constructor(hasher: (key: K) => string) {
    this.hasher = hasher;
  }
  get size(): number {
    return this.data.size;
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key))?.[1];
  }
  has(key: K): boolean {
    return this.data.has(this.hasher(key));
  }
  set(key: K, value: V): this {
    const hash = this.hasher(key);
    const existing = this.data.get(hash);
    this.data.set(hash, [existing ? existing[0] : key, value]);
    return this;
  }
  delete(key: K): boolean {
    return this.data.delete(this.hasher(key));
  }
  *keys(): IterableIterator<K> {
    for (const [key] of this.data.values()) {
      yield key;
    }
  }
  *values(): IterableIterator<V> {
    for (const [, value] of this.data.values()) {
      yield value;
    }
  }
  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.data.values()) {
      yield [key, value];
    }
  }
  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}
