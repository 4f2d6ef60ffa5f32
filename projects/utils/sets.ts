export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * A map whose keys are compared by the string the hasher returns
 * for them instead of by identity.
 */
export class HashMap<K, V> {
  private hasher: (item: K) => string;
  private data: Map<string, [K, V]> = new Map();
  constructor(hasher: (item: K) => string) {
    this.hasher = hasher;
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key))?.[1];
  }
  set(key: K, value: V): this {
    this.data.set(this.hasher(key), [key, value]);
    return this;
  }
  get size(): number {
    return this.data.size;
  }
}

/**
 * A set whose members are compared by the string the hasher returns
 * for them. Iteration follows insertion order.
 */
export class HashSet<T> implements ConstSet<T> {
  private data: Map<string, T> = new Map();
  private hasher: (item: T) => string;
  constructor(hasher: (item: T) => string, items?: Iterable<T>) {
    this.hasher = hasher;
    if (items) {
      for (const item of items) {
        this.add(item);
      }
    }
  }
  get size() {
    return this.data.size;
  }
  add(value: T): this {
    const hash = this.hasher(value);
    if (!this.data.has(hash)) {
      this.data.set(hash, value);
    }
    return this;
  }
  has(value: T): boolean {
    return this.data.has(this.hasher(value));
  }
  values(): IterableIterator<T> {
    return this.data.values();
  }
  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }
}

export function setsAreEqual<T>(s1: ConstSet<T>, s2: ConstSet<T>) {
  if (s1.size !== s2.size) {
    return false;
  }
  for (const s of s1) {
    if (!s2.has(s)) {
      return false;
    }
  }
  return true;
}

/**
 * Add every item of `from` to `to`.
 * @returns whether `to` grew
 */
export function addAll<T>(to: Set<T>, from: Iterable<T>): boolean {
  const before = to.size;
  for (const item of from) {
    to.add(item);
  }
  return to.size !== before;
}
