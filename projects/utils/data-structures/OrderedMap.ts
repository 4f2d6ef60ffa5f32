import { iter, type Iter } from '../iter.js';

/**
 * A map that remembers the order its keys were first pushed in.
 */
export class OrderedMap<K, V> {
  private keyMap: Map<K, V> = new Map();

  has(key: K) {
    return this.keyMap.has(key);
  }

  get(key: K) {
    return this.keyMap.get(key);
  }

  push(key: K, value: V) {
    if (this.keyMap.has(key)) {
      throw new Error(`key ${String(key)} already in map`);
    }
    this.keyMap.set(key, value);
  }

  keys(): Iter<K> {
    return iter(this.keyMap.keys());
  }

  values(): Iter<V> {
    return iter(this.keyMap.values());
  }
}
