import { iter, type Iter } from '../iter.js';

/**
 * A map that iterates in insertion order and refuses to overwrite keys.
 */
export class OrderedMap<K, V> {
  private keyMap: Map<K, V>;
  private entryList: [K, V][];

  constructor(pairs: Iterable<[K, V]> = []) {
    this.keyMap = new Map();
    this.entryList = [];
    for (const [key, value] of pairs) {
      this.push(key, value);
    }
  }

  get length() {
    return this.entryList.length;
  }

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
    this.entryList.push([key, value]);
  }

  keys(): Iter<K> {
    return iter(this.entryList).map(([key]) => key);
  }

  values(): Iter<V> {
    return iter(this.entryList).map(([, value]) => value);
  }

  entries(): Iter<[number, K, V]> {
    return iter(this.entryList.entries()).map(
      ([i, [key, value]]): [number, K, V] => [i, key, value]
    );
  }
}
