/**
 * Least-recently-used cache
 * Hash index over an intrusive doubly-linked recency list
 */

interface LruNode<K, V> {
  key: K;
  value: V;
  newer: LruNode<K, V> | null;
  older: LruNode<K, V> | null;
}

export class LruCache<K, V> {
  private index: Map<K, LruNode<K, V>> = new Map();
  private newest: LruNode<K, V> | null = null;
  private oldest: LruNode<K, V> | null = null;
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LRU capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * Get value and mark it most recently used
   */
  get(key: K): V | undefined {
    const node = this.index.get(key);
    if (!node) {
      return undefined;
    }
    this.unlink(node);
    this.pushNewest(node);
    return node.value;
  }

  /**
   * Insert or replace a value as most recently used.
   * Returns the key evicted to make room, if any.
   */
  set(key: K, value: V): K | undefined {
    const existing = this.index.get(key);
    if (existing) {
      existing.value = value;
      this.unlink(existing);
      this.pushNewest(existing);
      return undefined;
    }

    const node: LruNode<K, V> = { key, value, newer: null, older: null };
    this.index.set(key, node);
    this.pushNewest(node);

    if (this.index.size <= this.capacity || !this.oldest) {
      return undefined;
    }
    const evicted = this.oldest;
    this.unlink(evicted);
    this.index.delete(evicted.key);
    return evicted.key;
  }

  delete(key: K): boolean {
    const node = this.index.get(key);
    if (!node) {
      return false;
    }
    this.unlink(node);
    this.index.delete(key);
    return true;
  }

  /**
   * Keys from most to least recently used
   */
  keys(): K[] {
    const keys: K[] = [];
    for (let node = this.newest; node; node = node.older) {
      keys.push(node.key);
    }
    return keys;
  }

  private pushNewest(node: LruNode<K, V>): void {
    node.older = this.newest;
    node.newer = null;
    if (this.newest) {
      this.newest.newer = node;
    }
    this.newest = node;
    if (!this.oldest) {
      this.oldest = node;
    }
  }

  private unlink(node: LruNode<K, V>): void {
    if (node.newer) {
      node.newer.older = node.older;
    } else if (this.newest === node) {
      this.newest = node.older;
    }
    if (node.older) {
      node.older.newer = node.newer;
    } else if (this.oldest === node) {
      this.oldest = node.newer;
    }
    node.newer = null;
    node.older = null;
  }
}
