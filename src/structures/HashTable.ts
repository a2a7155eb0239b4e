import type { z } from 'zod';
import { HashTableSectionSchema, KeyValuePairSchema } from '../schemas/state';
import type { HashTableSnapshot } from '../types';

export const DEFAULT_CAPACITY = 16;
export const LOAD_FACTOR = 0.75;

class HashNode<V> {
  next: HashNode<V> | null = null;
  constructor(readonly key: string, public value: V) {}
}

/**
 * Separate-chaining hash map keyed by string.
 *
 * New keys are prepended to their bucket's chain. The table doubles when
 * `size` exceeds `capacity * LOAD_FACTOR` after an insert and never shrinks.
 */
export class HashTable<V> {
  private buckets: Array<HashNode<V> | null>;
  private cap: number;
  private count = 0;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Hash table capacity must be a positive integer, got ${capacity}`);
    }
    this.cap = capacity;
    this.buckets = HashTable.emptyBuckets<V>(capacity);
  }

  get capacity(): number {
    return this.cap;
  }

  get size(): number {
    return this.count;
  }

  /**
   * Base-31 polynomial hash over the key's code points, reduced modulo the
   * current capacity at every step.
   */
  hash(key: string): number {
    let h = 0;
    for (const ch of String(key)) {
      h = (h * 31 + (ch.codePointAt(0) ?? 0)) % this.cap;
    }
    return h;
  }

  insert(key: string, value: V): void {
    const index = this.hash(key);
    for (let node = this.buckets[index]; node; node = node.next) {
      if (node.key === key) {
        node.value = value;
        return;
      }
    }
    const node = new HashNode(key, value);
    node.next = this.buckets[index];
    this.buckets[index] = node;
    this.count++;
    if (this.count > this.cap * LOAD_FACTOR) this.resize();
  }

  search(key: string): V | null {
    for (let node = this.buckets[this.hash(key)]; node; node = node.next) {
      if (node.key === key) return node.value;
    }
    return null;
  }

  remove(key: string): boolean {
    const index = this.hash(key);
    let previous: HashNode<V> | null = null;
    for (let node = this.buckets[index]; node; node = node.next) {
      if (node.key === key) {
        if (previous) previous.next = node.next;
        else this.buckets[index] = node.next;
        this.count--;
        return true;
      }
      previous = node;
    }
    return false;
  }

  getAllKeys(): string[] {
    return this.entries().map(([key]) => key);
  }

  entries(): Array<[string, V]> {
    const result: Array<[string, V]> = [];
    for (const head of this.buckets) {
      for (let node = head; node; node = node.next) result.push([node.key, node.value]);
    }
    return result;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  toDict(): HashTableSnapshot<V> {
    return { capacity: this.cap, entries: this.entries() };
  }

  /**
   * Rebuilds a table by re-inserting every pair against the stored capacity.
   * Pairs with a non-string key, a value rejected by `valueSchema`, or a
   * value whose `keyOf` differs from its key are skipped.
   */
  static fromDict<V>(data: unknown, valueSchema: z.ZodType<V>, keyOf?: (value: V) => string): HashTable<V> {
    const section = HashTableSectionSchema.parse(data);
    const table = new HashTable<V>(section.capacity ?? DEFAULT_CAPACITY);
    for (const raw of section.entries) {
      const pair = KeyValuePairSchema.safeParse(raw);
      if (!pair.success) continue;
      const value = valueSchema.safeParse(pair.data[1]);
      if (!value.success) continue;
      if (keyOf && keyOf(value.data) !== pair.data[0]) continue;
      table.insert(pair.data[0], value.data);
    }
    return table;
  }

  private resize(): void {
    const old = this.buckets;
    this.cap *= 2;
    this.buckets = HashTable.emptyBuckets<V>(this.cap);
    this.count = 0;
    for (const head of old) {
      for (let node = head; node; node = node.next) this.insert(node.key, node.value);
    }
  }

  private static emptyBuckets<V>(capacity: number): Array<HashNode<V> | null> {
    return new Array<HashNode<V> | null>(capacity).fill(null);
  }
}
