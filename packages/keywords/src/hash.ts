import { UNSPECIFIED } from "./types.js";
import type { Keyword, KeywordMapping, KeywordSlot } from "./types.js";

/**
 * An insertion-ordered keyword hash.
 *
 * Values are boxed so a stored `undefined` stays distinguishable from an
 * absent key.
 */
export class KeywordHash<V = unknown> implements KeywordMapping<V> {
  private readonly table = new Map<unknown, { readonly value: V }>();

  constructor(entries: Iterable<readonly [unknown, V]> = []) {
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  /** Build a hash keyed by a record's own string keys, in their enumeration order. */
  static fromRecord<V>(record: Readonly<Record<string, V>>): KeywordHash<V> {
    return new KeywordHash<V>(Object.entries(record));
  }

  get size(): number {
    return this.table.size;
  }

  has(key: unknown): boolean {
    return this.table.has(key);
  }

  lookup(key: Keyword): KeywordSlot<V> {
    const entry = this.table.get(key);
    return entry === undefined ? UNSPECIFIED : entry.value;
  }

  set(key: unknown, value: V): this {
    this.table.set(key, { value });
    return this;
  }

  delete(key: unknown): boolean {
    return this.table.delete(key);
  }

  keys(): IterableIterator<unknown> {
    return this.table.keys();
  }

  *entries(): IterableIterator<[unknown, V]> {
    for (const [key, entry] of this.table) {
      yield [key, entry.value];
    }
  }
}
