// ============================================================================
// @resp3-value/core — Hash Table with Pluggable Key Semantics
// ============================================================================
//
// Open-addressing table (linear probing) whose key identity is supplied by
// the caller as a `KeyStrategy`. Used as the backing store of Map values,
// where keys are themselves RESP3 values compared structurally.
//
// Layout:
//   - Dense parallel arrays (keys, values, cached key hashes) in insertion
//     order; iteration walks these directly.
//   - A Uint32Array of slots holding 1-based indices into the dense arrays
//     (0 = empty). Load factor stays at or below 0.75.
//
// Lifecycle: a table is mutable until `freeze()`, and unusable after
// `release()`.
// ============================================================================

import { resolveTableOptions } from './config.js';
import type { DuplicateKeyPolicy, TableOptionsInput } from './config.js';
import { MapKeyCollisionError, TableFrozenError, TableReleasedError } from './errors.js';
import { isDebugEnabled, logKeyOverwrite, logTableResize } from './logger.js';

const MAX_LOAD = 0.75;

/**
 * Key identity used by a table. `equals(a, b)` must imply
 * `hash(a) === hash(b)`.
 */
export interface KeyStrategy<K> {
  hash(key: K): number;
  equals(a: K, b: K): boolean;
  /** Human-readable key, used in errors and debug logs. */
  describe?(key: K): string;
}

/** Smallest power-of-two slot count that holds `capacity` entries. */
function slotCountFor(capacity: number): number {
  let count = 8;
  while (count * MAX_LOAD < capacity) count *= 2;
  return count;
}

/**
 * Insertion-ordered hash table parameterized by explicit hash and equality
 * functions, so composite values can serve as keys.
 *
 * @example
 * ```ts
 * const table = new HashTable<string, number>(
 *   { hash: (s) => s.length, equals: (a, b) => a === b },
 *   { duplicateKeys: 'reject' },
 * );
 * table.set('first', 1).set('second', 2);
 * table.get('second'); // → 2
 * ```
 */
export class HashTable<K, V> implements Iterable<[K, V]> {
  private keyList: K[] = [];
  private valueList: V[] = [];
  private hashList: number[] = [];
  private slots: Uint32Array;
  private mask: number;
  private frozen = false;
  private released = false;

  private readonly strategy: KeyStrategy<K>;
  public readonly duplicateKeys: DuplicateKeyPolicy;

  constructor(strategy: KeyStrategy<K>, options?: TableOptionsInput) {
    const opts = resolveTableOptions(options);
    this.strategy = strategy;
    this.duplicateKeys = opts.duplicateKeys;
    const count = slotCountFor(opts.initialCapacity);
    this.slots = new Uint32Array(count);
    this.mask = count - 1;
  }

  /** Number of entries. */
  get size(): number {
    this.assertLive();
    return this.keyList.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Whether keys are identified by `strategy`. */
  usesStrategy(strategy: KeyStrategy<K>): boolean {
    return this.strategy === strategy;
  }

  /**
   * Insert or update an entry, following the table's duplicate-key policy.
   *
   * @throws {MapKeyCollisionError} If the key exists and the policy is `'reject'`
   * @throws {TableFrozenError} If the table is frozen
   */
  set(key: K, value: V): this {
    this.assertLive();
    if (this.frozen) throw new TableFrozenError('set');

    const h = this.strategy.hash(key);
    const existing = this.find(key, h);
    if (existing >= 0) {
      if (this.duplicateKeys === 'reject') {
        throw new MapKeyCollisionError(this.describe(key));
      }
      this.valueList[existing] = value;
      if (isDebugEnabled()) logKeyOverwrite(this.describe(key));
      return this;
    }

    if (this.keyList.length + 1 > this.slots.length * MAX_LOAD) {
      const from = this.slots.length;
      this.rebuild(from * 2);
      logTableResize(from, this.slots.length, this.keyList.length);
    }

    this.keyList.push(key);
    this.valueList.push(value);
    this.hashList.push(h);
    this.place(h, this.keyList.length);
    return this;
  }

  get(key: K): V | undefined {
    this.assertLive();
    const ptr = this.find(key, this.strategy.hash(key));
    return ptr >= 0 ? this.valueList[ptr] : undefined;
  }

  has(key: K): boolean {
    this.assertLive();
    return this.find(key, this.strategy.hash(key)) >= 0;
  }

  /**
   * Remove an entry. Remaining entries keep their relative order.
   * O(n): the slot array is rebuilt after removal.
   */
  delete(key: K): boolean {
    this.assertLive();
    if (this.frozen) throw new TableFrozenError('delete');

    const ptr = this.find(key, this.strategy.hash(key));
    if (ptr < 0) return false;

    this.keyList.splice(ptr, 1);
    this.valueList.splice(ptr, 1);
    this.hashList.splice(ptr, 1);
    this.rebuild(this.slots.length);
    return true;
  }

  /** Remove every entry, keeping the current slot count. */
  clear(): void {
    this.assertLive();
    if (this.frozen) throw new TableFrozenError('clear');
    this.keyList = [];
    this.valueList = [];
    this.hashList = [];
    this.slots.fill(0);
  }

  /** Make the table read-only. Idempotent. */
  freeze(): this {
    this.assertLive();
    this.frozen = true;
    return this;
  }

  /**
   * Drop the backing storage. Any later access throws `TableReleasedError`.
   * Calling it twice is a no-op.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.keyList = [];
    this.valueList = [];
    this.hashList = [];
    this.slots = new Uint32Array(0);
    this.mask = 0;
  }

  *keys(): IterableIterator<K> {
    this.assertLive();
    for (const key of this.keyList) yield key;
  }

  *values(): IterableIterator<V> {
    this.assertLive();
    for (const value of this.valueList) yield value;
  }

  /** Entries in insertion order. */
  *entries(): IterableIterator<[K, V]> {
    this.assertLive();
    for (let i = 0; i < this.keyList.length; i++) {
      yield [this.keyList[i], this.valueList[i]];
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /** Dense index of `key`, or -1. */
  private find(key: K, h: number): number {
    let idx = h & this.mask;
    for (;;) {
      const entry = this.slots[idx];
      if (entry === 0) return -1;
      const ptr = entry - 1;
      if (this.hashList[ptr] === h && this.strategy.equals(this.keyList[ptr], key)) {
        return ptr;
      }
      idx = (idx + 1) & this.mask;
    }
  }

  /** Record 1-based dense index `ref` in the first free slot for `h`. */
  private place(h: number, ref: number): void {
    let idx = h & this.mask;
    while (this.slots[idx] !== 0) idx = (idx + 1) & this.mask;
    this.slots[idx] = ref;
  }

  private rebuild(slotCount: number): void {
    this.slots = new Uint32Array(slotCount);
    this.mask = slotCount - 1;
    for (let i = 0; i < this.hashList.length; i++) {
      this.place(this.hashList[i], i + 1);
    }
  }

  private describe(key: K): string {
    return this.strategy.describe ? this.strategy.describe(key) : String(key);
  }

  private assertLive(): void {
    if (this.released) throw new TableReleasedError();
  }
}
