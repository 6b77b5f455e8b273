/**
 * Bags: multisets of pending, unmatched elements.
 *
 * `enumerableEqual` keeps one bag per side. Every element pulled from one
 * side first tries `removeMatch` on the other side's bag, and is only
 * `add`ed to its own bag when nothing matched, so at any moment no element
 * of one bag equals (per the comparer) an element of the other.
 *
 * Three representations, picked by `createBag`:
 *
 *   native  Map<T, count>, SameValueZero     default comparer
 *   hash    buckets by Hash.hash, Eq inside   comparer implements Hash
 *   linear  array, scan + splice              Eq only, or strategy "linear"
 */

import { config, isDefaultEq, isHash, type Eq, type EqHash } from "@seqkit/core";
import { indexOf } from "./list.js";

export type BagKind = "native" | "hash" | "linear";

export interface Bag<T> {
  readonly kind: BagKind;
  /** Number of elements held, counting duplicates */
  readonly size: number;
  add(item: T): void;
  /** Remove one element equal to `item`; false when none matches. */
  removeMatch(item: T): boolean;
}

// ============================================================================
// Native (SameValueZero)
// ============================================================================

export class NativeBag<T> implements Bag<T> {
  readonly kind = "native";
  private readonly _counts = new Map<T, number>();
  private _size = 0;

  get size(): number {
    return this._size;
  }

  add(item: T): void {
    this._counts.set(item, (this._counts.get(item) ?? 0) + 1);
    this._size++;
  }

  removeMatch(item: T): boolean {
    const count = this._counts.get(item);
    if (count === undefined) return false;
    if (count === 1) {
      this._counts.delete(item);
    } else {
      this._counts.set(item, count - 1);
    }
    this._size--;
    return true;
  }
}

// ============================================================================
// Hash buckets (Eq + Hash)
// ============================================================================

export class HashBag<T> implements Bag<T> {
  readonly kind = "hash";
  private readonly _buckets = new Map<number, T[]>();
  private _size = 0;

  constructor(private readonly comparer: EqHash<T>) {}

  get size(): number {
    return this._size;
  }

  add(item: T): void {
    const h = this.comparer.hash(item);
    const bucket = this._buckets.get(h);
    if (bucket) {
      bucket.push(item);
    } else {
      this._buckets.set(h, [item]);
    }
    this._size++;
  }

  removeMatch(item: T): boolean {
    const h = this.comparer.hash(item);
    const bucket = this._buckets.get(h);
    if (!bucket) return false;
    const i = indexOf(bucket, item, this.comparer);
    if (i < 0) return false;
    bucket.splice(i, 1);
    if (bucket.length === 0) this._buckets.delete(h);
    this._size--;
    return true;
  }
}

// ============================================================================
// Linear scan (Eq only)
// ============================================================================

export class LinearBag<T> implements Bag<T> {
  readonly kind = "linear";
  private readonly _items: T[] = [];

  constructor(private readonly comparer: Eq<T>) {}

  get size(): number {
    return this._items.length;
  }

  add(item: T): void {
    this._items.push(item);
  }

  removeMatch(item: T): boolean {
    const i = indexOf(this._items, item, this.comparer);
    if (i < 0) return false;
    this._items.splice(i, 1);
    return true;
  }
}

// ============================================================================
// Selection
// ============================================================================

/**
 * Pick the bag for a comparer. Without a comparer (or with `eqDefault()`)
 * the native map is used. A comparer that implements `Hash` gets buckets
 * unless `equality.strategy` is configured as `"linear"`.
 */
export function createBag<T>(comparer?: Eq<T>): Bag<T> {
  if (comparer === undefined || isDefaultEq(comparer)) return new NativeBag<T>();
  if (isHash(comparer) && config.equalityStrategy() !== "linear") {
    return new HashBag(comparer);
  }
  return new LinearBag(comparer);
}
