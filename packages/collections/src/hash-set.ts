/**
 * HashSet<K>: membership decided by a caller-supplied `EqHash<K>` instead
 * of SameValueZero. Elements are bucketed by `hash`; `equals` settles
 * collisions inside a bucket.
 *
 * Exposes `size`, so `tryGetCount` and the counting operators answer
 * without iterating it.
 */

import type { EqHash } from "@seqkit/core";
import { indexOf } from "./list.js";

interface Slot<K> {
  readonly hash: number;
  readonly bucket: K[] | undefined;
  /** Position in `bucket`, or -1 */
  readonly index: number;
}

export class HashSet<K> implements Iterable<K> {
  private readonly buckets = new Map<number, K[]>();
  private count = 0;

  constructor(
    private readonly comparer: EqHash<K>,
    items?: Iterable<K>,
  ) {
    if (items !== undefined) {
      for (const item of items) this.add(item);
    }
  }

  get size(): number {
    return this.count;
  }

  has(item: K): boolean {
    return this.locate(item).index >= 0;
  }

  /** Insert `item` unless an equal element is present. Chainable. */
  add(item: K): this {
    const { hash, bucket, index } = this.locate(item);
    if (index >= 0) return this;
    if (bucket === undefined) {
      this.buckets.set(hash, [item]);
    } else {
      bucket.push(item);
    }
    this.count++;
    return this;
  }

  delete(item: K): boolean {
    const { hash, bucket, index } = this.locate(item);
    if (bucket === undefined || index < 0) return false;
    if (bucket.length === 1) {
      this.buckets.delete(hash);
    } else {
      bucket.splice(index, 1);
    }
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *[Symbol.iterator](): IterableIterator<K> {
    for (const bucket of this.buckets.values()) yield* bucket;
  }

  toArray(): K[] {
    return Array.from(this);
  }

  private locate(item: K): Slot<K> {
    const hash = this.comparer.hash(item);
    const bucket = this.buckets.get(hash);
    const index = bucket === undefined ? -1 : indexOf(bucket, item, this.comparer);
    return { hash, bucket, index };
  }
}
