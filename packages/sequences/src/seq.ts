/**
 * Fluent sequence wrapper
 *
 * `Seq<T>` chains the free operators without changing their semantics.
 * Chain methods return a new `Seq` and pull nothing; terminal methods
 * consume. A `Seq` is re-iterable whenever its source is.
 *
 * @example
 * ```typescript
 * const firstSeven = seq([1, 2, 3])
 *   .cycle()
 *   .take(7)
 *   .toArray(); // [1, 2, 3, 1, 2, 3, 1]
 *
 * const batches = seq(readLines())
 *   .tap((line, i) => progress(i))
 *   .clump(100);
 * ```
 */

import { requireIterable, type Eq } from "@seqkit/core";
import { atLeast, atMost } from "./counting.js";
import { enumerableEqual } from "./equality.js";
import { forEach, onlyOrDefault, toArray } from "./consume.js";
import { iterate } from "./generate.js";
import { scan, scanl } from "./scan.js";
import { clump, cycle, repeatItems, take, tap } from "./transform.js";
import { zip2, zip3, zip4, zip5, zip6 } from "./zip.js";

export class Seq<T> implements Iterable<T> {
  private readonly source: Iterable<T>;

  constructor(source: Iterable<T>) {
    requireIterable(source, "source");
    this.source = source;
  }

  /** `start, step(start), ...`, exactly `count` values */
  static iterate<T>(start: T, count: number, step: (value: T) => T): Seq<T> {
    return new Seq(iterate(start, count, step));
  }

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }

  // ---------------------------------------------------------------------------
  // Chain operations
  // ---------------------------------------------------------------------------

  clump(size: number): Seq<T[]> {
    return new Seq(clump(this.source, size));
  }

  cycle(): Seq<T> {
    return new Seq(cycle(this.source));
  }

  tap(action: (value: T, index: number) => void): Seq<T> {
    return new Seq(tap(this.source, action));
  }

  repeatItems(count: number): Seq<T> {
    return new Seq(repeatItems(this.source, count));
  }

  scan<R>(combine: (previous: T, current: T) => R): Seq<R> {
    return new Seq(scan(this.source, combine));
  }

  scanl(combine: (accumulated: T, current: T) => T): Seq<T> {
    return new Seq(scanl(this.source, combine));
  }

  take(count: number): Seq<T> {
    return new Seq(take(this.source, count));
  }

  zip<B, R>(other: Iterable<B>, combine: (a: T, b: B) => R): Seq<R> {
    return new Seq(zip2(this.source, other, combine));
  }

  zip3<B, C, R>(b: Iterable<B>, c: Iterable<C>, combine: (a: T, b: B, c: C) => R): Seq<R> {
    return new Seq(zip3(this.source, b, c, combine));
  }

  zip4<B, C, D, R>(
    b: Iterable<B>,
    c: Iterable<C>,
    d: Iterable<D>,
    combine: (a: T, b: B, c: C, d: D) => R,
  ): Seq<R> {
    return new Seq(zip4(this.source, b, c, d, combine));
  }

  zip5<B, C, D, E, R>(
    b: Iterable<B>,
    c: Iterable<C>,
    d: Iterable<D>,
    e: Iterable<E>,
    combine: (a: T, b: B, c: C, d: D, e: E) => R,
  ): Seq<R> {
    return new Seq(zip5(this.source, b, c, d, e, combine));
  }

  zip6<B, C, D, E, F, R>(
    b: Iterable<B>,
    c: Iterable<C>,
    d: Iterable<D>,
    e: Iterable<E>,
    f: Iterable<F>,
    combine: (a: T, b: B, c: C, d: D, e: E, f: F) => R,
  ): Seq<R> {
    return new Seq(zip6(this.source, b, c, d, e, f, combine));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  atLeast(n: number, predicate?: (value: T) => boolean): boolean {
    return predicate === undefined ? atLeast(this.source, n) : atLeast(this.source, n, predicate);
  }

  atMost(n: number, predicate?: (value: T) => boolean): boolean {
    return predicate === undefined ? atMost(this.source, n) : atMost(this.source, n, predicate);
  }

  /** Same multiset of elements as `other`, in any order */
  bagEquals(other: Iterable<T>, comparer?: Eq<T>): boolean {
    return enumerableEqual(this.source, other, comparer);
  }

  onlyOrDefault(predicate?: (value: T) => boolean): T | undefined {
    return predicate === undefined
      ? onlyOrDefault(this.source)
      : onlyOrDefault(this.source, predicate);
  }

  forEach(action: (value: T, index: number) => void): void {
    forEach(this.source, action);
  }

  toArray(): T[] {
    return toArray(this.source);
  }
}

/** Wrap any iterable in a `Seq` */
export function seq<T>(source: Iterable<T>): Seq<T> {
  return new Seq(source);
}
