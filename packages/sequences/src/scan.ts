/**
 * Pairwise and running scans
 *
 *   scan([1, 2, 3, 4], add)   → 3, 5, 7       (neighbouring pairs)
 *   scanl([1, 2, 3, 4], add)  → 1, 3, 6, 10   (running left fold)
 *
 * Both hold at most one prior value.
 */

import { requireFunction, requireIterable } from "@seqkit/core";
import { defer } from "./cursor.js";

/**
 * `combine(x0, x1), combine(x1, x2), ...`. One element shorter than the
 * source; empty when the source has fewer than two elements.
 */
export function scan<T, R>(source: Iterable<T>, combine: (previous: T, current: T) => R): Iterable<R> {
  requireIterable(source, "source");
  requireFunction(combine, "combine");
  return defer(() => scanIterator(source, combine));
}

function* scanIterator<T, R>(
  source: Iterable<T>,
  combine: (previous: T, current: T) => R,
): Generator<R> {
  let last: { value: T } | undefined;
  for (const value of source) {
    if (last === undefined) {
      last = { value };
      continue;
    }
    yield combine(last.value, value);
    last.value = value;
  }
}

/**
 * `x0, combine(x0, x1), combine(combine(x0, x1), x2), ...`. Same length as
 * the source; the first output is the first input.
 */
export function scanl<T>(source: Iterable<T>, combine: (accumulated: T, current: T) => T): Iterable<T> {
  requireIterable(source, "source");
  requireFunction(combine, "combine");
  return defer(() => scanlIterator(source, combine));
}

function* scanlIterator<T>(
  source: Iterable<T>,
  combine: (accumulated: T, current: T) => T,
): Generator<T> {
  let acc: { value: T } | undefined;
  for (const value of source) {
    if (acc === undefined) {
      acc = { value };
    } else {
      acc.value = combine(acc.value, value);
    }
    yield acc.value;
  }
}
