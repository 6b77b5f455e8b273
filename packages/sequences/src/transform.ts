/**
 * Lazy single-source operators
 *
 * Every operator validates its arguments at call time and returns a
 * re-iterable sequence. No element is pulled and no callback runs until
 * the first `next()` of a pass; each pass re-reads the source.
 */

import {
  createLogger,
  requireFunction,
  requireInteger,
  requireIntegerAtLeast,
  requireIterable,
} from "@seqkit/core";
import { defer } from "./cursor.js";

const log = createLogger("transform");

// ============================================================================
// clump
// ============================================================================

/**
 * Group consecutive elements into arrays of `size`. A trailing partial
 * group is emitted once at the end. Every group is a new array, so callers
 * may keep earlier groups while later ones fill.
 *
 * @example
 * ```typescript
 * [...clump([1, 2, 3, 4, 5], 2)]; // [[1, 2], [3, 4], [5]]
 * ```
 */
export function clump<T>(source: Iterable<T>, size: number): Iterable<T[]> {
  requireIterable(source, "source");
  requireIntegerAtLeast(size, 1, "size");
  return defer(() => clumpIterator(source, size));
}

function* clumpIterator<T>(source: Iterable<T>, size: number): Generator<T[]> {
  let group: T[] = [];
  for (const value of source) {
    group.push(value);
    if (group.length === size) {
      yield group;
      group = [];
    }
  }
  if (group.length > 0) yield group;
}

// ============================================================================
// cycle
// ============================================================================

/**
 * Repeat `source` forever, opening a fresh pass over it for each
 * repetition. Bound the result with `take`, `atLeast`, or a `break`.
 *
 * `source` must support repeated independent iteration. A one-shot
 * iterator (such as a generator object) produces a single pass. A pass
 * that produces nothing ends the cycle, so `cycle([])` is empty.
 */
export function cycle<T>(source: Iterable<T>): Iterable<T> {
  requireIterable(source, "source");
  return defer(() => cycleIterator(source));
}

function* cycleIterator<T>(source: Iterable<T>): Generator<T> {
  if (isOneShot(source)) {
    log.warn("cycle() over a one-shot iterator produces a single pass");
  }
  while (true) {
    let produced = false;
    for (const value of source) {
      produced = true;
      yield value;
    }
    if (!produced) return;
  }
}

function isOneShot(source: Iterable<unknown>): boolean {
  return "next" in source && typeof source.next === "function";
}

// ============================================================================
// tap
// ============================================================================

/**
 * Call `action(value, index)` for each element at the moment it is pulled,
 * then pass the element through unchanged.
 *
 * @example
 * ```typescript
 * const logged = tap(rows, (row, i) => console.log(i, row));
 * ```
 */
export function tap<T>(source: Iterable<T>, action: (value: T, index: number) => void): Iterable<T> {
  requireIterable(source, "source");
  requireFunction(action, "action");
  return defer(() => tapIterator(source, action));
}

function* tapIterator<T>(
  source: Iterable<T>,
  action: (value: T, index: number) => void,
): Generator<T> {
  let index = 0;
  for (const value of source) {
    action(value, index++);
    yield value;
  }
}

// ============================================================================
// repeatItems
// ============================================================================

/**
 * Emit each element `count` times in a row: `a, a, b, b` for `count = 2`.
 */
export function repeatItems<T>(source: Iterable<T>, count: number): Iterable<T> {
  requireIterable(source, "source");
  requireIntegerAtLeast(count, 1, "count");
  return defer(() => repeatItemsIterator(source, count));
}

function* repeatItemsIterator<T>(source: Iterable<T>, count: number): Generator<T> {
  for (const value of source) {
    for (let i = 0; i < count; i++) yield value;
  }
}

// ============================================================================
// take
// ============================================================================

/**
 * The first `count` elements. Pulls exactly `min(count, length)` elements
 * and closes the source without reading ahead. A `count <= 0` is empty.
 */
export function take<T>(source: Iterable<T>, count: number): Iterable<T> {
  requireIterable(source, "source");
  requireInteger(count, "count");
  return defer(() => takeIterator(source, count));
}

function* takeIterator<T>(source: Iterable<T>, count: number): Generator<T> {
  if (count <= 0) return;
  let taken = 0;
  for (const value of source) {
    yield value;
    if (++taken >= count) return;
  }
}
