/**
 * Counting predicates
 *
 * `atLeast` / `atMost` answer "how many?" questions with the fewest pulls
 * possible. Without a predicate, a source whose size is known in O(1)
 * (`tryGetCount`) is never iterated.
 *
 * @example
 * ```typescript
 * atLeast(cycle([1, 2]), 3);              // true after 3 pulls
 * atMost(orders, 2, (o) => o.overdue);    // false at the 3rd overdue order
 * ```
 */

import { createLogger, requireFunction, requireIterable, tryGetCount } from "@seqkit/core";

const log = createLogger("counting");

/**
 * True if `source` has at least `n` elements (or at least `n` elements
 * satisfying `predicate`). Stops pulling as soon as the `n`th is seen.
 */
export function atLeast<T>(source: Iterable<T>, n: number): boolean;
export function atLeast<T>(source: Iterable<T>, n: number, predicate: (value: T) => boolean): boolean;
export function atLeast<T>(
  source: Iterable<T>,
  n: number,
  predicate?: (value: T) => boolean,
): boolean {
  requireIterable(source, "source");

  if (predicate !== undefined) {
    requireFunction(predicate, "predicate");
    return countReaches(source, n, predicate);
  }

  const known = tryGetCount(source);
  if (known !== undefined) {
    log.debug(`atLeast answered from O(1) count ${known}`);
    return known >= n;
  }
  return countReaches(source, n, undefined);
}

/**
 * True if `source` has at most `n` elements (or at most `n` elements
 * satisfying `predicate`). Stops pulling as soon as the count exceeds `n`;
 * otherwise reads to the end.
 */
export function atMost<T>(source: Iterable<T>, n: number): boolean;
export function atMost<T>(source: Iterable<T>, n: number, predicate: (value: T) => boolean): boolean;
export function atMost<T>(
  source: Iterable<T>,
  n: number,
  predicate?: (value: T) => boolean,
): boolean {
  requireIterable(source, "source");

  if (predicate !== undefined) {
    requireFunction(predicate, "predicate");
    return !countExceeds(source, n, predicate);
  }

  const known = tryGetCount(source);
  if (known !== undefined) {
    log.debug(`atMost answered from O(1) count ${known}`);
    return known <= n;
  }
  return !countExceeds(source, n, undefined);
}

// ---------------------------------------------------------------------------
// Enumerating paths
// ---------------------------------------------------------------------------

function countReaches<T>(
  source: Iterable<T>,
  n: number,
  predicate: ((value: T) => boolean) | undefined,
): boolean {
  let count = 0;
  if (count >= n) return true;
  for (const value of source) {
    if (predicate !== undefined && !predicate(value)) continue;
    if (++count >= n) return true;
  }
  return false;
}

function countExceeds<T>(
  source: Iterable<T>,
  n: number,
  predicate: ((value: T) => boolean) | undefined,
): boolean {
  let count = 0;
  if (count > n) return true;
  for (const value of source) {
    if (predicate !== undefined && !predicate(value)) continue;
    if (++count > n) return true;
  }
  return false;
}
