/**
 * Eager helpers that consume a sequence.
 */

import { requireFunction, requireIterable, tryGetCount } from "@seqkit/core";

/** Call `action(value, index)` for every element, in order. */
export function forEach<T>(source: Iterable<T>, action: (value: T, index: number) => void): void {
  requireIterable(source, "source");
  requireFunction(action, "action");

  let index = 0;
  for (const value of source) {
    action(value, index++);
  }
}

/**
 * The only element of `source` (or the only one matching `predicate`),
 * or `undefined` when there are none or several.
 */
export function onlyOrDefault<T>(source: Iterable<T>): T | undefined;
export function onlyOrDefault<T>(source: Iterable<T>, predicate: (value: T) => boolean): T | undefined;
export function onlyOrDefault<T>(
  source: Iterable<T>,
  predicate?: (value: T) => boolean,
): T | undefined {
  requireIterable(source, "source");

  if (predicate !== undefined) {
    requireFunction(predicate, "predicate");
  } else {
    const known = tryGetCount(source);
    if (known !== undefined && known !== 1) return undefined;
  }

  let found: { value: T } | undefined;
  for (const value of source) {
    if (predicate !== undefined && !predicate(value)) continue;
    if (found !== undefined) return undefined;
    found = { value };
  }
  return found?.value;
}

/** `source` itself, or an empty sequence for `null` / `undefined`. */
export function emptyIfNull<T>(source: Iterable<T> | null | undefined): Iterable<T> {
  return source ?? [];
}

/** Materialize `source` into a new, owned array. */
export function toArray<T>(source: Iterable<T>): T[] {
  requireIterable(source, "source");
  return Array.from(source);
}
