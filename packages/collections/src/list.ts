/**
 * Comparer-aware list and collection helpers.
 */

import { requireComparer, requireDefined, requireIterable, type Eq } from "@seqkit/core";

/** Anything that accepts items one at a time: a Set, a HashSet, a custom bag. */
export interface Addable<T> {
  add(item: T): unknown;
}

/**
 * Append every item to `collection`: `push` for arrays, `add` otherwise.
 */
export function addRange<T>(collection: T[] | Addable<T>, items: Iterable<T>): void {
  requireDefined(collection, "collection");
  requireIterable(items, "items");

  if (Array.isArray(collection)) {
    // an array growing under its own iterator never ends
    const source = items === collection ? [...collection] : items;
    for (const item of source) collection.push(item);
  } else {
    for (const item of items) collection.add(item);
  }
}

/**
 * Index of the first element `eq` considers equal to `item`, or -1.
 */
export function indexOf<T>(list: readonly T[], item: T, eq: Eq<T>): number {
  requireDefined(list, "list");
  requireComparer(eq, "comparer");

  for (let i = 0; i < list.length; i++) {
    if (eq.equals(item, list[i])) return i;
  }
  return -1;
}

/**
 * Remove the first element `eq` considers equal to `item`, in place.
 * Returns whether an element was removed.
 */
export function remove<T>(list: T[], item: T, eq: Eq<T>): boolean {
  const index = indexOf(list, item, eq);
  if (index < 0) return false;
  list.splice(index, 1);
  return true;
}
