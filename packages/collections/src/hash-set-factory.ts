import { ArgumentError, isHash, requireIterable, type EqHash } from "@seqkit/core";
import { HashSet } from "./hash-set.js";

/**
 * Materialize `source` into a set. Without a comparer this is a native
 * `Set` (SameValueZero); with one it is a `HashSet` keyed by the comparer.
 */
export function toHashSet<T>(source: Iterable<T>): Set<T>;
export function toHashSet<T>(source: Iterable<T>, comparer: EqHash<T>): HashSet<T>;
export function toHashSet<T>(source: Iterable<T>, comparer?: EqHash<T>): Set<T> | HashSet<T> {
  requireIterable(source, "source");
  if (comparer === undefined) return new Set(source);
  if (!isHash(comparer)) {
    throw new ArgumentError("comparer", "missing", "comparer has no hash().");
  }
  return new HashSet(comparer, source);
}
