/**
 * O(1) size capability
 *
 * `tryGetCount` answers "how many elements would iterating this produce?"
 * without iterating, or returns `undefined` when only iteration can tell.
 *
 * The check is structural rather than a list of container classes:
 * - arrays and typed arrays report `length`
 * - anything exposing a numeric `size` (Set, Map, HashSet, user types)
 *   reports `size`
 *
 * Strings are not sized: `length` counts UTF-16 code units
 * while iteration yields code points.
 */

/** A source that knows its element count without being iterated. */
export interface Sized {
  readonly size: number;
}

export function isSized(value: unknown): value is Sized {
  return (
    typeof value === "object" &&
    value !== null &&
    "size" in value &&
    typeof value.size === "number"
  );
}

export function tryGetCount(source: Iterable<unknown>): number | undefined {
  if (Array.isArray(source)) return source.length;
  if (ArrayBuffer.isView(source) && "length" in source && typeof source.length === "number") {
    return source.length;
  }
  if (isSized(source)) return source.size;
  return undefined;
}
