/**
 * Bag equality
 */

import { createBag } from "@seqkit/collections";
import { createLogger, requireComparer, requireIterable, type Eq } from "@seqkit/core";
import { CursorScope } from "./cursor.js";

const log = createLogger("equality");

/**
 * True if `first` and `second` hold the same multiset of elements,
 * in any order: `[1, 2, 2]` equals `[2, 1, 2]` but not `[1, 2]`.
 *
 * Both sources are pulled in lockstep. Each new element first cancels a
 * pending match from the other side, so the pending bags grow only with
 * the imbalance between the two sequences, not with their length. When
 * one side ends while the other still produced an element in the same
 * step, the lengths differ and nothing further is pulled.
 *
 * With a comparer that implements `Hash`, pending elements are bucketed;
 * with an `Eq`-only comparer they are scanned linearly.
 */
export function enumerableEqual<T>(
  first: Iterable<T>,
  second: Iterable<T>,
  comparer?: Eq<T>,
): boolean {
  requireIterable(first, "first");
  requireIterable(second, "second");
  if (comparer !== undefined) requireComparer(comparer, "comparer");

  const firstPending = createBag(comparer);
  const secondPending = createBag(comparer);
  log.debug(`comparing with ${firstPending.kind} bags`);

  const scope = new CursorScope();
  try {
    const left = scope.open(first);
    const right = scope.open(second);

    while (true) {
      const a = left.next();
      if (!a.done && !secondPending.removeMatch(a.value)) firstPending.add(a.value);

      const b = right.next();
      if (!b.done && !firstPending.removeMatch(b.value)) secondPending.add(b.value);

      if (left.isFinished || right.isFinished) {
        return (
          left.isFinished &&
          right.isFinished &&
          firstPending.size === 0 &&
          secondPending.size === 0
        );
      }
    }
  } finally {
    scope.close();
  }
}
