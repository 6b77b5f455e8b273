import { requireDefined, requireFunction, requireInteger } from "@seqkit/core";
import { defer } from "./cursor.js";

/**
 * `start, step(start), step(step(start)), ...`, exactly `count` values
 * (none when `count <= 0`). `step` runs only when the next value is pulled.
 *
 * @example
 * ```typescript
 * [...iterate(1, 5, (x) => x * 2)]; // [1, 2, 4, 8, 16]
 * ```
 */
export function iterate<T>(start: T, count: number, step: (value: T) => T): Iterable<T> {
  requireDefined(start, "start");
  requireInteger(count, "count");
  requireFunction(step, "step");
  return defer(() => iterateIterator(start, count, step));
}

function* iterateIterator<T>(start: T, count: number, step: (value: T) => T): Generator<T> {
  let current = start;
  for (let i = 0; i < count; i++) {
    if (i > 0) current = step(current);
    yield current;
  }
}
