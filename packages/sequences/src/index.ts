/**
 * @seqkit/sequences: lazy sequence operators
 *
 * Laziness-preserving operators over any `Iterable<T>`:
 *
 * - counting: `atLeast`, `atMost` (optionally filtered)
 * - bag equality: `enumerableEqual`
 * - lazy transforms: `clump`, `cycle`, `tap`, `repeatItems`, `take`
 * - generation: `iterate`
 * - scans: `scan` (pairwise), `scanl` (running fold)
 * - zips: `zip2` through `zip6`
 *
 * Every lazy operator validates its arguments when called, does no work
 * until pulled, and closes the sources it opened on every exit path.
 *
 * @example
 * ```typescript
 * import { seq, clump, zip3 } from "@seqkit/sequences";
 *
 * [...clump([1, 2, 3, 4, 5], 2)];                   // [[1, 2], [3, 4], [5]]
 * seq([1, 2, 3]).cycle().take(7).toArray();          // [1, 2, 3, 1, 2, 3, 1]
 * [...zip3([1, 2], "ab", [true, false], (n, c, b) => `${n}${c}${b}`)];
 * ```
 */

export { atLeast, atMost } from "./counting.js";
export { enumerableEqual } from "./equality.js";
export { clump, cycle, tap, repeatItems, take } from "./transform.js";
export { iterate } from "./generate.js";
export { scan, scanl } from "./scan.js";
export { zip2, zip3, zip4, zip5, zip6 } from "./zip.js";
export { forEach, onlyOrDefault, emptyIfNull, toArray } from "./consume.js";
export { Cursor, CursorScope, defer } from "./cursor.js";
export { Seq, seq } from "./seq.js";
