/**
 * Multi-source zips
 *
 * `zipN(s1, ..., sN, combine)` yields `combine(a_i, b_i, ...)` for each
 * position `i` that every source reaches. Each step advances the cursors
 * left to right and stops at the first exhausted one, so the sources after
 * it are not advanced for that step; a longer source is never read past
 * the shortest one's end.
 *
 * All sources and the combiner are validated at call time. Every cursor a
 * pass opened is closed when it ends, is abandoned, or throws.
 *
 * @example
 * ```typescript
 * const rows = zip3(ids, names, scores, (id, name, score) => ({ id, name, score }));
 * ```
 */

import { requireFunction, requireIterable } from "@seqkit/core";
import { CursorScope, defer } from "./cursor.js";

// ============================================================================
// zip2
// ============================================================================

export function zip2<A, B, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  combine: (a: A, b: B) => R,
): Iterable<R> {
  requireIterable(source1, "source1");
  requireIterable(source2, "source2");
  requireFunction(combine, "combine");
  return defer(() => zip2Iterator(source1, source2, combine));
}

function* zip2Iterator<A, B, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  combine: (a: A, b: B) => R,
): Generator<R> {
  const scope = new CursorScope();
  try {
    const c1 = scope.open(source1);
    const c2 = scope.open(source2);
    while (true) {
      const r1 = c1.next();
      if (r1.done) return;
      const r2 = c2.next();
      if (r2.done) return;
      yield combine(r1.value, r2.value);
    }
  } finally {
    scope.close();
  }
}

// ============================================================================
// zip3
// ============================================================================

export function zip3<A, B, C, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  combine: (a: A, b: B, c: C) => R,
): Iterable<R> {
  requireIterable(source1, "source1");
  requireIterable(source2, "source2");
  requireIterable(source3, "source3");
  requireFunction(combine, "combine");
  return defer(() => zip3Iterator(source1, source2, source3, combine));
}

function* zip3Iterator<A, B, C, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  combine: (a: A, b: B, c: C) => R,
): Generator<R> {
  const scope = new CursorScope();
  try {
    const c1 = scope.open(source1);
    const c2 = scope.open(source2);
    const c3 = scope.open(source3);
    while (true) {
      const r1 = c1.next();
      if (r1.done) return;
      const r2 = c2.next();
      if (r2.done) return;
      const r3 = c3.next();
      if (r3.done) return;
      yield combine(r1.value, r2.value, r3.value);
    }
  } finally {
    scope.close();
  }
}

// ============================================================================
// zip4
// ============================================================================

export function zip4<A, B, C, D, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  source4: Iterable<D>,
  combine: (a: A, b: B, c: C, d: D) => R,
): Iterable<R> {
  requireIterable(source1, "source1");
  requireIterable(source2, "source2");
  requireIterable(source3, "source3");
  requireIterable(source4, "source4");
  requireFunction(combine, "combine");
  return defer(() => zip4Iterator(source1, source2, source3, source4, combine));
}

function* zip4Iterator<A, B, C, D, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  source4: Iterable<D>,
  combine: (a: A, b: B, c: C, d: D) => R,
): Generator<R> {
  const scope = new CursorScope();
  try {
    const c1 = scope.open(source1);
    const c2 = scope.open(source2);
    const c3 = scope.open(source3);
    const c4 = scope.open(source4);
    while (true) {
      const r1 = c1.next();
      if (r1.done) return;
      const r2 = c2.next();
      if (r2.done) return;
      const r3 = c3.next();
      if (r3.done) return;
      const r4 = c4.next();
      if (r4.done) return;
      yield combine(r1.value, r2.value, r3.value, r4.value);
    }
  } finally {
    scope.close();
  }
}

// ============================================================================
// zip5
// ============================================================================

export function zip5<A, B, C, D, E, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  source4: Iterable<D>,
  source5: Iterable<E>,
  combine: (a: A, b: B, c: C, d: D, e: E) => R,
): Iterable<R> {
  requireIterable(source1, "source1");
  requireIterable(source2, "source2");
  requireIterable(source3, "source3");
  requireIterable(source4, "source4");
  requireIterable(source5, "source5");
  requireFunction(combine, "combine");
  return defer(() => zip5Iterator(source1, source2, source3, source4, source5, combine));
}

function* zip5Iterator<A, B, C, D, E, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  source4: Iterable<D>,
  source5: Iterable<E>,
  combine: (a: A, b: B, c: C, d: D, e: E) => R,
): Generator<R> {
  const scope = new CursorScope();
  try {
    const c1 = scope.open(source1);
    const c2 = scope.open(source2);
    const c3 = scope.open(source3);
    const c4 = scope.open(source4);
    const c5 = scope.open(source5);
    while (true) {
      const r1 = c1.next();
      if (r1.done) return;
      const r2 = c2.next();
      if (r2.done) return;
      const r3 = c3.next();
      if (r3.done) return;
      const r4 = c4.next();
      if (r4.done) return;
      const r5 = c5.next();
      if (r5.done) return;
      yield combine(r1.value, r2.value, r3.value, r4.value, r5.value);
    }
  } finally {
    scope.close();
  }
}

// ============================================================================
// zip6
// ============================================================================

export function zip6<A, B, C, D, E, F, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  source4: Iterable<D>,
  source5: Iterable<E>,
  source6: Iterable<F>,
  combine: (a: A, b: B, c: C, d: D, e: E, f: F) => R,
): Iterable<R> {
  requireIterable(source1, "source1");
  requireIterable(source2, "source2");
  requireIterable(source3, "source3");
  requireIterable(source4, "source4");
  requireIterable(source5, "source5");
  requireIterable(source6, "source6");
  requireFunction(combine, "combine");
  return defer(() => zip6Iterator(source1, source2, source3, source4, source5, source6, combine));
}

function* zip6Iterator<A, B, C, D, E, F, R>(
  source1: Iterable<A>,
  source2: Iterable<B>,
  source3: Iterable<C>,
  source4: Iterable<D>,
  source5: Iterable<E>,
  source6: Iterable<F>,
  combine: (a: A, b: B, c: C, d: D, e: E, f: F) => R,
): Generator<R> {
  const scope = new CursorScope();
  try {
    const c1 = scope.open(source1);
    const c2 = scope.open(source2);
    const c3 = scope.open(source3);
    const c4 = scope.open(source4);
    const c5 = scope.open(source5);
    const c6 = scope.open(source6);
    while (true) {
      const r1 = c1.next();
      if (r1.done) return;
      const r2 = c2.next();
      if (r2.done) return;
      const r3 = c3.next();
      if (r3.done) return;
      const r4 = c4.next();
      if (r4.done) return;
      const r5 = c5.next();
      if (r5.done) return;
      const r6 = c6.next();
      if (r6.done) return;
      yield combine(r1.value, r2.value, r3.value, r4.value, r5.value, r6.value);
    }
  } finally {
    scope.close();
  }
}
