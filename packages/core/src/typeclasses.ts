/**
 * Comparer Typeclasses
 *
 * `Eq<A>` decides equality for the comparer-aware operators
 * (`enumerableEqual`, `indexOf`, `remove`, `toHashSet`). A comparer that
 * also implements `Hash<A>` lets those operators bucket elements instead
 * of scanning linearly.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 * - Hash compatibility: `equals(x, y) => hash(x) === hash(y)`
 */

// ============================================================================
// Eq
// ============================================================================

export interface Eq<A> {
  equals(a: A, b: A): boolean;
}

const DEFAULT_EQ: Eq<unknown> = {
  equals: (a, b) => a === b || (a !== a && b !== b),
};

/** SameValueZero, the equality native `Set` and `Map` use. */
export function eqDefault<A>(): Eq<A> {
  return DEFAULT_EQ;
}

export function isDefaultEq(eq: Eq<unknown>): boolean {
  return eq === DEFAULT_EQ;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b || (Number.isNaN(a) && Number.isNaN(b)),
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
};

/** Case-insensitive string equality (ASCII and Unicode lower-casing). */
export const eqStringIgnoreCase: Eq<string> = {
  equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(equals: (a: A, b: A) => boolean): Eq<A> {
  return { equals };
}

/**
 * Create an Eq instance by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B> = eqDefault<B>()): Eq<A> {
  return {
    equals: (a, b) => E.equals(f(a), f(b)),
  };
}

// ============================================================================
// Hash
// ============================================================================

export interface Hash<A> {
  hash(a: A): number;
}

/** A comparer that can bucket elements as well as compare them. */
export type EqHash<A> = Eq<A> & Hash<A>;

export function isHash<A>(eq: Eq<A>): eq is EqHash<A> {
  return "hash" in eq && typeof eq.hash === "function";
}

export const hashNumber: Hash<number> = {
  hash: (n) => {
    if (Number.isInteger(n)) return n | 0;
    return hashString.hash(String(n));
  },
};

/** 32-bit FNV-1a over UTF-16 code units. */
export const hashString: Hash<string> = {
  hash: (s) => {
    let h = 0x811c9dc5;
    for (let i = 0; i < s.length; i++) {
      h ^= s.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    return h >>> 0;
  },
};

export const eqHashNumber: EqHash<number> = { ...eqNumber, ...hashNumber };

export const eqHashString: EqHash<string> = { ...eqString, ...hashString };

export const eqHashStringIgnoreCase: EqHash<string> = {
  ...eqStringIgnoreCase,
  hash: (s) => hashString.hash(s.toLowerCase()),
};

/**
 * Create an Eq + Hash instance by mapping to a key that already has one.
 *
 * @example
 * ```typescript
 * const byId = eqHashBy((u: User) => u.id, eqHashNumber);
 * enumerableEqual(before, after, byId);
 * ```
 */
export function eqHashBy<A, B>(f: (a: A) => B, E: EqHash<B>): EqHash<A> {
  return {
    equals: (a, b) => E.equals(f(a), f(b)),
    hash: (a) => E.hash(f(a)),
  };
}
