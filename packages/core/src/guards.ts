/**
 * Argument guards
 *
 * Call-time validation shared by every operator. Each guard narrows its
 * argument so the caller can use it without further checks.
 *
 * @example
 * ```typescript
 * export function clump<T>(source: Iterable<T>, size: number): Iterable<T[]> {
 *   requireIterable(source, "source");
 *   requireIntegerAtLeast(size, 1, "size");
 *   return defer(() => clumpIterator(source, size));
 * }
 * ```
 */

import { ArgumentError, ArgumentOutOfRangeError } from "./errors.js";
import type { Eq } from "./typeclasses.js";

export function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") return true;
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

export function requireIterable<T>(
  value: Iterable<T> | null | undefined,
  paramName: string,
): asserts value is Iterable<T> {
  if (!isIterable(value)) {
    throw new ArgumentError(paramName, "missing", `${paramName} is null or not iterable.`);
  }
}

export function requireFunction<F extends (...args: never[]) => unknown>(
  value: F | null | undefined,
  paramName: string,
): asserts value is F {
  if (typeof value !== "function") {
    throw new ArgumentError(paramName, "missing", `${paramName} is null or not a function.`);
  }
}

export function requireDefined<T>(
  value: T | null | undefined,
  paramName: string,
): asserts value is T {
  if (value === null || value === undefined) {
    throw new ArgumentError(paramName, "missing", `${paramName} is null.`);
  }
}

export function requireComparer<A>(
  value: Eq<A> | null | undefined,
  paramName: string,
): asserts value is Eq<A> {
  if (value === null || value === undefined || typeof value.equals !== "function") {
    throw new ArgumentError(paramName, "missing", `${paramName} is null or has no equals().`);
  }
}

export function requireInteger(value: number, paramName: string): void {
  if (!Number.isInteger(value)) {
    throw new ArgumentOutOfRangeError(
      paramName,
      value,
      `${paramName} must be an integer, got ${value}.`,
    );
  }
}

export function requireIntegerAtLeast(value: number, min: number, paramName: string): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ArgumentOutOfRangeError(
      paramName,
      value,
      `${paramName} must be an integer >= ${min}, got ${value}.`,
    );
  }
}
