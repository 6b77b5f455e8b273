/**
 * Cursors and cursor scopes
 *
 * Single-source operators iterate with `for...of`, which already closes
 * the source on `break`, `return` and `throw`. Operators that step several
 * sources by hand (`zip*`, `enumerableEqual`) open them through a
 * `CursorScope` instead, and close the scope in a `finally`.
 */

/**
 * A pull cursor over one pass of an iterable. `close()` calls the
 * iterator's `return()` unless the pass already ran to completion.
 */
export class Cursor<T> {
  private readonly iterator: Iterator<T>;
  private finished = false;

  constructor(source: Iterable<T>) {
    this.iterator = source[Symbol.iterator]();
  }

  next(): IteratorResult<T, unknown> {
    const result = this.iterator.next();
    if (result.done) this.finished = true;
    return result;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  close(): void {
    if (this.finished) return;
    this.finished = true;
    this.iterator.return?.();
  }
}

/**
 * Owns every cursor opened during one pass and closes them in reverse
 * opening order. If a `return()` throws, the remaining cursors are still
 * closed; a single failure is rethrown as is, several as an AggregateError.
 *
 * @example
 * ```typescript
 * const scope = new CursorScope();
 * try {
 *   const a = scope.open(left);
 *   const b = scope.open(right);
 *   // ...
 * } finally {
 *   scope.close();
 * }
 * ```
 */
export class CursorScope {
  private readonly cursors: Cursor<unknown>[] = [];

  open<T>(source: Iterable<T>): Cursor<T> {
    const cursor = new Cursor(source);
    this.cursors.push(cursor);
    return cursor;
  }

  get openCount(): number {
    return this.cursors.length;
  }

  close(): void {
    const errors: unknown[] = [];
    while (this.cursors.length > 0) {
      const cursor = this.cursors.pop();
      try {
        cursor?.close();
      } catch (error) {
        errors.push(error);
      }
    }
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} cursors failed to close`);
    }
  }
}

/**
 * Wrap a generator function as a re-iterable sequence: every
 * `[Symbol.iterator]()` call starts a fresh, independent pass.
 */
export function defer<T>(factory: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}
