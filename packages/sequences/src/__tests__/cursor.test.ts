import { describe, it, expect } from "vitest";
import { Cursor, CursorScope, defer } from "../cursor.js";
import { tracked } from "./tracked.js";

/** An iterable whose `return()` records `name` (and optionally throws) */
function closable(name: string, log: string[], failure?: Error): Iterable<number> {
  return {
    [Symbol.iterator](): Iterator<number> {
      return {
        next: () => ({ done: false, value: 0 }),
        return: () => {
          log.push(name);
          if (failure) throw failure;
          return { done: true, value: undefined };
        },
      };
    },
  };
}

describe("Cursor", () => {
  it("closes an unfinished pass", () => {
    const source = tracked([1, 2]);
    const cursor = new Cursor(source);
    expect(cursor.next()).toEqual({ done: false, value: 1 });
    cursor.close();
    expect(source.closed).toBe(1);
    expect(cursor.isFinished).toBe(true);
  });

  it("does not close a pass that ran to completion", () => {
    const source = tracked([1]);
    const cursor = new Cursor(source);
    cursor.next();
    expect(cursor.next().done).toBe(true);
    cursor.close();
    cursor.close();
    expect(source.closed).toBe(0);
  });
});

describe("CursorScope", () => {
  it("closes cursors in reverse opening order", () => {
    const log: string[] = [];
    const scope = new CursorScope();
    scope.open(closable("a", log));
    scope.open(closable("b", log));
    scope.open(closable("c", log));
    expect(scope.openCount).toBe(3);
    scope.close();
    expect(log).toEqual(["c", "b", "a"]);
    expect(scope.openCount).toBe(0);
  });

  it("closes the rest and rethrows a single failure", () => {
    const log: string[] = [];
    const failure = new Error("close failed");
    const scope = new CursorScope();
    scope.open(closable("a", log));
    scope.open(closable("b", log, failure));
    expect(() => scope.close()).toThrow(failure);
    expect(log).toEqual(["b", "a"]);
  });

  it("aggregates several failures", () => {
    const log: string[] = [];
    const scope = new CursorScope();
    scope.open(closable("a", log, new Error("a failed")));
    scope.open(closable("b", log, new Error("b failed")));

    let thrown: unknown;
    try {
      scope.close();
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(AggregateError);
    expect(thrown).toMatchObject({ message: "2 cursors failed to close" });
    expect(log).toEqual(["b", "a"]);
  });
});

describe("defer", () => {
  it("starts an independent pass per iterator", () => {
    let calls = 0;
    const values = defer(function* () {
      calls++;
      yield calls;
    });
    expect(calls).toBe(0);
    expect([...values]).toEqual([1]);
    expect([...values]).toEqual([2]);
  });
});
