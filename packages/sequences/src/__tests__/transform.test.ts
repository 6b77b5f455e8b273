import { describe, it, expect, vi, afterEach } from "vitest";
import { ArgumentError, ArgumentOutOfRangeError } from "@seqkit/core";
import { clump, cycle, repeatItems, take, tap } from "../transform.js";
import { caught, naturals, tracked, upTo } from "./tracked.js";

afterEach(() => {
  vi.restoreAllMocks();
});

// ===========================================================================
// clump
// ===========================================================================

describe("clump", () => {
  it("groups with a partial tail", () => {
    expect([...clump([1, 2, 3, 4, 5], 2)]).toEqual([[1, 2], [3, 4], [5]]);
    expect([...clump([1, 2, 3, 4, 5, 6], 3)]).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect([...clump([1, 2], 1)]).toEqual([[1], [2]]);
    expect([...clump([], 3)]).toEqual([]);
  });

  it("emits ceil(length / size) groups", () => {
    for (let length = 0; length <= 10; length++) {
      for (let size = 1; size <= 4; size++) {
        expect([...clump(upTo(length), size)]).toHaveLength(Math.ceil(length / size));
      }
    }
  });

  it("gives every group its own array", () => {
    const iterator = clump([1, 2, 3, 4], 2)[Symbol.iterator]();
    const first = iterator.next();
    const second = iterator.next();
    expect(first.value).toEqual([1, 2]);
    expect(second.value).toEqual([3, 4]);
    expect(first.value).not.toBe(second.value);
  });

  it("pulls one group's worth per group", () => {
    const source = tracked(naturals);
    const iterator = clump(source, 3)[Symbol.iterator]();
    expect(iterator.next().value).toEqual([0, 1, 2]);
    expect(source.pulls).toBe(3);
    iterator.return?.();
    expect(source.closed).toBe(1);
  });

  it("rejects a size below 1 or a fraction at call time", () => {
    const zero = caught(() => clump([1], 0));
    expect(zero).toBeInstanceOf(ArgumentOutOfRangeError);
    expect(zero).toMatchObject({
      paramName: "size",
      actualValue: 0,
      message: "size must be an integer >= 1, got 0.",
    });
    expect(() => clump([1], 1.5)).toThrow(ArgumentOutOfRangeError);
  });
});

// ===========================================================================
// cycle
// ===========================================================================

describe("cycle", () => {
  it("repeats the source", () => {
    expect([...take(cycle([1, 2, 3]), 7)]).toEqual([1, 2, 3, 1, 2, 3, 1]);
  });

  it("opens a fresh pass per repetition and closes the last one", () => {
    const source = tracked([1, 2]);
    expect([...take(cycle(source), 5)]).toEqual([1, 2, 1, 2, 1]);
    expect(source.opened).toBe(3);
    expect(source.pulls).toBe(5);
    expect(source.closed).toBe(1);
  });

  it("is empty over an empty source", () => {
    expect([...cycle([])]).toEqual([]);
  });

  it("warns and produces one pass over a one-shot iterator", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    function* once() {
      yield 1;
      yield 2;
    }
    expect([...take(cycle(once()), 10)]).toEqual([1, 2]);
    expect(warn).toHaveBeenCalledWith(
      "[seqkit:transform] cycle() over a one-shot iterator produces a single pass",
    );
  });

  it("does not warn for a re-iterable source", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    [...take(cycle([1]), 3)];
    expect(warn).not.toHaveBeenCalled();
  });
});

// ===========================================================================
// tap
// ===========================================================================

describe("tap", () => {
  it("passes values through and reports each index", () => {
    const seen: Array<[string, number]> = [];
    const result = [...tap(["a", "b", "c"], (value, index) => seen.push([value, index]))];
    expect(result).toEqual(["a", "b", "c"]);
    expect(seen).toEqual([
      ["a", 0],
      ["b", 1],
      ["c", 2],
    ]);
  });

  it("runs the action as each element is pulled", () => {
    const log: string[] = [];
    for (const value of tap([1, 2], (v) => log.push(`action ${v}`))) {
      log.push(`consumer ${value}`);
    }
    expect(log).toEqual(["action 1", "consumer 1", "action 2", "consumer 2"]);
  });

  it("restarts the index on every pass", () => {
    const indices: number[] = [];
    const tapped = tap([10, 20], (_, index) => indices.push(index));
    [...tapped];
    [...tapped];
    expect(indices).toEqual([0, 1, 0, 1]);
  });

  it("closes the source when the action throws", () => {
    const source = tracked([1, 2, 3]);
    const tapped = tap(source, (_, index) => {
      if (index === 1) throw new Error("boom");
    });
    expect(() => [...tapped]).toThrow("boom");
    expect(source.closed).toBe(1);
  });

  it("rejects a missing action", () => {
    const error = caught(() => Reflect.apply(tap, undefined, [[1], undefined]));
    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).toMatchObject({ paramName: "action" });
  });
});

// ===========================================================================
// repeatItems
// ===========================================================================

describe("repeatItems", () => {
  it("repeats each element in place", () => {
    expect([...repeatItems([1, 2], 3)]).toEqual([1, 1, 1, 2, 2, 2]);
    expect([...repeatItems(["a", "b", "c"], 2)]).toEqual(["a", "a", "b", "b", "c", "c"]);
    expect([...repeatItems([7], 1)]).toEqual([7]);
  });

  it("reads the source only as needed", () => {
    const source = tracked([1, 2, 3]);
    expect([...take(repeatItems(source, 2), 3)]).toEqual([1, 1, 2]);
    expect(source.pulls).toBe(2);
  });

  it("rejects a count below 1", () => {
    expect(caught(() => repeatItems([1], 0))).toMatchObject({
      paramName: "count",
      reason: "out_of_range",
    });
  });
});

// ===========================================================================
// take
// ===========================================================================

describe("take", () => {
  it("yields at most count elements", () => {
    expect([...take([1, 2, 3], 2)]).toEqual([1, 2]);
    expect([...take([1, 2], 5)]).toEqual([1, 2]);
    expect([...take([1, 2], 0)]).toEqual([]);
    expect([...take([1, 2], -1)]).toEqual([]);
  });

  it("rejects a count that is not an integer before reading", () => {
    const source = tracked(naturals);
    expect(() => take(source, NaN)).toThrow(ArgumentOutOfRangeError);
    expect(() => take(source, 1.5)).toThrow("count must be an integer, got 1.5.");
    expect(source.opened).toBe(0);
  });

  it("does not read past the last element taken", () => {
    const source = tracked(naturals);
    expect([...take(source, 3)]).toEqual([0, 1, 2]);
    expect(source.pulls).toBe(3);
    expect(source.closed).toBe(1);
  });
});
