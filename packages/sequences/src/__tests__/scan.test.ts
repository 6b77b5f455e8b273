import { describe, it, expect, vi } from "vitest";
import { iterate } from "../generate.js";
import { scan, scanl } from "../scan.js";
import { take } from "../transform.js";
import { caught, naturals, tracked } from "./tracked.js";

const add = (a: number, b: number) => a + b;

describe("iterate", () => {
  it("produces count values by repeated application", () => {
    expect([...iterate(1, 5, (x) => x * 2)]).toEqual([1, 2, 4, 8, 16]);
    expect([...iterate("a", 3, (s) => s + "a")]).toEqual(["a", "aa", "aaa"]);
  });

  it("is empty for a count of zero or less", () => {
    expect([...iterate(1, 0, (x) => x + 1)]).toEqual([]);
    expect([...iterate(1, -2, (x) => x + 1)]).toEqual([]);
  });

  it("rejects a count that is not an integer", () => {
    expect(caught(() => iterate(1, 2.5, (x) => x + 1))).toMatchObject({
      paramName: "count",
      reason: "out_of_range",
      actualValue: 2.5,
    });
    expect(() => iterate(1, NaN, (x) => x + 1)).toThrow("count must be an integer, got NaN.");
  });

  it("applies step count - 1 times, only when pulled", () => {
    const step = vi.fn((x: number) => x + 1);
    const values = iterate(0, 4, step);
    expect(step).not.toHaveBeenCalled();
    expect([...values]).toEqual([0, 1, 2, 3]);
    expect(step).toHaveBeenCalledTimes(3);
  });

  it("starts over on every pass", () => {
    const values = iterate(3, 2, (x) => x * 10);
    expect([...values]).toEqual([3, 30]);
    expect([...values]).toEqual([3, 30]);
  });

  it("accepts a falsy start but not a missing one", () => {
    expect([...iterate(0, 2, (x) => x - 1)]).toEqual([0, -1]);
    expect(caught(() => Reflect.apply(iterate, undefined, [null, 2, add]))).toMatchObject({
      paramName: "start",
      message: "start is null.",
    });
  });
});

describe("scan", () => {
  it("combines neighbouring pairs", () => {
    expect([...scan([1, 2, 3, 4], add)]).toEqual([3, 5, 7]);
    expect([...scan([1, 2, 3], (a, b) => `${a}${b}`)]).toEqual(["12", "23"]);
  });

  it("closes the source when combine throws", () => {
    const source = tracked(naturals);
    const throwing = scan(source, (a, b) => {
      if (b === 3) throw new Error("boom");
      return a + b;
    });
    expect(() => [...throwing]).toThrow("boom");
    expect(source.pulls).toBe(4);
    expect(source.closed).toBe(1);
  });

  it("is empty below two elements", () => {
    expect([...scan([1], add)]).toEqual([]);
    expect([...scan([], add)]).toEqual([]);
  });

  it("pairs each element with its predecessor, not the previous output", () => {
    const pairs: Array<[number, number]> = [];
    [...scan([5, 6, 7], (a, b) => pairs.push([a, b]))];
    expect(pairs).toEqual([
      [5, 6],
      [6, 7],
    ]);
  });

  it("reads one element ahead of its output", () => {
    const source = tracked(naturals);
    expect([...take(scan(source, add), 2)]).toEqual([1, 3]);
    expect(source.pulls).toBe(3);
    expect(source.closed).toBe(1);
  });
});

describe("scanl", () => {
  it("yields the running fold", () => {
    expect([...scanl([1, 2, 3, 4], add)]).toEqual([1, 3, 6, 10]);
    expect([...scanl([5], add)]).toEqual([5]);
    expect([...scanl([], add)]).toEqual([]);
  });

  it("feeds the accumulator back into combine", () => {
    const calls: Array<[number, number]> = [];
    const result = [
      ...scanl([1, 2, 3, 4], (acc, x) => {
        calls.push([acc, x]);
        return acc + x;
      }),
    ];
    expect(result).toEqual([1, 3, 6, 10]);
    expect(calls).toEqual([
      [1, 2],
      [3, 3],
      [6, 4],
    ]);
  });

  it("reads no further than its output", () => {
    const source = tracked(naturals);
    expect([...take(scanl(source, add), 3)]).toEqual([0, 1, 3]);
    expect(source.pulls).toBe(3);
  });

  it("closes the source when combine throws", () => {
    const source = tracked(naturals);
    const throwing = scanl(source, (acc, x) => {
      if (x === 2) throw new Error("boom");
      return acc + x;
    });
    expect(() => [...throwing]).toThrow("boom");
    expect(source.pulls).toBe(3);
    expect(source.closed).toBe(1);
  });

  it("rejects a missing combine", () => {
    expect(caught(() => Reflect.apply(scanl, undefined, [[1], null]))).toMatchObject({
      paramName: "combine",
    });
  });
});
