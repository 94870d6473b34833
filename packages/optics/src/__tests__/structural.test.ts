import { describe, it, expect, afterEach } from "vitest";
import {
  RecursionLimitError,
  compose,
  config,
  elements,
  field,
  getAll,
  ifOptic,
  modify,
  properties,
  recursive,
  set,
} from "../index.js";

class Pair {
  constructor(
    readonly left: number,
    readonly right: number
  ) {}
}

describe("elements", () => {
  it("maps every element", () => {
    expect(modify((x: number) => x + 1, [1, 2, 3], elements<number>())).toEqual([2, 3, 4]);
  });

  it("derives set as replacing every element", () => {
    expect(set([1, 2, 3], elements<number>(), 0)).toEqual([0, 0, 0]);
  });

  it("keeps the collection kind", () => {
    const frozen = modify((x: number) => x * 2, Object.freeze([1, 2]), elements<number>());
    expect(Object.isFrozen(frozen)).toBe(true);

    const members = modify((x: number) => x * 2, new Set([1, 2]), elements<number>());
    expect([...members]).toEqual([2, 4]);

    const values = modify((x: number) => x * 2, new Map([["a", 1]]), elements<number>());
    expect(values.get("a")).toBe(2);
  });

  it("leaves the original untouched", () => {
    const xs = [1, 2];
    modify((x: number) => x + 1, xs, elements<number>());
    expect(xs).toEqual([1, 2]);
  });
});

describe("properties", () => {
  it("sets every named field", () => {
    expect(set({ a: 1, b: 2 }, properties(), "x")).toEqual({ a: "x", b: "x" });
  });

  it("maps fields in insertion order on the same kind", () => {
    const seen: unknown[] = [];
    const doubled = modify(
      (v: number) => {
        seen.push(v);
        return v * 2;
      },
      new Pair(3, 4),
      properties<number>()
    );
    expect(doubled).toBeInstanceOf(Pair);
    expect(doubled.left).toBe(6);
    expect(doubled.right).toBe(8);
    expect(seen).toEqual([3, 4]);
  });

  it("returns objects without fields unchanged", () => {
    const empty = {};
    expect(set(empty, properties(), 1)).toBe(empty);
    expect(set(5, properties(), 1)).toBe(5);
  });
});

describe("ifOptic", () => {
  it("applies only where the predicate holds", () => {
    const isEven = (x: number): boolean => x % 2 === 0;
    expect(modify((x: number) => x * 10, [1, 2, 3, 4, 5, 6], compose(ifOptic(isEven), elements<number>()))).toEqual([
      1, 20, 3, 40, 5, 60,
    ]);
  });

  it("focuses the object itself", () => {
    const positive = ifOptic((x: number) => x > 0);
    expect(set(5, positive, 0)).toBe(0);
    expect(set(-5, positive, 0)).toBe(-5);
  });

  it("restricts getAll", () => {
    expect(getAll([1, 2, 3, 4], compose(ifOptic((x: number) => x > 2), elements<number>()))).toEqual([3, 4]);
  });

  it("is named after its predicate", () => {
    function isSmall(x: number): boolean {
      return x < 10;
    }
    expect(ifOptic(isSmall).describe()).toBe("If(isSmall)");
  });
});

describe("recursive", () => {
  afterEach(() => {
    config.reset();
  });

  it("replaces every leaf that is not descended into", () => {
    const nested = { a: undefined, b: 1, c: { d: undefined, e: 2 } };
    const notMissing = (x: unknown): boolean => x !== undefined;
    expect(set(nested, recursive(notMissing, properties()), 100)).toEqual({
      a: 100,
      b: 1,
      c: { d: 100, e: 2 },
    });
  });

  it("recurses into nested arrays depth first", () => {
    const leaves = recursive((x) => Array.isArray(x), elements());
    expect(modify((x) => Number(x) + 1, [1, [2, [3]]], leaves)).toEqual([2, [3, [4]]]);
    expect(getAll([1, [2, [3]], 4], leaves)).toEqual([1, 2, 3, 4]);
  });

  it("never tests the top-level object", () => {
    const tested: unknown[] = [];
    const optic = recursive((x) => {
      tested.push(x);
      return false;
    }, elements());
    modify((x) => x, [7, 8], optic);
    expect(tested).toEqual([7, 8]);
  });

  it("composes with field optics", () => {
    const deepNumbers = compose(recursive((x) => Array.isArray(x), elements()), field("grid"));
    expect(modify((x) => Number(x) * 2, { grid: [1, [2]], label: "g" }, deepNumbers)).toEqual({
      grid: [2, [4]],
      label: "g",
    });
  });

  it("raises RecursionLimitError past the configured limit", () => {
    config.set({ recursion: { limit: 5 } });
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    const optic = recursive((x) => Array.isArray(x), elements());
    expect(() => modify((x) => x, cyclic, optic)).toThrow(RecursionLimitError);
    expect(() => modify((x) => x, cyclic, optic)).toThrow(
      "Recursive(Elements) exceeded the recursion limit of 5"
    );
  });

  it("raises RecursionLimitError at the default limit before the stack runs out", () => {
    const nest = (levels: number): unknown => {
      let value: unknown = 0;
      for (let i = 0; i < levels; i++) value = [value];
      return value;
    };
    const optic = recursive((x) => Array.isArray(x), elements());
    expect(getAll(nest(200), optic)).toEqual([0]);
    expect(() => modify((x) => x, nest(300), optic)).toThrow(
      "Recursive(Elements) exceeded the recursion limit of 256"
    );
    expect(() => modify((x) => x, nest(5000), optic)).toThrow(RecursionLimitError);
  });

  it("guards deep records walked by properties()", () => {
    let chain: unknown = { leaf: 1 };
    for (let i = 0; i < 1000; i++) chain = { next: chain };
    const isRecord = (x: unknown): boolean => typeof x === "object" && x !== null;
    expect(() => modify((x) => x, chain, recursive(isRecord, properties()))).toThrow(
      RecursionLimitError
    );
  });

  it("stays within the limit for shallow data", () => {
    config.set({ recursion: { limit: 3 } });
    const optic = recursive((x) => Array.isArray(x), elements());
    expect(modify((x) => Number(x) * 2, [1, [2]], optic)).toEqual([2, [4]]);
  });
});
