/**
 * @focal/construct Showcase
 *
 * Field introspection, reconstruction with some fields replaced, and keyed
 * reads and writes across arrays, Maps and plain objects.
 *
 * Run: npx tsx packages/construct/examples/showcase.ts
 */

import assert from "node:assert/strict";
import {
  ConstructionError,
  getIndex,
  mapElements,
  mapProperties,
  propertyNames,
  reconstruct,
  registerConstructor,
  setIndex,
  setIndexInPlace,
  setProperties,
} from "../src/index.js";

// ============================================================================
// 1. INTROSPECTION - Fields in construction order
// ============================================================================

class Vec {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  length(): number {
    return Math.hypot(this.x, this.y);
  }
}

assert.deepEqual(propertyNames(new Vec(3, 4)), ["x", "y"]);
assert.deepEqual(propertyNames(["a", "b"]), ["0", "1"]);
assert.deepEqual(propertyNames(new Date(0)), []);

// ============================================================================
// 2. RECONSTRUCTION - Same kind, some fields replaced
// ============================================================================

const moved = setProperties(new Vec(3, 4), { y: 0 });
assert.ok(moved instanceof Vec);
assert.equal(moved.length(), 3);

const frozen = setProperties(Object.freeze({ a: 1, b: 2 }), { b: 20 });
assert.ok(Object.isFrozen(frozen));

assert.throws(() => setProperties({ a: 1 }, { nope: 2 }), ConstructionError);

// Classes with their own rebuilding logic
class Money {
  constructor(
    readonly cents: number,
    readonly currency: string
  ) {}

  [reconstruct](values: readonly unknown[]): Money {
    return new Money(Math.round(Number(values[0])), String(values[1]));
  }
}

assert.equal(setProperties(new Money(100, "EUR"), { cents: 99.6 }).cents, 100);

// Classes whose constructor differs from their fields
class Range {
  readonly size: number;
  constructor(readonly start: number, end: number) {
    this.size = end - start;
  }
}

registerConstructor(Range, {
  fields: ["start", "size"],
  build: (values) => new Range(Number(values[0]), Number(values[0]) + Number(values[1])),
});
assert.equal(setProperties(new Range(0, 10), { start: 5 }).size, 10);

assert.deepEqual(mapProperties((n: number) => n * 2, { a: 1, b: 2 }), { a: 2, b: 4 });

// ============================================================================
// 3. INDEXING - Keyed reads and writes
// ============================================================================

const grid = [
  [1, 2],
  [3, 4],
];
assert.equal(getIndex(grid, [1, 0]), 3);

const copy = setIndex(grid, 0, [0, 0]);
assert.deepEqual(copy[0], [0, 2]);
assert.equal(copy[1], grid[1]);

const counts = new Map([["a", 1]]);
assert.equal(setIndexInPlace(counts, 2, ["a"]), counts);
assert.equal(counts.get("a"), 2);

assert.deepEqual([...mapElements((n: number) => n + 1, new Set([1, 2]))], [2, 3]);

console.log("@focal/construct showcase passed");
