/**
 * @focal/optics Showcase
 *
 * Building optics, composing them, and reading or updating nested data
 * through the generic get / set / modify entry points.
 *
 * Run: npx tsx packages/optics/examples/showcase.ts
 */

import assert from "node:assert/strict";
import {
  OpticDefinitionError,
  checkLaws,
  compose,
  dynamicIndex,
  elements,
  eqStrict,
  eqStructural,
  field,
  focus,
  get,
  getAll,
  ifOptic,
  index,
  last,
  lensLaws,
  modify,
  path,
  properties,
  recursive,
  set,
  tracer,
  type Optic,
} from "../src/index.js";

// ============================================================================
// 1. PRIMITIVE OPTICS
// ============================================================================

const order = {
  id: "o-1",
  customer: { name: "ada", tier: "gold" },
  lines: [
    { sku: "pen", qty: 2, price: 150 },
    { sku: "ink", qty: 1, price: 900 },
  ],
};

assert.equal(get(order, field<string>("id")), "o-1");
assert.equal(get(order.lines, index<{ qty: number }>(1)).qty, 1);

const renamed = set(order, path(field("customer"), field<string>("name")), "grace");
assert.equal(renamed.customer.name, "grace");
assert.equal(order.customer.name, "ada");
assert.equal(renamed.lines, order.lines);

// ============================================================================
// 2. COLLECTIONS AND CONDITIONS
// ============================================================================

const quantities = path(field("lines"), elements(), field<number>("qty"));
assert.deepEqual(getAll(order, quantities), [2, 1]);

const doubled = modify((q) => q * 2, order, quantities);
assert.deepEqual(
  doubled.lines.map((l) => l.qty),
  [4, 2]
);

const expensive = compose(
  field<number>("price"),
  ifOptic((line: { price: number }) => line.price > 500),
  elements(),
  field("lines")
);
const discounted = modify((p) => p - 100, order, expensive);
assert.deepEqual(
  discounted.lines.map((l) => l.price),
  [150, 800]
);

// ============================================================================
// 3. INDICES COMPUTED FROM THE DATA
// ============================================================================

assert.equal(get([3, 1, 4], last<number>()), 4);
const widest = dynamicIndex((xs: number[]) => [xs.indexOf(Math.max(...xs))]);
assert.deepEqual(set([3, 9, 4], widest, 0), [3, 0, 4]);

// ============================================================================
// 4. RECURSION AND WHOLE-OBJECT UPDATES
// ============================================================================

const settings = { theme: undefined, layout: { width: 80, height: undefined } };
const fillMissing = recursive((v) => v !== undefined, properties());
assert.deepEqual(set(settings, fillMissing, "auto"), {
  theme: "auto",
  layout: { width: 80, height: "auto" },
});

// ============================================================================
// 5. FOCUSED VALUES, MUTABLE MODE, CUSTOM OPTICS
// ============================================================================

const tierFocus = focus(order, field("customer")).at(field<string>("tier"));
assert.equal(tierFocus.get(), "gold");

const counters = [0, 0, 0];
assert.equal(set(counters, index<number>(1), 5, { mode: "mutable" }), counters);
assert.deepEqual(counters, [0, 5, 0]);

const minutes: Optic<{ seconds: number }, number> = {
  kind: "Minutes",
  get: (o) => o.seconds / 60,
  set: (o, m) => ({ ...o, seconds: m * 60 }),
};
assert.deepEqual(modify((m) => m + 1, { seconds: 120 }, minutes), { seconds: 180 });
assert.deepEqual(checkLaws(lensLaws(minutes, eqStructural(), eqStrict()), [[{ seconds: 120 }, 5, 7]]), []);

const readOnly: Optic<{ seconds: number }, number> = { kind: "ReadOnly", get: (o) => o.seconds };
assert.throws(() => set({ seconds: 1 }, readOnly, 2), OpticDefinitionError);

// ============================================================================
// 6. TRACING
// ============================================================================

tracer.enable();
modify((q) => q + 1, order, quantities);
console.log(tracer.format());
tracer.disable();

console.log("@focal/optics showcase passed");
