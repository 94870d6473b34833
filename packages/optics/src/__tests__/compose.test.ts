import { describe, it, expect, expectTypeOf } from "vitest";
import {
  ComposedOptic,
  IdentityOptic,
  OpticDefinitionError,
  compose,
  composedOpticStyle,
  elements,
  field,
  get,
  identity,
  index,
  modify,
  opticStyle,
  path,
  set,
  type ComposedStyle,
  type ElementsOptic,
  type FieldOptic,
} from "../index.js";

const person = { name: "ada", address: { street: "Main", number: 1 } };

describe("compose", () => {
  it("reads inner first, then outer", () => {
    const street = compose(field<string>("street"), field("address"));
    expect(get(person, street)).toBe("Main");
    expect(get(person, street)).toBe(get(get(person, field("address")), field<string>("street")));
  });

  it("sets through both levels and shares untouched branches", () => {
    const grid = { rows: [[1, 2], [3, 4]], meta: { size: 2 } };
    const cell = compose(index<number>(1, 0), field("rows"));
    const updated = set(grid, cell, 30);
    expect(updated).toEqual({ rows: [[1, 2], [30, 4]], meta: { size: 2 } });
    expect(updated.meta).toBe(grid.meta);
    expect(grid.rows[1]).toEqual([3, 4]);
  });

  it("drives modify-based components through modify", () => {
    const prices = compose(field<number>("price"), elements());
    const items = [{ price: 1 }, { price: 2 }];
    expect(modify((p: number) => p * 100, items, prices)).toEqual([{ price: 100 }, { price: 200 }]);
    expect(set(items, prices, 0)).toEqual([{ price: 0 }, { price: 0 }]);
  });

  it("raises a definition error when reading through a multi-focus component", () => {
    const prices = compose(field<number>("price"), elements());
    expect(() => get([{ price: 1 }], prices)).toThrow(OpticDefinitionError);
  });

  it("treats identity as neutral on both sides", () => {
    const a = field("a");
    expect(compose(identity(), a)).toBe(a);
    expect(compose(a, identity())).toBe(a);
    expect(compose(a)).toBe(a);
    expect(compose()).toBeInstanceOf(IdentityOptic);
  });

  it("associates to the left", () => {
    const a = field("a");
    const b = field("b");
    const c = field("c");
    const abc = compose(a, b, c);
    if (!(abc instanceof ComposedOptic)) throw new Error("expected a composed optic");
    expect(abc.inner).toBe(c);
    expect(abc.outer).toBeInstanceOf(ComposedOptic);
    expect(abc.describe()).toBe("Field(a) ∘ Field(b) ∘ Field(c)");
  });

  it("applies a four-stage pipeline", () => {
    const data = { a: { b: [{ c: 1 }, { c: 2 }] } };
    const second = compose(field<number>("c"), index(1), field("b"), field("a"));
    expect(get(data, second)).toBe(2);
    expect(set(data, second, 9)).toEqual({ a: { b: [{ c: 1 }, { c: 9 }] } });
  });
});

describe("path", () => {
  it("composes in reading order", () => {
    const street = path(field("address"), field<string>("street"));
    expect(get(person, street)).toBe("Main");
    expect(set(person, street, "High").address).toEqual({ street: "High", number: 1 });
  });

  it("is compose reversed", () => {
    const p = path(field("a"), field("b"), field("c"));
    expect(p.describe?.()).toBe("Field(c) ∘ Field(b) ∘ Field(a)");
  });
});

describe("composed style", () => {
  it("is modify-based when either side is", () => {
    expect(opticStyle(compose(field("a"), field("b")))).toBe("set-based");
    expect(opticStyle(compose(field("a"), elements()))).toBe("modify-based");
    expect(opticStyle(compose(elements(), field("a")))).toBe("modify-based");
    expect(composedOpticStyle(elements(), elements())).toBe("modify-based");
  });

  it("is computed at the type level too", () => {
    expectTypeOf<ComposedStyle<FieldOptic, FieldOptic>>().toEqualTypeOf<"set-based">();
    expectTypeOf<ComposedStyle<FieldOptic, ElementsOptic>>().toEqualTypeOf<"modify-based">();
    expectTypeOf<ComposedStyle<ElementsOptic, FieldOptic>>().toEqualTypeOf<"modify-based">();
  });
});
