import { describe, it, expect, afterEach } from "vitest";
import {
  ConstructionError,
  constructorOf,
  getProperties,
  getProperty,
  hasProperty,
  kindOf,
  mapProperties,
  propertyNames,
  reconstruct,
  registerConstructor,
  setProperties,
  unregisterConstructor,
} from "../index.js";

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  manhattan(): number {
    return Math.abs(this.x) + Math.abs(this.y);
  }
}

class Celsius {
  static rebuilds = 0;

  constructor(readonly degrees: number) {}

  [reconstruct](values: readonly unknown[]): Celsius {
    Celsius.rebuilds++;
    return new Celsius(Number(values[0]));
  }
}

class Account {
  #audit: string[];

  constructor(readonly owner: string) {
    this.#audit = [`opened by ${owner}`];
  }

  history(): string {
    return this.#audit.join(", ");
  }
}

class Temperature {
  constructor(
    readonly kelvin: number,
    readonly label: string
  ) {}
}

describe("propertyNames", () => {
  it("lists own enumerable keys of plain objects in insertion order", () => {
    expect(propertyNames({ b: 1, a: 2 })).toEqual(["b", "a"]);
  });

  it("lists array positions", () => {
    expect(propertyNames(["x", "y", "z"])).toEqual(["0", "1", "2"]);
  });

  it("lists constructor-assigned fields of class instances", () => {
    expect(propertyNames(new Point(1, 2))).toEqual(["x", "y"]);
  });

  it("reports no fields for primitives and internal-slot objects", () => {
    expect(propertyNames(42)).toEqual([]);
    expect(propertyNames("text")).toEqual([]);
    expect(propertyNames(undefined)).toEqual([]);
    expect(propertyNames(new Map([["a", 1]]))).toEqual([]);
    expect(propertyNames(new Date(0))).toEqual([]);
  });

  it("hasProperty checks against the enumerated fields", () => {
    expect(hasProperty({ a: 1 }, "a")).toBe(true);
    expect(hasProperty({ a: 1 }, "toString")).toBe(false);
  });
});

describe("getProperty / getProperties", () => {
  it("reads fields in construction order", () => {
    expect(getProperties(new Point(3, 4))).toEqual({ x: 3, y: 4 });
    expect(getProperty<number>({ a: 7 }, "a")).toBe(7);
  });

  it("rejects primitives", () => {
    expect(() => getProperty(1, "a")).toThrow(TypeError);
    expect(() => getProperty(1, "a")).toThrow('Cannot read field "a" of number');
  });
});

describe("setProperties", () => {
  it("replaces patched fields and keeps the rest", () => {
    const original = { a: 1, b: 2, c: 3 };
    const updated = setProperties(original, { b: 20 });
    expect(updated).toEqual({ a: 1, b: 20, c: 3 });
    expect(original).toEqual({ a: 1, b: 2, c: 3 });
    expect(updated).not.toBe(original);
  });

  it("preserves the prototype of class instances", () => {
    const p = new Point(1, 2);
    const q = setProperties(p, { x: 5 });
    expect(q).toBeInstanceOf(Point);
    expect(q.x).toBe(5);
    expect(q.y).toBe(2);
    expect(q.manhattan()).toBe(7);
    expect(p.x).toBe(1);
  });

  it("keeps frozen objects frozen", () => {
    const frozen = Object.freeze({ a: 1, b: 2 });
    const updated = setProperties(frozen, { a: 10 });
    expect(Object.isFrozen(updated)).toBe(true);
    expect(updated).toEqual({ a: 10, b: 2 });
  });

  it("rebuilds arrays positionally", () => {
    expect(setProperties(["a", "b"], { "1": "z" })).toEqual(["a", "z"]);
  });

  it("returns the same reference for an empty patch", () => {
    const obj = { a: 1 };
    expect(setProperties(obj, {})).toBe(obj);
    expect(setProperties(5, {})).toBe(5);
  });

  it("throws ConstructionError for unknown fields", () => {
    expect(() => setProperties({ a: 1, b: 2 }, { c: 3 })).toThrow(ConstructionError);
    expect(() => setProperties({ a: 1, b: 2 }, { c: 3 })).toThrow(
      'Object has no field "c". Known fields: a, b'
    );
  });

  it("error carries the kind and reason", () => {
    let caught: unknown;
    try {
      setProperties(new Point(0, 0), { z: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConstructionError);
    if (caught instanceof ConstructionError) {
      expect(caught.reason).toBe("unknown_field");
      expect(caught.kind).toBe("Point");
    }
  });

  it("rejects patches on values without fields", () => {
    expect(() => setProperties(5, { a: 1 })).toThrow('number has no field "a". Known fields: (none)');
  });
});

describe("constructorOf", () => {
  afterEach(() => {
    unregisterConstructor(Temperature);
    unregisterConstructor(Account);
  });

  it("builds plain objects from ordered values", () => {
    expect(constructorOf({ a: 1, b: 2 })(["x", "y"])).toEqual({ a: "x", b: "y" });
  });

  it("throws on arity mismatch", () => {
    expect(() => constructorOf({ a: 1, b: 2 })([1])).toThrow(
      "Object has 2 field(s) but 1 value(s) were given"
    );
  });

  it("uses the reconstruct protocol when an instance provides it", () => {
    Celsius.rebuilds = 0;
    const warmer = setProperties(new Celsius(20), { degrees: 30 });
    expect(warmer).toBeInstanceOf(Celsius);
    expect(warmer.degrees).toBe(30);
    expect(Celsius.rebuilds).toBe(1);
  });

  it("uses registered constructors and their field order", () => {
    registerConstructor(Temperature, {
      fields: ["label", "kelvin"],
      build: (values) => new Temperature(Number(values[1]), String(values[0])),
    });
    const t = new Temperature(300, "room");
    expect(propertyNames(t)).toEqual(["label", "kelvin"]);

    const relabelled = setProperties(t, { label: "warm" });
    expect(relabelled).toBeInstanceOf(Temperature);
    expect(relabelled.kelvin).toBe(300);
    expect(relabelled.label).toBe("warm");
  });

  it("rebuilds classes with private fields through their registered constructor", () => {
    const derived = setProperties(new Account("ada"), { owner: "bo" });
    expect(derived.owner).toBe("bo");
    expect(() => derived.history()).toThrow(TypeError);

    registerConstructor(Account, { build: (values) => new Account(String(values[0])) });
    const rebuilt = setProperties(new Account("ada"), { owner: "bo" });
    expect(rebuilt).toBeInstanceOf(Account);
    expect(rebuilt.history()).toBe("opened by bo");
  });

  it("falls back to the derived default once unregistered", () => {
    registerConstructor(Temperature, {
      build: () => new Temperature(0, "registered"),
    });
    unregisterConstructor(Temperature);
    const rebuilt = setProperties(new Temperature(1, "a"), { label: "b" });
    expect(rebuilt.label).toBe("b");
    expect(rebuilt.kelvin).toBe(1);
  });
});

describe("mapProperties", () => {
  it("maps every field in order", () => {
    expect(mapProperties((x: number) => x * 2, { a: 1, b: 2, c: 3 })).toEqual({ a: 2, b: 4, c: 6 });
  });

  it("passes the field name", () => {
    expect(mapProperties((v: unknown, name) => `${name}=${String(v)}`, { a: 1 })).toEqual({
      a: "a=1",
    });
  });

  it("maps arrays into arrays", () => {
    expect(mapProperties((x: number) => x + 1, [1, 2])).toEqual([2, 3]);
  });

  it("returns objects without fields unchanged", () => {
    const empty = {};
    expect(mapProperties((x: unknown) => x, empty)).toBe(empty);
    expect(mapProperties((x: unknown) => x, "abc")).toBe("abc");
  });
});

describe("kindOf", () => {
  it("names concrete kinds", () => {
    expect(kindOf(null)).toBe("null");
    expect(kindOf(undefined)).toBe("undefined");
    expect(kindOf([1])).toBe("Array");
    expect(kindOf(Object.freeze([1]))).toBe("frozen Array");
    expect(kindOf({})).toBe("Object");
    expect(kindOf(Object.create(null))).toBe("Object");
    expect(kindOf(new Point(0, 0))).toBe("Point");
  });
});
