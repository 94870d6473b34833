/**
 * Property Introspection and Reconstruction
 *
 * Enumerates the named fields of an object and rebuilds objects of the same
 * concrete kind from a complete, ordered list of field values.
 *
 * The "build from ordered field values" capability is resolved per object:
 *
 * 1. An instance method keyed by the {@link reconstruct} symbol
 * 2. A constructor registered for the object's exact prototype
 * 3. A derived default: arrays are copied (frozen arrays stay frozen), other
 *    objects are rebuilt on the same prototype with the same own fields
 *
 * The derived default never runs the class constructor, so instances of
 * classes with `#private` fields or other constructor-held state must be
 * rebuilt through `registerConstructor` or `[reconstruct]`.
 *
 * Objects without named fields (primitives, `Map`, `Set`, `Date`, ...) are
 * returned unchanged by every rebuilding operation.
 */

import { ConstructionError } from "./errors.js";
import { hasOwn, isObjectLike, isOpaqueObject, kindOf } from "./guards.js";
import type { Constructor, ConstructorSpec } from "./types.js";

// ============================================================================
// Reconstruction Protocol
// ============================================================================

/**
 * Symbol under which an object can provide its own reconstruction.
 *
 * @example
 * ```typescript
 * class Vec {
 *   constructor(readonly x: number, readonly y: number) {}
 *   [reconstruct](values: readonly unknown[]): Vec {
 *     return new Vec(Number(values[0]), Number(values[1]));
 *   }
 * }
 * ```
 */
export const reconstruct: unique symbol = Symbol.for("focal.reconstruct");

/** An object that knows how to rebuild itself from ordered field values. */
export interface Reconstructible<T> {
  [reconstruct](values: readonly unknown[]): T;
}

function isReconstructible(value: unknown): value is Reconstructible<unknown> {
  return isObjectLike(value) && typeof Reflect.get(value, reconstruct) === "function";
}

// ============================================================================
// Constructor Registry
// ============================================================================

interface RegistryEntry {
  readonly fields?: readonly string[];
  readonly build: Constructor<unknown>;
}

/** Keyed by prototype, so only exact instances of a class match. */
const constructorRegistry = new WeakMap<object, RegistryEntry>();

/**
 * Register how instances of `ctor` are rebuilt.
 *
 * Use this for classes whose constructor parameters differ from their
 * enumerable fields, or whose instances carry hidden state such as
 * `#private` fields.
 */
export function registerConstructor<T extends object>(
  ctor: abstract new (...args: never[]) => T,
  spec: ConstructorSpec<T>
): void {
  constructorRegistry.set(ctor.prototype, spec);
}

/** Remove a registration made by {@link registerConstructor}. */
export function unregisterConstructor(ctor: abstract new (...args: never[]) => object): void {
  constructorRegistry.delete(ctor.prototype);
}

function registeredEntry(obj: object): RegistryEntry | undefined {
  const proto: unknown = Object.getPrototypeOf(obj);
  return isObjectLike(proto) ? constructorRegistry.get(proto) : undefined;
}

// ============================================================================
// Introspection
// ============================================================================

/**
 * Names of the fields of `obj`, in construction order.
 *
 * Arrays report their positions (`"0"`, `"1"`, ...). Registered classes
 * report their registered field order. Other objects report their own
 * enumerable string keys.
 */
export function propertyNames(obj: unknown): readonly string[] {
  if (!isObjectLike(obj)) return [];
  if (Array.isArray(obj)) {
    return Array.from({ length: obj.length }, (_, i) => String(i));
  }
  const entry = registeredEntry(obj);
  if (entry?.fields) return entry.fields;
  if (isOpaqueObject(obj)) return [];
  return Object.keys(obj);
}

export function hasProperty(obj: unknown, name: string): boolean {
  return propertyNames(obj).includes(name);
}

/**
 * Read one field. The declared result type is the caller's claim about the
 * field; nothing is checked at runtime beyond `obj` being an object.
 */
export function getProperty<A = unknown>(obj: unknown, name: string): A {
  if (!isObjectLike(obj)) {
    throw new TypeError(`Cannot read field "${name}" of ${kindOf(obj)}`);
  }
  return Reflect.get(obj, name);
}

/** All fields of `obj` as a plain record, in construction order. */
export function getProperties(obj: unknown): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const name of propertyNames(obj)) {
    record[name] = getProperty(obj, name);
  }
  return record;
}

// ============================================================================
// Reconstruction
// ============================================================================

function deriveConstruction(template: unknown, values: readonly unknown[]): unknown {
  const names = propertyNames(template);
  if (values.length !== names.length) {
    const kind = kindOf(template);
    throw new ConstructionError(
      kind,
      "arity_mismatch",
      `${kind} has ${names.length} field(s) but ${values.length} value(s) were given`
    );
  }

  if (!isObjectLike(template)) return template;

  if (Array.isArray(template)) {
    const copy = [...values];
    return Object.isFrozen(template) ? Object.freeze(copy) : copy;
  }

  const rebuilt: object = Object.create(Object.getPrototypeOf(template));
  names.forEach((name, i) => {
    Object.defineProperty(rebuilt, name, {
      value: values[i],
      writable: true,
      enumerable: true,
      configurable: true,
    });
  });
  return Object.isFrozen(template) ? Object.freeze(rebuilt) : rebuilt;
}

function resolveConstructor(obj: unknown): Constructor<unknown> {
  if (isReconstructible(obj)) {
    const self = obj;
    return (values) => self[reconstruct](values);
  }
  if (isObjectLike(obj)) {
    const entry = registeredEntry(obj);
    if (entry) return entry.build;
  }
  return (values) => deriveConstruction(obj, values);
}

/**
 * The "build from ordered field values" capability of `obj`'s kind.
 *
 * @example
 * ```typescript
 * const build = constructorOf({ a: 1, b: 2 });
 * build(["x", "y"]); // { a: "x", b: "y" }
 * ```
 */
export function constructorOf<T>(obj: T): Constructor<T> {
  const build = resolveConstructor(obj);
  // Every strategy above rebuilds the same concrete kind as `obj`.
  return (values) => build(values) as T;
}

/**
 * Return a copy of `obj` with the fields in `patch` replaced.
 *
 * The copy is built by `obj`'s constructor from the full ordered field list,
 * patched where specified and original elsewhere.
 *
 * @throws ConstructionError if `patch` names a field `obj` does not have
 *
 * @example
 * ```typescript
 * setProperties({ a: 1, b: 2 }, { b: 3 }); // { a: 1, b: 3 }
 * ```
 */
export function setProperties<T>(obj: T, patch: Readonly<Record<string, unknown>>): T {
  const patchKeys = Object.keys(patch);
  if (patchKeys.length === 0) return obj;

  const names = propertyNames(obj);
  for (const key of patchKeys) {
    if (!names.includes(key)) {
      const kind = kindOf(obj);
      throw new ConstructionError(
        kind,
        "unknown_field",
        `${kind} has no field "${key}". Known fields: ${names.join(", ") || "(none)"}`
      );
    }
  }

  const values = names.map((name) =>
    hasOwn(patch, name) ? patch[name] : getProperty(obj, name)
  );
  return constructorOf(obj)(values);
}

/**
 * Construct a copy of `obj` with each field replaced by `f(value, name)`.
 *
 * @example
 * ```typescript
 * mapProperties((x: number) => x + 1, { a: 1, b: 2 }); // { a: 2, b: 3 }
 * ```
 */
export function mapProperties<T, A = unknown>(
  f: (value: A, name: string) => A,
  obj: T
): T {
  const names = propertyNames(obj);
  if (names.length === 0) return obj;
  return constructorOf(obj)(names.map((name) => f(getProperty<A>(obj, name), name)));
}
