/**
 * Keyed Read and Write
 *
 * Positional and keyed access for arrays, typed arrays, `Map`s and plain
 * objects. Several indices descend through nested containers, one index per
 * level:
 * `getIndex(grid, [1, 2])` reads `grid[1][2]`.
 *
 * Out-of-range positions and missing keys are data errors (`RangeError`);
 * values that cannot be indexed at all raise `TypeError`.
 */

import { hasOwn, isObjectLike, isOpaqueObject, isPropertyKey, kindOf } from "./guards.js";
import { hasProperty, setProperties } from "./properties.js";
import type { Indices } from "./types.js";

function describeKey(key: unknown): string {
  return typeof key === "string" ? JSON.stringify(key) : String(key);
}

function assertPosition(length: number, key: unknown, kind: string): asserts key is number {
  if (typeof key !== "number" || !Number.isInteger(key)) {
    throw new RangeError(`${kind} positions must be integers, got ${describeKey(key)}`);
  }
  if (key < 0 || key >= length) {
    throw new RangeError(`Position ${key} is out of bounds for ${kind} of length ${length}`);
  }
}

interface NumericArray {
  readonly length: number;
  slice(): NumericArray;
}

function isTypedArray(value: unknown): value is NumericArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function assertIndices(indices: Indices): void {
  if (indices.length === 0) {
    throw new RangeError("At least one index is required");
  }
}

// ============================================================================
// Capabilities
// ============================================================================

/** True for objects that may be mutated in place (non-null and not frozen). */
export function isMutable(value: unknown): value is object {
  return isObjectLike(value) && !Object.isFrozen(value);
}

/**
 * True if `value` supports in-place keyed writes: a mutable array, typed
 * array, `Map` or plain object. Frozen arrays behave as fixed tuples and never qualify.
 */
export function hasSetIndexInPlace(value: unknown): boolean {
  if (!isMutable(value)) return false;
  return (
    Array.isArray(value) || isTypedArray(value) || value instanceof Map || !isOpaqueObject(value)
  );
}

// ============================================================================
// Single-level Operations
// ============================================================================

function readAt<A>(container: unknown, key: unknown): A {
  if (Array.isArray(container)) {
    assertPosition(container.length, key, kindOf(container));
    return container[key];
  }
  if (isTypedArray(container)) {
    assertPosition(container.length, key, kindOf(container));
    return Reflect.get(container, key);
  }
  if (container instanceof Map) {
    if (!container.has(key)) {
      throw new RangeError(`Key ${describeKey(key)} not found in Map`);
    }
    return container.get(key);
  }
  if (isObjectLike(container) && !isOpaqueObject(container) && isPropertyKey(key)) {
    if (!hasOwn(container, key)) {
      throw new RangeError(`Key ${describeKey(key)} not found in ${kindOf(container)}`);
    }
    return Reflect.get(container, key);
  }
  throw new TypeError(`${kindOf(container)} is not indexable by ${describeKey(key)}`);
}

function copyWith(container: object, key: PropertyKey, value: unknown): object {
  const copy: object = Object.create(Object.getPrototypeOf(container));
  Object.defineProperties(copy, Object.getOwnPropertyDescriptors(container));
  Object.defineProperty(copy, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
  return Object.isFrozen(container) ? Object.freeze(copy) : copy;
}

function writeAt(container: unknown, key: unknown, value: unknown): unknown {
  if (Array.isArray(container)) {
    assertPosition(container.length, key, kindOf(container));
    const copy = container.slice();
    copy[key] = value;
    return Object.isFrozen(container) ? Object.freeze(copy) : copy;
  }
  if (isTypedArray(container)) {
    assertPosition(container.length, key, kindOf(container));
    const copy = container.slice();
    Reflect.set(copy, key, value);
    return copy;
  }
  if (container instanceof Map) {
    const copy = new Map(container);
    copy.set(key, value);
    return Object.isFrozen(container) ? Object.freeze(copy) : copy;
  }
  if (isObjectLike(container) && !isOpaqueObject(container) && isPropertyKey(key)) {
    if (typeof key === "string" && hasProperty(container, key)) {
      return setProperties(container, { [key]: value });
    }
    return copyWith(container, key, value);
  }
  throw new TypeError(`${kindOf(container)} is not indexable by ${describeKey(key)}`);
}

function writeAtInPlace(container: unknown, key: unknown, value: unknown): void {
  if (Array.isArray(container)) {
    assertPosition(container.length, key, kindOf(container));
    container[key] = value;
    return;
  }
  if (isTypedArray(container)) {
    assertPosition(container.length, key, kindOf(container));
    Reflect.set(container, key, value);
    return;
  }
  if (container instanceof Map) {
    container.set(key, value);
    return;
  }
  if (isObjectLike(container) && isPropertyKey(key)) {
    if (!Reflect.set(container, key, value)) {
      throw new TypeError(`Cannot assign ${describeKey(key)} on ${kindOf(container)}`);
    }
    return;
  }
  throw new TypeError(`${kindOf(container)} is not indexable by ${describeKey(key)}`);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read the element at `indices`.
 *
 * @example
 * ```typescript
 * getIndex([10, 20, 30], [1]);          // 20
 * getIndex(new Map([["k", 1]]), ["k"]); // 1
 * getIndex([[1, 2], [3, 4]], [1, 0]);   // 3
 * ```
 */
export function getIndex<A = unknown>(obj: unknown, indices: Indices): A {
  assertIndices(indices);
  const [head, ...rest] = indices;
  if (rest.length === 0) return readAt<A>(obj, head);
  return getIndex<A>(readAt(obj, head), rest);
}

function replaceAt(obj: unknown, value: unknown, indices: Indices): unknown {
  const [head, ...rest] = indices;
  if (rest.length === 0) return writeAt(obj, head, value);
  return writeAt(obj, head, replaceAt(readAt(obj, head), value, rest));
}

/**
 * Return a copy of `obj` with the element at `indices` replaced by `value`.
 * Containers along the path are copied; `obj` is left untouched.
 * `Map`s and plain objects accept new keys; arrays only accept positions
 * inside their bounds.
 */
export function setIndex<T>(obj: T, value: unknown, indices: Indices): T {
  assertIndices(indices);
  // writeAt rebuilds each container as its own kind.
  return replaceAt(obj, value, indices) as T;
}

/**
 * Replace the element at `indices` inside `obj` and return `obj` itself.
 * Nested containers that cannot be written in place are replaced by
 * updated copies.
 *
 * @throws TypeError if `obj` has no in-place keyed write
 */
export function setIndexInPlace<T>(obj: T, value: unknown, indices: Indices): T {
  assertIndices(indices);
  if (!hasSetIndexInPlace(obj)) {
    throw new TypeError(`${kindOf(obj)} cannot be written in place`);
  }
  const [head, ...rest] = indices;
  if (rest.length === 0) {
    writeAtInPlace(obj, head, value);
    return obj;
  }
  const child = readAt(obj, head);
  const updated = hasSetIndexInPlace(child)
    ? setIndexInPlace(child, value, rest)
    : setIndex(child, value, rest);
  if (updated !== child) writeAtInPlace(obj, head, updated);
  return obj;
}
