/** True for non-null objects (arrays included); false for primitives and functions. */
export function isObjectLike(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Built-in objects whose state lives in internal slots rather than in
 * enumerable fields. They have no named fields to enumerate or rebuild.
 */
export function isOpaqueObject(value: object): boolean {
  return (
    value instanceof Map ||
    value instanceof Set ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof Promise ||
    ArrayBuffer.isView(value) ||
    value instanceof ArrayBuffer
  );
}

/** True if `key` can address a property of a plain object. */
export function isPropertyKey(key: unknown): key is PropertyKey {
  return typeof key === "string" || typeof key === "number" || typeof key === "symbol";
}

export function hasOwn(obj: object, key: PropertyKey): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Human-readable name of a value's concrete kind, used in error messages.
 *
 * @example
 * ```typescript
 * kindOf([1, 2]);             // "Array"
 * kindOf(Object.freeze([1])); // "frozen Array"
 * kindOf(new Point(1, 2));    // "Point"
 * kindOf(undefined);          // "undefined"
 * ```
 */
export function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) {
    return Object.isFrozen(value) ? "frozen Array" : "Array";
  }
  if (typeof value !== "object") return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (!isObjectLike(proto)) return "Object";
  const ctor: unknown = Reflect.get(proto, "constructor");
  if (typeof ctor === "function" && ctor.name !== "") {
    return ctor.name;
  }
  return "Object";
}
