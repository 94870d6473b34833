import { isObjectLike, kindOf } from "./guards.js";

interface Mappable {
  map(f: (element: never) => unknown): unknown;
}

function isMappable(value: unknown): value is Mappable {
  return isObjectLike(value) && typeof Reflect.get(value, "map") === "function";
}

function mapCollection<A>(f: (element: A) => A, obj: unknown): unknown {
  if (Array.isArray(obj)) {
    const mapped = obj.map((element) => f(element));
    return Object.isFrozen(obj) ? Object.freeze(mapped) : mapped;
  }
  if (obj instanceof Set) {
    return new Set(Array.from(obj, (element) => f(element)));
  }
  if (obj instanceof Map) {
    return new Map(Array.from(obj, ([key, value]): [unknown, A] => [key, f(value)]));
  }
  if (isMappable(obj)) {
    return obj.map(f);
  }
  throw new TypeError(`${kindOf(obj)} is not a mappable collection`);
}

/**
 * Apply `f` to every element of a collection, producing a new collection of
 * the same shape.
 *
 * Arrays keep their length and frozenness, `Set`s map their members, `Map`s
 * map their values and keep their keys. Any other object with a `map` method
 * is mapped through it.
 */
export function mapElements<T, A = unknown>(f: (element: A) => A, obj: T): T {
  // Each branch of mapCollection rebuilds the same kind of collection.
  return mapCollection(f, obj) as T;
}
