/**
 * @focal/construct: object introspection and reconstruction.
 *
 * Enumerate the named fields of an object, rebuild objects of the same
 * concrete kind with some fields replaced, and read or write keyed elements
 * of arrays, `Map`s and plain objects.
 *
 * @packageDocumentation
 */

export type { Constructor, ConstructorSpec, Indices } from "./types.js";

export { ConstructionError } from "./errors.js";
export type { ConstructionErrorReason } from "./errors.js";

export { isObjectLike, kindOf } from "./guards.js";

export {
  reconstruct,
  registerConstructor,
  unregisterConstructor,
  propertyNames,
  hasProperty,
  getProperty,
  getProperties,
  constructorOf,
  setProperties,
  mapProperties,
} from "./properties.js";
export type { Reconstructible } from "./properties.js";

export {
  isMutable,
  hasSetIndexInPlace,
  getIndex,
  setIndex,
  setIndexInPlace,
} from "./indexing.js";

export { mapElements } from "./collections.js";
