/**
 * @focal/optics: composable optics for reading and updating nested data.
 *
 * @example
 * ```typescript
 * import { compose, elements, field, ifOptic, modify, set } from "@focal/optics";
 *
 * set({ a: { b: 1 } }, compose(field("b"), field("a")), 2);
 * // → { a: { b: 2 } }
 *
 * modify((x: number) => x * 10, [1, 2, 3, 4], compose(ifOptic((x: number) => x % 2 === 0), elements<number>()));
 * // → [1, 20, 3, 40]
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  Optic,
  OpticStyle,
  OpticContext,
  OpticOptions,
  Mutability,
  FocusOf,
  StyleOf,
  ComposedStyle,
} from "./types.js";

// Errors
export { OpticDefinitionError, RecursionLimitError } from "./errors.js";
export type { OpticDefinitionReason } from "./errors.js";

// Configuration
export {
  config,
  defineConfig,
  configuredRecursionLimit,
  tracingEnabled,
} from "./config.js";
export type { FocalConfig, RecursionConfig } from "./config.js";

// Tracing
export { DispatchTracer, tracer } from "./tracing.js";
export type {
  DispatchOperation,
  DispatchRoute,
  DispatchRecord,
  DispatchSummary,
} from "./tracing.js";

// Style & dispatch
export { opticStyle, composedOpticStyle, describeOptic } from "./style.js";
export type { OpticShape } from "./style.js";
export {
  get,
  set,
  modify,
  getAll,
  setWithContext,
  modifyWithContext,
  constant,
  createContext,
} from "./dispatch.js";

// Optics
export { IdentityOptic, identity } from "./identity.js";
export { ComposedOptic, compose, path } from "./compose.js";
export { FieldOptic, field } from "./field.js";
export { IndexOptic, DynamicIndexOptic, index, dynamicIndex, last } from "./index-optic.js";
export { ElementsOptic, elements } from "./elements.js";
export { PropertiesOptic, properties } from "./properties.js";
export { IfOptic, ifOptic } from "./conditional.js";
export { RecursiveOptic, recursive } from "./recursive.js";
export { Focused, focus } from "./focused.js";

// Laws
export * from "./laws/index.js";
