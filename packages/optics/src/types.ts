/**
 * Core optic types.
 *
 * An optic describes how to focus on a part of a larger value. It is applied
 * through the generic `get`/`set`/`modify` entry points, which consult the
 * optic's {@link OpticStyle} to decide which primitive to call and which one
 * to synthesize.
 */

import type { DispatchTracer } from "./tracing.js";

// ============================================================================
// Style & Mode
// ============================================================================

/**
 * Which primitive an optic implements.
 *
 * - `"set-based"`: the optic implements `set`; `modify` is derived as
 *   `set(obj, optic, f(get(obj, optic)))`
 * - `"modify-based"`: the optic implements `modify`; `set` is derived as
 *   `modify(constant(val), obj, optic)`
 */
export type OpticStyle = "set-based" | "modify-based";

/** Whether optics that support it may write into the caller's object. */
export type Mutability = "mutable" | "immutable";

/** Per-call state threaded through every primitive `set`/`modify`. */
export interface OpticContext {
  readonly mode: Mutability;
  /** Current nesting of recursive optics */
  readonly depth: number;
  /** Maximum nesting of recursive optics before giving up */
  readonly limit: number;
  readonly tracer: DispatchTracer;
}

/** Options accepted by the public `set`/`modify` entry points. */
export interface OpticOptions {
  readonly mode?: Mutability;
}

// ============================================================================
// Optic
// ============================================================================

/**
 * An optic focusing values of type `A` inside values of type `S`.
 *
 * Implement `set` for a set-based optic or `modify` for a modify-based one.
 * `get` is only meaningful for optics with a single focus.
 *
 * @example
 * ```typescript
 * const celsius: Optic<{ kelvin: number }, number> = {
 *   kind: "Celsius",
 *   get: (t) => t.kelvin - 273.15,
 *   set: (t, c) => ({ ...t, kelvin: c + 273.15 }),
 * };
 * ```
 */
export interface Optic<S, A> {
  /** Shape name used in messages and traces */
  readonly kind: string;
  /** Defaults to `"set-based"` when absent */
  readonly style?: OpticStyle;
  get?(obj: S): A;
  set?(obj: S, val: A, ctx: OpticContext): S;
  modify?(f: (focus: A) => A, obj: S, ctx: OpticContext): S;
  describe?(): string;
}

/** The focus type of an optic. */
export type FocusOf<O> = O extends Optic<infer _S, infer A> ? A : never;

/** The style an optic type declares, `"set-based"` when it declares none. */
export type StyleOf<O> = O extends { readonly style: infer T extends OpticStyle } ? T : "set-based";

/** Style of `compose(O, I)`: modify-based when either side is. */
export type ComposedStyle<O, I> = StyleOf<O> extends "modify-based"
  ? "modify-based"
  : StyleOf<I> extends "modify-based"
    ? "modify-based"
    : "set-based";
