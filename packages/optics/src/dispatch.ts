/**
 * Generic Dispatch
 *
 * The `get`/`set`/`modify` entry points. Each consults the optic's style
 * and either calls the optic's own primitive or synthesizes it:
 *
 * - set-based `modify(f)` becomes `set(obj, optic, f(get(obj, optic)))`
 * - modify-based `set(val)` becomes `modify(constant(val), obj, optic)`
 *
 * A missing primitive is an {@link OpticDefinitionError}, raised before any
 * work is done.
 */

import { configuredRecursionLimit } from "./config.js";
import { OpticDefinitionError } from "./errors.js";
import { describeOptic, opticStyle } from "./style.js";
import { tracer } from "./tracing.js";
import type { Optic, OpticContext, OpticOptions } from "./types.js";

/** A function that ignores its argument and returns `value`. */
export function constant<A>(value: A): (ignored: A) => A {
  return () => value;
}

/** Build the context for one top-level call. */
export function createContext(options: OpticOptions = {}): OpticContext {
  return {
    mode: options.mode ?? "immutable",
    depth: 0,
    limit: configuredRecursionLimit(),
    tracer,
  };
}

// ============================================================================
// Get
// ============================================================================

/**
 * Read the single value an optic focuses.
 *
 * @throws OpticDefinitionError when the optic has no single focus
 */
export function get<S, A>(obj: S, optic: Optic<S, A>): A {
  if (!optic.get) {
    const shape = describeOptic(optic);
    throw new OpticDefinitionError(
      "no_single_focus",
      "get",
      shape,
      `get is not defined for ${shape}: it has no single focus, use getAll or modify instead`
    );
  }
  tracer.record("get", optic, opticStyle(optic), "direct");
  return optic.get(obj);
}

// ============================================================================
// Set / Modify
// ============================================================================

/** `set` with an explicit context; used by optics that forward a call. */
export function setWithContext<S, A>(obj: S, optic: Optic<S, A>, val: A, ctx: OpticContext): S {
  const style = opticStyle(optic);
  switch (style) {
    case "set-based": {
      if (!optic.set) {
        const shape = describeOptic(optic);
        throw new OpticDefinitionError(
          "missing_set",
          "set",
          shape,
          `set is not defined for ${shape}: a set-based optic must implement set`
        );
      }
      ctx.tracer.record("set", optic, style, "direct");
      return optic.set(obj, val, ctx);
    }
    case "modify-based":
      ctx.tracer.record("set", optic, style, "synthesized");
      return modifyWithContext(constant(val), obj, optic, ctx);
  }
}

/** `modify` with an explicit context; used by optics that forward a call. */
export function modifyWithContext<S, A>(
  f: (focus: A) => A,
  obj: S,
  optic: Optic<S, A>,
  ctx: OpticContext
): S {
  const style = opticStyle(optic);
  switch (style) {
    case "modify-based": {
      if (!optic.modify) {
        const shape = describeOptic(optic);
        throw new OpticDefinitionError(
          "missing_modify",
          "modify",
          shape,
          `modify is not defined for ${shape}: a modify-based optic must implement modify`
        );
      }
      ctx.tracer.record("modify", optic, style, "direct");
      return optic.modify(f, obj, ctx);
    }
    case "set-based":
      ctx.tracer.record("modify", optic, style, "synthesized");
      return setWithContext(obj, optic, f(get(obj, optic)), ctx);
  }
}

/**
 * Replace the focus of `optic` in `obj` with `val`.
 *
 * Returns a new object unless `options.mode` is `"mutable"` and the optic
 * supports writing in place.
 *
 * @example
 * ```typescript
 * set({ a: 1, b: 2 }, field("a"), 10); // → { a: 10, b: 2 }
 * ```
 */
export function set<S, A>(obj: S, optic: Optic<S, A>, val: A, options?: OpticOptions): S {
  return setWithContext(obj, optic, val, createContext(options));
}

/**
 * Apply `f` to every value `optic` focuses in `obj`.
 *
 * @example
 * ```typescript
 * modify((x: number) => x + 1, [1, 2, 3], elements<number>()); // → [2, 3, 4]
 * ```
 */
export function modify<S, A>(
  f: (focus: A) => A,
  obj: S,
  optic: Optic<S, A>,
  options?: OpticOptions
): S {
  return modifyWithContext(f, obj, optic, createContext(options));
}

/**
 * Every value `optic` focuses in `obj`, in traversal order.
 *
 * Works for single- and multi-focus optics alike. The object is never
 * written to.
 */
export function getAll<S, A>(obj: S, optic: Optic<S, A>): A[] {
  const focused: A[] = [];
  modifyWithContext(
    (focus: A) => {
      focused.push(focus);
      return focus;
    },
    obj,
    optic,
    createContext({ mode: "immutable" })
  );
  return focused;
}
