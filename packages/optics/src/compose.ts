/**
 * Optic Composition
 *
 * `compose(outer, inner)` focuses through `inner` first and then through
 * `outer`, like function composition. Longer chains associate to the left,
 * and the identity optic disappears from either side.
 *
 * `path` is the same operation written in reading order.
 *
 * @example
 * ```typescript
 * const street = compose(field("street"), field("address"));
 * get(person, street);                                // person.address.street
 * path(field("address"), field("street"));            // same optic
 * ```
 */

import { get, modifyWithContext, setWithContext } from "./dispatch.js";
import { IdentityOptic, identity } from "./identity.js";
import { composedOpticStyle, describeOptic } from "./style.js";
import type { Optic, OpticContext, OpticStyle } from "./types.js";

// ============================================================================
// Composed Optic
// ============================================================================

/**
 * An ordered pair of optics acting as one.
 *
 * Implements both primitives; dispatch picks `set` when both components are
 * set-based and `modify` otherwise, so each component is always driven
 * through its own primitive.
 */
export class ComposedOptic<S, B, A> implements Optic<S, A> {
  readonly kind = "Composed";
  readonly style: OpticStyle;

  constructor(
    readonly outer: Optic<B, A>,
    readonly inner: Optic<S, B>
  ) {
    this.style = composedOpticStyle(outer, inner);
  }

  get(obj: S): A {
    return get<B, A>(get<S, B>(obj, this.inner), this.outer);
  }

  set(obj: S, val: A, ctx: OpticContext): S {
    const innerObj = get<S, B>(obj, this.inner);
    const innerVal = setWithContext<B, A>(innerObj, this.outer, val, ctx);
    return setWithContext<S, B>(obj, this.inner, innerVal, ctx);
  }

  modify(f: (focus: A) => A, obj: S, ctx: OpticContext): S {
    return modifyWithContext<S, B>(
      (o1) => modifyWithContext<B, A>(f, o1, this.outer, ctx),
      obj,
      this.inner,
      ctx
    );
  }

  describe(): string {
    return `${describeOptic(this.outer)} ∘ ${describeOptic(this.inner)}`;
  }
}

function composePair(
  outer: Optic<unknown, unknown>,
  inner: Optic<unknown, unknown>
): Optic<unknown, unknown> {
  if (outer instanceof IdentityOptic) return inner;
  if (inner instanceof IdentityOptic) return outer;
  return new ComposedOptic(outer, inner);
}

// ============================================================================
// compose / path
// ============================================================================

/**
 * Compose optics right to left: the last optic is applied first.
 *
 * `compose()` is the identity optic and `compose(a)` is `a` itself.
 */
export function compose(): IdentityOptic;
export function compose<S, A>(optic: Optic<S, A>): Optic<S, A>;
export function compose<S, B, A>(outer: Optic<B, A>, inner: Optic<S, B>): Optic<S, A>;
export function compose<S, C, B, A>(
  o1: Optic<B, A>,
  o2: Optic<C, B>,
  o3: Optic<S, C>
): Optic<S, A>;
export function compose<S, D, C, B, A>(
  o1: Optic<B, A>,
  o2: Optic<C, B>,
  o3: Optic<D, C>,
  o4: Optic<S, D>
): Optic<S, A>;
export function compose(...optics: Optic<unknown, unknown>[]): Optic<unknown, unknown>;
export function compose(...optics: Optic<unknown, unknown>[]): Optic<unknown, unknown> {
  let result: Optic<unknown, unknown> = identity<unknown>();
  for (const optic of optics) {
    result = composePair(result, optic);
  }
  return result;
}

/**
 * Compose optics in reading order: the first optic is applied first.
 * `path(a, b, c)` is `compose(c, b, a)`.
 */
export function path(): IdentityOptic;
export function path<S, A>(optic: Optic<S, A>): Optic<S, A>;
export function path<S, B, A>(first: Optic<S, B>, second: Optic<B, A>): Optic<S, A>;
export function path<S, C, B, A>(
  first: Optic<S, C>,
  second: Optic<C, B>,
  third: Optic<B, A>
): Optic<S, A>;
export function path<S, D, C, B, A>(
  first: Optic<S, D>,
  second: Optic<D, C>,
  third: Optic<C, B>,
  fourth: Optic<B, A>
): Optic<S, A>;
export function path(...optics: Optic<unknown, unknown>[]): Optic<unknown, unknown>;
export function path(...optics: Optic<unknown, unknown>[]): Optic<unknown, unknown> {
  return compose(...[...optics].reverse());
}
