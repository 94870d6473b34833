import { compose } from "./compose.js";
import { get, getAll, modify, set } from "./dispatch.js";
import type { Optic, OpticOptions } from "./types.js";

/**
 * An object paired with an optic into it.
 *
 * @example
 * ```typescript
 * const f = focus({ user: { name: "ada" } }, field("user"));
 * f.at(field<string>("name")).modify((s) => s.toUpperCase());
 * // → { user: { name: "ADA" } }
 * ```
 */
export class Focused<S, A> {
  constructor(
    readonly object: S,
    readonly optic: Optic<S, A>
  ) {}

  get(): A {
    return get(this.object, this.optic);
  }

  getAll(): A[] {
    return getAll(this.object, this.optic);
  }

  set(val: A, options?: OpticOptions): S {
    return set(this.object, this.optic, val, options);
  }

  modify(f: (focus: A) => A, options?: OpticOptions): S {
    return modify(f, this.object, this.optic, options);
  }

  /** Narrow the focus further through `next`. */
  at<B>(next: Optic<A, B>): Focused<S, B> {
    return new Focused(this.object, compose<S, A, B>(next, this.optic));
  }
}

export function focus<S, A>(object: S, optic: Optic<S, A>): Focused<S, A> {
  return new Focused(object, optic);
}
