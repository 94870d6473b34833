import type { Optic } from "./types.js";

/**
 * Focuses the whole object. Neutral element of {@link compose}.
 */
export class IdentityOptic<S = never> implements Optic<S, S> {
  readonly kind = "Identity";
  readonly style = "set-based";

  get(obj: S): S {
    return obj;
  }

  set(_obj: S, val: S): S {
    return val;
  }

  describe(): string {
    return "Identity";
  }
}

export function identity<S = never>(): IdentityOptic<S> {
  return new IdentityOptic<S>();
}
