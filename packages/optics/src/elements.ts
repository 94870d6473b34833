import { mapElements } from "@focal/construct";
import type { Optic } from "./types.js";

/**
 * Focuses every element of a collection.
 *
 * Arrays (frozen ones stay frozen), `Set`s, the values of `Map`s and any
 * object with a `map` method are supported. There is no single focus, so
 * `get` is undefined; `set` replaces every element.
 */
export class ElementsOptic<S = never, A = unknown> implements Optic<S, A> {
  readonly kind = "Elements";
  readonly style = "modify-based";

  modify(f: (focus: A) => A, obj: S): S {
    return mapElements<S, A>(f, obj);
  }

  describe(): string {
    return "Elements";
  }
}

export function elements<A = unknown, S = never>(): ElementsOptic<S, A> {
  return new ElementsOptic<S, A>();
}
