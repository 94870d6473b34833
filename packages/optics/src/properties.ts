import { mapProperties } from "@focal/construct";
import type { Optic } from "./types.js";

/**
 * Focuses every named field of an object, in insertion order.
 * Objects without named fields are returned unchanged.
 */
export class PropertiesOptic<S = never, A = unknown> implements Optic<S, A> {
  readonly kind = "Properties";
  readonly style = "modify-based";

  modify(f: (focus: A) => A, obj: S): S {
    return mapProperties<S, A>((value) => f(value), obj);
  }

  describe(): string {
    return "Properties";
  }
}

export function properties<A = unknown, S = never>(): PropertiesOptic<S, A> {
  return new PropertiesOptic<S, A>();
}
