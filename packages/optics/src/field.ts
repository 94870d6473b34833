import { getProperty, hasProperty, isMutable, kindOf, setProperties } from "@focal/construct";
import { OpticDefinitionError } from "./errors.js";
import type { Optic, OpticContext } from "./types.js";

/**
 * Focuses one named field.
 *
 * `set` rebuilds an object of the same concrete kind through
 * `setProperties`. In `"mutable"` mode a non-frozen object is assigned in
 * place and returned as is.
 */
export class FieldOptic<S = never, A = unknown> implements Optic<S, A> {
  readonly kind = "Field";
  readonly style = "set-based";

  constructor(readonly name: string) {}

  get(obj: S): A {
    this.assertField(obj, "get");
    return getProperty<A>(obj, this.name);
  }

  set(obj: S, val: A, ctx: OpticContext): S {
    this.assertField(obj, "set");
    if (ctx.mode === "mutable" && isMutable(obj) && Reflect.set(obj, this.name, val)) {
      return obj;
    }
    return setProperties(obj, { [this.name]: val });
  }

  describe(): string {
    return `Field(${this.name})`;
  }

  private assertField(obj: S, operation: "get" | "set"): void {
    if (hasProperty(obj, this.name)) return;
    throw new OpticDefinitionError(
      "no_such_field",
      operation,
      this.describe(),
      `${kindOf(obj)} has no field "${this.name}" (while applying ${operation} through ${this.describe()})`
    );
  }
}

/**
 * Focus the field `name`.
 *
 * @example
 * ```typescript
 * get({ x: 1, y: 2 }, field<number>("x")); // → 1
 * ```
 */
export function field<A = unknown, S = never>(name: string): FieldOptic<S, A> {
  return new FieldOptic<S, A>(name);
}
