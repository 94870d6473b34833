import type { Optic } from "./types.js";

/**
 * Focuses the object itself, but only when `predicate` holds.
 *
 * Composed outside a multi-focus optic it filters per element:
 *
 * @example
 * ```typescript
 * const evens = compose(ifOptic((x: number) => x % 2 === 0), elements<number>());
 * modify((x) => x * 10, [1, 2, 3, 4], evens); // → [1, 20, 3, 40]
 * ```
 */
export class IfOptic<A> implements Optic<A, A> {
  readonly kind = "If";
  readonly style = "modify-based";

  constructor(readonly predicate: (value: A) => boolean) {}

  modify(f: (focus: A) => A, obj: A): A {
    return this.predicate(obj) ? f(obj) : obj;
  }

  describe(): string {
    return `If(${this.predicate.name || "predicate"})`;
  }
}

export function ifOptic<A>(predicate: (value: A) => boolean): IfOptic<A> {
  return new IfOptic(predicate);
}
