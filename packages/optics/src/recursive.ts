import { modifyWithContext } from "./dispatch.js";
import { RecursionLimitError } from "./errors.js";
import { describeOptic } from "./style.js";
import type { Optic, OpticContext } from "./types.js";

/**
 * Applies `inner`, and recurses into every sub-value it reaches for which
 * `descend` holds. Values where `descend` fails are the focus.
 *
 * The descent test never sees the top-level object, only values reached
 * through `inner`. Nesting deeper than the configured `recursion.limit`
 * raises {@link RecursionLimitError}.
 *
 * @example
 * ```typescript
 * const leaves = recursive((x) => Array.isArray(x), elements());
 * modify((x) => Number(x) + 1, [1, [2, [3]]], leaves); // → [2, [3, [4]]]
 * ```
 */
export class RecursiveOptic<S = never> implements Optic<S, unknown> {
  readonly kind = "Recursive";
  readonly style = "modify-based";

  constructor(
    readonly descend: (value: unknown) => boolean,
    readonly inner: Optic<S, unknown>
  ) {}

  modify(f: (focus: unknown) => unknown, obj: S, ctx: OpticContext): S {
    if (ctx.depth >= ctx.limit) {
      throw new RecursionLimitError(ctx.limit, this.describe());
    }
    const deeper: OpticContext = { ...ctx, depth: ctx.depth + 1 };
    return modifyWithContext<S, unknown>(
      (sub) => (this.descend(sub) ? modifyWithContext<unknown, unknown>(f, sub, this, deeper) : f(sub)),
      obj,
      this.inner,
      deeper
    );
  }

  describe(): string {
    return `Recursive(${describeOptic(this.inner)})`;
  }
}

export function recursive<S = never>(
  descend: (value: unknown) => boolean,
  inner: Optic<S, unknown>
): RecursiveOptic<S> {
  return new RecursiveOptic(descend, inner);
}
