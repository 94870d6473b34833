/**
 * Index Optics
 *
 * Focus one element by position or key. `index` carries fixed indices;
 * `dynamicIndex` computes them from the object on every application.
 * Several indices descend one level of nesting each.
 */

import {
  getIndex,
  hasSetIndexInPlace,
  setIndex,
  setIndexInPlace,
  type Indices,
} from "@focal/construct";
import type { Optic, OpticContext } from "./types.js";

function writeAt<S>(obj: S, val: unknown, indices: Indices, ctx: OpticContext): S {
  // frozen arrays and other containers without indexed writes always copy
  if (ctx.mode === "mutable" && hasSetIndexInPlace(obj)) {
    return setIndexInPlace(obj, val, indices);
  }
  return setIndex(obj, val, indices);
}

function formatIndex(index: unknown): string {
  return typeof index === "string" ? JSON.stringify(index) : String(index);
}

// ============================================================================
// Static Index
// ============================================================================

export class IndexOptic<S = never, A = unknown> implements Optic<S, A> {
  readonly kind = "Index";
  readonly style = "set-based";
  readonly indices: Indices;

  constructor(indices: Indices) {
    this.indices = Object.freeze([...indices]);
  }

  get(obj: S): A {
    return getIndex<A>(obj, this.indices);
  }

  set(obj: S, val: A, ctx: OpticContext): S {
    return writeAt(obj, val, this.indices, ctx);
  }

  describe(): string {
    return `Index(${this.indices.map(formatIndex).join(", ")})`;
  }
}

/**
 * Focus the element at `indices`.
 *
 * @example
 * ```typescript
 * get([[1, 2], [3, 4]], index<number>(1, 0)); // → 3
 * ```
 */
export function index<A = unknown, S = never>(...indices: unknown[]): IndexOptic<S, A> {
  return new IndexOptic<S, A>(indices);
}

// ============================================================================
// Dynamic Index
// ============================================================================

export class DynamicIndexOptic<S = never, A = unknown> implements Optic<S, A> {
  readonly kind = "DynamicIndex";
  readonly style = "set-based";

  constructor(readonly indicesOf: (obj: S) => Indices) {}

  get(obj: S): A {
    return getIndex<A>(obj, this.indicesOf(obj));
  }

  set(obj: S, val: A, ctx: OpticContext): S {
    return writeAt(obj, val, this.indicesOf(obj), ctx);
  }

  describe(): string {
    return `DynamicIndex(${this.indicesOf.name || "fn"})`;
  }
}

/**
 * Focus the element at indices computed from the object itself.
 *
 * @example
 * ```typescript
 * const middle = dynamicIndex((xs: number[]) => [Math.floor(xs.length / 2)]);
 * ```
 */
export function dynamicIndex<S, A = unknown>(indicesOf: (obj: S) => Indices): DynamicIndexOptic<S, A> {
  return new DynamicIndexOptic<S, A>(indicesOf);
}

function lastPosition(xs: readonly unknown[]): Indices {
  return [xs.length - 1];
}

/** Focus the last element of an array. */
export function last<A = unknown>(): DynamicIndexOptic<readonly A[], A> {
  return new DynamicIndexOptic<readonly A[], A>(lastPosition);
}
