/**
 * Optic Laws
 *
 * Lens laws, for a single-focus optic `O`, object `s` and values `a1`, `a2`:
 *   - get-set: set(s, O, get(s, O)) == s
 *   - set-get: get(set(s, O, a1), O) == a1
 *   - set-set: set(set(s, O, a1), O, a2) == set(s, O, a2)
 *
 * Composition laws, for optics `outer`, `middle`, `inner`:
 *   - get through compose(outer, inner) equals get through inner then outer
 *   - composition is associative
 *   - identity is neutral on both sides
 *
 * Every law takes `(s, a1, a2)`; `arity` says how many of those it uses.
 *
 * @module
 */

import { isDeepStrictEqual } from "node:util";
import { compose } from "../compose.js";
import { get, set } from "../dispatch.js";
import { identity } from "../identity.js";
import type { Optic } from "../types.js";
import type { Eq, LawSet, LawViolation } from "./types.js";

/** Equality by `Object.is`. */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => Object.is(x, y) };
}

/** Deep equality that also compares prototypes. */
export function eqStructural<A>(): Eq<A> {
  return { eqv: (x, y) => isDeepStrictEqual(x, y) };
}

// ============================================================================
// Lens Laws
// ============================================================================

/**
 * Generate the three lens laws for a single-focus optic.
 *
 * @example
 * ```typescript
 * const laws = lensLaws(field<number>("x"), eqStructural(), eqStrict());
 * checkLaws(laws, [[{ x: 1 }, 2, 3]]); // → []
 * ```
 */
export function lensLaws<S, A>(optic: Optic<S, A>, eqS: Eq<S>, eqA: Eq<A>): LawSet<[S, A, A]> {
  return [
    {
      name: "get-set",
      arity: 1,
      description: "Setting what is already there changes nothing: set(s, O, get(s, O)) == s",
      check: (s) => eqS.eqv(set(s, optic, get(s, optic)), s),
    },
    {
      name: "set-get",
      arity: 2,
      description: "You get what you set: get(set(s, O, a), O) == a",
      check: (s, a1) => eqA.eqv(get(set(s, optic, a1), optic), a1),
    },
    {
      name: "set-set",
      arity: 3,
      description: "The last set wins: set(set(s, O, a1), O, a2) == set(s, O, a2)",
      check: (s, a1, a2) => eqS.eqv(set(set(s, optic, a1), optic, a2), set(s, optic, a2)),
    },
  ];
}

// ============================================================================
// Composition Laws
// ============================================================================

/**
 * Generate composition laws for three chained single-focus optics.
 */
export function compositionLaws<S, C, B, A>(
  outer: Optic<B, A>,
  middle: Optic<C, B>,
  inner: Optic<S, C>,
  eqS: Eq<S>,
  eqA: Eq<A>
): LawSet<[S, A, A]> {
  const leftNested = compose<S, C, A>(compose<C, B, A>(outer, middle), inner);
  const rightNested = compose<S, B, A>(outer, compose<S, C, B>(middle, inner));

  return [
    {
      name: "composed get",
      arity: 1,
      description: "get(s, compose(A, B)) == get(get(s, B), A)",
      check: (s) =>
        eqA.eqv(get(s, leftNested), get(get(get(s, inner), middle), outer)),
    },
    {
      name: "associativity (get)",
      arity: 1,
      description: "compose(compose(A, B), C) reads like compose(A, compose(B, C))",
      check: (s) => eqA.eqv(get(s, leftNested), get(s, rightNested)),
    },
    {
      name: "associativity (set)",
      arity: 2,
      description: "compose(compose(A, B), C) writes like compose(A, compose(B, C))",
      check: (s, a) => eqS.eqv(set(s, leftNested, a), set(s, rightNested, a)),
    },
    {
      name: "identity",
      arity: 2,
      description: "compose(identity, A) and compose(A, identity) behave like A",
      check: (s, a) => {
        const left = compose<S, A, A>(identity<A>(), leftNested);
        const right = compose<S, S, A>(leftNested, identity<S>());
        return (
          eqA.eqv(get(s, left), get(s, leftNested)) &&
          eqA.eqv(get(s, right), get(s, leftNested)) &&
          eqS.eqv(set(s, left, a), set(s, leftNested, a)) &&
          eqS.eqv(set(s, right, a), set(s, leftNested, a))
        );
      },
    },
  ];
}

// ============================================================================
// Checking
// ============================================================================

/**
 * Run every law against every sample and collect the failures.
 */
export function checkLaws<Args extends unknown[]>(
  laws: LawSet<Args>,
  samples: Iterable<Args>
): LawViolation<Args>[] {
  const violations: LawViolation<Args>[] = [];
  for (const sample of samples) {
    for (const law of laws) {
      if (!law.check(...sample)) {
        violations.push({ law: law.name, description: law.description, sample });
      }
    }
  }
  return violations;
}
