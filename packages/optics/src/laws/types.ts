/**
 * Law Definition Types
 *
 * A law is a named predicate that must hold for every input. Law sets are
 * checked against caller-supplied samples with {@link checkLaws}.
 *
 * @module
 */

/**
 * Equality used to compare the results of a law.
 */
export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/**
 * A law definition.
 *
 * @template Args - Tuple type of the law's input arguments
 */
export interface Law<Args extends unknown[] = unknown[]> {
  /** Human-readable name, used in failure reports */
  readonly name: string;
  readonly check: (...args: Args) => boolean;
  /** How many leading arguments the check actually uses */
  readonly arity: number;
  readonly description?: string;
}

/** Laws that share one argument shape. */
export type LawSet<Args extends unknown[] = unknown[]> = readonly Law<Args>[];

/** A law that did not hold, with the sample that broke it. */
export interface LawViolation<Args extends unknown[] = unknown[]> {
  readonly law: string;
  readonly description?: string;
  readonly sample: Args;
}
