/**
 * Error types raised by the optic machinery.
 *
 * Definition errors mean an optic is unusable as written. Data errors from
 * the structural operations (`RangeError`, `TypeError`, `ConstructionError`)
 * are never wrapped.
 */

/** Why an optic could not be used. */
export type OpticDefinitionReason =
  | "missing_set"
  | "missing_modify"
  | "no_single_focus"
  | "no_such_field";

/**
 * Raised when an optic lacks the primitive its style requires, has no
 * single focus to read, or names a field the object does not have.
 */
export class OpticDefinitionError extends Error {
  constructor(
    readonly reason: OpticDefinitionReason,
    readonly operation: string,
    readonly optic: string,
    message: string
  ) {
    super(message);
    this.name = "OpticDefinitionError";
  }
}

/** Raised when a recursive optic nests deeper than the configured limit. */
export class RecursionLimitError extends Error {
  constructor(
    readonly limit: number,
    readonly optic: string
  ) {
    super(`${optic} exceeded the recursion limit of ${limit}`);
    this.name = "RecursionLimitError";
  }
}
