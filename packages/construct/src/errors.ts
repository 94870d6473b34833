/** Reason codes for reconstruction failures. */
export type ConstructionErrorReason = "unknown_field" | "arity_mismatch";

/** Error thrown when an object cannot be rebuilt from the given field values. */
export class ConstructionError extends Error {
  constructor(
    readonly kind: string,
    readonly reason: ConstructionErrorReason,
    message: string
  ) {
    super(message);
    this.name = "ConstructionError";
  }
}
