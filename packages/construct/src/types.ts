/**
 * Builds an object of one concrete kind from its complete, ordered list of
 * field values.
 */
export type Constructor<T> = (values: readonly unknown[]) => T;

/** Options accepted by {@link registerConstructor}. */
export interface ConstructorSpec<T> {
  /**
   * Field order used when enumerating and rebuilding instances.
   * Defaults to the instance's own enumerable keys.
   */
  readonly fields?: readonly string[];
  /** Build an instance from values given in field order. */
  readonly build: Constructor<T>;
}

/** A key tuple accepted by the index operations. */
export type Indices = readonly unknown[];
