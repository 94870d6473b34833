import type { OpticStyle } from "./types.js";

/** The parts of an optic that identify it in messages. */
export interface OpticShape {
  readonly kind: string;
  readonly style?: OpticStyle;
  describe?(): string;
}

/** The style an optic declares, `"set-based"` when it declares none. */
export function opticStyle(optic: OpticShape): OpticStyle {
  return optic.style ?? "set-based";
}

/** Modify-based when either component is, set-based otherwise. */
export function composedOpticStyle(outer: OpticShape, inner: OpticShape): OpticStyle {
  return opticStyle(outer) === "modify-based" || opticStyle(inner) === "modify-based"
    ? "modify-based"
    : "set-based";
}

/** Short shape description used in errors and traces. */
export function describeOptic(optic: OpticShape): string {
  return optic.describe ? optic.describe() : optic.kind;
}
