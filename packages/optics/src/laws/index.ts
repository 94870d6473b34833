export type { Eq, Law, LawSet, LawViolation } from "./types.js";
export { eqStrict, eqStructural, lensLaws, compositionLaws, checkLaws } from "./lens.js";
