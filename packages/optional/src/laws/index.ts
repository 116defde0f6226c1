export { eqLaws } from "./eq.js";
export { semigroupLaws, monoidLaws } from "./semigroup.js";
export { functorLaws, applicativeLaws, monadLaws } from "./functor.js";
export type { Endo, FunctorArbs, ApplicativeArbs, MonadArbs } from "./functor.js";
export { semigroupKLaws, monoidKLaws, alternativeLaws } from "./alternative.js";
export type { AlternativeArbs } from "./alternative.js";
export { foldableLaws } from "./foldable.js";
