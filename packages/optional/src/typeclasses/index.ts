export type { Functor } from "./functor.js";
export { lift as liftF } from "./functor.js";
export type { Apply, Applicative } from "./applicative.js";
export { map2 as map2F, tuple2 } from "./applicative.js";
export type { FlatMap, Monad } from "./monad.js";
export { flatten } from "./monad.js";
export type { SemigroupK, MonoidK, Alternative, MonadPlus } from "./alternative.js";
export { combineAllK } from "./alternative.js";
export type { Foldable } from "./foldable.js";
export { foldMap, size } from "./foldable.js";
export type { Traverse } from "./traverse.js";
export { sequence } from "./traverse.js";
export type { Semigroup, Monoid } from "./semigroup.js";
export { combineAll, monoidString, monoidSum, monoidProduct } from "./semigroup.js";
export type { Eq } from "./eq.js";
export { eqStrict, eqArray } from "./eq.js";
export type { Show } from "./show.js";
export { showString, showNumber, showDefault } from "./show.js";
export type { Iso } from "./iso.js";
export type { IsString } from "./is-string.js";
export { isStringString, deriveIsString } from "./is-string.js";
export type { Defaultable } from "./defaultable.js";
export { defaultNumber, defaultString, def } from "./defaultable.js";
export type { Numeric, Fractional } from "./numeric.js";
export {
  numericNumber,
  numericBigInt,
  fractionalNumber,
  deriveNumeric,
  deriveFractional,
} from "./numeric.js";
