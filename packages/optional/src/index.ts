/**
 * @optarg/optional — arguments that are either provided or left at their
 * default.
 *
 * @example
 * ```typescript
 * import { fold, lift, type OptionalArg } from "@optarg/optional";
 *
 * function birthday(age?: OptionalArg<number>): string {
 *   return fold("You are one year older!", (n) => `You are ${n} years old!`, lift(age));
 * }
 * ```
 *
 * The generic typeclass helpers `lift` and `map2` are exported as `liftF`
 * and `map2F`, since the Optional-specific functions own the short names.
 *
 * @packageDocumentation
 */

export type { TypeFunction, TypeClass, Kind, $, OptionalF, ArrayF, Maybe, MaybeF } from "./hkt.js";

export type { Optional, OptionalArg } from "./data/optional.js";
export {
  Absent,
  Present,
  present,
  absent,
  pure,
  empty,
  fromText,
  fromInteger,
  fromFraction,
  lift,
  isPresent,
  isAbsent,
  isOptional,
  map,
  bind,
  apply,
  map2,
  orElse,
  match,
  fold,
  valueOr,
  toAlternative,
  toArray,
  toMaybe,
  equals,
  show,
} from "./data/optional.js";

export * from "./typeclasses/index.js";

export {
  functorOptional,
  applicativeOptional,
  monadOptional,
  alternativeOptional,
  monadPlusOptional,
  foldableOptional,
  traverseOptional,
  eqOptional,
  showOptional,
  fallbackMonoid,
  liftedSemigroup,
  liftedMonoid,
  numericOptional,
  fractionalOptional,
  isStringOptional,
  defaultOptional,
  alternativeArray,
  alternativeMaybe,
} from "./instances.js";

export * from "./laws/index.js";
export { arbOptional } from "./arbitrary.js";
