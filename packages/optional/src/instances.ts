/**
 * Typeclass instances for Optional, and for the targets of `toAlternative`.
 *
 * Optional carries two different monoids. `fallbackMonoid` keeps the first
 * Present (identity Absent); `liftedMonoid` combines the values inside
 * (identity Present(M.empty)). They have distinct names so that picking one
 * is always explicit.
 */

import type { ArrayF, Maybe, MaybeF, OptionalF, $, TypeFunction } from "./hkt.js";
import {
  Absent,
  absent,
  apply,
  bind,
  map,
  map2,
  match,
  orElse,
  present,
  show,
  equals,
  type Optional,
} from "./data/optional.js";
import type { Functor } from "./typeclasses/functor.js";
import type { Applicative } from "./typeclasses/applicative.js";
import type { Monad } from "./typeclasses/monad.js";
import type { Alternative, MonadPlus } from "./typeclasses/alternative.js";
import type { Foldable } from "./typeclasses/foldable.js";
import type { Traverse } from "./typeclasses/traverse.js";
import type { Eq } from "./typeclasses/eq.js";
import type { Show } from "./typeclasses/show.js";
import type { Monoid, Semigroup } from "./typeclasses/semigroup.js";
import type { Fractional, Numeric } from "./typeclasses/numeric.js";
import type { IsString } from "./typeclasses/is-string.js";
import type { Defaultable } from "./typeclasses/defaultable.js";

// ============================================================================
// Functor / Applicative / Monad
// ============================================================================

export const functorOptional: Functor<OptionalF> = {
  map: <A, B>(fa: Optional<A>, f: (a: A) => B): Optional<B> => map(f, fa),
};

export const applicativeOptional: Applicative<OptionalF> = {
  ...functorOptional,
  ap: <A, B>(fab: Optional<(a: A) => B>, fa: Optional<A>): Optional<B> => apply(fab, fa),
  pure: present,
};

export const monadOptional: Monad<OptionalF> = {
  ...applicativeOptional,
  flatMap: <A, B>(fa: Optional<A>, f: (a: A) => Optional<B>): Optional<B> => bind(fa, f),
};

// ============================================================================
// Alternative / MonadPlus
// ============================================================================

export const alternativeOptional: Alternative<OptionalF> = {
  ...applicativeOptional,
  combineK: orElse,
  emptyK: absent,
};

export const monadPlusOptional: MonadPlus<OptionalF> = {
  ...monadOptional,
  ...alternativeOptional,
  mzero: absent,
  mplus: orElse,
};

// ============================================================================
// Foldable / Traverse
// ============================================================================

export const foldableOptional: Foldable<OptionalF> = {
  foldLeft: <A, B>(fa: Optional<A>, b: B, f: (b: B, a: A) => B): B =>
    fa._tag === "Present" ? f(b, fa.value) : b,
  foldRight: <A, B>(fa: Optional<A>, b: B, f: (a: A, b: B) => B): B =>
    fa._tag === "Present" ? f(fa.value, b) : b,
};

export const traverseOptional: Traverse<OptionalF> = {
  ...functorOptional,
  ...foldableOptional,
  traverse:
    <G extends TypeFunction>(G: Applicative<G>) =>
    <A, B>(fa: Optional<A>, f: (a: A) => $<G, B>): $<G, Optional<B>> =>
      match(fa, {
        Absent: () => G.pure<Optional<B>>(Absent),
        Present: (a) => G.map<B, Optional<B>>(f(a), present),
      }),
};

// ============================================================================
// Eq / Show
// ============================================================================

export function eqOptional<A>(E: Eq<A>): Eq<Optional<A>> {
  return { eqv: (x, y) => equals(x, y, E) };
}

export function showOptional<A>(S: Show<A>): Show<Optional<A>> {
  return { show: (v) => show(v, S) };
}

// ============================================================================
// Monoids
// ============================================================================

/**
 * First Present wins; identity is Absent.
 */
export function fallbackMonoid<A>(): Monoid<Optional<A>> {
  return { combine: orElse, empty: Absent };
}

/**
 * Combine the wrapped values; Absent if either side is Absent.
 */
export function liftedSemigroup<A>(S: Semigroup<A>): Semigroup<Optional<A>> {
  return { combine: (x, y) => map2(x, y, S.combine) };
}

/**
 * `liftedSemigroup` with identity `present(M.empty)`.
 */
export function liftedMonoid<A>(M: Monoid<A>): Monoid<Optional<A>> {
  return { ...liftedSemigroup(M), empty: present(M.empty) };
}

// ============================================================================
// Literal classes
// ============================================================================

/**
 * Arithmetic on Optional: binary operations are Absent when either operand
 * is, unary operations map over the value.
 *
 * @example
 * ```typescript
 * const N = numericOptional(numericNumber);
 * N.add(present(20), absent()); // Absent
 * N.add(present(20), present(1)); // Present(21)
 * ```
 */
export function numericOptional<A>(N: Numeric<A>): Numeric<Optional<A>> {
  return {
    add: (a, b) => map2(a, b, (x, y) => N.add(x, y)),
    sub: (a, b) => map2(a, b, (x, y) => N.sub(x, y)),
    mul: (a, b) => map2(a, b, (x, y) => N.mul(x, y)),
    negate: (a) => map((x: A) => N.negate(x), a),
    abs: (a) => map((x: A) => N.abs(x), a),
    signum: (a) => map((x: A) => N.signum(x), a),
    fromInteger: (n) => present(N.fromInteger(n)),
    zero: () => present(N.zero()),
    one: () => present(N.one()),
  };
}

export function fractionalOptional<A>(F: Fractional<A>): Fractional<Optional<A>> {
  return {
    ...numericOptional(F),
    div: (a, b) => map2(a, b, (x, y) => F.div(x, y)),
    recip: (a) => map((x: A) => F.recip(x), a),
    fromRational: (numerator, denominator) => present(F.fromRational(numerator, denominator)),
  };
}

export function isStringOptional<A>(IS: IsString<A>): IsString<Optional<A>> {
  return { fromString: (text) => present(IS.fromString(text)) };
}

/**
 * The default of an Optional argument is Absent.
 */
export function defaultOptional<A>(): Defaultable<Optional<A>> {
  return { defaultValue: () => absent<A>() };
}

// ============================================================================
// toAlternative targets
// ============================================================================

export const alternativeArray: Alternative<ArrayF> = {
  map: <A, B>(fa: A[], f: (a: A) => B): B[] => fa.map((a) => f(a)),
  ap: <A, B>(fab: ((a: A) => B)[], fa: A[]): B[] => fab.flatMap((f) => fa.map((a) => f(a))),
  pure: <A>(a: A): A[] => [a],
  combineK: <A>(x: A[], y: A[]): A[] => [...x, ...y],
  emptyK: <A>(): A[] => [],
};

export const alternativeMaybe: Alternative<MaybeF> = {
  map: <A, B>(fa: Maybe<A>, f: (a: A) => B): Maybe<B> => (fa === undefined ? undefined : f(fa)),
  ap: <A, B>(fab: Maybe<(a: A) => B>, fa: Maybe<A>): Maybe<B> =>
    fab === undefined || fa === undefined ? undefined : fab(fa),
  pure: <A>(a: A): Maybe<A> => a,
  combineK: <A>(x: Maybe<A>, y: Maybe<A>): Maybe<A> => (x === undefined ? y : x),
  emptyK: <A>(): Maybe<A> => undefined,
};
