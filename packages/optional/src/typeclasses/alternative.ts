/**
 * SemigroupK, MonoidK, Alternative and MonadPlus Typeclasses
 *
 * Monoidal operations at the type constructor level: `combineK` works for
 * every element type A, so no constraint on A is needed.
 *
 * Laws:
 *   - Associativity: combineK(combineK(x, y), z) === combineK(x, combineK(y, z))
 *   - Left identity: combineK(emptyK, x) === x
 *   - Right identity: combineK(x, emptyK) === x
 *   - Right absorption: ap(emptyK, a) === emptyK
 */

import type { Applicative } from "./applicative.js";
import type { Monad } from "./monad.js";
import type { $, TypeClass, TypeFunction } from "../hkt.js";

export interface SemigroupK<F extends TypeFunction> extends TypeClass<F> {
  readonly combineK: <A>(x: $<F, A>, y: $<F, A>) => $<F, A>;
}

export interface MonoidK<F extends TypeFunction> extends SemigroupK<F> {
  readonly emptyK: <A>() => $<F, A>;
}

export interface Alternative<F extends TypeFunction> extends Applicative<F>, MonoidK<F> {}

/**
 * A Monad that is also an Alternative. `mzero` and `mplus` are the
 * traditional names for `emptyK` and `combineK`.
 */
export interface MonadPlus<F extends TypeFunction> extends Monad<F>, Alternative<F> {
  readonly mzero: <A>() => $<F, A>;
  readonly mplus: <A>(x: $<F, A>, y: $<F, A>) => $<F, A>;
}

/**
 * Combine any number of values, using emptyK for none
 */
export function combineAllK<F extends TypeFunction>(
  F: MonoidK<F>,
): <A>(fas: readonly $<F, A>[]) => $<F, A> {
  return <A>(fas: readonly $<F, A>[]): $<F, A> =>
    fas.reduce<$<F, A>>((acc, fa) => F.combineK<A>(acc, fa), F.emptyK<A>());
}
