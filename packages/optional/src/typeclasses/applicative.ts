/**
 * Apply and Applicative Typeclasses
 *
 * Apply extends Functor with the ability to apply a function in a context.
 * Applicative extends Apply with the ability to lift a value into a context.
 *
 * Laws:
 *   - Identity: ap(pure(id), v) === v
 *   - Homomorphism: ap(pure(f), pure(x)) === pure(f(x))
 *   - Interchange: ap(u, pure(y)) === ap(pure(f => f(y)), u)
 */

import type { Functor } from "./functor.js";
import type { $, TypeFunction } from "../hkt.js";

// ============================================================================
// Apply
// ============================================================================

export interface Apply<F extends TypeFunction> extends Functor<F> {
  readonly ap: <A, B>(fab: $<F, (a: A) => B>, fa: $<F, A>) => $<F, B>;
}

// ============================================================================
// Applicative
// ============================================================================

export interface Applicative<F extends TypeFunction> extends Apply<F> {
  readonly pure: <A>(a: A) => $<F, A>;
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Apply two functorial values and combine with a function
 */
export function map2<F extends TypeFunction>(
  F: Apply<F>,
): <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C) => $<F, C> {
  return <A, B, C>(fa: $<F, A>, fb: $<F, B>, f: (a: A, b: B) => C): $<F, C> =>
    F.ap<B, C>(
      F.map<A, (b: B) => C>(fa, (a) => (b) => f(a, b)),
      fb,
    );
}

/**
 * Tuple two functorial values
 */
export function tuple2<F extends TypeFunction>(
  F: Apply<F>,
): <A, B>(fa: $<F, A>, fb: $<F, B>) => $<F, [A, B]> {
  return <A, B>(fa: $<F, A>, fb: $<F, B>): $<F, [A, B]> =>
    map2(F)<A, B, [A, B]>(fa, fb, (a, b) => [a, b]);
}
