/**
 * Functor Typeclass
 *
 * A type class of types that can be mapped over.
 * Instances must satisfy the following laws:
 *   - Identity: F.map(fa, a => a) === fa
 *   - Composition: F.map(F.map(fa, f), g) === F.map(fa, a => g(f(a)))
 */

import type { $, TypeClass, TypeFunction } from "../hkt.js";

export interface Functor<F extends TypeFunction> extends TypeClass<F> {
  readonly map: <A, B>(fa: $<F, A>, f: (a: A) => B) => $<F, B>;
}

/**
 * Lift a function to work on Functor values
 */
export function lift<F extends TypeFunction>(
  F: Functor<F>,
): <A, B>(f: (a: A) => B) => (fa: $<F, A>) => $<F, B> {
  return <A, B>(f: (a: A) => B) =>
    (fa: $<F, A>): $<F, B> =>
      F.map<A, B>(fa, f);
}
