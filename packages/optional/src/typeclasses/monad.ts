/**
 * FlatMap and Monad Typeclasses
 *
 * Laws:
 *   - Left identity: flatMap(pure(a), f) === f(a)
 *   - Right identity: flatMap(m, pure) === m
 *   - Associativity: flatMap(flatMap(m, f), g) === flatMap(m, a => flatMap(f(a), g))
 */

import type { Applicative, Apply } from "./applicative.js";
import type { $, TypeFunction } from "../hkt.js";

export interface FlatMap<F extends TypeFunction> extends Apply<F> {
  readonly flatMap: <A, B>(fa: $<F, A>, f: (a: A) => $<F, B>) => $<F, B>;
}

export interface Monad<F extends TypeFunction> extends FlatMap<F>, Applicative<F> {}

/**
 * Flatten a nested structure
 */
export function flatten<F extends TypeFunction>(
  F: FlatMap<F>,
): <A>(ffa: $<F, $<F, A>>) => $<F, A> {
  return <A>(ffa: $<F, $<F, A>>): $<F, A> => F.flatMap<$<F, A>, A>(ffa, (fa) => fa);
}
