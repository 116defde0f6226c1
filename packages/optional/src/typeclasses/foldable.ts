/**
 * Foldable Typeclass
 *
 * Data structures that can be reduced to a summary value.
 */

import type { Monoid } from "./semigroup.js";
import type { $, TypeClass, TypeFunction } from "../hkt.js";

export interface Foldable<F extends TypeFunction> extends TypeClass<F> {
  readonly foldLeft: <A, B>(fa: $<F, A>, b: B, f: (b: B, a: A) => B) => B;
  readonly foldRight: <A, B>(fa: $<F, A>, b: B, f: (a: A, b: B) => B) => B;
}

/**
 * Map each element to a monoid and combine
 */
export function foldMap<F extends TypeFunction>(
  F: Foldable<F>,
): <M>(M: Monoid<M>) => <A>(fa: $<F, A>, f: (a: A) => M) => M {
  return <M>(M: Monoid<M>) =>
    <A>(fa: $<F, A>, f: (a: A) => M): M =>
      F.foldLeft<A, M>(fa, M.empty, (acc, a) => M.combine(acc, f(a)));
}

/**
 * Number of elements in the structure
 */
export function size<F extends TypeFunction>(F: Foldable<F>): <A>(fa: $<F, A>) => number {
  return <A>(fa: $<F, A>): number => F.foldLeft<A, number>(fa, 0, (n) => n + 1);
}
