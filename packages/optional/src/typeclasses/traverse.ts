/**
 * Traverse Typeclass
 *
 * Traverse extends Functor and Foldable with the ability to traverse
 * a structure while accumulating effects.
 *
 * Laws:
 *   - Identity: traverse(G)(fa, G.pure) === G.pure(fa)
 */

import type { Applicative } from "./applicative.js";
import type { Functor } from "./functor.js";
import type { Foldable } from "./foldable.js";
import type { $, TypeFunction } from "../hkt.js";

export interface Traverse<F extends TypeFunction> extends Functor<F>, Foldable<F> {
  readonly traverse: <G extends TypeFunction>(
    G: Applicative<G>,
  ) => <A, B>(fa: $<F, A>, f: (a: A) => $<G, B>) => $<G, $<F, B>>;
}

/**
 * Sequence a structure of effects into an effect of structure
 */
export function sequence<F extends TypeFunction>(
  F: Traverse<F>,
): <G extends TypeFunction>(G: Applicative<G>) => <A>(fga: $<F, $<G, A>>) => $<G, $<F, A>> {
  return <G extends TypeFunction>(G: Applicative<G>) =>
    <A>(fga: $<F, $<G, A>>): $<G, $<F, A>> =>
      F.traverse(G)<$<G, A>, A>(fga, (ga) => ga);
}
