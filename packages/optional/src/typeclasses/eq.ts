/**
 * Eq Typeclass
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

/** Reference / primitive equality. */
export const eqStrict: Eq<unknown> = {
  eqv: (x, y) => x === y,
};

/** Element-wise equality for arrays. */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) => xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}
