/**
 * Foldable laws: both folds visit the same elements in the same order, and
 * `foldMap` agrees with `foldLeft`.
 */

import { defineLaw, type Arbitrary, type LawSet } from "@optarg/laws";
import type { $, TypeFunction } from "../hkt.js";
import { eqArray, type Eq } from "../typeclasses/eq.js";
import { foldMap, type Foldable } from "../typeclasses/foldable.js";
import type { Monoid } from "../typeclasses/semigroup.js";

export function foldableLaws<F extends TypeFunction, A>(
  F: Foldable<F>,
  E: Eq<A>,
  arbs: { readonly fa: Arbitrary<$<F, A>> },
): LawSet {
  const E2 = eqArray(E);
  const toList = (fa: $<F, A>): A[] => F.foldLeft<A, A[]>(fa, [], (acc, a) => [...acc, a]);
  const monoidList: Monoid<readonly A[]> = { combine: (x, y) => [...x, ...y], empty: [] };

  return [
    defineLaw<[$<F, A>]>({
      name: "foldable left/right consistency",
      arity: 1,
      description: "foldLeft and foldRight visit the same elements in order",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (fa) => E2.eqv(F.foldRight<A, A[]>(fa, [], (a, acc) => [a, ...acc]), toList(fa)),
    }),
    defineLaw<[$<F, A>]>({
      name: "foldable foldMap consistency",
      arity: 1,
      description: "foldMap(fa, a => [a]) === foldLeft(fa, [], append)",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (fa) => E2.eqv(foldMap(F)(monoidList)<A>(fa, (a) => [a]), toList(fa)),
    }),
  ];
}
