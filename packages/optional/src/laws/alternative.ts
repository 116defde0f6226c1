/**
 * SemigroupK, MonoidK and Alternative laws.
 */

import { combineLaws, defineLaw, type Arbitrary, type LawSet } from "@optarg/laws";
import type { $, TypeFunction } from "../hkt.js";
import type { Alternative, MonoidK, SemigroupK } from "../typeclasses/alternative.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Endo } from "./functor.js";

export interface AlternativeArbs<F extends TypeFunction, A> {
  readonly fa: Arbitrary<$<F, A>>;
  readonly ff: Arbitrary<$<F, Endo<A>>>;
}

export function semigroupKLaws<F extends TypeFunction, A>(
  F: SemigroupK<F>,
  E: Eq<$<F, A>>,
  arbs: { readonly fa: Arbitrary<$<F, A>> },
): LawSet {
  return [
    defineLaw<[$<F, A>, $<F, A>, $<F, A>]>({
      name: "semigroupK associativity",
      arity: 3,
      proofHint: "associativity",
      description: "combineK(combineK(x, y), z) === combineK(x, combineK(y, z))",
      gen: (rng) => [arbs.fa.arbitrary(rng), arbs.fa.arbitrary(rng), arbs.fa.arbitrary(rng)],
      check: (x, y, z) =>
        E.eqv(F.combineK<A>(F.combineK<A>(x, y), z), F.combineK<A>(x, F.combineK<A>(y, z))),
    }),
  ];
}

export function monoidKLaws<F extends TypeFunction, A>(
  F: MonoidK<F>,
  E: Eq<$<F, A>>,
  arbs: { readonly fa: Arbitrary<$<F, A>> },
): LawSet {
  return combineLaws(semigroupKLaws(F, E, arbs), [
    defineLaw<[$<F, A>]>({
      name: "monoidK left identity",
      arity: 1,
      proofHint: "identity-left",
      description: "combineK(emptyK, x) === x",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (x) => E.eqv(F.combineK<A>(F.emptyK<A>(), x), x),
    }),
    defineLaw<[$<F, A>]>({
      name: "monoidK right identity",
      arity: 1,
      proofHint: "identity-right",
      description: "combineK(x, emptyK) === x",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (x) => E.eqv(F.combineK<A>(x, F.emptyK<A>()), x),
    }),
  ]);
}

export function alternativeLaws<F extends TypeFunction, A>(
  F: Alternative<F>,
  E: Eq<$<F, A>>,
  arbs: AlternativeArbs<F, A>,
): LawSet {
  return combineLaws(monoidKLaws(F, E, arbs), [
    defineLaw<[$<F, A>]>({
      name: "alternative right absorption",
      arity: 1,
      proofHint: "absorption",
      description: "ap(emptyK, fa) === emptyK",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (fa) => E.eqv(F.ap<A, A>(F.emptyK<Endo<A>>(), fa), F.emptyK<A>()),
    }),
    defineLaw<[$<F, Endo<A>>, $<F, Endo<A>>, $<F, A>]>({
      name: "alternative right distributivity",
      arity: 3,
      proofHint: "distributivity",
      description: "ap(combineK(f, g), fa) === combineK(ap(f, fa), ap(g, fa))",
      gen: (rng) => [arbs.ff.arbitrary(rng), arbs.ff.arbitrary(rng), arbs.fa.arbitrary(rng)],
      check: (f, g, fa) =>
        E.eqv(
          F.ap<A, A>(F.combineK<Endo<A>>(f, g), fa),
          F.combineK<A>(F.ap<A, A>(f, fa), F.ap<A, A>(g, fa)),
        ),
    }),
  ]);
}
