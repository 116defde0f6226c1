/**
 * Semigroup and Monoid laws.
 */

import { combineLaws, defineLaw, type Arbitrary, type LawSet } from "@optarg/laws";
import type { Eq } from "../typeclasses/eq.js";
import type { Monoid, Semigroup } from "../typeclasses/semigroup.js";

export function semigroupLaws<A>(S: Semigroup<A>, E: Eq<A>, arb: Arbitrary<A>): LawSet {
  return [
    defineLaw<[A, A, A]>({
      name: "semigroup associativity",
      arity: 3,
      proofHint: "associativity",
      description: "combine(combine(x, y), z) === combine(x, combine(y, z))",
      gen: (rng) => [arb.arbitrary(rng), arb.arbitrary(rng), arb.arbitrary(rng)],
      check: (x, y, z) => E.eqv(S.combine(S.combine(x, y), z), S.combine(x, S.combine(y, z))),
    }),
  ];
}

export function monoidLaws<A>(M: Monoid<A>, E: Eq<A>, arb: Arbitrary<A>): LawSet {
  return combineLaws(semigroupLaws(M, E, arb), [
    defineLaw<[A]>({
      name: "monoid left identity",
      arity: 1,
      proofHint: "identity-left",
      description: "combine(empty, x) === x",
      gen: (rng) => [arb.arbitrary(rng)],
      check: (x) => E.eqv(M.combine(M.empty, x), x),
    }),
    defineLaw<[A]>({
      name: "monoid right identity",
      arity: 1,
      proofHint: "identity-right",
      description: "combine(x, empty) === x",
      gen: (rng) => [arb.arbitrary(rng)],
      check: (x) => E.eqv(M.combine(x, M.empty), x),
    }),
  ]);
}
