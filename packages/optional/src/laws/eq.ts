/**
 * Eq laws: reflexivity, symmetry, transitivity.
 *
 * Random inputs rarely collide, so symmetry and transitivity also draw
 * pairs that are equal by construction (the same value twice).
 */

import { arbOneOf, defineLaw, type Arbitrary, type LawSet } from "@optarg/laws";
import type { Eq } from "../typeclasses/eq.js";

export function eqLaws<A>(E: Eq<A>, arb: Arbitrary<A>): LawSet {
  const arbPair: Arbitrary<readonly [A, A]> = arbOneOf<readonly [A, A]>(
    { arbitrary: (rng) => [arb.arbitrary(rng), arb.arbitrary(rng)] },
    {
      arbitrary: (rng) => {
        const x = arb.arbitrary(rng);
        return [x, x];
      },
    },
  );

  return [
    defineLaw<[A]>({
      name: "eq reflexivity",
      arity: 1,
      proofHint: "reflexivity",
      description: "eqv(x, x)",
      gen: (rng) => [arb.arbitrary(rng)],
      check: (x) => E.eqv(x, x),
    }),
    defineLaw<[A, A]>({
      name: "eq symmetry",
      arity: 2,
      proofHint: "symmetry",
      description: "eqv(x, y) === eqv(y, x)",
      gen: (rng) => {
        const [x, y] = arbPair.arbitrary(rng);
        return [x, y];
      },
      check: (x, y) => E.eqv(x, y) === E.eqv(y, x),
    }),
    defineLaw<[A, A, A]>({
      name: "eq transitivity",
      arity: 3,
      proofHint: "transitivity",
      description: "eqv(x, y) && eqv(y, z) implies eqv(x, z)",
      gen: (rng) => {
        const [x, y] = arbPair.arbitrary(rng);
        return [x, y, rng.nextBoolean() ? y : arb.arbitrary(rng)];
      },
      check: (x, y, z) => !(E.eqv(x, y) && E.eqv(y, z)) || E.eqv(x, z),
    }),
  ];
}
