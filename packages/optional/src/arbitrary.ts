/**
 * Random Optional values for law checks and property tests.
 */

import { arbConstant, arbFrequency, arbMap, type Arbitrary } from "@optarg/laws";
import { Absent, present, type Optional } from "./data/optional.js";

/**
 * Absent one time in four, otherwise Present of a value drawn from `arb`.
 */
export function arbOptional<A>(arb: Arbitrary<A>): Arbitrary<Optional<A>> {
  return arbFrequency<Optional<A>>(
    [1, arbConstant<Optional<A>>(Absent)],
    [3, arbMap(arb, (a: A) => present(a))],
  );
}
