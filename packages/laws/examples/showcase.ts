/**
 * @optarg/laws Showcase
 *
 * Laws are plain data: a name, a generator for the inputs and a check.
 * `verifyLaws` runs them against seeded random inputs and reports the
 * first counterexample of every law that fails.
 *
 * Run:   npx tsx examples/showcase.ts
 */

import {
  arbInt,
  arbString,
  defineLaw,
  describeValue,
  forAll,
  setLawsConfig,
  verifyLaws,
  type LawSet,
} from "../src/index.js";

// ============================================================================
// 1. DEFINING LAWS
// ============================================================================

const laws: LawSet = [
  defineLaw<[string, string, string]>({
    name: "concat associativity",
    arity: 3,
    proofHint: "associativity",
    gen: (rng) => [
      arbString().arbitrary(rng),
      arbString().arbitrary(rng),
      arbString().arbitrary(rng),
    ],
    check: (x, y, z) => (x + y) + z === x + (y + z),
  }),
  defineLaw<[number, number]>({
    name: "subtraction commutativity",
    arity: 2,
    proofHint: "commutativity",
    description: "does not hold: a - b !== b - a",
    gen: (rng) => [arbInt().arbitrary(rng), arbInt().arbitrary(rng)],
    check: (a, b) => a - b === b - a,
  }),
];

// ============================================================================
// 2. VERIFYING - verbose mode logs one [laws] line per law
// ============================================================================

setLawsConfig({ iterations: 200, verbose: true });

const summary = verifyLaws(laws);
for (const result of summary.results) {
  if (result.status === "failed") {
    const inputs = result.counterexample.map(describeValue).join(", ");
    console.log(`${result.law}: counterexample ${inputs}`);
  }
}

// ============================================================================
// 3. PROPERTIES - forAll throws PropertyFailedError with the failing input
// ============================================================================

forAll(arbString(4), (s) => {
  if (s.length > 4) throw new Error(`too long: ${s}`);
});
