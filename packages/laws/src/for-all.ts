import type { Arbitrary } from "./arbitrary.js";
import { getLawsConfig } from "./config.js";
import { PropertyFailedError } from "./errors.js";
import { createRng } from "./rng.js";

/**
 * Property-based testing - run a property against generated values.
 *
 * Iteration `i` draws its input from `createRng(seed + i)`, where `seed`
 * and the default count come from the laws configuration.
 *
 * @example
 * ```typescript
 * forAll(arbInt(), (n) => {
 *   expect(valueOr(0, present(n))).toBe(n);
 * });
 *
 * // With custom iteration count
 * forAll(arbString(), 500, (s) => {
 *   expect(s.length).toBeLessThanOrEqual(8);
 * });
 * ```
 *
 * @throws PropertyFailedError wrapping the first error the property throws
 */
export function forAll<T>(arb: Arbitrary<T>, property: (value: T) => void): void;
export function forAll<T>(arb: Arbitrary<T>, count: number, property: (value: T) => void): void;
export function forAll<T>(
  arb: Arbitrary<T>,
  countOrProperty: number | ((value: T) => void),
  property?: (value: T) => void,
): void {
  const config = getLawsConfig();
  const count = typeof countOrProperty === "number" ? countOrProperty : config.iterations;
  const prop = typeof countOrProperty === "function" ? countOrProperty : property;
  if (prop === undefined) {
    throw new TypeError("forAll: a property function is required");
  }

  for (let i = 0; i < count; i++) {
    const seed = config.seed + i;
    const value = arb.arbitrary(createRng(seed));
    try {
      prop(value);
    } catch (e) {
      throw new PropertyFailedError(seed, i + 1, value, e);
    }
  }
}
