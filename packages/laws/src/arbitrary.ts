/**
 * Arbitrary - generators of random test values
 *
 * An `Arbitrary<A>` draws a value of type `A` from an `Rng`. The combinators
 * below build generators for compound values out of simpler ones.
 *
 * @example
 * ```typescript
 * const arbSmallEven = arbMap(arbInt(0, 50), (n) => n * 2);
 * const arbName = arbElement(["Ada", "Grace", "Barbara"]);
 * ```
 */

import type { Rng } from "./rng.js";

export interface Arbitrary<A> {
  readonly arbitrary: (rng: Rng) => A;
}

const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";

/** Integers in [min, max]. */
export function arbInt(min = -1000, max = 1000): Arbitrary<number> {
  return { arbitrary: (rng) => rng.nextInt(min, max) };
}

/** Strings of 0 to `maxLength` characters drawn from `alphabet`. */
export function arbString(maxLength = 8, alphabet = LOWERCASE): Arbitrary<string> {
  const chars = Array.from(alphabet);
  return {
    arbitrary: (rng) => {
      const length = rng.nextInt(0, maxLength);
      let out = "";
      for (let i = 0; i < length; i++) {
        out += rng.pick(chars);
      }
      return out;
    },
  };
}

export const arbBoolean: Arbitrary<boolean> = {
  arbitrary: (rng) => rng.nextBoolean(),
};

export function arbConstant<A>(value: A): Arbitrary<A> {
  return { arbitrary: () => value };
}

/** One of a fixed list of values. */
export function arbElement<A>(items: readonly A[]): Arbitrary<A> {
  return { arbitrary: (rng) => rng.pick(items) };
}

/** Delegates to one of the given generators, chosen uniformly. */
export function arbOneOf<A>(...arbs: readonly Arbitrary<A>[]): Arbitrary<A> {
  return { arbitrary: (rng) => rng.pick(arbs).arbitrary(rng) };
}

/**
 * Delegates to one of the given generators, chosen with the given weights.
 *
 * @example
 * ```typescript
 * // "" one time in four
 * arbFrequency([1, arbConstant("")], [3, arbString()]);
 * ```
 */
export function arbFrequency<A>(
  ...weighted: readonly (readonly [number, Arbitrary<A>])[]
): Arbitrary<A> {
  const total = weighted.reduce((acc, [weight]) => acc + weight, 0);
  if (total <= 0) {
    throw new RangeError("arbFrequency: weights must sum to a positive number");
  }
  return {
    arbitrary: (rng) => {
      let roll = rng.next() * total;
      for (const [weight, arb] of weighted) {
        if (roll < weight) return arb.arbitrary(rng);
        roll -= weight;
      }
      return weighted[weighted.length - 1][1].arbitrary(rng);
    },
  };
}

export function arbMap<A, B>(arb: Arbitrary<A>, f: (a: A) => B): Arbitrary<B> {
  return { arbitrary: (rng) => f(arb.arbitrary(rng)) };
}
