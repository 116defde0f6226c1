/**
 * Seeded pseudo-random generator (mulberry32).
 *
 * Every law run and property iteration gets its own `Rng` built from a
 * numeric seed, so a failure report's seed reproduces the exact inputs.
 */

export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
  nextBoolean(): boolean;
  /** @throws RangeError if `items` is empty */
  pick<A>(items: readonly A[]): A;
}

export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const nextInt = (min: number, max: number): number =>
    min + Math.floor(next() * (max - min + 1));

  return {
    next,
    nextInt,
    nextBoolean: () => next() < 0.5,
    pick: <A>(items: readonly A[]): A => {
      if (items.length === 0) {
        throw new RangeError("pick: cannot choose from an empty list");
      }
      return items[nextInt(0, items.length - 1)];
    },
  };
}
