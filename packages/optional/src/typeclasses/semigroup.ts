/**
 * Semigroup and Monoid Typeclasses
 *
 * Semigroup: A type with an associative binary operation.
 * Monoid: A Semigroup with an identity element.
 *
 * Laws:
 *   - Semigroup Associativity: combine(combine(x, y), z) === combine(x, combine(y, z))
 *   - Monoid Left Identity: combine(empty, x) === x
 *   - Monoid Right Identity: combine(x, empty) === x
 */

export interface Semigroup<A> {
  readonly combine: (x: A, y: A) => A;
}

export interface Monoid<A> extends Semigroup<A> {
  readonly empty: A;
}

/**
 * Combine all elements using the Monoid (returns empty for empty array)
 */
export function combineAll<A>(M: Monoid<A>): (as: readonly A[]) => A {
  return (as) => as.reduce((acc, a) => M.combine(acc, a), M.empty);
}

// ============================================================================
// Common Instances
// ============================================================================

export const monoidString: Monoid<string> = {
  combine: (x, y) => x + y,
  empty: "",
};

export const monoidSum: Monoid<number> = {
  combine: (x, y) => x + y,
  empty: 0,
};

export const monoidProduct: Monoid<number> = {
  combine: (x, y) => x * y,
  empty: 1,
};
