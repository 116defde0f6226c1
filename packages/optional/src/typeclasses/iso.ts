/**
 * An isomorphism between a user wrapper type W and the type A it wraps.
 *
 * @example
 * ```typescript
 * interface Age { readonly years: number }
 * const ageIso: Iso<Age, number> = {
 *   wrap: (years) => ({ years }),
 *   unwrap: (age) => age.years,
 * };
 * ```
 */
export interface Iso<W, A> {
  wrap(a: A): W;
  unwrap(w: W): A;
}
