/**
 * Higher-Kinded Types for @optarg/optional
 *
 * Typeclasses like `Functor<F>` need to talk about "F applied to A" for a
 * type constructor F. TypeScript has no `F<_>` parameters, so a type
 * constructor is encoded as an interface (a type-level function) whose `_`
 * member mentions `this["__kind__"]`. Applying it means intersecting it
 * with a concrete `__kind__` and reading `_` back:
 *
 * ```typescript
 * interface OptionalF extends TypeFunction {
 *   readonly _: Optional<this["__kind__"]>;
 * }
 *
 * type X = Kind<OptionalF, number>; // → Optional<number>
 * ```
 *
 * The encoding exists only at the type level.
 */

import type { Optional } from "./data/optional.js";

// ============================================================================
// Core HKT Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * The type function F applied to A.
 */
export type Kind<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Alias for `Kind<F, A>`.
 */
export type $<F extends TypeFunction, A> = Kind<F, A>;

/**
 * Base of every typeclass over a type constructor.
 *
 * `$<OptionalF, A>` resolves to `Optional<A>` as soon as F is known, which
 * leaves nothing to infer F from. The phantom `_F` member carries F so that
 * `tuple2(applicativeOptional)` infers `F = OptionalF`. It is never set.
 */
export interface TypeClass<F extends TypeFunction> {
  readonly _F?: F;
}

// ============================================================================
// Type-Level Functions
// ============================================================================

/**
 * Type-level function for `Optional<A>`.
 *
 * @example
 * ```typescript
 * type MaybeName = Kind<OptionalF, string>; // → Optional<string>
 * ```
 */
export interface OptionalF extends TypeFunction {
  readonly _: Optional<this["__kind__"]>;
}

/**
 * Type-level function for `Array<A>`.
 */
export interface ArrayF extends TypeFunction {
  readonly _: Array<this["__kind__"]>;
}

/**
 * `A | undefined` — the optional value TypeScript itself uses for `?:`
 * properties and parameters.
 */
export type Maybe<A> = A | undefined;

/**
 * Type-level function for `Maybe<A>`.
 */
export interface MaybeF extends TypeFunction {
  readonly _: Maybe<this["__kind__"]>;
}
