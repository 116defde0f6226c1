/**
 * Optional Data Type
 *
 * `Optional<A>` is a function argument that is either explicitly provided
 * (`Present`) or left at its default (`Absent`). Unlike `A | undefined` it
 * nests (`Optional<Optional<A>>` keeps both layers) and every consumer has
 * to handle both cases.
 *
 * @example
 * ```typescript
 * function greet(name: Optional<string>): string {
 *   return match(name, {
 *     Absent: () => "Hello",
 *     Present: (n) => `Hello, ${n}`,
 *   });
 * }
 *
 * greet(present("John")); // "Hello, John"
 * greet(absent());        // "Hello"
 * ```
 *
 * ## Literal arguments
 *
 * TypeScript cannot overload literals, so a function that wants callers to
 * pass bare values takes an `OptionalArg<A>` and normalises it with `lift`:
 *
 * ```typescript
 * function birthday(age?: OptionalArg<number>): string {
 *   return fold("You are one year older!", (n) => `You are ${n} years old!`, lift(age));
 * }
 *
 * birthday(20);        // "You are 20 years old!"
 * birthday();          // "You are one year older!"
 * birthday(absent());  // "You are one year older!"
 * ```
 *
 * For types that are built from literals through a typeclass, `fromText`,
 * `fromInteger` and `fromFraction` are the explicit conversions.
 */

import type { $, TypeClass, TypeFunction } from "../hkt.js";
import type { Alternative } from "../typeclasses/alternative.js";
import { eqStrict, type Eq } from "../typeclasses/eq.js";
import type { IsString } from "../typeclasses/is-string.js";
import type { Fractional, Numeric } from "../typeclasses/numeric.js";
import { showDefault, type Show } from "../typeclasses/show.js";

// ============================================================================
// Optional Type Definition
// ============================================================================

/**
 * Optional data type - either Absent (use the default) or Present (a value)
 */
export type Optional<A> = Absent | Present<A>;

/**
 * Absent variant - the caller did not supply a value
 */
export interface Absent {
  readonly _tag: "Absent";
}

/**
 * Present variant - carries the supplied value
 */
export interface Present<A> {
  readonly _tag: "Present";
  readonly value: A;
}

/**
 * Parameter type for functions that accept a bare value, an `Optional`, or
 * nothing at all. Normalise it with `lift`.
 */
export type OptionalArg<A> = Optional<A> | A | undefined;

// ============================================================================
// Constructors
// ============================================================================

/**
 * The Absent value
 */
export const Absent: Optional<never> = { _tag: "Absent" };

/**
 * Create a Present value
 */
export function Present<A>(value: A): Optional<A> {
  return { _tag: "Present", value };
}

/**
 * Create a Present value (alias)
 */
export function present<A>(value: A): Optional<A> {
  return Present(value);
}

/**
 * The Absent value at a chosen element type
 */
export function absent<A = never>(): Optional<A> {
  return Absent;
}

/**
 * Applicative `pure`: same as `present`
 */
export function pure<A>(value: A): Optional<A> {
  return Present(value);
}

/**
 * Alternative `empty`: same as `absent`
 */
export function empty<A = never>(): Optional<A> {
  return Absent;
}

/**
 * Text literal conversion through an `IsString` instance.
 *
 * @example
 * ```typescript
 * fromText(isStringString)("John"); // Present("John")
 * ```
 */
export function fromText<A>(IS: Pick<IsString<A>, "fromString">): (text: string) => Optional<A> {
  return (text) => Present(IS.fromString(text));
}

/**
 * Integer literal conversion through a `Numeric` instance.
 */
export function fromInteger<A>(
  N: Pick<Numeric<A>, "fromInteger">,
): (n: number | bigint) => Optional<A> {
  return (n) => Present(N.fromInteger(n));
}

/**
 * Fractional literal conversion through a `Fractional` instance.
 * The denominator defaults to 1.
 */
export function fromFraction<A>(
  F: Pick<Fractional<A>, "fromRational">,
): (numerator: number, denominator?: number) => Optional<A> {
  return (numerator, denominator = 1) => Present(F.fromRational(numerator, denominator));
}

// ============================================================================
// Type Guards
// ============================================================================

export function isPresent<A>(v: Optional<A>): v is Present<A> {
  return v._tag === "Present";
}

export function isAbsent<A>(v: Optional<A>): v is Absent {
  return v._tag === "Absent";
}

/**
 * Check whether an arbitrary value is an `Optional`: `{ _tag: "Absent" }`
 * with no other keys, or `{ _tag: "Present", value }` with no other keys.
 */
export function isOptional(u: unknown): u is Optional<unknown> {
  if (typeof u !== "object" || u === null || !("_tag" in u)) return false;
  const keys = Object.keys(u).length;
  if (u._tag === "Absent") return keys === 1;
  if (u._tag === "Present") return keys === 2 && "value" in u;
  return false;
}

function isOptionalArg<A>(arg: OptionalArg<A>): arg is Optional<A> {
  return isOptional(arg);
}

/**
 * Normalise an `OptionalArg`: an `Optional` passes through, `undefined`
 * becomes Absent and any other value becomes Present.
 *
 * A bare value that itself looks like an `Optional` passes through as one;
 * build nested optionals with `present` explicitly.
 */
export function lift<A>(arg: OptionalArg<A>): Optional<A> {
  if (isOptionalArg(arg)) return arg;
  return arg === undefined ? Absent : Present<A>(arg);
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Present value
 */
export function map<A, B>(f: (a: A) => B, v: Optional<A>): Optional<B> {
  return v._tag === "Present" ? Present(f(v.value)) : Absent;
}

/**
 * Sequence a dependent step; Absent short-circuits without calling f
 */
export function bind<A, B>(v: Optional<A>, f: (a: A) => Optional<B>): Optional<B> {
  return v._tag === "Present" ? f(v.value) : Absent;
}

/**
 * Apply a Present function to a Present value; Absent if either is Absent
 */
export function apply<A, B>(vf: Optional<(a: A) => B>, vx: Optional<A>): Optional<B> {
  return vf._tag === "Present" && vx._tag === "Present" ? Present(vf.value(vx.value)) : Absent;
}

/**
 * Combine two values with a binary function; Absent if either is Absent
 */
export function map2<A, B, C>(va: Optional<A>, vb: Optional<B>, f: (a: A, b: B) => C): Optional<C> {
  return apply(
    map((a: A) => (b: B) => f(a, b), va),
    vb,
  );
}

/**
 * The first Present of the two, otherwise `b` (whatever it is)
 */
export function orElse<A>(a: Optional<A>, b: Optional<A>): Optional<A> {
  return a._tag === "Present" ? a : b;
}

/**
 * Case analysis with a handler per variant
 */
export function match<A, B>(
  v: Optional<A>,
  patterns: { readonly Absent: () => B; readonly Present: (a: A) => B },
): B {
  switch (v._tag) {
    case "Absent":
      return patterns.Absent();
    case "Present":
      return patterns.Present(v.value);
  }
}

/**
 * `defaultValue` for Absent, `f(x)` for Present(x)
 */
export function fold<A, B>(defaultValue: B, f: (a: A) => B, v: Optional<A>): B {
  return v._tag === "Present" ? f(v.value) : defaultValue;
}

/**
 * `defaultValue` for Absent, `x` for Present(x)
 */
export function valueOr<A>(defaultValue: A, v: Optional<A>): A {
  return fold(defaultValue, (a: A) => a, v);
}

/**
 * Convert into any type constructor with `pure` and `emptyK`:
 * Absent becomes `F.emptyK()`, Present(x) becomes `F.pure(x)`.
 *
 * @example
 * ```typescript
 * toAlternative(alternativeArray)(present(1)); // [1]
 * toAlternative(alternativeMaybe)(absent());  // undefined
 * ```
 */
export function toAlternative<F extends TypeFunction>(
  F: TypeClass<F> & Pick<Alternative<F>, "pure" | "emptyK">,
): <A>(v: Optional<A>) => $<F, A> {
  return <A>(v: Optional<A>): $<F, A> =>
    v._tag === "Present" ? F.pure<A>(v.value) : F.emptyK<A>();
}

/**
 * `[]` for Absent, `[x]` for Present(x)
 */
export function toArray<A>(v: Optional<A>): A[] {
  return v._tag === "Present" ? [v.value] : [];
}

/**
 * `undefined` for Absent, `x` for Present(x)
 */
export function toMaybe<A>(v: Optional<A>): A | undefined {
  return v._tag === "Present" ? v.value : undefined;
}

/**
 * Structural equality; Present values are compared with `E` (default `===`)
 */
export function equals<A>(x: Optional<A>, y: Optional<A>, E: Eq<A> = eqStrict): boolean {
  if (x._tag === "Present" && y._tag === "Present") return E.eqv(x.value, y.value);
  return x._tag === y._tag;
}

/**
 * `"Absent"` or `"Present(<shown value>)"`
 */
export function show<A>(v: Optional<A>, S: Show<A> = showDefault): string {
  return v._tag === "Present" ? `Present(${S.show(v.value)})` : "Absent";
}
