/**
 * Numeric and Fractional Typeclasses
 *
 * Numeric: types supporting ring arithmetic plus negate/abs/signum and
 * construction from an integer literal.
 * Fractional: Numeric types that also support real division and
 * construction from a rational literal.
 *
 * TypeScript has no operator overloading, so arithmetic on a type with an
 * instance is written through the dictionary:
 *
 * ```typescript
 * numericNumber.add(2, 3); // 5
 * ```
 */

import type { Iso } from "./iso.js";

// ============================================================================
// Numeric
// ============================================================================

export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  /** Integer literal conversion. Fractional parts of a `number` are truncated. */
  fromInteger(n: number | bigint): A;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  abs: (a) => Math.abs(a),
  signum: (a) => Math.sign(a),
  fromInteger: (n) => (typeof n === "bigint" ? Number(n) : Math.trunc(n)),
  zero: () => 0,
  one: () => 1,
};

export const numericBigInt: Numeric<bigint> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  abs: (a) => (a < 0n ? -a : a),
  signum: (a) => (a < 0n ? -1n : a > 0n ? 1n : 0n),
  fromInteger: (n) => (typeof n === "bigint" ? n : BigInt(Math.trunc(n))),
  zero: () => 0n,
  one: () => 1n,
};

// ============================================================================
// Fractional
// ============================================================================

export interface Fractional<A> extends Numeric<A> {
  div(a: A, b: A): A;
  recip(a: A): A;
  /** Rational literal conversion: numerator / denominator. */
  fromRational(numerator: number, denominator: number): A;
}

export const fractionalNumber: Fractional<number> = {
  ...numericNumber,
  div: (a, b) => a / b,
  recip: (a) => 1 / a,
  fromRational: (numerator, denominator) => numerator / denominator,
};

// ============================================================================
// Newtype derivation
// ============================================================================

/**
 * Build a `Numeric` for a wrapper type by unwrapping, operating on the
 * wrapped type and wrapping again.
 */
export function deriveNumeric<W, A>(N: Numeric<A>, iso: Iso<W, A>): Numeric<W> {
  const wrap = (a: A): W => iso.wrap(a);
  const unwrap = (w: W): A => iso.unwrap(w);
  return {
    add: (a, b) => wrap(N.add(unwrap(a), unwrap(b))),
    sub: (a, b) => wrap(N.sub(unwrap(a), unwrap(b))),
    mul: (a, b) => wrap(N.mul(unwrap(a), unwrap(b))),
    negate: (a) => wrap(N.negate(unwrap(a))),
    abs: (a) => wrap(N.abs(unwrap(a))),
    signum: (a) => wrap(N.signum(unwrap(a))),
    fromInteger: (n) => wrap(N.fromInteger(n)),
    zero: () => wrap(N.zero()),
    one: () => wrap(N.one()),
  };
}

/**
 * Build a `Fractional` for a wrapper type from the wrapped type's instance.
 */
export function deriveFractional<W, A>(F: Fractional<A>, iso: Iso<W, A>): Fractional<W> {
  const wrap = (a: A): W => iso.wrap(a);
  const unwrap = (w: W): A => iso.unwrap(w);
  return {
    ...deriveNumeric(F, iso),
    div: (a, b) => wrap(F.div(unwrap(a), unwrap(b))),
    recip: (a) => wrap(F.recip(unwrap(a))),
    fromRational: (numerator, denominator) => wrap(F.fromRational(numerator, denominator)),
  };
}
