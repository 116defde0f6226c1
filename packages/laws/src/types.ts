/**
 * Law Definition Types
 *
 * A law is a predicate that must hold for every lawful instance of an
 * abstraction, bundled with the generator that draws its inputs. Laws are
 * plain data: law generators return arrays of them, and the verifier in
 * `./verify.ts` runs them against seeded random inputs.
 *
 * @example
 * ```typescript
 * import { defineLaw, arbInt } from "@optarg/laws";
 *
 * const commutativity = defineLaw<[number, number]>({
 *   name: "commutativity",
 *   arity: 2,
 *   proofHint: "commutativity",
 *   gen: (rng) => [arbInt().arbitrary(rng), arbInt().arbitrary(rng)],
 *   check: (a, b) => a + b === b + a,
 * });
 * ```
 *
 * @module
 */

import type { Rng } from "./rng.js";

// ============================================================================
// Proof Hints
// ============================================================================

/**
 * Names the algebraic shape of a law. Used to group and filter laws.
 */
export type ProofHint =
  | "identity-left"
  | "identity-right"
  | "associativity"
  | "commutativity"
  | "reflexivity"
  | "symmetry"
  | "transitivity"
  | "homomorphism"
  | "interchange"
  | "composition"
  | "distributivity"
  | "absorption";

// ============================================================================
// Core Law Type
// ============================================================================

/**
 * A law definition.
 *
 * `gen` and `check` are declared as methods so that a `Law<[X, Y]>` can be
 * stored in a `LawSet` next to laws of other shapes.
 *
 * @template Args - Tuple type of the law's input arguments
 */
export interface Law<Args extends readonly unknown[] = readonly unknown[]> {
  /**
   * Human-readable name of the law.
   * @example "associativity", "left identity", "functor composition"
   */
  readonly name: string;

  /** Number of inputs `gen` draws. */
  readonly arity: number;

  /** Shown in failure messages. */
  readonly description?: string;

  readonly proofHint?: ProofHint;

  /** Draw one set of inputs. */
  gen(rng: Rng): Args;

  /** Returns true if the law holds for the given inputs. */
  check(...args: Args): boolean;
}

/**
 * A collection of laws, as returned by law generators like `monoidLaws`.
 */
export type LawSet = readonly Law[];

// ============================================================================
// Verification Options and Results
// ============================================================================

/**
 * Per-call overrides for the global laws configuration.
 */
export interface VerifyOptions {
  /** Number of random input sets per law. */
  readonly iterations?: number;
  /** Seed for the first iteration; later iterations use `seed + i`. */
  readonly seed?: number;
  /** Log one line per law through the `[laws]` logger. */
  readonly verbose?: boolean;
}

/**
 * Result of running a single law.
 */
export type LawVerificationResult =
  | {
      readonly status: "passed";
      readonly law: string;
      readonly runs: number;
    }
  | {
      readonly status: "failed";
      readonly law: string;
      readonly runs: number;
      readonly seed: number;
      readonly description?: string;
      readonly counterexample: readonly unknown[];
    };

/**
 * Summary of verification for a set of laws.
 */
export interface VerificationSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly results: readonly LawVerificationResult[];
}

// ============================================================================
// Law Builder Utilities
// ============================================================================

/**
 * Create a law with its argument tuple checked against `gen` and `check`.
 */
export function defineLaw<Args extends readonly unknown[]>(law: Law<Args>): Law<Args> {
  return law;
}

/**
 * Combine multiple law sets into one.
 *
 * @example
 * ```typescript
 * const allLaws = combineLaws(semigroupLaws(S, E, arb), identityLaws);
 * ```
 */
export function combineLaws(...lawSets: LawSet[]): LawSet {
  return lawSets.flat();
}

/**
 * Keep only the laws carrying the given proof hint.
 */
export function filterByHint(laws: LawSet, hint: ProofHint): LawSet {
  return laws.filter((law) => law.proofHint === hint);
}
