/**
 * @optarg/laws — algebraic laws as data.
 *
 * Law generators describe what an instance must satisfy; this package draws
 * seeded random inputs and checks them.
 *
 * @example
 * ```typescript
 * import { assertLaws, arbInt } from "@optarg/laws";
 * import { monoidLaws, fallbackMonoid, eqOptional, eqStrict, arbOptional } from "@optarg/optional";
 *
 * const eq = eqOptional<number>(eqStrict);
 * assertLaws(monoidLaws(fallbackMonoid<number>(), eq, arbOptional(arbInt())));
 * ```
 *
 * @packageDocumentation
 */

export type {
  ProofHint,
  Law,
  LawSet,
  VerifyOptions,
  LawVerificationResult,
  VerificationSummary,
} from "./types.js";
export { defineLaw, combineLaws, filterByHint } from "./types.js";

export type { Rng } from "./rng.js";
export { createRng } from "./rng.js";

export type { Arbitrary } from "./arbitrary.js";
export {
  arbInt,
  arbString,
  arbBoolean,
  arbConstant,
  arbElement,
  arbOneOf,
  arbFrequency,
  arbMap,
} from "./arbitrary.js";

export type { LawsConfig } from "./config.js";
export {
  LAWS_ENV,
  getLawsConfig,
  setLawsConfig,
  resetLawsConfig,
  loadLawsConfigFromEnv,
} from "./config.js";

export { LawViolationError, PropertyFailedError, LawsConfigError } from "./errors.js";
export type { FailedLaw } from "./errors.js";

export { describeValue } from "./describe.js";
export { forAll } from "./for-all.js";
export { verifyLaw, verifyLaws, assertLaws } from "./verify.js";
