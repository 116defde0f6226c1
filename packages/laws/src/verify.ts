/**
 * Law Verification Engine
 *
 * Runs laws against seeded random inputs. A law passes when its check holds
 * for every iteration; the first failing iteration is reported with the
 * seed and the inputs that broke it.
 *
 * @module
 */

import { resolveOptions } from "./config.js";
import { LawViolationError, type FailedLaw } from "./errors.js";
import { log } from "./logger.js";
import { createRng } from "./rng.js";
import type {
  Law,
  LawSet,
  LawVerificationResult,
  VerificationSummary,
  VerifyOptions,
} from "./types.js";

/**
 * Verify a single law.
 */
export function verifyLaw(law: Law, options?: VerifyOptions): LawVerificationResult {
  const { iterations, seed, verbose } = resolveOptions(options);

  for (let i = 0; i < iterations; i++) {
    const runSeed = seed + i;
    const args = law.gen(createRng(runSeed));
    if (!law.check(...args)) {
      if (verbose) log(`${law.name}: FAILED after ${i + 1} runs (seed ${runSeed})`);
      return {
        status: "failed",
        law: law.name,
        runs: i + 1,
        seed: runSeed,
        description: law.description,
        counterexample: args,
      };
    }
  }

  if (verbose) log(`${law.name}: passed (${iterations} runs)`);
  return { status: "passed", law: law.name, runs: iterations };
}

/**
 * Verify a set of laws.
 */
export function verifyLaws(laws: LawSet, options?: VerifyOptions): VerificationSummary {
  const results = laws.map((law) => verifyLaw(law, options));
  const failed = results.filter(isFailed).length;

  if (resolveOptions(options).verbose) {
    log(`${results.length - failed}/${results.length} laws passed`);
  }

  return {
    total: results.length,
    passed: results.length - failed,
    failed,
    results,
  };
}

/**
 * Verify a set of laws and throw if any fails.
 *
 * @throws LawViolationError listing every failed law
 */
export function assertLaws(laws: LawSet, options?: VerifyOptions): VerificationSummary {
  const summary = verifyLaws(laws, options);
  const failures = summary.results.filter(isFailed);
  if (failures.length > 0) {
    throw new LawViolationError(failures);
  }
  return summary;
}

function isFailed(result: LawVerificationResult): result is FailedLaw {
  return result.status === "failed";
}
