import type { LawVerificationResult } from "./types.js";
import { describeValue } from "./describe.js";

/** A law result whose check returned false. */
export type FailedLaw = Extract<LawVerificationResult, { status: "failed" }>;

/** Thrown by `assertLaws` when at least one law fails. */
export class LawViolationError extends Error {
  constructor(readonly failures: readonly FailedLaw[]) {
    super(
      `${failures.length} law(s) violated:\n` +
        failures
          .map(
            (f) =>
              `  - ${f.law} (seed ${f.seed}, run ${f.runs})` +
              (f.description ? `: ${f.description}` : "") +
              `\n    counterexample: ${f.counterexample.map(describeValue).join(", ")}`,
          )
          .join("\n"),
    );
    this.name = "LawViolationError";
  }
}

/** Thrown by `forAll` when the property throws for a generated input. */
export class PropertyFailedError extends Error {
  constructor(
    readonly seed: number,
    readonly iteration: number,
    readonly input: unknown,
    cause: unknown,
  ) {
    super(
      `Property failed after ${iteration} tests (seed ${seed}).\n` +
        `Failing input: ${describeValue(input)}\n` +
        `Error: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "PropertyFailedError";
  }
}

/** Thrown when a configuration value cannot be parsed. */
export class LawsConfigError extends Error {
  constructor(
    readonly key: string,
    readonly value: string,
    message: string,
  ) {
    super(message);
    this.name = "LawsConfigError";
  }
}
