/**
 * Laws Configuration
 *
 * Configuration is resolved from (in priority order):
 *
 * 1. Per-call `VerifyOptions`
 * 2. `OPTARG_LAWS_*` environment variables
 * 3. Programmatic `setLawsConfig()` calls
 * 4. Defaults
 *
 * The environment is read lazily, on the first `getLawsConfig()` or
 * `setLawsConfig()` after startup or `resetLawsConfig()`.
 *
 * @example
 * ```typescript
 * // OPTARG_LAWS_SEED=42 npm test
 * setLawsConfig({ iterations: 500, seed: 3 });
 * getLawsConfig(); // { iterations: 500, seed: 42, verbose: false }
 * ```
 */

import { LawsConfigError } from "./errors.js";
import type { VerifyOptions } from "./types.js";

export interface LawsConfig {
  /** Random input sets per law or property */
  iterations: number;
  /** Seed of the first iteration */
  seed: number;
  /** Log each law result */
  verbose: boolean;
}

/** Environment variables read into the configuration. */
export const LAWS_ENV = {
  iterations: "OPTARG_LAWS_ITERATIONS",
  seed: "OPTARG_LAWS_SEED",
  verbose: "OPTARG_LAWS_VERBOSE",
} as const;

const DEFAULT_CONFIG: LawsConfig = {
  iterations: 100,
  seed: 1,
  verbose: false,
};

let programmatic: Partial<LawsConfig> = {};
let envOverrides: Partial<LawsConfig> = {};
let configLoaded = false;

function initializeConfig(): void {
  if (configLoaded) return;
  envOverrides = parseEnv(process.env);
  configLoaded = true;
}

/**
 * Set configuration values programmatically. Values taken from the
 * environment still win.
 *
 * @throws LawsConfigError on a non-positive or non-integer `iterations`, or a non-integer `seed`
 */
export function setLawsConfig(config: Partial<LawsConfig>): void {
  initializeConfig();
  validate(config);
  programmatic = { ...programmatic, ...config };
}

export function getLawsConfig(): LawsConfig {
  initializeConfig();
  return { ...DEFAULT_CONFIG, ...programmatic, ...envOverrides };
}

/** Drop programmatic settings; the environment is read again on next use. */
export function resetLawsConfig(): void {
  programmatic = {};
  envOverrides = {};
  configLoaded = false;
}

/**
 * Read `OPTARG_LAWS_*` variables from `env` in place of the ones read at
 * startup.
 *
 * @throws LawsConfigError on a value that does not parse
 */
export function loadLawsConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): LawsConfig {
  envOverrides = parseEnv(env);
  configLoaded = true;
  return getLawsConfig();
}

/** Merge per-call options over the current configuration. */
export function resolveOptions(options: VerifyOptions = {}): LawsConfig {
  validate(options);
  const base = getLawsConfig();
  return {
    iterations: options.iterations ?? base.iterations,
    seed: options.seed ?? base.seed,
    verbose: options.verbose ?? base.verbose,
  };
}

function parseEnv(env: Readonly<Record<string, string | undefined>>): Partial<LawsConfig> {
  const overrides: Partial<LawsConfig> = {};

  const iterations = env[LAWS_ENV.iterations];
  if (iterations !== undefined) {
    const n = parseInteger(LAWS_ENV.iterations, iterations);
    if (n < 1) {
      throw new LawsConfigError(
        LAWS_ENV.iterations,
        iterations,
        `${LAWS_ENV.iterations} must be at least 1, got ${n}`,
      );
    }
    overrides.iterations = n;
  }

  const seed = env[LAWS_ENV.seed];
  if (seed !== undefined) {
    overrides.seed = parseInteger(LAWS_ENV.seed, seed);
  }

  const verbose = env[LAWS_ENV.verbose];
  if (verbose !== undefined) {
    overrides.verbose = parseFlag(LAWS_ENV.verbose, verbose);
  }

  return overrides;
}

function validate(config: Partial<Pick<LawsConfig, "iterations" | "seed">>): void {
  const { iterations, seed } = config;
  if (iterations !== undefined && !(Number.isInteger(iterations) && iterations >= 1)) {
    throw new LawsConfigError(
      "iterations",
      String(iterations),
      `iterations must be a positive integer, got ${iterations}`,
    );
  }
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new LawsConfigError("seed", String(seed), `seed must be an integer, got ${seed}`);
  }
}

function parseInteger(key: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new LawsConfigError(key, raw, `${key} must be an integer, got "${raw}"`);
  }
  return Number(trimmed);
}

function parseFlag(key: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "":
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new LawsConfigError(key, raw, `${key} must be a boolean flag, got "${raw}"`);
  }
}
