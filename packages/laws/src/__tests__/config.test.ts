import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  arbInt,
  defineLaw,
  getLawsConfig,
  LAWS_ENV,
  LawsConfigError,
  loadLawsConfigFromEnv,
  resetLawsConfig,
  setLawsConfig,
  verifyLaw,
  verifyLaws,
} from "../index.js";

const holds = defineLaw<[number]>({
  name: "holds",
  arity: 1,
  gen: (rng) => [arbInt().arbitrary(rng)],
  check: () => true,
});

const neverHolds = defineLaw<[number]>({
  name: "never holds",
  arity: 1,
  gen: (rng) => [arbInt().arbitrary(rng)],
  check: () => false,
});

describe("laws configuration", () => {
  beforeEach(() => resetLawsConfig());

  it("starts from the defaults", () => {
    expect(getLawsConfig()).toEqual({ iterations: 100, seed: 1, verbose: false });
  });

  it("merges partial updates", () => {
    setLawsConfig({ seed: 99 });
    setLawsConfig({ verbose: true });
    expect(getLawsConfig()).toEqual({ iterations: 100, seed: 99, verbose: true });
  });

  it("returns a copy that callers cannot mutate", () => {
    const config = getLawsConfig();
    config.iterations = 1;
    expect(getLawsConfig().iterations).toBe(100);
  });

  it("reads OPTARG_LAWS_* variables", () => {
    const config = loadLawsConfigFromEnv({
      [LAWS_ENV.iterations]: "25",
      [LAWS_ENV.seed]: " -7 ",
      [LAWS_ENV.verbose]: "yes",
    });
    expect(config).toEqual({ iterations: 25, seed: -7, verbose: true });
    expect(getLawsConfig()).toEqual(config);
  });

  it("lets the environment win over programmatic settings", () => {
    setLawsConfig({ iterations: 500, seed: 3 });
    expect(loadLawsConfigFromEnv({ OPTARG_LAWS_SEED: "42" })).toEqual({
      iterations: 500,
      seed: 42,
      verbose: false,
    });
  });

  it("ignores unrelated variables", () => {
    expect(loadLawsConfigFromEnv({ HOME: "/tmp" })).toEqual({
      iterations: 100,
      seed: 1,
      verbose: false,
    });
  });

  it("rejects a non-integer iteration count", () => {
    expect(() => loadLawsConfigFromEnv({ OPTARG_LAWS_ITERATIONS: "ten" })).toThrow(
      'OPTARG_LAWS_ITERATIONS must be an integer, got "ten"',
    );
  });

  it("rejects an iteration count below one", () => {
    expect(() => loadLawsConfigFromEnv({ OPTARG_LAWS_ITERATIONS: "0" })).toThrow(
      "OPTARG_LAWS_ITERATIONS must be at least 1, got 0",
    );
  });

  it("rejects an unknown flag value", () => {
    try {
      loadLawsConfigFromEnv({ OPTARG_LAWS_VERBOSE: "maybe" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LawsConfigError);
      if (!(e instanceof LawsConfigError)) return;
      expect(e.key).toBe("OPTARG_LAWS_VERBOSE");
      expect(e.value).toBe("maybe");
    }
  });

  it("leaves the configuration untouched when parsing fails", () => {
    expect(() =>
      loadLawsConfigFromEnv({ OPTARG_LAWS_SEED: "5", OPTARG_LAWS_VERBOSE: "maybe" }),
    ).toThrow(LawsConfigError);
    expect(getLawsConfig().seed).toBe(1);
  });
});

describe("environment configuration", () => {
  afterEach(() => {
    delete process.env[LAWS_ENV.iterations];
    delete process.env[LAWS_ENV.seed];
    resetLawsConfig();
  });

  it("is read from process.env without an explicit load", () => {
    process.env[LAWS_ENV.iterations] = "7";
    resetLawsConfig();
    expect(verifyLaw(holds)).toMatchObject({ status: "passed", runs: 7 });
  });

  it("stays above later programmatic settings", () => {
    process.env[LAWS_ENV.seed] = "42";
    resetLawsConfig();
    setLawsConfig({ iterations: 500, seed: 3 });
    expect(getLawsConfig()).toEqual({ iterations: 500, seed: 42, verbose: false });
  });

  it("is read again after a reset", () => {
    process.env[LAWS_ENV.iterations] = "7";
    resetLawsConfig();
    expect(getLawsConfig().iterations).toBe(7);
    delete process.env[LAWS_ENV.iterations];
    resetLawsConfig();
    expect(getLawsConfig().iterations).toBe(100);
  });
});

describe("programmatic validation", () => {
  beforeEach(() => resetLawsConfig());

  it("rejects an iteration count below one", () => {
    expect(() => setLawsConfig({ iterations: 0 })).toThrow(
      "iterations must be a positive integer, got 0",
    );
    expect(() => setLawsConfig({ iterations: -5 })).toThrow(LawsConfigError);
    expect(() => setLawsConfig({ iterations: Number.NaN })).toThrow(LawsConfigError);
    expect(getLawsConfig().iterations).toBe(100);
  });

  it("rejects a non-integer seed", () => {
    expect(() => setLawsConfig({ seed: 1.5 })).toThrow("seed must be an integer, got 1.5");
  });

  it("rejects invalid per-call options", () => {
    expect(() => verifyLaw(neverHolds, { iterations: 0 })).toThrow(LawsConfigError);
    expect(() => verifyLaws([neverHolds], { iterations: 2.5 })).toThrow(LawsConfigError);
    expect(() => verifyLaw(neverHolds, { seed: Number.NaN })).toThrow(LawsConfigError);
    expect(verifyLaw(neverHolds, { iterations: 1 }).status).toBe("failed");
  });
});
