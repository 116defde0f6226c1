import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  arbInt,
  assertLaws,
  combineLaws,
  defineLaw,
  filterByHint,
  LawViolationError,
  resetLawsConfig,
  setLawsConfig,
  verifyLaw,
  verifyLaws,
} from "../index.js";

const additionCommutes = defineLaw<[number, number]>({
  name: "addition commutes",
  arity: 2,
  proofHint: "commutativity",
  gen: (rng) => [arbInt().arbitrary(rng), arbInt().arbitrary(rng)],
  check: (a, b) => a + b === b + a,
});

const subtractionCommutes = defineLaw<[number, number]>({
  name: "subtraction commutes",
  arity: 2,
  description: "a - b === b - a",
  gen: (rng) => [arbInt(0, 100).arbitrary(rng), arbInt(101, 200).arbitrary(rng)],
  check: (a, b) => a - b === b - a,
});

const additionAssociates = defineLaw<[number, number, number]>({
  name: "addition associates",
  arity: 3,
  proofHint: "associativity",
  gen: (rng) => [
    arbInt().arbitrary(rng),
    arbInt().arbitrary(rng),
    arbInt().arbitrary(rng),
  ],
  check: (a, b, c) => a + b + c === a + (b + c),
});

describe("verifyLaw", () => {
  beforeEach(() => resetLawsConfig());

  it("passes a law that holds for every input", () => {
    expect(verifyLaw(additionCommutes)).toEqual({
      status: "passed",
      law: "addition commutes",
      runs: 100,
    });
  });

  it("honours the configured iteration count", () => {
    setLawsConfig({ iterations: 12 });
    expect(verifyLaw(additionCommutes)).toMatchObject({ runs: 12 });
  });

  it("lets per-call options override the configuration", () => {
    setLawsConfig({ iterations: 12 });
    expect(verifyLaw(additionCommutes, { iterations: 3 })).toMatchObject({ runs: 3 });
  });

  it("reports the first failing run with its seed and inputs", () => {
    const result = verifyLaw(subtractionCommutes, { seed: 40 });
    expect(result.status).toBe("failed");
    if (result.status !== "failed") return;
    // the two ranges never overlap, so the very first run fails
    expect(result.runs).toBe(1);
    expect(result.seed).toBe(40);
    expect(result.description).toBe("a - b === b - a");
    expect(result.counterexample).toHaveLength(2);
  });

  it("replays the same counterexample from the same seed", () => {
    const first = verifyLaw(subtractionCommutes, { seed: 9 });
    const second = verifyLaw(subtractionCommutes, { seed: 9 });
    expect(first).toEqual(second);
  });
});

describe("verifyLaws", () => {
  beforeEach(() => resetLawsConfig());

  it("counts passed and failed laws", () => {
    const summary = verifyLaws([additionCommutes, subtractionCommutes, additionAssociates], {
      iterations: 10,
    });
    expect(summary.total).toBe(3);
    expect(summary.passed).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.results.map((r) => r.status)).toEqual(["passed", "failed", "passed"]);
  });
});

describe("assertLaws", () => {
  beforeEach(() => resetLawsConfig());

  it("returns the summary when every law holds", () => {
    expect(assertLaws([additionCommutes], { iterations: 5 }).passed).toBe(1);
  });

  it("throws LawViolationError naming the failed laws", () => {
    let caught: unknown;
    try {
      assertLaws([additionCommutes, subtractionCommutes], { iterations: 5, seed: 3 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(LawViolationError);
    if (!(caught instanceof LawViolationError)) return;
    expect(caught.name).toBe("LawViolationError");
    expect(caught.failures.map((f) => f.law)).toEqual(["subtraction commutes"]);
    const header =
      "1 law(s) violated:\n  - subtraction commutes (seed 3, run 1): a - b === b - a";
    expect(caught.message.startsWith(header)).toBe(true);
  });
});

describe("verbose logging", () => {
  beforeEach(() => resetLawsConfig());
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs one line per law and a summary", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    verifyLaws([additionCommutes, subtractionCommutes], { iterations: 4, seed: 5, verbose: true });
    expect(spy.mock.calls).toEqual([
      ["[laws] addition commutes: passed (4 runs)"],
      ["[laws] subtraction commutes: FAILED after 1 runs (seed 5)"],
      ["[laws] 1/2 laws passed"],
    ]);
  });

  it("stays silent by default", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    verifyLaws([additionCommutes], { iterations: 4 });
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("law set utilities", () => {
  it("combines and filters by proof hint", () => {
    const all = combineLaws([additionCommutes], [subtractionCommutes, additionAssociates]);
    expect(all.map((l) => l.name)).toEqual([
      "addition commutes",
      "subtraction commutes",
      "addition associates",
    ]);
    expect(filterByHint(all, "associativity").map((l) => l.name)).toEqual([
      "addition associates",
    ]);
  });
});
