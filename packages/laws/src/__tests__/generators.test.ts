import { beforeEach, describe, expect, it } from "vitest";
import {
  arbConstant,
  arbElement,
  arbFrequency,
  arbInt,
  arbMap,
  arbOneOf,
  arbString,
  createRng,
  describeValue,
  forAll,
  PropertyFailedError,
  resetLawsConfig,
} from "../index.js";

describe("createRng", () => {
  it("is deterministic for a seed", () => {
    const a = createRng(17);
    const b = createRng(17);
    const xs = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(xs);
  });

  it("produces different sequences for different seeds", () => {
    expect(createRng(1).next()).not.toBe(createRng(2).next());
  });

  it("keeps nextInt within its inclusive bounds", () => {
    const rng = createRng(5);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const n = rng.nextInt(-2, 2);
      expect(n).toBeGreaterThanOrEqual(-2);
      expect(n).toBeLessThanOrEqual(2);
      seen.add(n);
    }
    expect([...seen].sort((x, y) => x - y)).toEqual([-2, -1, 0, 1, 2]);
  });

  it("refuses to pick from an empty list", () => {
    expect(() => createRng(1).pick([])).toThrow(RangeError);
  });
});

describe("arbitraries", () => {
  beforeEach(() => resetLawsConfig());

  it("arbString respects length and alphabet", () => {
    forAll(arbString(4, "xy"), (s) => {
      expect(s.length).toBeLessThanOrEqual(4);
      expect(/^[xy]*$/.test(s)).toBe(true);
    });
  });

  it("arbElement and arbOneOf draw from their inputs", () => {
    forAll(arbOneOf(arbElement(["a", "b"]), arbConstant("c")), (s) => {
      expect(["a", "b", "c"]).toContain(s);
    });
  });

  it("arbFrequency never picks a zero-weight generator", () => {
    forAll(arbFrequency([0, arbConstant("never")], [1, arbConstant("always")]), (s) => {
      expect(s).toBe("always");
    });
  });

  it("arbFrequency needs a positive total weight", () => {
    expect(() => arbFrequency<number>()).toThrow(RangeError);
  });

  it("arbMap transforms generated values", () => {
    forAll(arbMap(arbInt(0, 10), (n) => n * 2), (n) => {
      expect(n % 2).toBe(0);
    });
  });
});

describe("forAll", () => {
  beforeEach(() => resetLawsConfig());

  it("runs the configured number of iterations", () => {
    let runs = 0;
    forAll(arbInt(), () => {
      runs++;
    });
    expect(runs).toBe(100);
  });

  it("accepts an explicit count", () => {
    let runs = 0;
    forAll(arbInt(), 7, () => {
      runs++;
    });
    expect(runs).toBe(7);
  });

  it("wraps the first failure with its seed and input", () => {
    const run = () =>
      forAll(arbConstant(5), () => {
        throw new Error("boom");
      });
    expect(run).toThrow(PropertyFailedError);
    expect(run).toThrow("Property failed after 1 tests (seed 1).\nFailing input: 5\nError: boom");
  });
});

describe("describeValue", () => {
  it("renders inputs for failure messages", () => {
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue(3n)).toBe("3n");
    expect(describeValue("hi")).toBe('"hi"');
    expect(describeValue({ _tag: "Present", value: 2 })).toBe('{"_tag":"Present","value":2}');
    function double(n: number): number {
      return n * 2;
    }
    expect(describeValue(double)).toBe("<function double>");
  });
});
