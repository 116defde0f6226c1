import { describe, it, expect } from "vitest";
import { Absent, absent, present, type Optional } from "../data/optional.js";
import {
  alternativeArray,
  alternativeOptional,
  applicativeOptional,
  fallbackMonoid,
  foldableOptional,
  functorOptional,
  liftedMonoid,
  monadOptional,
  monadPlusOptional,
  traverseOptional,
} from "../instances.js";
import { combineAllK } from "./alternative.js";
import { map2, tuple2 } from "./applicative.js";
import { eqArray, eqStrict } from "./eq.js";
import { foldMap, size } from "./foldable.js";
import { lift } from "./functor.js";
import { flatten } from "./monad.js";
import { combineAll, monoidProduct, monoidString, monoidSum } from "./semigroup.js";
import { showDefault, showString } from "./show.js";
import { sequence } from "./traverse.js";

describe("derived operations", () => {
  it("lift turns a function into one on Optional", () => {
    const inc = lift(functorOptional)((n: number) => n + 1);
    expect(inc(present(1))).toEqual(present(2));
    expect(inc(absent())).toBe(Absent);
  });

  it("map2 and tuple2 combine two values", () => {
    const product = map2(applicativeOptional)<number, number, number>;
    expect(product(present(2), present(3), (a, b) => a * b)).toEqual(present(6));
    expect(tuple2(applicativeOptional)<number, string>(present(1), present("a"))).toEqual(
      present([1, "a"]),
    );
    expect(tuple2(applicativeOptional)<number, string>(present(1), absent())).toBe(Absent);
  });

  it("flatten removes one layer", () => {
    expect(flatten(monadOptional)<number>(present(present(1)))).toEqual(present(1));
    expect(flatten(monadOptional)<number>(present(absent()))).toBe(Absent);
    expect(flatten(monadOptional)<number>(absent())).toBe(Absent);
  });

  it("combineAllK keeps the first Present", () => {
    expect(combineAllK(alternativeOptional)<number>([absent(), present(1), present(2)])).toEqual(
      present(1),
    );
    expect(combineAllK(alternativeOptional)<number>([])).toBe(Absent);
    expect(combineAllK(alternativeArray)<number>([[1], [], [2, 3]])).toEqual([1, 2, 3]);
  });

  it("mzero and mplus are emptyK and combineK", () => {
    expect(monadPlusOptional.mzero<number>()).toBe(Absent);
    expect(monadPlusOptional.mplus<number>(absent(), present(4))).toEqual(present(4));
  });

  it("foldMap and size fold over zero or one element", () => {
    expect(foldMap(foldableOptional)(monoidSum)<number>(present(3), (n) => n * 2)).toBe(6);
    expect(foldMap(foldableOptional)(monoidString)<number>(absent(), (n) => `${n}`)).toBe("");
    expect(size(foldableOptional)<number>(present(1))).toBe(1);
    expect(size(foldableOptional)<number>(absent())).toBe(0);
  });

  it("traverse runs the effect on the Present value", () => {
    const positive = (n: number): Optional<number> => (n > 0 ? present(n) : absent());
    const traverse = traverseOptional.traverse(applicativeOptional)<number, number>;
    expect(traverse(present(4), positive)).toEqual(present(present(4)));
    expect(traverse(present(-4), positive)).toBe(Absent);
    expect(traverse(absent(), positive)).toEqual(present(Absent));
  });

  it("sequence swaps Optional and array", () => {
    const seq = sequence(traverseOptional)(alternativeArray)<number>;
    expect(seq(present([1, 2]))).toEqual([present(1), present(2)]);
    expect(seq(present([]))).toEqual([]);
    expect(seq(absent())).toEqual([Absent]);
  });

  it("combineAll folds with either monoid", () => {
    expect(combineAll(liftedMonoid(monoidSum))([present(1), present(2)])).toEqual(present(3));
    expect(combineAll(liftedMonoid(monoidSum))([present(1), absent()])).toBe(Absent);
    expect(combineAll(fallbackMonoid<number>())([absent(), present(7)])).toEqual(present(7));
    expect(combineAll(fallbackMonoid<number>())([])).toBe(Absent);
    expect(combineAll(monoidProduct)([2, 3])).toBe(6);
  });
});

describe("Eq and Show", () => {
  it("eqArray compares element-wise", () => {
    const E = eqArray(eqStrict);
    expect(E.eqv([1, 2], [1, 2])).toBe(true);
    expect(E.eqv([1, 2], [1])).toBe(false);
  });

  it("showString quotes, showDefault quotes strings only", () => {
    expect(showString.show('a"b')).toBe('"a\\"b"');
    expect(showDefault.show("a")).toBe('"a"');
    expect(showDefault.show(1.5)).toBe("1.5");
    expect(showDefault.show(3n)).toBe("3n");
  });
});
