/**
 * @optarg/optional Showcase
 *
 * Functions with optional arguments, written against `Optional<A>`:
 * callers pass a value, a literal, or nothing, and the function decides
 * what the default means.
 *
 * Run:   npx tsx examples/showcase.ts
 */

import { arbInt, assertLaws } from "@optarg/laws";
import {
  absent,
  alternativeArray,
  applicativeOptional,
  arbOptional,
  deriveIsString,
  deriveNumeric,
  eqOptional,
  eqStrict,
  fallbackMonoid,
  fold,
  fromInteger,
  fromText,
  isStringString,
  lift,
  liftedMonoid,
  match,
  monoidLaws,
  monoidSum,
  numericNumber,
  numericOptional,
  present,
  show,
  toAlternative,
  tuple2,
  valueOr,
  type Iso,
  type Optional,
  type OptionalArg,
} from "../src/index.js";

// ============================================================================
// 1. WRAPPER TYPES - Name and Age accept literals through their instances
// ============================================================================

interface Name {
  readonly getName: string;
}

interface Age {
  readonly years: number;
}

const isStringName = deriveIsString(isStringString, (getName: string): Name => ({ getName }));

const ageIso: Iso<Age, number> = {
  wrap: (years) => ({ years }),
  unwrap: (age) => age.years,
};
const numericAge = deriveNumeric(numericNumber, ageIso);

const name = fromText(isStringName);
const age = fromInteger(numericAge);

// ============================================================================
// 2. FUNCTIONS WITH OPTIONAL ARGUMENTS
// ============================================================================

function greet(who: Optional<Name>): string {
  return match(who, {
    Absent: () => "Hello",
    Present: (n) => `Hello, ${n.getName}`,
  });
}

function birthday(years?: OptionalArg<Age>): string {
  return fold(
    "You are one year older!",
    (a: Age) => `You are ${a.years} years old!`,
    lift(years),
  );
}

console.log(greet(name("John"))); // Hello, John
console.log(greet(absent())); // Hello
console.log(birthday(age(20))); // You are 20 years old!
console.log(birthday({ years: 30 })); // You are 30 years old!
console.log(birthday()); // You are one year older!

// ============================================================================
// 3. ARITHMETIC - Absent propagates
// ============================================================================

const N = numericOptional(numericNumber);
console.log(show(N.add(present(20), absent()))); // Absent
console.log(show(N.add(present(20), present(1)))); // Present(21)
console.log(valueOr(18, absent())); // 18

// ============================================================================
// 4. CONVERSIONS AND COMBINATORS
// ============================================================================

console.log(toAlternative(alternativeArray)(present("x"))); // [ 'x' ]
const pair = tuple2(applicativeOptional)<number, string>(present(1), present("a"));
console.log(show(pair, { show: ([n, s]) => `[${n}, ${JSON.stringify(s)}]` })); // Present([1, "a"])

// Two monoids, chosen by name
const settings = [absent<number>(), present(8080), present(3000)];
console.log(show(settings.reduce(fallbackMonoid<number>().combine))); // Present(8080)
console.log(show(settings.slice(1).reduce(liftedMonoid(monoidSum).combine))); // Present(11080)

// ============================================================================
// 5. LAWS - the fallback monoid is lawful
// ============================================================================

const summary = assertLaws(
  monoidLaws(fallbackMonoid<number>(), eqOptional<number>(eqStrict), arbOptional(arbInt())),
);
console.log(`${summary.passed}/${summary.total} monoid laws passed`);
