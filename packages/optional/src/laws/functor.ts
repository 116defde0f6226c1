/**
 * Functor, Applicative and Monad laws for a type constructor F.
 *
 * The functions drawn for the laws are endomorphisms (`A => A`) so one
 * `Eq<F<A>>` covers every comparison.
 */

import { combineLaws, defineLaw, type Arbitrary, type LawSet } from "@optarg/laws";
import type { $, TypeFunction } from "../hkt.js";
import type { Applicative } from "../typeclasses/applicative.js";
import type { Eq } from "../typeclasses/eq.js";
import type { Functor } from "../typeclasses/functor.js";
import type { Monad } from "../typeclasses/monad.js";

export type Endo<A> = (a: A) => A;

export interface FunctorArbs<F extends TypeFunction, A> {
  readonly fa: Arbitrary<$<F, A>>;
  readonly f: Arbitrary<Endo<A>>;
}

export interface ApplicativeArbs<F extends TypeFunction, A> extends FunctorArbs<F, A> {
  readonly a: Arbitrary<A>;
  /** Functions already inside F. */
  readonly ff: Arbitrary<$<F, Endo<A>>>;
}

export interface MonadArbs<F extends TypeFunction, A> {
  readonly fa: Arbitrary<$<F, A>>;
  readonly a: Arbitrary<A>;
  /** Kleisli arrows `A => F<A>`. */
  readonly k: Arbitrary<(a: A) => $<F, A>>;
}

export function functorLaws<F extends TypeFunction, A>(
  F: Functor<F>,
  E: Eq<$<F, A>>,
  arbs: FunctorArbs<F, A>,
): LawSet {
  return [
    defineLaw<[$<F, A>]>({
      name: "functor identity",
      arity: 1,
      proofHint: "identity-left",
      description: "map(fa, a => a) === fa",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (fa) => E.eqv(F.map<A, A>(fa, (a) => a), fa),
    }),
    defineLaw<[$<F, A>, Endo<A>, Endo<A>]>({
      name: "functor composition",
      arity: 3,
      proofHint: "composition",
      description: "map(map(fa, f), g) === map(fa, a => g(f(a)))",
      gen: (rng) => [arbs.fa.arbitrary(rng), arbs.f.arbitrary(rng), arbs.f.arbitrary(rng)],
      check: (fa, f, g) =>
        E.eqv(
          F.map<A, A>(F.map<A, A>(fa, f), g),
          F.map<A, A>(fa, (a) => g(f(a))),
        ),
    }),
  ];
}

export function applicativeLaws<F extends TypeFunction, A>(
  F: Applicative<F>,
  E: Eq<$<F, A>>,
  arbs: ApplicativeArbs<F, A>,
): LawSet {
  return combineLaws(functorLaws(F, E, arbs), [
    defineLaw<[$<F, A>]>({
      name: "applicative identity",
      arity: 1,
      proofHint: "identity-left",
      description: "ap(pure(id), fa) === fa",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (fa) => E.eqv(F.ap<A, A>(F.pure<Endo<A>>((a) => a), fa), fa),
    }),
    defineLaw<[Endo<A>, A]>({
      name: "applicative homomorphism",
      arity: 2,
      proofHint: "homomorphism",
      description: "ap(pure(f), pure(a)) === pure(f(a))",
      gen: (rng) => [arbs.f.arbitrary(rng), arbs.a.arbitrary(rng)],
      check: (f, a) => E.eqv(F.ap<A, A>(F.pure(f), F.pure(a)), F.pure(f(a))),
    }),
    defineLaw<[$<F, Endo<A>>, A]>({
      name: "applicative interchange",
      arity: 2,
      proofHint: "interchange",
      description: "ap(u, pure(y)) === ap(pure(f => f(y)), u)",
      gen: (rng) => [arbs.ff.arbitrary(rng), arbs.a.arbitrary(rng)],
      check: (u, y) =>
        E.eqv(
          F.ap<A, A>(u, F.pure(y)),
          F.ap<Endo<A>, A>(F.pure((g: Endo<A>) => g(y)), u),
        ),
    }),
    defineLaw<[$<F, Endo<A>>, $<F, Endo<A>>, $<F, A>]>({
      name: "applicative composition",
      arity: 3,
      proofHint: "composition",
      description: "ap(ap(map(u, compose), v), w) === ap(u, ap(v, w))",
      gen: (rng) => [arbs.ff.arbitrary(rng), arbs.ff.arbitrary(rng), arbs.fa.arbitrary(rng)],
      check: (u, v, w) => {
        const compose = (f: Endo<A>) => (g: Endo<A>) => (a: A) => f(g(a));
        const composed = F.ap<Endo<A>, Endo<A>>(
          F.map<Endo<A>, (g: Endo<A>) => Endo<A>>(u, compose),
          v,
        );
        return E.eqv(F.ap<A, A>(composed, w), F.ap<A, A>(u, F.ap<A, A>(v, w)));
      },
    }),
  ]);
}

export function monadLaws<F extends TypeFunction, A>(
  F: Monad<F>,
  E: Eq<$<F, A>>,
  arbs: MonadArbs<F, A>,
): LawSet {
  return [
    defineLaw<[A, (a: A) => $<F, A>]>({
      name: "monad left identity",
      arity: 2,
      proofHint: "identity-left",
      description: "flatMap(pure(a), k) === k(a)",
      gen: (rng) => [arbs.a.arbitrary(rng), arbs.k.arbitrary(rng)],
      check: (a, k) => E.eqv(F.flatMap<A, A>(F.pure(a), k), k(a)),
    }),
    defineLaw<[$<F, A>]>({
      name: "monad right identity",
      arity: 1,
      proofHint: "identity-right",
      description: "flatMap(fa, pure) === fa",
      gen: (rng) => [arbs.fa.arbitrary(rng)],
      check: (fa) => E.eqv(F.flatMap<A, A>(fa, (a) => F.pure(a)), fa),
    }),
    defineLaw<[$<F, A>, (a: A) => $<F, A>, (a: A) => $<F, A>]>({
      name: "monad associativity",
      arity: 3,
      proofHint: "associativity",
      description: "flatMap(flatMap(fa, f), g) === flatMap(fa, a => flatMap(f(a), g))",
      gen: (rng) => [arbs.fa.arbitrary(rng), arbs.k.arbitrary(rng), arbs.k.arbitrary(rng)],
      check: (fa, f, g) =>
        E.eqv(
          F.flatMap<A, A>(F.flatMap<A, A>(fa, f), g),
          F.flatMap<A, A>(fa, (a) => F.flatMap<A, A>(f(a), g)),
        ),
    }),
  ];
}
