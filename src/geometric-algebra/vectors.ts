import { fail } from "../utils";
import type { Multivector, Scalar } from "./Algebra";
import { AlgebraError } from "./errors";

/** The highest basis-vector index occurring in `mv` (0 for scalars) */
export const dimensions = <T>(mv: Multivector<T>): number =>
  Math.max(0, ...[...mv.basisBlades()].flat());

/**
 * The coefficients of `e1 ... en` in a 1-vector.
 *
 * By default `n` is the highest index occurring in `mv`.
 */
export function toVector<T>(mv: Multivector<T>, n = dimensions(mv)): Scalar<T>[] {
  if (mv.grades().some(grade => grade !== 1)) {
    fail(`toVector: not a 1-vector: ${mv}`, AlgebraError);
  }
  return Array.from({length: n}, (_, i) => mv.value([i + 1]));
}
