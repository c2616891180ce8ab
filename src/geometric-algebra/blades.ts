import { fail } from "../utils";
import { AlgebraError } from "./errors";
import type { Signature } from "./Signature";

/**
 * A basis blade, represented by the strictly increasing list of its
 * basis-vector indices.  The empty list is the scalar unit.
 * The grade of the blade is the length of the list.
 */
export type Blade = readonly number[];

/**
 * A canonicalized product of basis vectors.
 * A product that vanishes is represented by `null` instead.
 */
export type CanonicalBlade = {
  sign: 1 | -1,
  blade: Blade,
};

export const bladeKey = (blade: Blade) => blade.join(",");

/** Order blades by grade, then lexicographically. */
export function compareBlades(a: Blade, b: Blade): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

export const isPositiveInteger = (index: number) =>
  Number.isSafeInteger(index) && index > 0;

export function isCanonical(blade: Blade): boolean {
  return blade.every((index, i) =>
    isPositiveInteger(index) && (i === 0 || blade[i - 1] < index)
  );
}

/**
 * Reduce the geometric product `e<i1> e<i2> ... e<ik>` of basis vectors
 * to a signed canonical blade.
 *
 * The indices are sorted by adjacent transpositions.  Swapping two
 * different basis vectors flips the sign; equal neighbors are never swapped.
 * Then each run of `k` equal indices `v` is reduced using `e<v>^2`:
 * - For `v <= p` the square is 1.
 * - For `p < v <= n` the square is -1, so the sign flips `floor(k/2)` times.
 * - For `v > n` the square is 0, so the entire product vanishes if `k >= 2`.
 *
 * A single copy of `v` survives iff `k` is odd.
 */
export function canonicalizeBlade(
  signature: Signature,
  indices: readonly number[],
): CanonicalBlade | null {
  for (const index of indices) {
    if (!isPositiveInteger(index)) {
      fail(`basis-vector index must be a positive integer, got ${index}`, AlgebraError);
    }
  }

  const sorted = [...indices];
  let flips = 0;
  for (let end = sorted.length - 1; end > 0; end--) {
    let swapped = false;
    for (let i = 0; i < end; i++) {
      const left = sorted[i], right = sorted[i + 1];
      if (left > right) {
        sorted[i] = right;
        sorted[i + 1] = left;
        flips++;
        swapped = true;
      }
    }
    if (!swapped) break;
  }

  const blade: number[] = [];
  for (let start = 0; start < sorted.length;) {
    const index = sorted[start];
    let end = start + 1;
    while (end < sorted.length && sorted[end] === index) end++;
    const multiplicity = end - start;
    if (multiplicity >= 2) {
      const square = signature.square(index);
      if (square === 0) return null;
      if (square < 0) flips += multiplicity >> 1;
    }
    if (multiplicity & 1) blade.push(index);
    start = end;
  }

  return {sign: flips & 1 ? -1 : 1, blade};
}

/** Sign flips (modulo 2) when reversing a blade of the given grade */
export const reverseFlips = (grade: number) => (grade >> 1) & 1;

/** Sign flips (modulo 2) of the grade involution for the given grade */
export const gradeInvolutionFlips = (grade: number) => grade & 1;
