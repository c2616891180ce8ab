import { fail } from "../utils";
import { SignatureError } from "./errors";

/**
 * The signature `(p, q)` of a Clifford algebra.
 *
 * Basis vectors `e1 ... ep` square to +1, `e(p+1) ... e(p+q)` square to -1.
 * Basis vectors beyond `n = p + q` may appear in blades, but square to 0.
 */
export class Signature {
  /** Dimensionality of the algebra's vector space */
  readonly n: number;

  constructor(
    /** Number of basis vectors squaring to +1 */
    readonly p: number,
    /** Number of basis vectors squaring to -1 */
    readonly q: number,
  ) {
    for (const [name, value] of [["p", p], ["q", q]] as const) {
      if (!Number.isSafeInteger(value) || value < 0) {
        fail(`signature ${name} must be a non-negative integer, got ${value}`, SignatureError);
      }
    }
    this.n = p + q;
    Object.freeze(this);
  }

  /** The square of the basis vector `e<index>`. */
  square(index: number): 1 | -1 | 0 {
    return index <= this.p ? 1 : index <= this.n ? -1 : 0;
  }

  toString() {
    return `(${this.p},${this.q})`;
  }
}

/** The wide Euclidean signature used when nothing more specific is known. */
export const defaultSignature = new Signature(20, 0);
