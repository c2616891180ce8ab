/** Base class of all errors raised by the algebra engine. */
export class AlgebraError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = new.target.name;
  }
}

/** An invalid `(p, q)` signature. */
export class SignatureError extends AlgebraError {}

/** A product called with fewer than two operands. */
export class ArityError extends AlgebraError {}

/** Inverting or normalizing a multivector with a zero squared norm. */
export class NonInvertibleError extends AlgebraError {}
