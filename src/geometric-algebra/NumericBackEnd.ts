import type { BackEnd, Scalar } from "./Algebra";
import scalarOp, { type ScalarOpName } from "./scalarOp";


/**
A back end for purely numeric coefficients.

(It is essentially unused since `Algebra` already pre-calculates purely
numeric expressions.  It only exists to complete the `BackEnd` interface
for `Algebra<never>`.)
*/
export default class NumericBackEnd implements BackEnd<never> {
  scalarOp(op: ScalarOpName, args: Scalar<never>[]): Scalar<never> {
    return scalarOp(op, args);
  }
}
