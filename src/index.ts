export {
  Algebra, Multivector,
  type BackEnd, type BladeRef, type Inversion, type MultivectorOptions, type Scalar,
} from "./geometric-algebra/Algebra";
export {
  canonicalizeBlade, compareBlades, isCanonical,
  type Blade, type CanonicalBlade,
} from "./geometric-algebra/blades";
export { bladeName, parseBladeName } from "./geometric-algebra/componentNaming";
export {
  AlgebraError, ArityError, NonInvertibleError, SignatureError,
} from "./geometric-algebra/errors";
export { euclidean } from "./geometric-algebra/euclidean";
export { default as ExpressionBackEnd } from "./geometric-algebra/ExpressionBackEnd";
export { default as NumericBackEnd } from "./geometric-algebra/NumericBackEnd";
export { type ScalarOpName } from "./geometric-algebra/scalarOp";
export { defaultSignature, Signature } from "./geometric-algebra/Signature";
export { log_, q_ } from "./geometric-algebra/utils";
export { dimensions, toVector } from "./geometric-algebra/vectors";
export { setLogger } from "./utils";
