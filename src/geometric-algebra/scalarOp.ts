import { fail } from "../utils";
import { AlgebraError } from "./errors";

/** The scalar operations an algebra may request from a back end. */
export type ScalarOpName =
  | "+" | "-" | "*" | "/" | "unaryMinus" | "sqrt" | "abs" | "inversesqrt";

export const scalarOpArity: Record<ScalarOpName, "variadic" | 1 | 2> = {
  "+": "variadic",
  "*": "variadic",
  "-": 2,
  "/": 2,
  unaryMinus: 1,
  sqrt: 1,
  abs: 1,
  inversesqrt: 1,
};

export default
function scalarOp(op: ScalarOpName, args: number[]): number {
  switch (op) {
    case "+": return args.reduce((acc, arg) => acc + arg, 0);
    case "-": return args[0] - args[1];
    case "*": return args.reduce((acc, arg) => acc * arg, 1);
    case "/": return args[0] / args[1];
    case "unaryMinus": return -args[0];
    case "sqrt": return Math.sqrt(args[0]);
    case "abs": return Math.abs(args[0]);
    case "inversesqrt": return 1 / Math.sqrt(args[0]);
    default: return fail(`unexpected scalar operation "${op satisfies never}"`, AlgebraError);
  }
}
