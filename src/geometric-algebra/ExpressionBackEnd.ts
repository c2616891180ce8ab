import type { BackEnd, Scalar } from "./Algebra";
import type { ScalarOpName } from "./scalarOp";

const show = (x: Scalar<string>) => typeof x === "number" ? String(x) : x;

// Every expression produced here is a sum in parentheses, a (possibly
// negated) product/quotient, or a function call.  So negation can always be
// done by adding or removing a leading minus sign.
const negate = (x: string) => x.startsWith("-") ? x.slice(1) : "-" + x;

const paren = (x: string) => x.includes(" ") ? `(${x})` : x;

function sum(terms: string[]): string {
  if (terms.length === 1) return terms[0];
  const [first, ...rest] = terms;
  return `(${first}${
    rest.map(t => t.startsWith("-") ? ` - ${t.slice(1)}` : ` + ${t}`).join("")
  })`;
}

function product(factors: string[]): string {
  let negative = false;
  const body = factors.map(f => {
    if (!f.startsWith("-")) return f;
    negative = !negative;
    return f.slice(1);
  }).join(" * ");
  return negative ? "-" + body : body;
}

/**
 * A back end for symbolic coefficients.
 *
 * Coefficients are expression strings over arbitrary variable names such as
 * `"a"` or `"x1"`.  No algebraic simplification takes place, so two
 * coefficients are only recognized as equal if their expressions are
 * identical.
 */
export default class ExpressionBackEnd implements BackEnd<string> {
  scalarOp(op: ScalarOpName, args: Scalar<string>[]): Scalar<string> {
    const exprs = args.map(show);
    switch (op) {
      case "+": return sum(exprs);
      case "-": return sum([exprs[0], negate(exprs[1])]);
      case "*": return product(exprs);
      case "/": return `${exprs[0]} / ${paren(exprs[1])}`;
      case "unaryMinus": return negate(exprs[0]);
      default: return `${op}(${exprs.join(", ")})`;
    }
  }
}
