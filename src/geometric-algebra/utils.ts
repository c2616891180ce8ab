import type { Multivector } from "./Algebra";
import { bladeName } from "./componentNaming";

type Loggable<T> = Multivector<T> | number | string | undefined;

const fixed = (x: number) => x.toFixed(8).replace(/\.?0*$/, "");

/**
 * Create a function writing a labelled value.  Multivectors are written
 * with one line per component.
 */
export const q_ = (
  write: (text: string) => void = console.log,
) => <T>(
  label: string,
  x: Loggable<T>,
) => {
  switch (typeof x) {
    case "undefined":
    case "string":
      write(label + " = " + x);
      return;
    case "number":
      write(label + " = " + fixed(x));
      return;
    default: {
      const terms = [...x];
      write(
        label + " ="
        + (terms.length === 0 ? " [zero]" :
           terms.every(([, val]) => typeof val === "number" && Math.abs(val) < 1e-8) ? " [~zero]" :
           ""
          )
      );
      for (const [blade, val] of terms) {
        write(`  ${bladeName(blade)}: ${
          typeof val === "number"
          ? fixed(val).replace(/^(?!-)/, "+")
          : val
        }`);
      }
    }
  }
}

export const log_ = (
  write?: (text: string) => void,
) => {
  const q = q_(write);
  return <T>(
    obj: Record<string, Loggable<T>>
  ) => {
    for (const [k, v] of Object.entries(obj)) {
      q(k, v);
    }
  };
};
