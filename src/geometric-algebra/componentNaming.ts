import { fail } from "../utils";
import type { Blade } from "./blades";
import { AlgebraError } from "./errors";

export type NamingOptions = {scalar?: string};

/**
 * Name a basis blade like `e12` or, as soon as an index has more than one
 * digit, like `e1_12`.  The scalar unit is named `"1"` by default.
 */
export function bladeName(blade: Blade, options: NamingOptions = {}): string {
  const {scalar = "1"} = options;
  if (blade.length === 0) return scalar;
  const separator = blade.every(i => i < 10) ? "" : "_";
  return "e" + blade.join(separator);
}

/**
 * Parse a blade name into the list of basis-vector indices it mentions.
 *
 * The indices are returned as written, so `"e21"` gives `[2, 1]`.  It is up
 * to the caller to canonicalize them.
 */
export function parseBladeName(name: string, options: NamingOptions = {}): number[] {
  const {scalar = "1"} = options;
  if (name === scalar) return [];
  const match = /^e(\d+(?:_\d+)*)$/.exec(name) ??
    fail(`unexpected basis-blade name "${name}"`, AlgebraError);
  const digits = match[1];
  return (digits.includes("_") ? digits.split("_") : digits.split("")).map(Number);
}
