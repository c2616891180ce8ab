import { fail, log } from "../utils";
import alphabetic from "./alphabetic";
import {
  type Blade, bladeKey, type CanonicalBlade, canonicalizeBlade, compareBlades,
  gradeInvolutionFlips, isPositiveInteger, isCanonical, reverseFlips,
} from "./blades";
import { bladeName, parseBladeName } from "./componentNaming";
import { AlgebraError, ArityError, NonInvertibleError } from "./errors";
import scalarOp, { type ScalarOpName, scalarOpArity } from "./scalarOp";
import type { Signature } from "./Signature";


const paranoid = true;
const optimize = true;
const config = {
  // Switch internal consistency checks on or off:
  checkMine: paranoid,
  checkCanonical: paranoid,
  checkScalarOp: paranoid,

  // Switch specific optimizations on or off:
  cacheCanonicalization: optimize,
  optimizeSingleArgPlus: optimize,
  optimizeSingleArgumentSum: optimize,
  optimizeSingleArgumentTimes: optimize,
  optimizeSum: optimize,
  optimizeTimes: optimize,
  precomputeScalarOp: optimize,
};

/**
 * Semantically a boolean, but for convenience any value.
 * Only its truthiness should be used.
 */
export type truth = unknown;

/**
 * A coefficient that is either a plain number or a value of the back end's
 * coefficient type `T` (e.g., a symbolic expression).
 */
export type Scalar<T> = number | T;

/**
 * Back ends implementing this interface provide the coefficient ring
 * for non-numeric coefficients.
 */
export interface BackEnd<T> {
  /**
   * Apply an operation given as the string `op` to a list of scalars
   * (numbers/expressions) and return the result (a number or expression).
   */
  scalarOp(op: ScalarOpName, args: Scalar<T>[]): Scalar<T>;
}

/** Options for the Multivector constructor */
export type MultivectorOptions = Partial<{
  /** If provided, use this string in the multivector name. */
  named: string,
}>

/** A basis blade given as an index list or by its name (like `"e12"`) */
export type BladeRef = Blade | string;

/** Outcome of `Algebra.inverse(...)` */
export type Inversion<T> =
  | {ok: true, value: Multivector<T>}
  | {ok: false, reason: string};

/**
 * A multivector in a geometric algebra.
 */
export class Multivector<T> implements Iterable<[Blade, Scalar<T>]> {
  /** A counter used to make Multivector names unique */
  static mvCount = 0;

  /**
   * Map from blade keys to (basis blade, coefficient) pairs, ordered by
   * grade and then lexicographically.  Zero coefficients are not stored.
   */
  #components: Map<string, [Blade, Scalar<T>]>;

  readonly name: string;

  constructor(
    /** The algebra the multivector lives in */
    readonly alg: Algebra<T>,
    /**
     * A function setting up the components of the multivector.
     *
     * It takes a callback function (typically called `add`) and uses it to
     * add scalar values to components (identified by canonical blade or
     * name).  Values added to the same blade are summed up.
     */
    initialize: (
      add: (key: BladeRef, term: Scalar<T>) => unknown,
    ) => unknown,
    options?: MultivectorOptions,
  ) {
    this.name = `${options?.named ?? "mv"}_${alphabetic(Multivector.mvCount++)}`;
    const componentTerms = new Map<string, [Blade, Scalar<T>[]]>();
    initialize((key, value) => {
      const blade = typeof key === "string" ? parseBladeName(key) : key;
      if (config.checkCanonical && !isCanonical(blade)) {
        fail(`not a canonical basis blade: [${blade}]`, AlgebraError);
      }
      const k = bladeKey(blade);
      const entry = componentTerms.get(k);
      if (entry) {
        entry[1].push(value);
      } else {
        componentTerms.set(k, [blade, [value]]);
      }
    });
    this.#components = new Map(
      [...componentTerms.values()]
      .sort(([a], [b]) => compareBlades(a, b))
      .flatMap(([blade, terms]): [string, [Blade, Scalar<T>]][] => {
        const value = alg.sum(terms);
        return value === 0 ? [] : [[bladeKey(blade), [blade, value]]];
      })
    );
  }

  /**
   * Retrieve the coefficient of a basis blade identified by its index list
   * or its name.  Non-canonical keys are read as raw generator products,
   * so `value("e21")` is the negated coefficient of `e12`.
   */
  value(key: BladeRef): Scalar<T> {
    const indices = typeof key === "string" ? parseBladeName(key) : key;
    const canonical = this.alg.canonicalize(indices);
    if (!canonical) return 0;
    const coeff = this.#components.get(bladeKey(canonical.blade))?.[1] ?? 0;
    return coeff === 0 ? 0 : this.alg.flipIf(canonical.sign < 0, coeff);
  }

  /**
   * Iterate over the (basis blade, coefficient) pairs.
   */
  *[Symbol.iterator](): Iterator<[Blade, Scalar<T>]> {
    for (const [blade, value] of this.#components.values()) yield [blade, value];
  }

  /** Convert this Multivector to a plain JS object keyed by blade names */
  toObject(): Record<string, Scalar<T>> {
    return Object.fromEntries(
      [...this].map(([blade, val]) => [bladeName(blade), val])
    );
  }

  /**
   * Iterate over the basis blades.
   */
  *basisBlades(): Iterable<Blade> {
    for (const [blade] of this) yield blade;
  }

  /** The grades occurring in this multivector, in ascending order */
  grades(): number[] {
    return [...new Set([...this.basisBlades()].map(blade => blade.length))];
  }

  toString(options?: Partial<{decimals: number}>) {
    return `${this.name} {${
      [...this].map(([blade, value]) => `${bladeName(blade)}: ${
        typeof value === "number" ? value.toFixed(options?.decimals ?? 5) : value
      }`).join(", ")
    }}`;
  }

  toJSON() { return this.toObject(); }
}

/**
 * Test whether a term of a blade product should be included in a
 * multivector product.  The arguments are the grades of the two factors and
 * of their (canonicalized) geometric product.
 *
 * Instances of this function type should have a name that is suitable as an
 * identifier.
 */
type ProdInclusionTest = (gradeA: number, gradeB: number, gradeAB: number) => truth;

// For each product kind a test whether the geometric product of two basis
// blades should be included in the product.
const incl: Record<string, ProdInclusionTest> = {
  geom  : (              ) => true,
  wedge : (gA, gB, gAB) => gAB === gA + gB,
  contrL: (gA, gB, gAB) => gAB === gB - gA,
  contrR: (gA, gB, gAB) => gAB === gA - gB,
  scalar: (gA, gB, gAB) => gAB === 0,
  // Scalar operands make the (Hestenes) inner product vanish:
  dot   : (gA, gB, gAB) => gA > 0 && gB > 0 && gAB === Math.abs(gA - gB),
}

export class Algebra<T> {
  /** Canonicalization results by raw index sequence */
  readonly #bladeCache = new Map<string, CanonicalBlade | null>();

  constructor(
    /** How basis vectors square */
    readonly signature: Signature,
    /** A back end providing the coefficient ring */
    readonly be: BackEnd<T>,
  ) {
    log(`new algebra with signature ${signature}`);
  }

  /**
   * Reduce a product of basis vectors (given by their indices in
   * multiplication order) to a signed canonical blade or `null` (zero).
   */
  canonicalize(indices: readonly number[]): CanonicalBlade | null {
    if (!config.cacheCanonicalization) {
      return canonicalizeBlade(this.signature, indices);
    }
    const key = indices.join(",");
    let result = this.#bladeCache.get(key);
    if (result === undefined) {
      result = canonicalizeBlade(this.signature, indices);
      this.#bladeCache.set(key, result);
    }
    return result;
  }

  /**
   * Throw an exception if (checking is enabled and)
   * the given multivector does not belong to this algebra.
   *
   * This is used to detect accidental usage of multivectors from one algebra
   * in another algebra.
   */
  checkMine(mv: Multivector<T>): Multivector<T> {
    if (config.checkMine && mv.alg !== this) {
      fail("trying to use foreign multivector", AlgebraError);
    }
    return mv;
  }

  /**
   * The geometric product of basis vectors with the given indices, in this
   * order.  So `e(2, 1)` is `-e12` and `e()` is the scalar 1.
   */
  e(...indices: number[]): Multivector<T> {
    const product = this.canonicalize(indices);
    return new Multivector(this, add => {
      if (product) add(product.blade, product.sign);
    }, {named: "e"});
  }

  /**
   * Create a multivector from an object mapping blade names to coefficients.
   *
   * A name like `"e21"` (or `"e2_1"`) stands for the geometric product of the
   * listed basis vectors and is canonicalized.  `"1"` is the scalar key.
   */
  mv(obj: Record<string, Scalar<T>>, options?: MultivectorOptions) {
    return new Multivector(this, add => {
      for (const [key, val] of Object.entries(obj)) {
        const product = this.canonicalize(parseBladeName(key));
        if (product) add(product.blade, this.flipIf(product.sign < 0, val));
      }
    }, options);
  }

  /**
   * Create a 1-vector from an array (coefficients of `e1`, `e2`, ...).
   */
  vec(coords: Scalar<T>[], options?: MultivectorOptions) {
    return new Multivector(this, add => {
      coords.forEach((val, i) => add([i + 1], val));
    }, {named: "vec", ...options});
  }

  /** Multivector with all components 0 */
  zero(): Multivector<T> {
    return new Multivector(this, () => {}, {named: "zero"});
  };

  /** Multivector with the scalar component 1 */
  one(): Multivector<T> {
    return new Multivector(this, add => add([], 1), {named: "one"});
  }

  /** The `n`-dimensional pseudoscalar `e1 e2 ... en` */
  pseudoScalar(n: number): Multivector<T> {
    if (!isPositiveInteger(n)) {
      fail(`pseudoscalar dimension must be a positive integer, got ${n}`, AlgebraError);
    }
    const blade = Array.from({length: n}, (_, i) => i + 1);
    return new Multivector(this, add => add(blade, 1), {named: "ps"});
  }

  /** Array of the basis 1-vectors `e1 ... en` */
  basisVectors(n = this.signature.n): Multivector<T>[] {
    return Array.from({length: n}, (_, i) =>
      new Multivector(this, add => add([i + 1], 1), {named: "basis_e" + (i + 1)})
    );
  }

  /** Multiply a scalar with a multivector. */
  scale(alpha: Scalar<T>, mv: Multivector<T>, options?: MultivectorOptions): Multivector<T> {
    return new Multivector(this, add => {
      for (const [blade, value] of this.checkMine(mv)) {
        add(blade, this.times([alpha, value]));
      }
    }, {named: "scale", ...options});
  }

  /** Return the additive inverse of a multivector. */
  negate(mv: Multivector<T>): Multivector<T> {
    return new Multivector(this, add => {
      for (const [blade, value] of this.checkMine(mv)) {
        add(blade, this.scalarOp("unaryMinus", [value]));
      }
    }, {named: "negate"});
  }

  /**
   * Return a copy of the given multivector where components with odd grade
   * are negated.
   */
  gradeInvolution(mv: Multivector<T>): Multivector<T> {
    return new Multivector(this, add => {
      for (const [blade, value] of this.checkMine(mv)) {
        add(blade, this.flipIf(gradeInvolutionFlips(blade.length), value));
      }
    }, {named: "gradeInvolution"});
  }

  /**
   * Return a copy of the given multivector where components with grades 2, 3,
   * 6, 7, 10, 11, ... (that is, with a grade ≡ 2 or 3 modulo 4) are negated.
   *
   * If the given multivector is the geometric product of zero or more 1-vectors
   * (a "versor"), the returned vector is the geometric product of the same
   * 1-vectors but in reverse order.
   */
  reverse(mv: Multivector<T>): Multivector<T> {
    return new Multivector(this, add => {
      for (const [blade, value] of this.checkMine(mv)) {
        add(blade, this.flipIf(reverseFlips(blade.length), value));
      }
    }, {named: "reverse"});
  }

  /** `this.geometricProduct(mv, this.reverse(this.pseudoScalar(n)))` */
  dual(mv: Multivector<T>, n: number): Multivector<T> {
    return this.geometricProduct(mv, this.reverse(this.pseudoScalar(n)));
  }

  /**
   * The scalar part of `this.geometricProduct(mv, this.reverse(mv))`.
   *
   * This may be negative or zero for non-Euclidean signatures.
   */
  normSquared(mv: Multivector<T>): Scalar<T> {
    return this.extractGrade(0,
      this.geometricProduct(mv, this.reverse(mv)),
    ).value([]);
  }

  /**
   * The square root of `this.normSquared(mv)`, left to the back end.
   * (With numeric coefficients a negative radicand gives `NaN`.)
   */
  magnitude(mv: Multivector<T>): Scalar<T> {
    return this.scalarOp("sqrt", [this.normSquared(mv)]);
  }

  /** **This is only correct for blades and versors!** */
  inverse(mv: Multivector<T>): Inversion<T> {
    const norm2 = this.normSquared(mv);
    if (norm2 === 0) {
      log(`cannot invert ${mv}`);
      return {ok: false, reason: "non-invertible multivector"};
    }
    const inverseNorm2 = this.scalarOp("/", [1, norm2]);
    return {
      ok: true,
      value: this.scale(inverseNorm2, this.reverse(mv), {named: "inverse"}),
    };
  }

  /** Like `.inverse(mv)`, but throwing a `NonInvertibleError` on failure. */
  inverseOrFail(mv: Multivector<T>): Multivector<T> {
    const result = this.inverse(mv);
    return result.ok ? result.value : fail(`${result.reason}: ${mv}`, NonInvertibleError);
  }

  /** **This is only correct for blades and versors!** */
  normalize(mv: Multivector<T>): Multivector<T> {
    const normSq = this.normSquared(mv);
    if (normSq === 0) {
      fail(`trying to normalize null multivector ${mv}`, NonInvertibleError);
    }
    return this.scale(
      this.scalarOp("inversesqrt", [
        // Using the absolute value so that we can also "normalize"
        // multivectors squaring to a negative value (e.g. bivectors with a
        // Euclidean metric):
        this.scalarOp("abs", [normSq]),
      ]),
      mv,
      {named: "normalized"},
    );
  }

  extract(
    test: (blade: Blade, value: Scalar<T>) => boolean,
    mv: Multivector<T>,
  ): Multivector<T> {
    return new Multivector(this, add => {
      for (const [blade, value] of this.checkMine(mv)) {
        if (test(blade, value)) {
          add(blade, value);
        }
      }
    }, {named: "extract"});
  }

  /** The part of `mv` with the given grade (zero for negative grades) */
  extractGrade(grade: number, mv: Multivector<T>): Multivector<T> {
    return this.extract(blade => blade.length === grade, mv);
  }

  /** Does `x` consist of `grade`-blades only? */
  isHomogeneous(x: Multivector<T>, grade: number): boolean {
    if (!isPositiveInteger(grade)) {
      fail(`homogeneity grade must be a positive integer, got ${grade}`, AlgebraError);
    }
    return this.equals(this.extractGrade(grade, x), x);
  }

  /** Structural equality of the coefficients */
  equals(a: Multivector<T>, b: Multivector<T>): boolean {
    const termsA = [...this.checkMine(a)];
    const termsB = [...this.checkMine(b)];
    return termsA.length === termsB.length &&
      termsA.every(([blade, value]) => b.value(blade) === value);
  }

  plus(...mvs: Multivector<T>[]): Multivector<T> {
    if (config.optimizeSingleArgPlus && mvs.length === 1) {
      return this.checkMine(mvs[0]);
    }
    return new Multivector(this, add => {
      for (const mv of mvs) {
        for (const [blade, value] of this.checkMine(mv)) {
          add(blade, value);
        }
      }
    }, {named: "plus"});
  }

  /**
   * Subtract a multivector from another one.
   */
  minus(pos: Multivector<T>, neg: Multivector<T>) {
    return new Multivector(this, add => {
      for (const [blade, value] of this.checkMine(pos)) {
        add(blade, value);
      }
      for (const [blade, value] of this.checkMine(neg)) {
        add(blade, this.scalarOp("unaryMinus", [value]));
      }
    }, {named: "minus"});
  }

  /**
   * The core functionality for all kinds of products:
   * Each pair of basis blades is multiplied by canonicalizing the
   * concatenation of their index lists.
   */
  product2(include: ProdInclusionTest, a: Multivector<T>, b: Multivector<T>): Multivector<T> {
    this.checkMine(a);
    this.checkMine(b);
    return new Multivector(this, add => {
      for (const [bladeA, valA] of a) {
        for (const [bladeB, valB] of b) {
          const product = this.canonicalize([...bladeA, ...bladeB]);
          if (product && include(bladeA.length, bladeB.length, product.blade.length)) {
            add(product.blade, this.flipIf(product.sign < 0, this.times([valA, valB])));
          }
        }
      }
    }, {named: include.name + "Prod"});
  }

  /** Like `product2`, but for two or more multivectors, folding from the left */
  product(include: ProdInclusionTest, mvs: Multivector<T>[]): Multivector<T> {
    const [first, ...rest] = mvs;
    if (!first || rest.length === 0) {
      fail(
        `${include.name} product expects at least two operands, got ${mvs.length}`,
        ArityError,
      );
    }
    return rest.reduce((acc, mv) => this.product2(include, acc, mv), first);
  }

  outerProduct(...mvs: Multivector<T>[]): Multivector<T> {
    return this.product(incl.wedge, mvs);
  }

  geometricProduct(...mvs: Multivector<T>[]): Multivector<T> {
    return this.product(incl.geom, mvs);
  }

  contractLeft(a: Multivector<T>, b: Multivector<T>): Multivector<T> {
    return this.product2(incl.contrL, a, b);
  }

  contractRight(a: Multivector<T>, b: Multivector<T>): Multivector<T> {
    return this.product2(incl.contrR, a, b);
  }

  /** The inner product in the sense of Hestenes and Sobczyk */
  innerProduct(a: Multivector<T>, b: Multivector<T>): Multivector<T> {
    return this.product2(incl.dot, a, b);
  }

  /**
   * Implementation returning a multivector that is actually a scalar.
   * (At most the scalar component is filled.)
   */
  scalarProduct(a: Multivector<T>, b: Multivector<T>): Multivector<T> {
    return this.product2(incl.scalar, a, b);
  }

  /** Implementation returning an object of scalar type. */
  scalarProductValue(a: Multivector<T>, b: Multivector<T>): Scalar<T> {
    return this.scalarProduct(a, b).value([]);
  }

  /**
   * Meet and join are only defined for blades, so multivectors mixing grades
   * are rejected.
   */
  protected checkBladeLike(mv: Multivector<T>, operation: string) {
    if (mv.grades().length > 1) {
      fail(`${operation} expects blades, got ${mv}`, AlgebraError);
    }
  }

  /**
   * The intersection of two blades in `n`-dimensional space
   * (Hestenes & Sobczyk), normalized since it is only defined up to scale:
   *
   * `(-1)^(n(n-1)/2) dual(dual(a, n) ∧ dual(b, n), n)`
   *
   * Normalization divides by `sqrt(abs(normSquared))` rather than by
   * `magnitude`.  The two agree for Euclidean blades.  Where the meet squares
   * to a negative value the result stays real, whereas dividing by
   * `magnitude` would give `NaN` numerically and an `i` factor symbolically.
   */
  meet(a: Multivector<T>, b: Multivector<T>, n: number): Multivector<T> {
    this.checkBladeLike(a, "meet");
    this.checkBladeLike(b, "meet");
    const met = this.dual(this.outerProduct(this.dual(a, n), this.dual(b, n)), n);
    // (-1)^(n(n-1)/2) is the sign change of reversing an n-blade:
    return this.normalize(reverseFlips(n) ? this.negate(met) : met);
  }

  /**
   * The union of two blades in `n`-dimensional space (Dorst et al.),
   * scaled according to the normalized meet:
   *
   * `a ∧ (meet(a, b, n)^-1 · b)`
   */
  join(a: Multivector<T>, b: Multivector<T>, n: number): Multivector<T> {
    this.checkBladeLike(a, "join");
    this.checkBladeLike(b, "join");
    const meetInverse = this.inverseOrFail(this.meet(a, b, n));
    return this.outerProduct(a, this.innerProduct(meetInverse, b));
  }

  times(args: Scalar<T>[]): Scalar<T> {
    if (!config.optimizeTimes) {
      return this.scalarOp("*", [1, ...args]);
    }
    let num = 1;
    const sym: T[] = [];
    for (const arg of args) {
      if (typeof arg === "number") {
        // This is not absolutely correct.  If one operator is 0 and another one
        // is NaN or infinity, the unoptimized computation would not return 0.
        if (arg === 0) return 0;
        num *= arg;
      } else {
        sym.push(arg);
      }
    }
    if (sym.length === 0) return num;
    if (num === -1) return this.flipIf(true, this.times(sym));
    const simplified: Scalar<T>[] = num !== 1 ? [num, ...sym] : sym;
    if (config.optimizeSingleArgumentTimes && simplified.length === 1) {
      return simplified[0];
    }
    return this.scalarOp("*", simplified);
  }

  sum(args: Scalar<T>[]): Scalar<T> {
    if (!config.optimizeSum) {
      return this.scalarOp("+", [0, ...args]);
    }
    let num = 0;
    const sym: T[] = [];
    for (const arg of args) {
      if (typeof arg === "number") {
        num += arg;
      } else {
        sym.push(arg);
      }
    }
    const simplified: Scalar<T>[] =
      num !== 0 || sym.length === 0 ? [...sym, num] : sym;
    if (config.optimizeSingleArgumentSum && simplified.length === 1) {
      return simplified[0];
    }
    return this.scalarOp("+", simplified);
  }

  flipIf(condition: truth, value: Scalar<T>): Scalar<T> {
    return condition ? this.scalarOp("unaryMinus", [value]) : value;
  }

  scalarOp(op: ScalarOpName, args: Scalar<T>[]): Scalar<T> {
    if (config.checkScalarOp) {
      Algebra.checkScalarOp(op, args);
    }
    return (
      config.precomputeScalarOp && args.every((arg): arg is number => typeof arg === "number")
      ? scalarOp(op, args)
      : this.be.scalarOp(op, args)
    );
  }

  /**
   * Check the arity of a scalar operation.
   *
   * If this check fails, there is a problem on the algebra level.
   * If this check succeeds and the back end fails, there is a problem
   * with the back end.
   */
  static checkScalarOp<T>(op: ScalarOpName, args: Scalar<T>[]): void {
    const arity = scalarOpArity[op];
    const ok = arity === "variadic" ? args.length >= 1 : args.length === arity;
    if (!ok) {
      fail(`Unexpected number of arguments for scalar operation "${op}": ${args.length}`, AlgebraError);
    }
  }
}
