import { describe, it, expect } from "vitest";
import { Algebra, Multivector } from "../src/geometric-algebra/Algebra";
import { AlgebraError, ArityError, NonInvertibleError } from "../src/geometric-algebra/errors";
import NumericBackEnd from "../src/geometric-algebra/NumericBackEnd";
import { Signature } from "../src/geometric-algebra/Signature";
import { dimensions, toVector } from "../src/geometric-algebra/vectors";

type MV = Multivector<never>;

const be = new NumericBackEnd();
const makeAlgebra = (p: number, q: number) => new Algebra<never>(new Signature(p, q), be);

const alg = makeAlgebra(3, 0);
const [e1, e2, e3] = alg.basisVectors();
const e12 = alg.e(1, 2);
const e123 = alg.pseudoScalar(3);
const scalar = (x: number) => alg.mv({1: x});

describe("geometric product", () => {
  it("multiplies basis vectors in (3,0)", () => {
    expect(alg.geometricProduct(e1, e1).toObject()).toEqual({1: 1});
    expect(alg.geometricProduct(e1, e2).toObject()).toEqual({e12: 1});
    expect(alg.geometricProduct(e2, e1).toObject()).toEqual({e12: -1});
    expect(alg.geometricProduct(e12, e12).toObject()).toEqual({1: -1});
  });

  it("builds raw generator products", () => {
    expect(alg.e(2, 1).toObject()).toEqual({e12: -1});
    expect(alg.e().toObject()).toEqual({1: 1});
    expect(alg.e(3, 1, 3).toObject()).toEqual({e1: -1});
    expect(alg.mv({e21: 3, e12: 1}).toObject()).toEqual({e12: -2});
  });

  it("squares generators according to the signature", () => {
    const alg21 = makeAlgebra(2, 1);
    const squares = [1, 2, 3, 4].map(i => {
      const ei = alg21.e(i);
      return alg21.geometricProduct(ei, ei).toObject();
    });
    expect(squares).toEqual([{1: 1}, {1: 1}, {1: -1}, {}]);
  });

  it("anticommutes distinct generators", () => {
    for (const a of [e1, e2, e3]) {
      for (const b of [e1, e2, e3]) {
        if (a === b) continue;
        expect(alg.equals(
          alg.geometricProduct(a, b),
          alg.negate(alg.geometricProduct(b, a)),
        )).toBe(true);
      }
    }
  });

  it("is associative", () => {
    const alg21 = makeAlgebra(2, 1);
    const A = alg21.mv({1: 2, e1: 1, e23: -3});
    const B = alg21.mv({e2: 4, e13: 1, e123: 2});
    const C = alg21.mv({e1: -1, e3: 5, e12: 2});
    const left = alg21.geometricProduct(alg21.geometricProduct(A, B), C);
    const right = alg21.geometricProduct(A, alg21.geometricProduct(B, C));
    expect(alg21.equals(left, right)).toBe(true);
    expect(alg21.equals(alg21.geometricProduct(A, B, C), left)).toBe(true);
  });

  it("distributes over sums and merges like blades", () => {
    const a = alg.vec([3, 4]);
    expect(alg.geometricProduct(a, a).toObject()).toEqual({1: 25});
    expect(alg.geometricProduct(scalar(2), a).toObject()).toEqual({e1: 6, e2: 8});
  });

  it("rejects fewer than two operands", () => {
    expect(() => alg.geometricProduct(e1)).toThrow(ArityError);
    expect(() => alg.geometricProduct()).toThrow("geom product expects at least two operands, got 0");
    expect(() => alg.outerProduct(e1)).toThrow(ArityError);
  });

  it("holds blades beyond the dimension but annihilates their squares", () => {
    const e5 = alg.e(5);
    expect(e5.toObject()).toEqual({e5: 1});
    expect(alg.geometricProduct(e5, e5).toObject()).toEqual({});
    expect(alg.geometricProduct(e1, e5).toObject()).toEqual({e15: 1});
  });

  it("rejects multivectors of other algebras", () => {
    const other = makeAlgebra(3, 0);
    expect(() => alg.geometricProduct(e1, other.e(1))).toThrow(AlgebraError);
    expect(() => alg.plus(other.e(1))).toThrow("trying to use foreign multivector");
  });
});

describe("derived products", () => {
  it("computes outer products", () => {
    expect(alg.outerProduct(e1, e2).toObject()).toEqual({e12: 1});
    expect(alg.outerProduct(e2, e1).toObject()).toEqual({e12: -1});
    expect(alg.outerProduct(e1, e1).toObject()).toEqual({});
    expect(alg.outerProduct(scalar(2), e1).toObject()).toEqual({e1: 2});
    expect(alg.outerProduct(e1, e2, e3).toObject()).toEqual({e123: 1});
  });

  it("computes inner products, vanishing for scalars", () => {
    expect(alg.innerProduct(e1, e12).toObject()).toEqual({e2: 1});
    expect(alg.innerProduct(e12, e1).toObject()).toEqual({e2: -1});
    expect(alg.innerProduct(scalar(2), e1).toObject()).toEqual({});
    expect(alg.innerProduct(e1, scalar(2)).toObject()).toEqual({});
    expect(alg.innerProduct(scalar(2), scalar(3)).toObject()).toEqual({});
  });

  it("computes left contractions", () => {
    expect(alg.contractLeft(e1, e12).toObject()).toEqual({e2: 1});
    expect(alg.contractLeft(e12, e1).toObject()).toEqual({});
    expect(alg.contractLeft(scalar(3), e2).toObject()).toEqual({e2: 3});
    expect(alg.contractLeft(e2, scalar(3)).toObject()).toEqual({});
    expect(alg.contractLeft(scalar(3), scalar(4)).toObject()).toEqual({1: 12});
  });

  it("computes right contractions", () => {
    expect(alg.contractRight(e12, e2).toObject()).toEqual({e1: 1});
    expect(alg.contractRight(e1, e12).toObject()).toEqual({});
    expect(alg.contractRight(scalar(3), e2).toObject()).toEqual({});
    expect(alg.contractRight(e2, scalar(3)).toObject()).toEqual({e2: 3});
  });

  it("computes scalar products", () => {
    expect(alg.scalarProduct(e12, e12).toObject()).toEqual({1: -1});
    expect(alg.scalarProduct(scalar(2), e1).toObject()).toEqual({});
    expect(alg.scalarProduct(scalar(2), scalar(3)).toObject()).toEqual({1: 6});
    expect(alg.scalarProductValue(alg.vec([1, 2]), alg.vec([3, 1]))).toBe(5);
    expect(alg.scalarProductValue(e1, e2)).toBe(0);
  });
});

describe("grades", () => {
  const m = alg.mv({1: 1, e1: 2, e2: 3, e12: 4, e123: 5});

  it("extracts homogeneous parts", () => {
    expect(alg.extractGrade(1, m).toObject()).toEqual({e1: 2, e2: 3});
    expect(alg.extractGrade(0, m).toObject()).toEqual({1: 1});
    expect(alg.extractGrade(-1, m).toObject()).toEqual({});
    expect(m.grades()).toEqual([0, 1, 2, 3]);
  });

  it("reconstructs a multivector from all its grades", () => {
    const parts = [0, 1, 2, 3].map(r => alg.extractGrade(r, m));
    expect(alg.equals(alg.plus(...parts), m)).toBe(true);
  });

  it("tests homogeneity", () => {
    expect(alg.isHomogeneous(alg.plus(e1, e2), 1)).toBe(true);
    expect(alg.isHomogeneous(alg.plus(e1, scalar(1)), 1)).toBe(false);
    expect(alg.isHomogeneous(e12, 2)).toBe(true);
    expect(() => alg.isHomogeneous(e1, 0)).toThrow(AlgebraError);
  });
});

describe("unary operators", () => {
  const m = alg.mv({1: 1, e1: 2, e12: 4, e123: 5});

  it("reverses", () => {
    expect(alg.reverse(e123).toObject()).toEqual({e123: -1});
    expect(alg.reverse(m).toObject()).toEqual({1: 1, e1: 2, e12: -4, e123: -5});
    expect(alg.equals(alg.reverse(alg.reverse(m)), m)).toBe(true);
    expect(alg.equals(alg.reverse(e123), alg.e(3, 2, 1))).toBe(true);
  });

  it("applies the grade involution", () => {
    expect(alg.gradeInvolution(m).toObject()).toEqual({1: 1, e1: -2, e12: 4, e123: -5});
    expect(alg.equals(alg.gradeInvolution(alg.gradeInvolution(m)), m)).toBe(true);
  });

  it("computes magnitudes", () => {
    expect(alg.normSquared(alg.vec([3, 4]))).toBe(25);
    expect(alg.magnitude(alg.vec([3, 4]))).toBe(5);
    expect(alg.magnitude(e12)).toBe(1);

    const alg21 = makeAlgebra(2, 1);
    expect(alg21.magnitude(alg21.e(3))).toBeNaN();
  });

  it("inverts blades", () => {
    const inv = alg.inverse(alg.mv({e1: 2}));
    expect(inv.ok && inv.value.toObject()).toEqual({e1: 0.5});

    const invE12 = alg.inverseOrFail(e12);
    expect(invE12.toObject()).toEqual({e12: -1});
    expect(alg.geometricProduct(e12, invE12).toObject()).toEqual({1: 1});

    const alg21 = makeAlgebra(2, 1);
    expect(alg21.inverseOrFail(alg21.e(3)).toObject()).toEqual({e3: -1});
  });

  it("reports non-invertible multivectors", () => {
    expect(alg.inverse(alg.zero())).toEqual({ok: false, reason: "non-invertible multivector"});

    const alg11 = makeAlgebra(1, 1);
    const nullVector = alg11.vec([1, 1]);
    expect(alg11.inverse(nullVector).ok).toBe(false);
    expect(() => alg11.inverseOrFail(nullVector)).toThrow(NonInvertibleError);
    expect(() => alg11.normalize(nullVector)).toThrow(NonInvertibleError);
  });

  it("normalizes", () => {
    expect(alg.normalize(alg.vec([0, 0, 2])).toObject()).toEqual({e3: 1});
    expect(alg.normalize(alg.mv({e12: -4})).toObject()).toEqual({e12: -1});
  });
});

describe("compound operations", () => {
  it("builds pseudoscalars", () => {
    expect(alg.pseudoScalar(3).toObject()).toEqual({e123: 1});
    expect(alg.pseudoScalar(1).toObject()).toEqual({e1: 1});
    expect(() => alg.pseudoScalar(0)).toThrow(AlgebraError);
    expect(() => alg.pseudoScalar(2.5)).toThrow("pseudoscalar dimension must be a positive integer, got 2.5");
  });

  it("computes duals", () => {
    expect(alg.dual(e1, 3).toObject()).toEqual({e23: -1});
    expect(alg.dual(scalar(2), 3).toObject()).toEqual({e123: -2});
    expect(alg.dual(e12, 2).toObject()).toEqual({1: 1});
  });

  it("computes meets of unit magnitude", () => {
    const meet = alg.meet(e12, alg.e(2, 3), 3);
    expect(meet.toObject()).toEqual({e2: -1});
    expect(alg.magnitude(meet)).toBe(1);

    const tilted = alg.meet(alg.mv({e12: 3}), alg.outerProduct(alg.vec([1, 1]), e3), 3);
    expect(alg.magnitude(tilted)).toBeCloseTo(1, 12);
    expect(alg.isHomogeneous(tilted, 1)).toBe(true);
  });

  it("computes joins", () => {
    expect(alg.join(e12, alg.e(2, 3), 3).toObject()).toEqual({e123: -1});
  });

  it("restricts meet and join to blades", () => {
    const mixed = alg.plus(scalar(1), e1);
    expect(() => alg.meet(mixed, e12, 3)).toThrow(AlgebraError);
    expect(() => alg.join(e12, mixed, 3)).toThrow(AlgebraError);
  });
});

describe("vectors", () => {
  it("converts between coordinate arrays and 1-vectors", () => {
    const v: MV = alg.vec([1, 2, 0, -1]);
    expect(v.toObject()).toEqual({e1: 1, e2: 2, e4: -1});
    expect(dimensions(v)).toBe(4);
    expect(toVector(v)).toEqual([1, 2, 0, -1]);
    expect(toVector(v, 5)).toEqual([1, 2, 0, -1, 0]);
    expect(toVector(alg.zero())).toEqual([]);
  });

  it("rejects non-vectors", () => {
    expect(dimensions(scalar(3))).toBe(0);
    expect(() => toVector(e12)).toThrow(AlgebraError);
  });
});

describe("Multivector", () => {
  it("looks up coefficients by blade or name", () => {
    const m = alg.mv({e1: 2, e23: 7});
    expect(m.value("e23")).toBe(7);
    expect(m.value([1])).toBe(2);
    expect(m.value("e12")).toBe(0);
    expect([...m.basisBlades()]).toEqual([[1], [2, 3]]);
  });

  it("reads non-canonical keys as raw generator products", () => {
    const m = alg.mv({e12: 3, e3: 4});
    expect(m.value("e21")).toBe(-3);
    expect(m.value([2, 1])).toBe(-3);
    expect(m.value([1, 3, 3])).toBe(0);
    expect(m.value([3, 1, 1])).toBe(4);
    expect(m.value([5, 5])).toBe(0);
  });

  it("rejects non-canonical blades in the constructor", () => {
    expect(() => new Multivector(alg, add => add([2, 1], 1))).toThrow(AlgebraError);
    expect(() => new Multivector(alg, add => add([1, 1], 1))).toThrow("not a canonical basis blade: [1,1]");
  });

  it("is not changed by mutating iterated terms", () => {
    const m = alg.mv({e1: 2, e2: 3});
    for (const term of m) term[1] = 0;
    expect(m.toObject()).toEqual({e1: 2, e2: 3});
    expect(m.value([1])).toBe(2);
  });

  it("orders components by grade", () => {
    const m = alg.mv({e123: 1, e2: 1, 1: 1, e13: 1});
    expect(Object.keys(m.toObject())).toEqual(["1", "e2", "e13", "e123"]);
    expect(JSON.stringify(m)).toBe('{"1":1,"e2":1,"e13":1,"e123":1}');
  });

  it("drops zero components", () => {
    expect(alg.minus(e1, e1).toObject()).toEqual({});
    expect(alg.scale(0, e1).toObject()).toEqual({});
  });

  it("prints components", () => {
    const m = alg.mv({e1: 1.5, e12: -2}, {named: "m"});
    expect(m.name).toMatch(/^m_[A-Z]+$/);
    expect(m.toString()).toBe(`${m.name} {e1: 1.50000, e12: -2.00000}`);
    expect(m.toString({decimals: 1})).toBe(`${m.name} {e1: 1.5, e12: -2.0}`);
  });
});
