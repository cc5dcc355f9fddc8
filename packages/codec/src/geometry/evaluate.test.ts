import { describe, it, expect } from "vitest";
import type { Geometry, GeometryShape, PlanView } from "@opendrive-codec/types";
import { meters, perMeter, radians } from "@opendrive-codec/types";
import { evaluateGeometry, evaluateReferenceLine, geometryEnd } from "./evaluate.js";
import { GeometryError, ProgrammingError } from "../errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeGeometry(shape: GeometryShape, overrides: Partial<Omit<Geometry, "shape">> = {}): Geometry {
  return {
    s: meters(0),
    x: meters(0),
    y: meters(0),
    hdg: radians(0),
    length: meters(10),
    shape,
    ...overrides,
  };
}

/** Independent reference: Simpson's rule on the spiral's direction vector */
function simpsonSpiral(k0: number, k1: number, length: number, s: number): { x: number; y: number } {
  const n = 20000;
  const h = s / n;
  const theta = (t: number) => k0 * t + ((k1 - k0) / length) * t * t * 0.5;
  let x = 0;
  let y = 0;
  for (let i = 0; i <= n; i++) {
    const w = i === 0 || i === n ? 1 : i % 2 === 1 ? 4 : 2;
    x += w * Math.cos(theta(i * h));
    y += w * Math.sin(theta(i * h));
  }
  return { x: (x * h) / 3, y: (y * h) / 3 };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("evaluateGeometry", () => {
  describe("line", () => {
    it("extrapolates along the start heading", () => {
      const line = makeGeometry({ kind: "line" });
      expect(evaluateGeometry(line, 5)).toEqual({ x: 5, y: 0, hdg: 0 });
    });

    it("starts at the declared position", () => {
      const line = makeGeometry({ kind: "line" }, { x: meters(3), y: meters(-2), hdg: radians(Math.PI / 2) });
      const pose = evaluateGeometry(line, 0);
      expect(pose).toEqual({ x: 3, y: -2, hdg: Math.PI / 2 });
    });

    it("follows a rotated heading", () => {
      const line = makeGeometry({ kind: "line" }, { hdg: radians(Math.PI / 2) });
      const pose = evaluateGeometry(line, 4);
      expect(pose.x).toBeCloseTo(0, 12);
      expect(pose.y).toBeCloseTo(4, 12);
    });
  });

  describe("arc", () => {
    it("turns left for positive curvature", () => {
      const radius = 10;
      const arc = makeGeometry({ kind: "arc", curvature: perMeter(1 / radius) }, { length: meters(20) });
      const pose = evaluateGeometry(arc, (Math.PI * radius) / 2);
      expect(pose.x).toBeCloseTo(10, 9);
      expect(pose.y).toBeCloseTo(10, 9);
      expect(pose.hdg).toBeCloseTo(Math.PI / 2, 12);
    });

    it("turns right for negative curvature", () => {
      const arc = makeGeometry({ kind: "arc", curvature: perMeter(-0.1) }, { length: meters(20) });
      const pose = evaluateGeometry(arc, (Math.PI * 10) / 2);
      expect(pose.x).toBeCloseTo(10, 9);
      expect(pose.y).toBeCloseTo(-10, 9);
      expect(pose.hdg).toBeCloseTo(-Math.PI / 2, 12);
    });

    it("degenerates to a line for zero curvature", () => {
      const arc = makeGeometry({ kind: "arc", curvature: perMeter(0) });
      expect(evaluateGeometry(arc, 7)).toEqual({ x: 7, y: 0, hdg: 0 });
    });
  });

  describe("spiral", () => {
    it("matches an arc when both curvatures are equal", () => {
      const spiral = makeGeometry(
        { kind: "spiral", curvStart: perMeter(0.02), curvEnd: perMeter(0.02) },
        { length: meters(40), hdg: radians(0.3) },
      );
      const arc = makeGeometry({ kind: "arc", curvature: perMeter(0.02) }, { length: meters(40), hdg: radians(0.3) });
      const a = evaluateGeometry(spiral, 30);
      const b = evaluateGeometry(arc, 30);
      expect(a.x).toBeCloseTo(b.x, 9);
      expect(a.y).toBeCloseTo(b.y, 9);
      expect(a.hdg).toBeCloseTo(b.hdg, 12);
    });

    it("is a straight line when curvature is zero throughout", () => {
      const spiral = makeGeometry({ kind: "spiral", curvStart: perMeter(0), curvEnd: perMeter(0) });
      const pose = evaluateGeometry(spiral, 6);
      expect(pose.x).toBeCloseTo(6, 12);
      expect(pose.y).toBe(0);
      expect(pose.hdg).toBe(0);
    });

    it("follows the clothoid from zero curvature", () => {
      const spiral = makeGeometry(
        { kind: "spiral", curvStart: perMeter(0), curvEnd: perMeter(0.02) },
        { length: meters(100) },
      );
      const pose = evaluateGeometry(spiral, 100);
      const expected = simpsonSpiral(0, 0.02, 100, 100);
      expect(pose.hdg).toBeCloseTo(1, 12);
      expect(pose.x).toBeCloseTo(expected.x, 6);
      expect(pose.y).toBeCloseTo(expected.y, 6);
    });

    it("stays stable when curvature approaches zero at the end", () => {
      const spiral = makeGeometry(
        { kind: "spiral", curvStart: perMeter(0.01), curvEnd: perMeter(0) },
        { length: meters(50) },
      );
      const pose = evaluateGeometry(spiral, 50);
      const expected = simpsonSpiral(0.01, 0, 50, 50);
      expect(pose.hdg).toBeCloseTo(0.25, 12);
      expect(pose.x).toBeCloseTo(expected.x, 6);
      expect(pose.y).toBeCloseTo(expected.y, 6);
    });
  });

  describe("poly3", () => {
    it("is a line when all coefficients are zero", () => {
      const poly = makeGeometry({ kind: "poly3", a: 0, b: 0, c: 0, d: 0 });
      expect(evaluateGeometry(poly, 5)).toEqual({ x: 5, y: 0, hdg: 0 });
    });

    it("maps arc length to the local u coordinate", () => {
      // v = 0.75u has slope 3/4, so 5 m of curve reach u = 4, v = 3
      const poly = makeGeometry({ kind: "poly3", a: 0, b: 0.75, c: 0, d: 0 });
      const pose = evaluateGeometry(poly, 5);
      expect(pose.x).toBeCloseTo(4, 9);
      expect(pose.y).toBeCloseTo(3, 9);
      expect(pose.hdg).toBeCloseTo(Math.atan(0.75), 12);
    });

    it("rotates the local frame by the start heading", () => {
      const poly = makeGeometry({ kind: "poly3", a: 1, b: 0, c: 0, d: 0 }, { hdg: radians(Math.PI / 2) });
      const pose = evaluateGeometry(poly, 2);
      expect(pose.x).toBeCloseTo(-1, 12);
      expect(pose.y).toBeCloseTo(2, 12);
    });

    it("covers the curved length of a quadratic", () => {
      const poly = makeGeometry({ kind: "poly3", a: 0, b: 0, c: 0.01, d: 0 }, { length: meters(50) });
      const pose = evaluateGeometry(poly, 40);
      // arc length of v = 0.01u² from 0 to u: u/2·√(1+4k²u²) + asinh(2ku)/(4k), k = 0.01
      const arcLength = (u: number) => (u / 2) * Math.sqrt(1 + 0.0004 * u * u) + Math.asinh(0.02 * u) / 0.04;
      expect(arcLength(pose.x)).toBeCloseTo(40, 9);
      expect(pose.y).toBeCloseTo(0.01 * pose.x * pose.x, 12);
    });
  });

  describe("paramPoly3", () => {
    const straight = {
      kind: "paramPoly3",
      aU: 0,
      bU: 10,
      cU: 0,
      dU: 0,
      aV: 0,
      bV: 0,
      cV: 0,
      dV: 0,
      pRange: "normalized",
    } as const;

    it("scales the parameter to [0, 1] for the normalized range", () => {
      const curve = makeGeometry(straight);
      expect(evaluateGeometry(curve, 5)).toEqual({ x: 5, y: 0, hdg: 0 });
    });

    it("uses the offset directly for the arcLength range", () => {
      const curve = makeGeometry({ ...straight, bU: 1, pRange: "arcLength" });
      expect(evaluateGeometry(curve, 5)).toEqual({ x: 5, y: 0, hdg: 0 });
    });

    it("derives the heading from both derivatives", () => {
      const curve = makeGeometry({ ...straight, bU: 1, cV: 0.5, pRange: "arcLength" });
      const pose = evaluateGeometry(curve, 2);
      expect(pose.x).toBe(2);
      expect(pose.y).toBe(2);
      expect(pose.hdg).toBeCloseTo(Math.atan2(2, 1), 12);
    });
  });

  describe("range checks", () => {
    it("rejects offsets outside the segment", () => {
      const line = makeGeometry({ kind: "line" });
      expect(() => evaluateGeometry(line, -0.001)).toThrow(GeometryError);
      expect(() => evaluateGeometry(line, 10.001)).toThrow(GeometryError);
      expect(() => evaluateGeometry(line, Number.NaN)).toThrow(GeometryError);
    });

    it("reports OffsetOutOfRange as the kind", () => {
      const line = makeGeometry({ kind: "line" });
      try {
        evaluateGeometry(line, 11);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(GeometryError);
        expect(err instanceof GeometryError && err.kind).toBe("OffsetOutOfRange");
      }
    });

    it("accepts both ends of the segment", () => {
      const line = makeGeometry({ kind: "line" });
      expect(evaluateGeometry(line, 0).x).toBe(0);
      expect(geometryEnd(line).x).toBe(10);
    });

    it("treats a negative segment length as a programming error", () => {
      const broken = makeGeometry({ kind: "line" }, { length: meters(-1) });
      expect(() => evaluateGeometry(broken, 0)).toThrow(ProgrammingError);
    });
  });
});

describe("evaluateReferenceLine", () => {
  const planView: PlanView = [
    makeGeometry({ kind: "line" }),
    makeGeometry({ kind: "line" }, { s: meters(10), x: meters(10), hdg: radians(Math.PI / 2) }),
  ];

  it("evaluates the segment covering s", () => {
    expect(evaluateReferenceLine(planView, 4)).toEqual({ x: 4, y: 0, hdg: 0 });
    const pose = evaluateReferenceLine(planView, 13);
    expect(pose.x).toBeCloseTo(10, 12);
    expect(pose.y).toBeCloseTo(3, 12);
  });

  it("uses the later segment on a shared boundary", () => {
    expect(evaluateReferenceLine(planView, 10).hdg).toBe(Math.PI / 2);
  });

  it("rejects coordinates beyond the road", () => {
    expect(() => evaluateReferenceLine(planView, 20.5)).toThrow(GeometryError);
    expect(() => evaluateReferenceLine(planView, -1)).toThrow(GeometryError);
  });
});
