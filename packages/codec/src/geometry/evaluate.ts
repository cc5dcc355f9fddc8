/**
 * Curve evaluation: map an arc-length offset on a geometry segment to an
 * inertial position and heading.
 */

import type {
  ArcShape,
  Geometry,
  ParamPoly3Shape,
  PlanView,
  Poly3Shape,
  Pose,
  SpiralShape,
} from "@opendrive-codec/types";
import { GeometryError, ProgrammingError } from "../errors.js";
import { integrate, integrateDirection } from "./quadrature.js";

/** Curvatures below this are evaluated as straight lines */
const STRAIGHT_CURVATURE = 1e-12;
/** Maximum heading change (rad) covered by one quadrature sub-interval */
const MAX_PHASE_PER_SEGMENT = 0.05;
const MAX_SEGMENTS = 4096;

/** Local pose relative to the segment start, before rotation by its heading */
interface LocalPose {
  u: number;
  v: number;
  /** Heading change relative to the start heading */
  dHdg: number;
}

/**
 * Evaluate `geometry` at `offset` meters from its start.
 *
 * @throws ProgrammingError when the segment's own length is negative or not finite
 * @throws GeometryError (OffsetOutOfRange) unless 0 <= offset <= length
 */
export function evaluateGeometry(geometry: Geometry, offset: number): Pose {
  const length = geometry.length.value;
  if (!Number.isFinite(length) || length < 0) {
    throw new ProgrammingError("InvalidGeometry", `Geometry length must be a finite number >= 0, got ${length}`, {
      path: "geometry",
      field: "length",
    });
  }
  if (!(offset >= 0 && offset <= length)) {
    throw new GeometryError(`Offset ${offset} is outside [0, ${length}]`, {
      path: "geometry",
      field: "offset",
    });
  }

  const local = evaluateLocal(geometry, offset);
  const hdg = geometry.hdg.value;
  const cos = Math.cos(hdg);
  const sin = Math.sin(hdg);
  return {
    x: geometry.x.value + local.u * cos - local.v * sin,
    y: geometry.y.value + local.u * sin + local.v * cos,
    hdg: hdg + local.dHdg,
  };
}

/** Pose at the end of the segment */
export function geometryEnd(geometry: Geometry): Pose {
  return evaluateGeometry(geometry, geometry.length.value);
}

/**
 * Evaluate a road's reference line at road coordinate `s` by picking the
 * segment that covers it (the later one on a shared boundary).
 */
export function evaluateReferenceLine(planView: PlanView, s: number): Pose {
  let segment: Geometry | undefined;
  for (const geometry of planView) {
    if (geometry.s.value <= s) segment = geometry;
  }
  const last = planView[planView.length - 1];
  if (segment === undefined || last === undefined || s > last.s.value + last.length.value) {
    throw new GeometryError(`Road coordinate ${s} is not covered by the plan view`, {
      path: "planView",
      field: "s",
    });
  }
  const offset = Math.min(s - segment.s.value, segment.length.value);
  return evaluateGeometry(segment, offset);
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

function evaluateLocal(geometry: Geometry, s: number): LocalPose {
  const shape = geometry.shape;
  switch (shape.kind) {
    case "line":
      return { u: s, v: 0, dHdg: 0 };
    case "arc":
      return evaluateArc(shape, s);
    case "spiral":
      return evaluateSpiral(shape, geometry.length.value, s);
    case "poly3":
      return evaluatePoly3(shape, s);
    case "paramPoly3":
      return evaluateParamPoly3(shape, geometry.length.value, s);
  }
}

/** Closed-form circle via the chord: length 2·sin(ks/2)/k at angle ks/2 */
function evaluateArc(shape: ArcShape, s: number): LocalPose {
  const k = shape.curvature.value;
  if (Math.abs(k) < STRAIGHT_CURVATURE) return { u: s, v: 0, dHdg: 0 };
  const dHdg = k * s;
  const chord = (2 * Math.sin(dHdg / 2)) / k;
  return {
    u: chord * Math.cos(dHdg / 2),
    v: chord * Math.sin(dHdg / 2),
    dHdg,
  };
}

/**
 * Euler spiral: θ(t) = k0·t + (k1 − k0)·t² / (2L). Position is the integral
 * of the direction vector; the sub-interval count follows the largest
 * curvature so the integrand never turns by more than a small angle.
 */
function evaluateSpiral(shape: SpiralShape, length: number, s: number): LocalPose {
  const k0 = shape.curvStart.value;
  const k1 = shape.curvEnd.value;
  const rate = length > 0 ? (k1 - k0) / length : 0;
  const theta = (t: number): number => k0 * t + (rate * t * t) / 2;

  const maxCurvature = Math.max(Math.abs(k0), Math.abs(k0 + rate * s));
  const segments = Math.min(MAX_SEGMENTS, Math.ceil((maxCurvature * s) / MAX_PHASE_PER_SEGMENT));
  const { dx, dy } = integrateDirection(theta, 0, s, segments);
  return { u: dx, v: dy, dHdg: theta(s) };
}

function cubic(a: number, b: number, c: number, d: number, p: number): number {
  return a + p * (b + p * (c + p * d));
}

function cubicSlope(b: number, c: number, d: number, p: number): number {
  return b + p * (2 * c + 3 * d * p);
}

/**
 * Poly3 is parametrized by the local u axis, not by arc length, so u is
 * found by solving arcLength(u) = s (Newton steps inside a bisection bracket).
 */
function evaluatePoly3(shape: Poly3Shape, s: number): LocalPose {
  const { a, b, c, d } = shape;
  const speed = (t: number): number => Math.hypot(1, cubicSlope(b, c, d, t));
  const arcLength = (u: number): number => integrate(speed, 0, u, Math.min(MAX_SEGMENTS, Math.max(4, u)));

  let lo = 0;
  let hi = s;
  let u = s;
  const tolerance = 1e-12 * Math.max(1, s);
  for (let i = 0; i < 100 && s > 0; i++) {
    const residual = arcLength(u) - s;
    if (Math.abs(residual) <= tolerance) break;
    if (residual > 0) hi = u;
    else lo = u;
    const next = u - residual / speed(u);
    u = next > lo && next < hi ? next : (lo + hi) / 2;
    if (hi - lo <= tolerance) break;
  }

  return { u, v: cubic(a, b, c, d, u), dHdg: Math.atan(cubicSlope(b, c, d, u)) };
}

function evaluateParamPoly3(shape: ParamPoly3Shape, length: number, s: number): LocalPose {
  const p = shape.pRange === "normalized" ? (length > 0 ? s / length : 0) : s;
  const du = cubicSlope(shape.bU, shape.cU, shape.dU, p);
  const dv = cubicSlope(shape.bV, shape.cV, shape.dV, p);
  return {
    u: cubic(shape.aU, shape.bU, shape.cU, shape.dU, p),
    v: cubic(shape.aV, shape.bV, shape.cV, shape.dV, p),
    dHdg: Math.atan2(dv, du),
  };
}
